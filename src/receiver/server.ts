import net, { type Socket } from 'node:net'
import { EventEmitter } from 'node:events'
import path from 'node:path'
import { Connection, TransferSession } from '../session/index.js'
import type { Admission, FileOffer, Outcome } from '../session/index.js'
import { validateFileName, type OutputDirectory } from '../files.js'
import { formatSize, shortId } from '../utils.js'
import { acceptAll, type AdmissionPolicy } from './policy.js'
import { NameReservations } from './reservations.js'

export interface FileReceiverConfig {
  port: number
  host?: string
  output: OutputDirectory
  timeoutMs: number
  policy?: AdmissionPolicy
  overwrite?: boolean
}

export interface SessionReport {
  sessionId: string
  remoteAddress: string
  fileName: string | null
  outcome: Outcome
  path: string | null
}

export interface FileReceiverEvents {
  'session-start': (sessionId: string, remoteAddress: string) => void
  'session-end': (report: SessionReport) => void
}

export interface FileReceiver {
  on<E extends keyof FileReceiverEvents>(event: E, listener: FileReceiverEvents[E]): this
  once<E extends keyof FileReceiverEvents>(event: E, listener: FileReceiverEvents[E]): this
  off<E extends keyof FileReceiverEvents>(event: E, listener: FileReceiverEvents[E]): this
  emit<E extends keyof FileReceiverEvents>(event: E, ...args: Parameters<FileReceiverEvents[E]>): boolean
}

/**
 * Accepts connections and runs one receiver-role session per connection.
 * Sessions run independently of the accept loop and of each other; the only
 * state they share is the set of reserved destination names.
 */
export class FileReceiver extends EventEmitter {
  private server: net.Server | null = null
  private config: FileReceiverConfig
  private policy: AdmissionPolicy
  private reservations = new NameReservations()
  private sessions: Set<Promise<void>> = new Set()

  constructor(config: FileReceiverConfig) {
    super()
    this.config = config
    this.policy = config.policy ?? acceptAll
  }

  get activeSessions(): number {
    return this.sessions.size
  }

  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = net.createServer((socket) => {
        this.handleConnection(socket)
      })
      this.server = server

      const onBindError = (err: Error) => {
        this.server = null
        reject(err)
      }
      server.once('error', onBindError)

      server.listen({ port: this.config.port, host: this.config.host }, () => {
        server.off('error', onBindError)
        server.on('error', (err: Error) => {
          console.error(`Receiver error: ${err.message}`)
        })

        const addr = server.address()
        const port = (addr && typeof addr === 'object') ? addr.port : this.config.port
        console.log(`Receiver listening on port ${port}, saving to ${this.config.output.root}`)
        resolve(port)
      })
    })
  }

  /**
   * Stop accepting connections. Resolves once every session that was already
   * running has finished on its own.
   */
  async stop(): Promise<void> {
    const server = this.server
    if (server) {
      this.server = null
      await new Promise<void>((resolve) => {
        server.close(() => resolve())
      })
    }
    await Promise.all([...this.sessions])
  }

  private handleConnection(socket: Socket): void {
    const connection = new Connection(socket)
    const claims: string[] = []
    const session = new TransferSession({
      role: 'receiver',
      connection,
      timeoutMs: this.config.timeoutMs,
      admit: (offer, sessionId) => this.admit(offer, sessionId, claims)
    })

    console.log(`Session ${shortId(session.id)}: connection from ${connection.remoteAddress}`)
    this.emit('session-start', session.id, connection.remoteAddress)

    const running: Promise<void> = this.runSession(session, connection.remoteAddress, claims)
      .catch((err) => {
        console.error(`Session ${shortId(session.id)}: unexpected error:`, err)
      })
      .finally(() => {
        this.sessions.delete(running)
      })
    this.sessions.add(running)
  }

  private async runSession(session: TransferSession, remoteAddress: string, claims: string[]): Promise<void> {
    let outcome: Outcome
    try {
      outcome = await session.run()
    } finally {
      for (const name of claims) {
        this.reservations.release(name)
      }
    }

    const fileName = session.negotiatedFileName
    const report: SessionReport = {
      sessionId: session.id,
      remoteAddress,
      fileName,
      outcome,
      path: outcome.status === 'completed' && fileName ? path.join(this.config.output.root, fileName) : null
    }

    const tag = `Session ${shortId(session.id)}`
    switch (outcome.status) {
      case 'completed':
        console.log(`${tag}: received ${fileName} (${formatSize(outcome.bytes)})`)
        break
      case 'rejected':
        console.log(`${tag}: declined ${fileName ?? '(no offer)'}: ${outcome.reason}`)
        break
      case 'failed':
        console.error(`${tag}: ${outcome.error}: ${outcome.message}`)
        break
    }

    this.emit('session-end', report)
  }

  private async admit(offer: FileOffer, sessionId: string, claims: string[]): Promise<Admission> {
    const tag = `Session ${shortId(sessionId)}`
    const { fileName } = offer

    const nameError = validateFileName(fileName, this.config.output.root)
    if (nameError) {
      console.error(`${tag}: PathSecurityError: ${nameError}`)
      return { accepted: false, reason: `invalid file name: ${nameError}` }
    }

    const decision = await this.policy(offer)
    if (!decision.accept) {
      return { accepted: false, reason: decision.reason }
    }

    if (!this.reservations.reserve(fileName)) {
      return { accepted: false, reason: `${fileName} is already being received` }
    }
    claims.push(fileName)

    if (!this.config.overwrite && this.config.output.exists(fileName)) {
      return { accepted: false, reason: `${fileName} already exists` }
    }

    try {
      const sink = await this.config.output.create(fileName, sessionId)
      return { accepted: true, sink }
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err)
      console.error(`${tag}: cannot create ${fileName}: ${msg}`)
      return { accepted: false, reason: 'receiver cannot store the file' }
    }
  }
}

/**
 * Run a receiver until `signal` aborts. Rejects if the port cannot be bound.
 */
export async function listen(config: FileReceiverConfig, signal: AbortSignal): Promise<void> {
  const receiver = new FileReceiver(config)
  await receiver.start()

  if (!signal.aborted) {
    await new Promise<void>((resolve) => {
      signal.addEventListener('abort', () => resolve(), { once: true })
    })
  }

  console.log('Receiver stopping, waiting for running sessions...')
  await receiver.stop()
  console.log('Receiver stopped')
}

import type { Message, HelloMessage } from '../protocol/index.js'
import { TransferError, toTransferError } from '../errors.js'
import type { FileSink, FileSource } from '../files.js'
import { generateId } from '../utils.js'
import type { Connection } from './connection.js'
import type { Role, SessionState, Outcome, Admit } from './types.js'

interface SessionConfigBase {
  connection: Connection
  timeoutMs: number
  id?: string
}

export interface SenderSessionConfig extends SessionConfigBase {
  role: 'sender'
  source: FileSource
  fileName: string
}

export interface ReceiverSessionConfig extends SessionConfigBase {
  role: 'receiver'
  admit: Admit
}

export type TransferSessionConfig = SenderSessionConfig | ReceiverSessionConfig

/**
 * One connection's worth of protocol, in one role.
 *
 * `run()` loops over the current state until it reaches DONE or ABORTED. States
 * that wait on the peer read exactly one message and hand it to `handle()`,
 * which is the only place a message can move the session forward; any
 * (state, message) pair it doesn't list is a protocol violation.
 */
export class TransferSession {
  readonly id: string
  readonly role: Role
  private config: TransferSessionConfig
  private connection: Connection
  private state: SessionState = 'START'
  private fileName: string | null = null
  private fileSize = 0
  private bytesTransferred = 0
  private sink: FileSink | null = null
  private outcome: Outcome | null = null

  constructor(config: TransferSessionConfig) {
    this.config = config
    this.connection = config.connection
    this.role = config.role
    this.id = config.id ?? generateId()
  }

  get currentState(): SessionState {
    return this.state
  }

  get negotiatedFileName(): string | null {
    return this.fileName
  }

  get negotiatedFileSize(): number {
    return this.fileSize
  }

  get transferred(): number {
    return this.bytesTransferred
  }

  isTerminal(): boolean {
    return this.state === 'DONE' || this.state === 'ABORTED'
  }

  async run(): Promise<Outcome> {
    if (this.state !== 'START') {
      throw new Error(`session ${this.id} has already run`)
    }

    try {
      while (!this.isTerminal()) {
        await this.step()
      }
    } catch (err) {
      await this.abort(toTransferError(err))
    }

    return this.outcome ?? { status: 'failed', error: 'ProtocolViolation', message: 'session ended without an outcome' }
  }

  private async step(): Promise<void> {
    const config = this.config

    switch (this.state) {
      case 'START':
        if (config.role === 'sender') {
          await this.offer(config)
        } else {
          this.state = 'AWAITING_OFFER'
        }
        return
      case 'AWAITING_OFFER':
      case 'OFFER_SENT':
      case 'ACCEPTED':
        await this.handle(await this.connection.readMessage(config.timeoutMs))
        return
      case 'TRANSFERRING':
        if (config.role === 'sender') {
          await this.streamOut(config.source)
        } else {
          await this.streamIn()
        }
        return
      case 'REJECTED':
      case 'DONE':
      case 'ABORTED':
        throw new Error(`session ${this.id} stepped in state ${this.state}`)
    }
  }

  private async handle(message: Message): Promise<void> {
    const config = this.config

    switch (this.state) {
      case 'AWAITING_OFFER':
        if (message.type === 'HELLO' && config.role === 'receiver') {
          return this.decide(message, config.admit)
        }
        break
      case 'OFFER_SENT':
        if (message.type === 'ACK') return this.confirm()
        if (message.type === 'NACK') return this.rejected(message.reason)
        break
      case 'ACCEPTED':
        if (message.type === 'SEND') return this.verifySize(message.fileSize)
        break
    }

    throw new TransferError('ProtocolViolation', `unexpected ${message.type} in state ${this.state}`)
  }

  // --- Sender side ---

  private async offer(config: SenderSessionConfig): Promise<void> {
    this.fileName = config.fileName
    this.fileSize = config.source.size
    await this.connection.send({ type: 'HELLO', fileName: this.fileName, fileSize: this.fileSize })
    this.state = 'OFFER_SENT'
  }

  private async confirm(): Promise<void> {
    await this.connection.send({ type: 'SEND', fileSize: this.fileSize })
    this.state = 'TRANSFERRING'
  }

  private async streamOut(source: FileSource): Promise<void> {
    for await (const chunk of source.open()) {
      if (this.bytesTransferred + chunk.length > this.fileSize) {
        throw new TransferError('IoError', `source produced more than the ${this.fileSize} bytes offered`)
      }
      await this.connection.write(chunk)
      this.bytesTransferred += chunk.length
    }

    if (this.bytesTransferred !== this.fileSize) {
      throw new TransferError('IoError', `source ended after ${this.bytesTransferred} of ${this.fileSize} bytes`)
    }

    await this.connection.end()
    this.complete()
  }

  // --- Receiver side ---

  private async decide(hello: HelloMessage, admit: Admit): Promise<void> {
    this.fileName = hello.fileName
    this.fileSize = hello.fileSize

    const admission = await admit({ fileName: hello.fileName, fileSize: hello.fileSize }, this.id)
    if (!admission.accepted) {
      await this.connection.send({ type: 'NACK', reason: admission.reason })
      return this.rejected(admission.reason)
    }

    this.sink = admission.sink
    await this.connection.send({ type: 'ACK' })
    this.state = 'ACCEPTED'
  }

  private verifySize(fileSize: number): void {
    if (fileSize !== this.fileSize) {
      throw new TransferError('ProtocolViolation', `SEND declared ${fileSize} bytes but HELLO offered ${this.fileSize}`)
    }
    this.state = 'TRANSFERRING'
  }

  private async streamIn(): Promise<void> {
    const sink = this.sink
    if (!sink) {
      throw new TransferError('ProtocolViolation', 'no destination for accepted transfer')
    }

    while (this.bytesTransferred < this.fileSize) {
      const chunk = await this.connection.readChunk(this.fileSize - this.bytesTransferred, this.config.timeoutMs)
      await sink.write(chunk)
      this.bytesTransferred += chunk.length
    }

    await sink.commit()
    this.sink = null
    await this.connection.end()
    this.complete()
  }

  // --- Terminal transitions ---

  private async rejected(reason: string): Promise<void> {
    this.state = 'REJECTED'
    await this.connection.end()
    this.outcome = { status: 'rejected', reason }
    this.state = 'DONE'
  }

  private complete(): void {
    this.outcome = { status: 'completed', bytes: this.bytesTransferred }
    this.state = 'DONE'
  }

  private async abort(err: TransferError): Promise<void> {
    this.state = 'ABORTED'
    this.outcome = { status: 'failed', error: err.kind, message: err.message }
    this.connection.destroy()

    const sink = this.sink
    this.sink = null
    if (sink) {
      try {
        await sink.discard()
      } catch (discardErr) {
        const msg = discardErr instanceof Error ? discardErr.message : String(discardErr)
        console.error(`Session ${this.id.slice(0, 8)}: failed to discard partial file: ${msg}`)
      }
    }
  }
}

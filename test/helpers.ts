import net, { type Socket } from 'node:net'
import type { FileSink } from '../src/files.js'
import type { FileReceiver, SessionReport } from '../src/receiver/index.js'

export const HOST = '127.0.0.1'

/** Two connected loopback sockets: [accepted side, dialing side]. */
export async function socketPair(): Promise<[Socket, Socket]> {
  const server = net.createServer()
  await new Promise<void>((resolve) => server.listen(0, HOST, () => resolve()))

  const addr = server.address()
  if (!addr || typeof addr !== 'object') throw new Error('server has no port')

  const accepted = new Promise<Socket>((resolve) => server.once('connection', resolve))
  const client = net.createConnection({ host: HOST, port: addr.port })
  const [serverSide] = await Promise.all([
    accepted,
    new Promise<void>((resolve) => client.once('connect', () => resolve()))
  ])

  server.close()
  return [serverSide, client]
}

/** Listening port that accepts connections and never says anything. */
export async function silentServer(): Promise<{ port: number; close: () => Promise<void> }> {
  const sockets: Socket[] = []
  const server = net.createServer((socket) => {
    socket.on('error', () => {})
    sockets.push(socket)
  })
  await new Promise<void>((resolve) => server.listen(0, HOST, () => resolve()))

  const addr = server.address()
  if (!addr || typeof addr !== 'object') throw new Error('server has no port')

  return {
    port: addr.port,
    close: () => new Promise<void>((resolve) => {
      for (const socket of sockets) socket.destroy()
      server.close(() => resolve())
    })
  }
}

/** A port nothing is listening on. */
export async function closedPort(): Promise<number> {
  const { port, close } = await silentServer()
  await close()
  return port
}

export function nextReport(receiver: FileReceiver): Promise<SessionReport> {
  return new Promise((resolve) => receiver.once('session-end', resolve))
}

export function collectReports(receiver: FileReceiver, count: number): Promise<SessionReport[]> {
  return new Promise((resolve) => {
    const reports: SessionReport[] = []
    const onEnd = (report: SessionReport) => {
      reports.push(report)
      if (reports.length === count) {
        receiver.off('session-end', onEnd)
        resolve(reports)
      }
    }
    receiver.on('session-end', onEnd)
  })
}

/** Deterministic filler so content mix-ups between files show up. */
export function pattern(size: number, seed: number): Buffer {
  const buf = Buffer.alloc(size)
  for (let i = 0; i < size; i++) {
    buf.writeUInt8((i * 31 + seed * 17) & 0xff, i)
  }
  return buf
}

export class MemorySink implements FileSink {
  private chunks: Buffer[] = []
  committed = false
  discarded = false

  async write(chunk: Uint8Array): Promise<void> {
    this.chunks.push(Buffer.from(chunk))
  }

  async commit(): Promise<string> {
    this.committed = true
    return 'memory'
  }

  async discard(): Promise<void> {
    this.discarded = true
  }

  get data(): Buffer {
    return Buffer.concat(this.chunks)
  }
}

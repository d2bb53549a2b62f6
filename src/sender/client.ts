import net, { type Socket } from 'node:net'
import { Connection, TransferSession, type Outcome } from '../session/index.js'
import type { FileSource } from '../files.js'
import { formatSize, shortId } from '../utils.js'

export interface SendOptions {
  host: string
  port: number
  source: FileSource
  /** Name offered to the receiver; defaults to `source.name`. */
  fileName?: string
  timeoutMs: number
  connectTimeoutMs?: number
}

function connect(host: string, port: number, timeoutMs: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host, port })

    const timer = setTimeout(() => {
      socket.destroy()
      reject(new Error(`connection to ${host}:${port} timed out after ${timeoutMs}ms`))
    }, timeoutMs)

    const onError = (err: Error) => {
      clearTimeout(timer)
      socket.destroy()
      reject(err)
    }
    socket.once('error', onError)

    socket.once('connect', () => {
      clearTimeout(timer)
      socket.off('error', onError)
      resolve(socket)
    })
  })
}

/**
 * Offer one file to a listening receiver and stream it if accepted. Never
 * throws; every failure comes back as a `failed` outcome.
 */
export async function sendFile(options: SendOptions): Promise<Outcome> {
  const { host, port, source } = options
  const fileName = options.fileName ?? source.name

  let socket: Socket
  try {
    socket = await connect(host, port, options.connectTimeoutMs ?? options.timeoutMs)
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err)
    console.error(`Cannot connect to ${host}:${port}: ${msg}`)
    return { status: 'failed', error: 'ConnectionError', message: msg }
  }

  const session = new TransferSession({
    role: 'sender',
    connection: new Connection(socket),
    timeoutMs: options.timeoutMs,
    source,
    fileName
  })

  const tag = `Session ${shortId(session.id)}`
  console.log(`${tag}: offering ${fileName} (${formatSize(source.size)}) to ${host}:${port}`)

  const outcome = await session.run()

  switch (outcome.status) {
    case 'completed':
      console.log(`${tag}: sent ${fileName} (${formatSize(outcome.bytes)})`)
      break
    case 'rejected':
      console.log(`${tag}: receiver declined ${fileName}: ${outcome.reason}`)
      break
    case 'failed':
      console.error(`${tag}: ${outcome.error}: ${outcome.message}`)
      break
  }

  return outcome
}

import type { Socket } from 'node:net'
import b4a from 'b4a'
import { decodeMessage, encodeMessage } from '../protocol/index.js'
import type { Message } from '../protocol/index.js'
import { TransferError, DecodeError, isTruncated } from '../errors.js'

// Stop reading from the socket once this much is buffered and unconsumed
const HIGH_WATER_MARK = 256 * 1024

/**
 * Pull-style reader/writer over one socket. Incoming bytes are buffered until
 * a session asks for a message or a chunk of file data; every wait is bounded
 * by a deadline.
 */
export class Connection {
  private socket: Socket
  private buffer: Buffer = b4a.alloc(0)
  private ended = false
  private error: Error | null = null
  private wake: (() => void) | null = null

  readonly remoteAddress: string

  constructor(socket: Socket) {
    this.socket = socket
    this.remoteAddress = socket.remoteAddress
      ? `${socket.remoteAddress}:${socket.remotePort ?? '?'}`
      : 'unknown'

    socket.on('data', (chunk: Buffer) => {
      this.buffer = this.buffer.length === 0 ? chunk : b4a.concat([this.buffer, chunk])
      if (this.buffer.length >= HIGH_WATER_MARK) {
        socket.pause()
      }
      this.notify()
    })

    socket.on('end', () => {
      this.ended = true
      this.notify()
    })

    socket.on('error', (err: Error) => {
      this.error = err
      this.notify()
    })

    socket.on('close', () => {
      this.ended = true
      this.notify()
    })
  }

  async readMessage(timeoutMs: number): Promise<Message> {
    const deadline = Date.now() + timeoutMs

    for (;;) {
      if (this.buffer.length > 0) {
        try {
          const { message, bytesRead } = decodeMessage(this.buffer)
          this.consume(bytesRead)
          return message
        } catch (err) {
          if (!isTruncated(err)) throw err
        }
      }

      this.throwIfClosed('peer closed the connection mid-message', 'peer closed the connection')
      await this.waitForData(deadline)
    }
  }

  /**
   * Resolve with the next buffered bytes, at most `maxBytes` of them. Throws
   * `ConnectionError` if the stream ends before any arrive.
   */
  async readChunk(maxBytes: number, timeoutMs: number): Promise<Buffer> {
    const deadline = Date.now() + timeoutMs

    for (;;) {
      if (this.buffer.length > 0) {
        const n = Math.min(maxBytes, this.buffer.length)
        const chunk = this.buffer.subarray(0, n)
        this.consume(n)
        return chunk
      }

      if (this.error) {
        throw new TransferError('ConnectionError', this.error.message)
      }
      if (this.ended) {
        throw new TransferError('ConnectionError', 'peer closed the connection before the file was complete')
      }
      await this.waitForData(deadline)
    }
  }

  write(data: Uint8Array): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.write(data, (err?: Error | null) => {
        if (err) {
          reject(new TransferError('ConnectionError', err.message))
        } else {
          resolve()
        }
      })
    })
  }

  send(message: Message): Promise<void> {
    return this.write(encodeMessage(message))
  }

  /** Flush pending writes and half-close. */
  end(): Promise<void> {
    return new Promise((resolve) => {
      if (this.socket.destroyed || this.socket.writableEnded) {
        resolve()
        return
      }
      this.socket.end(() => resolve())
    })
  }

  destroy(): void {
    this.socket.destroy()
  }

  private consume(n: number): void {
    this.buffer = this.buffer.subarray(n)
    if (this.buffer.length < HIGH_WATER_MARK && this.socket.isPaused()) {
      this.socket.resume()
    }
  }

  private throwIfClosed(partial: string, empty: string): void {
    if (this.error) {
      throw new TransferError('ConnectionError', this.error.message)
    }
    if (this.ended) {
      throw new DecodeError('Truncated', this.buffer.length > 0 ? partial : empty)
    }
  }

  private notify(): void {
    const wake = this.wake
    this.wake = null
    wake?.()
  }

  private waitForData(deadline: number): Promise<void> {
    const remaining = deadline - Date.now()
    if (remaining <= 0) {
      return Promise.reject(new TransferError('TimeoutError', 'timed out waiting for peer'))
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.wake = null
        reject(new TransferError('TimeoutError', 'timed out waiting for peer'))
      }, remaining)

      this.wake = () => {
        clearTimeout(timer)
        resolve()
      }
    })
  }
}

import b4a from 'b4a'
import { DecodeError } from '../errors.js'
import { MessageTag, MAX_STRING_BYTES, type Message, type DecodedMessage } from './types.js'

// Wire layout: 1 tag byte, then fields. Lengths are u32 BE, sizes u64 BE,
// strings raw UTF-8 after their length.

const TAG_BYTES = 1
const LENGTH_BYTES = 4
const SIZE_BYTES = 8

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true })

export function encodeMessage(message: Message): Buffer {
  switch (message.type) {
    case 'HELLO': {
      const name = encodeString(message.fileName, 'file name')
      const buf = b4a.alloc(TAG_BYTES + LENGTH_BYTES + name.length + SIZE_BYTES)
      buf.writeUInt8(MessageTag.HELLO, 0)
      buf.writeUInt32BE(name.length, TAG_BYTES)
      name.copy(buf, TAG_BYTES + LENGTH_BYTES)
      buf.writeBigUInt64BE(encodeSize(message.fileSize), TAG_BYTES + LENGTH_BYTES + name.length)
      return buf
    }
    case 'ACK':
      return b4a.from([MessageTag.ACK])
    case 'NACK': {
      const reason = encodeString(message.reason, 'reason')
      const buf = b4a.alloc(TAG_BYTES + LENGTH_BYTES + reason.length)
      buf.writeUInt8(MessageTag.NACK, 0)
      buf.writeUInt32BE(reason.length, TAG_BYTES)
      reason.copy(buf, TAG_BYTES + LENGTH_BYTES)
      return buf
    }
    case 'SEND': {
      const buf = b4a.alloc(TAG_BYTES + SIZE_BYTES)
      buf.writeUInt8(MessageTag.SEND, 0)
      buf.writeBigUInt64BE(encodeSize(message.fileSize), TAG_BYTES)
      return buf
    }
  }
}

/**
 * Decode one message from the front of `buf`.
 *
 * Throws `DecodeError` with reason `Truncated` when `buf` holds only a prefix
 * of a message; a streaming caller should read more and try again. Trailing
 * bytes after the message are left alone and counted out via `bytesRead`.
 */
export function decodeMessage(buf: Uint8Array): DecodedMessage {
  const reader = new FieldReader(buf)
  const tag = reader.u8()

  switch (tag) {
    case MessageTag.HELLO: {
      const fileName = reader.string('file name')
      const fileSize = reader.u64('file size')
      return { message: { type: 'HELLO', fileName, fileSize }, bytesRead: reader.offset }
    }
    case MessageTag.ACK:
      return { message: { type: 'ACK' }, bytesRead: reader.offset }
    case MessageTag.NACK: {
      const reason = reader.string('reason')
      return { message: { type: 'NACK', reason }, bytesRead: reader.offset }
    }
    case MessageTag.SEND: {
      const fileSize = reader.u64('file size')
      return { message: { type: 'SEND', fileSize }, bytesRead: reader.offset }
    }
    default:
      throw new DecodeError('UnknownTag', `unknown message tag 0x${tag.toString(16).padStart(2, '0')}`)
  }
}

function encodeString(value: string, field: string): Buffer {
  const bytes = b4a.from(value, 'utf8')
  if (bytes.length > MAX_STRING_BYTES) {
    throw new DecodeError('Malformed', `${field} is ${bytes.length} bytes, limit is ${MAX_STRING_BYTES}`)
  }
  return bytes
}

function encodeSize(size: number): bigint {
  if (!Number.isSafeInteger(size) || size < 0) {
    throw new DecodeError('Malformed', `invalid file size: ${size}`)
  }
  return BigInt(size)
}

class FieldReader {
  private buf: Buffer
  offset = 0

  constructor(bytes: Uint8Array) {
    this.buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  }

  private need(n: number): void {
    if (this.offset + n > this.buf.length) {
      throw new DecodeError('Truncated', `need ${this.offset + n} bytes, have ${this.buf.length}`)
    }
  }

  u8(): number {
    this.need(1)
    const value = this.buf.readUInt8(this.offset)
    this.offset += 1
    return value
  }

  u64(field: string): number {
    this.need(SIZE_BYTES)
    const value = this.buf.readBigUInt64BE(this.offset)
    this.offset += SIZE_BYTES
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new DecodeError('Malformed', `${field} ${value} exceeds ${Number.MAX_SAFE_INTEGER}`)
    }
    return Number(value)
  }

  string(field: string): string {
    this.need(LENGTH_BYTES)
    const length = this.buf.readUInt32BE(this.offset)
    // Checked before waiting on the body so a hostile length never gets buffered
    if (length > MAX_STRING_BYTES) {
      throw new DecodeError('Malformed', `${field} length ${length} exceeds ${MAX_STRING_BYTES}`)
    }
    this.offset += LENGTH_BYTES
    this.need(length)
    const bytes = this.buf.subarray(this.offset, this.offset + length)
    this.offset += length
    try {
      return utf8.decode(bytes)
    } catch {
      throw new DecodeError('Malformed', `${field} is not valid UTF-8`)
    }
  }
}

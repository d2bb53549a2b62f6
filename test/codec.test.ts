import { describe, test } from 'node:test'
import assert from 'node:assert'
import { encodeMessage, decodeMessage, MAX_STRING_BYTES } from '../src/protocol/index.js'
import type { Message } from '../src/protocol/index.js'
import { DecodeError, type DecodeErrorReason } from '../src/errors.js'

function decodeFails(bytes: number[] | Uint8Array, reason: DecodeErrorReason): void {
  assert.throws(
    () => decodeMessage(Uint8Array.from(bytes)),
    (err: unknown) => err instanceof DecodeError && err.reason === reason
  )
}

describe('encodeMessage', () => {
  test('HELLO is tag, u32 name length, name, u64 size', () => {
    const bytes = encodeMessage({ type: 'HELLO', fileName: 'a.txt', fileSize: 5 })
    assert.deepStrictEqual([...bytes], [
      0x01,
      0, 0, 0, 5,
      0x61, 0x2e, 0x74, 0x78, 0x74,
      0, 0, 0, 0, 0, 0, 0, 5
    ])
  })

  test('ACK is a single tag byte', () => {
    assert.deepStrictEqual([...encodeMessage({ type: 'ACK' })], [0x02])
  })

  test('NACK carries a length-prefixed reason', () => {
    assert.deepStrictEqual([...encodeMessage({ type: 'NACK', reason: 'no' })], [0x03, 0, 0, 0, 2, 0x6e, 0x6f])
  })

  test('SEND carries a big-endian u64 size', () => {
    assert.deepStrictEqual([...encodeMessage({ type: 'SEND', fileSize: 258 })], [0x04, 0, 0, 0, 0, 0, 0, 1, 2])
  })

  test('name length counts UTF-8 bytes, not characters', () => {
    const bytes = encodeMessage({ type: 'HELLO', fileName: 'é', fileSize: 0 })
    assert.strictEqual(bytes.readUInt32BE(1), 2)
    assert.strictEqual(bytes.length, 1 + 4 + 2 + 8)
  })

  test('refuses negative, fractional and unsafe sizes', () => {
    for (const fileSize of [-1, 1.5, Number.MAX_SAFE_INTEGER + 1]) {
      assert.throws(
        () => encodeMessage({ type: 'SEND', fileSize }),
        (err: unknown) => err instanceof DecodeError && err.reason === 'Malformed'
      )
    }
  })

  test('refuses strings over the limit', () => {
    assert.throws(
      () => encodeMessage({ type: 'NACK', reason: 'x'.repeat(MAX_STRING_BYTES + 1) }),
      (err: unknown) => err instanceof DecodeError && err.reason === 'Malformed'
    )
  })
})

describe('decodeMessage', () => {
  const samples: Message[] = [
    { type: 'HELLO', fileName: 'report-2024.pdf', fileSize: 1_048_576 },
    { type: 'HELLO', fileName: 'naïve café.txt', fileSize: 0 },
    { type: 'ACK' },
    { type: 'NACK', reason: 'file already exists' },
    { type: 'SEND', fileSize: Number.MAX_SAFE_INTEGER }
  ]

  test('reads back what was encoded, consuming every byte', () => {
    for (const message of samples) {
      const bytes = encodeMessage(message)
      const decoded = decodeMessage(bytes)
      assert.deepStrictEqual(decoded.message, message)
      assert.strictEqual(decoded.bytesRead, bytes.length)
    }
  })

  test('every strict prefix of a message is Truncated', () => {
    for (const message of samples) {
      const bytes = encodeMessage(message)
      for (let i = 0; i < bytes.length; i++) {
        decodeFails(bytes.subarray(0, i), 'Truncated')
      }
    }
  })

  test('leaves trailing bytes unread', () => {
    const bytes = Buffer.concat([encodeMessage({ type: 'ACK' }), encodeMessage({ type: 'SEND', fileSize: 3 })])
    const first = decodeMessage(bytes)
    assert.deepStrictEqual(first.message, { type: 'ACK' })
    assert.strictEqual(first.bytesRead, 1)

    const second = decodeMessage(bytes.subarray(first.bytesRead))
    assert.deepStrictEqual(second.message, { type: 'SEND', fileSize: 3 })
  })

  test('unknown tag bytes are rejected', () => {
    decodeFails([0x00], 'UnknownTag')
    decodeFails([0x05, 0, 0], 'UnknownTag')
    decodeFails([0xff], 'UnknownTag')
  })

  test('oversized string length is Malformed before the body arrives', () => {
    decodeFails([0x03, 0x00, 0x00, 0x10, 0x01], 'Malformed')
    decodeFails([0x01, 0xff, 0xff, 0xff, 0xff], 'Malformed')
  })

  test('a string at the limit is accepted', () => {
    const reason = 'r'.repeat(MAX_STRING_BYTES)
    const decoded = decodeMessage(encodeMessage({ type: 'NACK', reason }))
    assert.deepStrictEqual(decoded.message, { type: 'NACK', reason })
  })

  test('invalid UTF-8 is Malformed', () => {
    decodeFails([0x03, 0, 0, 0, 1, 0xff], 'Malformed')
    decodeFails([0x01, 0, 0, 0, 2, 0xc3, 0x28, 0, 0, 0, 0, 0, 0, 0, 1], 'Malformed')
  })

  test('sizes beyond the safe integer range are Malformed', () => {
    decodeFails([0x04, 0x00, 0x20, 0, 0, 0, 0, 0, 0], 'Malformed')
    decodeFails([0x04, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff], 'Malformed')
  })

  test('decode errors carry the DecodeError kind', () => {
    try {
      decodeMessage(Uint8Array.from([0x07]))
      assert.fail('expected a DecodeError')
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err
      assert.strictEqual(err.kind, 'DecodeError')
      assert.strictEqual(err.message, 'unknown message tag 0x07')
    }
  })
})

import { test, describe } from 'node:test'
import assert from 'node:assert'
import { sendFile } from '../src/sender/index.js'
import { memorySource } from '../src/files.js'
import { HOST, silentServer, closedPort } from './helpers.js'

describe('sendFile', () => {
  test('a refused connection fails without a protocol exchange', async () => {
    const port = await closedPort()

    const outcome = await sendFile({ host: HOST, port, source: memorySource('a.txt', Buffer.from('a')), timeoutMs: 1000 })

    assert.strictEqual(outcome.status === 'failed' ? outcome.error : outcome.status, 'ConnectionError')
  })

  test('a receiver that never answers HELLO makes the sender time out', async () => {
    const server = await silentServer()

    try {
      const started = Date.now()
      const outcome = await sendFile({
        host: HOST,
        port: server.port,
        source: memorySource('a.txt', Buffer.from('a')),
        timeoutMs: 150
      })

      assert.deepStrictEqual(outcome, { status: 'failed', error: 'TimeoutError', message: 'timed out waiting for peer' })
      assert.ok(Date.now() - started < 2000)
    } finally {
      await server.close()
    }
  })
})

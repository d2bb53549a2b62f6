import { describe, test } from 'node:test'
import assert from 'node:assert'
import { NameReservations } from '../src/receiver/index.js'

describe('NameReservations', () => {
  test('a name can be held by one claimant at a time', () => {
    const reservations = new NameReservations()
    assert.strictEqual(reservations.reserve('a.txt'), true)
    assert.strictEqual(reservations.reserve('a.txt'), false)
    assert.strictEqual(reservations.has('a.txt'), true)
  })

  test('different names do not conflict', () => {
    const reservations = new NameReservations()
    assert.strictEqual(reservations.reserve('a.txt'), true)
    assert.strictEqual(reservations.reserve('b.txt'), true)
    assert.strictEqual(reservations.size, 2)
  })

  test('release frees the name for the next claimant', () => {
    const reservations = new NameReservations()
    reservations.reserve('a.txt')
    reservations.release('a.txt')
    assert.strictEqual(reservations.has('a.txt'), false)
    assert.strictEqual(reservations.reserve('a.txt'), true)
  })

  test('releasing an unknown name is a no-op', () => {
    const reservations = new NameReservations()
    reservations.release('ghost')
    assert.strictEqual(reservations.size, 0)
  })
})

import { describe, it, expect, vi, afterEach } from 'vitest'
import { createMockStore } from '@shopfront/testing'
import { createLogger } from './logger'

type Action = { type: 'PING' } | { type: 'PONG'; n: number }

afterEach(() => {
  vi.restoreAllMocks()
})

describe('createLogger', () => {
  it('logs each dispatched action with the store name', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined)
    const store = createMockStore<{ count: number }, Action>({ count: 0 })
    const sub = createLogger(store, 'Counter')

    store.dispatch({ type: 'PING' })
    store.dispatch({ type: 'PONG', n: 2 })

    expect(debug.mock.calls).toEqual([
      ['[shop] Counter: PING', { type: 'PING' }],
      ['[shop] Counter: PONG', { type: 'PONG', n: 2 }],
    ])
    sub.unsubscribe()
  })

  it('stops logging once unsubscribed', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined)
    const store = createMockStore<{ count: number }, Action>({ count: 0 })

    createLogger(store).unsubscribe()
    store.dispatch({ type: 'PING' })

    expect(debug).not.toHaveBeenCalled()
  })
})

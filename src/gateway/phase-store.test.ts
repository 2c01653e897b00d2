import { describe, it, expect, vi } from 'vitest'
import { PhaseStore } from './phase-store.js'

describe('PhaseStore', () => {
  it('starts in loading', () => {
    expect(new PhaseStore().get()).toEqual({ status: 'loading' })
  })

  it('latest publish wins', () => {
    const store = new PhaseStore()
    store.publish({ status: 'qr_code', fingerprint: 'fp', displayPayload: 'https://example.test/ra/fp' })
    store.publish({ status: 'cancelled' })
    expect(store.get()).toEqual({ status: 'cancelled' })
  })

  it('notifies every subscriber until it unsubscribes', () => {
    const store = new PhaseStore()
    const first = vi.fn()
    const second = vi.fn()
    const unsubscribe = store.onPhase(first)
    store.onPhase(second)

    store.publish({ status: 'cancelled' })
    unsubscribe()
    store.publish({ status: 'loading' })

    expect(first).toHaveBeenCalledTimes(1)
    expect(first).toHaveBeenCalledWith({ status: 'cancelled' })
    expect(second).toHaveBeenCalledTimes(2)
    expect(second).toHaveBeenLastCalledWith({ status: 'loading' })
  })
})

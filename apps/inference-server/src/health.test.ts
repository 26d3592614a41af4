import { describe, expect, test } from 'vitest'
import { HealthMonitor, type StateChange, StateTransitionError } from './health'

function monitor(threshold = 3, windowMs = 1000) {
  let clock = 0
  const health = new HealthMonitor({
    degradedThreshold: threshold,
    degradedWindowMs: windowMs,
    now: () => clock,
  })
  return {
    health,
    at(ms: number) {
      clock = ms
    },
  }
}

function readyMonitor(threshold = 3, windowMs = 1000) {
  const m = monitor(threshold, windowMs)
  m.health.beginLoading()
  m.health.markLoaded()
  return m
}

describe('HealthMonitor', () => {
  test('starts unloaded, live and not ready', () => {
    const { health } = monitor()

    expect(health.state).toBe('unloaded')
    expect(health.isLive()).toBe(true)
    expect(health.isReady()).toBe(false)
    expect(health.canServe()).toBe(false)
  })

  test('becomes ready after a successful load', () => {
    const { health } = readyMonitor()

    expect(health.state).toBe('ready')
    expect(health.isReady()).toBe(true)
    expect(health.canServe()).toBe(true)
  })

  test('a failed load is terminal and not live', () => {
    const { health } = monitor()
    health.beginLoading()
    health.markFailed('weights missing')

    expect(health.state).toBe('failed')
    expect(health.isLive()).toBe(false)
    expect(health.isReady()).toBe(false)
    expect(health.snapshot().failureReason).toBe('weights missing')
    expect(() => health.beginLoading()).toThrow(StateTransitionError)
  })

  test('rejects transitions outside the lifecycle', () => {
    const { health } = monitor()
    expect(() => health.markLoaded()).toThrow('Invalid model state transition: unloaded -> ready')
  })

  test('degrades after threshold failures and recovers on success', () => {
    const { health, at } = readyMonitor(3, 1000)

    at(10)
    health.recordFailure()
    at(20)
    health.recordFailure()
    expect(health.state).toBe('ready')

    at(30)
    health.recordFailure()
    expect(health.state).toBe('degraded')
    expect(health.isReady()).toBe(false)
    expect(health.canServe()).toBe(true)

    health.recordSuccess()
    expect(health.state).toBe('ready')
    expect(health.snapshot().consecutiveFailures).toBe(0)
  })

  test('a success resets the consecutive count', () => {
    const { health } = readyMonitor(3)

    health.recordFailure()
    health.recordFailure()
    health.recordSuccess()
    health.recordFailure()
    health.recordFailure()

    expect(health.state).toBe('ready')
    expect(health.snapshot().consecutiveFailures).toBe(2)
  })

  test('only failures inside the window count', () => {
    const { health, at } = readyMonitor(3, 1000)

    at(0)
    health.recordFailure()
    at(600)
    health.recordFailure()
    at(1200)
    health.recordFailure()
    expect(health.state).toBe('ready')
    expect(health.snapshot().consecutiveFailures).toBe(2)

    at(1300)
    health.recordFailure()
    expect(health.state).toBe('degraded')
  })

  test('keeps at most threshold failures under sustained errors', () => {
    const { health, at } = readyMonitor(3, 60_000)

    for (let i = 0; i < 10_000; i++) {
      at(i)
      health.recordFailure()
    }

    expect(health.state).toBe('degraded')
    expect(health.snapshot().consecutiveFailures).toBe(3)

    health.recordSuccess()
    expect(health.state).toBe('ready')
    expect(health.snapshot().consecutiveFailures).toBe(0)
  })

  test('ignores outcomes while no model is serving', () => {
    const { health } = monitor(1)
    health.recordFailure()
    health.recordSuccess()

    expect(health.state).toBe('unloaded')
    expect(health.snapshot().consecutiveFailures).toBe(0)
  })

  test('notifies listeners until unsubscribed', () => {
    const { health, at } = monitor()
    const changes: StateChange[] = []
    const unsubscribe = health.onTransition((change) => changes.push(change))

    at(5)
    health.beginLoading()
    unsubscribe()
    health.markLoaded()

    expect(changes).toEqual([
      { from: 'unloaded', to: 'loading', reason: 'load started', at: 5 },
    ])
    expect(health.snapshot().lastChange).toEqual({
      from: 'loading',
      to: 'ready',
      reason: 'load succeeded',
      at: 5,
    })
  })

  test('validates its options', () => {
    expect(() => new HealthMonitor({ degradedThreshold: 0, degradedWindowMs: 1000 })).toThrow(
      RangeError,
    )
    expect(() => new HealthMonitor({ degradedThreshold: 2, degradedWindowMs: 0 })).toThrow(
      RangeError,
    )
  })
})

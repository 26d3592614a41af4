/**
 * Health/Readiness State Machine
 *
 *   unloaded -> loading -> ready | failed
 *   ready <-> degraded
 *
 * `degraded` is entered once the consecutive prediction failures that fall
 * inside the sliding window reach the threshold, and left on the next
 * success. `failed` is terminal.
 */

import type { ModelState } from '@tensorgate/types'

const TRANSITIONS: Record<ModelState, readonly ModelState[]> = {
  unloaded: ['loading'],
  loading: ['ready', 'failed'],
  ready: ['degraded'],
  degraded: ['ready'],
  failed: [],
}

export class StateTransitionError extends Error {
  constructor(
    readonly from: ModelState,
    readonly to: ModelState,
  ) {
    super(`Invalid model state transition: ${from} -> ${to}`)
    this.name = 'StateTransitionError'
  }
}

export interface StateChange {
  from: ModelState
  to: ModelState
  reason: string
  at: number
}

export type StateListener = (change: StateChange) => void

export interface HealthMonitorOptions {
  /** Consecutive failures within the window that trip `degraded` */
  degradedThreshold: number
  /** Sliding window length for counting failures */
  degradedWindowMs: number
  now?: () => number
}

export interface HealthSnapshot {
  state: ModelState
  /** Recent failures inside the window, capped at the threshold */
  consecutiveFailures: number
  lastChange: StateChange | null
  failureReason: string | null
}

export class HealthMonitor {
  private current: ModelState = 'unloaded'
  private failureTimes: number[] = []
  private lastChange: StateChange | null = null
  private failureReason: string | null = null
  private readonly listeners = new Set<StateListener>()
  private readonly now: () => number

  constructor(private readonly options: HealthMonitorOptions) {
    if (!Number.isInteger(options.degradedThreshold) || options.degradedThreshold < 1) {
      throw new RangeError('degradedThreshold must be a positive integer')
    }
    if (!(options.degradedWindowMs > 0)) {
      throw new RangeError('degradedWindowMs must be positive')
    }
    this.now = options.now ?? Date.now
  }

  get state(): ModelState {
    return this.current
  }

  /** Liveness: healthy unless the model failed to load */
  isLive(): boolean {
    return this.current !== 'failed'
  }

  /** Readiness: only a fully healthy model takes new traffic */
  isReady(): boolean {
    return this.current === 'ready'
  }

  /** Whether requests that still arrive may reach the model */
  canServe(): boolean {
    return this.current === 'ready' || this.current === 'degraded'
  }

  snapshot(): HealthSnapshot {
    return {
      state: this.current,
      consecutiveFailures: this.failureTimes.length,
      lastChange: this.lastChange,
      failureReason: this.failureReason,
    }
  }

  onTransition(listener: StateListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  beginLoading(): void {
    this.transition('loading', 'load started')
  }

  markLoaded(): void {
    this.transition('ready', 'load succeeded')
  }

  markFailed(reason: string): void {
    this.failureReason = reason
    this.transition('failed', reason)
  }

  recordSuccess(): void {
    this.failureTimes = []
    if (this.current === 'degraded') {
      this.transition('ready', 'prediction succeeded')
    }
  }

  recordFailure(): void {
    if (!this.canServe()) return

    const { degradedThreshold, degradedWindowMs } = this.options
    const at = this.now()
    const windowStart = at - degradedWindowMs

    // Only the latest `degradedThreshold` failures can trip the threshold
    this.failureTimes.push(at)
    if (this.failureTimes.length > degradedThreshold) {
      this.failureTimes.shift()
    }
    while ((this.failureTimes[0] ?? at) <= windowStart) {
      this.failureTimes.shift()
    }

    if (
      this.current === 'ready' &&
      this.failureTimes.length >= degradedThreshold
    ) {
      this.transition(
        'degraded',
        `${this.failureTimes.length} consecutive prediction failures`,
      )
    }
  }

  private transition(to: ModelState, reason: string): void {
    const from = this.current
    if (!TRANSITIONS[from].includes(to)) {
      throw new StateTransitionError(from, to)
    }
    this.current = to
    const change: StateChange = { from, to, reason, at: this.now() }
    this.lastChange = change
    for (const listener of this.listeners) {
      listener(change)
    }
  }
}

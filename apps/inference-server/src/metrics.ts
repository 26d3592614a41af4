/**
 * Metrics Aggregator
 *
 * Counters, gauges and histograms keyed by fixed label sets, rendered in the
 * Prometheus text exposition format (0.0.4).
 *
 * Every update is a synchronous read-modify-write on the event loop, so no
 * update can interleave with another or with render().
 */

import {
  type ErrorKind,
  type ModelState,
  ModelStateSchema,
} from '@tensorgate/types'
import { DEFAULT_LATENCY_BUCKETS } from './config'
import type { PredictionFailure } from './errors'

export const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8'

type MetricType = 'counter' | 'gauge' | 'histogram'

export type Labels<L extends string> = Readonly<Record<L, string>>

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n')
}

function escapeHelp(help: string): string {
  return help.replace(/\\/g, '\\\\').replace(/\n/g, '\\n')
}

export function formatSampleValue(value: number): string {
  if (value === Number.POSITIVE_INFINITY) return '+Inf'
  if (value === Number.NEGATIVE_INFINITY) return '-Inf'
  if (Number.isNaN(value)) return 'NaN'
  return String(value)
}

function formatLabels(pairs: ReadonlyArray<readonly [string, string]>): string {
  if (pairs.length === 0) return ''
  const body = pairs.map(([k, v]) => `${k}="${escapeLabelValue(v)}"`).join(',')
  return `{${body}}`
}

abstract class Metric<L extends string, S> {
  private readonly series = new Map<string, { labels: Labels<L>; state: S }>()

  constructor(
    readonly name: string,
    readonly help: string,
    readonly labelNames: readonly L[],
  ) {}

  abstract readonly type: MetricType

  protected abstract initialState(): S

  protected abstract renderSeries(
    lines: string[],
    pairs: ReadonlyArray<readonly [string, string]>,
    state: S,
  ): void

  protected labelPairs(labels: Labels<L>): Array<readonly [string, string]> {
    return this.labelNames.map((label) => [label, labels[label]] as const)
  }

  private key(labels: Labels<L>): string {
    return this.labelNames.map((label) => labels[label]).join('\u0000')
  }

  protected stateFor(labels: Labels<L>): S {
    const key = this.key(labels)
    const existing = this.series.get(key)
    if (existing) return existing.state
    const state = this.initialState()
    this.series.set(key, { labels: { ...labels }, state })
    return state
  }

  protected peek(labels: Labels<L>): S | undefined {
    return this.series.get(this.key(labels))?.state
  }

  render(lines: string[]): void {
    lines.push(`# HELP ${this.name} ${escapeHelp(this.help)}`)
    lines.push(`# TYPE ${this.name} ${this.type}`)
    for (const { labels, state } of this.series.values()) {
      this.renderSeries(lines, this.labelPairs(labels), state)
    }
  }
}

interface Cell {
  value: number
}

export class Counter<L extends string = never> extends Metric<L, Cell> {
  readonly type = 'counter'

  protected initialState(): Cell {
    return { value: 0 }
  }

  inc(labels: Labels<L>, amount = 1): void {
    if (amount < 0 || !Number.isFinite(amount)) {
      throw new RangeError(`Counter ${this.name} can only increase`)
    }
    this.stateFor(labels).value += amount
  }

  get(labels: Labels<L>): number {
    return this.peek(labels)?.value ?? 0
  }

  protected renderSeries(
    lines: string[],
    pairs: ReadonlyArray<readonly [string, string]>,
    state: Cell,
  ): void {
    lines.push(`${this.name}${formatLabels(pairs)} ${formatSampleValue(state.value)}`)
  }
}

export class Gauge<L extends string = never> extends Metric<L, Cell> {
  readonly type = 'gauge'

  protected initialState(): Cell {
    return { value: 0 }
  }

  set(labels: Labels<L>, value: number): void {
    this.stateFor(labels).value = value
  }

  inc(labels: Labels<L>, amount = 1): void {
    this.stateFor(labels).value += amount
  }

  dec(labels: Labels<L>, amount = 1): void {
    this.stateFor(labels).value -= amount
  }

  get(labels: Labels<L>): number {
    return this.peek(labels)?.value ?? 0
  }

  protected renderSeries(
    lines: string[],
    pairs: ReadonlyArray<readonly [string, string]>,
    state: Cell,
  ): void {
    lines.push(`${this.name}${formatLabels(pairs)} ${formatSampleValue(state.value)}`)
  }
}

interface HistogramCell {
  /** Per-bucket (non-cumulative) counts, one per upper bound */
  buckets: number[]
  sum: number
  count: number
}

export interface HistogramSnapshot {
  /** Cumulative counts per upper bound, excluding +Inf */
  buckets: number[]
  sum: number
  count: number
}

export class Histogram<L extends string = never> extends Metric<
  L,
  HistogramCell
> {
  readonly type = 'histogram'
  readonly bounds: readonly number[]

  constructor(
    name: string,
    help: string,
    labelNames: readonly L[],
    bounds: readonly number[],
  ) {
    super(name, help, labelNames)
    this.bounds = Object.freeze([...bounds].sort((a, b) => a - b))
  }

  protected initialState(): HistogramCell {
    return { buckets: this.bounds.map(() => 0), sum: 0, count: 0 }
  }

  observe(labels: Labels<L>, value: number): void {
    const cell = this.stateFor(labels)
    const index = this.bounds.findIndex((bound) => value <= bound)
    if (index >= 0) {
      cell.buckets[index] = (cell.buckets[index] ?? 0) + 1
    }
    cell.sum += value
    cell.count += 1
  }

  snapshot(labels: Labels<L>): HistogramSnapshot {
    const cell = this.peek(labels)
    if (!cell) {
      return { buckets: this.bounds.map(() => 0), sum: 0, count: 0 }
    }
    let running = 0
    return {
      buckets: cell.buckets.map((n) => (running += n)),
      sum: cell.sum,
      count: cell.count,
    }
  }

  protected renderSeries(
    lines: string[],
    pairs: ReadonlyArray<readonly [string, string]>,
    state: HistogramCell,
  ): void {
    let running = 0
    this.bounds.forEach((bound, i) => {
      running += state.buckets[i] ?? 0
      const le = [...pairs, ['le', formatSampleValue(bound)] as const]
      lines.push(`${this.name}_bucket${formatLabels(le)} ${running}`)
    })
    const inf = [...pairs, ['le', '+Inf'] as const]
    lines.push(`${this.name}_bucket${formatLabels(inf)} ${state.count}`)
    lines.push(`${this.name}_sum${formatLabels(pairs)} ${formatSampleValue(state.sum)}`)
    lines.push(`${this.name}_count${formatLabels(pairs)} ${state.count}`)
  }
}

interface Renderable {
  readonly name: string
  render(lines: string[]): void
}

export class MetricsRegistry {
  private readonly metrics = new Map<string, Renderable>()

  private register<M extends Renderable>(metric: M): M {
    if (this.metrics.has(metric.name)) {
      throw new Error(`Metric ${metric.name} is already registered`)
    }
    this.metrics.set(metric.name, metric)
    return metric
  }

  counter<L extends string = never>(
    name: string,
    help: string,
    labelNames: readonly L[] = [],
  ): Counter<L> {
    return this.register(new Counter<L>(name, help, labelNames))
  }

  gauge<L extends string = never>(
    name: string,
    help: string,
    labelNames: readonly L[] = [],
  ): Gauge<L> {
    return this.register(new Gauge<L>(name, help, labelNames))
  }

  histogram<L extends string = never>(
    name: string,
    help: string,
    labelNames: readonly L[],
    bounds: readonly number[],
  ): Histogram<L> {
    return this.register(new Histogram<L>(name, help, labelNames, bounds))
  }

  /** Point-in-time snapshot of every registered metric */
  render(): string {
    const lines: string[] = []
    for (const metric of this.metrics.values()) {
      metric.render(lines)
    }
    return `${lines.join('\n')}\n`
  }
}

export type RequestOutcome =
  | { status: 'success' }
  | { status: 'error'; kind: ErrorKind; reason?: PredictionFailure }

export interface InferenceMetricsOptions {
  latencyBuckets?: readonly number[]
}

/**
 * Inference-specific metric set.
 *
 * - inference_requests_total{model,status}
 * - inference_errors_total{model,kind}
 * - inference_prediction_failures_total{model,reason}
 * - inference_request_duration_seconds{model}
 * - inference_active_requests
 * - model_loaded{model}
 * - model_state{model,state}
 */
export class InferenceMetrics {
  readonly registry = new MetricsRegistry()

  private readonly requests: Counter<'model' | 'status'>
  private readonly errors: Counter<'model' | 'kind'>
  private readonly predictionFailures: Counter<'model' | 'reason'>
  private readonly latency: Histogram<'model'>
  private readonly active: Gauge
  private readonly loaded: Gauge<'model'>
  private readonly state: Gauge<'model' | 'state'>

  constructor(options: InferenceMetricsOptions = {}) {
    this.requests = this.registry.counter(
      'inference_requests_total',
      'Total inference requests',
      ['model', 'status'],
    )
    this.errors = this.registry.counter(
      'inference_errors_total',
      'Failed inference requests by error kind',
      ['model', 'kind'],
    )
    this.predictionFailures = this.registry.counter(
      'inference_prediction_failures_total',
      'Failed predictions by runtime failure reason',
      ['model', 'reason'],
    )
    this.latency = this.registry.histogram(
      'inference_request_duration_seconds',
      'Inference latency in seconds',
      ['model'],
      options.latencyBuckets ?? DEFAULT_LATENCY_BUCKETS,
    )
    this.active = this.registry.gauge(
      'inference_active_requests',
      'Currently active inference requests',
    )
    this.loaded = this.registry.gauge(
      'model_loaded',
      'Whether model is loaded (1=yes 0=no)',
      ['model'],
    )
    this.state = this.registry.gauge(
      'model_state',
      'Current model lifecycle state (1 for the active state)',
      ['model', 'state'],
    )
  }

  /** Called exactly once per completed dispatch */
  record(model: string, outcome: RequestOutcome, durationSeconds: number): void {
    this.requests.inc({ model, status: outcome.status })
    if (outcome.status === 'error') {
      this.errors.inc({ model, kind: outcome.kind })
      if (outcome.reason) {
        this.predictionFailures.inc({ model, reason: outcome.reason })
      }
    }
    this.latency.observe({ model }, durationSeconds)
  }

  requestStarted(): void {
    this.active.inc({})
  }

  requestFinished(): void {
    this.active.dec({})
  }

  setModelLoaded(model: string, loaded: boolean): void {
    this.loaded.set({ model }, loaded ? 1 : 0)
  }

  setModelState(model: string, current: ModelState): void {
    for (const state of ModelStateSchema.options) {
      this.state.set({ model, state }, state === current ? 1 : 0)
    }
  }

  requestCount(model: string, status: RequestOutcome['status']): number {
    return this.requests.get({ model, status })
  }

  errorCount(model: string, kind: ErrorKind): number {
    return this.errors.get({ model, kind })
  }

  predictionFailureCount(model: string, reason: PredictionFailure): number {
    return this.predictionFailures.get({ model, reason })
  }

  activeRequests(): number {
    return this.active.get({})
  }

  latencySnapshot(model: string): HistogramSnapshot {
    return this.latency.snapshot({ model })
  }

  render(): string {
    return this.registry.render()
  }
}

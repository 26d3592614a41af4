#!/usr/bin/env tsx
/**
 * Load test: fire inference requests at a fixed rate and report latency.
 *
 * Usage: npm run load-test -- --url http://localhost:8080 --rps 200 --duration 60
 */

import { parseArgs } from 'node:util'
import { encodeRequest } from '../src/codec'

interface Sample {
  status: number
  durationMs: number
  ok: boolean
  error?: string
}

function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0
  const index = Math.min(sorted.length - 1, Math.floor(p * sorted.length))
  return sorted[index] ?? 0
}

async function sendRequest(url: string, model: string, seq: number): Promise<Sample> {
  const body = encodeRequest({
    id: `load-${seq}`,
    inputs: [
      { name: 'input', datatype: 'FP32', shape: [1, 4], data: [5.1, 3.5, 1.4, 0.2] },
    ],
  })
  const start = performance.now()
  try {
    const response = await fetch(`${url}/v2/models/${model}/infer`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
      signal: AbortSignal.timeout(5000),
    })
    await response.arrayBuffer()
    return {
      status: response.status,
      durationMs: performance.now() - start,
      ok: response.status === 200,
    }
  } catch (error) {
    return {
      status: 0,
      durationMs: performance.now() - start,
      ok: false,
      error: error instanceof Error ? error.message : String(error),
    }
  }
}

async function runLoadTest(
  url: string,
  model: string,
  rps: number,
  durationSec: number,
): Promise<Sample[]> {
  const intervalMs = 1000 / rps
  const endAt = Date.now() + durationSec * 1000
  const pending: Array<Promise<Sample>> = []

  console.log('\nLoad test started')
  console.log(`   Target: ${url} (model ${model})`)
  console.log(`   Rate: ${rps} req/s for ${durationSec}s\n`)

  let seq = 0
  while (Date.now() < endAt) {
    pending.push(sendRequest(url, model, seq++))
    await new Promise((resolve) => setTimeout(resolve, intervalMs))
  }
  return Promise.all(pending)
}

function report(samples: Sample[]): void {
  const total = samples.length
  const success = samples.filter((s) => s.ok).length
  const latencies = samples
    .filter((s) => s.ok)
    .map((s) => s.durationMs)
    .sort((a, b) => a - b)

  console.log('='.repeat(50))
  console.log(`  Total requests:  ${total}`)
  console.log(
    `  Successes:       ${success} (${total > 0 ? ((100 * success) / total).toFixed(1) : '0.0'}%)`,
  )
  console.log(`  Failures:        ${total - success}`)
  if (latencies.length > 0) {
    console.log(`  Latency p50:     ${percentile(latencies, 0.5).toFixed(1)}ms`)
    console.log(`  Latency p95:     ${percentile(latencies, 0.95).toFixed(1)}ms`)
    console.log(`  Latency p99:     ${percentile(latencies, 0.99).toFixed(1)}ms`)
    console.log(`  Max latency:     ${(latencies[latencies.length - 1] ?? 0).toFixed(1)}ms`)
  }
  const errors = new Map<string, number>()
  for (const sample of samples) {
    if (sample.error) errors.set(sample.error, (errors.get(sample.error) ?? 0) + 1)
  }
  for (const [message, count] of errors) {
    console.log(`  Error x${count}: ${message}`)
  }
  console.log('='.repeat(50))
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    args: process.argv.slice(2),
    options: {
      url: { type: 'string', default: 'http://localhost:8080' },
      model: { type: 'string', default: 'iris-classifier' },
      rps: { type: 'string', default: '50' },
      duration: { type: 'string', default: '60' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  })

  if (values.help) {
    console.log(`
Inference load test

Usage: npm run load-test -- [options]

Options:
  --url <url>        Server base URL (default: http://localhost:8080)
  --model <name>     Model name (default: iris-classifier)
  --rps <n>          Requests per second (default: 50)
  --duration <sec>   Test duration in seconds (default: 60)
  -h, --help         Show this help
`)
    return
  }

  const rps = Number(values.rps)
  const duration = Number(values.duration)
  if (!(rps > 0) || !(duration > 0)) {
    throw new Error('--rps and --duration must be positive numbers')
  }

  const url = values.url ?? 'http://localhost:8080'
  const model = values.model ?? 'iris-classifier'
  report(await runLoadTest(url, model, rps, duration))
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error)
  process.exit(1)
})

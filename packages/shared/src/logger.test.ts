import { describe, expect, test } from 'vitest'
import { z } from 'zod'
import { createLogger } from './logger'

const EntrySchema = z.object({
  level: z.string(),
  service: z.string(),
  msg: z.string(),
  timestamp: z.string(),
  inputs: z.number().optional(),
})

function parseEntry(line: string | undefined) {
  return EntrySchema.parse(JSON.parse(line ?? '{}'))
}

function captureLines(): { lines: string[]; write: (msg: string) => void } {
  const lines: string[] = []
  return { lines, write: (msg: string) => void lines.push(msg) }
}

describe('createLogger', () => {
  test('writes JSON entries tagged with the service name', () => {
    const sink = captureLines()
    const logger = createLogger('codec', { level: 'info', destination: sink })

    logger.info('decoded request', { inputs: 2 })

    expect(sink.lines).toHaveLength(1)
    const entry = parseEntry(sink.lines[0])
    expect(entry.level).toBe('info')
    expect(entry.service).toBe('codec')
    expect(entry.msg).toBe('decoded request')
    expect(entry.inputs).toBe(2)
    expect(Number.isNaN(Date.parse(entry.timestamp))).toBe(false)
  })

  test('drops entries below the configured level', () => {
    const sink = captureLines()
    const logger = createLogger('codec', { level: 'warn', destination: sink })

    logger.debug('noise')
    logger.info('still noise')
    logger.warn('kept')

    expect(sink.lines).toHaveLength(1)
    expect(parseEntry(sink.lines[0]).msg).toBe('kept')
  })

  test('silent loggers write nothing', () => {
    const sink = captureLines()
    const logger = createLogger('codec', { silent: true, destination: sink })

    logger.error('boom')

    expect(sink.lines).toHaveLength(0)
  })
})

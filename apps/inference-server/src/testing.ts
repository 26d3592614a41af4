/**
 * Test doubles shared by the dispatcher and server tests.
 */

import { createLogger, type Logger } from '@tensorgate/shared'
import type { ModelDescriptor, Tensor } from '@tensorgate/types'
import type { ModelRuntime } from './runtime/model-runtime'

export interface StubRuntimeOptions {
  name?: string
  load?: () => Promise<void>
  warmUp?: () => Promise<void>
  predict?: (inputs: readonly Tensor[]) => Promise<Tensor[]>
}

/**
 * Runtime accepting one FP32 input `input` of shape [1,4]; by default it
 * returns the sum of the inputs as `output`.
 */
export class StubRuntime implements ModelRuntime {
  predictCalls = 0

  constructor(private readonly options: StubRuntimeOptions = {}) {}

  describe(): ModelDescriptor {
    return {
      name: this.options.name ?? 'stub-model',
      versions: ['v1'],
      platform: 'test',
      inputs: [{ name: 'input', datatype: 'FP32', shape: [1, 4] }],
      outputs: [{ name: 'output', datatype: 'FP32', shape: [1, 1] }],
    }
  }

  async load(): Promise<void> {
    await this.options.load?.()
  }

  async warmUp(): Promise<void> {
    await this.options.warmUp?.()
  }

  async predict(inputs: readonly Tensor[]): Promise<Tensor[]> {
    this.predictCalls += 1
    if (this.options.predict) return this.options.predict(inputs)

    const input = inputs[0]
    const sum =
      input?.datatype === 'FP32'
        ? input.data.reduce((acc, value) => acc + value, 0)
        : 0
    return [{ name: 'output', datatype: 'FP32', shape: [1, 1], data: [sum] }]
  }
}

export function silentLogger(): Logger {
  return createLogger('test', { silent: true })
}

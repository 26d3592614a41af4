/**
 * Iris classifier
 *
 * Placeholder model: a linear layer followed by softmax over the three iris
 * species. Weights come from a JSON artifact read at load time.
 */

import { readFile } from 'node:fs/promises'
import { formatZodError } from '@tensorgate/shared'
import type {
  BytesTensor,
  ModelDescriptor,
  NumericTensor,
  Tensor,
} from '@tensorgate/types'
import { z } from 'zod'
import { PredictionError, errorMessage } from '../errors'
import type { ModelRuntime } from './model-runtime'

const FEATURES = 4
const CLASS_COUNT = 3

const WeightsFileSchema = z.object({
  classes: z.array(z.string().min(1)).length(CLASS_COUNT),
  weights: z
    .array(z.array(z.number().finite()).length(CLASS_COUNT))
    .length(FEATURES),
  bias: z.array(z.number().finite()).length(CLASS_COUNT),
})
type WeightsFile = z.infer<typeof WeightsFileSchema>

interface LoadedWeights {
  readonly classes: readonly string[]
  readonly weights: readonly (readonly number[])[]
  readonly bias: readonly number[]
}

/** Row used by warmUp; a typical versicolor measurement */
const WARMUP_ROW = [5.8, 3.0, 4.3, 1.3]

export interface IrisClassifierOptions {
  weightsPath: string
}

function freezeWeights(file: WeightsFile): LoadedWeights {
  return Object.freeze({
    classes: Object.freeze([...file.classes]),
    weights: Object.freeze(file.weights.map((row) => Object.freeze([...row]))),
    bias: Object.freeze([...file.bias]),
  })
}

function softmax(logits: readonly number[]): number[] {
  const max = Math.max(...logits)
  const exp = logits.map((value) => Math.exp(value - max))
  const sum = exp.reduce((acc, value) => acc + value, 0)
  return exp.map((value) => value / sum)
}

export class IrisClassifier implements ModelRuntime {
  static readonly MODEL_NAME = 'iris-classifier'
  static readonly MODEL_VERSION = 'v1.0.0'

  private loaded: LoadedWeights | null = null

  constructor(private readonly options: IrisClassifierOptions) {}

  describe(): ModelDescriptor {
    return {
      name: IrisClassifier.MODEL_NAME,
      versions: [IrisClassifier.MODEL_VERSION],
      platform: 'node',
      inputs: [{ name: 'input', datatype: 'FP32', shape: [-1, FEATURES] }],
      outputs: [
        { name: 'probabilities', datatype: 'FP32', shape: [-1, CLASS_COUNT] },
        { name: 'predicted_class', datatype: 'BYTES', shape: [-1] },
      ],
    }
  }

  async load(): Promise<void> {
    if (this.loaded) return

    let raw: string
    try {
      raw = await readFile(this.options.weightsPath, 'utf-8')
    } catch (error) {
      throw new Error(
        `Cannot read weights from ${this.options.weightsPath}: ${errorMessage(error)}`,
      )
    }

    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch (error) {
      throw new Error(
        `Invalid weights file ${this.options.weightsPath}: ${errorMessage(error)}`,
      )
    }

    const parsed = WeightsFileSchema.safeParse(json)
    if (!parsed.success) {
      throw new Error(
        `Invalid weights file ${this.options.weightsPath}: ${formatZodError(parsed.error)}`,
      )
    }
    this.loaded = freezeWeights(parsed.data)
  }

  async warmUp(): Promise<void> {
    const outputs = await this.predict([
      {
        name: 'input',
        datatype: 'FP32',
        shape: [1, FEATURES],
        data: WARMUP_ROW,
      },
    ])
    const probabilities = outputs.find((o) => o.name === 'probabilities')
    if (!probabilities || probabilities.data.length !== CLASS_COUNT) {
      throw new Error('Warm-up prediction returned no probabilities')
    }
  }

  async predict(inputs: readonly Tensor[]): Promise<Tensor[]> {
    const model = this.loaded
    if (!model) {
      throw new PredictionError('not_loaded', 'Model weights are not loaded')
    }

    const input = inputs.find((tensor) => tensor.name === 'input')
    if (!input || input.datatype !== 'FP32') {
      throw new PredictionError('runtime', "Expected FP32 input named 'input'")
    }

    const rows = input.shape[0] ?? 0
    const probabilities: number[] = []
    const predicted: string[] = []

    for (let row = 0; row < rows; row++) {
      const features = input.data.slice(row * FEATURES, (row + 1) * FEATURES)
      if (features.some((value) => !Number.isFinite(value) || value < 0)) {
        throw new PredictionError(
          'out_of_range',
          `Row ${row} has a negative or non-finite measurement`,
        )
      }

      const logits = model.bias.map((bias, cls) =>
        features.reduce(
          (acc, value, f) => acc + value * (model.weights[f]?.[cls] ?? 0),
          bias,
        ),
      )
      if (logits.some((value) => !Number.isFinite(value))) {
        throw new PredictionError('numerical', `Row ${row} produced non-finite logits`)
      }

      const probs = softmax(logits)
      let best = 0
      probs.forEach((p, cls) => {
        if (p > (probs[best] ?? 0)) best = cls
      })

      probabilities.push(...probs.map((p) => Math.fround(p)))
      predicted.push(model.classes[best] ?? '')
    }

    const probabilityTensor: NumericTensor = Object.freeze({
      name: 'probabilities',
      datatype: 'FP32',
      shape: Object.freeze([rows, CLASS_COUNT]),
      data: Object.freeze(probabilities),
    })

    const classTensor: BytesTensor = Object.freeze({
      name: 'predicted_class',
      datatype: 'BYTES',
      shape: Object.freeze([rows]),
      data: Object.freeze(predicted),
    })

    return [probabilityTensor, classTensor]
  }
}

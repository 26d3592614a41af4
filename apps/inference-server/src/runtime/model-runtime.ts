/**
 * Model Runtime Interface
 *
 * The seam for swapping the served model. The rest of the server only ever
 * talks to this interface.
 */

import type { ModelDescriptor, Tensor } from '@tensorgate/types'

export interface ModelRuntime {
  /** Prepare backing resources. Called once at startup; later calls are no-ops */
  load(): Promise<void>
  /** Exercise the loaded model once before it receives traffic */
  warmUp(): Promise<void>
  /**
   * Run one prediction. Must be safe to call concurrently and only read
   * state fixed by `load()`. Failures are thrown as PredictionError.
   */
  predict(inputs: readonly Tensor[]): Promise<Tensor[]>
  /** Static contract; available before `load()` */
  describe(): ModelDescriptor
}

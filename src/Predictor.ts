/**
 * Predictor: a serializable scalar function of a real vector that can lower
 * itself into a model graph.
 *
 * @since 0.1.0
 */

import type { Effect } from "effect"
import type { CoordinateList } from "./Coordinate.js"
import type { DimensionMismatchError, GraphError } from "./Errors.js"
import type { Model } from "./Model.js"
import type { Serializable } from "./Serializable.js"

/**
 * @since 0.1.0
 * @category Models
 */
export interface Predictor extends Serializable {
  readonly dimension: number

  predict(input: ReadonlyArray<number>): number

  /**
   * Append nodes computing `predict` over the values at `inputs` to `model`,
   * returning the coordinates of the result.
   */
  addToModel(
    model: Model,
    inputs: CoordinateList,
  ): Effect.Effect<CoordinateList, GraphError | DimensionMismatchError>
}

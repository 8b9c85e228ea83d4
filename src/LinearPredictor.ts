/**
 * Linear predictor: `w · x + b`.
 *
 * @since 0.1.0
 */

import { Effect, Equal, Hash } from "effect"
import type { CoordinateList } from "./Coordinate.js"
import type { Deserializer } from "./Deserializer.js"
import {
  DimensionMismatchError,
  type DeserializationError,
  type GraphError,
  type SerializationError,
} from "./Errors.js"
import type { Model } from "./Model.js"
import { CoordinatewiseNode, SumNode } from "./Nodes.js"
import type { Predictor } from "./Predictor.js"
import { makeKind, type SerializableKind } from "./Serializable.js"
import type { Serializer } from "./Serializer.js"

const formatNumbers = (values: ReadonlyArray<number>): string => `[${values.join(", ")}]`

/**
 * @since 0.1.0
 * @category Predictors
 * @example
 * ```typescript
 * const predictor = new LinearPredictor([2, -1], 0.5)
 * predictor.predict([1, 1]) // 1.5
 * ```
 */
export class LinearPredictor implements Predictor, Equal.Equal {
  static readonly typeName = "LinearPredictor"
  static readonly kind: SerializableKind<LinearPredictor> = makeKind(
    LinearPredictor.typeName,
    LinearPredictor,
    (predictor) => predictor.copy(),
    (predictor) => predictor.toString(),
  )

  /**
   * Predictor of `dimension` zero weights and a zero bias.
   */
  static zeros(dimension: number): LinearPredictor {
    return new LinearPredictor(Array.from({ length: dimension }, () => 0), 0)
  }

  #weights: ReadonlyArray<number>
  #bias: number

  constructor(weights: ReadonlyArray<number> = [], bias = 0) {
    this.#weights = [...weights]
    this.#bias = bias
  }

  get runtimeTypeName(): string {
    return LinearPredictor.typeName
  }

  get weights(): ReadonlyArray<number> {
    return this.#weights
  }

  get bias(): number {
    return this.#bias
  }

  get dimension(): number {
    return this.#weights.length
  }

  /**
   * Zero every weight and the bias, keeping the dimension.
   */
  reset(): void {
    this.#weights = this.#weights.map(() => 0)
    this.#bias = 0
  }

  /**
   * `w · x + b` over the common prefix of `w` and `input`; missing entries on
   * either side count as zero.
   */
  predict(input: ReadonlyArray<number>): number {
    let total = this.#bias
    const shared = Math.min(this.#weights.length, input.length)
    for (let i = 0; i < shared; i++) {
      total += (this.#weights[i] ?? 0) * (input[i] ?? 0)
    }
    return total
  }

  /**
   * `input[i] * w[i]` for every weight, without the bias. Entries missing
   * from `input` contribute zero.
   */
  getWeightedElements(input: ReadonlyArray<number>): ReadonlyArray<number> {
    return this.#weights.map((weight, i) => {
      const value = input[i]
      return value === undefined ? 0 : value * weight
    })
  }

  /**
   * Multiply every weight and the bias by `factor`.
   */
  scale(factor: number): void {
    this.#weights = this.#weights.map((weight) => weight * factor)
    this.#bias *= factor
  }

  /**
   * Lower into a multiply, a sum and an add-bias node, appended in that order.
   */
  addToModel(
    model: Model,
    inputs: CoordinateList,
  ): Effect.Effect<CoordinateList, GraphError | DimensionMismatchError> {
    return Effect.gen(this, function* () {
      if (inputs.length !== this.dimension) {
        return yield* Effect.fail(
          new DimensionMismatchError({ expected: this.dimension, actual: inputs.length }),
        )
      }
      const weighted = yield* model.addNode(
        new CoordinatewiseNode({ operation: "multiply", values: this.#weights, inputs }),
      )
      const sum = yield* model.addNode(new SumNode(weighted.outputs))
      const biased = yield* model.addNode(
        new CoordinatewiseNode({ operation: "add", values: [this.#bias], inputs: sum.outputs }),
      )
      return biased.outputs
    })
  }

  copy(): LinearPredictor {
    return new LinearPredictor(this.#weights, this.#bias)
  }

  toString(): string {
    return `LinearPredictor(weights=${formatNumbers(this.#weights)}, bias=${this.#bias})`
  }

  serialize(serializer: Serializer): Effect.Effect<void, SerializationError> {
    return Effect.gen(this, function* () {
      yield* serializer.writeDoubles("weights", this.#weights)
      yield* serializer.writeDouble("bias", this.#bias)
    })
  }

  deserialize(deserializer: Deserializer): Effect.Effect<void, DeserializationError> {
    return Effect.gen(this, function* () {
      this.#weights = yield* deserializer.readDoubles("weights")
      this.#bias = yield* deserializer.readDouble("bias")
    })
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return (
      that instanceof LinearPredictor &&
      this.#bias === that.#bias &&
      this.#weights.length === that.#weights.length &&
      this.#weights.every((weight, i) => weight === that.#weights[i])
    )
  }

  [Hash.symbol](): number {
    return Hash.combine(Hash.number(this.#bias))(Hash.number(this.dimension))
  }
}

/**
 * A node evaluating an embedded {@link LinearPredictor} as a single opaque
 * step, for graphs that keep the predictor whole instead of lowering it.
 *
 * @since 0.1.0
 */

import { Effect, Option } from "effect"
import type { CoordinateList } from "./Coordinate.js"
import type { Deserializer } from "./Deserializer.js"
import type { DeserializationError, SerializationError } from "./Errors.js"
import { LinearPredictor } from "./LinearPredictor.js"
import { Node } from "./Node.js"
import { makeKind, type SerializableKind } from "./Serializable.js"
import type { Serializer } from "./Serializer.js"

/**
 * @since 0.1.0
 * @category Nodes
 */
export class LinearPredictorNode extends Node {
  static readonly typeName = "LinearPredictorNode"
  static readonly kind: SerializableKind<LinearPredictorNode> = makeKind(
    LinearPredictorNode.typeName,
    LinearPredictorNode,
    (node) => node.copy(),
  )

  #predictor: LinearPredictor

  constructor(
    options: { readonly predictor: LinearPredictor; readonly inputs: CoordinateList } = {
      predictor: new LinearPredictor(),
      inputs: [],
    },
  ) {
    super(options.inputs)
    this.#predictor = options.predictor.copy()
  }

  override get runtimeTypeName(): string {
    return LinearPredictorNode.typeName
  }

  get predictor(): LinearPredictor {
    return this.#predictor
  }

  override get outputSize(): number {
    return 1
  }

  override validate(): Option.Option<string> {
    return this.inputs.length === this.#predictor.dimension
      ? Option.none()
      : Option.some(
          `LinearPredictorNode of dimension ${this.#predictor.dimension} has ${this.inputs.length} inputs`,
        )
  }

  override compute(values: ReadonlyArray<number>): ReadonlyArray<number> {
    return [this.#predictor.predict(values)]
  }

  override copy(): LinearPredictorNode {
    return new LinearPredictorNode({ predictor: this.#predictor, inputs: this.inputs })
  }

  protected override writeProperties(serializer: Serializer): Effect.Effect<void, SerializationError> {
    return serializer.writeObject("predictor", this.#predictor)
  }

  protected override readProperties(deserializer: Deserializer): Effect.Effect<void, DeserializationError> {
    return Effect.map(deserializer.readObjectOf("predictor", LinearPredictor.kind), (predictor) => {
      this.#predictor = predictor
    })
  }
}

import { Effect, Schema } from "effect"
import type { CoordinateList } from "../src/Coordinate.js"
import type { Deserializer } from "../src/Deserializer.js"
import type { DeserializationError, SerializationError } from "../src/Errors.js"
import { LinearPredictor } from "../src/LinearPredictor.js"
import { Model, type NodeHandle } from "../src/Model.js"
import { InputNode } from "../src/Nodes.js"
import { makeKind, type Serializable, type SerializableKind } from "../src/Serializable.js"
import type { Serializer } from "../src/Serializer.js"
import { NodeId } from "../src/Types.js"
import { Variant, primitiveType } from "../src/Variant.js"

export const decodeNodeId = Schema.decodeSync(NodeId)

/**
 * Inline descriptor the library does not know about.
 */
export const FloatType = primitiveType("float", Schema.Number)

/**
 * Predictor used by the worked scenarios: `2 * x0 - x1 + 0.5`.
 */
export const makeScenarioPredictor = (): LinearPredictor => new LinearPredictor([2, -1], 0.5)

export interface LoweredModel {
  readonly model: Model
  readonly input: NodeHandle<InputNode>
  readonly outputs: CoordinateList
}

/**
 * A model holding one input node of size 2, with the scenario predictor
 * lowered onto its ports.
 */
export const makeLoweredModel = Effect.gen(function* () {
  const model = new Model()
  const input = yield* model.addNode(new InputNode(2))
  const outputs = yield* makeScenarioPredictor().addToModel(model, input.outputs)
  const lowered: LoweredModel = { model, input, outputs }
  return lowered
})

/**
 * Serializable kind defined outside the library, holding a label and an
 * arbitrary variant payload.
 */
export class Tagged implements Serializable {
  static readonly typeName = "Tagged"
  static readonly kind: SerializableKind<Tagged> = makeKind(Tagged.typeName, Tagged, (tagged) =>
    new Tagged(tagged.label, tagged.payload.clone()),
  )

  constructor(
    public label = "",
    public payload: Variant = Variant.empty(),
  ) {}

  get runtimeTypeName(): string {
    return Tagged.typeName
  }

  serialize(serializer: Serializer): Effect.Effect<void, SerializationError> {
    return Effect.gen(this, function* () {
      yield* serializer.writeString("label", this.label)
      yield* serializer.writeVariant("payload", this.payload)
    })
  }

  deserialize(deserializer: Deserializer): Effect.Effect<void, DeserializationError> {
    return Effect.gen(this, function* () {
      this.label = yield* deserializer.readString("label")
      this.payload = yield* deserializer.readVariant("payload")
    })
  }
}

/**
 * Primitive node kinds the graph engine understands. Predictors lower
 * themselves into these.
 *
 * @since 0.1.0
 */

import { Effect, Either, Option, Schema } from "effect"
import type { CoordinateList } from "./Coordinate.js"
import type { Deserializer } from "./Deserializer.js"
import { MalformedStreamError, type DeserializationError, type SerializationError } from "./Errors.js"
import { Node } from "./Node.js"
import { makeKind, type SerializableKind } from "./Serializable.js"
import type { Serializer } from "./Serializer.js"

/**
 * Graph entry point. Its `size` ports carry values fed from outside the
 * model.
 *
 * @since 0.1.0
 * @category Nodes
 */
export class InputNode extends Node {
  static readonly typeName = "InputNode"
  static readonly kind: SerializableKind<InputNode> = makeKind(InputNode.typeName, InputNode, (node) =>
    node.copy(),
  )

  #size: number

  constructor(size = 0) {
    super([])
    this.#size = size
  }

  override get runtimeTypeName(): string {
    return InputNode.typeName
  }

  get size(): number {
    return this.#size
  }

  override get outputSize(): number {
    return this.#size
  }

  override validate(): Option.Option<string> {
    if (!Number.isSafeInteger(this.#size) || this.#size < 0) {
      return Option.some(`InputNode size must be a non-negative integer, got ${this.#size}`)
    }
    return this.inputs.length === 0
      ? Option.none()
      : Option.some("InputNode cannot have input coordinates")
  }

  override compute(values: ReadonlyArray<number>): ReadonlyArray<number> {
    return values
  }

  override copy(): InputNode {
    return new InputNode(this.#size)
  }

  protected override writeProperties(serializer: Serializer): Effect.Effect<void, SerializationError> {
    return serializer.writeInt("size", this.#size)
  }

  protected override readProperties(deserializer: Deserializer): Effect.Effect<void, DeserializationError> {
    return Effect.map(deserializer.readInt("size"), (size) => {
      this.#size = size
    })
  }
}

/**
 * Elementwise operation applied by a {@link CoordinatewiseNode}.
 *
 * @since 0.1.0
 * @category Nodes
 */
export const CoordinatewiseOperation = Schema.Literal("add", "multiply")

/**
 * @since 0.1.0
 * @category Nodes
 */
export type CoordinatewiseOperation = typeof CoordinatewiseOperation.Type

const decodeOperation = Schema.decodeUnknownEither(CoordinatewiseOperation)

const apply = (operation: CoordinatewiseOperation, left: number, right: number): number =>
  operation === "add" ? left + right : left * right

/**
 * Applies `input[i] (+|*) values[i]` to each input coordinate; one output
 * port per input.
 *
 * @since 0.1.0
 * @category Nodes
 * @example
 * ```typescript
 * const scaled = new CoordinatewiseNode({ operation: "multiply", values: [2, -1], inputs })
 * ```
 */
export class CoordinatewiseNode extends Node {
  static readonly typeName = "CoordinatewiseNode"
  static readonly kind: SerializableKind<CoordinatewiseNode> = makeKind(
    CoordinatewiseNode.typeName,
    CoordinatewiseNode,
    (node) => node.copy(),
  )

  #operation: CoordinatewiseOperation
  #values: ReadonlyArray<number>

  constructor(
    options: {
      readonly operation: CoordinatewiseOperation
      readonly values: ReadonlyArray<number>
      readonly inputs: CoordinateList
    } = { operation: "add", values: [], inputs: [] },
  ) {
    super(options.inputs)
    this.#operation = options.operation
    this.#values = [...options.values]
  }

  override get runtimeTypeName(): string {
    return CoordinatewiseNode.typeName
  }

  get operation(): CoordinatewiseOperation {
    return this.#operation
  }

  get values(): ReadonlyArray<number> {
    return this.#values
  }

  override get outputSize(): number {
    return this.inputs.length
  }

  override validate(): Option.Option<string> {
    return this.#values.length === this.inputs.length
      ? Option.none()
      : Option.some(
          `CoordinatewiseNode has ${this.#values.length} values for ${this.inputs.length} inputs`,
        )
  }

  override compute(values: ReadonlyArray<number>): ReadonlyArray<number> {
    return values.map((value, index) => apply(this.#operation, value, this.#values[index] ?? 0))
  }

  override copy(): CoordinatewiseNode {
    return new CoordinatewiseNode({ operation: this.#operation, values: this.#values, inputs: this.inputs })
  }

  protected override writeProperties(serializer: Serializer): Effect.Effect<void, SerializationError> {
    return Effect.gen(this, function* () {
      yield* serializer.writeString("operation", this.#operation)
      yield* serializer.writeDoubles("values", this.#values)
    })
  }

  protected override readProperties(deserializer: Deserializer): Effect.Effect<void, DeserializationError> {
    return Effect.gen(this, function* () {
      const operation = yield* deserializer.readString("operation")
      this.#operation = yield* Either.mapLeft(
        decodeOperation(operation),
        () => new MalformedStreamError({ reason: `unknown coordinatewise operation "${operation}"` }),
      )
      this.#values = yield* deserializer.readDoubles("values")
    })
  }
}

/**
 * Sums all of its inputs into a single port.
 *
 * @since 0.1.0
 * @category Nodes
 */
export class SumNode extends Node {
  static readonly typeName = "SumNode"
  static readonly kind: SerializableKind<SumNode> = makeKind(SumNode.typeName, SumNode, (node) => node.copy())

  constructor(inputs: CoordinateList = []) {
    super(inputs)
  }

  override get runtimeTypeName(): string {
    return SumNode.typeName
  }

  override get outputSize(): number {
    return 1
  }

  override compute(values: ReadonlyArray<number>): ReadonlyArray<number> {
    return [values.reduce((total, value) => total + value, 0)]
  }

  override copy(): SumNode {
    return new SumNode(this.inputs)
  }

  protected override writeProperties(): Effect.Effect<void, SerializationError> {
    return Effect.void
  }

  protected override readProperties(): Effect.Effect<void, DeserializationError> {
    return Effect.void
  }
}

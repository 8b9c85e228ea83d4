/**
 * Node: the serializable unit of computation in a model graph.
 *
 * A node consumes an ordered list of coordinates and exposes `outputSize`
 * scalar ports. Concrete kinds describe their extra state through
 * `writeProperties` / `readProperties`; the input wiring is written by this
 * base class, ahead of those properties.
 *
 * @since 0.1.0
 */

import { Effect, Option } from "effect"
import { fromColumns, toColumns, type CoordinateList } from "./Coordinate.js"
import type { Deserializer } from "./Deserializer.js"
import type { DeserializationError, SerializationError } from "./Errors.js"
import type { Serializable } from "./Serializable.js"
import type { Serializer } from "./Serializer.js"

/**
 * @since 0.1.0
 * @category Models
 */
export abstract class Node implements Serializable {
  #inputs: CoordinateList

  protected constructor(inputs: CoordinateList) {
    this.#inputs = [...inputs]
  }

  abstract get runtimeTypeName(): string

  /**
   * Number of scalar output ports.
   */
  abstract get outputSize(): number

  get inputs(): CoordinateList {
    return this.#inputs
  }

  /**
   * Reference semantics of the node: output port values given the values at
   * its input coordinates (or, for input nodes, the values fed to it).
   */
  abstract compute(values: ReadonlyArray<number>): ReadonlyArray<number>

  abstract copy(): Node

  /**
   * Describe why the node cannot join a model, if it cannot.
   */
  validate(): Option.Option<string> {
    return Option.none()
  }

  serialize(serializer: Serializer): Effect.Effect<void, SerializationError> {
    return Effect.gen(this, function* () {
      const { nodes, ports } = toColumns(this.#inputs)
      yield* serializer.writeInts("inputNodes", nodes)
      yield* serializer.writeInts("inputPorts", ports)
      yield* this.writeProperties(serializer)
    })
  }

  deserialize(deserializer: Deserializer): Effect.Effect<void, DeserializationError> {
    return Effect.gen(this, function* () {
      const nodes = yield* deserializer.readInts("inputNodes")
      const ports = yield* deserializer.readInts("inputPorts")
      this.#inputs = yield* fromColumns(nodes, ports)
      yield* this.readProperties(deserializer)
    })
  }

  protected abstract writeProperties(serializer: Serializer): Effect.Effect<void, SerializationError>

  protected abstract readProperties(deserializer: Deserializer): Effect.Effect<void, DeserializationError>
}

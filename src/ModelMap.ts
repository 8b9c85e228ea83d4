/**
 * ModelMap: a model together with the names callers use for its inputs and
 * outputs.
 *
 * @since 0.1.0
 */

import { Effect, Either, Option, Schema } from "effect"
import { fromColumns, toColumns, type CoordinateList } from "./Coordinate.js"
import type { Deserializer } from "./Deserializer.js"
import {
  GraphConstructionError,
  MalformedStreamError,
  UnknownOutputError,
  type DeserializationError,
  type EvaluationError,
  type GraphError,
  type SerializationError,
} from "./Errors.js"
import { evaluate } from "./Evaluation.js"
import { Model } from "./Model.js"
import { InputNode } from "./Nodes.js"
import { makeKind, type Serializable, type SerializableKind } from "./Serializable.js"
import type { Serializer } from "./Serializer.js"
import { NodeId } from "./Types.js"

const decodeNodeIds = Schema.decodeUnknownEither(Schema.Array(NodeId))

interface Binding {
  readonly inputs: ReadonlyArray<readonly [string, NodeId]>
  readonly outputs: ReadonlyArray<readonly [string, CoordinateList]>
}

const validateBinding = (model: Model, binding: Binding): Either.Either<Binding, GraphError> =>
  Either.gen(function* () {
    for (const [name, id] of binding.inputs) {
      const node = model.getNode(id)
      if (!Option.exists(node, (node) => node instanceof InputNode)) {
        return yield* Either.left(
          new GraphConstructionError({ reason: `map input "${name}" does not name an input node` }),
        )
      }
    }
    for (const [, coordinates] of binding.outputs) {
      for (const coordinate of coordinates) {
        yield* model.resolve(coordinate)
      }
    }
    return binding
  })

// Split a flat coordinate column back into one list per output.
const splitBySizes = (
  coordinates: CoordinateList,
  sizes: ReadonlyArray<number>,
): Either.Either<ReadonlyArray<CoordinateList>, MalformedStreamError> => {
  const total = sizes.reduce((sum, size) => sum + size, 0)
  if (total !== coordinates.length || sizes.some((size) => size < 0)) {
    return Either.left(
      new MalformedStreamError({
        reason: `output sizes add up to ${total} but ${coordinates.length} coordinates were written`,
      }),
    )
  }
  const lists: Array<CoordinateList> = []
  let offset = 0
  for (const size of sizes) {
    lists.push(coordinates.slice(offset, offset + size))
    offset += size
  }
  return Either.right(lists)
}

const zip = <A, B>(
  what: string,
  left: ReadonlyArray<A>,
  right: ReadonlyArray<B>,
): Either.Either<ReadonlyArray<readonly [A, B]>, MalformedStreamError> => {
  const pairs: Array<readonly [A, B]> = []
  for (const [index, a] of left.entries()) {
    const b = right[index]
    if (b === undefined) {
      break
    }
    pairs.push([a, b])
  }
  return left.length === right.length
    ? Either.right(pairs)
    : Either.left(
        new MalformedStreamError({
          reason: `${what} columns differ in length (${left.length} and ${right.length})`,
        }),
      )
}

/**
 * @since 0.1.0
 * @category Models
 * @example
 * ```typescript
 * const map = yield* ModelMap.make({
 *   model,
 *   inputs: { x: input.id },
 *   outputs: { y: prediction },
 * })
 * const [y] = yield* map.compute({ x: [1, 1] })
 * ```
 */
export class ModelMap implements Serializable {
  static readonly typeName = "ModelMap"
  static readonly kind: SerializableKind<ModelMap> = makeKind(ModelMap.typeName, ModelMap, (map) => map.copy())

  /**
   * Bind names to a copy of `model`. Every input must be an {@link InputNode}
   * and every output coordinate must resolve.
   */
  static make(options: {
    readonly model: Model
    readonly inputs: Readonly<Record<string, NodeId>>
    readonly outputs: Readonly<Record<string, CoordinateList>>
  }): Either.Either<ModelMap, GraphError> {
    const binding: Binding = {
      inputs: Object.entries(options.inputs),
      outputs: Object.entries(options.outputs).map(
        ([name, coordinates]) => [name, [...coordinates]] as const,
      ),
    }
    return Either.map(validateBinding(options.model, binding), (binding) => {
      const map = new ModelMap()
      map.#model = options.model.copy()
      map.#binding = binding
      return map
    })
  }

  #model = new Model()
  #binding: Binding = { inputs: [], outputs: [] }

  get runtimeTypeName(): string {
    return ModelMap.typeName
  }

  /**
   * The owned model. Mutating it bypasses the map's validation; prefer
   * {@link getModel}.
   */
  get model(): Model {
    return this.#model
  }

  /**
   * Copy of the underlying model.
   */
  getModel(): Model {
    return this.#model.copy()
  }

  getInputNames(): ReadonlyArray<string> {
    return this.#binding.inputs.map(([name]) => name)
  }

  getInputSize(name: string): Option.Option<number> {
    return Option.fromNullable(this.#binding.inputs.find(([input]) => input === name)).pipe(
      Option.flatMap(([, id]) => this.#model.getNode(id)),
      Option.map((node) => node.outputSize),
    )
  }

  getOutputNames(): ReadonlyArray<string> {
    return this.#binding.outputs.map(([name]) => name)
  }

  getOutputSize(index: number): Either.Either<number, UnknownOutputError> {
    return Either.map(this.getOutputElementsBase(index), (coordinates) => coordinates.length)
  }

  getOutputElementsBase(index: number): Either.Either<CoordinateList, UnknownOutputError> {
    const output = this.#binding.outputs[index]
    return output === undefined
      ? Either.left(new UnknownOutputError({ output: index }))
      : Either.right(output[1])
  }

  getOutputElements(name: string): Either.Either<CoordinateList, UnknownOutputError> {
    const output = this.#binding.outputs.find(([output]) => output === name)
    return output === undefined
      ? Either.left(new UnknownOutputError({ output: name }))
      : Either.right(output[1])
  }

  /**
   * Values of every output, concatenated in declaration order.
   */
  compute(
    feeds: Readonly<Record<string, ReadonlyArray<number>>>,
  ): Effect.Effect<ReadonlyArray<number>, EvaluationError> {
    const byNode = new Map<NodeId, ReadonlyArray<number>>()
    for (const [name, id] of this.#binding.inputs) {
      const values = feeds[name]
      if (values !== undefined) {
        byNode.set(id, values)
      }
    }
    return evaluate(
      this.#model,
      byNode,
      this.#binding.outputs.flatMap(([, coordinates]) => coordinates),
    )
  }

  copy(): ModelMap {
    const map = new ModelMap()
    map.#model = this.#model.copy()
    map.#binding = this.#binding
    return map
  }

  serialize(serializer: Serializer): Effect.Effect<void, SerializationError> {
    return Effect.gen(this, function* () {
      const { nodes, ports } = toColumns(this.#binding.outputs.flatMap(([, coordinates]) => coordinates))
      yield* serializer.writeObject("model", this.#model)
      yield* serializer.writeStrings("inputNames", this.getInputNames())
      yield* serializer.writeInts("inputNodes", this.#binding.inputs.map(([, id]) => id))
      yield* serializer.writeStrings("outputNames", this.getOutputNames())
      yield* serializer.writeInts(
        "outputSizes",
        this.#binding.outputs.map(([, coordinates]) => coordinates.length),
      )
      yield* serializer.writeInts("outputNodes", nodes)
      yield* serializer.writeInts("outputPorts", ports)
    })
  }

  deserialize(deserializer: Deserializer): Effect.Effect<void, DeserializationError> {
    return Effect.gen(this, function* () {
      const model = yield* deserializer.readObjectOf("model", Model.kind)
      const inputNames = yield* deserializer.readStrings("inputNames")
      const inputNodes = yield* Either.mapLeft(
        decodeNodeIds(yield* deserializer.readInts("inputNodes")),
        (error) => new MalformedStreamError({ reason: error.message }),
      )
      const outputNames = yield* deserializer.readStrings("outputNames")
      const outputSizes = yield* deserializer.readInts("outputSizes")
      const outputNodes = yield* deserializer.readInts("outputNodes")
      const outputPorts = yield* deserializer.readInts("outputPorts")

      const coordinates = yield* fromColumns(outputNodes, outputPorts)
      const outputLists = yield* splitBySizes(coordinates, outputSizes)
      const binding = yield* validateBinding(model, {
        inputs: yield* zip("input", inputNames, inputNodes),
        outputs: yield* zip("output", outputNames, outputLists),
      })
      this.#model = model
      this.#binding = binding
    })
  }
}

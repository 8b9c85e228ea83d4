/**
 * Model: the owning container of a graph of nodes.
 *
 * Nodes are kept in insertion order, which is also a topological order: a node
 * may only be wired to ports of nodes already in the model when it is added,
 * so the graph is a DAG by construction. Node ids are arena indices.
 *
 * @since 0.1.0
 */

import { Effect, Either, Option, Schema } from "effect"
import { Coordinate, coordinateRange, type CoordinateList } from "./Coordinate.js"
import type { Deserializer } from "./Deserializer.js"
import {
  DanglingCoordinateError,
  GraphConstructionError,
  MalformedStreamError,
  type DeserializationError,
  type GraphError,
  type SerializationError,
} from "./Errors.js"
import { Node } from "./Node.js"
import { makeKind, type Serializable, type SerializableKind } from "./Serializable.js"
import type { Serializer } from "./Serializer.js"
import { NodeId } from "./Types.js"

const decodeNodeId = Schema.decodeSync(NodeId)

/**
 * What `Model.addNode` hands back: the node, its id and the coordinates of its
 * output ports.
 *
 * @since 0.1.0
 * @category Models
 */
export interface NodeHandle<N extends Node> {
  readonly id: NodeId
  readonly node: N
  readonly outputs: CoordinateList
  readonly output: (port: number) => Coordinate
}

const makeHandle = <N extends Node>(id: NodeId, node: N): NodeHandle<N> => ({
  id,
  node,
  outputs: coordinateRange(id, node.outputSize),
  output: (port) => new Coordinate({ node: id, port }),
})

// A node belongs to at most one model for its whole life.
const owners = new WeakMap<Node, Model>()

/**
 * @since 0.1.0
 * @category Models
 * @example
 * ```typescript
 * const model = new Model()
 * const input = yield* model.addNode(new InputNode(2))
 * const sum = yield* model.addNode(new SumNode(input.outputs))
 * ```
 */
export class Model implements Serializable {
  static readonly typeName = "Model"
  static readonly kind: SerializableKind<Model> = makeKind(Model.typeName, Model, (model) => model.copy())

  #nodes: Array<Node> = []

  get runtimeTypeName(): string {
    return Model.typeName
  }

  get nodes(): ReadonlyArray<Node> {
    return this.#nodes
  }

  get size(): number {
    return this.#nodes.length
  }

  getNode(id: number): Option.Option<Node> {
    return Option.fromNullable(this.#nodes[id])
  }

  /**
   * Node owning `coordinate`, if the coordinate names one of its ports.
   */
  resolve(coordinate: Coordinate): Either.Either<Node, DanglingCoordinateError> {
    const node = this.#nodes[coordinate.node]
    if (node === undefined) {
      return Either.left(
        new DanglingCoordinateError({
          node: coordinate.node,
          port: coordinate.port,
          reason: `the model holds ${this.#nodes.length} nodes`,
        }),
      )
    }
    if (coordinate.port >= node.outputSize) {
      return Either.left(
        new DanglingCoordinateError({
          node: coordinate.node,
          port: coordinate.port,
          reason: `${node.runtimeTypeName} has ${node.outputSize} ports`,
        }),
      )
    }
    return Either.right(node)
  }

  /**
   * Take ownership of `node`. Every input coordinate must resolve to a node
   * already in this model.
   */
  addNode<N extends Node>(node: N): Effect.Effect<NodeHandle<N>, GraphError> {
    return Effect.gen(this, function* () {
      if (owners.has(node)) {
        return yield* Effect.fail(
          new GraphConstructionError({ reason: `${node.runtimeTypeName} already belongs to a model` }),
        )
      }
      const problem = node.validate()
      if (Option.isSome(problem)) {
        return yield* Effect.fail(new GraphConstructionError({ reason: problem.value }))
      }
      for (const coordinate of node.inputs) {
        yield* this.resolve(coordinate)
      }
      const id = decodeNodeId(this.#nodes.length)
      this.#nodes.push(node)
      owners.set(node, this)
      return makeHandle(id, node)
    })
  }

  /**
   * Deep copy. Node ids, and therefore coordinates, carry over unchanged.
   */
  copy(): Model {
    const model = new Model()
    for (const node of this.#nodes) {
      const copied = node.copy()
      model.#nodes.push(copied)
      owners.set(copied, model)
    }
    return model
  }

  serialize(serializer: Serializer): Effect.Effect<void, SerializationError> {
    return serializer.writeObjects("nodes", this.#nodes)
  }

  deserialize(deserializer: Deserializer): Effect.Effect<void, DeserializationError> {
    return Effect.gen(this, function* () {
      const objects = yield* deserializer.readObjects("nodes")
      const incoming = new Model()
      for (const node of objects) {
        if (!(node instanceof Node)) {
          return yield* Effect.fail(
            new MalformedStreamError({ reason: `"${node.runtimeTypeName}" is not a node kind` }),
          )
        }
        yield* incoming.addNode(node)
      }
      for (const node of this.#nodes) {
        owners.delete(node)
      }
      this.#nodes = incoming.#nodes
      incoming.#nodes = []
      for (const node of this.#nodes) {
        owners.set(node, this)
      }
    })
  }
}

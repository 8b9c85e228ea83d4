/**
 * Reference evaluator for model graphs.
 *
 * Nodes are visited in model order, which is topological, so every input
 * coordinate is already computed when its consumer runs.
 *
 * @since 0.1.0
 */

import { Effect, Either, Schema } from "effect"
import type { Coordinate, CoordinateList } from "./Coordinate.js"
import {
  DanglingCoordinateError,
  InputSizeMismatchError,
  MissingInputError,
  type EvaluationError,
} from "./Errors.js"
import type { Model } from "./Model.js"
import { InputNode } from "./Nodes.js"
import { NodeId } from "./Types.js"

const toNodeId = Schema.decodeSync(NodeId)

/**
 * Values fed to the input nodes of a model, keyed by node id.
 *
 * @since 0.1.0
 * @category Models
 */
export type Feeds = ReadonlyMap<NodeId, ReadonlyArray<number>>

const portValue = (
  ports: ReadonlyArray<ReadonlyArray<number>>,
  coordinate: Coordinate,
): Either.Either<number, DanglingCoordinateError> => {
  const value = ports[coordinate.node]?.[coordinate.port]
  return value === undefined
    ? Either.left(
        new DanglingCoordinateError({
          node: coordinate.node,
          port: coordinate.port,
          reason: "no value has been computed for it",
        }),
      )
    : Either.right(value)
}

const portValues = (
  ports: ReadonlyArray<ReadonlyArray<number>>,
  coordinates: CoordinateList,
): Either.Either<ReadonlyArray<number>, DanglingCoordinateError> =>
  Either.all(coordinates.map((coordinate) => portValue(ports, coordinate)))

/**
 * Port values of every node, indexed by node id then port.
 *
 * @since 0.1.0
 * @category Evaluation
 */
export const evaluateAll = (
  model: Model,
  feeds: Feeds,
): Effect.Effect<ReadonlyArray<ReadonlyArray<number>>, EvaluationError> =>
  Effect.gen(function* () {
    const ports: Array<ReadonlyArray<number>> = []
    for (const [index, node] of model.nodes.entries()) {
      if (node instanceof InputNode) {
        const fed = feeds.get(toNodeId(index))
        if (fed === undefined) {
          return yield* Effect.fail(new MissingInputError({ node: index }))
        }
        if (fed.length !== node.size) {
          return yield* Effect.fail(
            new InputSizeMismatchError({ node: index, expected: node.size, actual: fed.length }),
          )
        }
        ports.push(node.compute(fed))
        continue
      }
      const values = yield* portValues(ports, node.inputs)
      ports.push(node.compute(values))
    }
    return ports
  })

/**
 * Values at `outputs` once every node has run.
 *
 * @since 0.1.0
 * @category Evaluation
 * @example
 * ```typescript
 * const [y] = yield* evaluate(model, new Map([[input.id, [1, 1]]]), outputs)
 * ```
 */
export const evaluate = (
  model: Model,
  feeds: Feeds,
  outputs: CoordinateList,
): Effect.Effect<ReadonlyArray<number>, EvaluationError> =>
  Effect.gen(function* () {
    for (const coordinate of outputs) {
      yield* model.resolve(coordinate)
    }
    const ports = yield* evaluateAll(model, feeds)
    return yield* portValues(ports, outputs)
  })

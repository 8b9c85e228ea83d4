/**
 * Coordinates: non-owning references to one scalar output (port) of one node.
 *
 * @since 0.1.0
 */

import { Either, Schema } from "effect"
import { MalformedStreamError } from "./Errors.js"
import { NodeId } from "./Types.js"

/**
 * Reference to port `port` of node `node`.
 *
 * @since 0.1.0
 * @category Models
 * @example
 * ```typescript
 * const coordinate = new Coordinate({ node: Schema.decodeSync(NodeId)(0), port: 1 })
 * ```
 */
export class Coordinate extends Schema.Class<Coordinate>("Coordinate")({
  node: NodeId,
  port: Schema.Int.pipe(Schema.nonNegative()),
}) {}

/**
 * Ordered coordinates wiring a multi-input node.
 *
 * @since 0.1.0
 * @category Models
 */
export type CoordinateList = ReadonlyArray<Coordinate>

const decodeCoordinates = Schema.decodeUnknownEither(Schema.Array(Coordinate))

/**
 * Coordinates of ports `0 .. size - 1` of `node`.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const coordinateRange = (node: NodeId, size: number): CoordinateList =>
  Array.from({ length: size }, (_, port) => new Coordinate({ node, port }))

/**
 * Split a coordinate list into parallel node and port columns, the form in
 * which it is serialized.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const toColumns = (
  coordinates: CoordinateList,
): { readonly nodes: ReadonlyArray<number>; readonly ports: ReadonlyArray<number> } => ({
  nodes: coordinates.map((coordinate) => coordinate.node),
  ports: coordinates.map((coordinate) => coordinate.port),
})

/**
 * Inverse of {@link toColumns}.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const fromColumns = (
  nodes: ReadonlyArray<number>,
  ports: ReadonlyArray<number>,
): Either.Either<CoordinateList, MalformedStreamError> =>
  nodes.length !== ports.length
    ? Either.left(
        new MalformedStreamError({
          reason: `coordinate columns differ in length (${nodes.length} nodes, ${ports.length} ports)`,
        }),
      )
    : decodeCoordinates(nodes.map((node, index) => ({ node, port: ports[index] }))).pipe(
        Either.mapLeft((error) => new MalformedStreamError({ reason: error.message })),
      )

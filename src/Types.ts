/**
 * Type Foundations & Branded IDs
 *
 * Node identities are branded integers so that a raw port index can never be
 * passed where a node is expected. Type names are the only tag written to a
 * serialized stream to tell concrete kinds apart.
 *
 * @since 0.1.0
 */

import { Brand, Schema } from "effect"

/**
 * Branded arena index of a node inside its owning model.
 *
 * @since 0.1.0
 * @category IDs
 */
export const NodeId = Schema.Int.pipe(Schema.nonNegative(), Schema.brand("NodeId"))

/**
 * Type extracted from NodeId schema
 *
 * @since 0.1.0
 * @category IDs
 */
export type NodeId = typeof NodeId.Type

/**
 * Stable runtime identifier of a concrete kind, e.g. `SumNode` or
 * `vector(double)`.
 *
 * @since 0.1.0
 * @category Type names
 */
export const TypeName = Schema.String.pipe(
  Schema.pattern(/^[A-Za-z_][A-Za-z0-9_<>(),*]*$/),
)

/**
 * Type extracted from TypeName schema
 *
 * @since 0.1.0
 * @category Type names
 */
export type TypeName = typeof TypeName.Type

/**
 * Name of a sequence type holding elements of `element`.
 *
 * @since 0.1.0
 * @category Type names
 */
export const vectorTypeName = (element: string): string => `vector(${element})`

/**
 * Name of a pointer-like reference to values of `target`.
 *
 * @since 0.1.0
 * @category Type names
 */
export const pointerTypeName = (target: string): string => `${target}*`

/**
 * A safe integer. Kept distinct from plain `number` so that a variant holding
 * an `int` is never read back as a `double`.
 *
 * @since 0.1.0
 * @category Values
 */
export type Int = number & Brand.Brand<"Int">

/**
 * Constructor for {@link Int}; throws on non-integral input.
 *
 * @since 0.1.0
 * @category Values
 */
export const Int = Brand.refined<Int>(
  (n) => Number.isSafeInteger(n),
  (n) => Brand.error(`Expected ${n} to be a safe integer`),
)

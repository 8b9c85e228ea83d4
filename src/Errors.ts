/**
 * Error hierarchy for the variant, serialization and model-graph layers.
 *
 * Every failure is a tagged error so callers can pattern match with
 * `Effect.catchTag`. The core never logs; it only fails with one of these.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * Raised when a variant is read back under a type other than the one it
 * holds.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new TypeMismatchError({ expected: "int", actual: "double" })
 * yield* Effect.fail(error)
 * ```
 */
export class TypeMismatchError extends Data.TaggedError("TypeMismatchError")<{
  readonly expected: string
  readonly actual: string
}> {
  override get message(): string {
    return `Variant holds "${this.actual}" but "${this.expected}" was requested`
  }
}

/**
 * Raised when a stream names a type with no registered factory.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnregisteredTypeError extends Data.TaggedError("UnregisteredTypeError")<{
  readonly typeName: string
}> {
  override get message(): string {
    return `No kind registered for type name "${this.typeName}"`
  }
}

/**
 * Raised when a second, different kind is registered under a taken name.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DuplicateRegistrationError extends Data.TaggedError("DuplicateRegistrationError")<{
  readonly typeName: string
}> {
  override get message(): string {
    return `A different kind is already registered as "${this.typeName}"`
  }
}

/**
 * Raised when a value cannot be written to a stream (pointers, opaque
 * values, non-finite doubles).
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnserializableValueError extends Data.TaggedError("UnserializableValueError")<{
  readonly typeName: string
  readonly reason: string
}> {
  override get message(): string {
    return `Cannot serialize value of type "${this.typeName}": ${this.reason}`
  }
}

/**
 * Raised when a stream does not have the shape a reader expects.
 *
 * @category Errors
 * @since 0.1.0
 */
export class MalformedStreamError extends Data.TaggedError("MalformedStreamError")<{
  readonly reason: string
}> {
  override get message(): string {
    return `Malformed stream: ${this.reason}`
  }
}

/**
 * Raised when a node is wired to a coordinate its model does not own.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DanglingCoordinateError extends Data.TaggedError("DanglingCoordinateError")<{
  readonly node: number
  readonly port: number
  readonly reason: string
}> {
  override get message(): string {
    return `Coordinate (${this.node}, ${this.port}) does not resolve: ${this.reason}`
  }
}

/**
 * Raised when a node cannot be added to a model for reasons other than its
 * wiring (ownership, arity).
 *
 * @category Errors
 * @since 0.1.0
 */
export class GraphConstructionError extends Data.TaggedError("GraphConstructionError")<{
  readonly reason: string
}> {
  override get message(): string {
    return this.reason
  }
}

/**
 * Raised when a predictor is lowered onto a number of inputs that differs from
 * its dimension.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DimensionMismatchError extends Data.TaggedError("DimensionMismatchError")<{
  readonly expected: number
  readonly actual: number
}> {
  override get message(): string {
    return `Expected ${this.expected} inputs but received ${this.actual}`
  }
}

/**
 * Raised when an input node is evaluated without a value being fed to it.
 *
 * @category Errors
 * @since 0.1.0
 */
export class MissingInputError extends Data.TaggedError("MissingInputError")<{
  readonly node: number
}> {
  override get message(): string {
    return `No values were fed to input node ${this.node}`
  }
}

/**
 * Raised when the values fed to an input node do not match its size.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InputSizeMismatchError extends Data.TaggedError("InputSizeMismatchError")<{
  readonly node: number
  readonly expected: number
  readonly actual: number
}> {
  override get message(): string {
    return `Input node ${this.node} expects ${this.expected} values but received ${this.actual}`
  }
}

/**
 * Raised when a map output is requested by an unknown name or index.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnknownOutputError extends Data.TaggedError("UnknownOutputError")<{
  readonly output: string | number
}> {
  override get message(): string {
    return `Unknown map output ${JSON.stringify(this.output)}`
  }
}

/**
 * @category Errors
 * @since 0.1.0
 */
export type VariantError = TypeMismatchError

/**
 * @category Errors
 * @since 0.1.0
 */
export type SerializationError = UnserializableValueError

/**
 * @category Errors
 * @since 0.1.0
 */
export type GraphError = DanglingCoordinateError | GraphConstructionError

/**
 * Everything a deserializer can fail with. Graph errors are included because
 * reloading a model re-validates its wiring.
 *
 * @category Errors
 * @since 0.1.0
 */
export type DeserializationError = UnregisteredTypeError | MalformedStreamError | GraphError

/**
 * @category Errors
 * @since 0.1.0
 */
export type EvaluationError = MissingInputError | InputSizeMismatchError | DanglingCoordinateError

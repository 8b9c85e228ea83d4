/**
 * The `Serializable` capability and the static description of a concrete
 * serializable kind.
 *
 * @since 0.1.0
 */

import type { Effect } from "effect"
import type { Deserializer } from "./Deserializer.js"
import type { DeserializationError, SerializationError } from "./Errors.js"
import type { Serializer } from "./Serializer.js"

/**
 * An object that can name its concrete kind, write its state into a
 * {@link Serializer} and restore it from a {@link Deserializer}.
 *
 * `deserialize` must read exactly the properties `serialize` wrote, in the
 * same order and with the same nesting.
 *
 * @since 0.1.0
 * @category Models
 */
export interface Serializable {
  readonly runtimeTypeName: string
  serialize(serializer: Serializer): Effect.Effect<void, SerializationError>
  deserialize(deserializer: Deserializer): Effect.Effect<void, DeserializationError>
}

/**
 * Static side of a concrete kind: what the type registry keeps per type name.
 *
 * @since 0.1.0
 * @category Models
 */
export interface SerializableKind<A extends Serializable> {
  readonly typeName: string
  /** Default instance, later populated by `deserialize`. */
  make(): A
  copy(value: A): A
  is(u: unknown): u is A
  /** Diagnostic rendering used when the instance sits in a variant. */
  format?(value: A): string
}

/**
 * @since 0.1.0
 * @category Guards
 */
export const isSerializable = (u: unknown): u is Serializable =>
  typeof u === "object" &&
  u !== null &&
  "runtimeTypeName" in u &&
  typeof u.runtimeTypeName === "string" &&
  "serialize" in u &&
  typeof u.serialize === "function" &&
  "deserialize" in u &&
  typeof u.deserialize === "function"

/**
 * Build the kind of a class whose zero-argument construction yields a default
 * instance.
 *
 * @since 0.1.0
 * @category Constructors
 */
export const makeKind = <A extends Serializable>(
  typeName: string,
  constructor: new () => A,
  copy: (value: A) => A,
  format?: (value: A) => string,
): SerializableKind<A> => ({
  typeName,
  make: () => new constructor(),
  copy,
  is: (u: unknown): u is A => u instanceof constructor,
  format,
})

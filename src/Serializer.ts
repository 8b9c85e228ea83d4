/**
 * Serializer: the append-only sink a {@link Serializable} writes its named
 * properties into.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import { UnserializableValueError, type SerializationError } from "./Errors.js"
import type { Property, PropertyValue, SerializedObject } from "./PropertyTree.js"
import type { Serializable } from "./Serializable.js"
import type { Variant } from "./Variant.js"

const isFiniteTree = (u: unknown): boolean => {
  if (typeof u === "number") {
    return Number.isFinite(u)
  }
  if (Array.isArray(u)) {
    return u.every(isFiniteTree)
  }
  if (typeof u === "object" && u !== null) {
    return Object.values(u).every(isFiniteTree)
  }
  return true
}

const ensureFinite = (
  typeName: string,
  values: ReadonlyArray<number>,
): Effect.Effect<void, UnserializableValueError> =>
  values.every(Number.isFinite)
    ? Effect.void
    : Effect.fail(new UnserializableValueError({ typeName, reason: "non-finite number" }))

const ensureIntegral = (
  values: ReadonlyArray<number>,
): Effect.Effect<void, UnserializableValueError> =>
  values.every(Number.isSafeInteger)
    ? Effect.void
    : Effect.fail(new UnserializableValueError({ typeName: "int", reason: "not a safe integer" }))

/**
 * Collects the properties of one object, in write order.
 *
 * @since 0.1.0
 * @category Serialization
 */
export class Serializer {
  readonly #properties: Array<Property> = []

  writeDouble(name: string, value: number): Effect.Effect<void, SerializationError> {
    return ensureFinite("double", [value]).pipe(
      Effect.andThen(() => this.append(name, { _tag: "Double", value })),
    )
  }

  writeInt(name: string, value: number): Effect.Effect<void, SerializationError> {
    return ensureIntegral([value]).pipe(Effect.andThen(() => this.append(name, { _tag: "Int", value })))
  }

  writeBoolean(name: string, value: boolean): Effect.Effect<void> {
    return this.append(name, { _tag: "Boolean", value })
  }

  writeString(name: string, value: string): Effect.Effect<void> {
    return this.append(name, { _tag: "String", value })
  }

  writeDoubles(name: string, values: ReadonlyArray<number>): Effect.Effect<void, SerializationError> {
    return ensureFinite("vector(double)", values).pipe(
      Effect.andThen(() => this.append(name, { _tag: "DoubleArray", values: [...values] })),
    )
  }

  writeInts(name: string, values: ReadonlyArray<number>): Effect.Effect<void, SerializationError> {
    return ensureIntegral(values).pipe(
      Effect.andThen(() => this.append(name, { _tag: "IntArray", values: [...values] })),
    )
  }

  writeStrings(name: string, values: ReadonlyArray<string>): Effect.Effect<void> {
    return this.append(name, { _tag: "StringArray", values: [...values] })
  }

  /**
   * Write a nested object: its type name first, then its own properties.
   */
  writeObject(name: string, value: Serializable): Effect.Effect<void, SerializationError> {
    return serialize(value).pipe(Effect.flatMap((object) => this.append(name, { _tag: "Object", object })))
  }

  writeObjects(
    name: string,
    values: ReadonlyArray<Serializable>,
  ): Effect.Effect<void, SerializationError> {
    return Effect.forEach(values, serialize).pipe(
      Effect.flatMap((objects) => this.append(name, { _tag: "ObjectArray", objects })),
    )
  }

  /**
   * Write a variant. Primitive and array values go inline, serializable values
   * recursively. Pointer and opaque values are rejected: their identity does
   * not survive a save/load boundary.
   */
  writeVariant(name: string, variant: Variant): Effect.Effect<void, SerializationError> {
    const contents = variant.contents()
    switch (contents._tag) {
      case "Empty":
        return this.append(name, { _tag: "Empty" })
      case "Inline":
        return isFiniteTree(contents.encoded)
          ? this.append(name, { _tag: "Value", typeName: contents.typeName, value: contents.encoded })
          : Effect.fail(
              new UnserializableValueError({ typeName: contents.typeName, reason: "non-finite number" }),
            )
      case "Object":
        return this.writeObject(name, contents.object)
      case "Pointer":
        return Effect.fail(
          new UnserializableValueError({
            typeName: contents.typeName,
            reason: "pointer values cannot be persisted",
          }),
        )
      case "Opaque":
        return Effect.fail(
          new UnserializableValueError({
            typeName: contents.typeName,
            reason: "type has no serialized form",
          }),
        )
    }
  }

  /**
   * Properties written so far.
   */
  get properties(): ReadonlyArray<Property> {
    return this.#properties
  }

  private append(name: string, value: PropertyValue): Effect.Effect<void> {
    return Effect.sync(() => {
      this.#properties.push({ name, value })
    })
  }
}

/**
 * Serialize a root object into a property tree tagged with its type name.
 *
 * @since 0.1.0
 * @category Serialization
 */
export const serialize = (value: Serializable): Effect.Effect<SerializedObject, SerializationError> =>
  Effect.gen(function* () {
    const serializer = new Serializer()
    yield* value.serialize(serializer)
    return { typeName: value.runtimeTypeName, properties: serializer.properties }
  })

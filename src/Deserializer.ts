/**
 * Deserializer: a cursor yielding back the properties a {@link Serializer}
 * wrote, in order.
 *
 * Every read names the property it expects. A name or tag that does not match
 * the next property in the stream fails with {@link MalformedStreamError}; a
 * nested type name with no registered kind fails with
 * {@link UnregisteredTypeError}.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import { MalformedStreamError, type DeserializationError } from "./Errors.js"
import { hasTag, type PropertyTag, type PropertyValue, type SerializedObject } from "./PropertyTree.js"
import type { Serializable, SerializableKind } from "./Serializable.js"
import { TypeRegistry, type AnyKind, type TypeRegistryService } from "./TypeRegistry.js"
import { Variant, serializableType } from "./Variant.js"

interface Constructed {
  readonly kind: AnyKind
  readonly instance: Serializable
}

const narrow =
  <A extends Serializable>(kind: SerializableKind<A>) =>
  (instance: Serializable): Effect.Effect<A, MalformedStreamError> =>
    kind.is(instance)
      ? Effect.succeed(instance)
      : Effect.fail(
          new MalformedStreamError({
            reason: `expected a "${kind.typeName}" but the stream holds a "${instance.runtimeTypeName}"`,
          }),
        )

/**
 * Read cursor over the properties of one serialized object.
 *
 * @since 0.1.0
 * @category Serialization
 */
export class Deserializer {
  #cursor = 0

  constructor(
    readonly object: SerializedObject,
    private readonly registry: TypeRegistryService,
  ) {}

  get typeName(): string {
    return this.object.typeName
  }

  /**
   * Number of properties not read yet.
   */
  get remaining(): number {
    return this.object.properties.length - this.#cursor
  }

  readDouble(name: string): Effect.Effect<number, MalformedStreamError> {
    return Effect.map(this.next(name, "Double"), (property) => property.value)
  }

  readInt(name: string): Effect.Effect<number, MalformedStreamError> {
    return Effect.map(this.next(name, "Int"), (property) => property.value)
  }

  readBoolean(name: string): Effect.Effect<boolean, MalformedStreamError> {
    return Effect.map(this.next(name, "Boolean"), (property) => property.value)
  }

  readString(name: string): Effect.Effect<string, MalformedStreamError> {
    return Effect.map(this.next(name, "String"), (property) => property.value)
  }

  readDoubles(name: string): Effect.Effect<ReadonlyArray<number>, MalformedStreamError> {
    return Effect.map(this.next(name, "DoubleArray"), (property) => property.values)
  }

  readInts(name: string): Effect.Effect<ReadonlyArray<number>, MalformedStreamError> {
    return Effect.map(this.next(name, "IntArray"), (property) => property.values)
  }

  readStrings(name: string): Effect.Effect<ReadonlyArray<string>, MalformedStreamError> {
    return Effect.map(this.next(name, "StringArray"), (property) => property.values)
  }

  /**
   * Read a nested object of whatever kind the stream names.
   */
  readObject(name: string): Effect.Effect<Serializable, DeserializationError> {
    return this.next(name, "Object").pipe(
      Effect.flatMap((property) => construct(property.object, this.registry)),
      Effect.map(({ instance }) => instance),
    )
  }

  /**
   * Read a nested object that must be of `kind`.
   */
  readObjectOf<A extends Serializable>(
    name: string,
    kind: SerializableKind<A>,
  ): Effect.Effect<A, DeserializationError> {
    return Effect.flatMap(this.readObject(name), narrow(kind))
  }

  readObjects(name: string): Effect.Effect<ReadonlyArray<Serializable>, DeserializationError> {
    return this.next(name, "ObjectArray").pipe(
      Effect.flatMap((property) =>
        Effect.forEach(property.objects, (object) =>
          Effect.map(construct(object, this.registry), ({ instance }) => instance),
        ),
      ),
    )
  }

  readObjectsOf<A extends Serializable>(
    name: string,
    kind: SerializableKind<A>,
  ): Effect.Effect<ReadonlyArray<A>, DeserializationError> {
    return Effect.flatMap(this.readObjects(name), (instances) => Effect.forEach(instances, narrow(kind)))
  }

  /**
   * Read a variant written by `Serializer.writeVariant`.
   */
  readVariant(name: string): Effect.Effect<Variant, DeserializationError> {
    return Effect.flatMap(this.nextProperty(name), (value): Effect.Effect<Variant, DeserializationError> => {
      switch (value._tag) {
        case "Empty":
          return Effect.succeed(Variant.empty())
        case "Value":
          return this.registry.decodeInline(value.typeName, value.value)
        case "Object":
          return Effect.map(construct(value.object, this.registry), ({ kind, instance }) =>
            Variant.make(serializableType(kind), instance),
          )
        default:
          return Effect.fail(
            new MalformedStreamError({
              reason: `property "${name}" of "${this.typeName}" is a ${value._tag}, not a variant`,
            }),
          )
      }
    })
  }

  /**
   * Fail unless every property has been read.
   */
  finish(): Effect.Effect<void, MalformedStreamError> {
    return Effect.suspend(() => {
      const unread = this.object.properties.slice(this.#cursor).map((property) => property.name)
      return unread.length === 0
        ? Effect.void
        : Effect.fail(
            new MalformedStreamError({
              reason: `"${this.typeName}" left properties unread: ${unread.join(", ")}`,
            }),
          )
    })
  }

  private nextProperty(name: string): Effect.Effect<PropertyValue, MalformedStreamError> {
    return Effect.suspend((): Effect.Effect<PropertyValue, MalformedStreamError> => {
      const property = this.object.properties[this.#cursor]
      if (property === undefined) {
        return Effect.fail(
          new MalformedStreamError({
            reason: `expected property "${name}" of "${this.typeName}" but the object has no more properties`,
          }),
        )
      }
      if (property.name !== name) {
        return Effect.fail(
          new MalformedStreamError({
            reason: `expected property "${name}" of "${this.typeName}" but found "${property.name}"`,
          }),
        )
      }
      this.#cursor += 1
      return Effect.succeed(property.value)
    })
  }

  private next<T extends PropertyTag>(
    name: string,
    tag: T,
  ): Effect.Effect<Extract<PropertyValue, { readonly _tag: T }>, MalformedStreamError> {
    return Effect.flatMap(
      this.nextProperty(name),
      (value): Effect.Effect<Extract<PropertyValue, { readonly _tag: T }>, MalformedStreamError> =>
        hasTag(value, tag)
          ? Effect.succeed(value)
          : Effect.fail(
              new MalformedStreamError({
                reason: `property "${name}" of "${this.typeName}" is a ${value._tag}, expected ${tag}`,
              }),
            ),
    )
  }
}

const construct = (
  object: SerializedObject,
  registry: TypeRegistryService,
): Effect.Effect<Constructed, DeserializationError> =>
  Effect.gen(function* () {
    const kind = yield* registry.lookup(object.typeName)
    const instance = kind.make()
    const deserializer = new Deserializer(object, registry)
    yield* instance.deserialize(deserializer)
    yield* deserializer.finish()
    return { kind, instance }
  })

/**
 * Rebuild the object a property tree describes, choosing its concrete kind by
 * the tree's type name.
 *
 * @since 0.1.0
 * @category Serialization
 */
export const deserialize = (
  object: SerializedObject,
): Effect.Effect<Serializable, DeserializationError, TypeRegistry> =>
  Effect.flatMap(TypeRegistry, (registry) =>
    Effect.map(construct(object, registry), ({ instance }) => instance),
  )

/**
 * Like {@link deserialize}, but the root must be of `kind`.
 *
 * @since 0.1.0
 * @category Serialization
 */
export const deserializeAs = <A extends Serializable>(
  kind: SerializableKind<A>,
  object: SerializedObject,
): Effect.Effect<A, DeserializationError, TypeRegistry> =>
  Effect.flatMap(deserialize(object), narrow(kind))

/**
 * Populate an existing instance from a tree whose type name matches its own.
 *
 * @since 0.1.0
 * @category Serialization
 */
export const deserializeInto = (
  target: Serializable,
  object: SerializedObject,
): Effect.Effect<void, DeserializationError, TypeRegistry> =>
  Effect.gen(function* () {
    if (object.typeName !== target.runtimeTypeName) {
      return yield* Effect.fail(
        new MalformedStreamError({
          reason: `cannot read a "${object.typeName}" into a "${target.runtimeTypeName}"`,
        }),
      )
    }
    const registry = yield* TypeRegistry
    const deserializer = new Deserializer(object, registry)
    yield* target.deserialize(deserializer)
    yield* deserializer.finish()
  })

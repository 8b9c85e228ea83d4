/**
 * Type registry: maps the type name written in a stream to the kind able to
 * rebuild it.
 *
 * The registry is built once per runtime from a list of kinds, before any
 * deserialization runs. Later registrations may extend it; a name can only be
 * bound to one kind.
 *
 * Inline variant descriptors are registered separately, so that a variant
 * written as a bare value can be read back. The built-in primitive and vector
 * descriptors are always present.
 *
 * @since 0.1.0
 */

import { Context, Effect, Either, HashMap, Layer, Option, Ref } from "effect"
import { DuplicateRegistrationError, MalformedStreamError, UnregisteredTypeError } from "./Errors.js"
import { CoreKinds } from "./Kinds.js"
import type { Serializable, SerializableKind } from "./Serializable.js"
import {
  BuiltinInlineDecoders,
  Variant,
  inlineDecoder,
  type InlineDecoder,
  type InlineVariantType,
} from "./Variant.js"

/**
 * @since 0.1.0
 * @category Models
 */
export type AnyKind = SerializableKind<Serializable>

/**
 * @since 0.1.0
 * @category Services
 */
export interface TypeRegistryService {
  /**
   * Bind `kind.typeName` to `kind`. Registering the same kind twice is a
   * no-op; a different kind under a taken name fails.
   */
  readonly register: (kind: AnyKind) => Effect.Effect<void, DuplicateRegistrationError>
  readonly lookup: (typeName: string) => Effect.Effect<AnyKind, UnregisteredTypeError>
  /** Default instance of the kind registered under `typeName`. */
  readonly make: (typeName: string) => Effect.Effect<Serializable, UnregisteredTypeError>
  readonly has: (typeName: string) => Effect.Effect<boolean>
  readonly typeNames: Effect.Effect<ReadonlyArray<string>>
  /**
   * Make values written under `type.typeName` readable. Same rules as
   * `register`.
   */
  readonly registerInline: <A>(type: InlineVariantType<A>) => Effect.Effect<void, DuplicateRegistrationError>
  readonly decodeInline: (
    typeName: string,
    encoded: unknown,
  ) => Effect.Effect<Variant, UnregisteredTypeError | MalformedStreamError>
}

/**
 * Build a registry service seeded with `kinds`.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeTypeRegistry = (
  kinds: ReadonlyArray<AnyKind>,
  inline: ReadonlyArray<InlineDecoder> = [],
): Effect.Effect<TypeRegistryService, DuplicateRegistrationError> =>
  Effect.gen(function* () {
    const ref = yield* Ref.make(HashMap.empty<string, AnyKind>())
    const decoders = yield* Ref.make(HashMap.empty<string, InlineDecoder>())

    const addDecoder = (decoder: InlineDecoder): Effect.Effect<void, DuplicateRegistrationError> =>
      Effect.gen(function* () {
        const registered = yield* Ref.get(decoders)
        const existing = HashMap.get(registered, decoder.typeName)
        if (Option.isSome(existing)) {
          if (existing.value.type === decoder.type) {
            return
          }
          return yield* Effect.fail(new DuplicateRegistrationError({ typeName: decoder.typeName }))
        }
        yield* Ref.set(decoders, HashMap.set(registered, decoder.typeName, decoder))
      })

    const lookup = (typeName: string): Effect.Effect<AnyKind, UnregisteredTypeError> =>
      Effect.flatMap(Ref.get(ref), (registered) =>
        Option.match(HashMap.get(registered, typeName), {
          onNone: () => Effect.fail(new UnregisteredTypeError({ typeName })),
          onSome: (kind) => Effect.succeed(kind),
        }),
      )

    const service: TypeRegistryService = {
      register: (kind) =>
        Effect.gen(function* () {
          const registered = yield* Ref.get(ref)
          const existing = HashMap.get(registered, kind.typeName)
          if (Option.isSome(existing)) {
            if (existing.value === kind) {
              return
            }
            return yield* Effect.fail(new DuplicateRegistrationError({ typeName: kind.typeName }))
          }
          yield* Ref.set(ref, HashMap.set(registered, kind.typeName, kind))
        }),
      lookup,
      make: (typeName) => Effect.map(lookup(typeName), (kind) => kind.make()),
      has: (typeName) => Effect.map(Ref.get(ref), HashMap.has(typeName)),
      typeNames: Effect.map(Ref.get(ref), (registered) => Array.from(HashMap.keys(registered)).sort()),
      registerInline: (type) => addDecoder(inlineDecoder(type)),
      decodeInline: (typeName, encoded) =>
        Effect.flatMap(Ref.get(decoders), (registered): Effect.Effect<Variant, UnregisteredTypeError | MalformedStreamError> =>
          Option.match(HashMap.get(registered, typeName), {
            onNone: () => Effect.fail(new UnregisteredTypeError({ typeName })),
            onSome: (decoder) =>
              Either.match(Variant.decodeInline(decoder, encoded), {
                onLeft: (error) => Effect.fail(error),
                onRight: (variant) => Effect.succeed(variant),
              }),
          }),
        ),
    }

    yield* Effect.forEach([...BuiltinInlineDecoders, ...inline], addDecoder, { discard: true })
    yield* Effect.forEach(kinds, service.register, { discard: true })
    return service
  })

/**
 * Context tag for the process-wide type registry.
 *
 * @category Services
 * @since 0.1.0
 */
export class TypeRegistry extends Context.Tag("effect-model-graph/TypeRegistry")<
  TypeRegistry,
  TypeRegistryService
>() {
  /**
   * Registry seeded with `kinds`, by default every kind this library defines,
   * and with readers for `inline` descriptors on top of the built-in ones.
   */
  static layer(kinds: ReadonlyArray<AnyKind> = CoreKinds, inline: ReadonlyArray<InlineDecoder> = []) {
    return Layer.effect(this, makeTypeRegistry(kinds, inline))
  }

  /**
   * Registry with no kinds registered.
   */
  static readonly empty = Layer.effect(this, makeTypeRegistry([]))
}

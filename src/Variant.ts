/**
 * Variant: a runtime-typed box holding exactly one value of a type unknown at
 * compile time.
 *
 * A variant pairs the value with a {@link VariantType} descriptor. Reading the
 * value back requires presenting a descriptor with the same type name whose
 * guard accepts the held value; anything else fails with
 * {@link TypeMismatchError}. There is no implicit conversion between
 * descriptors, so an `int` is never returned as a `double`.
 *
 * Descriptors also carry what the serializer needs to decide how to persist a
 * value: inline (primitives and arrays), recursively (serializable objects) or
 * not at all (pointers and opaque values).
 *
 * @since 0.1.0
 */

import { Data, Either, Equal, Equivalence, Hash, Option, Schema, identity } from "effect"
import { MalformedStreamError, TypeMismatchError } from "./Errors.js"
import type { Serializable, SerializableKind } from "./Serializable.js"
import { Int, pointerTypeName, vectorTypeName } from "./Types.js"

interface VariantTypeBase<A> {
  readonly typeName: string
  readonly is: (u: unknown) => u is A
  readonly copy: (value: A) => A
  readonly equivalence: Equivalence.Equivalence<A>
  readonly format: Option.Option<(value: A) => string>
}

/**
 * Schema-backed descriptor for values written inline into a stream.
 *
 * @since 0.1.0
 * @category Descriptors
 */
export interface InlineVariantType<A> extends VariantTypeBase<A> {
  readonly _tag: "Primitive" | "Array"
  readonly encode: (value: A) => unknown
  readonly decode: (encoded: unknown) => Option.Option<A>
}

/**
 * Descriptor for values that serialize themselves recursively.
 *
 * @since 0.1.0
 * @category Descriptors
 */
export interface SerializableVariantType<A> extends VariantTypeBase<A> {
  readonly _tag: "Serializable"
  readonly toSerializable: (value: A) => Serializable
}

/**
 * Descriptor for reference-like values. Copies share the referent.
 *
 * @since 0.1.0
 * @category Descriptors
 */
export interface PointerVariantType<A> extends VariantTypeBase<A> {
  readonly _tag: "Pointer"
}

/**
 * Descriptor for values that can be held and copied but never persisted.
 *
 * @since 0.1.0
 * @category Descriptors
 */
export interface OpaqueVariantType<A> extends VariantTypeBase<A> {
  readonly _tag: "Opaque"
}

/**
 * @since 0.1.0
 * @category Descriptors
 */
export type VariantType<A> =
  | InlineVariantType<A>
  | SerializableVariantType<A>
  | PointerVariantType<A>
  | OpaqueVariantType<A>

/**
 * How a held value presents itself to a serializer.
 *
 * @since 0.1.0
 * @category Models
 */
export type VariantContents = Data.TaggedEnum<{
  Empty: {}
  Inline: { readonly typeName: string; readonly encoded: unknown }
  Object: { readonly object: Serializable }
  Pointer: { readonly typeName: string }
  Opaque: { readonly typeName: string }
}>

/**
 * @since 0.1.0
 * @category Models
 */
export const VariantContents = Data.taggedEnum<VariantContents>()

/**
 * Type name reported by an empty variant.
 *
 * @since 0.1.0
 */
export const EMPTY_TYPE_NAME = "void"

const formatScalar = (value: unknown): string => String(value)

/**
 * Descriptor for a scalar value validated by `schema`.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const primitiveType = <A, I>(
  typeName: string,
  schema: Schema.Schema<A, I>,
): InlineVariantType<A> => ({
  _tag: "Primitive",
  typeName,
  is: Schema.is(schema),
  copy: identity,
  equivalence: Schema.equivalence(schema),
  format: Option.some(formatScalar),
  encode: Schema.encodeSync(schema),
  decode: Schema.decodeUnknownOption(schema),
})

/**
 * Descriptor for an ordered sequence of `element` values. Copies are
 * element-wise.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const vectorType = <A, I>(
  elementTypeName: string,
  element: Schema.Schema<A, I>,
): InlineVariantType<ReadonlyArray<A>> => {
  const schema = Schema.Array(element)
  return {
    _tag: "Array",
    typeName: vectorTypeName(elementTypeName),
    is: Schema.is(schema),
    copy: (values) => [...values],
    equivalence: Schema.equivalence(schema),
    format: Option.some((values) => `[${values.map(formatScalar).join(", ")}]`),
    encode: Schema.encodeSync(schema),
    decode: Schema.decodeUnknownOption(schema),
  }
}

/**
 * Descriptor for instances of a serializable kind. Uses the kind's own
 * `format` when it has one.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const serializableType = <A extends Serializable>(
  kind: SerializableKind<A>,
): SerializableVariantType<A> => ({
  _tag: "Serializable",
  typeName: kind.typeName,
  is: (u): u is A => kind.is(u),
  copy: (value) => kind.copy(value),
  equivalence: (self, that) => Equal.equals(self, that),
  format: Option.fromNullable(kind.format),
  toSerializable: identity,
})

/**
 * Descriptor for a reference to an object owned elsewhere.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const pointerType = <A extends object>(
  typeName: string,
  is: (u: unknown) => u is A,
  format?: (value: A) => string,
): PointerVariantType<A> => ({
  _tag: "Pointer",
  typeName,
  is,
  copy: identity,
  equivalence: (self, that) => self === that,
  format: Option.fromNullable(format),
})

/**
 * Pointer descriptor for instances of a serializable kind, named `Kind*`.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const pointerTo = <A extends Serializable>(kind: SerializableKind<A>): PointerVariantType<A> =>
  pointerType(pointerTypeName(kind.typeName), (u): u is A => kind.is(u))

/**
 * Descriptor for a value that may be held but not persisted.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const opaqueType = <A>(
  typeName: string,
  options: {
    readonly is: (u: unknown) => u is A
    readonly copy: (value: A) => A
    readonly equivalence?: Equivalence.Equivalence<A>
    readonly format?: (value: A) => string
  },
): OpaqueVariantType<A> => ({
  _tag: "Opaque",
  typeName,
  is: options.is,
  copy: options.copy,
  equivalence: options.equivalence ?? Equal.equivalence<A>(),
  format: Option.fromNullable(options.format),
})

const IntSchema = Schema.Number.pipe(Schema.fromBrand(Int))

/** @since 0.1.0 @category Descriptors */
export const DoubleType = primitiveType("double", Schema.Number)
/** @since 0.1.0 @category Descriptors */
export const IntType = primitiveType("int", IntSchema)
/** @since 0.1.0 @category Descriptors */
export const BooleanType = primitiveType("bool", Schema.Boolean)
/** @since 0.1.0 @category Descriptors */
export const StringType = primitiveType("string", Schema.String)
/** @since 0.1.0 @category Descriptors */
export const DoubleVectorType = vectorType("double", Schema.Number)
/** @since 0.1.0 @category Descriptors */
export const IntVectorType = vectorType("int", IntSchema)
/** @since 0.1.0 @category Descriptors */
export const StringVectorType = vectorType("string", Schema.String)

// Existential view of a held value: closes over the descriptor so nothing
// downstream needs to know `A`.
interface Held {
  readonly typeName: string
  readonly category: VariantType<unknown>["_tag"]
  readonly value: unknown
  readonly copy: () => Held
  readonly equals: (that: Held) => boolean
  readonly format: () => string
  readonly contents: () => VariantContents
}

const contentsOf = <A>(type: VariantType<A>, value: A): VariantContents => {
  switch (type._tag) {
    case "Primitive":
    case "Array":
      return VariantContents.Inline({ typeName: type.typeName, encoded: type.encode(value) })
    case "Serializable":
      return VariantContents.Object({ object: type.toSerializable(value) })
    case "Pointer":
      return VariantContents.Pointer({ typeName: type.typeName })
    case "Opaque":
      return VariantContents.Opaque({ typeName: type.typeName })
  }
}

const hold = <A>(type: VariantType<A>, value: A): Held => ({
  typeName: type.typeName,
  category: type._tag,
  value,
  copy: () => hold(type, type.copy(value)),
  equals: (that) =>
    that.typeName === type.typeName && type.is(that.value) && type.equivalence(value, that.value),
  format: () =>
    Option.match(type.format, {
      onNone: () => `<${type.typeName}>`,
      onSome: (format) => format(value),
    }),
  contents: () => contentsOf(type, value),
})

/**
 * Type-erased, runtime-checked single-value container.
 *
 * @since 0.1.0
 * @category Models
 * @example
 * ```ts
 * const weight = Variant.make(DoubleType, 0.25)
 * weight.getValue(DoubleType) // Either.right(0.25)
 * weight.getValue(IntType)    // Either.left(TypeMismatchError)
 * ```
 */
export class Variant implements Equal.Equal {
  #held: Option.Option<Held>

  private constructor(held: Option.Option<Held>) {
    this.#held = held
  }

  /**
   * Box a copy of `value` under `type`.
   */
  static make<A>(type: VariantType<A>, value: A): Variant {
    return new Variant(Option.some(hold(type, type.copy(value))))
  }

  static empty(): Variant {
    return new Variant(Option.none())
  }

  /**
   * Rebuild an inline value from its encoded form, as written by a
   * serializer.
   */
  static decodeInline(
    decoder: InlineDecoder,
    encoded: unknown,
  ): Either.Either<Variant, MalformedStreamError> {
    return Either.fromOption(
      decoder.decode(encoded),
      () => new MalformedStreamError({ reason: `value is not a valid "${decoder.typeName}"` }),
    )
  }

  get typeName(): string {
    return Option.match(this.#held, {
      onNone: () => EMPTY_TYPE_NAME,
      onSome: (held) => held.typeName,
    })
  }

  isEmpty(): boolean {
    return Option.isNone(this.#held)
  }

  isType<A>(type: VariantType<A>): boolean {
    return Either.isRight(this.getValue(type))
  }

  getValue<A>(type: VariantType<A>): Either.Either<A, TypeMismatchError> {
    const held = this.#held
    if (Option.isSome(held) && held.value.typeName === type.typeName) {
      const value = held.value.value
      if (type.is(value)) {
        return Either.right(value)
      }
    }
    return Either.left(new TypeMismatchError({ expected: type.typeName, actual: this.typeName }))
  }

  /**
   * Like {@link getValue} but throws the {@link TypeMismatchError}.
   */
  getOrThrow<A>(type: VariantType<A>): A {
    return Either.getOrThrowWith(this.getValue(type), identity)
  }

  /**
   * Replace the held value and its type in one step.
   */
  set<A>(type: VariantType<A>, value: A): void {
    this.#held = Option.some(hold(type, type.copy(value)))
  }

  /**
   * Replace the held value with a deep copy of `other`'s.
   */
  assign(other: Variant): void {
    this.#held = Option.map(other.#held, (held) => held.copy())
  }

  clear(): void {
    this.#held = Option.none()
  }

  clone(): Variant {
    return new Variant(Option.map(this.#held, (held) => held.copy()))
  }

  isPrimitiveType(): boolean {
    return this.hasCategory("Primitive")
  }

  isSerializable(): boolean {
    return this.hasCategory("Serializable")
  }

  isPointer(): boolean {
    return this.hasCategory("Pointer")
  }

  contents(): VariantContents {
    return Option.match(this.#held, {
      onNone: () => VariantContents.Empty(),
      onSome: (held) => held.contents(),
    })
  }

  /**
   * Diagnostic rendering. Not a serialization path.
   */
  toString(): string {
    return Option.match(this.#held, {
      onNone: () => `<${EMPTY_TYPE_NAME}>`,
      onSome: (held) => held.format(),
    })
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    if (!(that instanceof Variant)) {
      return false
    }
    const self = this.#held
    const other = that.#held
    if (Option.isNone(self) || Option.isNone(other)) {
      return Option.isNone(self) && Option.isNone(other)
    }
    return self.value.equals(other.value)
  }

  [Hash.symbol](): number {
    return Hash.string(this.typeName)
  }

  private hasCategory(category: Held["category"]): boolean {
    return Option.exists(this.#held, (held) => held.category === category)
  }
}

/**
 * Type-erased reader for one inline descriptor, as kept by the type registry.
 *
 * @since 0.1.0
 * @category Models
 */
export interface InlineDecoder {
  readonly type: object
  readonly typeName: string
  readonly decode: (encoded: unknown) => Option.Option<Variant>
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const inlineDecoder = <A>(type: InlineVariantType<A>): InlineDecoder => ({
  type,
  typeName: type.typeName,
  decode: (encoded) => Option.map(type.decode(encoded), (value) => Variant.make(type, value)),
})

/**
 * Readers for the built-in primitive and vector descriptors.
 *
 * @since 0.1.0
 * @category Descriptors
 */
export const BuiltinInlineDecoders: ReadonlyArray<InlineDecoder> = [
  inlineDecoder(DoubleType),
  inlineDecoder(IntType),
  inlineDecoder(BooleanType),
  inlineDecoder(StringType),
  inlineDecoder(DoubleVectorType),
  inlineDecoder(IntVectorType),
  inlineDecoder(StringVectorType),
]

/**
 * Property tree: the logical stream a serializer produces.
 *
 * An object is its type name plus an ordered list of named, tagged property
 * values. Nested objects carry their own type name, which is the only thing
 * a deserializer uses to pick the concrete kind to rebuild.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"
import { TypeName } from "./Types.js"

/**
 * @since 0.1.0
 * @category Models
 */
export interface SerializedObject {
  readonly typeName: string
  readonly properties: ReadonlyArray<Property>
}

/**
 * @since 0.1.0
 * @category Models
 */
export interface Property {
  readonly name: string
  readonly value: PropertyValue
}

/**
 * @since 0.1.0
 * @category Models
 */
export type PropertyValue =
  | { readonly _tag: "Double"; readonly value: number }
  | { readonly _tag: "Int"; readonly value: number }
  | { readonly _tag: "Boolean"; readonly value: boolean }
  | { readonly _tag: "String"; readonly value: string }
  | { readonly _tag: "DoubleArray"; readonly values: ReadonlyArray<number> }
  | { readonly _tag: "IntArray"; readonly values: ReadonlyArray<number> }
  | { readonly _tag: "StringArray"; readonly values: ReadonlyArray<string> }
  | { readonly _tag: "Object"; readonly object: SerializedObject }
  | { readonly _tag: "ObjectArray"; readonly objects: ReadonlyArray<SerializedObject> }
  | { readonly _tag: "Value"; readonly typeName: string; readonly value: unknown }
  | { readonly _tag: "Empty" }

/**
 * @since 0.1.0
 * @category Models
 */
export type PropertyTag = PropertyValue["_tag"]

/**
 * Narrow a property value to the variant carrying `tag`.
 *
 * @since 0.1.0
 * @category Guards
 */
export const hasTag = <T extends PropertyTag>(
  value: PropertyValue,
  tag: T,
): value is Extract<PropertyValue, { readonly _tag: T }> => value._tag === tag

const FiniteNumber = Schema.Number.pipe(Schema.finite())

const SerializedObjectRef = Schema.suspend((): Schema.Schema<SerializedObject> => SerializedObject)

/**
 * @since 0.1.0
 * @category Schemas
 */
export const PropertyValue: Schema.Schema<PropertyValue> = Schema.Union(
  Schema.TaggedStruct("Double", { value: FiniteNumber }),
  Schema.TaggedStruct("Int", { value: Schema.Int }),
  Schema.TaggedStruct("Boolean", { value: Schema.Boolean }),
  Schema.TaggedStruct("String", { value: Schema.String }),
  Schema.TaggedStruct("DoubleArray", { values: Schema.Array(FiniteNumber) }),
  Schema.TaggedStruct("IntArray", { values: Schema.Array(Schema.Int) }),
  Schema.TaggedStruct("StringArray", { values: Schema.Array(Schema.String) }),
  Schema.TaggedStruct("Object", { object: SerializedObjectRef }),
  Schema.TaggedStruct("ObjectArray", { objects: Schema.Array(SerializedObjectRef) }),
  Schema.TaggedStruct("Value", { typeName: TypeName, value: Schema.Unknown }),
  Schema.TaggedStruct("Empty", {}),
)

/**
 * @since 0.1.0
 * @category Schemas
 */
export const Property: Schema.Schema<Property> = Schema.Struct({
  name: Schema.String,
  value: PropertyValue,
})

/**
 * @since 0.1.0
 * @category Schemas
 */
export const SerializedObject: Schema.Schema<SerializedObject> = Schema.Struct({
  typeName: TypeName,
  properties: Schema.Array(Property),
})

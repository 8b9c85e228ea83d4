import { describe, it, expect } from "@effect/vitest"
import { Effect, Equal } from "effect"
import { Deserializer, deserialize, deserializeAs, deserializeInto } from "../src/Deserializer.js"
import { CoreKinds } from "../src/Kinds.js"
import { LinearPredictor } from "../src/LinearPredictor.js"
import { Model } from "../src/Model.js"
import type { SerializedObject } from "../src/PropertyTree.js"
import { Serializer, serialize } from "../src/Serializer.js"
import { TypeRegistry } from "../src/TypeRegistry.js"
import { Int } from "../src/Types.js"
import {
  IntType,
  StringVectorType,
  Variant,
  inlineDecoder,
  opaqueType,
  pointerTo,
  serializableType,
} from "../src/Variant.js"
import { FloatType, Tagged } from "./fixtures.js"

const registryWithTagged = TypeRegistry.layer([...CoreKinds, Tagged.kind])

const predictorTree: SerializedObject = {
  typeName: "LinearPredictor",
  properties: [
    { name: "weights", value: { _tag: "DoubleArray", values: [2, -1] } },
    { name: "bias", value: { _tag: "Double", value: 0.5 } },
  ],
}

describe("Serializer", () => {
  it.effect("writes the root type name and properties in order", () =>
    Effect.gen(function* () {
      const tree = yield* serialize(new LinearPredictor([2, -1], 0.5))

      expect(tree).toStrictEqual(predictorTree)
    }),
  )

  it.effect("rejects non-finite doubles", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(serialize(new LinearPredictor([Number.NaN], 0)))

      expect(error._tag).toBe("UnserializableValueError")
      expect(error.typeName).toBe("vector(double)")
      expect(error.reason).toBe("non-finite number")
    }),
  )

  it.effect("rejects non-integral ints", () =>
    Effect.gen(function* () {
      const serializer = new Serializer()
      const error = yield* Effect.flip(serializer.writeInt("count", 1.5))

      expect(error.reason).toBe("not a safe integer")
      expect(serializer.properties).toHaveLength(0)
    }),
  )

  it.effect("writes inline variants with their type name", () =>
    Effect.gen(function* () {
      const tree = yield* serialize(new Tagged("count", Variant.make(IntType, Int(3))))

      expect(tree.properties[1]).toStrictEqual({
        name: "payload",
        value: { _tag: "Value", typeName: "int", value: 3 },
      })
    }),
  )

  it.effect("refuses pointer variants", () =>
    Effect.gen(function* () {
      const pointer = Variant.make(pointerTo(LinearPredictor.kind), new LinearPredictor())
      const error = yield* Effect.flip(serialize(new Tagged("ref", pointer)))

      expect(error.typeName).toBe("LinearPredictor*")
      expect(error.reason).toBe("pointer values cannot be persisted")
    }),
  )

  it.effect("refuses opaque variants", () =>
    Effect.gen(function* () {
      const ClockType = opaqueType<Date>("clock", {
        is: (u): u is Date => u instanceof Date,
        copy: (date) => new Date(date.getTime()),
      })
      const error = yield* Effect.flip(serialize(new Tagged("now", Variant.make(ClockType, new Date(0)))))

      expect(error.typeName).toBe("clock")
      expect(error.reason).toBe("type has no serialized form")
    }),
  )
})

describe("Deserializer", () => {
  it.effect("round-trips a predictor", () =>
    Effect.gen(function* () {
      const original = new LinearPredictor([2, -1], 0.5)
      const restored = yield* deserializeAs(LinearPredictor.kind, yield* serialize(original))

      expect(restored).not.toBe(original)
      expect(Equal.equals(restored, original)).toBe(true)
    }).pipe(Effect.provide(TypeRegistry.layer())),
  )

  it.effect("picks the concrete kind from the type name", () =>
    Effect.gen(function* () {
      const restored = yield* deserialize(predictorTree)

      expect(restored).toBeInstanceOf(LinearPredictor)
      expect(restored.runtimeTypeName).toBe("LinearPredictor")
    }).pipe(Effect.provide(TypeRegistry.layer())),
  )

  it.effect("round-trips inline, empty and serializable variants", () =>
    Effect.gen(function* () {
      const inline = new Tagged("names", Variant.make(StringVectorType, ["a", "b"]))
      const empty = new Tagged("nothing", Variant.empty())
      const nested = new Tagged(
        "model",
        Variant.make(serializableType(LinearPredictor.kind), new LinearPredictor([3], 1)),
      )

      const restoredInline = yield* deserializeAs(Tagged.kind, yield* serialize(inline))
      const restoredEmpty = yield* deserializeAs(Tagged.kind, yield* serialize(empty))
      const restoredNested = yield* deserializeAs(Tagged.kind, yield* serialize(nested))

      expect(restoredInline.label).toBe("names")
      expect(restoredInline.payload.getOrThrow(StringVectorType)).toEqual(["a", "b"])
      expect(restoredEmpty.payload.isEmpty()).toBe(true)
      expect(Equal.equals(restoredNested.payload, nested.payload)).toBe(true)
    }).pipe(Effect.provide(registryWithTagged)),
  )

  it.effect("round-trips a variant of a registered custom inline type", () =>
    Effect.gen(function* () {
      const original = new Tagged("f", Variant.make(FloatType, 1.25))
      const tree = yield* serialize(original)
      const restored = yield* deserializeAs(Tagged.kind, tree)

      expect(tree.properties[1]).toEqual({
        name: "payload",
        value: { _tag: "Value", typeName: "float", value: 1.25 },
      })
      expect(restored.payload.getOrThrow(FloatType)).toBe(1.25)
    }).pipe(Effect.provide(TypeRegistry.layer([...CoreKinds, Tagged.kind], [inlineDecoder(FloatType)]))),
  )

  it.effect("fails on an inline type name with no registered reader", () =>
    Effect.gen(function* () {
      const tree = yield* serialize(new Tagged("f", Variant.make(FloatType, 1.25)))
      const error = yield* Effect.flip(deserializeAs(Tagged.kind, tree))

      expect(error._tag).toBe("UnregisteredTypeError")
      if (error._tag === "UnregisteredTypeError") {
        expect(error.typeName).toBe("float")
      }
    }).pipe(Effect.provide(registryWithTagged)),
  )

  it.effect("fails on a type name with no registered kind", () =>
    Effect.gen(function* () {
      const tree = yield* serialize(new Tagged("label", Variant.empty()))
      const error = yield* Effect.flip(deserialize(tree))

      expect(error._tag).toBe("UnregisteredTypeError")
      if (error._tag === "UnregisteredTypeError") {
        expect(error.typeName).toBe("Tagged")
      }
    }).pipe(Effect.provide(TypeRegistry.layer())),
  )

  it.effect("fails when a property name does not match", () =>
    Effect.gen(function* () {
      const tree: SerializedObject = {
        typeName: "LinearPredictor",
        properties: [
          { name: "bias", value: { _tag: "Double", value: 0.5 } },
          { name: "weights", value: { _tag: "DoubleArray", values: [2, -1] } },
        ],
      }
      const error = yield* Effect.flip(deserialize(tree))

      expect(error._tag).toBe("MalformedStreamError")
      if (error._tag === "MalformedStreamError") {
        expect(error.reason).toBe('expected property "weights" of "LinearPredictor" but found "bias"')
      }
    }).pipe(Effect.provide(TypeRegistry.layer())),
  )

  it.effect("fails when a property has the wrong tag", () =>
    Effect.gen(function* () {
      const tree: SerializedObject = {
        typeName: "LinearPredictor",
        properties: [{ name: "weights", value: { _tag: "Double", value: 2 } }],
      }
      const error = yield* Effect.flip(deserialize(tree))

      expect(error.message).toBe(
        'Malformed stream: property "weights" of "LinearPredictor" is a Double, expected DoubleArray',
      )
    }).pipe(Effect.provide(TypeRegistry.layer())),
  )

  it.effect("fails when properties run out", () =>
    Effect.gen(function* () {
      const tree: SerializedObject = {
        typeName: "LinearPredictor",
        properties: [{ name: "weights", value: { _tag: "DoubleArray", values: [] } }],
      }
      const error = yield* Effect.flip(deserialize(tree))

      expect(error.message).toBe(
        'Malformed stream: expected property "bias" of "LinearPredictor" but the object has no more properties',
      )
    }).pipe(Effect.provide(TypeRegistry.layer())),
  )

  it.effect("fails when properties are left unread", () =>
    Effect.gen(function* () {
      const tree: SerializedObject = {
        typeName: "LinearPredictor",
        properties: [...predictorTree.properties, { name: "extra", value: { _tag: "Empty" } }],
      }
      const error = yield* Effect.flip(deserialize(tree))

      expect(error.message).toBe('Malformed stream: "LinearPredictor" left properties unread: extra')
    }).pipe(Effect.provide(TypeRegistry.layer())),
  )

  it.effect("deserializeAs rejects another kind", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(deserializeAs(Model.kind, predictorTree))

      expect(error.message).toBe('Malformed stream: expected a "Model" but the stream holds a "LinearPredictor"')
    }).pipe(Effect.provide(TypeRegistry.layer())),
  )

  it.effect("deserializeInto populates an existing instance", () =>
    Effect.gen(function* () {
      const target = new LinearPredictor()
      yield* deserializeInto(target, predictorTree)

      expect(target.weights).toEqual([2, -1])
      expect(target.bias).toBe(0.5)

      const error = yield* Effect.flip(deserializeInto(new Model(), predictorTree))
      expect(error.message).toBe('Malformed stream: cannot read a "LinearPredictor" into a "Model"')
    }).pipe(Effect.provide(TypeRegistry.layer())),
  )

  it.effect("reads properties through an explicit cursor", () =>
    Effect.gen(function* () {
      const registry = yield* TypeRegistry
      const deserializer = new Deserializer(predictorTree, registry)

      expect(deserializer.remaining).toBe(2)
      expect(yield* deserializer.readDoubles("weights")).toEqual([2, -1])
      expect(yield* deserializer.readDouble("bias")).toBe(0.5)
      expect(deserializer.remaining).toBe(0)
      yield* deserializer.finish()
    }).pipe(Effect.provide(TypeRegistry.layer())),
  )
})

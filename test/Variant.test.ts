import { describe, it, expect } from "@effect/vitest"
import { Either, Equal } from "effect"
import { LinearPredictor } from "../src/LinearPredictor.js"
import { Int } from "../src/Types.js"
import {
  BooleanType,
  BuiltinInlineDecoders,
  DoubleType,
  DoubleVectorType,
  IntType,
  IntVectorType,
  StringType,
  StringVectorType,
  Variant,
  inlineDecoder,
  opaqueType,
  pointerTo,
  serializableType,
} from "../src/Variant.js"

interface Handle {
  readonly fd: number
}

const HandleType = opaqueType<Handle>("handle", {
  is: (u): u is Handle => typeof u === "object" && u !== null && "fd" in u,
  copy: (handle) => ({ fd: handle.fd }),
})

const PredictorType = serializableType(LinearPredictor.kind)

describe("Variant", () => {
  describe("retrieval", () => {
    it("returns the held value under its own type", () => {
      const weight = Variant.make(DoubleType, 0.25)

      expect(weight.typeName).toBe("double")
      expect(Either.getOrThrow(weight.getValue(DoubleType))).toBe(0.25)
      expect(weight.isType(DoubleType)).toBe(true)
    })

    it("refuses another type, including numeric widening", () => {
      const count = Variant.make(IntType, Int(3))

      const error = Either.getOrThrow(Either.flip(count.getValue(DoubleType)))
      expect(error._tag).toBe("TypeMismatchError")
      expect(error.expected).toBe("double")
      expect(error.actual).toBe("int")
      expect(count.isType(DoubleType)).toBe(false)
    })

    it("throws the mismatch from getOrThrow", () => {
      const flag = Variant.make(BooleanType, true)

      expect(flag.getOrThrow(BooleanType)).toBe(true)
      expect(() => flag.getOrThrow(StringType)).toThrow('Variant holds "bool" but "string" was requested')
    })
  })

  describe("empty", () => {
    it("reports the void type", () => {
      const empty = Variant.empty()

      expect(empty.isEmpty()).toBe(true)
      expect(empty.typeName).toBe("void")
      expect(empty.toString()).toBe("<void>")
      expect(empty.contents()._tag).toBe("Empty")
    })

    it("fails retrieval with the void type as actual", () => {
      const error = Either.getOrThrow(Either.flip(Variant.empty().getValue(IntType)))

      expect(error.actual).toBe("void")
    })
  })

  describe("reassignment", () => {
    it("replaces type and value together", () => {
      const variant = Variant.make(DoubleType, 1)
      variant.set(StringType, "one")

      expect(variant.typeName).toBe("string")
      expect(variant.getOrThrow(StringType)).toBe("one")
      expect(Either.isLeft(variant.getValue(DoubleType))).toBe(true)
    })

    it("assign deep copies the source value", () => {
      const source = Variant.make(DoubleVectorType, [1, 2])
      const target = Variant.make(BooleanType, false)

      target.assign(source)

      expect(target.typeName).toBe("vector(double)")
      expect(target.getOrThrow(DoubleVectorType)).toEqual([1, 2])
      expect(target.getOrThrow(DoubleVectorType)).not.toBe(source.getOrThrow(DoubleVectorType))
    })

    it("clear empties the variant", () => {
      const variant = Variant.make(StringType, "x")
      variant.clear()

      expect(variant.isEmpty()).toBe(true)
    })
  })

  describe("copy semantics", () => {
    it("clones serializable values through their kind", () => {
      const predictor = new LinearPredictor([2, -1], 0.5)
      const original = Variant.make(PredictorType, predictor)
      const clone = original.clone()

      expect(clone.getOrThrow(PredictorType)).not.toBe(predictor)
      expect(Equal.equals(clone.getOrThrow(PredictorType), predictor)).toBe(true)
      expect(Equal.equals(original, clone)).toBe(true)
    })

    it("clones pointers by reference", () => {
      const predictor = new LinearPredictor([1], 0)
      const PointerType = pointerTo(LinearPredictor.kind)
      const clone = Variant.make(PointerType, predictor).clone()

      expect(clone.typeName).toBe("LinearPredictor*")
      expect(clone.getOrThrow(PointerType)).toBe(predictor)
      expect(clone.isPointer()).toBe(true)
    })
  })

  describe("classification", () => {
    it("tells primitives, serializables and pointers apart", () => {
      const primitive = Variant.make(DoubleType, 1)
      const serializable = Variant.make(PredictorType, new LinearPredictor())

      expect(primitive.isPrimitiveType()).toBe(true)
      expect(primitive.isSerializable()).toBe(false)
      expect(serializable.isSerializable()).toBe(true)
      expect(serializable.isPrimitiveType()).toBe(false)
      expect(serializable.isPointer()).toBe(false)
    })

    it("exposes inline contents with the encoded value", () => {
      const contents = Variant.make(IntVectorType, [Int(1), Int(2)]).contents()

      expect(contents._tag).toBe("Inline")
      if (contents._tag === "Inline") {
        expect(contents.typeName).toBe("vector(int)")
        expect(contents.encoded).toEqual([1, 2])
      }
    })
  })

  describe("toString", () => {
    it("formats primitives and vectors", () => {
      expect(Variant.make(DoubleType, 1.5).toString()).toBe("1.5")
      expect(Variant.make(IntVectorType, [Int(1), Int(2)]).toString()).toBe("[1, 2]")
    })

    it("formats serializable values through their kind", () => {
      const variant = Variant.make(PredictorType, new LinearPredictor([2, -1], 0.5))

      expect(variant.toString()).toBe("LinearPredictor(weights=[2, -1], bias=0.5)")
    })

    it("falls back to a placeholder", () => {
      expect(Variant.make(HandleType, { fd: 3 }).toString()).toBe("<handle>")
    })
  })

  describe("equality", () => {
    it("compares type and value", () => {
      expect(Equal.equals(Variant.make(DoubleType, 1), Variant.make(DoubleType, 1))).toBe(true)
      expect(Equal.equals(Variant.make(DoubleType, 1), Variant.make(DoubleType, 2))).toBe(false)
      expect(Equal.equals(Variant.make(DoubleType, 1), Variant.make(IntType, Int(1)))).toBe(false)
      expect(Equal.equals(Variant.empty(), Variant.empty())).toBe(true)
    })
  })

  describe("decodeInline", () => {
    it("rebuilds a value through its decoder", () => {
      const variant = Either.getOrThrow(Variant.decodeInline(inlineDecoder(StringVectorType), ["a", "b"]))

      expect(variant.getOrThrow(StringVectorType)).toEqual(["a", "b"])
    })

    it("fails on a value the type rejects", () => {
      const error = Either.getOrThrow(Either.flip(Variant.decodeInline(inlineDecoder(IntType), 1.5)))

      expect(error._tag).toBe("MalformedStreamError")
      expect(error.message).toBe('Malformed stream: value is not a valid "int"')
    })

    it("ships a decoder for every built-in inline descriptor", () => {
      expect(BuiltinInlineDecoders.map((decoder) => decoder.typeName)).toEqual([
        "double",
        "int",
        "bool",
        "string",
        "vector(double)",
        "vector(int)",
        "vector(string)",
      ])
    })
  })

  describe("ownership", () => {
    it("keeps its own copy of the value passed to make", () => {
      const source = [1, 2]
      const variant = Variant.make(DoubleVectorType, source)
      source.push(3)

      expect(variant.getOrThrow(DoubleVectorType)).toEqual([1, 2])
    })

    it("keeps its own copy of the value passed to set", () => {
      const source = ["a"]
      const variant = Variant.empty()
      variant.set(StringVectorType, source)
      source.push("b")

      expect(variant.getOrThrow(StringVectorType)).toEqual(["a"])
    })
  })
})

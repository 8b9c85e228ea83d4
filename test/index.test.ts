import { describe, it, expect } from "vitest"
import * as ModelGraph from "../src/index.js"

describe("public API export surface", () => {
  it("exposes core modules", () => {
    expect(ModelGraph).toHaveProperty("Variant")
    expect(ModelGraph).toHaveProperty("DoubleType")
    expect(ModelGraph).toHaveProperty("serialize")
    expect(ModelGraph).toHaveProperty("deserialize")
    expect(ModelGraph).toHaveProperty("TypeRegistry")
    expect(ModelGraph).toHaveProperty("Model")
    expect(ModelGraph).toHaveProperty("ModelMap")
    expect(ModelGraph).toHaveProperty("LinearPredictor")
    expect(ModelGraph).toHaveProperty("LinearPredictorNode")
    expect(ModelGraph).toHaveProperty("Archive")
    expect(ModelGraph).toHaveProperty("NodeId")
    expect(ModelGraph).toHaveProperty("TypeMismatchError")
  })
})

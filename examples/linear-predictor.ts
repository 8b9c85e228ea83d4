import { Effect, Layer } from "effect"
import { writeFileSync, mkdirSync } from "node:fs"
import { resolve } from "node:path"
import { Archive } from "../src/Archive.js"
import { LinearPredictor } from "../src/LinearPredictor.js"
import { Model } from "../src/Model.js"
import { ModelMap } from "../src/ModelMap.js"
import { InputNode } from "../src/Nodes.js"
import { TypeRegistry } from "../src/TypeRegistry.js"

const layer = Archive.layer.pipe(Layer.provide(TypeRegistry.layer()))

const program = Effect.gen(function* () {
  const predictor = new LinearPredictor([2, -1], 0.5)
  const model = new Model()
  const input = yield* model.addNode(new InputNode(predictor.dimension))
  const prediction = yield* predictor.addToModel(model, input.outputs)
  const map = yield* ModelMap.make({ model, inputs: { x: input.id }, outputs: { y: prediction } })

  const archive = yield* Archive
  const text = yield* archive.encode(map)
  const restored = yield* archive.decodeAs(ModelMap.kind, text)
  const [y] = yield* restored.compute({ x: [1, 1] })

  return { text, direct: predictor.predict([1, 1]), lowered: y }
}).pipe(Effect.provide(layer))

const outDir = resolve("examples/out")
const archivePath = resolve(outDir, "linear-predictor-map.json")

const writeOutputs = Effect.gen(function* () {
  yield* Effect.sync(() => mkdirSync(outDir, { recursive: true }))
  const { text, direct, lowered } = yield* program

  yield* Effect.sync(() => writeFileSync(archivePath, text, "utf-8"))
  yield* Effect.log(`predict([1, 1]) = ${direct}, lowered map = ${lowered}`)
})

Effect.runPromise(writeOutputs).catch((error) => {
  console.error("Failed to generate linear-predictor example", error)
  process.exitCode = 1
})

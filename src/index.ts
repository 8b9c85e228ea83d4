/**
 * @since 0.1.0
 */
export * from "./Errors.js"
export * from "./Types.js"
export * from "./Variant.js"
export * from "./Serializable.js"
export * from "./PropertyTree.js"
export * from "./Serializer.js"
export * from "./Deserializer.js"
export * from "./TypeRegistry.js"
export * from "./Kinds.js"
export * from "./Coordinate.js"
export * from "./Node.js"
export * from "./Nodes.js"
export * from "./Model.js"
export * from "./ModelMap.js"
export * from "./Evaluation.js"
export * from "./Predictor.js"
export * from "./LinearPredictor.js"
export * from "./LinearPredictorNode.js"
export * from "./Archive.js"

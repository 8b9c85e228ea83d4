/**
 * Every serializable kind defined by this library, in the order the default
 * type registry is seeded.
 *
 * @since 0.1.0
 */

import { LinearPredictor } from "./LinearPredictor.js"
import { LinearPredictorNode } from "./LinearPredictorNode.js"
import { Model } from "./Model.js"
import { ModelMap } from "./ModelMap.js"
import { CoordinatewiseNode, InputNode, SumNode } from "./Nodes.js"
import type { Serializable, SerializableKind } from "./Serializable.js"

/**
 * @since 0.1.0
 * @category Registry
 */
export const CoreKinds: ReadonlyArray<SerializableKind<Serializable>> = [
  Model.kind,
  ModelMap.kind,
  InputNode.kind,
  CoordinatewiseNode.kind,
  SumNode.kind,
  LinearPredictorNode.kind,
  LinearPredictor.kind,
]

/**
 * Archive: JSON text form of serializable objects.
 *
 * The archive is the only place this library touches text. It checks the
 * decoded tree against the {@link SerializedObject} schema before any kind is
 * constructed, and logs each encode and decode at debug level.
 *
 * @since 0.1.0
 */

import { Config, Context, Effect, Layer, Schema } from "effect"
import { deserialize, deserializeAs } from "./Deserializer.js"
import {
  MalformedStreamError,
  UnserializableValueError,
  type DeserializationError,
  type SerializationError,
} from "./Errors.js"
import { SerializedObject } from "./PropertyTree.js"
import type { Serializable, SerializableKind } from "./Serializable.js"
import { serialize } from "./Serializer.js"
import { TypeRegistry, type TypeRegistryService } from "./TypeRegistry.js"

/**
 * @since 0.1.0
 * @category Services
 */
export interface ArchiveService {
  readonly encode: (value: Serializable) => Effect.Effect<string, SerializationError>
  readonly decode: (text: string) => Effect.Effect<Serializable, DeserializationError>
  readonly decodeAs: <A extends Serializable>(
    kind: SerializableKind<A>,
    text: string,
  ) => Effect.Effect<A, DeserializationError>
}

/**
 * Indentation of encoded archives; `0` writes compact JSON.
 *
 * @since 0.1.0
 * @category Config
 */
export const ArchiveIndent = Config.integer("MODEL_ARCHIVE_INDENT").pipe(
  Config.withDefault(2),
  Config.validate({
    message: "MODEL_ARCHIVE_INDENT must be between 0 and 10",
    validation: (indent) => indent >= 0 && indent <= 10,
  }),
)

const logDecoding = (tree: SerializedObject): Effect.Effect<void> =>
  Effect.logDebug("decoding archive").pipe(Effect.annotateLogs("typeName", tree.typeName))

/**
 * Build an archive service over `registry`.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeArchive = (registry: TypeRegistryService, indent: number): ArchiveService => {
  const json = Schema.parseJson(SerializedObject, { space: indent })
  const encodeTree = Schema.encode(json)
  const decodeTree = Schema.decodeUnknown(json)

  const parse = (text: string): Effect.Effect<SerializedObject, MalformedStreamError> =>
    decodeTree(text).pipe(Effect.mapError((error) => new MalformedStreamError({ reason: error.message })))

  return {
    encode: (value) =>
      serialize(value).pipe(
        Effect.flatMap((tree) =>
          encodeTree(tree).pipe(
            Effect.mapError(
              (error) =>
                new UnserializableValueError({ typeName: value.runtimeTypeName, reason: error.message }),
            ),
          ),
        ),
        Effect.tap((text) =>
          Effect.logDebug("encoded archive").pipe(Effect.annotateLogs("length", text.length)),
        ),
        Effect.annotateLogs("typeName", value.runtimeTypeName),
        Effect.withLogSpan("Archive.encode"),
      ),
    decode: (text) =>
      parse(text).pipe(
        Effect.tap(logDecoding),
        Effect.flatMap(deserialize),
        Effect.provideService(TypeRegistry, registry),
        Effect.withLogSpan("Archive.decode"),
      ),
    decodeAs: (kind, text) =>
      parse(text).pipe(
        Effect.tap(logDecoding),
        Effect.flatMap((tree) => deserializeAs(kind, tree)),
        Effect.provideService(TypeRegistry, registry),
        Effect.withLogSpan("Archive.decode"),
      ),
  }
}

/**
 * Context tag for the archive.
 *
 * @category Services
 * @since 0.1.0
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const archive = yield* Archive
 *   const text = yield* archive.encode(new LinearPredictor([2, -1], 0.5))
 *   return yield* archive.decodeAs(LinearPredictor.kind, text)
 * })
 * program.pipe(Effect.provide(Archive.layer), Effect.provide(TypeRegistry.layer()))
 * ```
 */
export class Archive extends Context.Tag("effect-model-graph/Archive")<Archive, ArchiveService>() {
  static readonly layer = Layer.effect(
    this,
    Effect.gen(function* () {
      const registry = yield* TypeRegistry
      const indent = yield* ArchiveIndent
      yield* Effect.logDebug("archive ready").pipe(Effect.annotateLogs("indent", indent))
      return makeArchive(registry, indent)
    }),
  )
}

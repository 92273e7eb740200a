import { Effect, Either, Layer, pipe } from "effect";

export type { DirStats } from "./domain/DirStats";
export { TOP_EXTENSIONS, RECENT_WINDOW_MS, isHiddenName } from "./domain/DirStats";
export { Extension, fromFileName, label, tallyOf, tallyTotal, topEntries } from "./domain/Extension";
export type { ExtensionTally } from "./domain/Extension";
export {
  IMAGE_EXTENSIONS,
  VIDEO_EXTENSIONS,
  AUDIO_EXTENSIONS,
  DOCUMENT_EXTENSIONS,
  imageExtensions,
  videoExtensions,
  audioExtensions,
  documentExtensions,
  hasExtension
} from "./domain/ExtensionSets";
export { FileNotFound, DirectoryNotFound } from "./domain/errors";
export { formatSize, formatCount } from "./lib/formatSize";

export * from "./services/FileSystemService";
export * from "./services/GlobService";
export * from "./services/DirectoryAnalyzer";
export * from "./services/IoService";
export * from "./services/DirManager";
export * from "./services/LoggerService";

import { FileSystemServiceLive } from "./services/FileSystemService";
import { GlobServiceLive } from "./services/GlobService";
import { DirectoryAnalyzerLive } from "./services/DirectoryAnalyzer";
import { IoServiceLive } from "./services/IoService";
import { LoggerServiceLive } from "./services/LoggerService";

export const createAppLayer = () => {
  return Layer.mergeAll(
    LoggerServiceLive,
    GlobServiceLive,
    FileSystemServiceLive,
    pipe(Layer.mergeAll(DirectoryAnalyzerLive, IoServiceLive), Layer.provide(FileSystemServiceLive))
  );
};

export const AppLive = createAppLayer();

export type AppServices = Layer.Layer.Success<typeof AppLive>;

/**
 * Run a program against the live services synchronously. Typed failures come
 * back as `Left`; defects are thrown.
 */
export const runSync = <A, E>(effect: Effect.Effect<A, E, AppServices>): Either.Either<A, E> =>
  Effect.runSync(Effect.either(Effect.provide(effect, AppLive)));

/**
 * GlobService - abstracts pattern matching for testability.
 *
 * Live implementation uses the glob package's synchronous matcher.
 * Hidden entries are matched by wildcards, and both files and directories
 * are returned unless `onlyFiles` is set.
 */

import { Context, Data, Effect, Layer } from "effect";
import { globSync } from "glob";

export class GlobPermissionDenied extends Data.TaggedError("GlobPermissionDenied")<{
  readonly path: string;
  readonly pattern: string;
}> {}

export class GlobFailed extends Data.TaggedError("GlobFailed")<{
  readonly path: string;
  readonly pattern: string;
  readonly reason: string;
}> {}

export type GlobError = GlobPermissionDenied | GlobFailed;

export interface GlobService {
  /** Paths matching `pattern`, relative to `cwd`. */
  readonly scan: (
    pattern: string,
    cwd: string,
    options?: { readonly onlyFiles?: boolean }
  ) => Effect.Effect<ReadonlyArray<string>, GlobError>;
}

export class GlobServiceTag extends Context.Tag("GlobService")<GlobServiceTag, GlobService>() {}

const toGlobError = (cwd: string, pattern: string, error: unknown): GlobError => {
  const code =
    typeof error === "object" && error !== null && "code" in error && typeof error.code === "string"
      ? error.code.toUpperCase()
      : undefined;

  if (code === "EACCES" || code === "EPERM") {
    return new GlobPermissionDenied({ path: cwd, pattern });
  }

  return new GlobFailed({
    path: cwd,
    pattern,
    reason: error instanceof Error ? error.message : String(error),
  });
};

export const GlobServiceLive = Layer.succeed(GlobServiceTag, {
  scan: (pattern, cwd, options = {}) =>
    Effect.try({
      try: () => globSync(pattern, { cwd, dot: true, nodir: options.onlyFiles ?? false }),
      catch: (error) => toGlobError(cwd, pattern, error),
    }),
});

/**
 * FileSystemService - the single gateway to the host filesystem.
 *
 * Live implementation wraps the blocking node:fs calls in Effect.try, so
 * every program built on it can run with Effect.runSync. All errors are
 * caught and converted to typed errors.
 */

import { Context, Data, Effect, Layer, pipe } from "effect";
import * as fs from "node:fs";

// =============================================================================
// Typed errors - all possible failures from node:fs
// =============================================================================

export class PathNotFound extends Data.TaggedError("PathNotFound")<{
  readonly path: string;
}> {}

export class PathPermissionDenied extends Data.TaggedError("PathPermissionDenied")<{
  readonly path: string;
}> {}

export class PathAlreadyExists extends Data.TaggedError("PathAlreadyExists")<{
  readonly path: string;
}> {}

export class NotADirectory extends Data.TaggedError("NotADirectory")<{
  readonly path: string;
}> {}

export class IsADirectory extends Data.TaggedError("IsADirectory")<{
  readonly path: string;
}> {}

export class DirectoryNotEmpty extends Data.TaggedError("DirectoryNotEmpty")<{
  readonly path: string;
}> {}

export class CrossDeviceLink extends Data.TaggedError("CrossDeviceLink")<{
  readonly path: string;
}> {}

export class FsUnknownError extends Data.TaggedError("FsUnknownError")<{
  readonly path: string;
  readonly reason: string;
}> {}

export type FsError =
  | PathNotFound
  | PathPermissionDenied
  | PathAlreadyExists
  | NotADirectory
  | IsADirectory
  | DirectoryNotEmpty
  | CrossDeviceLink
  | FsUnknownError;

// =============================================================================
// Service interface
// =============================================================================

export type FileType = "File" | "Directory" | "SymbolicLink" | "Other";

export interface FileInfo {
  readonly type: FileType;
  readonly size: number;
  readonly mtime: Date;
  readonly atime: Date;
  readonly mode: number;
  readonly dev: number;
  readonly ino: number;
}

export interface FileSystemService {
  /** Metadata of the path itself; symbolic links are not followed. */
  readonly lstat: (path: string) => Effect.Effect<FileInfo, FsError>;
  /** Metadata of what the path resolves to. */
  readonly stat: (path: string) => Effect.Effect<FileInfo, FsError>;
  readonly exists: (path: string) => Effect.Effect<boolean>;
  /** Entry names of a directory, in the order the OS returns them. */
  readonly readDirectory: (path: string) => Effect.Effect<ReadonlyArray<string>, FsError>;
  readonly makeDirectory: (
    path: string,
    options?: { readonly recursive?: boolean }
  ) => Effect.Effect<void, FsError>;
  readonly removeDirectory: (
    path: string,
    options?: { readonly recursive?: boolean }
  ) => Effect.Effect<void, FsError>;
  readonly removeFile: (path: string) => Effect.Effect<void, FsError>;
  /** Copies contents, permission bits and access/modification times. */
  readonly copyFile: (source: string, destination: string) => Effect.Effect<void, FsError>;
  readonly rename: (source: string, destination: string) => Effect.Effect<void, FsError>;
  readonly readFile: (path: string) => Effect.Effect<Uint8Array, FsError>;
  readonly writeFile: (path: string, data: Uint8Array) => Effect.Effect<void, FsError>;
  readonly readFileString: (
    path: string,
    encoding: BufferEncoding
  ) => Effect.Effect<string, FsError>;
  readonly writeFileString: (
    path: string,
    content: string,
    encoding: BufferEncoding
  ) => Effect.Effect<void, FsError>;
  /** Reads the file in chunks of at most `chunkSize` bytes, folding each into the state. */
  readonly foldFile: <S>(
    path: string,
    chunkSize: number,
    initial: S,
    f: (state: S, chunk: Uint8Array) => S
  ) => Effect.Effect<S, FsError>;
}

export class FileSystemServiceTag extends Context.Tag("FileSystemService")<
  FileSystemServiceTag,
  FileSystemService
>() {}

// =============================================================================
// Error detection from node:fs errors
// =============================================================================

const errorCode = (error: unknown): string | undefined =>
  typeof error === "object" && error !== null && "code" in error && typeof error.code === "string"
    ? error.code.toUpperCase()
    : undefined;

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const toFsError = (path: string, error: unknown): FsError => {
  switch (errorCode(error)) {
    case "ENOENT":
      return new PathNotFound({ path });
    case "EACCES":
    case "EPERM":
      return new PathPermissionDenied({ path });
    case "EEXIST":
      return new PathAlreadyExists({ path });
    case "ENOTDIR":
      return new NotADirectory({ path });
    case "EISDIR":
      return new IsADirectory({ path });
    case "ENOTEMPTY":
      return new DirectoryNotEmpty({ path });
    case "EXDEV":
      return new CrossDeviceLink({ path });
  }

  // Fallback to message parsing when no code is attached
  const message = errorMessage(error).toLowerCase();

  if (message.includes("enoent") || message.includes("no such file")) {
    return new PathNotFound({ path });
  }

  if (message.includes("eacces") || message.includes("permission denied") || message.includes("eperm")) {
    return new PathPermissionDenied({ path });
  }

  return new FsUnknownError({ path, reason: errorMessage(error) });
};

// =============================================================================
// Live implementation (blocking node:fs)
// =============================================================================

const attempt = <A>(path: string, f: () => A): Effect.Effect<A, FsError> =>
  Effect.try({
    try: f,
    catch: (error) => toFsError(path, error),
  });

const fileTypeOf = (stats: fs.Stats): FileType => {
  if (stats.isSymbolicLink()) return "SymbolicLink";
  if (stats.isDirectory()) return "Directory";
  if (stats.isFile()) return "File";
  return "Other";
};

const toFileInfo = (stats: fs.Stats): FileInfo => ({
  type: fileTypeOf(stats),
  size: stats.size,
  mtime: stats.mtime,
  atime: stats.atime,
  mode: stats.mode,
  dev: stats.dev,
  ino: stats.ino,
});

const foldFile = <S>(
  path: string,
  chunkSize: number,
  initial: S,
  f: (state: S, chunk: Uint8Array) => S
): Effect.Effect<S, FsError> =>
  Effect.acquireUseRelease(
    attempt(path, () => fs.openSync(path, "r")),
    (fd) =>
      attempt(path, () => {
        const buffer = Buffer.alloc(chunkSize);
        let state = initial;
        let bytesRead = fs.readSync(fd, buffer, 0, chunkSize, null);
        while (bytesRead > 0) {
          state = f(state, buffer.subarray(0, bytesRead));
          bytesRead = fs.readSync(fd, buffer, 0, chunkSize, null);
        }
        return state;
      }),
    (fd) => Effect.sync(() => fs.closeSync(fd))
  );

export const FileSystemServiceLive = Layer.succeed(FileSystemServiceTag, {
  lstat: (path) => attempt(path, () => toFileInfo(fs.lstatSync(path))),
  stat: (path) => attempt(path, () => toFileInfo(fs.statSync(path))),
  exists: (path) => Effect.sync(() => fs.existsSync(path)),
  readDirectory: (path) => attempt(path, () => fs.readdirSync(path, { encoding: "utf8" })),
  makeDirectory: (path, options = {}) =>
    pipe(
      attempt(path, () => fs.mkdirSync(path, { recursive: options.recursive ?? false })),
      Effect.asVoid
    ),
  removeDirectory: (path, options = {}) =>
    attempt(path, () =>
      options.recursive ? fs.rmSync(path, { recursive: true }) : fs.rmdirSync(path)
    ),
  removeFile: (path) => attempt(path, () => fs.unlinkSync(path)),
  copyFile: (source, destination) =>
    attempt(source, () => {
      const stats = fs.statSync(source);
      fs.copyFileSync(source, destination);
      fs.chmodSync(destination, stats.mode & 0o7777);
      fs.utimesSync(destination, stats.atime, stats.mtime);
    }),
  rename: (source, destination) => attempt(source, () => fs.renameSync(source, destination)),
  readFile: (path) => attempt(path, () => new Uint8Array(fs.readFileSync(path))),
  writeFile: (path, data) => attempt(path, () => fs.writeFileSync(path, data)),
  readFileString: (path, encoding) => attempt(path, () => fs.readFileSync(path, { encoding })),
  writeFileString: (path, content, encoding) =>
    attempt(path, () => fs.writeFileSync(path, content, { encoding })),
  foldFile,
});

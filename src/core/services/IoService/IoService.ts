/**
 * IoService - standalone file I/O helpers that need no base directory.
 *
 * Relative paths resolve against the process working directory. Reads fail
 * with FileNotFound / IsADirectory before touching the content; writes create
 * missing parent directories unless `createDirs` is false.
 */

import { Context, Data, Effect, Layer, pipe, Schema } from "effect";
import { createHash, type Hash } from "node:crypto";
import { dirname, isAbsolute, resolve } from "node:path";
import { deserialize, serialize } from "node:v8";
import { FileNotFound } from "@domain/errors";
import {
  FileSystemServiceTag,
  IsADirectory,
  type FileInfo,
  type FileSystemService,
  type FsError,
} from "../FileSystemService";

// =============================================================================
// Typed errors
// =============================================================================

export class UnsupportedHashAlgorithm extends Data.TaggedError("UnsupportedHashAlgorithm")<{
  readonly algorithm: string;
}> {}

export class JsonParseError extends Data.TaggedError("JsonParseError")<{
  readonly path: string;
  readonly reason: string;
}> {}

export class JsonDecodeError extends Data.TaggedError("JsonDecodeError")<{
  readonly path: string;
  readonly reason: string;
}> {}

export class SerializeError extends Data.TaggedError("SerializeError")<{
  readonly path: string;
  readonly reason: string;
}> {}

export class DeserializeError extends Data.TaggedError("DeserializeError")<{
  readonly path: string;
  readonly reason: string;
}> {}

export type ReadError = FileNotFound | FsError;

// =============================================================================
// Service interface
// =============================================================================

export interface WriteOptions {
  readonly createDirs?: boolean;
}

export interface TextOptions {
  readonly encoding?: BufferEncoding;
}

export interface JsonWriteOptions extends WriteOptions, TextOptions {
  readonly indent?: number;
}

export interface HashOptions {
  readonly algorithm?: string;
  readonly bufferSize?: number;
}

export interface IoService {
  readonly exists: (path: string) => Effect.Effect<boolean>;
  readonly isFile: (path: string) => Effect.Effect<boolean>;
  readonly isDir: (path: string) => Effect.Effect<boolean>;

  /** Creates the directory and its parents; anything already at `path` is left alone. */
  readonly mkdir: (path: string) => Effect.Effect<void, FsError>;
  readonly mkdirs: (paths: Iterable<string>) => Effect.Effect<void, FsError>;
  /** Removes an existing directory tree at `path`, then creates it empty. */
  readonly newmkdir: (path: string) => Effect.Effect<void, FsError>;

  readonly readText: (path: string, options?: TextOptions) => Effect.Effect<string, ReadError>;
  /** Returns the number of code points written. */
  readonly writeText: (
    path: string,
    content: string,
    options?: TextOptions & WriteOptions
  ) => Effect.Effect<number, FsError>;

  readonly readBytes: (path: string) => Effect.Effect<Uint8Array, ReadError>;
  /** Returns the number of bytes written. */
  readonly writeBytes: (
    path: string,
    data: Uint8Array,
    options?: WriteOptions
  ) => Effect.Effect<number, FsError>;

  readonly readJson: (path: string, options?: TextOptions) => Effect.Effect<unknown, ReadError | JsonParseError>;
  readonly readJsonWith: <A, I>(
    path: string,
    schema: Schema.Schema<A, I>
  ) => Effect.Effect<A, ReadError | JsonParseError | JsonDecodeError>;
  readonly writeJson: (path: string, data: unknown, options?: JsonWriteOptions) => Effect.Effect<void, FsError>;

  /** V8 structured-clone format: Maps, Sets, Dates, typed arrays and cycles survive. */
  readonly readSerialized: (path: string) => Effect.Effect<unknown, ReadError | DeserializeError>;
  readonly writeSerialized: (
    path: string,
    data: unknown,
    options?: WriteOptions
  ) => Effect.Effect<void, FsError | SerializeError>;

  readonly deleteFile: (path: string) => Effect.Effect<void, ReadError>;
  readonly getFileSize: (path: string) => Effect.Effect<number, ReadError>;
  readonly getModifiedTime: (path: string) => Effect.Effect<Date, ReadError>;
  /** Lowercase hex digest, read in chunks of `bufferSize` bytes (default 64 KiB). */
  readonly getFileHash: (
    path: string,
    options?: HashOptions
  ) => Effect.Effect<string, ReadError | UnsupportedHashAlgorithm>;
}

export class IoServiceTag extends Context.Tag("IoService")<IoServiceTag, IoService>() {}

// =============================================================================
// Implementation
// =============================================================================

const DEFAULT_ENCODING: BufferEncoding = "utf-8";
const DEFAULT_BUFFER_SIZE = 65_536;

const resolvePath = (path: string): string => (isAbsolute(path) ? path : resolve(path));

const errorReason = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const makeIoService = (fs: FileSystemService): IoService => {
  const statExisting = (path: string): Effect.Effect<FileInfo, ReadError> =>
    pipe(
      fs.stat(path),
      Effect.catchTag("PathNotFound", () => Effect.fail(new FileNotFound({ path })))
    );

  const requireReadable = (path: string) =>
    pipe(
      statExisting(path),
      Effect.filterOrFail(
        (info) => info.type !== "Directory",
        () => new IsADirectory({ path })
      )
    );

  const requireRegularFile = (path: string) =>
    pipe(
      statExisting(path),
      Effect.filterOrFail(
        (info) => info.type === "File",
        () => new IsADirectory({ path })
      )
    );

  const prepareParent = (path: string, options: WriteOptions = {}) =>
    options.createDirs ?? true
      ? fs.makeDirectory(dirname(path), { recursive: true })
      : Effect.void;

  const isDir: IoService["isDir"] = (path) =>
    pipe(
      fs.stat(resolvePath(path)),
      Effect.map((info) => info.type === "Directory"),
      Effect.orElseSucceed(() => false)
    );

  const mkdir: IoService["mkdir"] = (path) => {
    const p = resolvePath(path);
    return Effect.flatMap(fs.exists(p), (present) =>
      present ? Effect.void : fs.makeDirectory(p, { recursive: true })
    );
  };

  const readText: IoService["readText"] = (path, options = {}) => {
    const p = resolvePath(path);
    return pipe(
      requireReadable(p),
      Effect.zipRight(fs.readFileString(p, options.encoding ?? DEFAULT_ENCODING))
    );
  };

  const readBytes: IoService["readBytes"] = (path) => {
    const p = resolvePath(path);
    return pipe(requireReadable(p), Effect.zipRight(fs.readFile(p)));
  };

  const readJson: IoService["readJson"] = (path, options = {}) =>
    pipe(
      readText(path, options),
      Effect.flatMap((text) =>
        Effect.try({
          try: (): unknown => JSON.parse(text),
          catch: (error) => new JsonParseError({ path: resolvePath(path), reason: errorReason(error) }),
        })
      )
    );

  return {
    exists: (path) => fs.exists(resolvePath(path)),

    isFile: (path) =>
      pipe(
        fs.stat(resolvePath(path)),
        Effect.map((info) => info.type === "File"),
        Effect.orElseSucceed(() => false)
      ),

    isDir,

    mkdir,

    mkdirs: (paths) => Effect.forEach(paths, mkdir, { discard: true }),

    newmkdir: (path) => {
      const p = resolvePath(path);
      return pipe(
        isDir(p),
        Effect.flatMap((directory) =>
          directory ? fs.removeDirectory(p, { recursive: true }) : Effect.void
        ),
        Effect.zipRight(mkdir(p))
      );
    },

    readText,

    writeText: (path, content, options = {}) => {
      const p = resolvePath(path);
      return pipe(
        prepareParent(p, options),
        Effect.zipRight(fs.writeFileString(p, content, options.encoding ?? DEFAULT_ENCODING)),
        Effect.as([...content].length)
      );
    },

    readBytes,

    writeBytes: (path, data, options = {}) => {
      const p = resolvePath(path);
      return pipe(
        prepareParent(p, options),
        Effect.zipRight(fs.writeFile(p, data)),
        Effect.as(data.byteLength)
      );
    },

    readJson,

    readJsonWith: (path, schema) =>
      pipe(
        readJson(path),
        Effect.flatMap((json) =>
          pipe(
            Schema.decodeUnknown(schema)(json),
            Effect.mapError(
              (error) => new JsonDecodeError({ path: resolvePath(path), reason: error.message })
            )
          )
        )
      ),

    writeJson: (path, data, options = {}) => {
      const p = resolvePath(path);
      const text = JSON.stringify(data, null, options.indent ?? 2);
      return pipe(
        prepareParent(p, options),
        Effect.zipRight(fs.writeFileString(p, text, options.encoding ?? DEFAULT_ENCODING))
      );
    },

    readSerialized: (path) =>
      pipe(
        readBytes(path),
        Effect.flatMap((bytes) =>
          Effect.try({
            try: (): unknown => deserialize(bytes),
            catch: (error) => new DeserializeError({ path: resolvePath(path), reason: errorReason(error) }),
          })
        )
      ),

    writeSerialized: (path, data, options = {}) => {
      const p = resolvePath(path);
      return pipe(
        Effect.try({
          try: () => new Uint8Array(serialize(data)),
          catch: (error) => new SerializeError({ path: p, reason: errorReason(error) }),
        }),
        Effect.tap(() => prepareParent(p, options)),
        Effect.flatMap((bytes) => fs.writeFile(p, bytes))
      );
    },

    deleteFile: (path) => {
      const p = resolvePath(path);
      return pipe(requireRegularFile(p), Effect.zipRight(fs.removeFile(p)));
    },

    getFileSize: (path) =>
      pipe(
        requireRegularFile(resolvePath(path)),
        Effect.map((info) => info.size)
      ),

    getModifiedTime: (path) =>
      pipe(
        statExisting(resolvePath(path)),
        Effect.map((info) => info.mtime)
      ),

    getFileHash: (path, options = {}) => {
      const p = resolvePath(path);
      const algorithm = options.algorithm ?? "md5";
      const bufferSize = Math.max(1, Math.floor(options.bufferSize ?? DEFAULT_BUFFER_SIZE));

      return pipe(
        requireRegularFile(p),
        Effect.zipRight(
          Effect.try({
            try: () => createHash(algorithm),
            catch: () => new UnsupportedHashAlgorithm({ algorithm }),
          })
        ),
        Effect.flatMap((hash) =>
          fs.foldFile(p, bufferSize, hash, (h: Hash, chunk) => h.update(chunk))
        ),
        Effect.map((hash) => hash.digest("hex"))
      );
    },
  };
};

export const IoServiceLive = Layer.effect(IoServiceTag, Effect.map(FileSystemServiceTag, makeIoService));

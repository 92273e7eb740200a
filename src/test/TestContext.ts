import { Effect, Either, Layer } from "effect";
import { basename, dirname, join, normalize } from "node:path";

import { DirectoryAnalyzerLive, DirectoryAnalyzerTag } from "@services/DirectoryAnalyzer";
import {
  CrossDeviceLink,
  DirectoryNotEmpty,
  FileSystemServiceTag,
  IsADirectory,
  NotADirectory,
  PathAlreadyExists,
  PathNotFound,
  PathPermissionDenied,
  type FileInfo,
  type FileSystemService,
  type FsError
} from "@services/FileSystemService";
import { GlobServiceTag } from "@services/GlobService";
import { IoServiceLive, IoServiceTag } from "@services/IoService";

export type VirtualEntry =
  | { readonly kind: "file"; data: Uint8Array; mtime: Date; mode: number; readonly ino: number }
  | { readonly kind: "directory"; mtime: Date; mode: number; readonly ino: number }
  | { readonly kind: "symlink"; readonly target: string; mtime: Date; readonly ino: number };

export interface CallLog {
  fileSystem: Array<{ method: string; path: string }>;
  glob: Array<{ method: "scan"; pattern: string; cwd: string }>;
}

export interface TestContext {
  entries: Map<string, VirtualEntry>;
  calls: CallLog;
  addFile: (path: string, content: string | number, options?: { mtime?: Date; mode?: number }) => void;
  addDirectory: (path: string, options?: { mtime?: Date }) => void;
  addSymlink: (path: string, target: string) => void;
  denyPermission: (path: string) => void;
  /** Make every rename fail as if source and destination were on different devices. */
  crossDeviceRenames: () => void;
  layer: Layer.Layer<FileSystemServiceTag | GlobServiceTag | DirectoryAnalyzerTag | IoServiceTag>;
}

const MAX_LINK_HOPS = 40;

export function createTestContext(): TestContext {
  const entries = new Map<string, VirtualEntry>();
  const permissionDeniedPaths = new Set<string>();
  let nextIno = 1;
  let renamesCrossDevice = false;

  const calls: CallLog = {
    fileSystem: [],
    glob: []
  };

  entries.set("/", { kind: "directory", mtime: new Date(0), mode: 0o40755, ino: nextIno++ });

  const key = (path: string): string => {
    const normalized = normalize(path);
    return normalized.length > 1 && normalized.endsWith("/") ? normalized.slice(0, -1) : normalized;
  };

  const ensureParents = (path: string) => {
    const parent = dirname(path);
    if (entries.has(parent)) return;
    ensureParents(parent);
    entries.set(parent, { kind: "directory", mtime: new Date(), mode: 0o40755, ino: nextIno++ });
  };

  const childrenOf = (directory: string): string[] =>
    Array.from(entries.keys()).filter((path) => path !== directory && dirname(path) === directory);

  const descendantsOf = (directory: string): string[] => {
    const prefix = directory === "/" ? "/" : `${directory}/`;
    return Array.from(entries.keys()).filter((path) => path.startsWith(prefix));
  };

  const toInfo = (entry: VirtualEntry): FileInfo => {
    switch (entry.kind) {
      case "file":
        return { type: "File", size: entry.data.byteLength, mtime: entry.mtime, atime: entry.mtime, mode: entry.mode, dev: 1, ino: entry.ino };
      case "directory":
        return { type: "Directory", size: 4096, mtime: entry.mtime, atime: entry.mtime, mode: entry.mode, dev: 1, ino: entry.ino };
      case "symlink":
        return { type: "SymbolicLink", size: entry.target.length, mtime: entry.mtime, atime: entry.mtime, mode: 0o120777, dev: 1, ino: entry.ino };
    }
  };

  const lookup = (path: string): Effect.Effect<VirtualEntry, FsError> => {
    const entry = entries.get(path);
    return entry ? Effect.succeed(entry) : Effect.fail(new PathNotFound({ path }));
  };

  /** Metadata stays readable; contents of a denied path do not. */
  const checkAccess = (path: string): Effect.Effect<void, FsError> =>
    permissionDeniedPaths.has(path) ? Effect.fail(new PathPermissionDenied({ path })) : Effect.void;

  /** Follow symbolic links until a non-link entry. */
  const resolveEntry = (path: string): Effect.Effect<readonly [string, VirtualEntry], FsError> =>
    Effect.gen(function* () {
      let current = path;
      for (let hop = 0; hop < MAX_LINK_HOPS; hop++) {
        const entry = yield* lookup(current);
        if (entry.kind !== "symlink") return [current, entry] as const;
        current = key(entry.target.startsWith("/") ? entry.target : join(dirname(current), entry.target));
      }
      return yield* Effect.fail(new PathNotFound({ path }));
    });

  const requireParentDirectory = (path: string): Effect.Effect<void, FsError> =>
    Effect.flatMap(resolveEntry(dirname(path)), ([, parent]) =>
      parent.kind === "directory" ? Effect.void : Effect.fail(new NotADirectory({ path }))
    );

  const log = (method: string, path: string) => Effect.sync(() => calls.fileSystem.push({ method, path }));

  const writeBytes = (path: string, data: Uint8Array): Effect.Effect<void, FsError> =>
    Effect.gen(function* () {
      yield* requireParentDirectory(path);
      yield* checkAccess(path);
      yield* checkAccess(dirname(path));
      const existing = entries.get(path);
      if (existing?.kind === "directory") return yield* Effect.fail(new IsADirectory({ path }));
      if (existing?.kind === "file") {
        existing.data = data;
        existing.mtime = new Date();
        return;
      }
      entries.set(path, { kind: "file", data, mtime: new Date(), mode: 0o100644, ino: nextIno++ });
    });

  const readBytes = (path: string): Effect.Effect<Uint8Array, FsError> =>
    Effect.flatMap(resolveEntry(path), ([resolved, entry]) =>
      entry.kind === "file"
        ? Effect.as(checkAccess(resolved), entry.data)
        : Effect.fail(new IsADirectory({ path }))
    );

  const fileSystem: FileSystemService = {
    lstat: (path) => {
      const p = key(path);
      return Effect.zipRight(log("lstat", p), Effect.map(lookup(p), toInfo));
    },

    stat: (path) => {
      const p = key(path);
      return Effect.zipRight(
        log("stat", p),
        Effect.map(resolveEntry(p), ([, entry]) => toInfo(entry))
      );
    },

    exists: (path) =>
      Effect.zipRight(
        log("exists", key(path)),
        Effect.map(Effect.either(resolveEntry(key(path))), Either.isRight)
      ),

    readDirectory: (path) => {
      const p = key(path);
      return Effect.zipRight(
        log("readDirectory", p),
        Effect.flatMap(resolveEntry(p), ([resolved, entry]) =>
          entry.kind === "directory"
            ? Effect.as(checkAccess(resolved), childrenOf(resolved).map((child) => basename(child)))
            : Effect.fail(new NotADirectory({ path: p }))
        )
      );
    },

    makeDirectory: (path, options = {}) => {
      const p = key(path);
      return Effect.gen(function* () {
        yield* log("makeDirectory", p);
        const existing = entries.get(p);
        if (existing) {
          if (options.recursive && existing.kind === "directory") return;
          return yield* Effect.fail(new PathAlreadyExists({ path: p }));
        }
        yield* checkAccess(dirname(p));
        if (options.recursive) ensureParents(p);
        else yield* requireParentDirectory(p);
        entries.set(p, { kind: "directory", mtime: new Date(), mode: 0o40755, ino: nextIno++ });
      });
    },

    removeDirectory: (path, options = {}) => {
      const p = key(path);
      return Effect.gen(function* () {
        yield* log("removeDirectory", p);
        const entry = yield* lookup(p);
        yield* checkAccess(dirname(p));
        if (entry.kind !== "directory") return yield* Effect.fail(new NotADirectory({ path: p }));
        const descendants = descendantsOf(p);
        if (descendants.length > 0 && !options.recursive) {
          return yield* Effect.fail(new DirectoryNotEmpty({ path: p }));
        }
        for (const descendant of descendants) entries.delete(descendant);
        entries.delete(p);
      });
    },

    removeFile: (path) => {
      const p = key(path);
      return Effect.gen(function* () {
        yield* log("removeFile", p);
        const entry = yield* lookup(p);
        yield* checkAccess(dirname(p));
        if (entry.kind === "directory") return yield* Effect.fail(new IsADirectory({ path: p }));
        entries.delete(p);
      });
    },

    copyFile: (source, destination) => {
      const s = key(source);
      const d = key(destination);
      return Effect.gen(function* () {
        yield* log("copyFile", s);
        const [, entry] = yield* resolveEntry(s);
        if (entry.kind !== "file") return yield* Effect.fail(new IsADirectory({ path: s }));
        yield* writeBytes(d, entry.data.slice());
        const copy = entries.get(d);
        if (copy?.kind === "file") {
          copy.mtime = entry.mtime;
          copy.mode = entry.mode;
        }
      });
    },

    rename: (source, destination) => {
      const s = key(source);
      const d = key(destination);
      return Effect.gen(function* () {
        yield* log("rename", s);
        if (renamesCrossDevice) return yield* Effect.fail(new CrossDeviceLink({ path: s }));
        yield* lookup(s);
        yield* requireParentDirectory(d);
        const moved = [s, ...descendantsOf(s)];
        for (const from of moved) {
          const value = entries.get(from);
          if (value === undefined) continue;
          entries.delete(from);
          entries.set(d + from.slice(s.length), value);
        }
      });
    },

    readFile: (path) => Effect.zipRight(log("readFile", key(path)), readBytes(key(path))),

    writeFile: (path, data) => Effect.zipRight(log("writeFile", key(path)), writeBytes(key(path), data)),

    readFileString: (path, encoding) =>
      Effect.zipRight(
        log("readFileString", key(path)),
        Effect.map(readBytes(key(path)), (data) => Buffer.from(data).toString(encoding))
      ),

    writeFileString: (path, content, encoding) =>
      Effect.zipRight(
        log("writeFileString", key(path)),
        writeBytes(key(path), new Uint8Array(Buffer.from(content, encoding)))
      ),

    foldFile: (path, chunkSize, initial, f) =>
      Effect.zipRight(
        log("foldFile", key(path)),
        Effect.map(readBytes(key(path)), (data) => {
          let state = initial;
          for (let offset = 0; offset < data.byteLength; offset += chunkSize) {
            state = f(state, data.subarray(offset, offset + chunkSize));
          }
          return state;
        })
      )
  };

  const mockFileSystem = Layer.succeed(FileSystemServiceTag, fileSystem);

  const mockGlobService = Layer.succeed(GlobServiceTag, {
    scan: (pattern: string, cwd: string, options: { readonly onlyFiles?: boolean } = {}) => {
      calls.glob.push({ method: "scan", pattern, cwd });

      const prefix = cwd.endsWith("/") ? cwd : `${cwd}/`;
      const matches = Array.from(entries.entries())
        .filter(([path, entry]) => path.startsWith(prefix) && (!options.onlyFiles || entry.kind === "file"))
        .map(([path]) => path.slice(prefix.length));

      return Effect.succeed(matches);
    }
  });

  const layer = Layer.mergeAll(
    mockFileSystem,
    mockGlobService,
    Layer.provide(Layer.mergeAll(DirectoryAnalyzerLive, IoServiceLive), mockFileSystem)
  );

  return {
    entries,
    calls,
    addFile: (path, content, options = {}) => {
      const p = key(path);
      ensureParents(p);
      const data = typeof content === "number" ? new Uint8Array(content) : new Uint8Array(Buffer.from(content, "utf-8"));
      entries.set(p, { kind: "file", data, mtime: options.mtime ?? new Date(), mode: options.mode ?? 0o100644, ino: nextIno++ });
    },
    addDirectory: (path, options = {}) => {
      const p = key(path);
      ensureParents(p);
      entries.set(p, { kind: "directory", mtime: options.mtime ?? new Date(), mode: 0o40755, ino: nextIno++ });
    },
    addSymlink: (path, target) => {
      const p = key(path);
      ensureParents(p);
      entries.set(p, { kind: "symlink", target, mtime: new Date(), ino: nextIno++ });
    },
    denyPermission: (path) => {
      permissionDeniedPaths.add(key(path));
    },
    crossDeviceRenames: () => {
      renamesCrossDevice = true;
    },
    layer
  };
}

/**
 * Integration tests for infra services using real IO.
 *
 * These tests verify that:
 * 1. Real IO operations produce errors with predictable structure
 * 2. Our error detection logic works with actual error formats
 * 3. The in-memory test filesystem can be trusted to match real behavior
 */

import { describe, expect, test, beforeAll, afterAll } from "vitest"
import { Effect, pipe } from "effect"
import { mkdtemp, rm, writeFile, mkdir, symlink, utimes } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"

import { GlobServiceTag, GlobServiceLive } from "@services/GlobService"
import {
  FileSystemServiceTag,
  FileSystemServiceLive,
  toFsError,
  type FileSystemService
} from "@services/FileSystemService"

// =============================================================================
// Test fixtures
// =============================================================================

let testDir: string

beforeAll(async () => {
  testDir = await mkdtemp(join(tmpdir(), "infra-test-"))

  await mkdir(join(testDir, "subdir"))
  await writeFile(join(testDir, "file1.txt"), "hello")
  await writeFile(join(testDir, "file2.txt"), "world")
  await writeFile(join(testDir, ".hidden"), "")
  await writeFile(join(testDir, "subdir", "nested.txt"), "nested")
  await symlink(join(testDir, "file1.txt"), join(testDir, "link.txt"))
})

afterAll(async () => {
  await rm(testDir, { recursive: true, force: true })
})

const runFs = <A, E>(f: (svc: FileSystemService) => Effect.Effect<A, E>): A =>
  pipe(FileSystemServiceTag, Effect.flatMap(f), Effect.provide(FileSystemServiceLive), Effect.runSync)

const failFs = <A, E>(f: (svc: FileSystemService) => Effect.Effect<A, E>): E =>
  pipe(FileSystemServiceTag, Effect.flatMap(f), Effect.flip, Effect.provide(FileSystemServiceLive), Effect.runSync)

// =============================================================================
// GlobService integration tests
// =============================================================================

describe("GlobService (real IO)", () => {
  test("scan finds files in directory", async () => {
    const result = await pipe(
      GlobServiceTag,
      Effect.flatMap((svc) => svc.scan("**/*", testDir, { onlyFiles: true })),
      Effect.provide(GlobServiceLive),
      Effect.runPromise
    )

    expect(result).toContain("file1.txt")
    expect(result).toContain("file2.txt")
    expect(result).toContain("subdir/nested.txt")
  })

  test("scan with pattern filter", async () => {
    const result = await pipe(
      GlobServiceTag,
      Effect.flatMap((svc) => svc.scan("*.txt", testDir, { onlyFiles: true })),
      Effect.provide(GlobServiceLive),
      Effect.runPromise
    )

    expect([...result].sort()).toEqual(["file1.txt", "file2.txt", "link.txt"])
  })

  test("wildcards match dotfiles", async () => {
    const result = await pipe(
      GlobServiceTag,
      Effect.flatMap((svc) => svc.scan("*", testDir, { onlyFiles: true })),
      Effect.provide(GlobServiceLive),
      Effect.runPromise
    )

    expect(result).toContain(".hidden")
  })

  test("directories are included unless onlyFiles is set", async () => {
    const result = await pipe(
      GlobServiceTag,
      Effect.flatMap((svc) => svc.scan("sub*", testDir)),
      Effect.provide(GlobServiceLive),
      Effect.runPromise
    )

    expect(result).toEqual(["subdir"])
  })

  test("scan on non-existent path matches nothing", async () => {
    const result = await pipe(
      GlobServiceTag,
      Effect.flatMap((svc) => svc.scan("**/*", "/nonexistent/path/xyz", { onlyFiles: true })),
      Effect.provide(GlobServiceLive),
      Effect.runPromise
    )

    expect(result).toEqual([])
  })
})

// =============================================================================
// FileSystemService integration tests
// =============================================================================

describe("FileSystemService (real IO)", () => {
  test("stat returns size and type for existing file", () => {
    const info = runFs((fs) => fs.stat(join(testDir, "file1.txt")))

    expect(info.size).toBe(5)
    expect(info.type).toBe("File")
  })

  test("lstat reports the link itself, stat what it points to", () => {
    const link = join(testDir, "link.txt")

    expect(runFs((fs) => fs.lstat(link)).type).toBe("SymbolicLink")
    expect(runFs((fs) => fs.stat(link)).type).toBe("File")
  })

  test("readDirectory lists entry names", () => {
    const names = runFs((fs) => fs.readDirectory(testDir))

    expect([...names].sort()).toEqual([".hidden", "file1.txt", "file2.txt", "link.txt", "subdir"])
  })

  test("exists never fails", () => {
    expect(runFs((fs) => fs.exists(join(testDir, "file1.txt")))).toBe(true)
    expect(runFs((fs) => fs.exists(join(testDir, "missing.txt")))).toBe(false)
  })

  test("foldFile reads in chunks of the requested size", () => {
    const initial: ReadonlyArray<string> = []
    const chunks = runFs((fs) =>
      fs.foldFile(join(testDir, "file1.txt"), 2, initial, (acc, chunk) => [
        ...acc,
        Buffer.from(chunk).toString("utf-8")
      ])
    )

    expect(chunks).toEqual(["he", "ll", "o"])
  })

  test("copyFile keeps the modification time", async () => {
    const source = join(testDir, "dated.txt")
    const destination = join(testDir, "dated-copy.txt")
    const stamp = new Date("2020-01-02T03:04:05Z")
    await writeFile(source, "dated")
    await utimes(source, stamp, stamp)

    const info = runFs((fs) => pipe(fs.copyFile(source, destination), Effect.zipRight(fs.stat(destination))))

    expect(info.mtime.getTime()).toBe(stamp.getTime())
    expect(info.size).toBe(5)
  })
})

describe("FileSystemService typed errors with real IO", () => {
  test("ENOENT produces PathNotFound", () => {
    const missing = join(testDir, "nonexistent.txt")
    const error = failFs((fs) => fs.stat(missing))

    expect(error._tag).toBe("PathNotFound")
    expect(error.path).toBe(missing)
  })

  test("listing a file produces NotADirectory", () => {
    expect(failFs((fs) => fs.readDirectory(join(testDir, "file1.txt")))._tag).toBe("NotADirectory")
  })

  test("creating an existing directory produces PathAlreadyExists", () => {
    expect(failFs((fs) => fs.makeDirectory(join(testDir, "subdir")))._tag).toBe("PathAlreadyExists")
  })

  test("removing a non-empty directory produces DirectoryNotEmpty", () => {
    expect(failFs((fs) => fs.removeDirectory(join(testDir, "subdir")))._tag).toBe("DirectoryNotEmpty")
  })

  test("reading a directory as a file produces IsADirectory", () => {
    expect(failFs((fs) => fs.readFile(join(testDir, "subdir")))._tag).toBe("IsADirectory")
  })
})

describe("toFsError", () => {
  test("maps error codes to tagged errors", () => {
    expect(toFsError("/a", { code: "ENOENT" })._tag).toBe("PathNotFound")
    expect(toFsError("/a", { code: "EACCES" })._tag).toBe("PathPermissionDenied")
    expect(toFsError("/a", { code: "EPERM" })._tag).toBe("PathPermissionDenied")
    expect(toFsError("/a", { code: "EEXIST" })._tag).toBe("PathAlreadyExists")
    expect(toFsError("/a", { code: "ENOTDIR" })._tag).toBe("NotADirectory")
    expect(toFsError("/a", { code: "EISDIR" })._tag).toBe("IsADirectory")
    expect(toFsError("/a", { code: "ENOTEMPTY" })._tag).toBe("DirectoryNotEmpty")
    expect(toFsError("/a", { code: "EXDEV" })._tag).toBe("CrossDeviceLink")
  })

  test("falls back to the message when no code is attached", () => {
    expect(toFsError("/a", new Error("no such file or directory"))._tag).toBe("PathNotFound")
    expect(toFsError("/a", new Error("Permission denied"))._tag).toBe("PathPermissionDenied")
  })

  test("anything else is FsUnknownError with the message as reason", () => {
    const error = toFsError("/a", new Error("disk on fire"))

    expect(error).toMatchObject({ _tag: "FsUnknownError", path: "/a", reason: "disk on fire" })
  })
})

import { Effect, pipe } from "effect"
import { Console } from "effect"

import type { FilesOptions, HashOptions, ListingOptions, StatsOptions } from "./options"
import { toListFilesOptions, toListOptions } from "./optionParsing"
import { fromDomainError } from "./errors"

// Import from core library
import { AppLive, DirManager, IoServiceTag, LoggerServiceTag } from "@core"

/**
 * Error handling wrapper for CLI commands
 */
export const withErrorHandling = <A, R>(
  effect: Effect.Effect<A, unknown, R>
): Effect.Effect<void, never, R> =>
  pipe(
    effect,
    Effect.catchAll((error) => {
      const appError = fromDomainError(error)
      return Console.error(`\n${appError.format()}`)
    }),
    Effect.asVoid
  )

/**
 * Run the stats command
 */
export const runStats = (options: StatsOptions) =>
  Effect.gen(function* () {
    const logger = yield* LoggerServiceTag
    const manager = yield* DirManager.make(options.path)

    yield* logger.stats.scanning(manager.baseDir, options.followSymlinks)
    yield* manager.displayStats({ followSymlinks: options.followSymlinks })
  })

/**
 * Run the files command
 */
export const runFiles = (options: FilesOptions) =>
  Effect.gen(function* () {
    const logger = yield* LoggerServiceTag
    const manager = yield* DirManager.make(options.path)
    const listOptions = toListFilesOptions(options)

    yield* Effect.logDebug(`Listing files with ${JSON.stringify(listOptions)}`)

    const files = yield* manager.listFiles(listOptions)

    yield* logger.listing.header("files", manager.baseDir)
    yield* logger.listing.entries(files)
    yield* logger.listing.summary("files", files.length)
  })

/**
 * Run the subdirs command
 */
export const runSubdirs = (options: ListingOptions) =>
  Effect.gen(function* () {
    const logger = yield* LoggerServiceTag
    const manager = yield* DirManager.make(options.path)

    const directories = yield* manager.listSubdirs(toListOptions(options))

    yield* logger.listing.header("directories", manager.baseDir)
    yield* logger.listing.entries(directories)
    yield* logger.listing.summary("directories", directories.length)
  })

/**
 * Run the hash command
 */
export const runHash = (options: HashOptions) =>
  Effect.gen(function* () {
    const logger = yield* LoggerServiceTag
    const io = yield* IoServiceTag

    const digest = yield* io.getFileHash(options.file, { algorithm: options.algorithm })
    yield* logger.hash.digest(digest, options.file)
  })

/**
 * Export the application layer for CLI
 */
export { AppLive }

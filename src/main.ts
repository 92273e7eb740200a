/**
 * dirkit CLI
 *
 * Directory statistics, listings and file hashing from the command line.
 *
 * Commands:
 *   stats   - Collect and print statistics for a directory tree
 *   files   - List files recursively, filtered and sorted
 *   subdirs - List directories recursively, including the base
 *   hash    - Print the digest of a file
 *
 * Example:
 *   $ dirkit stats --path ~/projects
 *   $ dirkit files --ext .ts,.tsx --sort size --reverse
 *   $ dirkit hash ./archive.tar --algorithm sha256
 */

import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Option, Logger, LogLevel } from "effect"

import * as Opts from "./cli/options"
import { runStats, runFiles, runSubdirs, runHash, withErrorHandling, AppLive } from "./cli/handler"

const withDebug = (debug: boolean) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    debug ? Effect.provide(effect, Logger.minimumLogLevel(LogLevel.Debug)) : effect

// =============================================================================
// Stats subcommand
// =============================================================================

const statsCommand = Command.make(
  "stats",
  {
    path: Opts.path,
    followSymlinks: Opts.followSymlinks,
    debug: Opts.debug,
  },
  (opts) =>
    withErrorHandling(
      runStats({
        path: Option.getOrUndefined(opts.path),
        followSymlinks: opts.followSymlinks,
      })
    ).pipe(withDebug(opts.debug), Effect.provide(AppLive))
).pipe(
  Command.withDescription("Collect and print statistics for a directory tree")
)

// =============================================================================
// Files subcommand
// =============================================================================

const filesCommand = Command.make(
  "files",
  {
    path: Opts.path,
    ext: Opts.ext,
    images: Opts.images,
    maxDepth: Opts.maxDepth,
    sort: Opts.sort,
    reverse: Opts.reverse,
    relative: Opts.relative,
    debug: Opts.debug,
  },
  (opts) =>
    withErrorHandling(
      runFiles({
        path: Option.getOrUndefined(opts.path),
        ext: Option.getOrUndefined(opts.ext),
        images: opts.images,
        maxDepth: Option.getOrUndefined(opts.maxDepth),
        sort: opts.sort,
        reverse: opts.reverse,
        relative: opts.relative,
      })
    ).pipe(withDebug(opts.debug), Effect.provide(AppLive))
).pipe(
  Command.withDescription("List files below the base directory")
)

// =============================================================================
// Subdirs subcommand
// =============================================================================

const subdirsCommand = Command.make(
  "subdirs",
  {
    path: Opts.path,
    maxDepth: Opts.maxDepth,
    sort: Opts.sort,
    reverse: Opts.reverse,
    relative: Opts.relative,
    debug: Opts.debug,
  },
  (opts) =>
    withErrorHandling(
      runSubdirs({
        path: Option.getOrUndefined(opts.path),
        maxDepth: Option.getOrUndefined(opts.maxDepth),
        sort: opts.sort,
        reverse: opts.reverse,
        relative: opts.relative,
      })
    ).pipe(withDebug(opts.debug), Effect.provide(AppLive))
).pipe(
  Command.withDescription("List directories from and including the base directory")
)

// =============================================================================
// Hash subcommand
// =============================================================================

const hashCommand = Command.make(
  "hash",
  {
    file: Opts.file,
    algorithm: Opts.algorithm,
  },
  (opts) =>
    withErrorHandling(
      runHash({ file: opts.file, algorithm: opts.algorithm })
    ).pipe(Effect.provide(AppLive))
).pipe(
  Command.withDescription("Print the digest of a file")
)

// =============================================================================
// Root command
// =============================================================================

const rootCommand = Command.make("dirkit", {}).pipe(
  Command.withSubcommands([statsCommand, filesCommand, subdirsCommand, hashCommand]),
  Command.withDescription(
    "Directory statistics and file utilities"
  )
)

// =============================================================================
// Run CLI
// =============================================================================

const cli = Command.run(rootCommand, {
  name: "dirkit",
  version: "0.1.0",
})

cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain)

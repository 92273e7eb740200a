/**
 * LoggerService - formatted console output for the stats, files, subdirs and hash commands
 */

import { Context, Effect, Layer, Console } from "effect"
import { formatCount } from "../../lib/formatSize"

// =============================================================================
// Service interface
// =============================================================================

export type ListingKind = "files" | "directories"

export interface LoggerService {
  readonly stats: {
    readonly scanning: (path: string, followSymlinks: boolean) => Effect.Effect<void>
  }
  readonly listing: {
    readonly header: (kind: ListingKind, baseDir: string) => Effect.Effect<void>
    readonly entries: (paths: ReadonlyArray<string>) => Effect.Effect<void>
    readonly summary: (kind: ListingKind, count: number) => Effect.Effect<void>
  }
  readonly hash: {
    readonly digest: (digest: string, path: string) => Effect.Effect<void>
  }
}

export class LoggerServiceTag extends Context.Tag("LoggerService")<
  LoggerServiceTag,
  LoggerService
>() {}

// =============================================================================
// Implementation
// =============================================================================

const labels: Record<ListingKind, { icon: string; title: string; one: string }> = {
  files: { icon: "📄", title: "Files", one: "file" },
  directories: { icon: "📂", title: "Directories", one: "directory" },
}

export const LoggerServiceLive = Layer.succeed(
  LoggerServiceTag,
  {
    stats: {
      scanning: (path, followSymlinks) =>
        Console.log(`\n🔍 Scanning ${path}${followSymlinks ? " (following symlinks)" : ""}...\n`),
    },
    listing: {
      header: (kind, baseDir) => Console.log(`\n${labels[kind].icon} ${labels[kind].title} under ${baseDir}\n`),
      entries: (paths) =>
        Effect.gen(function* () {
          for (const path of paths) {
            yield* Console.log(`   ${path}`)
          }
        }),
      summary: (kind, count) =>
        count === 0
          ? Console.log(`\n✓ No ${kind} matched\n`)
          : Console.log(`\n✓ ${formatCount(count)} ${count === 1 ? labels[kind].one : kind}\n`),
    },
    hash: {
      digest: (digest, path) => Console.log(`${digest}  ${path}`),
    },
  }
)

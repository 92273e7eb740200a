import { Option } from "effect";
import { basename } from "node:path";
import type { DirStats } from "@domain/DirStats";
import { label, type ExtensionTally } from "@domain/Extension";
import { formatCount, formatSize } from "@lib/formatSize";

const INDENT = "  ";

const formatExtensions = (items: ExtensionTally, asSize: boolean): string => {
  if (items.length === 0) return "-";
  return items
    .map(([extension, value]) => `${label(extension)} ${asSize ? formatSize(value) : formatCount(value)}`)
    .join("   ");
};

/**
 * Human-readable, multi-line report of a DirStats snapshot.
 */
export const formatMinimalDirStatsReport = (stats: DirStats): string => {
  const largest = Option.match(stats.largestFilePath, {
    onNone: () => "-",
    onSome: (path) => `${basename(path)} (${formatSize(stats.largestFileSizeBytes)})`,
  });

  const modified = Option.match(Option.all([stats.oldestMtime, stats.newestMtime]), {
    onNone: () => "-",
    onSome: ([oldest, newest]) => `${oldest.toISOString()} → ${newest.toISOString()}`,
  });

  const errorsIcon = stats.errorsCount === 0 ? "✓" : "⚠️ ";

  return [
    `📁 ${stats.root}`,
    `${INDENT}📄 Files:          ${formatCount(stats.fileCount)}`,
    `${INDENT}📂 Directories:    ${formatCount(stats.directoryCount)} (hidden: ${formatCount(stats.hiddenDirectories)})`,
    `${INDENT}🔗 Symlinks:       ${formatCount(stats.symlinkCount)}`,
    `${INDENT}💾 Total size:     ${formatSize(stats.totalSizeBytes)}`,
    `${INDENT}📦 Largest file:   ${largest}`,
    `${INDENT}📊 Top extensions:`,
    `${INDENT}${INDENT}By size  : ${formatExtensions(stats.topExtensionsBySize, true)}`,
    `${INDENT}${INDENT}By count : ${formatExtensions(stats.topExtensionsByCount, false)}`,
    `${INDENT}🕒 Modified:       ${modified}`,
    `${INDENT}🆕 Recent files:   ${formatCount(stats.filesModifiedLast30d)} (last 30 days)`,
    `${INDENT}📭 Empty dirs:     ${formatCount(stats.emptyDirectories)}`,
    `${INDENT}🫙 Zero-byte files: ${formatCount(stats.zeroByteFiles)}`,
    `${INDENT}👻 Hidden files:   ${formatCount(stats.hiddenFiles)}`,
    `${INDENT}${errorsIcon} Errors:         ${formatCount(stats.errorsCount)}`,
  ].join("\n");
};

export { DirectoryAnalyzerTag, DirectoryAnalyzerLive } from "./DirectoryAnalyzer";
export type { DirectoryAnalyzer, CollectOptions } from "./DirectoryAnalyzer";
export { formatMinimalDirStatsReport } from "./formatReport";

export {
  MigrationOrchestrator,
  runMigration,
} from "./run/orchestrator.js";
export type {
  MigrationOrchestratorOptions,
  RunOutcome,
} from "./run/orchestrator.js";
export {
  DEFAULT_DUMP_DIR,
  DEFAULT_LOGS_DIR,
  DEFAULT_RESTORE_JOBS,
  formatRunTimestamp,
  parsePositionalInput,
  resolveEndpoint,
  resolveMigrationRun,
} from "./run/resolve.js";
export type {
  EndpointInput,
  EndpointRole,
  MigrationInput,
  ResolveOptions,
} from "./run/resolve.js";
export {
  createConsoleReporter,
  describeEndpoint,
  formatBytes,
} from "./run/reporter.js";
export type { RunReporter } from "./run/reporter.js";
export type {
  Artifact,
  Endpoint,
  MigrationRun,
  RunMode,
  RunState,
  StageLogPaths,
  StageName,
  StageResult,
} from "./run/types.js";
export {
  ArtifactNotFoundError,
  ConfigError,
  DumpError,
  EXIT_STATUS,
  MigrationError,
  RestoreError,
  RunInterruptedError,
  StageLogError,
  StageProcessError,
  VerificationError,
} from "./errors.js";
export { openStageSinks, TeeStream } from "./logging/log-sink.js";
export type { ConsoleStreams, StageSinks } from "./logging/log-sink.js";
export { execaInvoker } from "./process/invoker.js";
export type {
  InvocationRequest,
  InvocationResult,
  ProcessInvoker,
} from "./process/invoker.js";
export { pgQueryExecutor } from "./db/query.js";
export type { QueryExecutor, QueryRow, QueryRows } from "./db/query.js";
export { buildDumpArgs, runDumpStage } from "./stages/dump.js";
export { buildRestoreArgs, runRestoreStage } from "./stages/restore.js";
export {
  RESTORED_RELATIONS_QUERY,
  formatRowCount,
  runVerificationStage,
} from "./stages/verify.js";
export { inspectArtifact } from "./stages/artifact.js";
export {
  DEFAULT_CATALOG_PATH,
  loadQueryCatalog,
  parseQueryCatalog,
} from "./reports/catalog.js";
export type { QueryCatalog } from "./reports/catalog.js";
export { collectDatabaseInfo, infoReportName } from "./reports/info.js";
export type { DatabaseSide } from "./reports/info.js";
export { renderReport, writeReport } from "./reports/report.js";
export type { ReportSection } from "./reports/report.js";
export { formatTable } from "./reports/format.js";
export {
  compareRowCounts,
  fetchRowCounts,
  rowCountSections,
} from "./reports/row-counts.js";
export type { RowCount, RowCountReport } from "./reports/row-counts.js";
export { resolvePackageVersion } from "./utils.js";

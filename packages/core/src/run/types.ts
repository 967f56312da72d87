export type Endpoint = Readonly<{
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}>;

export type RunMode =
  | { readonly kind: "auto" }
  | { readonly kind: "manual"; readonly artifactPath: string };

export type StageName = "dump" | "restore" | "verify";

export type StageLogPaths = Readonly<{
  stdout: string;
  stderr: string;
}>;

export type ToolPaths = Readonly<{
  pgDump: string;
  pgRestore: string;
}>;

export type MigrationRun = Readonly<{
  /**
   * Names every file the run writes: `timestamp`, or `timestamp_<n>` when an
   * earlier run in the same second already left files behind.
   */
  id: string;
  timestamp: string;
  startedAt: string;
  source: Endpoint;
  target: Endpoint;
  mode: RunMode;
  artifactPath: string;
  dumpDir: string;
  logsDir: string;
  jobs: number;
  tools: ToolPaths;
  logs: Readonly<Record<StageName, StageLogPaths>>;
}>;

export type Artifact = Readonly<{
  path: string;
  bytes: number;
  sha256: string;
}>;

export type StageResult = Readonly<{
  stage: StageName;
  exitCode: number;
  stdoutLog: string;
  stderrLog: string;
}>;

export type RunState =
  | "configuring"
  | "dumping"
  | "restoring"
  | "verifying"
  | "done"
  | "failed";

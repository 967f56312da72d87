import type { StageLogPaths, StageName } from "./run/types.js";

/** Process exit statuses, one per failure class. */
export const EXIT_STATUS = {
  success: 0,
  unexpected: 1,
  config: 2,
  artifactNotFound: 3,
  dump: 4,
  restore: 5,
  verify: 6,
  interrupted: 130,
} as const;

export type ErrorStage = StageName | "config";

export class MigrationError extends Error {
  readonly stage: ErrorStage;
  readonly status: number;

  constructor(
    stage: ErrorStage,
    status: number,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
    this.stage = stage;
    this.status = status;
  }
}

export class ConfigError extends MigrationError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(
      "config",
      EXIT_STATUS.config,
      issues.length === 1
        ? issues[0]
        : `Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`,
    );
    this.issues = issues;
  }
}

export class ArtifactNotFoundError extends MigrationError {
  readonly artifactPath: string;

  constructor(artifactPath: string, reason = "does not exist") {
    super(
      "dump",
      EXIT_STATUS.artifactNotFound,
      `Dump file ${artifactPath} ${reason}`,
    );
    this.artifactPath = artifactPath;
  }
}

const STAGE_STATUS: Record<StageName, number> = {
  dump: EXIT_STATUS.dump,
  restore: EXIT_STATUS.restore,
  verify: EXIT_STATUS.verify,
};

/** The log files of a stage could not be created or written. */
export class StageLogError extends MigrationError {
  constructor(stage: StageName, message: string, options?: ErrorOptions) {
    super(stage, STAGE_STATUS[stage], message, options);
  }
}

/**
 * A stage whose external tool (or query) failed. `exitCode` is the tool's
 * own exit code; `status` is what pgshift itself exits with.
 */
export class StageProcessError extends MigrationError {
  readonly exitCode: number;
  readonly logs: StageLogPaths;

  constructor(
    stage: StageName,
    status: number,
    message: string,
    exitCode: number,
    logs: StageLogPaths,
    options?: ErrorOptions,
  ) {
    super(stage, status, message, options);
    this.exitCode = exitCode;
    this.logs = logs;
  }
}

export class DumpError extends StageProcessError {
  constructor(exitCode: number, logs: StageLogPaths) {
    super(
      "dump",
      EXIT_STATUS.dump,
      `pg_dump exited with code ${exitCode}`,
      exitCode,
      logs,
    );
  }
}

export class RestoreError extends StageProcessError {
  constructor(exitCode: number, logs: StageLogPaths) {
    super(
      "restore",
      EXIT_STATUS.restore,
      `pg_restore exited with code ${exitCode}; the target database may be partially restored`,
      exitCode,
      logs,
    );
  }
}

export class VerificationError extends StageProcessError {
  constructor(message: string, logs: StageLogPaths, options?: ErrorOptions) {
    super(
      "verify",
      EXIT_STATUS.verify,
      `Verification query failed: ${message}`,
      1,
      logs,
      options,
    );
  }
}

export class RunInterruptedError extends MigrationError {
  readonly logs?: StageLogPaths;

  constructor(stage: StageName, logs?: StageLogPaths) {
    super(
      stage,
      EXIT_STATUS.interrupted,
      `Migration interrupted during ${stage}`,
    );
    this.logs = logs;
  }
}

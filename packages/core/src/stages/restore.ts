import { RestoreError, RunInterruptedError } from "../errors.js";
import type { Artifact, MigrationRun, StageResult } from "../run/types.js";
import {
  connectionArgs,
  invokeStageProcess,
  toStageResult,
} from "./process.js";
import type { StageDependencies } from "./types.js";

export const buildRestoreArgs = (
  run: MigrationRun,
  artifactPath: string,
): string[] => [
  ...connectionArgs(run.target),
  "-F",
  "c",
  "-j",
  String(run.jobs),
  "--verbose",
  "--no-owner",
  artifactPath,
];

/**
 * pg_restore is not transactional across objects: on failure the target keeps
 * whatever was restored so far, and the logs are the record of it.
 */
export const runRestoreStage = async (
  run: MigrationRun,
  artifact: Artifact,
  deps: StageDependencies,
): Promise<StageResult> => {
  const invocation = await invokeStageProcess(
    run,
    {
      stage: "restore",
      command: run.tools.pgRestore,
      args: buildRestoreArgs(run, artifact.path),
      endpoint: run.target,
    },
    deps,
  );

  if (invocation.interrupted) {
    throw new RunInterruptedError("restore", run.logs.restore);
  }

  if (invocation.exitCode !== 0) {
    throw new RestoreError(invocation.exitCode, run.logs.restore);
  }

  return toStageResult(invocation);
};

import fs from "node:fs/promises";
import { DumpError, RunInterruptedError } from "../errors.js";
import type { Artifact, MigrationRun, StageResult } from "../run/types.js";
import { inspectArtifact } from "./artifact.js";
import {
  connectionArgs,
  invokeStageProcess,
  toStageResult,
} from "./process.js";
import type { StageDependencies } from "./types.js";

export type DumpStageOutcome = {
  artifact: Artifact;
  /** Absent in manual mode, where no process runs. */
  result?: StageResult;
};

/**
 * Custom-format archive without ownership or privilege metadata, so it can
 * be restored by a differently-privileged role.
 */
export const buildDumpArgs = (run: MigrationRun): string[] => [
  ...connectionArgs(run.source),
  "-F",
  "c",
  "--no-owner",
  "--no-privileges",
  "--no-acl",
  "--verbose",
  "-f",
  run.artifactPath,
];

const dumpSource = async (
  run: MigrationRun,
  deps: StageDependencies,
): Promise<DumpStageOutcome> => {
  await fs.mkdir(run.dumpDir, { recursive: true });

  const invocation = await invokeStageProcess(
    run,
    {
      stage: "dump",
      command: run.tools.pgDump,
      args: buildDumpArgs(run),
      endpoint: run.source,
    },
    deps,
  );

  if (invocation.interrupted) {
    throw new RunInterruptedError("dump", run.logs.dump);
  }

  if (invocation.exitCode !== 0) {
    throw new DumpError(invocation.exitCode, run.logs.dump);
  }

  return {
    artifact: await inspectArtifact(run.artifactPath),
    result: toStageResult(invocation),
  };
};

export const runDumpStage = async (
  run: MigrationRun,
  deps: StageDependencies,
): Promise<DumpStageOutcome> => {
  switch (run.mode.kind) {
    case "auto":
      return dumpSource(run, deps);
    case "manual":
      return { artifact: await inspectArtifact(run.mode.artifactPath) };
  }
};

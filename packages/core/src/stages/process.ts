import { openStageSinks } from "../logging/log-sink.js";
import type {
  Endpoint,
  MigrationRun,
  StageName,
  StageResult,
} from "../run/types.js";
import type { StageDependencies } from "./types.js";

export type StageInvocation = {
  stage: StageName;
  command: string;
  args: readonly string[];
  endpoint: Endpoint;
};

export type StageInvocationResult = StageResult & {
  interrupted: boolean;
};

/**
 * Runs one external tool with its output tee'd into the stage's log files.
 * The endpoint password reaches the child through PGPASSWORD and nowhere else.
 */
export const invokeStageProcess = async (
  run: MigrationRun,
  { stage, command, args, endpoint }: StageInvocation,
  deps: StageDependencies,
): Promise<StageInvocationResult> => {
  const sinks = await openStageSinks(run, stage, deps.console);

  try {
    const outcome = await deps.invoke({
      command,
      args,
      env: { PGPASSWORD: endpoint.password },
      stdout: sinks.stdout,
      stderr: sinks.stderr,
      signal: deps.signal,
    });

    if (outcome.failureMessage) {
      sinks.stderr.write(`${outcome.failureMessage}\n`);
    }

    return {
      stage,
      exitCode: outcome.exitCode,
      interrupted: outcome.interrupted,
      stdoutLog: sinks.paths.stdout,
      stderrLog: sinks.paths.stderr,
    };
  } finally {
    await sinks.close();
  }
};

export const connectionArgs = (endpoint: Endpoint): string[] => [
  "-h",
  endpoint.host,
  "-p",
  String(endpoint.port),
  "-U",
  endpoint.user,
  "-d",
  endpoint.database,
];

export const toStageResult = ({
  stage,
  exitCode,
  stdoutLog,
  stderrLog,
}: StageInvocationResult): StageResult =>
  Object.freeze({ stage, exitCode, stdoutLog, stderrLog });

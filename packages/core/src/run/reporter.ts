import kleur from "kleur";
import {
  MigrationError,
  RunInterruptedError,
  StageProcessError,
} from "../errors.js";
import type { Artifact, Endpoint, MigrationRun } from "./types.js";

export interface RunReporter {
  runStarted(run: MigrationRun): void;
  step(index: number, total: number, message: string): void;
  success(message: string): void;
  completed(run: MigrationRun, artifact: Artifact): void;
  failed(error: MigrationError): void;
}

export const describeEndpoint = (endpoint: Endpoint): string =>
  `${endpoint.user}@${endpoint.host}:${endpoint.port}/${endpoint.database}`;

export const formatBytes = (bytes: number): string => {
  const units = ["B", "KiB", "MiB", "GiB", "TiB"];
  let value = bytes;
  let unit = 0;

  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit += 1;
  }

  return unit === 0 ? `${bytes} B` : `${value.toFixed(1)} ${units[unit]}`;
};

const logPathsOf = (error: MigrationError) => {
  if (error instanceof StageProcessError) {
    return error.logs;
  }
  if (error instanceof RunInterruptedError) {
    return error.logs;
  }
  return undefined;
};

export const createConsoleReporter = (
  log: (line: string) => void = (line) => console.log(line),
  logError: (line: string) => void = (line) => console.error(line),
): RunReporter => ({
  runStarted(run) {
    log(`Run ${kleur.bold(run.id)}`);
    log(kleur.dim(`  source: ${describeEndpoint(run.source)}`));
    log(kleur.dim(`  target: ${describeEndpoint(run.target)}`));
    log("");
  },

  step(index, total, message) {
    log(`${kleur.cyan(`[Step ${index}/${total}]`)} ${message}`);
  },

  success(message) {
    log(kleur.green(`✓ ${message}`));
  },

  completed(run, artifact) {
    log("");
    log(kleur.bold(kleur.green("✓ Migration completed successfully")));
    log(kleur.dim(`  dump file: ${artifact.path}`));
    log(kleur.dim(`  logs:      ${run.logsDir}`));
  },

  failed(error) {
    logError("");
    logError(
      kleur.red(`✖ Migration failed during ${kleur.bold(error.stage)}`),
    );
    logError(kleur.red(`  ${error.message}`));

    if (error instanceof StageProcessError) {
      logError(kleur.dim(`  exit code:  ${error.exitCode}`));
    }

    const logs = logPathsOf(error);
    if (logs) {
      logError(kleur.dim(`  stdout log: ${logs.stdout}`));
      logError(kleur.dim(`  stderr log: ${logs.stderr}`));
    }
  },
});

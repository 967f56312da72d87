import fs from "node:fs/promises";
import type { QueryExecutor, QueryRows } from "../db/query.js";
import { pgQueryExecutor } from "../db/query.js";
import { EXIT_STATUS, MigrationError, RunInterruptedError } from "../errors.js";
import type { ConsoleStreams } from "../logging/log-sink.js";
import type { ProcessInvoker } from "../process/invoker.js";
import { execaInvoker } from "../process/invoker.js";
import { runDumpStage } from "../stages/dump.js";
import { runRestoreStage } from "../stages/restore.js";
import type { StageDependencies } from "../stages/types.js";
import { runVerificationStage } from "../stages/verify.js";
import {
  createConsoleReporter,
  formatBytes,
  type RunReporter,
} from "./reporter.js";
import { resolveMigrationRun, type MigrationInput } from "./resolve.js";
import type {
  Artifact,
  MigrationRun,
  RunState,
  StageName,
  StageResult,
} from "./types.js";

export type MigrationOrchestratorOptions = {
  input: MigrationInput;
  invoke?: ProcessInvoker;
  query?: QueryExecutor;
  reporter?: RunReporter;
  console?: ConsoleStreams;
  signal?: AbortSignal;
  now?: Date;
  cwd?: string;
  verificationQuery?: string;
};

export type RunOutcome = {
  state: "done" | "failed";
  exitCode: number;
  run?: MigrationRun;
  artifact?: Artifact;
  results: StageResult[];
  relations?: QueryRows;
  error?: MigrationError;
  transitions: RunState[];
};

const TOTAL_STEPS = 4;

const pathExists = (filePath: string): Promise<boolean> =>
  fs
    .access(filePath)
    .then(() => true)
    .catch(() => false);

/** Files a run would create, so two runs never share them. */
const isRunClaimed = async (run: MigrationRun): Promise<boolean> => {
  const paths = Object.values(run.logs).flatMap((logs) => [
    logs.stdout,
    logs.stderr,
  ]);
  if (run.mode.kind === "auto") {
    paths.push(run.artifactPath);
  }

  const taken = await Promise.all(paths.map(pathExists));
  return taken.some(Boolean);
};

const ALLOWED_TRANSITIONS: Record<RunState, RunState[]> = {
  configuring: ["dumping", "failed"],
  dumping: ["restoring", "failed"],
  restoring: ["verifying", "failed"],
  verifying: ["done", "failed"],
  done: [],
  failed: [],
};

/**
 * Runs dump, restore and verification strictly in sequence. The first failing
 * stage moves the run to `failed` and nothing after it starts; there are no
 * retries.
 */
export class MigrationOrchestrator {
  #input: MigrationInput;
  #deps: StageDependencies;
  #reporter: RunReporter;
  #now?: Date;
  #cwd?: string;
  #verificationQuery?: string;
  #state: RunState = "configuring";
  #transitions: RunState[] = ["configuring"];
  #started = false;

  constructor(options: MigrationOrchestratorOptions) {
    this.#input = options.input;
    this.#deps = {
      invoke: options.invoke ?? execaInvoker,
      query: options.query ?? pgQueryExecutor,
      console: options.console,
      signal: options.signal,
    };
    this.#reporter = options.reporter ?? createConsoleReporter();
    this.#now = options.now;
    this.#cwd = options.cwd;
    this.#verificationQuery = options.verificationQuery;
  }

  get state(): RunState {
    return this.#state;
  }

  get transitions(): readonly RunState[] {
    return this.#transitions;
  }

  #transition(next: RunState): void {
    if (!ALLOWED_TRANSITIONS[this.#state].includes(next)) {
      throw new Error(`Invalid run transition ${this.#state} -> ${next}`);
    }
    this.#state = next;
    this.#transitions.push(next);
  }

  #enterStage(next: RunState, stage: StageName): void {
    this.#transition(next);

    if (this.#deps.signal?.aborted) {
      throw new RunInterruptedError(stage);
    }
  }

  async #resolveRun(): Promise<MigrationRun> {
    for (let sequence = 0; ; sequence += 1) {
      const run = resolveMigrationRun(this.#input, {
        now: this.#now,
        cwd: this.#cwd,
        sequence,
      });

      if (!(await isRunClaimed(run))) {
        return run;
      }
    }
  }

  async run(): Promise<RunOutcome> {
    if (this.#started) {
      throw new Error("A migration orchestrator can only run once");
    }
    this.#started = true;

    const results: StageResult[] = [];
    let run: MigrationRun | undefined;
    let artifact: Artifact | undefined;

    try {
      run = await this.#resolveRun();
      this.#reporter.runStarted(run);

      this.#enterStage("dumping", "dump");
      this.#reporter.step(
        1,
        TOTAL_STEPS,
        run.mode.kind === "auto"
          ? "Dumping source database..."
          : `Using provided dump file ${run.mode.artifactPath}`,
      );
      const dump = await runDumpStage(run, this.#deps);
      artifact = dump.artifact;
      if (dump.result) {
        results.push(dump.result);
      }
      this.#reporter.success(
        `Dump ready at ${artifact.path} ` +
          `(${formatBytes(artifact.bytes)}, sha256 ${artifact.sha256.slice(0, 12)})`,
      );

      this.#enterStage("restoring", "restore");
      this.#reporter.step(
        2,
        TOTAL_STEPS,
        `Restoring into ${run.target.database} with ${run.jobs} parallel jobs...`,
      );
      results.push(await runRestoreStage(run, artifact, this.#deps));
      this.#reporter.success("Restore completed");

      this.#enterStage("verifying", "verify");
      this.#reporter.step(3, TOTAL_STEPS, "Verifying target database...");
      const verification = await runVerificationStage(
        run,
        this.#deps,
        this.#verificationQuery,
      );
      results.push(verification.result);

      if (this.#deps.signal?.aborted) {
        throw new RunInterruptedError("verify", run.logs.verify);
      }

      this.#transition("done");
      this.#reporter.step(4, TOTAL_STEPS, "Migration finished");
      this.#reporter.completed(run, artifact);

      return {
        state: "done",
        exitCode: EXIT_STATUS.success,
        run,
        artifact,
        results,
        relations: verification.relations,
        transitions: [...this.#transitions],
      };
    } catch (error) {
      if (this.#state !== "failed") {
        this.#state = "failed";
        this.#transitions.push("failed");
      }

      if (!(error instanceof MigrationError)) {
        throw error;
      }

      this.#reporter.failed(error);

      return {
        state: "failed",
        exitCode: error.status,
        run,
        artifact,
        results,
        error,
        transitions: [...this.#transitions],
      };
    }
  }
}

export const runMigration = (
  options: MigrationOrchestratorOptions,
): Promise<RunOutcome> => new MigrationOrchestrator(options).run();

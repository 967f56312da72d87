import fs from "node:fs";
import path from "node:path";
import { Writable } from "node:stream";
import { finished } from "node:stream/promises";
import { StageLogError } from "../errors.js";
import type { MigrationRun, StageLogPaths, StageName } from "../run/types.js";

export type ConsoleStreams = {
  stdout: Writable;
  stderr: Writable;
};

export type StageSinks = {
  stdout: Writable;
  stderr: Writable;
  paths: StageLogPaths;
  close(): Promise<void>;
};

/**
 * Duplicates every chunk onto a console stream and an append-only file.
 * Chunks reach both destinations in the order they were written. The console
 * stream is shared and never ended; the file is closed with the sink.
 */
export class TeeStream extends Writable {
  #console: Writable;
  #file: fs.WriteStream;

  constructor(consoleStream: Writable, filePath: string) {
    super();
    this.#console = consoleStream;
    this.#file = fs.createWriteStream(filePath, { flags: "a" });
    this.#file.on("error", (error) => this.destroy(error));
  }

  override _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    this.#console.write(chunk);
    this.#file.write(chunk, callback);
  }

  override _final(callback: (error?: Error | null) => void): void {
    this.#file.end(() => callback());
  }

  override _destroy(
    error: Error | null,
    callback: (error?: Error | null) => void,
  ): void {
    this.#file.destroy();
    callback(error);
  }
}

const defaultConsole = (): ConsoleStreams => ({
  stdout: process.stdout,
  stderr: process.stderr,
});

/**
 * Opens the stdout/stderr sinks of one stage of a run, creating the stage's
 * log directory when needed.
 */
export const openStageSinks = async (
  run: MigrationRun,
  stage: StageName,
  consoleStreams: ConsoleStreams = defaultConsole(),
): Promise<StageSinks> => {
  const paths = run.logs[stage];
  const describe = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);

  try {
    await fs.promises.mkdir(path.dirname(paths.stdout), { recursive: true });
    await fs.promises.mkdir(path.dirname(paths.stderr), { recursive: true });
  } catch (error) {
    throw new StageLogError(
      stage,
      `Cannot create ${stage} log directory ${path.dirname(paths.stdout)}: ${describe(error)}`,
      { cause: error },
    );
  }

  const stdout = new TeeStream(consoleStreams.stdout, paths.stdout);
  const stderr = new TeeStream(consoleStreams.stderr, paths.stderr);

  return {
    stdout,
    stderr,
    paths,
    close: async () => {
      stdout.end();
      stderr.end();
      try {
        await Promise.all([finished(stdout), finished(stderr)]);
      } catch (error) {
        throw new StageLogError(
          stage,
          `Cannot write ${stage} logs: ${describe(error)}`,
          { cause: error },
        );
      }
    },
  };
};

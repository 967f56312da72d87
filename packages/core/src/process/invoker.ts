import type { Writable } from "node:stream";
import { execa } from "execa";

export type InvocationRequest = {
  command: string;
  args: readonly string[];
  /** Extra variables for this child only; the parent environment is untouched. */
  env: Readonly<Record<string, string>>;
  stdout: Writable;
  stderr: Writable;
  signal?: AbortSignal;
};

export type InvocationResult = {
  exitCode: number;
  interrupted: boolean;
  /** Set when the process could not be started or died without an exit code. */
  failureMessage?: string;
};

export type ProcessInvoker = (
  request: InvocationRequest,
) => Promise<InvocationResult>;

// Conventional shell status for a command that could not be run.
const SPAWN_FAILURE_EXIT_CODE = 127;

export const execaInvoker: ProcessInvoker = async (request) => {
  const subprocess = execa(request.command, request.args, {
    env: { ...request.env },
    extendEnv: true,
    stdin: "ignore",
    buffer: false,
    reject: false,
    cancelSignal: request.signal,
  });

  subprocess.stdout.pipe(request.stdout, { end: false });
  subprocess.stderr.pipe(request.stderr, { end: false });

  const result = await subprocess;

  if (result.isCanceled) {
    return {
      exitCode: result.exitCode ?? SPAWN_FAILURE_EXIT_CODE,
      interrupted: true,
    };
  }

  if (result.exitCode === undefined) {
    return {
      exitCode: SPAWN_FAILURE_EXIT_CODE,
      interrupted: false,
      failureMessage: result.signal
        ? `${request.command} was terminated by ${result.signal}`
        : `${request.command} could not be started`,
    };
  }

  return { exitCode: result.exitCode, interrupted: false };
};

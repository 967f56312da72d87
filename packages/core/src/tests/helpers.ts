import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Writable } from "node:stream";
import type { TestContext } from "node:test";
import type { QueryExecutor, QueryRows } from "../db/query.js";
import type { ConsoleStreams } from "../logging/log-sink.js";
import type {
  InvocationRequest,
  InvocationResult,
  ProcessInvoker,
} from "../process/invoker.js";
import type { RunReporter } from "../run/reporter.js";
import type { MigrationInput } from "../run/resolve.js";
import type { Endpoint } from "../run/types.js";

/** 2025-05-13 11:46:30 UTC, i.e. run id 20250513_114630. */
export const FIXED_NOW = new Date(Date.UTC(2025, 4, 13, 11, 46, 30));
export const FIXED_RUN_ID = "20250513_114630";

export const sampleInput = (
  overrides: Partial<MigrationInput> = {},
): MigrationInput => ({
  source: {
    host: "host1",
    port: 5432,
    database: "db1",
    user: "reader",
    password: "test-secret",
  },
  target: {
    host: "host2",
    port: "5433",
    database: "db2",
    user: "writer",
    password: "test-secret-2",
  },
  mode: "auto",
  ...overrides,
});

export const makeTempDir = async (t: TestContext): Promise<string> => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "pgshift-test-"));
  t.after(() => fs.rm(dir, { recursive: true, force: true }));
  return dir;
};

export const pathExists = (filePath: string): Promise<boolean> =>
  fs
    .access(filePath)
    .then(() => true)
    .catch(() => false);

export class CaptureStream extends Writable {
  chunks: string[] = [];

  override _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    this.chunks.push(chunk.toString("utf8"));
    callback();
  }

  get text(): string {
    return this.chunks.join("");
  }
}

export const captureConsole = (): ConsoleStreams & {
  stdout: CaptureStream;
  stderr: CaptureStream;
} => ({
  stdout: new CaptureStream(),
  stderr: new CaptureStream(),
});

export type FakeTool = {
  exitCode?: number;
  stdout?: string[];
  stderr?: string[];
  /** Content written to the path following `-f`, like pg_dump does. */
  artifactContent?: string;
  interrupted?: boolean;
  failureMessage?: string;
};

export type FakeInvoker = {
  calls: InvocationRequest[];
  invoke: ProcessInvoker;
  callsTo(tool: string): InvocationRequest[];
};

export const createFakeInvoker = (
  tools: Record<string, FakeTool>,
): FakeInvoker => {
  const calls: InvocationRequest[] = [];

  const invoke: ProcessInvoker = async (request) => {
    calls.push(request);

    const tool = tools[path.basename(request.command)];
    if (!tool) {
      throw new Error(`Unexpected command ${request.command}`);
    }

    for (const line of tool.stdout ?? []) {
      request.stdout.write(line);
    }
    for (const line of tool.stderr ?? []) {
      request.stderr.write(line);
    }

    if (tool.artifactContent !== undefined) {
      const fileIndex = request.args.indexOf("-f");
      await fs.writeFile(request.args[fileIndex + 1], tool.artifactContent);
    }

    const result: InvocationResult = {
      exitCode: tool.exitCode ?? 0,
      interrupted: tool.interrupted ?? false,
    };
    if (tool.failureMessage) {
      result.failureMessage = tool.failureMessage;
    }
    return result;
  };

  return {
    calls,
    invoke,
    callsTo: (tool) =>
      calls.filter((call) => path.basename(call.command) === tool),
  };
};

export type FakeQuery = {
  calls: Array<{ endpoint: Endpoint; sql: string; signal?: AbortSignal }>;
  query: QueryExecutor;
};

export const createFakeQuery = (
  respond: (sql: string, endpoint: Endpoint) => QueryRows,
): FakeQuery => {
  const calls: FakeQuery["calls"] = [];

  return {
    calls,
    query: async (endpoint, sql, signal) => {
      calls.push({ endpoint, sql, signal });
      return respond(sql, endpoint);
    },
  };
};

export const RELATIONS: QueryRows = {
  columns: ["schema", "name", "type"],
  rows: [
    { schema: "public", name: "orders", type: "table" },
    { schema: "public", name: "users", type: "table" },
  ],
};

export const createRecordingReporter = (): {
  events: string[];
  reporter: RunReporter;
} => {
  const events: string[] = [];

  return {
    events,
    reporter: {
      runStarted: (run) => {
        events.push(`start ${run.id}`);
      },
      step: (index, total, message) => {
        events.push(`step ${index}/${total} ${message}`);
      },
      success: (message) => {
        events.push(`ok ${message}`);
      },
      completed: () => {
        events.push("completed");
      },
      failed: (error) => {
        events.push(`failed ${error.stage}`);
      },
    },
  };
};

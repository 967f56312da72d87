import test from "node:test";
import assert from "node:assert/strict";
import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import {
  ArtifactNotFoundError,
  ConfigError,
  DumpError,
  RestoreError,
  RunInterruptedError,
  StageLogError,
  VerificationError,
} from "../errors.js";
import { execaInvoker, type ProcessInvoker } from "../process/invoker.js";
import {
  MigrationOrchestrator,
  runMigration,
  type MigrationOrchestratorOptions,
} from "../run/orchestrator.js";
import type { MigrationInput } from "../run/resolve.js";
import {
  FIXED_NOW,
  FIXED_RUN_ID,
  RELATIONS,
  captureConsole,
  createFakeInvoker,
  createFakeQuery,
  createRecordingReporter,
  makeTempDir,
  pathExists,
  sampleInput,
  type FakeTool,
} from "./helpers.js";

const DUMP_CONTENT = "PGDMP-orchestrator";

const setup = (
  dir: string,
  tools: Record<string, FakeTool>,
  input: Partial<MigrationInput> = {},
  options: Partial<MigrationOrchestratorOptions> = {},
) => {
  const invoker = createFakeInvoker(tools);
  const queries = createFakeQuery(() => RELATIONS);
  const recorder = createRecordingReporter();

  const orchestrator = new MigrationOrchestrator({
    input: sampleInput(input),
    invoke: invoker.invoke,
    query: queries.query,
    reporter: recorder.reporter,
    console: captureConsole(),
    now: FIXED_NOW,
    cwd: dir,
    ...options,
  });

  return { orchestrator, invoker, queries, events: recorder.events };
};

const healthyTools = (): Record<string, FakeTool> => ({
  pg_dump: { artifactContent: DUMP_CONTENT },
  pg_restore: {},
});

test("a successful auto run dumps, restores and verifies in order", async (t) => {
  const dir = await makeTempDir(t);
  const { orchestrator, invoker, queries, events } = setup(dir, healthyTools());

  const outcome = await orchestrator.run();
  const artifactPath = path.join(dir, "dump", `pg_dump_${FIXED_RUN_ID}.dump`);
  const digest = crypto.createHash("sha256").update(DUMP_CONTENT).digest("hex");

  assert.equal(outcome.state, "done");
  assert.equal(outcome.exitCode, 0);
  assert.equal(outcome.error, undefined);
  assert.deepEqual(outcome.transitions, [
    "configuring",
    "dumping",
    "restoring",
    "verifying",
    "done",
  ]);
  assert.equal(orchestrator.state, "done");
  assert.deepEqual(
    outcome.results.map((result) => [result.stage, result.exitCode]),
    [
      ["dump", 0],
      ["restore", 0],
      ["verify", 0],
    ],
  );
  assert.deepEqual(outcome.artifact, {
    path: artifactPath,
    bytes: DUMP_CONTENT.length,
    sha256: digest,
  });
  assert.equal(outcome.relations, RELATIONS);

  assert.deepEqual(
    invoker.calls.map((call) => call.command),
    ["pg_dump", "pg_restore"],
  );
  assert.equal(invoker.calls[1].args.at(-1), artifactPath);
  assert.equal(queries.calls.length, 1);

  assert.deepEqual(events, [
    `start ${FIXED_RUN_ID}`,
    "step 1/4 Dumping source database...",
    `ok Dump ready at ${artifactPath} (18 B, sha256 ${digest.slice(0, 12)})`,
    "step 2/4 Restoring into db2 with 4 parallel jobs...",
    "ok Restore completed",
    "step 3/4 Verifying target database...",
    "step 4/4 Migration finished",
    "completed",
  ]);

  for (const stage of ["dump", "restore", "verify"] as const) {
    assert.ok(await pathExists(outcome.run?.logs[stage].stdout ?? ""));
    assert.ok(await pathExists(outcome.run?.logs[stage].stderr ?? ""));
  }
});

test("a manual run restores the supplied dump without running pg_dump", async (t) => {
  const dir = await makeTempDir(t);
  const artifactPath = path.join(dir, "backup.dump");
  await fs.writeFile(artifactPath, DUMP_CONTENT);
  const { orchestrator, invoker, events } = setup(
    dir,
    { pg_restore: {} },
    { mode: "manual", artifactPath: "backup.dump" },
  );

  const outcome = await orchestrator.run();

  assert.equal(outcome.exitCode, 0);
  assert.deepEqual(
    invoker.calls.map((call) => call.command),
    ["pg_restore"],
  );
  assert.equal(invoker.calls[0].args.at(-1), artifactPath);
  assert.deepEqual(
    outcome.results.map((result) => result.stage),
    ["restore", "verify"],
  );
  assert.equal(events[1], `step 1/4 Using provided dump file ${artifactPath}`);
  assert.equal(await pathExists(path.join(dir, "logs", "dumps")), false);
});

test("invalid input fails before anything touches disk", async (t) => {
  const dir = await makeTempDir(t);
  const { orchestrator, invoker, queries, events } = setup(
    dir,
    healthyTools(),
    { mode: "sideways" },
  );

  const outcome = await orchestrator.run();

  assert.equal(outcome.state, "failed");
  assert.equal(outcome.exitCode, 2);
  assert.ok(outcome.error instanceof ConfigError);
  assert.equal(outcome.run, undefined);
  assert.deepEqual(outcome.transitions, ["configuring", "failed"]);
  assert.equal(invoker.calls.length, 0);
  assert.equal(queries.calls.length, 0);
  assert.deepEqual(events, ["failed config"]);
  assert.equal(await pathExists(path.join(dir, "logs")), false);
  assert.equal(await pathExists(path.join(dir, "dump")), false);
});

test("a missing manual dump file stops the run before restore", async (t) => {
  const dir = await makeTempDir(t);
  const { orchestrator, invoker, queries } = setup(dir, healthyTools(), {
    mode: "manual",
    artifactPath: "missing.dump",
  });

  const outcome = await orchestrator.run();

  assert.equal(outcome.exitCode, 3);
  assert.ok(outcome.error instanceof ArtifactNotFoundError);
  assert.equal(
    outcome.error.message,
    `Dump file ${path.join(dir, "missing.dump")} does not exist`,
  );
  assert.deepEqual(outcome.transitions, ["configuring", "dumping", "failed"]);
  assert.equal(invoker.calls.length, 0);
  assert.equal(queries.calls.length, 0);
  assert.equal(await pathExists(path.join(dir, "logs")), false);
});

test("a failed dump never starts pg_restore", async (t) => {
  const dir = await makeTempDir(t);
  const { orchestrator, invoker, queries, events } = setup(dir, {
    pg_dump: { exitCode: 1 },
    pg_restore: {},
  });

  const outcome = await orchestrator.run();

  assert.equal(outcome.exitCode, 4);
  assert.ok(outcome.error instanceof DumpError);
  assert.equal(outcome.error.exitCode, 1);
  assert.equal(invoker.callsTo("pg_restore").length, 0);
  assert.equal(queries.calls.length, 0);
  assert.deepEqual(outcome.results, []);
  assert.equal(events.at(-1), "failed dump");
});

test("a failed restore skips verification", async (t) => {
  const dir = await makeTempDir(t);
  const { orchestrator, queries } = setup(dir, {
    pg_dump: { artifactContent: DUMP_CONTENT },
    pg_restore: { exitCode: 1 },
  });

  const outcome = await orchestrator.run();

  assert.equal(outcome.exitCode, 5);
  assert.ok(outcome.error instanceof RestoreError);
  assert.deepEqual(outcome.transitions, [
    "configuring",
    "dumping",
    "restoring",
    "failed",
  ]);
  assert.equal(queries.calls.length, 0);
  assert.equal(outcome.results.length, 1);
  assert.ok(outcome.artifact);
});

test("a failed verification query fails the run with exit status 6", async (t) => {
  const dir = await makeTempDir(t);
  const { orchestrator } = setup(
    dir,
    healthyTools(),
    {},
    {
      query: createFakeQuery(() => {
        throw new Error("connection refused");
      }).query,
    },
  );

  const outcome = await orchestrator.run();

  assert.equal(outcome.exitCode, 6);
  assert.ok(outcome.error instanceof VerificationError);
  assert.equal(outcome.transitions.at(-2), "verifying");
  assert.equal(outcome.transitions.at(-1), "failed");
  assert.equal(outcome.results.length, 2);
});

test("an aborted signal interrupts the run before the next stage", async (t) => {
  const dir = await makeTempDir(t);
  const controller = new AbortController();
  controller.abort();
  const { orchestrator, invoker } = setup(
    dir,
    healthyTools(),
    {},
    { signal: controller.signal },
  );

  const outcome = await orchestrator.run();

  assert.equal(outcome.exitCode, 130);
  assert.ok(outcome.error instanceof RunInterruptedError);
  assert.equal(outcome.error.stage, "dump");
  assert.deepEqual(outcome.transitions, ["configuring", "dumping", "failed"]);
  assert.equal(invoker.calls.length, 0);
});

test("an interrupted pg_restore reports exit status 130", async (t) => {
  const dir = await makeTempDir(t);
  const { orchestrator } = setup(dir, {
    pg_dump: { artifactContent: DUMP_CONTENT },
    pg_restore: { exitCode: 1, interrupted: true },
  });

  const outcome = await orchestrator.run();

  assert.equal(outcome.exitCode, 130);
  assert.equal(outcome.error?.message, "Migration interrupted during restore");
});

test("an abort during the verification query fails the run as interrupted", async (t) => {
  const dir = await makeTempDir(t);
  const controller = new AbortController();
  const queries = createFakeQuery(() => {
    controller.abort();
    return RELATIONS;
  });
  const { orchestrator, events } = setup(
    dir,
    healthyTools(),
    {},
    { query: queries.query, signal: controller.signal },
  );

  const outcome = await orchestrator.run();

  assert.equal(outcome.state, "failed");
  assert.equal(outcome.exitCode, 130);
  assert.ok(outcome.error instanceof RunInterruptedError);
  assert.equal(outcome.error.stage, "verify");
  assert.deepEqual(outcome.transitions.slice(-2), ["verifying", "failed"]);
  assert.equal(outcome.relations, undefined);
  assert.equal(outcome.results.length, 2);
  assert.equal(queries.calls[0].signal, controller.signal);
  assert.equal(events.at(-1), "failed verify");
  assert.equal(
    await fs.readFile(outcome.run?.logs.verify.stdout ?? "", "utf8"),
    "",
  );
});

test("an abort stops a running pg_restore child and skips verification", async (t) => {
  const dir = await makeTempDir(t);
  const controller = new AbortController();
  const fakeTools = createFakeInvoker(healthyTools());
  const invoke: ProcessInvoker = (request) => {
    if (path.basename(request.command) !== "pg_restore") {
      return fakeTools.invoke(request);
    }

    setTimeout(() => controller.abort(), 200);
    return execaInvoker({
      ...request,
      command: process.execPath,
      args: ["-e", "setTimeout(() => {}, 30000);"],
    });
  };
  const { orchestrator, queries } = setup(
    dir,
    healthyTools(),
    {},
    { invoke, signal: controller.signal },
  );

  const outcome = await orchestrator.run();

  assert.equal(outcome.exitCode, 130);
  assert.ok(outcome.error instanceof RunInterruptedError);
  assert.equal(outcome.error.stage, "restore");
  assert.deepEqual(outcome.error.logs, outcome.run?.logs.restore);
  assert.deepEqual(outcome.transitions.slice(-2), ["restoring", "failed"]);
  assert.equal(queries.calls.length, 0);
});

test("a second run in the same second gets its own files", async (t) => {
  const dir = await makeTempDir(t);

  const first = await setup(dir, healthyTools()).orchestrator.run();
  const second = await setup(dir, healthyTools()).orchestrator.run();

  assert.equal(first.run?.id, FIXED_RUN_ID);
  assert.equal(second.run?.id, `${FIXED_RUN_ID}_1`);
  assert.equal(second.exitCode, 0);
  assert.equal(
    second.artifact?.path,
    path.join(dir, "dump", `pg_dump_${FIXED_RUN_ID}_1.dump`),
  );
  assert.equal(
    second.run?.logs.dump.stdout,
    path.join(dir, "logs", "dumps", `dump_${FIXED_RUN_ID}_1_stdout.log`),
  );
  assert.ok(await pathExists(first.artifact?.path ?? ""));
});

test("a log directory that cannot be created fails the stage that needed it", async (t) => {
  const dir = await makeTempDir(t);
  const blocker = path.join(dir, "logs-file");
  await fs.writeFile(blocker, "");
  const { orchestrator, invoker } = setup(dir, healthyTools(), {
    logsDir: blocker,
  });

  const outcome = await orchestrator.run();

  assert.equal(outcome.exitCode, 4);
  assert.ok(outcome.error instanceof StageLogError);
  assert.equal(outcome.error.stage, "dump");
  assert.equal(invoker.calls.length, 0);
});

test("credentials never leak into the parent environment", async (t) => {
  const dir = await makeTempDir(t);
  const before = process.env.PGPASSWORD;
  const { orchestrator, invoker } = setup(dir, healthyTools());

  await orchestrator.run();

  assert.equal(process.env.PGPASSWORD, before);
  assert.deepEqual(
    invoker.calls.map((call) => call.env),
    [{ PGPASSWORD: "test-secret" }, { PGPASSWORD: "test-secret-2" }],
  );
  for (const call of invoker.calls) {
    assert.equal(call.args.includes("test-secret"), false);
    assert.equal(call.args.includes("test-secret-2"), false);
  }
});

test("unexpected errors propagate and leave the run failed", async (t) => {
  const dir = await makeTempDir(t);
  const { orchestrator } = setup(dir, { pg_restore: {} });

  await assert.rejects(orchestrator.run(), {
    message: "Unexpected command pg_dump",
  });
  assert.equal(orchestrator.state, "failed");
});

test("an orchestrator runs only once", async (t) => {
  const dir = await makeTempDir(t);
  const { orchestrator } = setup(dir, healthyTools());

  await orchestrator.run();

  await assert.rejects(orchestrator.run(), {
    message: "A migration orchestrator can only run once",
  });
});

test("runMigration runs a fresh orchestrator", async (t) => {
  const dir = await makeTempDir(t);
  const invoker = createFakeInvoker(healthyTools());

  const outcome = await runMigration({
    input: sampleInput(),
    invoke: invoker.invoke,
    query: createFakeQuery(() => RELATIONS).query,
    reporter: createRecordingReporter().reporter,
    console: captureConsole(),
    now: FIXED_NOW,
    cwd: dir,
  });

  assert.equal(outcome.exitCode, 0);
  assert.equal(outcome.run?.id, FIXED_RUN_ID);
});

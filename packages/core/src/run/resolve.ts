import path from "node:path";
import { ConfigError } from "../errors.js";
import type {
  Endpoint,
  MigrationRun,
  RunMode,
  StageLogPaths,
  StageName,
} from "./types.js";

export type EndpointRole = "source" | "target";

export type EndpointInput = {
  host?: string;
  port?: number | string;
  database?: string;
  user?: string;
  password?: string;
};

export type MigrationInput = {
  source?: EndpointInput;
  target?: EndpointInput;
  mode?: string;
  artifactPath?: string;
  dumpDir?: string;
  logsDir?: string;
  jobs?: number | string;
  tools?: {
    pgDump?: string;
    pgRestore?: string;
  };
};

export type ResolveOptions = {
  now?: Date;
  cwd?: string;
  /** Appended to the run id as `_<n>` when greater than zero. */
  sequence?: number;
};

export const DEFAULT_DUMP_DIR = "dump";
export const DEFAULT_LOGS_DIR = "logs";
export const DEFAULT_RESTORE_JOBS = 4;

const STAGE_LOG_LAYOUT: Record<StageName, { dir: string; prefix: string }> = {
  dump: { dir: "dumps", prefix: "dump" },
  restore: { dir: "restore", prefix: "restore" },
  verify: { dir: "verify", prefix: "verify" },
};

const pad2 = (value: number): string => String(value).padStart(2, "0");

/** `YYYYMMDD_HHMMSS` in UTC. */
export const formatRunTimestamp = (date: Date): string =>
  `${date.getUTCFullYear()}${pad2(date.getUTCMonth() + 1)}${pad2(
    date.getUTCDate(),
  )}_${pad2(date.getUTCHours())}${pad2(date.getUTCMinutes())}${pad2(
    date.getUTCSeconds(),
  )}`;

const isBlank = (value: string | undefined): boolean =>
  value === undefined || value.trim() === "";

const parsePort = (value: number | string): number | null => {
  const port =
    typeof value === "number"
      ? value
      : /^\d+$/.test(value.trim())
        ? Number(value.trim())
        : Number.NaN;

  return Number.isInteger(port) && port >= 1 && port <= 65535 ? port : null;
};

const parseJobs = (value: number | string): number | null => {
  const jobs =
    typeof value === "number"
      ? value
      : /^\d+$/.test(value.trim())
        ? Number(value.trim())
        : Number.NaN;

  return Number.isInteger(jobs) && jobs >= 1 ? jobs : null;
};

const collectEndpoint = (
  role: EndpointRole,
  input: EndpointInput | undefined,
  issues: string[],
): Endpoint | null => {
  const missing: string[] = [];
  const { host, port, database, user, password } = input ?? {};

  if (isBlank(host)) missing.push("host");
  if (port === undefined || (typeof port === "string" && port.trim() === "")) {
    missing.push("port");
  }
  if (isBlank(database)) missing.push("database");
  if (isBlank(user)) missing.push("user");
  if (password === undefined) missing.push("password");

  if (missing.length > 0) {
    issues.push(`Missing ${role} endpoint fields: ${missing.join(", ")}`);
    return null;
  }

  const parsedPort = port === undefined ? null : parsePort(port);
  if (parsedPort === null) {
    issues.push(`Invalid ${role} port "${port}": expected an integer 1-65535`);
  }

  if (
    parsedPort === null ||
    host === undefined ||
    database === undefined ||
    user === undefined ||
    password === undefined
  ) {
    return null;
  }

  return Object.freeze({
    host: host.trim(),
    port: parsedPort,
    database: database.trim(),
    user: user.trim(),
    password,
  });
};

/**
 * Validates one endpoint on its own, for commands that only talk to the
 * databases.
 */
export const resolveEndpoint = (
  role: EndpointRole,
  input: EndpointInput | undefined,
): Endpoint => {
  const issues: string[] = [];
  const endpoint = collectEndpoint(role, input, issues);

  if (!endpoint) {
    throw new ConfigError(issues);
  }

  return endpoint;
};

const resolveMode = (
  mode: string | undefined,
  artifactPath: string | undefined,
  cwd: string,
  issues: string[],
): RunMode | null => {
  const hasArtifact = !isBlank(artifactPath);

  switch (mode) {
    case "auto":
      if (hasArtifact) {
        issues.push(
          "A dump file cannot be combined with auto mode; use manual mode to restore an existing dump",
        );
        return null;
      }
      return { kind: "auto" };
    case "manual":
      if (artifactPath === undefined || !hasArtifact) {
        issues.push("A dump file must be provided in manual mode");
        return null;
      }
      return Object.freeze({
        kind: "manual",
        artifactPath: path.resolve(cwd, artifactPath),
      });
    case undefined:
      issues.push('Run mode is required: "auto" or "manual"');
      return null;
    default:
      issues.push(`Unknown run mode "${mode}": expected "auto" or "manual"`);
      return null;
  }
};

const stageLogPaths = (
  logsDir: string,
  stage: StageName,
  id: string,
): StageLogPaths => {
  const { dir, prefix } = STAGE_LOG_LAYOUT[stage];
  const base = path.join(logsDir, dir, `${prefix}_${id}`);

  return Object.freeze({
    stdout: `${base}_stdout.log`,
    stderr: `${base}_stderr.log`,
  });
};

/**
 * Validates caller input and builds the immutable description of one run.
 * Touches nothing on disk.
 */
export const resolveMigrationRun = (
  input: MigrationInput,
  { now = new Date(), cwd = process.cwd(), sequence = 0 }: ResolveOptions = {},
): MigrationRun => {
  const issues: string[] = [];

  const source = collectEndpoint("source", input.source, issues);
  const target = collectEndpoint("target", input.target, issues);
  const mode = resolveMode(input.mode, input.artifactPath, cwd, issues);

  const jobs =
    input.jobs === undefined ? DEFAULT_RESTORE_JOBS : parseJobs(input.jobs);
  if (jobs === null) {
    issues.push(
      `Invalid restore jobs "${input.jobs}": expected a positive integer`,
    );
  }

  if (issues.length > 0 || !source || !target || !mode || jobs === null) {
    throw new ConfigError(issues);
  }

  const timestamp = formatRunTimestamp(now);
  const id = sequence > 0 ? `${timestamp}_${sequence}` : timestamp;
  const dumpDir = path.resolve(cwd, input.dumpDir || DEFAULT_DUMP_DIR);
  const logsDir = path.resolve(cwd, input.logsDir || DEFAULT_LOGS_DIR);
  const artifactPath =
    mode.kind === "manual"
      ? mode.artifactPath
      : path.join(dumpDir, `pg_dump_${id}.dump`);

  return Object.freeze({
    id,
    timestamp,
    startedAt: now.toISOString(),
    source,
    target,
    mode,
    artifactPath,
    dumpDir,
    logsDir,
    jobs,
    tools: Object.freeze({
      pgDump: input.tools?.pgDump || "pg_dump",
      pgRestore: input.tools?.pgRestore || "pg_restore",
    }),
    logs: Object.freeze({
      dump: stageLogPaths(logsDir, "dump", id),
      restore: stageLogPaths(logsDir, "restore", id),
      verify: stageLogPaths(logsDir, "verify", id),
    }),
  });
};

const POSITIONAL_FIELDS = [
  "SRC_DB",
  "SRC_USER",
  "SRC_PASS",
  "SRC_HOST",
  "SRC_PORT",
  "DST_DB",
  "DST_USER",
  "DST_PASS",
  "DST_HOST",
  "DST_PORT",
  "MODE",
] as const;

/**
 * Maps `SRC_DB SRC_USER SRC_PASS SRC_HOST SRC_PORT DST_DB DST_USER DST_PASS
 * DST_HOST DST_PORT MODE [DUMP_FILE]` onto named input.
 */
export const parsePositionalInput = (
  args: readonly string[],
): MigrationInput => {
  const required = POSITIONAL_FIELDS.length;

  if (args.length < required || args.length > required + 1) {
    throw new ConfigError([
      `Expected ${required} or ${required + 1} positional arguments ` +
        `(${POSITIONAL_FIELDS.join(" ")} [DUMP_FILE]), got ${args.length}`,
    ]);
  }

  const [
    srcDatabase,
    srcUser,
    srcPassword,
    srcHost,
    srcPort,
    dstDatabase,
    dstUser,
    dstPassword,
    dstHost,
    dstPort,
    mode,
    artifactPath,
  ] = args;

  return {
    source: {
      database: srcDatabase,
      user: srcUser,
      password: srcPassword,
      host: srcHost,
      port: srcPort,
    },
    target: {
      database: dstDatabase,
      user: dstUser,
      password: dstPassword,
      host: dstHost,
      port: dstPort,
    },
    mode,
    artifactPath: artifactPath || undefined,
  };
};

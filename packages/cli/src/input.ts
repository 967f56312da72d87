import path from "node:path";
import type { EndpointConfig, EnvConfig } from "@pgshift/config";
import {
  ConfigError,
  parsePositionalInput,
  type EndpointInput,
  type MigrationInput,
} from "@pgshift/core";

export type EndpointFlags = {
  sourceHost?: string;
  sourcePort?: string;
  sourceDatabase?: string;
  sourceUser?: string;
  sourcePassword?: string;
  targetHost?: string;
  targetPort?: string;
  targetDatabase?: string;
  targetUser?: string;
  targetPassword?: string;
};

export type MigrateFlags = EndpointFlags & {
  mode?: string;
  artifact?: string;
  jobs?: string;
  dumpDir?: string;
  logsDir?: string;
};

export type ConfigFlags = {
  config?: string;
  env?: string;
  envFile?: string;
  var?: string[];
};

export type LoadedConfig = {
  path: string;
  envName: string;
  config: EnvConfig;
};

const DEFAULT_MODE = "auto";

/** Flags win over config values, field by field. */
export const mergeEndpoint = (
  config: EndpointConfig | undefined,
  overrides: EndpointInput,
): EndpointInput => ({
  host: overrides.host ?? config?.host,
  port: overrides.port ?? config?.port,
  database: overrides.database ?? config?.database,
  user: overrides.user ?? config?.user,
  password: overrides.password ?? config?.password,
});

export const sourceFlags = (flags: EndpointFlags): EndpointInput => ({
  host: flags.sourceHost,
  port: flags.sourcePort,
  database: flags.sourceDatabase,
  user: flags.sourceUser,
  password: flags.sourcePassword,
});

export const targetFlags = (flags: EndpointFlags): EndpointInput => ({
  host: flags.targetHost,
  port: flags.targetPort,
  database: flags.targetDatabase,
  user: flags.targetUser,
  password: flags.targetPassword,
});

/** Directories in a config file are relative to the file, not the shell. */
const configDir = (
  loaded: LoadedConfig | undefined,
  dir: string | undefined,
): string | undefined =>
  loaded && dir ? path.resolve(path.dirname(loaded.path), dir) : undefined;

export const buildMigrationInput = (
  loaded: LoadedConfig | undefined,
  flags: MigrateFlags,
): MigrationInput => {
  const config = loaded?.config;

  return {
    source: mergeEndpoint(config?.source, sourceFlags(flags)),
    target: mergeEndpoint(config?.target, targetFlags(flags)),
    mode: flags.mode ?? DEFAULT_MODE,
    artifactPath: flags.artifact,
    dumpDir: flags.dumpDir ?? configDir(loaded, config?.dump.dir),
    logsDir: flags.logsDir ?? configDir(loaded, config?.logs.dir),
    jobs: flags.jobs ?? config?.restore.jobs,
    tools: {
      pgDump: config?.tools.pg_dump,
      pgRestore: config?.tools.pg_restore,
    },
  };
};

// Positional arguments already name both endpoints and the mode.
const POSITIONAL_CONFLICTS: Array<[keyof (MigrateFlags & ConfigFlags), string]> =
  [
    ["mode", "--mode"],
    ["artifact", "--artifact"],
    ["config", "--config"],
    ["env", "--env"],
    ["envFile", "--env-file"],
    ["var", "--var"],
    ["sourceHost", "--source-host"],
    ["sourcePort", "--source-port"],
    ["sourceDatabase", "--source-database"],
    ["sourceUser", "--source-user"],
    ["sourcePassword", "--source-password"],
    ["targetHost", "--target-host"],
    ["targetPort", "--target-port"],
    ["targetDatabase", "--target-database"],
    ["targetUser", "--target-user"],
    ["targetPassword", "--target-password"],
  ];

/**
 * The positional form plus the run options it has no slot for. Flags that
 * would compete with a positional value are rejected.
 */
export const buildPositionalInput = (
  args: readonly string[],
  flags: MigrateFlags & ConfigFlags,
): MigrationInput => {
  const conflicts = POSITIONAL_CONFLICTS.filter(
    ([key]) => flags[key] !== undefined,
  ).map(([, name]) => name);

  if (conflicts.length > 0) {
    throw new ConfigError([
      `${conflicts.join(", ")} cannot be combined with positional arguments`,
    ]);
  }

  return {
    ...parsePositionalInput(args),
    jobs: flags.jobs,
    dumpDir: flags.dumpDir,
    logsDir: flags.logsDir,
  };
};

export const reportsDir = (
  loaded: LoadedConfig | undefined,
  flag: string | undefined,
): string | undefined =>
  flag ?? configDir(loaded, loaded?.config.reports.dir);

export const parseVars = (varArgs: string[] = []): Record<string, string> => {
  const vars: Record<string, string> = {};
  for (const arg of varArgs) {
    const [key, ...valueParts] = arg.split("=");
    if (key && valueParts.length > 0) {
      vars[key] = valueParts.join("=");
    }
  }
  return vars;
};

import fs from "node:fs/promises";
import path from "node:path";
import { parse } from "@cdktf/hcl2json";
import {
  extractNumeric,
  extractString,
  extractValue,
  type Scalar,
} from "./utils.js";

export const CONFIG_FILE_NAME = "pgshift.hcl";

export type EndpointConfig = {
  host?: string;
  port?: number | string;
  database?: string;
  user?: string;
  password?: string;
};

export type ToolsConfig = {
  pg_dump?: string;
  pg_restore?: string;
};

export type EnvConfig = {
  source: EndpointConfig;
  target: EndpointConfig;
  dump: { dir?: string };
  restore: { jobs?: number | string };
  logs: { dir?: string };
  reports: { dir?: string };
  tools: ToolsConfig;
};

export type VariableConfig = {
  type: string;
  default?: unknown;
  description?: string;
};

type HCLAttribute = Scalar[] | Scalar;

type HCLEndpointBlock = {
  host?: HCLAttribute;
  port?: HCLAttribute;
  database?: HCLAttribute;
  user?: HCLAttribute;
  password?: HCLAttribute;
};

type HCLEnvBlock = {
  source?: HCLEndpointBlock[];
  target?: HCLEndpointBlock[];
  dump?: Array<{ dir?: HCLAttribute }>;
  restore?: Array<{ jobs?: HCLAttribute }>;
  logs?: Array<{ dir?: HCLAttribute }>;
  reports?: Array<{ dir?: HCLAttribute }>;
  tools?: Array<{ pg_dump?: HCLAttribute; pg_restore?: HCLAttribute }>;
};

type HCLVariableBlock = {
  type: string[] | string;
  default?: HCLAttribute;
  description?: string[] | string;
};

type ParsedHCL = {
  env?: Record<string, HCLEnvBlock[]>;
  variable?: Record<string, HCLVariableBlock[]>;
};

type Resolver = {
  env: Record<string, string | undefined>;
  vars: Record<string, string>;
};

const parseEndpoint = (
  block: HCLEndpointBlock | undefined,
  { env, vars }: Resolver,
): EndpointConfig => {
  if (!block) {
    return {};
  }

  return {
    host: extractString(block.host, env, vars),
    port: extractNumeric(block.port, env, vars),
    database: extractString(block.database, env, vars),
    user: extractString(block.user, env, vars),
    // Passwords are allowed to resolve to an empty string.
    password:
      block.password === undefined
        ? undefined
        : (extractString(block.password, env, vars) ?? ""),
  };
};

/**
 * Parses HCL config file and returns normalized configuration for one environment
 */
export const parseConfig = async (
  content: string,
  env: Record<string, string | undefined> = {},
  vars: Record<string, string> = {},
  envName?: string,
  sourceName: string = CONFIG_FILE_NAME,
): Promise<EnvConfig> => {
  const parsed = (await parse(sourceName, content)) as ParsedHCL;

  if (!parsed.env) {
    throw new Error("No environments defined in config file");
  }

  const variables: Record<string, string> = { ...vars };

  if (parsed.variable) {
    for (const [varName, varBlocks] of Object.entries(parsed.variable)) {
      const defaultValue = extractValue(varBlocks[0]?.default);

      if (defaultValue !== undefined && !variables[varName]) {
        variables[varName] = String(defaultValue);
      }
    }
  }

  const targetEnv = envName || Object.keys(parsed.env)[0];

  if (!targetEnv) {
    throw new Error(
      "No environment specified and no default environment found",
    );
  }

  const envBlock = parsed.env[targetEnv]?.[0];

  if (!envBlock) {
    throw new Error(`Environment "${targetEnv}" not found in config file`);
  }

  const resolver: Resolver = { env, vars: variables };
  const toolsBlock = envBlock.tools?.[0];

  return {
    source: parseEndpoint(envBlock.source?.[0], resolver),
    target: parseEndpoint(envBlock.target?.[0], resolver),
    dump: { dir: extractString(envBlock.dump?.[0]?.dir, env, variables) },
    restore: {
      jobs: extractNumeric(envBlock.restore?.[0]?.jobs, env, variables),
    },
    logs: { dir: extractString(envBlock.logs?.[0]?.dir, env, variables) },
    reports: { dir: extractString(envBlock.reports?.[0]?.dir, env, variables) },
    tools: {
      pg_dump: extractString(toolsBlock?.pg_dump, env, variables),
      pg_restore: extractString(toolsBlock?.pg_restore, env, variables),
    },
  };
};

export const parseConfigFile = async (
  configPath: string,
  envName?: string,
  vars: Record<string, string> = {},
  env: Record<string, string | undefined> = process.env,
): Promise<EnvConfig> => {
  const content = await fs.readFile(configPath, "utf8");

  return parseConfig(content, env, vars, envName, configPath);
};

export const listEnvironments = async (
  content: string,
  sourceName: string = CONFIG_FILE_NAME,
): Promise<string[]> => {
  const parsed = (await parse(sourceName, content)) as ParsedHCL;
  if (!parsed.env) {
    return [];
  }
  return Object.keys(parsed.env);
};

export const listEnvironmentsFile = async (
  configPath: string,
): Promise<string[]> => {
  const content = await fs.readFile(configPath, "utf8");
  return listEnvironments(content, configPath);
};

/**
 * Finds config file in current directory or parent directories
 */
export const findConfigFile = async (
  startDir: string = process.cwd(),
  fileName: string = CONFIG_FILE_NAME,
): Promise<string | null> => {
  let currentDir = startDir;

  const root = path.parse(currentDir).root;

  while (currentDir !== root) {
    const configPath = path.join(currentDir, fileName);

    try {
      await fs.access(configPath);

      return configPath;
    } catch {
      // Not here, keep walking up.
    }
    currentDir = path.dirname(currentDir);
  }

  return null;
};

import fs from "node:fs/promises";
import { ConfigError } from "../errors.js";
import { resolvePackagePath } from "../utils.js";

/** Section name to read-only SQL. */
export type QueryCatalog = Record<string, string>;

export const DEFAULT_CATALOG_PATH = resolvePackagePath(
  import.meta.url,
  "../../queries/catalog.json",
);

export const parseQueryCatalog = (
  content: string,
  sourceName: string,
): QueryCatalog => {
  let parsed: unknown;

  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError([
      `Query catalog ${sourceName} is not valid JSON: ${
        error instanceof Error ? error.message : String(error)
      }`,
    ]);
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError([
      `Query catalog ${sourceName} must be an object of named queries`,
    ]);
  }

  const catalog: QueryCatalog = {};
  const issues: string[] = [];

  for (const [name, query] of Object.entries(parsed)) {
    if (typeof query !== "string" || query.trim() === "") {
      issues.push(`Query "${name}" in ${sourceName} must be a non-empty string`);
      continue;
    }
    catalog[name] = query;
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  if (Object.keys(catalog).length === 0) {
    throw new ConfigError([`Query catalog ${sourceName} has no queries`]);
  }

  return catalog;
};

export const loadQueryCatalog = async (
  catalogPath: string = DEFAULT_CATALOG_PATH,
): Promise<QueryCatalog> => {
  const content = await fs.readFile(catalogPath, "utf8");

  return parseQueryCatalog(content, catalogPath);
};

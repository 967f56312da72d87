import type { QueryExecutor } from "../db/query.js";
import type { Endpoint } from "../run/types.js";
import type { QueryCatalog } from "./catalog.js";
import type { ReportSection } from "./report.js";

export type DatabaseSide = "source" | "target";

export const infoReportName = (
  side: DatabaseSide,
  database: string,
): string => `output_${side}_${database}`;

/**
 * Runs every catalog query against one database, in catalog order. The first
 * failing query aborts collection.
 */
export const collectDatabaseInfo = async (
  endpoint: Endpoint,
  catalog: QueryCatalog,
  query: QueryExecutor,
): Promise<ReportSection[]> => {
  const sections: ReportSection[] = [];

  for (const [name, sql] of Object.entries(catalog)) {
    try {
      const { columns, rows } = await query(endpoint, sql);
      sections.push({ name, columns, rows });
    } catch (error) {
      throw new Error(
        `Query "${name}" failed on ${endpoint.database}: ${
          error instanceof Error ? error.message : String(error)
        }`,
        { cause: error },
      );
    }
  }

  return sections;
};

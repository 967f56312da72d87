import type { QueryExecutor, QueryRow } from "../db/query.js";
import type { Endpoint } from "../run/types.js";
import type { ReportSection } from "./report.js";

export type RowCount = {
  schema: string;
  table: string;
  rows: number;
};

export type RowCountComparison = {
  schema: string;
  table: string;
  sourceRows: number | null;
  targetRows: number | null;
  match: boolean;
};

export type RowCountReport = {
  comparison: RowCountComparison[];
  missingInSource: RowCount[];
  missingInTarget: RowCount[];
};

export type RowCountFetchResult = {
  counts: RowCount[];
  /** ANALYZE refreshes the estimates; counts are still read when it fails. */
  analyzeError?: Error;
};

export const ROW_COUNTS_QUERY = `SELECT schemaname AS schema_name,
       relname AS table_name,
       n_live_tup AS estimated_rows
FROM pg_stat_user_tables
ORDER BY schema_name, table_name`;

const keyOf = (schema: string, table: string): string =>
  JSON.stringify([schema, table]);

const byName = (
  a: { schema: string; table: string },
  b: { schema: string; table: string },
): number => {
  if (a.schema !== b.schema) {
    return a.schema < b.schema ? -1 : 1;
  }
  if (a.table !== b.table) {
    return a.table < b.table ? -1 : 1;
  }
  return 0;
};

const toRowCount = (row: QueryRow): RowCount => ({
  schema: String(row.schema_name),
  table: String(row.table_name),
  // bigint columns arrive as strings from pg
  rows: Number(row.estimated_rows),
});

export const fetchRowCounts = async (
  endpoint: Endpoint,
  query: QueryExecutor,
): Promise<RowCountFetchResult> => {
  let analyzeError: Error | undefined;

  try {
    await query(endpoint, "ANALYZE");
  } catch (error) {
    analyzeError = error instanceof Error ? error : new Error(String(error));
  }

  const { rows } = await query(endpoint, ROW_COUNTS_QUERY);

  return { counts: rows.map(toRowCount), analyzeError };
};

/**
 * Joins estimated row counts of both sides on (schema, table). A table present
 * on one side only has `null` for the other side and never matches.
 */
export const compareRowCounts = (
  source: RowCount[],
  target: RowCount[],
): RowCountReport => {
  const sourceByKey = new Map(
    source.map((count) => [keyOf(count.schema, count.table), count]),
  );
  const targetByKey = new Map(
    target.map((count) => [keyOf(count.schema, count.table), count]),
  );
  const keys = new Set([...sourceByKey.keys(), ...targetByKey.keys()]);

  const comparison: RowCountComparison[] = [];
  for (const key of keys) {
    const fromSource = sourceByKey.get(key);
    const fromTarget = targetByKey.get(key);
    const named = fromSource ?? fromTarget;
    if (!named) {
      continue;
    }

    const sourceRows = fromSource ? fromSource.rows : null;
    const targetRows = fromTarget ? fromTarget.rows : null;

    comparison.push({
      schema: named.schema,
      table: named.table,
      sourceRows,
      targetRows,
      match: sourceRows !== null && sourceRows === targetRows,
    });
  }

  return {
    comparison: comparison.sort(byName),
    missingInSource: target
      .filter((count) => !sourceByKey.has(keyOf(count.schema, count.table)))
      .sort(byName),
    missingInTarget: source
      .filter((count) => !targetByKey.has(keyOf(count.schema, count.table)))
      .sort(byName),
  };
};

const countColumns = ["schema_name", "table_name", "estimated_rows"];

const countSection = (name: string, counts: RowCount[]): ReportSection => ({
  name,
  columns: countColumns,
  rows: counts.map((count) => ({
    schema_name: count.schema,
    table_name: count.table,
    estimated_rows: count.rows,
  })),
});

/** Missing-table sections are only included when non-empty. */
export const rowCountSections = (report: RowCountReport): ReportSection[] => {
  const sections: ReportSection[] = [
    {
      name: "RowCountComparison",
      columns: [
        "schema_name",
        "table_name",
        "estimated_rows_source",
        "estimated_rows_target",
        "row_count_match",
      ],
      rows: report.comparison.map((entry) => ({
        schema_name: entry.schema,
        table_name: entry.table,
        estimated_rows_source: entry.sourceRows,
        estimated_rows_target: entry.targetRows,
        row_count_match: entry.match,
      })),
    },
  ];

  if (report.missingInSource.length > 0) {
    sections.push(countSection("MissingInSource", report.missingInSource));
  }
  if (report.missingInTarget.length > 0) {
    sections.push(countSection("MissingInTarget", report.missingInTarget));
  }

  return sections;
};

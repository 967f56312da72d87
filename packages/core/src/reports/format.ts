import type { QueryRow } from "../db/query.js";

export const formatCell = (value: unknown): string => {
  if (value === null || value === undefined) {
    return "";
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
};

/**
 * Aligned text table in the style of psql:
 *
 *  schema | name
 * --------+--------
 *  public | users
 */
export const formatTable = (columns: string[], rows: QueryRow[]): string => {
  if (columns.length === 0) {
    return "";
  }

  const cells = rows.map((row) =>
    columns.map((column) => formatCell(row[column])),
  );
  const widths = columns.map((column, index) =>
    Math.max(column.length, ...cells.map((line) => line[index].length)),
  );

  const renderLine = (values: string[]): string =>
    values
      .map((value, index) => ` ${value.padEnd(widths[index])} `)
      .join("|")
      .trimEnd();

  return [
    renderLine(columns),
    widths.map((width) => "-".repeat(width + 2)).join("+"),
    ...cells.map(renderLine),
  ].join("\n");
};

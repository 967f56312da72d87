import fs from "node:fs/promises";
import path from "node:path";
import type { QueryRow } from "../db/query.js";
import { formatTable } from "./format.js";
import { REPORT_TEMPLATE, renderTemplate } from "./template.js";

export type ReportSection = {
  name: string;
  columns: string[];
  rows: QueryRow[];
};

export const renderReport = (
  title: string,
  sections: ReportSection[],
): string =>
  renderTemplate(REPORT_TEMPLATE, {
    title,
    sections: sections.map((section) => ({
      name: section.name,
      count: section.rows.length,
      table: formatTable(section.columns, section.rows),
    })),
  });

/** Writes `<dir>/<name>.txt`, replacing an earlier report of the same name. */
export const writeReport = async (
  dir: string,
  name: string,
  content: string,
): Promise<string> => {
  await fs.mkdir(dir, { recursive: true });

  const filePath = path.join(dir, `${name}.txt`);
  await fs.writeFile(filePath, content, "utf8");

  return filePath;
};

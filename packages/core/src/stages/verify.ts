import type { QueryRows } from "../db/query.js";
import { RunInterruptedError, VerificationError } from "../errors.js";
import { openStageSinks } from "../logging/log-sink.js";
import { formatTable } from "../reports/format.js";
import type { MigrationRun, StageResult } from "../run/types.js";
import type { StageDependencies } from "./types.js";

export const RESTORED_RELATIONS_QUERY = `SELECT n.nspname AS schema,
       c.relname AS name,
       CASE c.relkind
         WHEN 'r' THEN 'table'
         WHEN 'p' THEN 'partitioned table'
         WHEN 'v' THEN 'view'
         WHEN 'm' THEN 'materialized view'
         WHEN 'S' THEN 'sequence'
         WHEN 'f' THEN 'foreign table'
       END AS type,
       pg_get_userbyid(c.relowner) AS owner
FROM pg_catalog.pg_class c
JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
WHERE c.relkind IN ('r', 'p', 'v', 'm', 'S', 'f')
  AND n.nspname NOT IN ('pg_catalog', 'information_schema')
  AND n.nspname !~ '^pg_toast'
ORDER BY 1, 2`;

export type VerificationOutcome = {
  result: StageResult;
  relations: QueryRows;
};

export const formatRowCount = (count: number): string =>
  `(${count} ${count === 1 ? "row" : "rows"})`;

/**
 * Lists what landed in the target. Read-only: a failure here is reported but
 * leaves the restored database as it is. An abort during the query ends the
 * run as interrupted, whatever the query returned.
 */
export const runVerificationStage = async (
  run: MigrationRun,
  deps: StageDependencies,
  sql: string = RESTORED_RELATIONS_QUERY,
): Promise<VerificationOutcome> => {
  const sinks = await openStageSinks(run, "verify", deps.console);

  try {
    const relations = await deps.query(run.target, sql, deps.signal);

    if (deps.signal?.aborted) {
      throw new RunInterruptedError("verify", sinks.paths);
    }

    sinks.stdout.write(
      `${formatTable(relations.columns, relations.rows)}\n${formatRowCount(
        relations.rows.length,
      )}\n`,
    );

    return {
      result: Object.freeze({
        stage: "verify",
        exitCode: 0,
        stdoutLog: sinks.paths.stdout,
        stderrLog: sinks.paths.stderr,
      }),
      relations,
    };
  } catch (error) {
    if (error instanceof RunInterruptedError) {
      throw error;
    }
    if (deps.signal?.aborted) {
      throw new RunInterruptedError("verify", sinks.paths);
    }

    const message = error instanceof Error ? error.message : String(error);
    sinks.stderr.write(`${message}\n`);

    throw new VerificationError(message, sinks.paths, { cause: error });
  } finally {
    await sinks.close();
  }
};

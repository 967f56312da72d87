import pg from "pg";
import type { Endpoint } from "../run/types.js";

export type QueryRow = Record<string, unknown>;

export type QueryRows = {
  columns: string[];
  rows: QueryRow[];
};

/**
 * Runs one read query against an endpoint and returns its rows. An aborted
 * `signal` ends the connection, which fails the running query.
 */
export type QueryExecutor = (
  endpoint: Endpoint,
  sql: string,
  signal?: AbortSignal,
) => Promise<QueryRows>;

export const pgQueryExecutor: QueryExecutor = async (endpoint, sql, signal) => {
  signal?.throwIfAborted();

  const client = new pg.Client({
    host: endpoint.host,
    port: endpoint.port,
    database: endpoint.database,
    user: endpoint.user,
    password: endpoint.password,
    application_name: "pgshift",
  });

  let ending: Promise<void> | undefined;
  const end = (): Promise<void> => {
    ending ??= client.end();
    return ending;
  };
  // The same promise is awaited in the finally block below.
  const onAbort = (): void => {
    end().catch(() => undefined);
  };

  signal?.addEventListener("abort", onAbort, { once: true });
  try {
    await client.connect();
    const result = await client.query<QueryRow>(sql);

    return {
      columns: result.fields.map((field) => field.name),
      rows: result.rows,
    };
  } finally {
    signal?.removeEventListener("abort", onAbort);
    await end();
  }
};

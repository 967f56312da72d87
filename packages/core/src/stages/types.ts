import type { QueryExecutor } from "../db/query.js";
import type { ConsoleStreams } from "../logging/log-sink.js";
import type { ProcessInvoker } from "../process/invoker.js";

export type StageDependencies = {
  invoke: ProcessInvoker;
  query: QueryExecutor;
  console?: ConsoleStreams;
  signal?: AbortSignal;
};

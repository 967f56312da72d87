#!/usr/bin/env node
import path from "node:path";
import fs from "node:fs/promises";
import { Command } from "commander";
import { confirm } from "@inquirer/prompts";
import kleur from "kleur";
import ora from "ora";
import { parse as parseDotenv } from "@dotenvx/dotenvx";
import {
  CONFIG_FILE_NAME,
  findConfigFile,
  generateSchema,
  listEnvironmentsFile,
  parseConfigFile,
  renderConfigTemplate,
} from "@pgshift/config";
import {
  ConfigError,
  EXIT_STATUS,
  MigrationError,
  collectDatabaseInfo,
  compareRowCounts,
  describeEndpoint,
  fetchRowCounts,
  infoReportName,
  loadQueryCatalog,
  pgQueryExecutor,
  renderReport,
  resolveEndpoint,
  resolvePackageVersion,
  rowCountSections,
  runMigration,
  writeReport,
  type DatabaseSide,
  type Endpoint,
  type EndpointInput,
  type RowCount,
} from "@pgshift/core";
import {
  buildMigrationInput,
  buildPositionalInput,
  mergeEndpoint,
  parseVars,
  reportsDir,
  sourceFlags,
  targetFlags,
  type ConfigFlags,
  type EndpointFlags,
  type LoadedConfig,
  type MigrateFlags,
} from "./input.js";

type ConfigOptions = ConfigFlags;

type ReportOptions = ConfigOptions &
  EndpointFlags & {
    outputDir?: string;
  };

const DEFAULT_REPORTS_DIR = "output";

const program = new Command();

const baseCwd = (): string => process.env.INIT_CWD || process.cwd();

const withConfigOptions = (command: Command): Command =>
  command
    .option(
      "--config <path>",
      `Path to config file (default: ${CONFIG_FILE_NAME})`,
    )
    .option("--env <name>", "Environment name from config file")
    .option("--env-file <path>", "Load environment variables from file")
    .option(
      "--var <key=value>",
      "Set a variable value (can be used multiple times)",
      (value, previous: string[] = []) => {
        return [...previous, value];
      },
    );

const withEndpointOptions = (command: Command): Command => {
  for (const role of ["source", "target"] as const) {
    command
      .option(`--${role}-host <host>`, `${role} server host`)
      .option(`--${role}-port <port>`, `${role} server port`)
      .option(`--${role}-database <name>`, `${role} database name`)
      .option(`--${role}-user <user>`, `${role} user name`)
      .option(`--${role}-password <password>`, `${role} password`);
  }
  return command;
};

const parseEnvFile = async (
  filePath: string,
): Promise<Record<string, string | undefined>> => {
  const contents = await fs.readFile(filePath, "utf8");
  return parseDotenv(contents);
};

const resolveEnvName = async (
  configPath: string,
  envName?: string,
): Promise<string> => {
  if (envName) {
    return envName;
  }

  const environments = await listEnvironmentsFile(configPath);
  if (environments.length === 1) {
    return environments[0];
  }

  if (environments.length === 0) {
    throw new ConfigError(["No environments defined in config file"]);
  }

  throw new ConfigError([
    `Multiple environments found (${environments.join(", ")}). ` +
      "Specify one with --env.",
  ]);
};

/** A config file is optional: flags alone can describe a run. */
const loadConfig = async (
  options: ConfigOptions,
): Promise<LoadedConfig | undefined> => {
  const cwd = baseCwd();
  const configPath = options.config
    ? path.resolve(cwd, options.config)
    : await findConfigFile(cwd);

  if (!configPath) {
    return undefined;
  }

  const envOverrides = options.envFile
    ? await parseEnvFile(path.resolve(cwd, options.envFile))
    : {};
  const envName = await resolveEnvName(configPath, options.env);

  console.log(`Using config file: ${kleur.bold(configPath)}`);
  console.log(`Environment: ${kleur.bold(envName)}`);
  console.log("");

  try {
    const config = await parseConfigFile(
      configPath,
      envName,
      parseVars(options.var),
      { ...process.env, ...envOverrides },
    );

    return { path: configPath, envName, config };
  } catch (error) {
    throw new ConfigError([
      `Failed to load ${configPath}: ${
        error instanceof Error ? error.message : String(error)
      }`,
    ]);
  }
};

const resolveSideEndpoint = (
  side: DatabaseSide,
  loaded: LoadedConfig | undefined,
  flags: EndpointFlags,
): Endpoint =>
  resolveEndpoint(
    side,
    mergeEndpoint(
      loaded?.config[side],
      side === "source" ? sourceFlags(flags) : targetFlags(flags),
    ),
  );

const parseSides = (value: string): DatabaseSide[] => {
  switch (value) {
    case "source":
    case "target":
      return [value];
    case "both":
      return ["source", "target"];
    default:
      throw new ConfigError([
        `Invalid --side "${value}": use source, target or both`,
      ]);
  }
};

const describeInput = (endpoint: EndpointInput | undefined): string =>
  `${endpoint?.database ?? "?"} on ${endpoint?.host ?? "?"}`;

program
  .name("pgshift")
  .description("Copy a PostgreSQL database with pg_dump and pg_restore")
  .version(await resolvePackageVersion(import.meta.url, "../package.json"));

withEndpointOptions(
  withConfigOptions(
    program
      .command("migrate")
      .description(
        "Dump the source database and restore it into the target database",
      )
      .argument(
        "[positional...]",
        "SRC_DB SRC_USER SRC_PASS SRC_HOST SRC_PORT " +
          "DST_DB DST_USER DST_PASS DST_HOST DST_PORT MODE [DUMP_FILE]",
      )
      .option(
        "--mode <mode>",
        "auto (dump first) or manual (restore a dump file) (default: auto)",
      )
      .option("--artifact <path>", "Dump file to restore in manual mode")
      .option("--jobs <n>", "Parallel jobs for pg_restore (default: 4)")
      .option("--dump-dir <path>", "Dump file directory (default: dump)")
      .option("--logs-dir <path>", "Log file directory (default: logs)")
      .option("-y, --yes", "Skip the confirmation prompt"),
  ),
).action(
  async (
    positional: string[],
    options: MigrateFlags & ConfigOptions & { yes?: boolean },
  ) => {
    const input =
      positional.length > 0
        ? buildPositionalInput(positional, options)
        : buildMigrationInput(await loadConfig(options), options);

    if (!options.yes) {
      const proceed = await confirm({
        message: `Migrate ${describeInput(input.source)} into ${describeInput(
          input.target,
        )}?`,
        default: false,
      });

      if (!proceed) {
        console.log(kleur.yellow("Migration aborted."));
        return;
      }
    }

    const controller = new AbortController();
    const interrupt = (): void => controller.abort();
    process.once("SIGINT", interrupt);
    process.once("SIGTERM", interrupt);

    try {
      const outcome = await runMigration({
        input,
        signal: controller.signal,
        cwd: baseCwd(),
      });
      process.exitCode = outcome.exitCode;
    } finally {
      process.off("SIGINT", interrupt);
      process.off("SIGTERM", interrupt);
    }
  },
);

withEndpointOptions(
  withConfigOptions(
    program
      .command("info")
      .description("Run the introspection query catalog and save a report")
      .option("--side <side>", "source, target or both", "both")
      .option("--catalog <path>", "Query catalog JSON file")
      .option("--output-dir <path>", "Report directory (default: output)"),
  ),
).action(
  async (options: ReportOptions & { side: string; catalog?: string }) => {
    const cwd = baseCwd();
    const sides = parseSides(options.side);
    const loaded = await loadConfig(options);
    const catalog = await loadQueryCatalog(
      options.catalog ? path.resolve(cwd, options.catalog) : undefined,
    );
    const outputDir = path.resolve(
      cwd,
      reportsDir(loaded, options.outputDir) ?? DEFAULT_REPORTS_DIR,
    );

    for (const side of sides) {
      const endpoint = resolveSideEndpoint(side, loaded, options);
      const spinner = ora(
        `Collecting ${side} info from ${describeEndpoint(endpoint)}`,
      ).start();

      try {
        const sections = await collectDatabaseInfo(
          endpoint,
          catalog,
          pgQueryExecutor,
        );
        const filePath = await writeReport(
          outputDir,
          infoReportName(side, endpoint.database),
          renderReport(`${side} database ${endpoint.database}`, sections),
        );

        spinner.succeed(
          kleur.green(`Saved ${side} info to ${kleur.bold(filePath)}`),
        );
      } catch (error) {
        spinner.fail(kleur.red(`Failed to collect ${side} info`));
        throw error;
      }
    }
  },
);

withEndpointOptions(
  withConfigOptions(
    program
      .command("report")
      .description("Compare estimated row counts between source and target")
      .option("--output-dir <path>", "Report directory (default: output)"),
  ),
).action(async (options: ReportOptions) => {
  const cwd = baseCwd();
  const loaded = await loadConfig(options);
  const endpoints = {
    source: resolveSideEndpoint("source", loaded, options),
    target: resolveSideEndpoint("target", loaded, options),
  };
  const outputDir = path.resolve(
    cwd,
    reportsDir(loaded, options.outputDir) ?? DEFAULT_REPORTS_DIR,
  );

  const counts: Record<DatabaseSide, RowCount[]> = { source: [], target: [] };

  for (const side of ["source", "target"] as const) {
    const spinner = ora(
      `Reading row counts from ${describeEndpoint(endpoints[side])}`,
    ).start();

    try {
      const { counts: sideCounts, analyzeError } = await fetchRowCounts(
        endpoints[side],
        pgQueryExecutor,
      );
      counts[side] = sideCounts;

      if (analyzeError) {
        spinner.warn(
          kleur.yellow(
            `ANALYZE failed on ${side} (${analyzeError.message}); ` +
              "using existing estimates",
          ),
        );
      } else {
        spinner.succeed(`Read ${sideCounts.length} ${side} table(s)`);
      }
    } catch (error) {
      spinner.fail(kleur.red(`Failed to read ${side} row counts`));
      throw error;
    }
  }

  const report = compareRowCounts(counts.source, counts.target);
  const filePath = await writeReport(
    outputDir,
    "reports",
    renderReport("Row count comparison", rowCountSections(report)),
  );
  const matched = report.comparison.filter((entry) => entry.match).length;

  console.log("");
  console.log(
    `${kleur.bold("Matching tables:")} ${matched}/${report.comparison.length}`,
  );
  console.log(
    `${kleur.bold("Missing in target:")} ${report.missingInTarget.length}`,
  );
  console.log(
    `${kleur.bold("Missing in source:")} ${report.missingInSource.length}`,
  );
  console.log(kleur.dim(`Report: ${filePath}`));
});

program
  .command("init")
  .description("Create a starter config file")
  .option("--config <path>", `Path to write (default: ${CONFIG_FILE_NAME})`)
  .option("--env <name>", "Environment name to use in the file", "default")
  .option("--force", "Overwrite an existing file without asking")
  .action(
    async (options: { config?: string; env?: string; force?: boolean }) => {
      const configPath = path.resolve(
        baseCwd(),
        options.config ?? CONFIG_FILE_NAME,
      );

      const exists = await fs
        .access(configPath)
        .then(() => true)
        .catch(() => false);

      if (exists && !options.force) {
        const overwrite = await confirm({
          message: `${configPath} already exists. Overwrite it?`,
          default: false,
        });

        if (!overwrite) {
          console.log(kleur.yellow("Config file left unchanged."));
          return;
        }
      }

      await fs.mkdir(path.dirname(configPath), { recursive: true });
      await fs.writeFile(
        configPath,
        renderConfigTemplate({ envName: options.env }),
        "utf8",
      );

      console.log(kleur.green(`Created config: ${kleur.bold(configPath)}`));
    },
  );

program
  .command("schema")
  .description("Print the JSON schema of the config file")
  .action(() => {
    console.log(JSON.stringify(generateSchema(), null, 2));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(
    kleur.red(error instanceof Error ? error.message : String(error)),
  );

  process.exit(
    error instanceof MigrationError ? error.status : EXIT_STATUS.unexpected,
  );
});

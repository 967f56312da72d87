const endpointBlock = (role: string) =>
  ({
    type: "object",
    additionalProperties: false,
    properties: {
      host: {
        type: "string",
        description: `Host name or socket directory of the ${role} server.`,
      },
      port: {
        type: ["integer", "string"],
        description: `Port of the ${role} server.`,
      },
      database: {
        type: "string",
        description: `Database name on the ${role} server.`,
      },
      user: {
        type: "string",
        description: `Role used to connect to the ${role} server.`,
      },
      password: {
        type: "string",
        description:
          'Password for the role. Prefer env("NAME") over a literal value.',
      },
    },
  }) as const;

const dirBlock = (description: string) =>
  ({
    type: "object",
    additionalProperties: false,
    properties: {
      dir: { type: "string", description },
    },
  }) as const;

const listOf = <T>(ref: T) => ({ type: "array", items: ref }) as const;

export const pgshiftSchema = {
  $schema: "https://json-schema.org/draft/2020-12/schema",
  title: "pgshift.hcl",
  type: "object",
  additionalProperties: false,
  properties: {
    env: {
      type: "object",
      additionalProperties: listOf({ $ref: "#/$defs/envBlock" }),
    },
    variable: {
      type: "object",
      additionalProperties: listOf({ $ref: "#/$defs/variableBlock" }),
    },
  },
  $defs: {
    envBlock: {
      type: "object",
      additionalProperties: false,
      properties: {
        source: listOf({ $ref: "#/$defs/sourceBlock" }),
        target: listOf({ $ref: "#/$defs/targetBlock" }),
        dump: listOf({ $ref: "#/$defs/dumpBlock" }),
        restore: listOf({ $ref: "#/$defs/restoreBlock" }),
        logs: listOf({ $ref: "#/$defs/logsBlock" }),
        reports: listOf({ $ref: "#/$defs/reportsBlock" }),
        tools: listOf({ $ref: "#/$defs/toolsBlock" }),
      },
    },
    sourceBlock: endpointBlock("source"),
    targetBlock: endpointBlock("destination"),
    dumpBlock: dirBlock("Directory receiving dump archives (default: dump)."),
    logsBlock: dirBlock("Root directory of per-run log files (default: logs)."),
    reportsBlock: dirBlock(
      "Directory receiving info and row-count reports (default: output).",
    ),
    restoreBlock: {
      type: "object",
      additionalProperties: false,
      properties: {
        jobs: {
          type: ["integer", "string"],
          minimum: 1,
          description: "Parallel jobs passed to pg_restore (default: 4).",
        },
      },
    },
    toolsBlock: {
      type: "object",
      additionalProperties: false,
      properties: {
        pg_dump: { type: "string", description: "Path to pg_dump." },
        pg_restore: { type: "string", description: "Path to pg_restore." },
      },
    },
    variableBlock: {
      type: "object",
      additionalProperties: false,
      required: ["type"],
      properties: {
        type: {
          type: "string",
          description: "Variable type.",
          enum: ["string", "number", "bool", "any"],
        },
        default: {
          type: ["string", "number", "boolean"],
        },
        description: {
          type: "string",
        },
      },
    },
  },
} as const;

export const generateSchema = (): typeof pgshiftSchema => {
  return pgshiftSchema;
};

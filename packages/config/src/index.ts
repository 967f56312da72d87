export {
  CONFIG_FILE_NAME,
  findConfigFile,
  listEnvironments,
  listEnvironmentsFile,
  parseConfig,
  parseConfigFile,
} from "./config.js";
export type {
  EndpointConfig,
  EnvConfig,
  ToolsConfig,
  VariableConfig,
} from "./config.js";
export { generateSchema, pgshiftSchema } from "./hcl-schema.js";
export { renderConfigTemplate } from "./template.js";
export type { ConfigTemplateOptions } from "./template.js";

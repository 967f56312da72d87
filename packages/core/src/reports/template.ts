import Handlebars from "handlebars";

export const REPORT_TEMPLATE = `{{title}}
{{#each sections}}

{{name}}:
====================
Total rows: {{count}}
{{#if table}}
{{table}}
{{/if}}
{{/each}}
`;

export const renderTemplate = (
  content: string,
  ctx: Record<string, unknown> = {},
): string => {
  // Output is plain text; HTML escaping would mangle SQL and quoted names.
  const template = Handlebars.compile(content, { noEscape: true });

  return template(ctx);
};

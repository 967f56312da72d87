export type Scalar = string | number | boolean;

export const resolveValue = (
  value: string,
  env: Record<string, string | undefined> = {},
  vars: Record<string, string> = {},
): string => {
  const envCallRegex = /^env\("([^"]+)"\)$/;
  const varRefRegex = /^var\.(\w+)$/;
  const interpolationRegex = /\$\{([^}]+)\}/g;

  return value.replace(interpolationRegex, (match, expr: string) => {
    const envExprMatch = expr.match(envCallRegex);
    if (envExprMatch) {
      return env[envExprMatch[1]] || "";
    }

    const varExprMatch = expr.match(varRefRegex);
    if (varExprMatch) {
      return vars[varExprMatch[1]] || "";
    }

    return match;
  });
};

/**
 * hcl2json wraps attributes and blocks in single-element arrays depending on
 * where they appear; this unwraps either shape.
 */
export const extractValue = <T>(
  value: T[] | T | undefined,
): T | undefined => {
  if (Array.isArray(value)) {
    return value.length > 0 ? value[0] : undefined;
  }
  return value;
};

/**
 * Reads a string attribute, resolving interpolations. Empty results count as
 * unset so flags and defaults can fill them in.
 */
export const extractString = (
  value: Scalar[] | Scalar | undefined,
  env: Record<string, string | undefined>,
  vars: Record<string, string>,
): string | undefined => {
  const raw = extractValue(value);
  if (raw === undefined) {
    return undefined;
  }

  const resolved = resolveValue(String(raw), env, vars);
  return resolved === "" ? undefined : resolved;
};

/**
 * Numeric attributes may be literals or interpolated strings such as
 * `"${env("PGPORT")}"`; strings are returned as-is for the caller to validate.
 */
export const extractNumeric = (
  value: Scalar[] | Scalar | undefined,
  env: Record<string, string | undefined>,
  vars: Record<string, string>,
): number | string | undefined => {
  const raw = extractValue(value);
  if (typeof raw === "number") {
    return raw;
  }
  return extractString(raw, env, vars);
};

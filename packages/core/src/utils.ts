import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

/** Absolute path of a file shipped next to the module at `moduleUrl`. */
export const resolvePackagePath = (
  moduleUrl: string,
  pathRelativeToModule: string,
): string =>
  path.resolve(path.dirname(fileURLToPath(moduleUrl)), pathRelativeToModule);

export const resolvePackageVersion = async (
  moduleUrl: string,
  packagePathRelativeToModule: string,
): Promise<string> => {
  try {
    const contents = await fs.readFile(
      resolvePackagePath(moduleUrl, packagePathRelativeToModule),
      "utf8",
    );
    const parsed: { version?: unknown } = JSON.parse(contents);

    return typeof parsed.version === "string" ? parsed.version : "";
  } catch {
    return "";
  }
};

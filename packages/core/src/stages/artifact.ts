import crypto from "node:crypto";
import fs from "node:fs";
import { pipeline } from "node:stream/promises";
import { ArtifactNotFoundError } from "../errors.js";
import type { Artifact } from "../run/types.js";

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

const unreadable = (artifactPath: string, error: unknown) =>
  new ArtifactNotFoundError(
    artifactPath,
    `is not readable: ${error instanceof Error ? error.message : String(error)}`,
  );

export const calculateFileChecksum = async (
  filePath: string,
): Promise<string> => {
  const hash = crypto.createHash("sha256");
  await pipeline(fs.createReadStream(filePath), hash);
  return hash.digest("hex");
};

/**
 * Checks that a dump archive can be restored: it must be a non-empty regular
 * file.
 */
export const inspectArtifact = async (
  artifactPath: string,
): Promise<Artifact> => {
  let stats: fs.Stats;

  try {
    stats = await fs.promises.stat(artifactPath);
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new ArtifactNotFoundError(artifactPath);
    }
    throw unreadable(artifactPath, error);
  }

  if (!stats.isFile()) {
    throw new ArtifactNotFoundError(artifactPath, "is not a regular file");
  }

  if (stats.size === 0) {
    throw new ArtifactNotFoundError(artifactPath, "is empty");
  }

  let sha256: string;
  try {
    sha256 = await calculateFileChecksum(artifactPath);
  } catch (error) {
    throw unreadable(artifactPath, error);
  }

  return Object.freeze({ path: artifactPath, bytes: stats.size, sha256 });
};

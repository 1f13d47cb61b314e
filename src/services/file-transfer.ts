import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { IOError } from "../errors";
import { sha256 } from "../utils/crypto";

export type CopyResult = {
  source: string;
  destination: string;
  bytes: number;
  digest: string;
};

export async function readFileBytes(filePath: string, code: string): Promise<Buffer> {
  try {
    return await readFile(filePath);
  } catch (error) {
    throw new IOError(code, "read", filePath, error);
  }
}

export async function writeFileBytes(
  filePath: string,
  contents: Buffer | string,
  code: string,
  options: { createDir?: boolean } = {}
): Promise<void> {
  try {
    if (options.createDir) {
      await mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
    }
    await writeFile(filePath, contents);
  } catch (error) {
    throw new IOError(code, "write", filePath, error);
  }
}

export async function modifiedAtMs(filePath: string): Promise<number | null> {
  try {
    return (await stat(filePath)).mtimeMs;
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw new IOError("stat_failed", "stat", filePath, error);
  }
}

/**
 * Copies `source` over `destination` through memory, so the caller gets the
 * digest of exactly what was written. `label` prefixes the error codes.
 */
export async function copyFileContents(
  source: string,
  destination: string,
  label: string,
  options: { createDir?: boolean } = {}
): Promise<CopyResult> {
  const contents = await readFileBytes(source, `${label}_read_failed`);
  await writeFileBytes(destination, contents, `${label}_write_failed`, options);
  return {
    source,
    destination,
    bytes: contents.length,
    digest: sha256(contents)
  };
}

export async function verifyFileDigest(filePath: string, expectedDigest: string, code: string): Promise<void> {
  const contents = await readFileBytes(filePath, code);
  const actual = sha256(contents);
  if (actual !== expectedDigest) {
    throw new IOError(code, "verify", filePath, new Error(`digest ${actual} does not match ${expectedDigest}`));
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

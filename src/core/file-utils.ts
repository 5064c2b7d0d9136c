import {
  createReadStream,
  createWriteStream,
  existsSync,
  mkdirSync,
  unlinkSync,
} from "node:fs";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { ILogger } from "../types/dataset.ts";

/**
 * Creates `dirPath` and any missing parents.
 */
export function ensureDirectory(dirPath: string, logger?: ILogger): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true });
    logger?.impt(`Created directory: ${dirPath}`);
  }
}

export function fileExists(filePath: string): boolean {
  return existsSync(filePath);
}

export async function readFileContentsAsync(filePath: string): Promise<string> {
  return readFile(filePath, "utf-8");
}

export async function writeFileContentsAsync(filePath: string, content: string): Promise<void> {
  await writeFile(filePath, content, "utf-8");
}

/**
 * Reads and parses a JSON file. Parsing errors propagate as thrown by `JSON.parse`;
 * the result is left `unknown` for the caller to validate.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  const content = await readFileContentsAsync(filePath);
  return JSON.parse(content) as unknown;
}

/**
 * Writes `data` as human-readable JSON (4-space indentation).
 */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await writeFileContentsAsync(filePath, `${JSON.stringify(data, null, 4)}\n`);
}

/**
 * Writes one line per entry, each terminated by `\n`.
 *
 * @returns The number of lines written.
 */
export async function writeLines(filePath: string, lines: readonly string[]): Promise<number> {
  const content = lines.length ? `${lines.join("\n")}\n` : "";
  await writeFileContentsAsync(filePath, content);
  return lines.length;
}

/**
 * Streams `source` to `destination`, creating the destination directory first.
 */
export function copyFile(source: string, destination: string): Promise<void> {
  mkdirSync(dirname(destination), { recursive: true });

  const readStream = createReadStream(source);
  const writeStream = createWriteStream(destination);

  return new Promise((resolve, reject) => {
    readStream.on("error", reject);
    writeStream.on("error", reject);
    writeStream.on("finish", resolve);
    readStream.pipe(writeStream);
  });
}

/**
 * Deletes a file if it exists. Failures are logged, not thrown.
 *
 * @returns `false` when the file could not be removed.
 */
export function removeFile(filePath: string, logger: ILogger): boolean {
  try {
    if (existsSync(filePath)) {
      unlinkSync(filePath);
    }
    return true;
  } catch (error) {
    logger.error(`Failed to remove file at: ${filePath}`, error);
    return false;
  }
}

/**
 * Creates a fresh temporary directory, hands it to `fn`, and removes it
 * (recursively) once `fn` settles, whether it resolved or threw.
 *
 * @param prefix - Directory name prefix, e.g. `"fasttext-corpus-"`.
 * @param fn - Work to run while the directory exists.
 * @param baseDir - Parent directory; the OS temp directory when omitted.
 */
export async function withTempDirectory<T>(
  prefix: string,
  fn: (dir: string) => Promise<T>,
  baseDir: string = tmpdir()
): Promise<T> {
  ensureDirectory(baseDir);
  const dir = await mkdtemp(join(baseDir, prefix));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/**
 * Creates a temporary directory the caller owns and must remove.
 */
export async function makeTempDirectory(prefix: string, baseDir: string = tmpdir()): Promise<string> {
  ensureDirectory(baseDir);
  return mkdtemp(join(baseDir, prefix));
}

export async function removeDirectory(dirPath: string): Promise<void> {
  await rm(dirPath, { recursive: true, force: true });
}

import { afterAll, describe, expect, it, vi } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  copyFile,
  ensureDirectory,
  fileExists,
  makeTempDirectory,
  readFileContentsAsync,
  readJsonFile,
  removeDirectory,
  removeFile,
  withTempDirectory,
  writeFileContentsAsync,
  writeJsonFile,
  writeLines,
} from "../core/file-utils.ts";
import { MockLogger } from "./logger.mock.ts";

describe("file-utils", () => {
  const base = mkdtempSync(join(tmpdir(), "fasttext-fu-"));
  const logger = new MockLogger();

  afterAll(() => {
    rmSync(base, { recursive: true, force: true });
  });

  it("ensureDirectory creates when missing and logs once", () => {
    logger.clear();
    const dir = join(base, "newdir", "deeper");
    ensureDirectory(dir, logger);
    ensureDirectory(dir, logger);
    expect(existsSync(dir)).toBe(true);
    expect(logger.logs.impt).toEqual([`Created directory: ${dir}`]);
  });

  it("read/write async helpers", async () => {
    const f = join(base, "a.txt");
    writeFileSync(f, "content", "utf-8");
    expect(await readFileContentsAsync(f)).toBe("content");
    await writeFileContentsAsync(f, "new");
    expect(await readFileContentsAsync(f)).toBe("new");
    expect(fileExists(f)).toBe(true);
    expect(fileExists(join(base, "nope.txt"))).toBe(false);
  });

  it("writeJsonFile indents with four spaces and readJsonFile parses it back", async () => {
    const f = join(base, "data.json");
    await writeJsonFile(f, { a: [1] });
    expect(readFileSync(f, "utf-8")).toBe('{\n    "a": [\n        1\n    ]\n}\n');
    expect(await readJsonFile(f)).toEqual({ a: [1] });
  });

  it("readJsonFile throws on invalid JSON", async () => {
    const f = join(base, "broken.json");
    writeFileSync(f, "{", "utf-8");
    await expect(readJsonFile(f)).rejects.toThrow(SyntaxError);
  });

  it("writeLines terminates every line", async () => {
    const f = join(base, "lines.txt");
    expect(await writeLines(f, ["one", "two"])).toBe(2);
    expect(readFileSync(f, "utf-8")).toBe("one\ntwo\n");
    expect(await writeLines(f, [])).toBe(0);
    expect(readFileSync(f, "utf-8")).toBe("");
  });

  it("copyFile creates the destination directory", async () => {
    const src = join(base, "src.txt");
    writeFileSync(src, "hello", "utf-8");
    const dst = join(base, "copied", "dst.txt");
    await copyFile(src, dst);
    expect(readFileSync(dst, "utf-8")).toBe("hello");
  });

  it("copyFile rejects a missing source", async () => {
    await expect(copyFile(join(base, "missing.txt"), join(base, "out.txt"))).rejects.toThrow();
  });

  it("removeFile succeeds, including for missing files", () => {
    const f = join(base, "del.txt");
    writeFileSync(f, "x", "utf-8");
    expect(removeFile(f, logger)).toBe(true);
    expect(existsSync(f)).toBe(false);
    expect(removeFile(f, logger)).toBe(true);
  });

  it("removeFile logs and returns false when removal fails", () => {
    const errorLogger = new MockLogger();
    const spy = vi.spyOn(errorLogger, "error");
    const dir = join(base, "a-directory");
    mkdirSync(dir);
    expect(removeFile(dir, errorLogger)).toBe(false);
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toBe(`Failed to remove file at: ${dir}`);
  });

  it("withTempDirectory removes the directory after success and failure", async () => {
    const parent = join(base, "tmp-parent");
    const seen: string[] = [];

    const result = await withTempDirectory("job-", async (dir) => {
      seen.push(dir);
      writeFileSync(join(dir, "f.txt"), "x", "utf-8");
      return 7;
    }, parent);
    expect(result).toBe(7);

    await expect(
      withTempDirectory("job-", async (dir) => {
        seen.push(dir);
        throw new Error("fail");
      }, parent)
    ).rejects.toThrow("fail");

    expect(seen).toHaveLength(2);
    expect(seen.every((dir) => dir.startsWith(join(parent, "job-")))).toBe(true);
    expect(readdirSync(parent)).toEqual([]);
  });

  it("makeTempDirectory and removeDirectory", async () => {
    const dir = await makeTempDirectory("owned-", base);
    writeFileSync(join(dir, "f.txt"), "x", "utf-8");
    await removeDirectory(dir);
    expect(existsSync(dir)).toBe(false);
  });
});

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { EventEmitter } from "node:events";
import { existsSync, mkdtempSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PassThrough } from "node:stream";
import { setEnv, unsetEnv } from "../core/env.ts";
import { EngineError, ErrorCode } from "../core/errors.ts";
import {
  __test,
  createFastTextCliEngine,
  FastTextCliModel,
  hyperparametersToArgs,
  parsePredictions,
} from "../core/fasttext-cli.ts";
import { resolveHyperparameters } from "../core/hyperparameters.ts";
import { buildModelArtifact } from "./model-artifact.ts";
import { MockLogger } from "./logger.mock.ts";

const { spawnMock } = vi.hoisted(() => ({ spawnMock: vi.fn() }));

vi.mock("node:child_process", () => ({ spawn: spawnMock }));

interface FakeRun {
  stdout?: string;
  stderr?: string;
  exitCode?: number;
  error?: NodeJS.ErrnoException;
}

interface SpawnCall {
  binary: string;
  args: string[];
  input: string;
}

/**
 * Makes `spawn` answer each call with the next run: output is streamed, then
 * the child closes with the run's exit code (or fails to start).
 */
function scriptRuns(...runs: FakeRun[]): SpawnCall[] {
  const calls: SpawnCall[] = [];
  spawnMock.mockImplementation((binary: string, args: string[]) => {
    const run = runs.shift() ?? {};
    const call: SpawnCall = { binary, args, input: "" };
    calls.push(call);

    const child = Object.assign(new EventEmitter(), {
      stdin: new PassThrough(),
      stdout: new PassThrough(),
      stderr: new PassThrough(),
    });
    child.stdin.setEncoding("utf8");
    child.stdin.on("data", (chunk: string) => {
      call.input += chunk;
    });

    setImmediate(() => {
      if (run.error) {
        child.emit("error", run.error);
        return;
      }
      let open = 2;
      const ended = () => {
        if (--open === 0) child.emit("close", run.exitCode ?? 0);
      };
      child.stdout.on("end", ended);
      child.stderr.on("end", ended);
      child.stdout.end(run.stdout ?? "");
      child.stderr.end(run.stderr ?? "");
    });
    return child;
  });
  return calls;
}

describe("hyperparametersToArgs", () => {
  it("forwards every hyperparameter as a flag", () => {
    const args = hyperparametersToArgs(resolveHyperparameters({ epoch: 25 }));
    expect(args).toEqual([
      "-lr", "0.1",
      "-dim", "100",
      "-ws", "5",
      "-epoch", "25",
      "-minCount", "1",
      "-minCountLabel", "1",
      "-minn", "0",
      "-maxn", "0",
      "-neg", "5",
      "-wordNgrams", "1",
      "-loss", "softmax",
      "-bucket", "2000000",
      "-lrUpdateRate", "100",
      "-t", "0.0001",
      "-label", "__label__",
      "-verbose", "2",
      "-thread", "2",
    ]);
  });
});

describe("parsePredictions", () => {
  it("splits label/probability pairs per line", () => {
    expect(parsePredictions("__label__a 0.9 __label__b 0.1\n__label__b 1.00001\n", 2)).toEqual({
      labels: [["__label__a", "__label__b"], ["__label__b"]],
      probabilities: [[0.9, 0.1], [1.00001]],
    });
  });

  it("keeps empty lines as empty rows", () => {
    expect(parsePredictions("\n__label__a 1\n", 2)).toEqual({
      labels: [[], ["__label__a"]],
      probabilities: [[], [1]],
    });
  });

  it("rejects a line count mismatch", () => {
    expect(() => parsePredictions("__label__a 1\n", 2)).toThrow(
      "fastText returned 1 prediction line(s) for 2 input(s)"
    );
  });

  it("rejects probabilities that are not numbers", () => {
    expect(() => parsePredictions("__label__a high\n", 1)).toThrow(EngineError);
  });
});

describe("fastText CLI engine", () => {
  let base: string;
  let logger: MockLogger;

  beforeEach(() => {
    base = mkdtempSync(join(tmpdir(), "fasttext-cli-test-"));
    logger = new MockLogger();
    spawnMock.mockReset();
  });

  afterEach(() => {
    unsetEnv("FASTTEXT_BIN");
    unsetEnv("FASTTEXT_TMP_DIR");
    rmSync(base, { recursive: true, force: true });
  });

  const engine = () => createFastTextCliEngine({ binary: "fasttext-test", tmpDir: base, logger });

  it("trains a supervised model with every hyperparameter", async () => {
    const calls = scriptRuns({});
    const options = resolveHyperparameters();
    const model = await engine().train("/data/train.txt", options);

    expect(calls).toHaveLength(1);
    const [{ binary, args }] = calls;
    expect(binary).toBe("fasttext-test");
    expect(args.slice(0, 4)).toEqual(["supervised", "-input", "/data/train.txt", "-output"]);
    expect(args.slice(5)).toEqual(hyperparametersToArgs(options));
    expect(model).toBeInstanceOf(FastTextCliModel);
    if (model instanceof FastTextCliModel) expect(model.path).toBe(`${args[4]}.bin`);
    expect(logger.logs.info).toEqual(["fastText: supervised (fasttext-test)"]);
  });

  it("reports a failed run with its exit code and stderr", async () => {
    scriptRuns({ exitCode: 1, stderr: "boom" });
    const promise = engine().train("/data/train.txt", resolveHyperparameters());

    await expect(promise).rejects.toThrow("fastText supervised exited with code 1");
    await expect(promise).rejects.toHaveProperty("exitCode", 1);
    await expect(promise).rejects.toHaveProperty("stderr", "boom");
    await expect(promise).rejects.toHaveProperty("code", ErrorCode.ENGINE_FAILED);
    expect(logger.logs.error).toEqual(["fastText supervised exited with 1: boom"]);
    expect(readdirSync(base)).toEqual([]);
  });

  it("reports a missing binary", async () => {
    const error: NodeJS.ErrnoException = Object.assign(new Error("spawn fasttext-test ENOENT"), {
      code: "ENOENT",
    });
    scriptRuns({ error });

    const promise = engine().train("/data/train.txt", resolveHyperparameters());
    await expect(promise).rejects.toThrow("fastText binary not found: fasttext-test (set FASTTEXT_BIN)");
    await expect(promise).rejects.toHaveProperty("code", ErrorCode.ENGINE_NOT_FOUND);
  });

  it("predicts through stdin with one line per text", async () => {
    const calls = scriptRuns(
      {},
      { stdout: "__label__cat 0.75 __label__dog 0.25\n__label__dog 0.6 __label__cat 0.4\n" }
    );
    const model = await engine().train("/data/train.txt", resolveHyperparameters());
    const prediction = await model.predict(["purr purr", "two\nlines"], 2);

    expect(calls[1].args).toEqual(["predict-prob", `${calls[0].args[4]}.bin`, "-", "2"]);
    expect(calls[1].input).toBe("purr purr\ntwo lines\n");
    expect(prediction).toEqual({
      labels: [
        ["__label__cat", "__label__dog"],
        ["__label__dog", "__label__cat"],
      ],
      probabilities: [
        [0.75, 0.25],
        [0.6, 0.4],
      ],
    });
  });

  it("does not start the binary to predict nothing", async () => {
    scriptRuns({});
    const model = await engine().train("/data/train.txt", resolveHyperparameters());
    expect(await model.predict([], 1)).toEqual({ labels: [], probabilities: [] });
    expect(spawnMock).toHaveBeenCalledTimes(1);
  });

  it("loads a copy of the artifact and reads its quantization flag", async () => {
    const source = join(base, "fasttext.ftz");
    writeFileSync(source, buildModelArtifact({ quantized: true }));

    const model = await engine().load(source);
    expect(model).toBeInstanceOf(FastTextCliModel);
    if (!(model instanceof FastTextCliModel)) return;

    expect(model.path).not.toBe(source);
    expect(model.path.endsWith("model.ftz")).toBe(true);
    expect(await model.isQuantized()).toBe(true);

    await model.quantize();
    expect(spawnMock).not.toHaveBeenCalled();

    await model.dispose();
    expect(existsSync(model.path)).toBe(false);
    expect(existsSync(source)).toBe(true);
  });

  it("quantizes an uncompressed artifact next to it", async () => {
    const source = join(base, "fasttext.bin");
    writeFileSync(source, buildModelArtifact());
    const calls = scriptRuns({});

    const model = await engine().load(source);
    if (!(model instanceof FastTextCliModel)) throw new Error("expected a CLI model");
    const original = model.path;
    await model.quantize();

    const prefix = original.replace(/\.bin$/, "");
    expect(calls[0].args).toEqual(["quantize", "-input", original, "-output", prefix]);
    expect(model.path).toBe(`${prefix}.ftz`);
    expect(logger.logs.impt).toEqual([`Quantized model written to ${prefix}.ftz`]);
  });

  it("names the working copy after the header, not the file extension", async () => {
    const source = join(base, "fasttext.ftz");
    writeFileSync(source, buildModelArtifact({ quantized: false }));
    const calls = scriptRuns({});

    const model = await engine().load(source);
    if (!(model instanceof FastTextCliModel)) throw new Error("expected a CLI model");
    expect(model.path.endsWith("model.bin")).toBe(true);
    expect(await model.isQuantized()).toBe(false);

    await model.quantize();
    const prefix = model.path.replace(/\.ftz$/, "");
    expect(calls[0].args).toEqual(["quantize", "-input", `${prefix}.bin`, "-output", prefix]);
    expect(existsSync(`${prefix}.bin`)).toBe(true);
    await model.dispose();
  });

  it("fails to load a missing artifact", async () => {
    const promise = engine().load(join(base, "missing.bin"));
    await expect(promise).rejects.toThrow(EngineError);
    await expect(promise).rejects.toThrow(`Model artifact not found: ${join(base, "missing.bin")}`);
  });

  it("saves by copying the working artifact", async () => {
    const source = join(base, "fasttext.bin");
    writeFileSync(source, buildModelArtifact());
    const model = await engine().load(source);

    const target = join(base, "out", "fasttext.bin");
    await model.save(target);
    expect(existsSync(target)).toBe(true);
  });

  describe("context", () => {
    it("defaults to fasttext on the PATH and the OS temp directory", () => {
      unsetEnv("FASTTEXT_BIN");
      unsetEnv("FASTTEXT_TMP_DIR");
      const ctx = __test.resolveContext({});
      expect(ctx.binary).toBe("fasttext");
      expect(ctx.tmpDir).toBeUndefined();
    });

    it("reads FASTTEXT_BIN and FASTTEXT_TMP_DIR", () => {
      setEnv("FASTTEXT_BIN", "/opt/fasttext/bin/fasttext");
      setEnv("FASTTEXT_TMP_DIR", "/scratch");
      const ctx = __test.resolveContext({});
      expect(ctx.binary).toBe("/opt/fasttext/bin/fasttext");
      expect(ctx.tmpDir).toBe("/scratch");
    });

    it("prefers explicit options", () => {
      setEnv("FASTTEXT_BIN", "/opt/fasttext/bin/fasttext");
      expect(__test.resolveContext({ binary: "ft" }).binary).toBe("ft");
    });
  });
});

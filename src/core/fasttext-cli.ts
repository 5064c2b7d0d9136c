// src/core/fasttext-cli.ts
import { spawn } from "node:child_process";
import { join } from "node:path";
import { getEnv } from "./env.ts";
import { EngineError, ErrorCode } from "./errors.ts";
import { copyFile, fileExists, makeTempDirectory, removeDirectory } from "./file-utils.ts";
import { HYPERPARAMETER_NAMES, type Hyperparameters } from "./hyperparameters.ts";
import { flattenText } from "./corpus.ts";
import { noopLogger } from "./logger.ts";
import { readModelHeader } from "./model-header.ts";
import type { EnginePrediction, FastTextEngine, FastTextModel } from "../types/engine.ts";
import type { ILogger } from "../types/dataset.ts";

/* ────────────────────────────────────────────────────────────────────────── */
/* Context                                                                    */
/* ────────────────────────────────────────────────────────────────────────── */

export interface FastTextCliContext {
  logger?: ILogger;
  /** fastText executable; `FASTTEXT_BIN` or `fasttext` on the PATH by default. */
  binary?: string;
  /** Parent of the per-model working directories; `FASTTEXT_TMP_DIR` or the OS temp directory. */
  tmpDir?: string;
}

export interface ResolvedCliContext {
  logger: ILogger;
  binary: string;
  tmpDir?: string;
}

function resolveContext(ctx: FastTextCliContext): ResolvedCliContext {
  const tmpDir = ctx.tmpDir ?? getEnv("FASTTEXT_TMP_DIR", "");
  return {
    logger: ctx.logger ?? noopLogger(),
    binary: ctx.binary ?? getEnv("FASTTEXT_BIN", "fasttext"),
    tmpDir: tmpDir || undefined,
  };
}

/* ────────────────────────────────────────────────────────────────────────── */
/* Process plumbing                                                           */
/* ────────────────────────────────────────────────────────────────────────── */

const STDERR_TAIL = 2000;

/**
 * Runs the fastText binary to completion and resolves with its stdout.
 *
 * @param input - Written to the child's stdin, which is then closed.
 * @throws EngineError when the binary cannot be started or exits non-zero.
 */
export function runFastText(
  ctx: ResolvedCliContext,
  args: readonly string[],
  input?: string
): Promise<string> {
  const [command] = args;
  ctx.logger.info(`fastText: ${command} (${ctx.binary})`);

  return new Promise((resolve, reject) => {
    const child = spawn(ctx.binary, args, {
      stdio: [input === undefined ? "ignore" : "pipe", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    child.stdout?.setEncoding("utf8");
    child.stderr?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr?.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.on("error", (err: NodeJS.ErrnoException) => {
      const code = err.code === "ENOENT" ? ErrorCode.ENGINE_NOT_FOUND : ErrorCode.ENGINE_FAILED;
      reject(
        new EngineError(
          code === ErrorCode.ENGINE_NOT_FOUND
            ? `fastText binary not found: ${ctx.binary} (set FASTTEXT_BIN)`
            : `Failed to start fastText: ${err.message}`,
          code,
          { binary: ctx.binary, command },
          { cause: err }
        )
      );
    });

    child.on("close", (exitCode) => {
      if (exitCode === 0) {
        resolve(stdout);
        return;
      }
      const tail = stderr.slice(-STDERR_TAIL);
      ctx.logger.error(`fastText ${command} exited with ${exitCode}: ${tail}`);
      reject(
        new EngineError(`fastText ${command} exited with code ${exitCode}`, ErrorCode.ENGINE_FAILED, {
          binary: ctx.binary,
          command,
          exitCode,
          stderr: tail,
        })
      );
    });

    if (input !== undefined && child.stdin) {
      child.stdin.on("error", (err) => {
        ctx.logger.warn(`fastText ${command}: stdin closed early: ${err.message}`);
      });
      child.stdin.end(input);
    }
  });
}

/**
 * `-name value` pairs for every hyperparameter, in persisted order.
 */
export function hyperparametersToArgs(options: Hyperparameters): string[] {
  return HYPERPARAMETER_NAMES.flatMap((name) => [`-${name}`, String(options[name])]);
}

/**
 * Parses `predict-prob` output: one line per input, `label prob label prob ...`.
 *
 * @throws EngineError when the number of lines differs from `expected` or a
 *   probability is not a number.
 */
export function parsePredictions(stdout: string, expected: number): EnginePrediction {
  const lines = stdout.split("\n");
  // every input line yields one output line terminated by "\n"
  if (lines[lines.length - 1] === "") lines.pop();
  if (lines.length !== expected) {
    throw new EngineError(
      `fastText returned ${lines.length} prediction line(s) for ${expected} input(s)`,
      ErrorCode.ENGINE_FAILED
    );
  }

  const prediction: EnginePrediction = { labels: [], probabilities: [] };
  for (const line of lines) {
    const fields = line.trim().split(/\s+/).filter(Boolean);
    const labels: string[] = [];
    const probabilities: number[] = [];
    for (let i = 0; i + 1 < fields.length; i += 2) {
      const probability = Number(fields[i + 1]);
      if (Number.isNaN(probability)) {
        throw new EngineError(`Unparseable fastText prediction: "${line}"`, ErrorCode.ENGINE_FAILED);
      }
      labels.push(fields[i]);
      probabilities.push(probability);
    }
    prediction.labels.push(labels);
    prediction.probabilities.push(probabilities);
  }
  return prediction;
}

/* ────────────────────────────────────────────────────────────────────────── */
/* Model handle                                                               */
/* ────────────────────────────────────────────────────────────────────────── */

/**
 * A model artifact living in its own working directory. Quantizing replaces
 * the working `.bin` with a `.ftz` next to it.
 */
export class FastTextCliModel implements FastTextModel {
  private artifactPath: string;

  constructor(
    private readonly ctx: ResolvedCliContext,
    private readonly workDir: string,
    artifactPath: string
  ) {
    this.artifactPath = artifactPath;
  }

  get path(): string {
    return this.artifactPath;
  }

  async predict(texts: readonly string[], k: number): Promise<EnginePrediction> {
    if (texts.length === 0) return { labels: [], probabilities: [] };
    const input = `${texts.map(flattenText).join("\n")}\n`;
    const stdout = await runFastText(this.ctx, ["predict-prob", this.artifactPath, "-", String(k)], input);
    return parsePredictions(stdout, texts.length);
  }

  async save(path: string): Promise<void> {
    await copyFile(this.artifactPath, path);
  }

  async quantize(): Promise<void> {
    if (await this.isQuantized()) return;
    const prefix = join(this.workDir, "model");
    // -input is only read when retraining, but the tool insists on one
    await runFastText(this.ctx, ["quantize", "-input", this.artifactPath, "-output", prefix]);
    this.artifactPath = `${prefix}.ftz`;
    this.ctx.logger.impt(`Quantized model written to ${this.artifactPath}`);
  }

  async isQuantized(): Promise<boolean> {
    return (await readModelHeader(this.artifactPath)).quantized;
  }

  async dispose(): Promise<void> {
    await removeDirectory(this.workDir);
  }
}

/* ────────────────────────────────────────────────────────────────────────── */
/* Engine                                                                      */
/* ────────────────────────────────────────────────────────────────────────── */

/**
 * Engine backed by the fastText command-line tool. Each model gets its own
 * working directory, removed by `dispose()`.
 */
export function createFastTextCliEngine(ctx: FastTextCliContext = {}): FastTextEngine {
  const resolved = resolveContext(ctx);

  return {
    async train(corpusPath, options) {
      const workDir = await makeTempDirectory("fasttext-model-", resolved.tmpDir);
      const prefix = join(workDir, "model");
      try {
        await runFastText(resolved, [
          "supervised",
          "-input",
          corpusPath,
          "-output",
          prefix,
          ...hyperparametersToArgs(options),
        ]);
      } catch (err) {
        await removeDirectory(workDir);
        throw err;
      }
      return new FastTextCliModel(resolved, workDir, `${prefix}.bin`);
    },

    async load(path) {
      if (!fileExists(path)) {
        throw new EngineError(`Model artifact not found: ${path}`, ErrorCode.ENGINE_FAILED, { path });
      }
      // the CLI finds a model by extension, which a renamed artifact may not carry
      const { quantized } = await readModelHeader(path);
      const workDir = await makeTempDirectory("fasttext-model-", resolved.tmpDir);
      const artifactPath = join(workDir, quantized ? "model.ftz" : "model.bin");
      try {
        await copyFile(path, artifactPath);
      } catch (err) {
        await removeDirectory(workDir);
        throw err;
      }
      return new FastTextCliModel(resolved, workDir, artifactPath);
    },
  };
}

// Test hooks (not re-exported from barrel index)
export const __test = { resolveContext };

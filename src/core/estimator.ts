import { ConfigurationError, ErrorCode } from "./errors.ts";
import { getEnv } from "./env.ts";
import { createFastTextCliEngine } from "./fasttext-cli.ts";
import type { Hyperparameters } from "./hyperparameters.ts";
import type { LabelRegistry } from "./label-registry.ts";
import { getLogger } from "./logger.ts";
import { withTrainingCorpus } from "./corpus.ts";
import { alignProbabilities, alignTopLabels, type MissingLabelPolicy } from "./prediction-aligner.ts";
import {
  readSavedClassifier,
  saveClassifier,
  type ClassifierSnapshot,
  type SavedClassifier,
} from "./persistence.ts";
import type { ClassifierVariant, FitInput, VariantKind } from "./variants.ts";
import type { FastTextEngine, FastTextModel } from "../types/engine.ts";
import type { ILogger, ProbabilityMatrix, TextInput } from "../types/dataset.ts";

/* ────────────────────────────────────────────────────────────────────────── */
/* Runtime                                                                    */
/* ────────────────────────────────────────────────────────────────────────── */

/**
 * Everything a classifier needs besides its hyperparameters.
 */
export interface ClassifierRuntimeOptions {
  /** Training and inference backend; the fastText command-line tool by default. */
  engine?: FastTextEngine;
  logger?: ILogger;
  /** Parent directory for training corpora; `FASTTEXT_TMP_DIR` or the OS temp directory. */
  tmpDir?: string;
  /** How `predictProba` treats a class the engine left out. Defaults to `"zero"`. */
  onMissingLabel?: MissingLabelPolicy;
}

export interface EstimatorContext {
  engine: FastTextEngine;
  logger: ILogger;
  tmpDir?: string;
  onMissing: MissingLabelPolicy;
}

export function resolveRuntime(options: ClassifierRuntimeOptions = {}): EstimatorContext {
  const logger = options.logger ?? getLogger();
  const tmpDir = options.tmpDir ?? (getEnv("FASTTEXT_TMP_DIR", "") || undefined);
  return {
    engine: options.engine ?? createFastTextCliEngine({ logger, tmpDir }),
    logger,
    tmpDir,
    onMissing: options.onMissingLabel ?? "zero",
  };
}

/* ────────────────────────────────────────────────────────────────────────── */
/* State                                                                      */
/* ────────────────────────────────────────────────────────────────────────── */

/**
 * - unfitted: nothing to predict with
 * - fitted: holds a trained or loaded model
 * - quantized: holds a compressed model; saves as `.ftz` from now on
 */
export type ClassifierState = "unfitted" | "fitted" | "quantized";

export interface FittedState {
  registry: LabelRegistry;
  model: FastTextModel;
  quantized: boolean;
}

export function stateOf(fitted: FittedState | undefined): ClassifierState {
  if (!fitted) return "unfitted";
  return fitted.quantized ? "quantized" : "fitted";
}

export function toTexts(input: TextInput): readonly string[] {
  return typeof input === "string" ? [input] : input;
}

export async function disposeModel(model: FastTextModel, logger: ILogger): Promise<void> {
  try {
    await model.dispose?.();
  } catch (err) {
    logger.warn(`Failed to release model: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/* ────────────────────────────────────────────────────────────────────────── */
/* Operations                                                                 */
/* ────────────────────────────────────────────────────────────────────────── */

/**
 * Builds the label registry and the corpus for `variant`, then trains on a
 * temporary corpus file that is gone once training settles.
 *
 * @throws ConfigurationError on an empty training set or malformed targets.
 */
export async function fitVariant<Targets>(
  ctx: EstimatorContext,
  variant: ClassifierVariant<Targets>,
  input: FitInput<Targets>,
  hyperparameters: Hyperparameters
): Promise<FittedState> {
  if (input.texts.length === 0) {
    throw new ConfigurationError(`Cannot fit on an empty training set`, ErrorCode.SHAPE_MISMATCH);
  }

  const registry = variant.buildRegistry(input);
  if (registry.size === 0) {
    throw new ConfigurationError(`Cannot fit without any class labels`, ErrorCode.LABEL_INVALID);
  }
  const records = variant.buildCorpus(input, registry, hyperparameters.label);

  ctx.logger.info(
    `Fitting ${variant.kind} classifier on ${records.length} text(s), ${registry.size} class(es), loss ${hyperparameters.loss}`
  );
  const model = await withTrainingCorpus(
    records,
    (corpusPath) => ctx.engine.train(corpusPath, hyperparameters),
    { tmpDir: ctx.tmpDir, logger: ctx.logger }
  );
  ctx.logger.impt(`Fitted ${variant.kind} classifier with ${registry.size} class(es)`);

  return { registry, model, quantized: false };
}

export async function predictTopLabels(
  fitted: FittedState,
  texts: readonly string[],
  prefix: string
): Promise<string[]> {
  if (texts.length === 0) return [];
  const prediction = await fitted.model.predict(texts, 1);
  return alignTopLabels(prediction, fitted.registry, prefix);
}

/**
 * Mean accuracy of the top-1 predictions against `expected`.
 *
 * @throws ConfigurationError when the lengths differ or there is nothing to score.
 */
export async function scoreTopLabels(
  fitted: FittedState,
  texts: readonly string[],
  expected: readonly string[],
  prefix: string
): Promise<number> {
  if (texts.length !== expected.length) {
    throw new ConfigurationError(
      `Got ${texts.length} text(s) but ${expected.length} label(s)`,
      ErrorCode.SHAPE_MISMATCH,
      { texts: texts.length, labels: expected.length }
    );
  }
  if (texts.length === 0) {
    throw new ConfigurationError(`Cannot score an empty set`, ErrorCode.SHAPE_MISMATCH);
  }
  const predicted = await predictTopLabels(fitted, texts, prefix);
  const hits = predicted.filter((label, i) => label === expected[i]).length;
  return hits / texts.length;
}

export async function predictProbabilities(
  ctx: EstimatorContext,
  fitted: FittedState,
  texts: readonly string[],
  prefix: string
): Promise<ProbabilityMatrix> {
  if (texts.length === 0) return [];
  const prediction = await fitted.model.predict(texts, fitted.registry.size);
  return alignProbabilities(prediction, fitted.registry, prefix, {
    onMissing: ctx.onMissing,
    logger: ctx.logger,
  });
}

/**
 * Compresses the held model. Does nothing when it already is.
 */
export async function quantizeState(ctx: EstimatorContext, fitted: FittedState): Promise<void> {
  if (fitted.quantized) return;
  await fitted.model.quantize();
  fitted.quantized = true;
  ctx.logger.info(`Model quantized`);
}

/**
 * Saves the held model and its records. `quantized` quantizes first; an
 * already quantized model is always written as `.ftz`.
 */
export async function saveState(
  ctx: EstimatorContext,
  dir: string,
  fitted: FittedState,
  snapshot: Omit<ClassifierSnapshot, "registry">,
  quantized: boolean
): Promise<string> {
  if (quantized) await quantizeState(ctx, fitted);
  return saveClassifier(dir, { ...snapshot, registry: fitted.registry }, fitted.model, fitted.quantized, ctx.logger);
}

/**
 * Reads a saved directory and opens its artifact. The model is released again
 * if anything after opening it fails.
 */
export async function loadState(
  ctx: EstimatorContext,
  dir: string,
  variant: VariantKind
): Promise<{ saved: SavedClassifier; fitted: FittedState }> {
  const saved = await readSavedClassifier(dir, variant, ctx.logger);
  const model = await ctx.engine.load(saved.artifactPath);

  try {
    const quantized = await model.isQuantized();
    return { saved, fitted: { registry: saved.registry, model, quantized } };
  } catch (err) {
    await disposeModel(model, ctx.logger);
    throw err;
  }
}

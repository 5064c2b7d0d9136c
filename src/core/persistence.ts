import { join } from "node:path";
import { z } from "zod";
import { ConfigurationError, ErrorCode, EstimatorError, PersistenceError } from "./errors.ts";
import { ensureDirectory, fileExists, readJsonFile, removeFile, writeJsonFile } from "./file-utils.ts";
import { HyperparametersSchema, formatZodIssues, type Hyperparameters } from "./hyperparameters.ts";
import { LabelRegistry } from "./label-registry.ts";
import type { VariantKind } from "./variants.ts";
import type { FastTextModel } from "../types/engine.ts";
import type { ILogger } from "../types/dataset.ts";

/* ────────────────────────────────────────────────────────────────────────── */
/* Layout                                                                     */
/* ────────────────────────────────────────────────────────────────────────── */

export const PARAMS_FILE = "params.json";
export const LABELS_FILE = "labels.json";
export const ARTIFACT_BASENAME = "fasttext";
export const QUANTIZED_EXTENSION = "ftz";
export const UNCOMPRESSED_EXTENSION = "bin";

/** Bumped whenever params.json or labels.json change shape. */
export const FORMAT_VERSION = 1;

export function artifactPath(dir: string, quantized: boolean): string {
  return join(dir, `${ARTIFACT_BASENAME}.${quantized ? QUANTIZED_EXTENSION : UNCOMPRESSED_EXTENSION}`);
}

/* ────────────────────────────────────────────────────────────────────────── */
/* Records                                                                    */
/* ────────────────────────────────────────────────────────────────────────── */

/**
 * params.json. `formatVersion` and `variant` are absent from files written
 * before the format was versioned; missing hyperparameters take their defaults.
 */
export const ParamsRecordSchema = HyperparametersSchema.extend({
  formatVersion: z.number().int().positive().optional(),
  variant: z.enum(["single-label", "multi-label"]).optional(),
  labels: z.array(z.string().min(1)).optional(),
});

export type ParamsRecord = z.input<typeof ParamsRecordSchema>;

export const LabelsRecordSchema = z.object({
  labels: z.array(z.object({ original: z.string(), adjusted: z.string() })),
});

export type LabelsRecord = z.infer<typeof LabelsRecordSchema>;

export interface ClassifierSnapshot {
  variant: VariantKind;
  hyperparameters: Hyperparameters;
  /** Multi-label only: the labels the classifier was constructed with. */
  declaredLabels?: readonly string[];
  registry: LabelRegistry;
}

export interface SavedClassifier extends ClassifierSnapshot {
  /** The artifact `load` picked: `fasttext.ftz` if present, else `fasttext.bin`. */
  artifactPath: string;
}

export function toParamsRecord(snapshot: ClassifierSnapshot): ParamsRecord {
  return {
    formatVersion: FORMAT_VERSION,
    variant: snapshot.variant,
    ...snapshot.hyperparameters,
    ...(snapshot.declaredLabels ? { labels: [...snapshot.declaredLabels] } : {}),
  };
}

export function toLabelsRecord(registry: LabelRegistry): LabelsRecord {
  return { labels: registry.entries() };
}

/* ────────────────────────────────────────────────────────────────────────── */
/* Save                                                                       */
/* ────────────────────────────────────────────────────────────────────────── */

/**
 * Writes params.json, then labels.json, then the model artifact. A directory
 * left behind by a failure part-way is incomplete and should be saved again.
 *
 * @returns The path of the artifact written.
 */
export async function saveClassifier(
  dir: string,
  snapshot: ClassifierSnapshot,
  model: FastTextModel,
  quantized: boolean,
  logger: ILogger
): Promise<string> {
  const target = artifactPath(dir, quantized);
  try {
    ensureDirectory(dir, logger);
    await writeJsonFile(join(dir, PARAMS_FILE), toParamsRecord(snapshot));
    await writeJsonFile(join(dir, LABELS_FILE), toLabelsRecord(snapshot.registry));

    const stale = artifactPath(dir, !quantized);
    if (fileExists(stale) && !removeFile(stale, logger)) {
      throw new PersistenceError(`Cannot remove stale artifact`, ErrorCode.PERSISTENCE_FAILED, { path: stale });
    }
    await model.save(target);
  } catch (err) {
    if (err instanceof EstimatorError) throw err;
    throw new PersistenceError(`Failed to save classifier`, ErrorCode.PERSISTENCE_FAILED, { path: dir }, { cause: err });
  }

  logger.impt(`Saved ${snapshot.variant} classifier (${snapshot.registry.size} labels) to ${dir}`);
  return target;
}

/* ────────────────────────────────────────────────────────────────────────── */
/* Load                                                                       */
/* ────────────────────────────────────────────────────────────────────────── */

async function readRecord<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  if (!fileExists(path)) {
    throw new PersistenceError(`Missing record`, ErrorCode.RECORD_MALFORMED, { path });
  }

  let raw: unknown;
  try {
    raw = await readJsonFile(path);
  } catch (err) {
    throw new PersistenceError(`Record is not valid JSON`, ErrorCode.RECORD_MALFORMED, { path }, { cause: err });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new PersistenceError(
      `Malformed record: ${formatZodIssues(parsed.error)}`,
      ErrorCode.RECORD_MALFORMED,
      { path }
    );
  }
  return parsed.data;
}

/**
 * Picks the artifact to load. The quantized form wins when both exist.
 *
 * @throws PersistenceError when the directory holds neither.
 */
export function locateArtifact(dir: string, logger: ILogger): string {
  const quantized = artifactPath(dir, true);
  const uncompressed = artifactPath(dir, false);
  const hasQuantized = fileExists(quantized);
  const hasUncompressed = fileExists(uncompressed);

  if (hasQuantized && hasUncompressed) {
    logger.warn(`Both ${quantized} and ${uncompressed} exist; loading the quantized artifact`);
  }
  if (hasQuantized) return quantized;
  if (hasUncompressed) return uncompressed;

  throw new PersistenceError(
    `No ${ARTIFACT_BASENAME}.${QUANTIZED_EXTENSION} or ${ARTIFACT_BASENAME}.${UNCOMPRESSED_EXTENSION} in directory`,
    ErrorCode.ARTIFACT_MISSING,
    { path: dir }
  );
}

/**
 * Reads and validates a saved classifier directory for the given variant.
 * Nothing is returned unless every record and the artifact check out.
 */
export async function readSavedClassifier(
  dir: string,
  variant: VariantKind,
  logger: ILogger
): Promise<SavedClassifier> {
  const paramsPath = join(dir, PARAMS_FILE);
  const params = await readRecord(paramsPath, ParamsRecordSchema);

  if (params.formatVersion !== undefined && params.formatVersion > FORMAT_VERSION) {
    throw new PersistenceError(
      `Saved with format version ${params.formatVersion}; this build reads up to ${FORMAT_VERSION}`,
      ErrorCode.FORMAT_UNSUPPORTED,
      { path: paramsPath }
    );
  }

  const savedVariant = params.variant ?? (params.labels ? "multi-label" : undefined);
  if (savedVariant !== undefined && savedVariant !== variant) {
    throw new PersistenceError(
      `Directory holds a ${savedVariant} classifier, not a ${variant} one`,
      ErrorCode.VARIANT_MISMATCH,
      { path: paramsPath, expected: variant, found: savedVariant }
    );
  }

  const labelsPath = join(dir, LABELS_FILE);
  const labels = await readRecord(labelsPath, LabelsRecordSchema);

  let registry: LabelRegistry;
  try {
    registry = LabelRegistry.fromEntries(labels.labels);
  } catch (err) {
    if (!(err instanceof ConfigurationError)) throw err;
    throw new PersistenceError(`Invalid label record: ${err.message}`, ErrorCode.RECORD_MALFORMED, {
      path: labelsPath,
    }, { cause: err });
  }

  const { formatVersion: _version, variant: _variant, labels: declared, ...hyperparameters } = params;
  const snapshot: SavedClassifier = {
    variant,
    hyperparameters: variant === "multi-label" ? { ...hyperparameters, loss: "ova" } : hyperparameters,
    registry,
    artifactPath: locateArtifact(dir, logger),
  };
  if (variant === "multi-label") snapshot.declaredLabels = declared ?? [...registry.originalLabels];

  logger.info(`Read ${variant} classifier (${registry.size} labels) from ${dir}`);
  return snapshot;
}

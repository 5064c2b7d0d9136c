export * from "./classifier.ts";
export type { ClassifierRuntimeOptions, ClassifierState } from "./estimator.ts";
export * from "./errors.ts";
export * from "./env.ts";
export * from "./logger.ts";
export * from "./hyperparameters.ts";
export * from "./label-registry.ts";
export { buildMultiLabelCorpus, buildSingleLabelCorpus, flattenText, withTrainingCorpus } from "./corpus.ts";
export type { CorpusOptions } from "./corpus.ts";
export * from "./prediction-aligner.ts";
export {
  ARTIFACT_BASENAME,
  FORMAT_VERSION,
  LABELS_FILE,
  PARAMS_FILE,
  artifactPath,
  locateArtifact,
  readSavedClassifier,
  saveClassifier,
} from "./persistence.ts";
export type { ClassifierSnapshot, SavedClassifier } from "./persistence.ts";
export * from "./variants.ts";
export { createFastTextCliEngine, FastTextCliModel } from "./fasttext-cli.ts";
export type { FastTextCliContext } from "./fasttext-cli.ts";
export { readModelHeader } from "./model-header.ts";
export type { ModelHeader, ModelKind } from "./model-header.ts";
export type * from "../types/engine.ts";
export type * from "../types/dataset.ts";

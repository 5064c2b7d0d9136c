import type { Hyperparameters } from "../core/hyperparameters.ts";

/**
 * Raw output of an engine prediction: for every input text, the predicted
 * label tokens (prefix included) in descending probability order and the
 * matching probabilities.
 */
export interface EnginePrediction {
  labels: string[][];
  probabilities: number[][];
}

/**
 * A trained model held by the engine. The wrapper only ever talks to it
 * through these operations.
 */
export interface FastTextModel {
  /**
   * Returns up to `k` labels per text, most probable first.
   */
  predict(texts: readonly string[], k: number): Promise<EnginePrediction>;

  /**
   * Writes the model's own binary artifact to `path`.
   */
  save(path: string): Promise<void>;

  /**
   * Compresses the model in place. Irreversible for this handle.
   */
  quantize(): Promise<void>;

  /** Whether the artifact behind this handle is quantized, as the artifact itself reports. */
  isQuantized(): Promise<boolean>;

  /** Releases whatever the handle holds (working files, native memory). */
  dispose?(): Promise<void>;
}

export interface FastTextEngine {
  /**
   * Trains a supervised model on a line-oriented corpus file.
   *
   * @param corpusPath - File with one `"{labels} {text}"` record per line.
   * @param options - Every hyperparameter, passed through unchanged.
   */
  train(corpusPath: string, options: Hyperparameters): Promise<FastTextModel>;

  /**
   * Opens a previously saved `.bin` or `.ftz` artifact.
   */
  load(path: string): Promise<FastTextModel>;
}

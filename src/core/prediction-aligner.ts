import { AlignmentError } from "./errors.ts";
import type { LabelRegistry } from "./label-registry.ts";
import type { EnginePrediction } from "../types/engine.ts";
import type { ILogger, ProbabilityMatrix } from "../types/dataset.ts";

/**
 * What to do when the engine leaves a class out of a text's result set.
 * - zero: the class gets probability 0 (logged at warn)
 * - error: raise AlignmentError
 */
export type MissingLabelPolicy = "zero" | "error";

export interface AlignOptions {
  onMissing?: MissingLabelPolicy;
  logger?: ILogger;
}

/**
 * Drops the engine's label prefix. Returns `undefined` for a token that does not carry it.
 */
export function stripLabelPrefix(token: string, prefix: string): string | undefined {
  return token.startsWith(prefix) ? token.slice(prefix.length) : undefined;
}

function rowCount(prediction: EnginePrediction): number {
  if (prediction.labels.length !== prediction.probabilities.length) {
    throw new AlignmentError(
      `Engine returned ${prediction.labels.length} label row(s) but ${prediction.probabilities.length} probability row(s)`
    );
  }
  return prediction.labels.length;
}

/**
 * The single best label per text, mapped back to its original spelling.
 *
 * @throws AlignmentError when a text got no prediction or the engine returned a
 *   token the registry does not know.
 */
export function alignTopLabels(
  prediction: EnginePrediction,
  registry: LabelRegistry,
  prefix: string
): string[] {
  const rows = rowCount(prediction);
  const labels: string[] = [];

  for (let i = 0; i < rows; i++) {
    const [token] = prediction.labels[i];
    if (token === undefined) {
      throw new AlignmentError(`Engine returned no label for input ${i}`, { index: i });
    }
    const adjusted = stripLabelPrefix(token, prefix);
    const original = adjusted === undefined ? undefined : registry.restore(adjusted);
    if (original === undefined) {
      throw new AlignmentError(`Engine returned unknown label "${token}" for input ${i}`, {
        index: i,
        token,
      });
    }
    labels.push(original);
  }
  return labels;
}

/**
 * Reorders the engine's descending-probability output into canonical class order.
 *
 * Row `i` of the result belongs to input `i`; column `j` to
 * `registry.originalLabels[j]`. Tokens the registry does not know are ignored.
 */
export function alignProbabilities(
  prediction: EnginePrediction,
  registry: LabelRegistry,
  prefix: string,
  options: AlignOptions = {}
): ProbabilityMatrix {
  const { onMissing = "zero", logger } = options;
  const rows = rowCount(prediction);
  const classes = registry.originalLabels;
  const matrix: ProbabilityMatrix = [];

  for (let i = 0; i < rows; i++) {
    const tokens = prediction.labels[i];
    const probabilities = prediction.probabilities[i];

    // adjusted label -> position in the engine's output; the first (most probable) wins
    const position = new Map<string, number>();
    tokens.forEach((token, p) => {
      const adjusted = stripLabelPrefix(token, prefix);
      if (adjusted !== undefined && !position.has(adjusted)) position.set(adjusted, p);
    });

    const row = new Array<number>(classes.length).fill(0);
    const missing: string[] = [];
    classes.forEach((label, column) => {
      const p = position.get(registry.adjust(label));
      const probability = p === undefined ? undefined : probabilities[p];
      if (probability === undefined) missing.push(label);
      else row[column] = probability;
    });

    if (missing.length) {
      if (onMissing === "error") {
        throw new AlignmentError(
          `Engine returned no probability for ${missing.length} class(es) on input ${i}: ${missing.join(", ")}`,
          { index: i, missing }
        );
      }
      logger?.warn(`Input ${i}: no probability for ${missing.join(", ")}; using 0`);
    }
    matrix.push(row);
  }
  return matrix;
}

export interface ILogger {
  attn(...args: unknown[]): void;
  impt(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * A single text or a batch of texts. Every read operation accepts both and
 * always answers with one row per text.
 */
export type TextInput = string | readonly string[];

/**
 * One row of a multi-label target matrix: `1` where the example carries the
 * label of that column, `0` otherwise. Columns follow the canonical class order.
 */
export type IndicatorRow = readonly number[];

/** Dense probabilities, one row per input text and one column per class. */
export type ProbabilityMatrix = number[][];

/**
 * A persisted label mapping entry.
 */
export interface LabelEntry {
  /** The user-facing class label. */
  original: string;
  /** The engine-safe token the label is trained under (without the prefix). */
  adjusted: string;
}

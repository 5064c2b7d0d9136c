import { join } from "node:path";
import { ConfigurationError, ErrorCode } from "./errors.ts";
import { withTempDirectory, writeLines } from "./file-utils.ts";
import type { LabelRegistry } from "./label-registry.ts";
import type { ILogger, IndicatorRow } from "../types/dataset.ts";

const LINE_BREAKS = /[\r\n]+/g;

/**
 * Records are line-oriented, so a text must not span lines.
 */
export function flattenText(text: string): string {
  return text.replace(LINE_BREAKS, " ");
}

function assertSameLength(what: string, texts: readonly string[], targets: readonly unknown[]): void {
  if (texts.length !== targets.length) {
    throw new ConfigurationError(
      `Got ${texts.length} text(s) but ${targets.length} ${what}`,
      ErrorCode.SHAPE_MISMATCH,
      { texts: texts.length, targets: targets.length }
    );
  }
}

/**
 * One `"{prefix}{adjusted label} {text}"` record per example.
 *
 * @throws ConfigurationError on a length mismatch or a label missing from the registry.
 */
export function buildSingleLabelCorpus(
  texts: readonly string[],
  labels: readonly string[],
  registry: LabelRegistry,
  prefix: string
): string[] {
  assertSameLength("label(s)", texts, labels);
  return texts.map((text, i) => `${prefix}${registry.adjust(labels[i])} ${flattenText(text)}`);
}

/**
 * One record per indicator row: every label whose column holds `1`, in
 * canonical column order, then the text. A row without labels still yields a
 * record (`" {text}"`).
 *
 * @throws ConfigurationError on a row/text count mismatch, a row whose length
 *   differs from the number of classes, or a cell other than 0 or 1.
 */
export function buildMultiLabelCorpus(
  texts: readonly string[],
  rows: readonly IndicatorRow[],
  registry: LabelRegistry,
  prefix: string
): string[] {
  assertSameLength("indicator row(s)", texts, rows);
  const columns = registry.originalLabels.map((label) => `${prefix}${registry.adjust(label)}`);

  return rows.map((row, r) => {
    if (row.length !== columns.length) {
      throw new ConfigurationError(
        `Indicator row ${r} has ${row.length} column(s), expected ${columns.length}`,
        ErrorCode.SHAPE_MISMATCH,
        { row: r, columns: row.length, expected: columns.length }
      );
    }
    const labels = row
      .map((value, c) => {
        if (value !== 0 && value !== 1) {
          throw new ConfigurationError(
            `Indicator row ${r} column ${c} must be 0 or 1, got ${value}`,
            ErrorCode.SHAPE_MISMATCH,
            { row: r, column: c, value }
          );
        }
        return value === 1 ? columns[c] : undefined;
      })
      .filter((token): token is string => token !== undefined);

    return `${labels.join(" ")} ${flattenText(texts[r])}`;
  });
}

export interface CorpusOptions {
  /** Parent of the temporary corpus directory; the OS temp directory by default. */
  tmpDir?: string;
  logger?: ILogger;
}

/**
 * Writes the records to a temporary corpus file, runs `fn` on its path, and
 * deletes the file once `fn` settles. No copy of the corpus outlives the call.
 */
export async function withTrainingCorpus<T>(
  records: readonly string[],
  fn: (corpusPath: string) => Promise<T>,
  options: CorpusOptions = {}
): Promise<T> {
  return withTempDirectory(
    "fasttext-corpus-",
    async (dir) => {
      const corpusPath = join(dir, "train.txt");
      const written = await writeLines(corpusPath, records);
      options.logger?.info(`Wrote ${written} training record(s) to ${corpusPath}`);
      return fn(corpusPath);
    },
    options.tmpDir
  );
}

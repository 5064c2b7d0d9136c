import { ConfigurationError, ErrorCode } from "./errors.ts";
import type { LabelEntry } from "../types/dataset.ts";

/* ────────────────────────────────────────────────────────────────────────── */
/* Label adjustment                                                           */
/* ────────────────────────────────────────────────────────────────────────── */

const WHITESPACE = /\s/u;
const CONTROL = /\p{Cc}/u;
const HEX_PAIR = /^[0-9A-Fa-f]{2}$/;

function needsEscape(ch: string): boolean {
  if (ch === "%" || ch === "_") return true;
  if (ch === " ") return false;
  return WHITESPACE.test(ch) || CONTROL.test(ch);
}

function percentEncode(ch: string): string {
  return Array.from(Buffer.from(ch, "utf8"), (byte) =>
    `%${byte.toString(16).toUpperCase().padStart(2, "0")}`
  ).join("");
}

/**
 * Turns a label into a token the engine reads as a single word.
 *
 * Spaces become `_`. `%`, `_`, other whitespace and control characters are
 * percent-encoded first, so the mapping stays injective: `"pet store"` becomes
 * `"pet_store"` while `"pet_store"` becomes `"pet%5Fstore"`.
 */
export function adjustLabel(label: string): string {
  let adjusted = "";
  for (const ch of label) {
    if (needsEscape(ch)) adjusted += percentEncode(ch);
    else if (ch === " ") adjusted += "_";
    else adjusted += ch;
  }
  return adjusted;
}

/**
 * Inverse of {@link adjustLabel}. A `%` not followed by two hex digits is kept as is.
 */
export function restoreLabel(adjusted: string): string {
  let restored = "";
  let pending: number[] = [];
  const flush = () => {
    if (pending.length) {
      restored += Buffer.from(pending).toString("utf8");
      pending = [];
    }
  };

  for (let i = 0; i < adjusted.length; i++) {
    const ch = adjusted[i];
    const hex = adjusted.slice(i + 1, i + 3);
    if (ch === "%" && HEX_PAIR.test(hex)) {
      pending.push(Number.parseInt(hex, 16));
      i += 2;
      continue;
    }
    flush();
    restored += ch === "_" ? " " : ch;
  }
  flush();
  return restored;
}

/**
 * Orders strings by Unicode code point, which differs from the default
 * UTF-16 code unit order for characters outside the Basic Multilingual Plane.
 */
export function compareCodePoints(a: string, b: string): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a.charCodeAt(i) !== b.charCodeAt(i)) {
      return (a.codePointAt(i) ?? 0) - (b.codePointAt(i) ?? 0);
    }
  }
  return a.length - b.length;
}

/* ────────────────────────────────────────────────────────────────────────── */
/* Registry                                                                   */
/* ────────────────────────────────────────────────────────────────────────── */

/**
 * Canonical class order plus the label ↔ engine token mapping.
 *
 * `originalLabels` is sorted and duplicate-free and fixes the column order of
 * every probability matrix the classifiers return.
 */
export class LabelRegistry {
  readonly originalLabels: readonly string[];
  private readonly forward: Map<string, string>;
  private readonly inverse: Map<string, string>;
  private readonly positions: Map<string, number>;

  private constructor(entries: readonly LabelEntry[]) {
    this.originalLabels = entries.map((entry) => entry.original);
    this.forward = new Map(entries.map((entry) => [entry.original, entry.adjusted]));
    this.inverse = new Map(entries.map((entry) => [entry.adjusted, entry.original]));
    this.positions = new Map(entries.map((entry, index) => [entry.original, index]));
  }

  /**
   * Deduplicates and sorts the labels. The result depends only on the set of
   * labels, never on their order or multiplicity.
   *
   * @throws ConfigurationError for an empty or non-string label.
   */
  static build(labels: Iterable<string>): LabelRegistry {
    const unique = LabelRegistry.sortLabels(labels);
    return new LabelRegistry(
      unique.map((original) => ({ original, adjusted: adjustLabel(original) }))
    );
  }

  /**
   * Rebuilds a registry from persisted entries, keeping their order.
   *
   * @throws ConfigurationError when a label is empty, the adjusted token is not a
   *   single engine word, or either side of the mapping repeats.
   */
  static fromEntries(entries: readonly LabelEntry[]): LabelRegistry {
    const originals = new Set<string>();
    const adjusted = new Set<string>();

    for (const entry of entries) {
      if (!entry.original) {
        throw new ConfigurationError("Labels must be non-empty strings", ErrorCode.LABEL_INVALID);
      }
      if (!entry.adjusted || WHITESPACE.test(entry.adjusted)) {
        throw new ConfigurationError(
          `Adjusted label for "${entry.original}" is not a single token: "${entry.adjusted}"`,
          ErrorCode.LABEL_INVALID,
          { label: entry.original }
        );
      }
      if (originals.has(entry.original)) {
        throw new ConfigurationError(`Duplicate label "${entry.original}"`, ErrorCode.LABEL_INVALID, {
          label: entry.original,
        });
      }
      if (adjusted.has(entry.adjusted)) {
        throw new ConfigurationError(
          `Adjusted label "${entry.adjusted}" is shared by more than one label`,
          ErrorCode.LABEL_INVALID,
          { adjusted: entry.adjusted }
        );
      }
      originals.add(entry.original);
      adjusted.add(entry.adjusted);
    }

    return new LabelRegistry(entries.map(({ original, adjusted }) => ({ original, adjusted })));
  }

  /**
   * Sorted, duplicate-free copy of `labels`.
   */
  static sortLabels(labels: Iterable<string>): string[] {
    const unique = new Set<string>();
    for (const label of labels) {
      if (typeof label !== "string" || label.length === 0) {
        throw new ConfigurationError("Labels must be non-empty strings", ErrorCode.LABEL_INVALID, {
          label,
        });
      }
      unique.add(label);
    }
    return [...unique].sort(compareCodePoints);
  }

  get size(): number {
    return this.originalLabels.length;
  }

  /** label → adjusted label */
  get adjustedLabels(): ReadonlyMap<string, string> {
    return this.forward;
  }

  /** adjusted label → label */
  get adjustedLabelsInverse(): ReadonlyMap<string, string> {
    return this.inverse;
  }

  has(label: string): boolean {
    return this.forward.has(label);
  }

  /**
   * @throws ConfigurationError if the label was not part of the registry.
   */
  adjust(label: string): string {
    const adjusted = this.forward.get(label);
    if (adjusted === undefined) {
      throw new ConfigurationError(`Unknown label "${label}"`, ErrorCode.LABEL_UNKNOWN, { label });
    }
    return adjusted;
  }

  restore(adjusted: string): string | undefined {
    return this.inverse.get(adjusted);
  }

  /** Column of `label` in the canonical order, or -1. */
  indexOf(label: string): number {
    return this.positions.get(label) ?? -1;
  }

  entries(): LabelEntry[] {
    return this.originalLabels.map((original) => ({ original, adjusted: this.adjust(original) }));
  }
}

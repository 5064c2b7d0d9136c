import { buildMultiLabelCorpus, buildSingleLabelCorpus } from "./corpus.ts";
import { LabelRegistry } from "./label-registry.ts";
import type { IndicatorRow } from "../types/dataset.ts";

export type VariantKind = "single-label" | "multi-label";

export interface FitInput<Targets> {
  texts: readonly string[];
  targets: Targets;
  /** Labels declared up front (multi-label), one per indicator column. */
  declaredLabels?: readonly string[];
}

/**
 * What differs between the single-label and the multi-label classifier:
 * where the classes come from and how an example becomes a corpus record.
 */
export interface ClassifierVariant<Targets> {
  readonly kind: VariantKind;
  buildRegistry(input: FitInput<Targets>): LabelRegistry;
  buildCorpus(input: FitInput<Targets>, registry: LabelRegistry, prefix: string): string[];
}

/** Classes are the labels observed in the training targets. */
export const singleLabelVariant: ClassifierVariant<readonly string[]> = {
  kind: "single-label",
  buildRegistry: ({ targets }) => LabelRegistry.build(targets),
  buildCorpus: ({ texts, targets }, registry, prefix) =>
    buildSingleLabelCorpus(texts, targets, registry, prefix),
};

/** Classes are the declared labels; targets are indicator rows over them. */
export const multiLabelVariant: ClassifierVariant<readonly IndicatorRow[]> = {
  kind: "multi-label",
  buildRegistry: ({ declaredLabels = [] }) => LabelRegistry.build(declaredLabels),
  buildCorpus: ({ texts, targets }, registry, prefix) =>
    buildMultiLabelCorpus(texts, targets, registry, prefix),
};

import { NotFittedError } from "./errors.ts";
import {
  resolveHyperparameters,
  resolveMultiLabelHyperparameters,
  type HyperparameterOptions,
  type Hyperparameters,
  type MultiLabelHyperparameterOptions,
} from "./hyperparameters.ts";
import { LabelRegistry } from "./label-registry.ts";
import {
  disposeModel,
  fitVariant,
  loadState,
  predictProbabilities,
  predictTopLabels,
  quantizeState,
  resolveRuntime,
  saveState,
  scoreTopLabels,
  stateOf,
  toTexts,
  type ClassifierRuntimeOptions,
  type ClassifierState,
  type EstimatorContext,
  type FittedState,
} from "./estimator.ts";
import { multiLabelVariant, singleLabelVariant } from "./variants.ts";
import type { IndicatorRow, ProbabilityMatrix, TextInput } from "../types/dataset.ts";

export interface SaveOptions {
  /** Quantize before writing. The instance stays quantized afterwards. */
  quantized?: boolean;
}

export type ClassifierOptions = HyperparameterOptions & ClassifierRuntimeOptions;

export type MultiLabelClassifierOptions = MultiLabelHyperparameterOptions &
  ClassifierRuntimeOptions & {
    /** Every class the classifier can predict. Indicator columns follow their sorted order. */
    labels: readonly string[];
  };

function runtimeOptions(options: ClassifierRuntimeOptions): ClassifierRuntimeOptions {
  const { engine, logger, tmpDir, onMissingLabel } = options;
  return { engine, logger, tmpDir, onMissingLabel };
}

/* ────────────────────────────────────────────────────────────────────────── */
/* Single-label                                                               */
/* ────────────────────────────────────────────────────────────────────────── */

/**
 * fastText text classifier with one label per text.
 *
 * @example
 * ```ts
 * const clf = new FastTextClassifier({ epoch: 25, wordNgrams: 2 });
 * await clf.fit(["purrs all day", "barks at the mailman"], ["cat", "dog"]);
 * await clf.predict("barks a lot"); // ["dog"]
 * await clf.save("models/pets");
 * ```
 */
export class FastTextClassifier {
  private readonly params: Hyperparameters;
  private readonly ctx: EstimatorContext;
  private fitted?: FittedState;

  constructor(options: ClassifierOptions = {}) {
    this.params = resolveHyperparameters(options);
    this.ctx = resolveRuntime(runtimeOptions(options));
  }

  get hyperparameters(): Hyperparameters {
    return { ...this.params };
  }

  get state(): ClassifierState {
    return stateOf(this.fitted);
  }

  get isFitted(): boolean {
    return this.fitted !== undefined;
  }

  get isQuantized(): boolean {
    return this.fitted?.quantized ?? false;
  }

  /** Learned classes in canonical order; the columns of `predictProba`. */
  get classes(): string[] {
    return [...this.require().registry.originalLabels];
  }

  get nLabels(): number {
    return this.require().registry.size;
  }

  async fit(texts: TextInput, labels: TextInput): Promise<this> {
    const next = await fitVariant(
      this.ctx,
      singleLabelVariant,
      { texts: toTexts(texts), targets: toTexts(labels) },
      this.params
    );
    await this.release();
    this.fitted = next;
    return this;
  }

  /** The most probable class of every text. */
  async predict(texts: TextInput): Promise<string[]> {
    return predictTopLabels(this.require(), toTexts(texts), this.params.label);
  }

  async predictProba(texts: TextInput): Promise<ProbabilityMatrix> {
    return predictProbabilities(this.ctx, this.require(), toTexts(texts), this.params.label);
  }

  /** Fraction of texts whose predicted class equals the given label. */
  async score(texts: TextInput, labels: TextInput): Promise<number> {
    return scoreTopLabels(this.require(), toTexts(texts), toTexts(labels), this.params.label);
  }

  async quantize(): Promise<void> {
    await quantizeState(this.ctx, this.require());
  }

  /**
   * @returns The path of the model artifact written.
   */
  async save(dir: string, options: SaveOptions = {}): Promise<string> {
    return saveState(
      this.ctx,
      dir,
      this.require(),
      { variant: singleLabelVariant.kind, hyperparameters: this.params },
      options.quantized ?? false
    );
  }

  static async load(dir: string, options: ClassifierRuntimeOptions = {}): Promise<FastTextClassifier> {
    const runtime = resolveRuntime(runtimeOptions(options));
    const { saved, fitted } = await loadState(runtime, dir, singleLabelVariant.kind);
    const classifier = new FastTextClassifier({
      ...saved.hyperparameters,
      ...runtimeOptions(options),
      engine: runtime.engine,
      logger: runtime.logger,
    });
    classifier.fitted = fitted;
    return classifier;
  }

  /** Releases the held model; the instance is unfitted afterwards. */
  async dispose(): Promise<void> {
    await this.release();
  }

  private async release(): Promise<void> {
    const previous = this.fitted;
    this.fitted = undefined;
    if (previous) await disposeModel(previous.model, this.ctx.logger);
  }

  private require(): FittedState {
    if (!this.fitted) throw new NotFittedError("FastTextClassifier");
    return this.fitted;
  }
}

/* ────────────────────────────────────────────────────────────────────────── */
/* Multi-label                                                                */
/* ────────────────────────────────────────────────────────────────────────── */

/**
 * fastText text classifier with any number of labels per text, trained with
 * one-vs-all loss. Targets are indicator rows over the declared labels.
 */
export class FastTextMultiLabelClassifier {
  private readonly params: Hyperparameters;
  private readonly declaredLabels: readonly string[];
  private readonly ctx: EstimatorContext;
  private fitted?: FittedState;

  constructor(options: MultiLabelClassifierOptions) {
    LabelRegistry.sortLabels(options.labels);
    this.declaredLabels = [...options.labels];
    this.params = resolveMultiLabelHyperparameters(options);
    this.ctx = resolveRuntime(runtimeOptions(options));
  }

  get hyperparameters(): Hyperparameters {
    return { ...this.params };
  }

  /** The labels passed to the constructor, as given. */
  get labels(): string[] {
    return [...this.declaredLabels];
  }

  get state(): ClassifierState {
    return stateOf(this.fitted);
  }

  get isFitted(): boolean {
    return this.fitted !== undefined;
  }

  get isQuantized(): boolean {
    return this.fitted?.quantized ?? false;
  }

  get classes(): string[] {
    return [...this.require().registry.originalLabels];
  }

  get nLabels(): number {
    return this.require().registry.size;
  }

  /**
   * @param rows - One indicator row per text, columns in sorted label order.
   */
  async fit(texts: TextInput, rows: readonly IndicatorRow[]): Promise<this> {
    const next = await fitVariant(
      this.ctx,
      multiLabelVariant,
      { texts: toTexts(texts), targets: rows, declaredLabels: this.declaredLabels },
      this.params
    );
    await this.release();
    this.fitted = next;
    return this;
  }

  /** Same as {@link predictProba}: every class gets its own probability. */
  async predict(texts: TextInput): Promise<ProbabilityMatrix> {
    return this.predictProba(texts);
  }

  async predictProba(texts: TextInput): Promise<ProbabilityMatrix> {
    return predictProbabilities(this.ctx, this.require(), toTexts(texts), this.params.label);
  }

  async quantize(): Promise<void> {
    await quantizeState(this.ctx, this.require());
  }

  async save(dir: string, options: SaveOptions = {}): Promise<string> {
    return saveState(
      this.ctx,
      dir,
      this.require(),
      {
        variant: multiLabelVariant.kind,
        hyperparameters: this.params,
        declaredLabels: this.declaredLabels,
      },
      options.quantized ?? false
    );
  }

  static async load(
    dir: string,
    options: ClassifierRuntimeOptions = {}
  ): Promise<FastTextMultiLabelClassifier> {
    const runtime = resolveRuntime(runtimeOptions(options));
    const { saved, fitted } = await loadState(runtime, dir, multiLabelVariant.kind);
    const { loss: _loss, ...hyperparameters } = saved.hyperparameters;
    const classifier = new FastTextMultiLabelClassifier({
      ...hyperparameters,
      ...runtimeOptions(options),
      engine: runtime.engine,
      logger: runtime.logger,
      labels: saved.declaredLabels ?? fitted.registry.originalLabels,
    });
    classifier.fitted = fitted;
    return classifier;
  }

  async dispose(): Promise<void> {
    await this.release();
  }

  private async release(): Promise<void> {
    const previous = this.fitted;
    this.fitted = undefined;
    if (previous) await disposeModel(previous.model, this.ctx.logger);
  }

  private require(): FittedState {
    if (!this.fitted) throw new NotFittedError("FastTextMultiLabelClassifier");
    return this.fitted;
  }
}

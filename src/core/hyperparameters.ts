import { z } from "zod";
import { ConfigurationError, ErrorCode } from "./errors.ts";

/**
 * Training objective.
 * - ns: negative sampling
 * - hs: hierarchical softmax
 * - softmax: full softmax, probabilities sum to 1 per text
 * - ova: one-vs-all, one independent probability per class (multi-label)
 */
export const LossSchema = z.enum(["ns", "hs", "softmax", "ova"]);

export type Loss = z.infer<typeof LossSchema>;

const count = () => z.number().int().nonnegative();

/**
 * Every engine hyperparameter with its default. Names follow the engine's own
 * argument names so that they can be forwarded unchanged.
 */
export const HyperparametersSchema = z.object({
  /** learning rate */
  lr: z.number().positive().default(0.1),
  /** size of word vectors */
  dim: count().positive().default(100),
  /** size of the context window */
  ws: count().positive().default(5),
  /** number of epochs */
  epoch: count().positive().default(5),
  /** minimal number of word occurrences */
  minCount: count().default(1),
  /** minimal number of label occurrences */
  minCountLabel: count().default(1),
  /** min length of char ngram */
  minn: count().default(0),
  /** max length of char ngram */
  maxn: count().default(0),
  /** number of negatives sampled */
  neg: count().default(5),
  /** max length of word ngram */
  wordNgrams: count().positive().default(1),
  loss: LossSchema.default("softmax"),
  /** number of hash buckets */
  bucket: count().default(2_000_000),
  /** change the rate of updates for the learning rate */
  lrUpdateRate: count().positive().default(100),
  /** sampling threshold */
  t: z.number().positive().default(0.0001),
  /** label prefix the engine recognises labels by */
  label: z
    .string()
    .min(1)
    .regex(/^\S+$/, "label prefix must not contain whitespace")
    .default("__label__"),
  verbose: count().default(2),
  thread: count().positive().default(2),
});

export type Hyperparameters = z.infer<typeof HyperparametersSchema>;

/** Constructor options: every hyperparameter is optional. */
export type HyperparameterOptions = z.input<typeof HyperparametersSchema>;

/** The multi-label variant always trains with one-vs-all loss. */
export const MultiLabelHyperparametersSchema = HyperparametersSchema.omit({ loss: true });

export type MultiLabelHyperparameterOptions = z.input<typeof MultiLabelHyperparametersSchema>;

/** Hyperparameter names in the order they are persisted and forwarded. */
export const HYPERPARAMETER_NAMES = [
  "lr",
  "dim",
  "ws",
  "epoch",
  "minCount",
  "minCountLabel",
  "minn",
  "maxn",
  "neg",
  "wordNgrams",
  "loss",
  "bucket",
  "lrUpdateRate",
  "t",
  "label",
  "verbose",
  "thread",
] as const satisfies ReadonlyArray<keyof Hyperparameters>;

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Fills in defaults and validates caller-supplied hyperparameters.
 *
 * @throws ConfigurationError when a value is out of range or of the wrong type.
 */
export function resolveHyperparameters(options: HyperparameterOptions = {}): Hyperparameters {
  const parsed = HyperparametersSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid hyperparameters: ${formatZodIssues(parsed.error)}`,
      ErrorCode.CONFIGURATION_INVALID,
      { issues: parsed.error.issues }
    );
  }
  return parsed.data;
}

export function resolveMultiLabelHyperparameters(
  options: MultiLabelHyperparameterOptions = {}
): Hyperparameters {
  const parsed = MultiLabelHyperparametersSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid hyperparameters: ${formatZodIssues(parsed.error)}`,
      ErrorCode.CONFIGURATION_INVALID,
      { issues: parsed.error.issues }
    );
  }
  return { ...parsed.data, loss: "ova" };
}

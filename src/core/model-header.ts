import { open, type FileHandle } from "node:fs/promises";
import { ErrorCode, PersistenceError } from "./errors.ts";
import type { Loss } from "./hyperparameters.ts";

/**
 * Reader for the header of a fastText `.bin` / `.ftz` artifact.
 *
 * Layout (little-endian):
 *   int32 magic, int32 version,
 *   args: 12 × int32 (dim ws epoch minCount neg wordNgrams loss model bucket
 *         minn maxn lrUpdateRate) + float64 t,
 *   dictionary: int32 size, int32 nwords, int32 nlabels, int64 ntokens,
 *         int64 pruneidxSize, `size` × (NUL-terminated word, int64 count,
 *         int8 type), `pruneidxSize` × (int32, int32),
 *   uint8 quantized flag, then the matrices (not read).
 */

export const FASTTEXT_MAGIC = 793712314;
export const SUPPORTED_VERSIONS: readonly number[] = [11, 12];

const LOSSES: Partial<Record<number, Loss>> = { 1: "hs", 2: "ns", 3: "softmax", 4: "ova" };
const MODELS: Partial<Record<number, ModelKind>> = { 1: "cbow", 2: "skipgram", 3: "supervised" };

export type ModelKind = "cbow" | "skipgram" | "supervised";

export interface ModelHeader {
  version: number;
  args: {
    dim: number;
    ws: number;
    epoch: number;
    minCount: number;
    neg: number;
    wordNgrams: number;
    loss: Loss | "unknown";
    model: ModelKind | "unknown";
    bucket: number;
    minn: number;
    maxn: number;
    lrUpdateRate: number;
    t: number;
  };
  dictionary: {
    size: number;
    words: number;
    tokens: number;
    /** Label tokens, prefix included, in dictionary order. */
    labels: string[];
  };
  quantized: boolean;
}

class TruncatedArtifactError extends Error {}

class ByteReader {
  private buffer = Buffer.alloc(0);
  private offset = 0;
  private position = 0;
  private exhausted = false;

  constructor(
    private readonly handle: FileHandle,
    private readonly chunkSize = 1 << 16
  ) {}

  private get available(): number {
    return this.buffer.length - this.offset;
  }

  private async readChunk(): Promise<boolean> {
    if (this.exhausted) return false;
    const chunk = Buffer.alloc(this.chunkSize);
    const { bytesRead } = await this.handle.read(chunk, 0, this.chunkSize, this.position);
    if (bytesRead === 0) {
      this.exhausted = true;
      return false;
    }
    this.position += bytesRead;
    this.buffer = Buffer.concat([this.buffer.subarray(this.offset), chunk.subarray(0, bytesRead)]);
    this.offset = 0;
    return true;
  }

  private async ensure(bytes: number): Promise<void> {
    while (this.available < bytes) {
      if (!(await this.readChunk())) throw new TruncatedArtifactError();
    }
  }

  async int8(): Promise<number> {
    await this.ensure(1);
    return this.buffer.readInt8(this.offset++);
  }

  async int32(): Promise<number> {
    await this.ensure(4);
    const value = this.buffer.readInt32LE(this.offset);
    this.offset += 4;
    return value;
  }

  async int64(): Promise<number> {
    await this.ensure(8);
    const value = this.buffer.readBigInt64LE(this.offset);
    this.offset += 8;
    return Number(value);
  }

  async float64(): Promise<number> {
    await this.ensure(8);
    const value = this.buffer.readDoubleLE(this.offset);
    this.offset += 8;
    return value;
  }

  async cstring(): Promise<string> {
    let end = this.buffer.indexOf(0, this.offset);
    while (end === -1) {
      const scanned = this.available;
      if (!(await this.readChunk())) throw new TruncatedArtifactError();
      end = this.buffer.indexOf(0, this.offset + scanned);
    }
    const value = this.buffer.toString("utf8", this.offset, end);
    this.offset = end + 1;
    return value;
  }

  async skip(bytes: number): Promise<void> {
    await this.ensure(bytes);
    this.offset += bytes;
  }
}

async function parseHeader(reader: ByteReader, path: string): Promise<ModelHeader> {
  const magic = await reader.int32();
  if (magic !== FASTTEXT_MAGIC) {
    throw new PersistenceError(`Not a fastText model artifact (magic ${magic})`, ErrorCode.RECORD_MALFORMED, {
      path,
    });
  }
  const version = await reader.int32();
  if (!SUPPORTED_VERSIONS.includes(version)) {
    throw new PersistenceError(
      `Unsupported fastText artifact version ${version}`,
      ErrorCode.FORMAT_UNSUPPORTED,
      { path, version }
    );
  }

  const dim = await reader.int32();
  const ws = await reader.int32();
  const epoch = await reader.int32();
  const minCount = await reader.int32();
  const neg = await reader.int32();
  const wordNgrams = await reader.int32();
  const loss = LOSSES[await reader.int32()] ?? "unknown";
  const model = MODELS[await reader.int32()] ?? "unknown";
  const bucket = await reader.int32();
  const minn = await reader.int32();
  const maxn = await reader.int32();
  const lrUpdateRate = await reader.int32();
  const t = await reader.float64();

  const size = await reader.int32();
  const words = await reader.int32();
  await reader.int32(); // nlabels, recounted from the entries below
  const tokens = await reader.int64();
  const pruneIndexSize = await reader.int64();

  const labels: string[] = [];
  for (let i = 0; i < size; i++) {
    const word = await reader.cstring();
    await reader.skip(8); // count
    const type = await reader.int8();
    if (type === 1) labels.push(word);
  }
  if (pruneIndexSize > 0) await reader.skip(pruneIndexSize * 8);

  const quantized = (await reader.int8()) !== 0;

  return {
    version,
    args: { dim, ws, epoch, minCount, neg, wordNgrams, loss, model, bucket, minn, maxn, lrUpdateRate, t },
    dictionary: { size, words, tokens, labels },
    quantized,
  };
}

/**
 * Reads the header of a fastText artifact without loading its matrices.
 *
 * @throws PersistenceError when the file is missing, is not a fastText
 *   artifact, has an unsupported version, or ends before the header does.
 */
export async function readModelHeader(path: string): Promise<ModelHeader> {
  let handle: FileHandle;
  try {
    handle = await open(path, "r");
  } catch (err) {
    throw new PersistenceError(`Cannot open model artifact`, ErrorCode.ARTIFACT_MISSING, { path }, { cause: err });
  }

  try {
    return await parseHeader(new ByteReader(handle), path);
  } catch (err) {
    if (err instanceof TruncatedArtifactError) {
      throw new PersistenceError(`Model artifact ends inside its header`, ErrorCode.RECORD_MALFORMED, { path });
    }
    throw err;
  } finally {
    await handle.close();
  }
}

// File: ./tests/model-artifact.ts

import { FASTTEXT_MAGIC } from "../core/model-header.ts";

export interface ArtifactOptions {
  magic?: number;
  version?: number;
  /** Loss id as the engine stores it: 1 hs, 2 ns, 3 softmax, 4 ova. */
  loss?: number;
  words?: readonly string[];
  labels?: readonly string[];
  pruneIndexSize?: number;
  quantized?: boolean;
}

/**
 * Writes the header of a fastText model artifact followed by a few filler
 * bytes standing in for the matrices.
 */
export function buildModelArtifact(options: ArtifactOptions = {}): Buffer {
  const {
    magic = FASTTEXT_MAGIC,
    version = 12,
    loss = 3,
    words = ["hello", "world"],
    labels = ["__label__cat", "__label__dog"],
    pruneIndexSize = 0,
    quantized = false,
  } = options;

  const parts: Buffer[] = [];
  const int8 = (v: number) => {
    const b = Buffer.alloc(1);
    b.writeInt8(v);
    parts.push(b);
  };
  const int32 = (v: number) => {
    const b = Buffer.alloc(4);
    b.writeInt32LE(v);
    parts.push(b);
  };
  const int64 = (v: number) => {
    const b = Buffer.alloc(8);
    b.writeBigInt64LE(BigInt(v));
    parts.push(b);
  };
  const float64 = (v: number) => {
    const b = Buffer.alloc(8);
    b.writeDoubleLE(v);
    parts.push(b);
  };

  int32(magic);
  int32(version);
  // dim ws epoch minCount neg wordNgrams loss model bucket minn maxn lrUpdateRate
  for (const v of [100, 5, 5, 1, 5, 2, loss, 3, 2_000_000, 0, 0, 100]) int32(v);
  float64(0.0001);

  int32(words.length + labels.length);
  int32(words.length);
  int32(labels.length);
  int64(1234);
  int64(pruneIndexSize);
  for (const word of words) {
    parts.push(Buffer.from(`${word}\0`, "utf8"));
    int64(7);
    int8(0);
  }
  for (const label of labels) {
    parts.push(Buffer.from(`${label}\0`, "utf8"));
    int64(3);
    int8(1);
  }
  for (let i = 0; i < pruneIndexSize; i++) {
    int32(i);
    int32(i + 1);
  }
  int8(quantized ? 1 : 0);
  parts.push(Buffer.alloc(16, 0xab));

  return Buffer.concat(parts);
}

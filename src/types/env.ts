// ./types/env.ts
export interface Env {
  // fastText engine
  FASTTEXT_BIN: string;
  FASTTEXT_TMP_DIR: string;

  // Logging
  LOG_PATH: string;
  LOG_LEVEL: string;
}

/**
 * Error kinds raised by the ingestion and query pipelines
 */

export class DocumentUnreadableError extends Error {
  readonly sourceFile: string;

  constructor(sourceFile: string, message: string, options?: { cause?: unknown }) {
    super(`Cannot read ${sourceFile}: ${message}`, options);
    this.name = 'DocumentUnreadableError';
    this.sourceFile = sourceFile;
  }
}

export class EmbeddingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EmbeddingError';
  }
}

export class EmbeddingModelMismatchError extends Error {
  readonly storeModel: string;
  readonly queryModel: string;

  constructor(storeModel: string, queryModel: string) {
    super(
      `Vector store was built with embedding model "${storeModel}" but "${queryModel}" was used. ` +
        'Re-run ingestion with --reset or switch back to the original model.'
    );
    this.name = 'EmbeddingModelMismatchError';
    this.storeModel = storeModel;
    this.queryModel = queryModel;
  }
}

export class LanguageModelError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LanguageModelError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Best-effort message for anything caught in a catch clause
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

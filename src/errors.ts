export type KBErrorCode =
  | 'artifact_missing'
  | 'artifact_mismatch'
  | 'index_not_built'
  | 'dimension_mismatch'
  | 'chunking_config'
  | 'record_processing'
  | 'encoding_failed'
  | 'search_failed'
  | 'generation_failed';

export class KBError extends Error {
  readonly code: KBErrorCode;

  constructor(code: KBErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ArtifactMissingError extends KBError {
  readonly path: string;

  constructor(path: string) {
    super('artifact_missing', `Required artifact not found: ${path}. Run the build command first.`);
    this.path = path;
  }
}

export class ArtifactMismatchError extends KBError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('artifact_mismatch', message, options);
  }
}

export class IndexNotBuiltError extends KBError {
  constructor() {
    super('index_not_built', 'Vector index has not been built or loaded');
  }
}

export class DimensionMismatchError extends KBError {
  constructor(expected: number, actual: number) {
    super('dimension_mismatch', `Expected vector of dimension ${expected}, got ${actual}`);
  }
}

export class ChunkingConfigError extends KBError {
  constructor(message: string) {
    super('chunking_config', message);
  }
}

export class RecordProcessingError extends KBError {
  readonly sourceIndex: number;

  constructor(sourceIndex: number, cause: unknown) {
    super('record_processing', `Failed to process record ${sourceIndex}: ${errorMessage(cause)}`, { cause });
    this.sourceIndex = sourceIndex;
  }
}

export class EncodingError extends KBError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('encoding_failed', message, options);
  }
}

export class SearchExecutionError extends KBError {
  constructor(cause: unknown) {
    super('search_failed', `Search failed: ${errorMessage(cause)}`, { cause });
  }
}

export class GenerationError extends KBError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('generation_failed', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

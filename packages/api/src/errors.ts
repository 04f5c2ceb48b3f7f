/**
 * Error taxonomy for the RAG core.
 *
 * Every error names the component it is attributable to. `retryable` marks
 * transient faults that the caller retries once at the point of call.
 */

export type RagComponent =
  | 'embedding'
  | 'vectorIndex'
  | 'documentStore'
  | 'retriever'
  | 'contextAssembler'
  | 'generator'
  | 'orchestrator'
  | 'cache';

export type RagErrorCode =
  | 'PROVIDER_UNAVAILABLE'
  | 'INDEX_UNAVAILABLE'
  | 'INVALID_INPUT'
  | 'NOT_FOUND'
  | 'RETRIEVAL_FAILED'
  | 'GENERATION_TIMEOUT'
  | 'GENERATION_PROVIDER_ERROR'
  | 'EMPTY_CONTEXT'
  | 'POOL_EXHAUSTED'
  | 'REQUEST_CANCELLED';

export abstract class RagError extends Error {
  abstract readonly code: RagErrorCode;
  readonly retryable: boolean = false;

  constructor(
    message: string,
    readonly component: RagComponent,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ProviderUnavailableError extends RagError {
  readonly code = 'PROVIDER_UNAVAILABLE';
  override readonly retryable = true;
}

export class IndexUnavailableError extends RagError {
  readonly code = 'INDEX_UNAVAILABLE';
  override readonly retryable = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'vectorIndex', options);
  }
}

export class InvalidInputError extends RagError {
  readonly code = 'INVALID_INPUT';
}

export class NotFoundError extends RagError {
  readonly code = 'NOT_FOUND';

  constructor(readonly chunkId: string) {
    super(`Chunk not found: ${chunkId}`, 'documentStore');
  }
}

export class RetrievalFailedError extends RagError {
  readonly code = 'RETRIEVAL_FAILED';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'retriever', options);
  }
}

export class GenerationTimeoutError extends RagError {
  readonly code = 'GENERATION_TIMEOUT';

  constructor(readonly timeoutMs: number, options?: { cause?: unknown }) {
    super(`Generation exceeded ${timeoutMs}ms`, 'generator', options);
  }
}

export class GenerationProviderError extends RagError {
  readonly code = 'GENERATION_PROVIDER_ERROR';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'generator', options);
  }
}

export class EmptyContextError extends RagError {
  readonly code = 'EMPTY_CONTEXT';

  constructor() {
    super('No passages available and answering without context is disabled', 'generator');
  }
}

export class PoolExhaustedError extends RagError {
  readonly code = 'POOL_EXHAUSTED';

  constructor(readonly pool: string, component: RagComponent, waitedMs: number) {
    super(`Pool "${pool}" exhausted after waiting ${waitedMs}ms`, component);
  }
}

export class RequestCancelledError extends RagError {
  readonly code = 'REQUEST_CANCELLED';

  constructor(component: RagComponent, options?: { cause?: unknown }) {
    super('Request cancelled by caller', component, options);
  }
}

export function isRagError(error: unknown): error is RagError {
  return error instanceof RagError;
}

export function isTransient(error: unknown): boolean {
  return isRagError(error) && error.retryable;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

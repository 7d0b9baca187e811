/**
 * Error taxonomy shared by the indexing, answering and session layers.
 * Provider failures are wrapped exactly once and keep the original error as `cause`.
 */
export class RagError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class IndexNotFoundError extends RagError {
    constructor(public readonly location: string) {
        super(`No vector index found at ${location}`);
    }
}

export class EmbeddingError extends RagError {}

export class GenerationError extends RagError {}

export class UnknownSessionError extends RagError {
    constructor(public readonly sessionId: number) {
        super(`Session ${sessionId} does not exist`);
    }
}

export class MigrationIntegrityError extends RagError {}

export class UnsupportedDocumentError extends RagError {
    constructor(public readonly filePath: string, extension: string) {
        super(`Unsupported file type: ${extension || '(none)'} (${filePath})`);
    }
}

export class OperationAbortedError extends RagError {
    constructor(stage: string, options?: { cause?: unknown }) {
        super(`Operation aborted during ${stage}`, options);
    }
}

export function errorMessage(err: unknown): string {
    if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
        return err.message;
    }
    return String(err);
}

/** True when the error came from an AbortSignal firing. */
export function isAbortError(err: unknown): boolean {
    if (err instanceof OperationAbortedError) return true;
    return typeof err === 'object' && err !== null && 'name' in err && err.name === 'AbortError';
}

export function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
    if (signal?.aborted) {
        throw new OperationAbortedError(stage, { cause: signal.reason });
    }
}

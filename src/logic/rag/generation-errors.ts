import { GenerationError, OperationAbortedError, RagError, errorMessage } from '../../utils/errors';

/** Leaves RagErrors as they are; anything else becomes an abort or a GenerationError. */
export function asGenerationError(err: unknown, stage: string, signal?: AbortSignal): RagError {
    if (err instanceof RagError) return err;
    if (signal?.aborted) return new OperationAbortedError(stage, { cause: err });
    return new GenerationError(`${stage} failed: ${errorMessage(err)}`, { cause: err });
}

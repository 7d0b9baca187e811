import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import {
    EmbeddingError,
    GenerationError,
    IndexNotFoundError,
    OperationAbortedError,
    RagError,
    UnknownSessionError,
    UnsupportedDocumentError,
} from '../utils/errors';

export function statusFor(err: RagError): HttpStatus {
    if (err instanceof UnknownSessionError || err instanceof IndexNotFoundError) return HttpStatus.NOT_FOUND;
    if (err instanceof UnsupportedDocumentError) return HttpStatus.BAD_REQUEST;
    if (err instanceof EmbeddingError || err instanceof GenerationError) return HttpStatus.BAD_GATEWAY;
    if (err instanceof OperationAbortedError) return HttpStatus.REQUEST_TIMEOUT;
    return HttpStatus.INTERNAL_SERVER_ERROR;
}

/** The slice of Nest's HttpAdapterHost the filter writes through. */
export interface ReplyAdapterHost {
    readonly httpAdapter: { reply(response: unknown, body: unknown, statusCode?: number): unknown };
}

/** Turns domain errors into JSON responses; HttpExceptions keep Nest's own handling. */
@Catch(RagError)
export class RagExceptionFilter implements ExceptionFilter {
    private readonly logger = new Logger(RagExceptionFilter.name);

    constructor(private readonly adapterHost: ReplyAdapterHost) {}

    catch(err: RagError, host: ArgumentsHost): void {
        const { httpAdapter } = this.adapterHost;
        const ctx = host.switchToHttp();
        const status = statusFor(err);
        if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
            this.logger.error(`${err.name}: ${err.message}`, err.stack);
        } else {
            this.logger.warn(`${err.name}: ${err.message}`);
        }
        httpAdapter.reply(ctx.getResponse(), { statusCode: status, error: err.name, message: err.message }, status);
    }
}

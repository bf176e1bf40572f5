/**
 * Application error taxonomy.
 *
 * Every failure the pipeline can raise on purpose is an AppError carrying
 * the HTTP status it maps to. The server's error middleware relies on this:
 * anything that is not an AppError becomes an opaque 500.
 */

/**
 * Error codes exposed in API error bodies.
 */
export enum AppErrorCode {
    BAD_REQUEST = 'BAD_REQUEST',
    UNSUPPORTED_FILE_TYPE = 'UNSUPPORTED_FILE_TYPE',
    EMPTY_CORPUS = 'EMPTY_CORPUS',
    SESSION_NOT_FOUND = 'SESSION_NOT_FOUND',
    UPSTREAM_UNAVAILABLE = 'UPSTREAM_UNAVAILABLE',
    EMBEDDING_UNAVAILABLE = 'EMBEDDING_UNAVAILABLE',
    MALFORMED_MODEL_OUTPUT = 'MALFORMED_MODEL_OUTPUT',
    DOCUMENT_PARSE_FAILED = 'DOCUMENT_PARSE_FAILED',
}

export class AppError extends Error {
    constructor(
        message: string,
        public readonly code: AppErrorCode,
        public readonly statusCode: number = 500,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'AppError';
    }
}

export class BadRequestError extends AppError {
    constructor(message: string) {
        super(message, AppErrorCode.BAD_REQUEST, 400);
        this.name = 'BadRequestError';
    }
}

export class UnsupportedFileTypeError extends AppError {
    constructor(public readonly filename: string) {
        super(
            `Unsupported file type: ${filename}. Only PDF documents are accepted.`,
            AppErrorCode.UNSUPPORTED_FILE_TYPE,
            400
        );
        this.name = 'UnsupportedFileTypeError';
    }
}

/**
 * Raised when an ingestion batch yields no text to index, e.g. scanned PDFs.
 */
export class EmptyCorpusError extends AppError {
    constructor() {
        super(
            'No extractable text was found in the submitted documents.',
            AppErrorCode.EMPTY_CORPUS,
            400
        );
        this.name = 'EmptyCorpusError';
    }
}

export class SessionNotFoundError extends AppError {
    constructor(public readonly sessionId: string) {
        super('Session not found.', AppErrorCode.SESSION_NOT_FOUND, 404);
        this.name = 'SessionNotFoundError';
    }
}

export class UpstreamUnavailableError extends AppError {
    constructor(message: string, cause?: Error) {
        super(message, AppErrorCode.UPSTREAM_UNAVAILABLE, 500, cause);
        this.name = 'UpstreamUnavailableError';
    }
}

export class EmbeddingUnavailableError extends AppError {
    constructor(message: string, cause?: Error) {
        super(message, AppErrorCode.EMBEDDING_UNAVAILABLE, 500, cause);
        this.name = 'EmbeddingUnavailableError';
    }
}

export class MalformedModelOutputError extends AppError {
    constructor(
        message: string,
        public readonly rawOutput: string
    ) {
        super(message, AppErrorCode.MALFORMED_MODEL_OUTPUT, 500);
        this.name = 'MalformedModelOutputError';
    }
}

export class DocumentParseError extends AppError {
    constructor(message: string, cause?: Error) {
        super(message, AppErrorCode.DOCUMENT_PARSE_FAILED, 500, cause);
        this.name = 'DocumentParseError';
    }
}

/**
 * Narrows an unknown thrown value to an Error for use as a `cause`.
 */
export function asError(error: unknown): Error | undefined {
    return error instanceof Error ? error : undefined;
}

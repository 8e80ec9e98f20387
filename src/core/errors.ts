// src/core/errors.ts

function describeCause(cause: unknown): string {
    return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Base class for every failure raised while loading, converting or writing a document.
 */
export class ConversionError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConversionError';
    }
}

/** The source location does not exist or could not be read. */
export class SourceNotFoundError extends ConversionError {
    constructor(public readonly source: string, cause?: unknown) {
        super(
            cause === undefined
                ? `Input document not found at ${source}`
                : `Failed to read content from "${source}": ${describeCause(cause)}`,
            { cause },
        );
        this.name = 'SourceNotFoundError';
    }
}

/** The source text is not valid JSON or YAML. */
export class MalformedSourceError extends ConversionError {
    constructor(public readonly source: string, cause?: unknown) {
        super(`Failed to parse content from ${source}. Error: ${describeCause(cause)}`, { cause });
        this.name = 'MalformedSourceError';
    }
}

/** The parsed document cannot be converted, e.g. its root is not a mapping. */
export class InvalidDocumentError extends ConversionError {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidDocumentError';
    }
}

/** The destination could not be created or written. */
export class DestinationWriteError extends ConversionError {
    constructor(public readonly destination: string, cause?: unknown) {
        super(`Failed to write converted document to "${destination}": ${describeCause(cause)}`, { cause });
        this.name = 'DestinationWriteError';
    }
}

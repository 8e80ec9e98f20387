// src/core/validator.ts

import { isJsonObject, OpenApiDocument } from './types/index.js';
import { InvalidDocumentError } from './errors.js';

function describeRoot(value: unknown): string {
    if (value === null) return 'null';
    if (value === undefined) return 'an empty document';
    if (Array.isArray(value)) return 'a sequence';
    return `a ${typeof value}`;
}

/**
 * Checks that a parsed document can be handed to the converter.
 *
 * Only the root shape is checked: the root must be a mapping. The rest of the document is
 * not validated against either OpenAPI version.
 *
 * @throws {InvalidDocumentError} if the root is not a mapping.
 */
export function validateDocumentRoot(value: unknown): asserts value is OpenApiDocument {
    if (!isJsonObject(value)) {
        throw new InvalidDocumentError(
            `OpenAPI document root must be a mapping, but the parsed content is ${describeRoot(value)}.`,
        );
    }
}

/**
 * Returns true when the document declares an OpenAPI 3.1.x version.
 * Used only to warn about inputs that are probably not 3.1 documents.
 */
export function isOpenApi31(document: OpenApiDocument): boolean {
    return typeof document.openapi === 'string' && document.openapi.startsWith('3.1.');
}

// ===================================================================================
// JSON Document Model
// ===================================================================================

import { isLosslessNumber, LosslessNumber } from 'lossless-json';

/**
 * Numbers that a JS `number` cannot hold exactly (e.g. int64 bounds) are kept as a
 * {@link LosslessNumber} carrying the literal digits.
 */
export type JsonNumber = number | LosslessNumber;

export type JsonPrimitive = string | JsonNumber | boolean | null;

export type JsonArray = JsonValue[];

export interface JsonObject {
    [key: string]: JsonValue;
}

export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

/** A {@link JsonValue} tagged with its shape, for exhaustive dispatch over document nodes. */
export type JsonNode =
    | { kind: 'object'; value: JsonObject }
    | { kind: 'array'; value: JsonArray }
    | { kind: 'string'; value: string }
    | { kind: 'number'; value: JsonNumber }
    | { kind: 'boolean'; value: boolean }
    | { kind: 'null'; value: null };

/** The root of an OpenAPI document. Only the version marker is known; everything else is opaque. */
export type OpenApiDocument = JsonObject & { openapi?: JsonValue };

export function toJsonNode(value: JsonValue): JsonNode {
    if (value === null) return { kind: 'null', value };
    if (Array.isArray(value)) return { kind: 'array', value };
    if (typeof value === 'string') return { kind: 'string', value };
    if (typeof value === 'number' || isLosslessNumber(value)) return { kind: 'number', value };
    if (typeof value === 'boolean') return { kind: 'boolean', value };
    return { kind: 'object', value };
}

export function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && !isLosslessNumber(value);
}

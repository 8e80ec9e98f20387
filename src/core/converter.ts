// src/core/converter.ts

/**
 * @fileoverview
 * Rewrites an OpenAPI 3.1.0 document into its OpenAPI 3.0.2 equivalent.
 *
 * Two rewrites are applied to every mapping in the document:
 * - `anyOf` branches of `type: "null"` are removed and replaced by `nullable: true`.
 * - `examples` lists are collapsed into a single `example` (the first entry).
 *
 * The document is mutated in place. Shared subtrees (YAML aliases) are rewritten once per
 * reference; cyclic ones are rejected. Nothing here performs I/O.
 */

import { isJsonObject, JsonArray, JsonObject, JsonValue, OpenApiDocument, toJsonNode } from './types/index.js';
import { InvalidDocumentError } from './errors.js';
import { validateDocumentRoot } from './validator.js';

export const TARGET_OPENAPI_VERSION = '3.0.2';

/** Counts of rewrites applied during a conversion. */
export interface ConversionStats {
    nullableUnions: number;
    collapsedExamples: number;
}

export function createConversionStats(): ConversionStats {
    return { nullableUnions: 0, collapsedExamples: 0 };
}

function isNullBranch(entry: JsonValue): boolean {
    return isJsonObject(entry) && entry.type === 'null';
}

/**
 * Strips `{ type: "null" }` entries from the node's own `anyOf` list and flags the node as
 * `nullable` when any were removed. An `anyOf` left empty is kept.
 *
 * @returns true if the node was flagged nullable.
 */
export function normalizeNullableUnion(node: JsonObject): boolean {
    const anyOf = node.anyOf;
    if (!Array.isArray(anyOf)) return false;

    const remaining = anyOf.filter(entry => !isNullBranch(entry));
    node.anyOf = remaining;
    if (remaining.length < anyOf.length) {
        node.nullable = true;
        return true;
    }
    return false;
}

/**
 * Removes `examples` from the node. A non-empty list becomes `example` holding its first entry;
 * any other value is dropped.
 *
 * @returns true if an `examples` field was removed.
 */
export function collapseExamples(node: JsonObject): boolean {
    if (!Object.prototype.hasOwnProperty.call(node, 'examples')) return false;

    const examples = node.examples;
    delete node.examples;
    if (Array.isArray(examples) && examples.length > 0) {
        node.example = examples[0];
    }
    return true;
}

function toPointer(path: readonly string[]): string {
    return `#${path.map(segment => `/${segment.replace(/~/g, '~0').replace(/\//g, '~1')}`).join('')}`;
}

/** Mappings and lists on the path from the root to the node being visited. */
type Ancestors = Set<JsonObject | JsonArray>;

function enter(container: JsonObject | JsonArray, path: readonly string[], ancestors: Ancestors): void {
    if (ancestors.has(container)) {
        throw new InvalidDocumentError(
            `OpenAPI document contains a cycle at ${toPointer(path)}, e.g. a YAML alias that refers to its own anchor.`,
        );
    }
    ancestors.add(container);
}

function visit(value: JsonValue, stats: ConversionStats, path: string[], ancestors: Ancestors): void {
    const node = toJsonNode(value);
    switch (node.kind) {
        case 'object':
            enter(node.value, path, ancestors);
            if (normalizeNullableUnion(node.value)) stats.nullableUnions++;
            if (collapseExamples(node.value)) stats.collapsedExamples++;
            for (const [key, child] of Object.entries(node.value)) {
                visit(child, stats, [...path, key], ancestors);
            }
            ancestors.delete(node.value);
            return;
        case 'array':
            enter(node.value, path, ancestors);
            node.value.forEach((item, index) => visit(item, stats, [...path, String(index)], ancestors));
            ancestors.delete(node.value);
            return;
        case 'string':
        case 'number':
        case 'boolean':
        case 'null':
            return;
        default: {
            const unreachable: never = node;
            throw new Error(`Unhandled node: ${JSON.stringify(unreachable)}`);
        }
    }
}

/**
 * Converts an OpenAPI 3.1.0 document to OpenAPI 3.0.2.
 *
 * The root's `openapi` field is overwritten with {@link TARGET_OPENAPI_VERSION}, then every mapping
 * reachable through mapping values and list items (the root included) is rewritten, depth-first,
 * each node before its children.
 *
 * @param document The parsed document. It is modified in place and returned.
 * @param stats Optional counters that are incremented for each rewrite applied.
 * @throws {InvalidDocumentError} if the root is not a mapping, or if the tree contains a cycle.
 */
export function convertOpenApi31To30(
    document: unknown,
    stats: ConversionStats = createConversionStats(),
): OpenApiDocument {
    validateDocumentRoot(document);
    document.openapi = TARGET_OPENAPI_VERSION;
    visit(document, stats, [], new Set());
    return document;
}

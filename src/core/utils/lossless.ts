import { isLosslessNumber, isSafeNumber, LosslessNumber } from 'lossless-json';
import yaml from 'js-yaml';

import { JsonNumber } from '../types/index.js';

/** Number parser for `lossless-json`: plain `number` when exact, {@link LosslessNumber} otherwise. */
export function parseLosslessNumber(text: string): JsonNumber {
    return isSafeNumber(text) ? Number(text) : new LosslessNumber(text);
}

const YAML_INT_PATTERN = /^[-+]?(?:[0-9]+|0x[0-9a-fA-F]+|0o[0-7]+|0b[01]+)$/;

function constructInt(data: unknown): JsonNumber {
    const text = String(data);
    const sign = text.startsWith('-') ? -1 : 1;
    const unsigned = text.replace(/^[-+]/, '');
    if (/^0[xob]/.test(unsigned)) {
        return sign * Number(unsigned);
    }
    const decimal = sign < 0 ? `-${unsigned}` : unsigned;
    return parseLosslessNumber(decimal);
}

/**
 * Replaces js-yaml's `!!int` so integers outside the safe range load as {@link LosslessNumber}
 * and are dumped back with their original digits. Also dumps any other {@link LosslessNumber}.
 */
const losslessIntType = new yaml.Type('tag:yaml.org,2002:int', {
    kind: 'scalar',
    resolve: (data: unknown) => typeof data === 'string' && YAML_INT_PATTERN.test(data),
    construct: constructInt,
    predicate: (data: unknown) =>
        (typeof data === 'number' && Number.isInteger(data) && !Object.is(data, -0)) || isLosslessNumber(data),
    represent: (data: unknown) => String(data),
});

/** Schema for reading: JSON-compatible values only, with lossless integers. */
export const LOSSLESS_YAML_LOAD_SCHEMA = yaml.JSON_SCHEMA.extend({ implicit: [losslessIntType] });

/** Schema for writing: js-yaml's default quoting rules, with lossless integers. */
export const LOSSLESS_YAML_DUMP_SCHEMA = yaml.DEFAULT_SCHEMA.extend({ implicit: [losslessIntType] });

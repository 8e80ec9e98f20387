import * as fs from 'node:fs';
import * as path from 'node:path';

import yaml from 'js-yaml';
import { stringify as stringifyLosslessJson } from 'lossless-json';

import { JsonValue, SpecFormat } from '../types/index.js';
import { DestinationWriteError } from '../errors.js';
import { LOSSLESS_YAML_DUMP_SCHEMA } from '../utils/index.js';

export const DEFAULT_INDENT = 2;

export interface SpecWriteOptions {
    format?: SpecFormat;
    indent?: number;
}

/** Result returned by {@link SpecWriter.write}. */
export type SpecWriteResult = {
    path: string;
    format: SpecFormat;
};

export class SpecWriter {
    /** `.yaml` and `.yml` destinations are written as YAML, everything else as JSON. */
    public static formatFromPath(destination: string): SpecFormat {
        const extension = path.extname(destination).toLowerCase();
        return extension === '.yaml' || extension === '.yml' ? 'yaml' : 'json';
    }

    public static serialize(document: JsonValue, format: SpecFormat, indent: number = DEFAULT_INDENT): string {
        if (format === 'yaml') {
            return yaml.dump(document, { indent, noRefs: true, lineWidth: 120, schema: LOSSLESS_YAML_DUMP_SCHEMA });
        }
        const json = stringifyLosslessJson(document, undefined, indent);
        if (json === undefined) {
            throw new Error('Document cannot be serialized as JSON.');
        }
        return `${json}\n`;
    }

    /**
     * Serializes a document and writes it to `destination`, creating missing parent directories.
     * The file is overwritten in place; a failure part-way may leave it partially written.
     *
     * @throws {DestinationWriteError} if the destination cannot be created or written.
     */
    public static write(document: JsonValue, destination: string, options: SpecWriteOptions = {}): SpecWriteResult {
        const resolvedPath = path.resolve(process.cwd(), destination);
        const format = options.format ?? this.formatFromPath(resolvedPath);
        const contents = this.serialize(document, format, options.indent);

        try {
            const dir = path.dirname(resolvedPath);
            if (!fs.existsSync(dir)) {
                fs.mkdirSync(dir, { recursive: true });
            }
            fs.writeFileSync(resolvedPath, contents, 'utf8');
        } catch (e) {
            throw new DestinationWriteError(resolvedPath, e);
        }

        return { path: resolvedPath, format };
    }
}

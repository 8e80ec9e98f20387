import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';

import yaml from 'js-yaml';
import { parse as parseLosslessJson } from 'lossless-json';

import { OpenApiDocument, SpecFormat } from '../types/index.js';
import { isUrl, LOSSLESS_YAML_LOAD_SCHEMA, parseLosslessNumber } from '../utils/index.js';
import { validateDocumentRoot } from '../validator.js';
import { MalformedSourceError, SourceNotFoundError } from '../errors.js';

export interface LoadedSpec {
    document: OpenApiDocument;
    /** Absolute `file:` or `http(s):` URI the document was read from. */
    sourceUri: string;
    format: SpecFormat;
}

export class SpecLoader {
    /**
     * Reads and parses an OpenAPI document from a local path or an http(s) URL.
     *
     * @throws {SourceNotFoundError} if the source cannot be read.
     * @throws {MalformedSourceError} if the content is neither valid JSON nor valid YAML.
     * @throws {InvalidDocumentError} if the parsed root is not a mapping.
     */
    public static async load(inputPath: string): Promise<LoadedSpec> {
        const sourceUri = isUrl(inputPath)
            ? inputPath
            : pathToFileURL(path.resolve(process.cwd(), inputPath)).href;

        const content = await this.loadContent(sourceUri);
        const format = this.detectFormat(content, sourceUri);
        const parsed = this.parseContent(content, format, sourceUri);
        validateDocumentRoot(parsed);

        return { document: parsed, sourceUri, format };
    }

    /**
     * Picks the parser for a document: YAML for `.yaml`/`.yml` sources and for extensionless
     * sources whose body starts with `openapi:`, JSON otherwise.
     */
    public static detectFormat(content: string, pathOrUrl: string): SpecFormat {
        const pathname = isUrl(pathOrUrl) ? new URL(pathOrUrl).pathname : pathOrUrl;
        const extension = path.extname(pathname).toLowerCase();
        if (['.yaml', '.yml'].includes(extension)) return 'yaml';
        if (!extension && content.trim().startsWith('openapi:')) return 'yaml';
        return 'json';
    }

    private static async loadContent(uri: string): Promise<string> {
        if (!uri.startsWith('file:')) {
            let response: Response;
            try {
                response = await fetch(uri);
            } catch (e) {
                throw new SourceNotFoundError(uri, e);
            }
            if (!response.ok) {
                throw new SourceNotFoundError(uri, `${response.status} ${response.statusText}`);
            }
            return response.text();
        }

        const filePath = fileURLToPath(uri);
        if (!fs.existsSync(filePath)) throw new SourceNotFoundError(filePath);
        try {
            return fs.readFileSync(filePath, 'utf8');
        } catch (e) {
            throw new SourceNotFoundError(filePath, e);
        }
    }

    private static parseContent(content: string, format: SpecFormat, uri: string): unknown {
        try {
            if (format === 'yaml') {
                return yaml.load(content, { schema: LOSSLESS_YAML_LOAD_SCHEMA });
            }
            return parseLosslessJson(content, null, parseLosslessNumber);
        } catch (error) {
            throw new MalformedSourceError(uri, error);
        }
    }
}

import { afterEach, describe, expect, it, vi } from 'vitest';
import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { SpecLoader } from '@src/core/parser/spec-loader.js';
import { InvalidDocumentError, MalformedSourceError, SourceNotFoundError } from '@src/core/errors.js';
import { cleanupTempDirs, makeTempDir, writeTempFile } from '../../shared/helpers.js';

describe('Core Utils: SpecLoader', () => {
    afterEach(() => {
        cleanupTempDirs();
        vi.unstubAllGlobals();
    });

    describe('Files', () => {
        it('should load a JSON document from a path', async () => {
            const dir = makeTempDir();
            const file = writeTempFile(dir, 'openapi.json', '{"openapi":"3.1.0","paths":{}}');

            const result = await SpecLoader.load(file);
            expect(result.document).toEqual({ openapi: '3.1.0', paths: {} });
            expect(result.format).toBe('json');
            expect(result.sourceUri).toBe(pathToFileURL(file).href);
        });

        it('should load a YAML document by extension', async () => {
            const dir = makeTempDir();
            const file = writeTempFile(
                dir,
                'openapi.yaml',
                "openapi: 3.1.0\ninfo:\n  title: Pets\n  version: '1'\ncomponents:\n  schemas:\n    Id:\n      type: integer\n      examples: [1, 2]\n",
            );

            const result = await SpecLoader.load(file);
            expect(result.format).toBe('yaml');
            expect(result.document).toEqual({
                openapi: '3.1.0',
                info: { title: 'Pets', version: '1' },
                components: { schemas: { Id: { type: 'integer', examples: [1, 2] } } },
            });
        });

        it('should load a YAML document without an extension when it starts with openapi:', async () => {
            const dir = makeTempDir();
            const file = writeTempFile(dir, 'spec', 'openapi: 3.1.0\n');

            const result = await SpecLoader.load(file);
            expect(result.format).toBe('yaml');
            expect(result.document).toEqual({ openapi: '3.1.0' });
        });

        it('should throw SourceNotFoundError for a missing file', async () => {
            const dir = makeTempDir();
            const missing = path.join(dir, 'missing.json');

            await expect(SpecLoader.load(missing)).rejects.toThrow(SourceNotFoundError);
            await expect(SpecLoader.load(missing)).rejects.toThrow(`Input document not found at ${missing}`);
        });

        it('should throw SourceNotFoundError when the path cannot be read', async () => {
            const dir = makeTempDir();
            await expect(SpecLoader.load(dir)).rejects.toThrow(`Failed to read content from "${dir}"`);
        });

        it('should throw MalformedSourceError for invalid JSON', async () => {
            const dir = makeTempDir();
            const file = writeTempFile(dir, 'broken.json', '{"openapi": ');

            await expect(SpecLoader.load(file)).rejects.toThrow(MalformedSourceError);
            await expect(SpecLoader.load(file)).rejects.toThrow(
                `Failed to parse content from ${pathToFileURL(file).href}. Error:`,
            );
        });

        it('should throw MalformedSourceError for invalid YAML', async () => {
            const dir = makeTempDir();
            const file = writeTempFile(dir, 'broken.yml', 'openapi: [3.1.0\n');

            await expect(SpecLoader.load(file)).rejects.toThrow(MalformedSourceError);
        });

        it('should throw InvalidDocumentError when the root is not a mapping', async () => {
            const dir = makeTempDir();
            const file = writeTempFile(dir, 'list.json', '[{"openapi":"3.1.0"}]');

            await expect(SpecLoader.load(file)).rejects.toThrow(InvalidDocumentError);
        });
    });

    describe('URLs', () => {
        it('should fetch a document over http', async () => {
            const mockFetch = vi.fn().mockResolvedValue({
                ok: true,
                text: () => Promise.resolve('{"openapi":"3.1.0"}'),
            });
            vi.stubGlobal('fetch', mockFetch);

            const result = await SpecLoader.load('https://api.example.com/openapi.json');
            expect(mockFetch).toHaveBeenCalledWith('https://api.example.com/openapi.json');
            expect(result.document).toEqual({ openapi: '3.1.0' });
            expect(result.sourceUri).toBe('https://api.example.com/openapi.json');
        });

        it('should parse YAML fetched from a .yaml URL', async () => {
            vi.stubGlobal(
                'fetch',
                vi.fn().mockResolvedValue({ ok: true, text: () => Promise.resolve('openapi: 3.1.0\npaths: {}\n') }),
            );

            const result = await SpecLoader.load('https://api.example.com/openapi.yaml?v=2');
            expect(result.format).toBe('yaml');
            expect(result.document).toEqual({ openapi: '3.1.0', paths: {} });
        });

        it('should throw SourceNotFoundError on a non-OK status', async () => {
            vi.stubGlobal('fetch', vi.fn().mockResolvedValue({ ok: false, status: 404, statusText: 'Not Found' }));

            await expect(SpecLoader.load('https://api.example.com/missing.json')).rejects.toThrow(
                'Failed to read content from "https://api.example.com/missing.json": 404 Not Found',
            );
        });

        it('should throw SourceNotFoundError when the request fails', async () => {
            vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('Network Error')));

            await expect(SpecLoader.load('http://fail.example.com/spec.json')).rejects.toThrow(SourceNotFoundError);
            await expect(SpecLoader.load('http://fail.example.com/spec.json')).rejects.toThrow(
                'Failed to read content from "http://fail.example.com/spec.json": Network Error',
            );
        });
    });

    describe('detectFormat', () => {
        it('should pick the format from the extension first', () => {
            expect(SpecLoader.detectFormat('{}', 'api.yml')).toBe('yaml');
            expect(SpecLoader.detectFormat('{}', 'API.YAML')).toBe('yaml');
            expect(SpecLoader.detectFormat('openapi: 3.1.0', 'api.json')).toBe('json');
        });

        it('should sniff extensionless content', () => {
            expect(SpecLoader.detectFormat('  openapi: 3.1.0', 'spec')).toBe('yaml');
            expect(SpecLoader.detectFormat('{"openapi":"3.1.0"}', 'spec')).toBe('json');
        });
    });
});

// src/index.ts

import { ConverterConfig, OpenApiDocument, SpecFormat } from './core/types/index.js';
import { SpecLoader } from './core/parser/spec-loader.js';
import { SpecWriter } from './core/writer/spec-writer.js';
import { convertOpenApi31To30, ConversionStats, createConversionStats } from './core/converter.js';
import { isOpenApi31 } from './core/validator.js';
import { isUrl } from './core/utils/index.js';

export * from './core/types/index.js';
export * from './core/errors.js';
export {
    convertOpenApi31To30,
    collapseExamples,
    normalizeNullableUnion,
    createConversionStats,
    TARGET_OPENAPI_VERSION,
} from './core/converter.js';
export type { ConversionStats } from './core/converter.js';
export { SpecLoader } from './core/parser/spec-loader.js';
export { SpecWriter } from './core/writer/spec-writer.js';

/** Outcome of {@link convertFromConfig}. */
export interface ConversionResult {
    sourceUri: string;
    outputPath: string;
    format: SpecFormat;
    sourceVersion: string | undefined;
    stats: ConversionStats;
    document: OpenApiDocument;
}

/**
 * Loads the document named by `config.input`, converts it to OpenAPI 3.0.2 and writes it to
 * `config.output`. Errors propagate unchanged; reporting them to the user is the caller's job.
 */
export async function convertFromConfig(config: ConverterConfig): Promise<ConversionResult> {
    const log = (message: string): void => {
        if (!config.options.quiet) console.log(message);
    };

    log(`📡 Loading OpenAPI document from ${isUrl(config.input) ? 'URL' : 'file'}: ${config.input}`);
    const { document, sourceUri } = await SpecLoader.load(config.input);
    log(`Loaded OpenAPI document from ${sourceUri}`);

    const sourceVersion = typeof document.openapi === 'string' ? document.openapi : undefined;
    if (!isOpenApi31(document)) {
        console.warn(
            `⚠️  Input declares openapi "${sourceVersion ?? 'none'}", expected 3.1.x. Converting anyway.`,
        );
    }

    const stats = createConversionStats();
    const converted = convertOpenApi31To30(document, stats);

    const written = SpecWriter.write(converted, config.output, {
        format: config.options.format,
        indent: config.options.indent,
    });
    log(`✅ Converted OpenAPI document saved to ${written.path}`);
    log(`   ${stats.nullableUnions} nullable union(s) rewritten, ${stats.collapsedExamples} examples field(s) collapsed`);

    return {
        sourceUri,
        outputPath: written.path,
        format: written.format,
        sourceVersion,
        stats,
        document: converted,
    };
}

/** Serialization formats understood by the loader and the writer. */
export type SpecFormat = 'json' | 'yaml';

/** Options that customize how the converted document is written. */
export interface ConverterConfigOptions {
    /**
     * Output serialization.
     * If omitted, it is inferred from the output file extension (`.yaml`/`.yml` → yaml, otherwise json).
     */
    format?: SpecFormat;
    /** Spaces per indentation level in the written document. @default 2 */
    indent?: number;
    /** If true, progress messages are not printed. Failures are still thrown. */
    quiet?: boolean;
}

/** The main configuration object for a single conversion run. */
export interface ConverterConfig {
    /** The local file path or remote URL of the OpenAPI 3.1.0 document. */
    input: string;
    /** The file path the OpenAPI 3.0.2 document is written to. */
    output: string;
    options: ConverterConfigOptions;
}

import { Command, InvalidArgumentError, Option } from 'commander';
import * as fs from 'node:fs';
import * as path from 'node:path';
import yaml from 'js-yaml';
import { convertFromConfig, ConversionResult } from './index.js';
import { ConverterConfig, ConverterConfigOptions, isJsonObject, SpecFormat } from './core/types/index.js';
import { DEFAULT_INDENT } from './core/writer/spec-writer.js';
import { isUrl } from './core/utils/index.js';

/** Options as parsed by commander. Every field is absent when its flag is not given. */
export interface CliOptions {
    source?: string;
    dest?: string;
    config?: string;
    format?: SpecFormat;
    indent?: number;
    quiet?: boolean;
}

type PartialConverterConfig = Partial<Omit<ConverterConfig, 'options'>> & { options: ConverterConfigOptions };

function readPackageVersion(): string {
    const packageJsonPath = new URL('../package.json', import.meta.url);
    const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
    return isJsonObject(packageJson) && typeof packageJson.version === 'string' ? packageJson.version : '0.0.0';
}

export function parseIndent(value: string): number {
    const indent = Number(value);
    if (!Number.isInteger(indent) || indent < 1) {
        throw new InvalidArgumentError('Indent must be a positive integer.');
    }
    return indent;
}

/**
 * Reads a JSON or YAML configuration file. Relative `input` and `output` paths are resolved
 * against the directory containing the file.
 */
export function loadConfigFile(configPath: string): PartialConverterConfig {
    const resolvedPath = path.resolve(process.cwd(), configPath);
    if (!fs.existsSync(resolvedPath)) {
        throw new Error(`Configuration file not found: ${resolvedPath}`);
    }

    let raw: unknown;
    try {
        raw = yaml.load(fs.readFileSync(resolvedPath, 'utf-8'), { schema: yaml.JSON_SCHEMA });
    } catch (error) {
        throw new Error(`Failed to load configuration file: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (!isJsonObject(raw)) {
        throw new Error(`Configuration file must contain a mapping: ${resolvedPath}`);
    }

    const configDir = path.dirname(resolvedPath);
    const config: PartialConverterConfig = { options: {} };
    if (typeof raw.input === 'string') {
        config.input = isUrl(raw.input) || path.isAbsolute(raw.input) ? raw.input : path.resolve(configDir, raw.input);
    }
    if (typeof raw.output === 'string') {
        config.output = path.isAbsolute(raw.output) ? raw.output : path.resolve(configDir, raw.output);
    }

    const options = raw.options;
    if (isJsonObject(options)) {
        if (options.format === 'json' || options.format === 'yaml') config.options.format = options.format;
        if (typeof options.indent === 'number') config.options.indent = options.indent;
        if (typeof options.quiet === 'boolean') config.options.quiet = options.quiet;
    }
    return config;
}

/** Merges defaults, an optional config file and command-line flags, in that order of precedence. */
export function resolveConfig(options: CliOptions): ConverterConfig {
    const baseConfig: PartialConverterConfig = options.config ? loadConfigFile(options.config) : { options: {} };

    const cliOptions: ConverterConfigOptions = {};
    if (options.format !== undefined) cliOptions.format = options.format;
    if (options.indent !== undefined) cliOptions.indent = options.indent;
    if (options.quiet !== undefined) cliOptions.quiet = options.quiet;

    const input = options.source ?? baseConfig.input;
    const output = options.dest ?? baseConfig.output;
    if (!input) {
        throw new Error('Source path or URL is required. Provide it via --source or a config file.');
    }
    if (!output) {
        throw new Error('Destination path is required. Provide it via --dest or a config file.');
    }

    return {
        input,
        output,
        options: {
            indent: DEFAULT_INDENT,
            ...baseConfig.options,
            ...cliOptions,
        },
    };
}

/**
 * Runs one conversion and reports the outcome. Failures are printed and mark the process as
 * failed through `process.exitCode`; nothing is rethrown.
 */
export async function runConversion(options: CliOptions): Promise<ConversionResult | undefined> {
    const startTime = Date.now();
    try {
        const config = resolveConfig(options);
        if (options.config && !config.options.quiet) {
            console.log(`📜 Loaded configuration from: ${options.config}`);
        }
        const result = await convertFromConfig(config);
        if (!config.options.quiet) {
            console.log(`Converted ${result.sourceUri} → ${result.outputPath}`);
            const duration = (Date.now() - startTime) / 1000;
            console.log(`⏱️  Duration: ${duration.toFixed(2)} seconds`);
        }
        return result;
    } catch (error) {
        console.error('❌ Conversion failed:', error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
        return undefined;
    }
}

export function buildProgram(): Command {
    const program = new Command();
    program
        .name('openapi-downgrade')
        .description('Convert an OpenAPI 3.1.0 document (JSON or YAML) to OpenAPI 3.0.2')
        .version(readPackageVersion())
        .option('-s, --source <path>', 'Path or URL to the OpenAPI 3.1.0 document')
        .option('-d, --dest <path>', 'Path to save the converted OpenAPI 3.0.2 document')
        .option('-c, --config <path>', 'Path to a JSON or YAML configuration file')
        .addOption(new Option('--format <format>', 'Output format (defaults to the destination extension)').choices(['json', 'yaml']))
        .option('--indent <spaces>', `Indentation width (default: ${DEFAULT_INDENT})`, parseIndent)
        .option('-q, --quiet', 'Only report errors')
        .action(async (options: CliOptions) => {
            await runConversion(options);
        });
    return program;
}

/**
 * Command line program
 *
 * Usage:
 *   api-doc-schema                              # fetch the configured page
 *   api-doc-schema https://example.org/api      # fetch another page
 *   api-doc-schema --file api.html --output schema.json
 *   api-doc-schema --no-flush --field-identity tuple
 */

import { Command, Option } from 'commander';
import { readFile, writeFile } from 'fs/promises';
import type { FieldIdentity, ParserOptions } from '../types/schema.js';
import { parseApiDocumentation } from '../core/api-doc-parser.js';
import { fetchDocumentationPage } from '../core/page-fetcher.js';
import { schemaToJson, summarizeSchema } from '../core/schema-serializer.js';
import { loadConfig, type AppConfig } from '../utils/config-loader.js';
import { logLevelSchema } from '../utils/config-schemas.js';
import { configureLogger, logger } from '../utils/logger.js';

const log = logger.cli;

export interface CliOptions {
  file?: string;
  output?: string;
  flush: boolean;
  fieldIdentity?: FieldIdentity;
  logLevel?: string;
}

export interface ExtractionRequest {
  url?: string;
  options: CliOptions;
  config: AppConfig;
}

export function toParserOptions(options: CliOptions, config: AppConfig): ParserOptions {
  return {
    flushTrailingDeclaration: options.flush === false ? false : config.parser.flushTrailingDeclaration,
    fieldIdentity: options.fieldIdentity ?? config.parser.fieldIdentity,
  };
}

/**
 * Obtain the page, parse it, and return the schema as JSON text.
 */
export async function runExtraction({ url, options, config }: ExtractionRequest): Promise<string> {
  const html = options.file
    ? await readFile(options.file, 'utf-8')
    : await fetchDocumentationPage(url ?? config.fetcher.url, {
        timeoutMs: config.fetcher.timeoutMs,
        maxAttempts: config.fetcher.maxAttempts,
      });

  const schema = await parseApiDocumentation(html, toParserOptions(options, config));
  log.info('Schema extracted', { source: options.file ?? url ?? config.fetcher.url, ...summarizeSchema(schema) });

  return schemaToJson(schema);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('api-doc-schema')
    .description('Extract types and methods from an HTML API documentation page')
    .argument('[url]', 'documentation page to fetch (defaults to the configured url)')
    .option('-f, --file <path>', 'read the page from a local HTML file instead of fetching')
    .option('-o, --output <path>', 'write the JSON schema to a file instead of stdout')
    .option('--no-flush', 'drop a trailing member-less declaration at the end of the page')
    .addOption(
      new Option('--field-identity <mode>', 'how fields of one type are told apart').choices(['name', 'tuple'])
    )
    .addOption(
      new Option('--log-level <level>', 'log level').choices([...logLevelSchema.options])
    )
    .action(async (url: string | undefined, options: CliOptions) => {
      const level = logLevelSchema.safeParse(options.logLevel);
      const config = loadConfig();
      configureLogger({
        level: level.success ? level.data : config.log.level,
        prettyPrint: config.log.prettyPrint,
      });

      const json = await runExtraction({ url, options, config });

      if (options.output) {
        await writeFile(options.output, json + '\n', 'utf-8');
        log.info('Schema written', { path: options.output });
      } else {
        process.stdout.write(json + '\n');
      }
    });

  return program;
}

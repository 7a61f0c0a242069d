/**
 * API Documentation Parser
 *
 * Entry point of the extraction pipeline:
 *   raw HTML -> Block sequence -> (Type pass || Method pass) -> ApiSchema
 *
 * No network or file I/O happens here; see page-fetcher.ts for the download.
 */

import * as cheerio from 'cheerio';
import type { ApiSchema, Block, ParserOptions } from '../types/schema.js';
import { classifyBlocks } from './block-classifier.js';
import { buildSchema } from './schema-builder.js';
import { summarizeSchema } from './schema-serializer.js';
import { logger } from '../utils/logger.js';

const log = logger.parser;

/**
 * Load a page and return its classified Block sequence.
 * @throws StructureNotFoundError
 */
export function loadBlocks(html: string): Block[] {
  return classifyBlocks(cheerio.load(html));
}

/**
 * Parse a documentation page into its schema.
 *
 * Fails as a whole with StructureNotFoundError, MissingColumnError or
 * AmbiguousShapeError; no partial schema is returned.
 *
 * @example
 * ```ts
 * const schema = await parseApiDocumentation(html);
 * schema.types.find((t) => t.name === 'User')?.fields;
 * ```
 */
export async function parseApiDocumentation(html: string, options: ParserOptions = {}): Promise<ApiSchema> {
  const startTime = Date.now();

  try {
    const blocks = loadBlocks(html);
    const schema = await buildSchema(blocks, options);

    log.timed('Parsed documentation page', startTime, {
      blocks: blocks.length,
      ...summarizeSchema(schema),
    });

    return schema;
  } catch (error) {
    log.error('Failed to parse documentation page', { error });
    throw error;
  }
}

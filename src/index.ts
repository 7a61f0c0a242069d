/**
 * api-doc-schema
 *
 * Extracts a machine-readable schema (types, fields, methods, parameters)
 * from an HTML API documentation page.
 *
 * @example
 * ```ts
 * import { fetchDocumentationPage, parseApiDocumentation } from 'api-doc-schema';
 *
 * const html = await fetchDocumentationPage('https://core.telegram.org/bots/api');
 * const { types, methods } = await parseApiDocumentation(html);
 * ```
 */

export { parseApiDocumentation, loadBlocks } from './core/api-doc-parser.js';
export { classifyBlocks, classifyElement, findContentRoot, CONTENT_ROOT_ID } from './core/block-classifier.js';
export { decodeTable } from './core/table-decoder.js';
export { decodeList } from './core/list-decoder.js';
export {
  normalizeTypeName,
  arrayOf,
  elementTypeOf,
  isArrayToken,
  isPrimitiveToken,
  TYPE_TOKENS,
} from './core/type-normalizer.js';
export {
  buildSchema,
  extractTypes,
  extractMethods,
  isTypeName,
  isMethodName,
} from './core/schema-builder.js';
export { fetchDocumentationPage, type FetchPageOptions } from './core/page-fetcher.js';
export {
  serializeSchema,
  schemaToJson,
  summarizeSchema,
  type SerializedSchema,
  type SchemaSummary,
} from './core/schema-serializer.js';

export {
  SchemaExtractionError,
  StructureNotFoundError,
  MissingColumnError,
  AmbiguousShapeError,
  PageFetchError,
  isSchemaExtractionError,
  type SchemaErrorCode,
} from './types/errors.js';

export type * from './types/schema.js';

export { loadConfig, clearConfigFileCache, type AppConfig } from './utils/config-loader.js';
export { ConfigValidationError } from './utils/config-schemas.js';
export { configureLogger, logger, type LogLevel } from './utils/logger.js';

/**
 * Type-Name Normalizer
 *
 * Maps a documentation type phrase ("Array of String", "Integer or String")
 * to a canonical type token. Unknown phrases pass through unchanged: they
 * name nested declarations.
 */

import type { TypeToken } from '../types/schema.js';

export const ARRAY_PREFIX = 'Array of';

export const TYPE_TOKENS = {
  int64: 'int64',
  bool: 'bool',
  float64: 'float64',
  string: 'string',
} as const;

export type PrimitiveTypeToken = (typeof TYPE_TOKENS)[keyof typeof TYPE_TOKENS];

const PRIMITIVE_TYPES: ReadonlyMap<string, PrimitiveTypeToken> = new Map([
  ['Integer', TYPE_TOKENS.int64],
  ['True', TYPE_TOKENS.bool],
  ['Boolean', TYPE_TOKENS.bool],
  ['Float', TYPE_TOKENS.float64],
  ['InputFile or String', TYPE_TOKENS.string],
  ['Integer or String', TYPE_TOKENS.string],
]);

const ARRAY_TOKEN = /^array<(.*)>$/;

export function arrayOf(element: TypeToken): TypeToken {
  return `array<${element}>`;
}

export function isArrayToken(token: TypeToken): boolean {
  return ARRAY_TOKEN.test(token);
}

/**
 * Element token of an `array<T>` token, or null for anything else.
 */
export function elementTypeOf(token: TypeToken): TypeToken | null {
  const match = ARRAY_TOKEN.exec(token);
  return match ? match[1] : null;
}

export function isPrimitiveToken(token: TypeToken): token is PrimitiveTypeToken {
  return Object.values<string>(TYPE_TOKENS).includes(token);
}

/**
 * Normalize a documentation type phrase.
 *
 * @example
 * normalizeTypeName('Array of Array of Integer'); // 'array<array<int64>>'
 * normalizeTypeName('PhotoSize');                 // 'PhotoSize'
 */
export function normalizeTypeName(phrase: string): TypeToken {
  if (phrase.startsWith(ARRAY_PREFIX)) {
    return arrayOf(normalizeTypeName(phrase.slice(ARRAY_PREFIX.length).trim()));
  }

  return PRIMITIVE_TYPES.get(phrase) ?? phrase;
}

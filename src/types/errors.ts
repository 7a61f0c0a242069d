/**
 * Schema Extraction Errors
 *
 * Every failure of a parse is fatal and surfaces as one of these, with a
 * machine-readable code and, where known, the declaration and column
 * that triggered it.
 */

export type SchemaErrorCode =
  | 'STRUCTURE_NOT_FOUND'  // content root marker missing from the page
  | 'MISSING_COLUMN'       // table row lacks an expected column
  | 'AMBIGUOUS_SHAPE'      // a table and a list under one heading
  | 'FETCH_FAILED';        // page could not be downloaded

export class SchemaExtractionError extends Error {
  readonly code: SchemaErrorCode;
  readonly declaration?: string;
  readonly column?: string;

  constructor(
    code: SchemaErrorCode,
    message: string,
    details: { declaration?: string; column?: string } = {}
  ) {
    super(message);
    this.name = 'SchemaExtractionError';
    this.code = code;
    this.declaration = details.declaration;
    this.column = details.column;
  }
}

export class StructureNotFoundError extends SchemaExtractionError {
  readonly marker: string;

  constructor(marker: string) {
    super('STRUCTURE_NOT_FOUND', `Couldn't find the content root ${marker} in the document`);
    this.name = 'StructureNotFoundError';
    this.marker = marker;
  }
}

export class MissingColumnError extends SchemaExtractionError {
  constructor(declaration: string, column: string) {
    super(
      'MISSING_COLUMN',
      `Table of "${declaration}" has a row without the "${column}" column`,
      { declaration, column }
    );
    this.name = 'MissingColumnError';
  }
}

export class AmbiguousShapeError extends SchemaExtractionError {
  constructor(declaration: string, first: string, second: string) {
    super(
      'AMBIGUOUS_SHAPE',
      `"${declaration}" is followed by both ${first} and ${second}`,
      { declaration }
    );
    this.name = 'AmbiguousShapeError';
  }
}

export class PageFetchError extends SchemaExtractionError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, status?: number) {
    super('FETCH_FAILED', message);
    this.name = 'PageFetchError';
    this.url = url;
    this.status = status;
  }
}

export function isSchemaExtractionError(error: unknown): error is SchemaExtractionError {
  return error instanceof SchemaExtractionError;
}

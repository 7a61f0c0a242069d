/**
 * Schema Builder
 *
 * Groups the flat Block sequence into declarations. The page carries no
 * nesting, so grouping is inferred from order: a heading names a
 * declaration, the paragraphs after it describe it, and the first table or
 * list after it enumerates its members.
 *
 * Each pass is a finite-state machine over the blocks:
 *
 *   idle ──heading──▶ awaitingShape ──table/list──▶ shaped ◀─┐
 *                      │   ▲    │                      │     │ same kind (merge)
 *                      │   └────┘ paragraph            ├─────┘
 *                      └──heading (emit member-less)   └──heading──▶ awaitingShape
 *
 * A table followed by a list (or the reverse) under one heading is ambiguous.
 *
 * The Type pass and the Method pass read the same immutable sequence; each
 * ignores declarations whose name case belongs to the other.
 */

import type {
  ApiSchema,
  Block,
  Declaration,
  Field,
  FieldIdentity,
  MethodDeclaration,
  Parameter,
  ParserOptions,
  ShapeBlock,
  TableRow,
  TypeDeclaration,
} from '../types/schema.js';
import { AmbiguousShapeError, MissingColumnError } from '../types/errors.js';
import { normalizeTypeName } from './type-normalizer.js';
import { logger } from '../utils/logger.js';

const log = logger.schemaBuilder;

// ============================================
// TABLE COLUMNS
// ============================================

export const FIELD_COLUMNS = {
  name: 'Field',
  type: 'Type',
  description: 'Description',
} as const;

export const PARAMETER_COLUMNS = {
  name: 'Parameter',
  type: 'Type',
  required: 'Required',
  description: 'Description',
} as const;

const OPTIONAL_MARKER = 'Optional';

// ============================================
// NAME CASE
// ============================================

export function isTypeName(name: string): boolean {
  return /^\p{Lu}/u.test(name);
}

export function isMethodName(name: string): boolean {
  return /^\p{Ll}/u.test(name);
}

// ============================================
// MEMBER DECODING
// ============================================

function requireColumn(row: TableRow, column: string, declaration: string): string {
  const value = row.get(column);
  if (value === undefined) {
    throw new MissingColumnError(declaration, column);
  }
  return value;
}

export function fieldFromRow(row: TableRow, declaration: string): Field {
  const name = requireColumn(row, FIELD_COLUMNS.name, declaration);
  const type = normalizeTypeName(requireColumn(row, FIELD_COLUMNS.type, declaration));
  const description = requireColumn(row, FIELD_COLUMNS.description, declaration);

  return {
    name,
    type,
    optional: description.startsWith(OPTIONAL_MARKER),
    description,
  };
}

export function parameterFromRow(row: TableRow, declaration: string): Parameter {
  const name = requireColumn(row, PARAMETER_COLUMNS.name, declaration);
  const type = normalizeTypeName(requireColumn(row, PARAMETER_COLUMNS.type, declaration));
  const required = requireColumn(row, PARAMETER_COLUMNS.required, declaration);
  const description = requireColumn(row, PARAMETER_COLUMNS.description, declaration);

  return {
    name,
    type,
    required: required.trim().toLowerCase() !== OPTIONAL_MARKER.toLowerCase(),
    description,
  };
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function compareFields(a: Field, b: Field): number {
  return (
    compareText(a.name, b.name) ||
    compareText(a.type, b.type) ||
    Number(a.optional) - Number(b.optional) ||
    compareText(a.description, b.description)
  );
}

function fieldKey(field: Field, identity: FieldIdentity): string {
  return identity === 'name'
    ? field.name
    : JSON.stringify([field.name, field.type, field.optional, field.description]);
}

/**
 * Collapse fields by identity (first occurrence wins) and order them by name.
 */
export function collectFields(fields: Iterable<Field>, identity: FieldIdentity): Field[] {
  const unique = new Map<string, Field>();
  for (const field of fields) {
    const key = fieldKey(field, identity);
    if (!unique.has(key)) {
      unique.set(key, field);
    }
  }
  return [...unique.values()].sort(compareFields);
}

// ============================================
// PASS DEFINITIONS
// ============================================

interface PassDefinition<D extends Declaration> {
  kind: D['kind'];
  matches(name: string): boolean;
  build(name: string, description: string, shape: ShapeBlock | null): D;
  /** Fold the members of a further block of the same kind into the open declaration. */
  merge(open: D, more: D): D;
}

function typePass(identity: FieldIdentity): PassDefinition<TypeDeclaration> {
  return {
    kind: 'type',
    matches: isTypeName,
    build(name, description, shape) {
      let fields: Field[] = [];

      if (shape?.kind === 'fieldTable') {
        fields = shape.table.rows.map((row) => fieldFromRow(row, name));
      } else if (shape?.kind === 'itemList') {
        fields = [...shape.items].map((item) => ({
          name: item,
          type: item,
          optional: false,
          description: '',
        }));
      }

      return { kind: 'type', name, description, fields: collectFields(fields, identity) };
    },
    merge(open, more) {
      return { ...open, fields: collectFields([...open.fields, ...more.fields], identity) };
    },
  };
}

const methodPass: PassDefinition<MethodDeclaration> = {
  kind: 'method',
  matches: isMethodName,
  build(name, description, shape) {
    let parameters: Parameter[] = [];

    if (shape?.kind === 'fieldTable') {
      parameters = shape.table.rows.map((row) => parameterFromRow(row, name));
    } else if (shape?.kind === 'itemList') {
      parameters = [...shape.items].map((item) => ({
        name: item,
        type: item,
        required: true,
        description: '',
      }));
    }

    return { kind: 'method', name, description, parameters };
  },
  merge(open, more) {
    const known = new Set(open.parameters.map((parameter) => parameter.name));
    const added = more.parameters.filter((parameter) => !known.has(parameter.name));
    return { ...open, parameters: [...open.parameters, ...added] };
  },
};

// ============================================
// STATE MACHINE
// ============================================

export type ScanState =
  | { readonly state: 'idle' }
  | {
      readonly state: 'awaitingShape';
      readonly name: string;
      readonly description: string;
      readonly previous: 'heading' | 'paragraph';
    }
  | {
      readonly state: 'shaped';
      readonly name: string;
      readonly shape: ShapeBlock['kind'];
    };

const SHAPE_PHRASES: Record<ShapeBlock['kind'], string> = {
  fieldTable: 'a field table',
  itemList: 'an item list',
};

/**
 * Run one extraction pass.
 */
function runPass<D extends Declaration>(
  blocks: readonly Block[],
  pass: PassDefinition<D>,
  flushTrailing: boolean
): D[] {
  const declarations = new Map<string, D>();
  const passLog = log.child({ kind: pass.kind });

  // The declaration the current heading produced, if it was kept
  let open: D | null = null;

  const emit = (declaration: D): D | null => {
    if (declarations.has(declaration.name)) {
      passLog.warn('Duplicate declaration ignored', { declaration: declaration.name });
      return null;
    }
    passLog.debug('Declaration extracted', { declaration: declaration.name });
    declarations.set(declaration.name, declaration);
    return declaration;
  };

  // A heading right after a description paragraph, with no table or list
  // in between, closes a member-less declaration.
  const closeMemberless = (state: ScanState): void => {
    if (state.state === 'awaitingShape' && state.previous === 'paragraph' && pass.matches(state.name)) {
      emit(pass.build(state.name, state.description, null));
    }
  };

  let state: ScanState = { state: 'idle' };

  for (const block of blocks) {
    switch (block.kind) {
      case 'heading':
        closeMemberless(state);
        open = null;
        state = { state: 'awaitingShape', name: block.text, description: '', previous: 'heading' };
        break;

      case 'paragraph':
        if (state.state === 'awaitingShape') {
          const awaiting: Extract<ScanState, { state: 'awaitingShape' }> = state;
          state = { ...awaiting, description: block.text, previous: 'paragraph' };
        }
        break;

      case 'fieldTable':
      case 'itemList':
        if (state.state === 'awaitingShape') {
          if (pass.matches(state.name)) {
            open = emit(pass.build(state.name, state.description, block));
          }
          state = { state: 'shaped', name: state.name, shape: block.kind };
        } else if (state.state === 'shaped' && pass.matches(state.name)) {
          if (state.shape !== block.kind) {
            throw new AmbiguousShapeError(state.name, SHAPE_PHRASES[state.shape], SHAPE_PHRASES[block.kind]);
          }
          if (open !== null) {
            const merged = pass.merge(open, pass.build(open.name, open.description, block));
            passLog.debug('Declaration extended', { declaration: merged.name });
            declarations.set(merged.name, merged);
            open = merged;
          }
        }
        break;
    }
  }

  if (flushTrailing) {
    closeMemberless(state);
  }

  return [...declarations.values()];
}

function resolveOptions(options: ParserOptions): Required<ParserOptions> {
  return {
    flushTrailingDeclaration: options.flushTrailingDeclaration ?? true,
    fieldIdentity: options.fieldIdentity ?? 'name',
  };
}

// ============================================
// PUBLIC API
// ============================================

/**
 * Extract Type declarations (uppercase-led names).
 * @throws MissingColumnError, AmbiguousShapeError
 */
export function extractTypes(blocks: readonly Block[], options: ParserOptions = {}): TypeDeclaration[] {
  const opts = resolveOptions(options);
  return runPass(blocks, typePass(opts.fieldIdentity), opts.flushTrailingDeclaration);
}

/**
 * Extract Method declarations (lowercase-led names).
 * @throws MissingColumnError, AmbiguousShapeError
 */
export function extractMethods(blocks: readonly Block[], options: ParserOptions = {}): MethodDeclaration[] {
  const opts = resolveOptions(options);
  return runPass(blocks, methodPass, opts.flushTrailingDeclaration);
}

/**
 * Run the Type and Method passes as two concurrent tasks and join them.
 */
export async function buildSchema(blocks: readonly Block[], options: ParserOptions = {}): Promise<ApiSchema> {
  const [types, methods] = await Promise.all([
    Promise.resolve().then(() => extractTypes(blocks, options)),
    Promise.resolve().then(() => extractMethods(blocks, options)),
  ]);

  return { types, methods };
}

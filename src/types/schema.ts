/**
 * Schema Types
 *
 * Shapes produced by the documentation parser:
 * - Blocks: classified units of page content, in document order
 * - Declarations: Types (data shapes) and Methods (remote operations)
 * - ApiSchema: the read-only result of one parse
 */

// ============================================
// TYPE TOKENS
// ============================================

/**
 * Canonical, language-agnostic type token.
 *
 * Primitives are `int64`, `bool`, `float64` and `string`; sequences are
 * written `array<T>`. Any other value names a nested declaration.
 */
export type TypeToken = string;

// ============================================
// BLOCKS
// ============================================

/**
 * One decoded table row: column name -> trimmed cell text.
 * Keys are an in-order prefix of the table's header columns.
 */
export type TableRow = ReadonlyMap<string, string>;

export interface DecodedTable {
  readonly columns: readonly string[];
  readonly rows: readonly TableRow[];
}

export interface HeadingBlock {
  readonly kind: 'heading';
  readonly text: string;
}

export interface ParagraphBlock {
  readonly kind: 'paragraph';
  readonly text: string;
}

export interface FieldTableBlock {
  readonly kind: 'fieldTable';
  readonly table: DecodedTable;
}

export interface ItemListBlock {
  readonly kind: 'itemList';
  readonly items: ReadonlySet<string>;
}

export type Block = HeadingBlock | ParagraphBlock | FieldTableBlock | ItemListBlock;

export type BlockKind = Block['kind'];

/** Blocks that enumerate a declaration's fields or parameters */
export type ShapeBlock = FieldTableBlock | ItemListBlock;

// ============================================
// DECLARATIONS
// ============================================

export interface Field {
  readonly name: string;
  readonly type: TypeToken;
  readonly optional: boolean;
  readonly description: string;
}

export interface Parameter {
  readonly name: string;
  readonly type: TypeToken;
  readonly required: boolean;
  readonly description: string;
}

export interface TypeDeclaration {
  readonly kind: 'type';
  /** Always starts with an uppercase letter */
  readonly name: string;
  readonly description: string;
  /** Ordered by name */
  readonly fields: readonly Field[];
}

export interface MethodDeclaration {
  readonly kind: 'method';
  /** Always starts with a lowercase letter */
  readonly name: string;
  readonly description: string;
  /** Document order */
  readonly parameters: readonly Parameter[];
}

export type Declaration = TypeDeclaration | MethodDeclaration;

export type DeclarationKind = Declaration['kind'];

/**
 * Result of parsing one documentation page.
 */
export interface ApiSchema {
  readonly types: readonly TypeDeclaration[];
  readonly methods: readonly MethodDeclaration[];
}

// ============================================
// PARSER OPTIONS
// ============================================

/**
 * How fields of one Type are told apart.
 * - `name`: one field per name, first occurrence wins
 * - `tuple`: fields differing in any of name/type/optional/description coexist
 */
export type FieldIdentity = 'name' | 'tuple';

export interface ParserOptions {
  /**
   * Emit a member-less declaration for a trailing heading + paragraph
   * at the end of the page.
   * @default true
   */
  flushTrailingDeclaration?: boolean;

  /** @default 'name' */
  fieldIdentity?: FieldIdentity;
}

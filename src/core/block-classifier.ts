/**
 * Block Classifier
 *
 * Walks the direct children of the documentation content root and turns
 * each recognized element into a Block. Document order is the only
 * structural signal the schema builder gets, so it is preserved exactly.
 */

import type * as cheerio from 'cheerio';
import type { Block } from '../types/schema.js';
import { StructureNotFoundError } from '../types/errors.js';
import { decodeTable, type Selection } from './table-decoder.js';
import { decodeList } from './list-decoder.js';
import { logger } from '../utils/logger.js';

const log = logger.classifier;

/** id of the element that bounds the documentation body */
export const CONTENT_ROOT_ID = 'dev_page_content';

/** Heading level that names declarations; other levels are section titles */
export const DECLARATION_HEADING_TAG = 'h4';

/** Exact class attribute of field tables; layout tables carry other classes */
export const FIELD_TABLE_CLASS = 'table';

const LIST_TAGS = new Set(['ul', 'ol']);

const WHITESPACE = /\s/;

/**
 * Locate the content root.
 * @throws StructureNotFoundError when the page has no such element
 */
export function findContentRoot($: cheerio.CheerioAPI): Selection {
  const $root = $(`[id="${CONTENT_ROOT_ID}"]`).first();
  if ($root.length === 0) {
    throw new StructureNotFoundError(`#${CONTENT_ROOT_ID}`);
  }
  return $root;
}

/**
 * Classify one child element, or return null when it is not admitted.
 */
export function classifyElement($: cheerio.CheerioAPI, $el: Selection): Block | null {
  const tagName = $el.prop('tagName')?.toLowerCase();

  if (tagName === DECLARATION_HEADING_TAG) {
    const text = $el.text();
    return WHITESPACE.test(text) ? null : { kind: 'heading', text };
  }

  if (tagName === 'p') {
    return { kind: 'paragraph', text: $el.text() };
  }

  if (tagName === 'table') {
    return $el.attr('class') === FIELD_TABLE_CLASS
      ? { kind: 'fieldTable', table: decodeTable($, $el) }
      : null;
  }

  if (tagName !== undefined && LIST_TAGS.has(tagName)) {
    return $el.children('li').length > 0
      ? { kind: 'itemList', items: decodeList($, $el) }
      : null;
  }

  return null;
}

/**
 * Produce the ordered Block sequence of a loaded documentation page.
 * @throws StructureNotFoundError
 */
export function classifyBlocks($: cheerio.CheerioAPI): Block[] {
  const $root = findContentRoot($);
  const blocks: Block[] = [];
  let skipped = 0;

  $root.children().each((_, el) => {
    const block = classifyElement($, $(el));
    if (block) {
      blocks.push(block);
    } else {
      skipped++;
    }
  });

  log.debug('Classified content blocks', { admitted: blocks.length, skipped });

  return blocks;
}

/**
 * List Decoder - collects the item labels of a `<ul>`/`<ol>`
 */

import type * as cheerio from 'cheerio';
import type { Selection } from './table-decoder.js';

/**
 * Trimmed text of every `li` child, blank items dropped.
 * Duplicates collapse; insertion order is kept.
 */
export function decodeList($: cheerio.CheerioAPI, $list: Selection): ReadonlySet<string> {
  const items = new Set<string>();

  $list.children('li').each((_, item) => {
    const text = $(item).text().trim();
    if (text) {
      items.add(text);
    }
  });

  return items;
}

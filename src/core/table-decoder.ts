/**
 * Table Decoder - turns a documentation table into header columns and rows
 */

import type * as cheerio from 'cheerio';
import type { DecodedTable, TableRow } from '../types/schema.js';

export type Selection = ReturnType<cheerio.CheerioAPI>;

/**
 * Decode a `<table>` element.
 *
 * Columns come from the `th` cells of `thead`; each `tr` of `tbody` is
 * zipped positionally against them. Short rows are partially filled and
 * extra cells are ignored. A missing `thead` or `tbody` means zero columns
 * or zero rows, and rows that decode to nothing are dropped.
 */
export function decodeTable($: cheerio.CheerioAPI, $table: Selection): DecodedTable {
  const columns: string[] = [];
  $table.children('thead').find('th').each((_, cell) => {
    columns.push($(cell).text().trim());
  });

  const rows: TableRow[] = [];
  $table.children('tbody').children('tr').each((_, rowEl) => {
    const row = new Map<string, string>();

    $(rowEl).children('td').each((index, cell) => {
      if (index < columns.length) {
        row.set(columns[index], $(cell).text().trim());
      }
    });

    if (row.size > 0) {
      rows.push(row);
    }
  });

  return { columns, rows };
}

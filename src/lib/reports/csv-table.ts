import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { Errors, toErrorMessage } from '../errors';
import type { Table, TableRow } from '../pricing/types';

const RecordsSchema = z.array(z.array(z.string()));

/**
 * Parse comma-separated text with a header row into a Table.
 *
 * Short rows are padded with empty cells; cells past the last header are dropped.
 * A report with no header row yields an empty table.
 */
export function parseCsvTable(text: string, source: string = 'report'): Table {
  let records: unknown;
  try {
    records = parse(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw Errors.malformedReport(source, toErrorMessage(error));
  }

  const [header, ...body] = RecordsSchema.parse(records);
  if (!header) {
    return { columns: [], rows: [] };
  }

  const rows = body.map((cells) => {
    const row: TableRow = {};
    header.forEach((column, index) => {
      row[column] = cells[index] ?? '';
    });
    return row;
  });

  return { columns: header, rows };
}

import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { log } from '@workspace/logger';
import { TableStructureError } from '../errors.js';
import { formatRunTimestamp } from '../utils/timestamp.js';
import type { Row, Table } from './types.js';

const csvRecordsSchema = z.array(z.array(z.string()));

/**
 * Repeated header names get a `.1`, `.2`, ... suffix (`tag`, `tag.1`) so no
 * column shadows another.
 */
function dedupeColumns(header: readonly string[]): string[] {
  const seen = new Set<string>();
  return header.map((name) => {
    let candidate = name;
    for (let suffix = 1; seen.has(candidate); suffix += 1) {
      candidate = `${name}.${suffix}`;
    }
    seen.add(candidate);
    return candidate;
  });
}

export function parseCsvTable(content: string, source = 'input'): Table {
  const parsed = csvRecordsSchema.safeParse(
    parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    }),
  );

  if (!parsed.success) {
    throw new TableStructureError(`Unreadable CSV in ${source}`);
  }

  const [header = [], ...records] = parsed.data;
  const columns = dedupeColumns(header.map((column) => column.trim()));

  const rows = records.map(
    (record): Row =>
      Object.fromEntries(columns.map((column, index) => [column, record[index] ?? null])),
  );

  return { columns, rows };
}

/** Stack tables vertically; columns are the union in first-seen order. */
export function concatTables(tables: readonly Table[]): Table {
  const columns: string[] = [];
  for (const table of tables) {
    for (const column of table.columns) {
      if (!columns.includes(column)) {
        columns.push(column);
      }
    }
  }

  const rows = tables.flatMap((table) =>
    table.rows.map(
      (row): Row => Object.fromEntries(columns.map((column) => [column, row[column] ?? null])),
    ),
  );

  return { columns, rows };
}

/** Read and concatenate every `*.csv` file of a directory, in file-name order. */
export async function readInputTables(inputDir: string): Promise<Table> {
  let entries: string[];
  try {
    entries = await readdir(inputDir);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new TableStructureError(`Cannot read input directory ${inputDir}: ${message}`);
  }

  const files = entries
    .filter((entry) => entry.toLowerCase().endsWith('.csv'))
    .sort((a, b) => a.localeCompare(b));

  if (files.length === 0) {
    throw new TableStructureError(`No CSV files found in ${inputDir}`);
  }

  const tables: Table[] = [];
  for (const file of files) {
    const path = join(inputDir, file);
    const table = parseCsvTable(await readFile(path, 'utf-8'), path);
    log.info(`Read ${table.rows.length} rows from ${path}`);
    tables.push(table);
  }

  return concatTables(tables);
}

export function formatCsvTable(table: Table): string {
  return stringify([
    table.columns,
    ...table.rows.map((row) => table.columns.map((column) => row[column] ?? '')),
  ]);
}

/** Write `enriched_data_<timestamp>.csv` into `outputDir` and return its path. */
export async function writeEnrichedTable(
  table: Table,
  outputDir: string,
  now: Date = new Date(),
): Promise<string> {
  await mkdir(outputDir, { recursive: true });

  const outputPath = join(outputDir, `enriched_data_${formatRunTimestamp(now)}.csv`);
  await writeFile(outputPath, formatCsvTable(table), 'utf-8');

  return outputPath;
}

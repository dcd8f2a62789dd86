import { TableStructureError } from '../errors.js';
import type { Cell, Table } from './types.js';

export function assertUrlColumn(table: Table, urlColumn: string): void {
  if (!table.columns.includes(urlColumn)) {
    throw new TableStructureError(
      `Input table has no "${urlColumn}" column (columns: ${table.columns.join(', ') || 'none'})`,
    );
  }
}

/**
 * Copy of `table` with the given columns set positionally: value `j` goes to
 * row `j`. Existing columns with the same name are overwritten in place.
 */
export function appendColumns(
  table: Table,
  additions: ReadonlyArray<readonly [string, readonly Cell[]]>,
): Table {
  for (const [name, values] of additions) {
    if (values.length !== table.rows.length) {
      throw new TableStructureError(
        `Column "${name}" has ${values.length} values for ${table.rows.length} rows`,
      );
    }
  }

  const columns = [...table.columns];
  for (const [name] of additions) {
    if (!columns.includes(name)) {
      columns.push(name);
    }
  }

  const rows = table.rows.map((row, index) => {
    const enriched = { ...row };
    for (const [name, values] of additions) {
      enriched[name] = values[index] ?? null;
    }
    return enriched;
  });

  return { columns, rows };
}

type Cell = string | null;

type Row = Record<string, Cell>;

/**
 * Row-oriented table. Row identity is position; `columns` fixes the output
 * column order.
 */
type Table = {
  columns: string[];
  rows: Row[];
};

export type { Cell, Row, Table };

/**
 * Raised for problems with the input table itself (missing URL column, no
 * readable input files). These are the only failures that abort a run;
 * per-URL failures never surface as exceptions.
 */
export class TableStructureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TableStructureError';
  }
}

/**
 * Row Query Executor Port
 *
 * Runs literal SQL and hands back a cursor over the result.
 */

/**
 * Write slot for one column of the current row.
 */
export interface ScanTarget {
  assign(value: unknown): void;
}

export interface RowCursor {
  /** Result column names, in result order. */
  columns(): readonly string[];

  /**
   * Advance to the next row
   * @returns false once the rows are exhausted
   */
  next(): Promise<boolean>;

  /**
   * Write the current row into `targets`, one per column
   */
  scan(targets: readonly ScanTarget[]): Promise<void>;

  /**
   * Error met while iterating, checked after next() returns false
   */
  err(): Error | undefined;

  /**
   * Release the cursor. Safe to call more than once.
   */
  close(): Promise<void>;
}

export interface RowQueryExecutor {
  query(sql: string): Promise<RowCursor>;
}

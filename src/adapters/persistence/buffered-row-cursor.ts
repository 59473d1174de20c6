/**
 * Buffered Row Cursor
 *
 * RowCursor over rows already held in memory, one value array per row.
 */

import type {
  RowCursor,
  ScanTarget,
} from "../../core/ports/row-query-executor.port.js";

export class BufferedRowCursor implements RowCursor {
  private index = -1;
  private closed = false;

  constructor(
    private readonly columnNames: readonly string[],
    private readonly rows: readonly (readonly unknown[])[],
  ) {}

  columns(): readonly string[] {
    return this.columnNames;
  }

  async next(): Promise<boolean> {
    if (this.closed || this.index >= this.rows.length) return false;
    this.index++;
    return this.index < this.rows.length;
  }

  async scan(targets: readonly ScanTarget[]): Promise<void> {
    if (this.closed) {
      throw new Error("Cursor is closed");
    }
    const row = this.rows[this.index];
    if (row === undefined) {
      throw new Error("scan called without a current row");
    }
    if (targets.length !== row.length) {
      throw new Error(
        `expected ${row.length} scan targets, got ${targets.length}`,
      );
    }
    targets.forEach((target, i) => target.assign(row[i]));
  }

  err(): Error | undefined {
    return undefined;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

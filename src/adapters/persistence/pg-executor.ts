import type { Pool, PoolClient, QueryArrayResult } from "pg";
import type {
  RowCursor,
  RowQueryExecutor,
} from "../../core/ports/row-query-executor.port.js";
import { BufferedRowCursor } from "./buffered-row-cursor.js";

/**
 * PostgreSQL Executor (Default)
 *
 * Wraps pg.Pool or pg.PoolClient to implement RowQueryExecutor.
 * Rows are fetched in array mode so repeated column names and column order
 * survive. A client taken from a Pool is released before the cursor is
 * returned; a PoolClient passed in (e.g. inside a transaction) stays with
 * its owner.
 */
export class PgSqlExecutor implements RowQueryExecutor {
  constructor(private readonly client: Pool | PoolClient) {}

  async query(sql: string): Promise<RowCursor> {
    if (this.isPoolClient(this.client)) {
      return this.run(this.client, sql);
    }

    const client = await this.client.connect();
    try {
      return await this.run(client, sql);
    } finally {
      client.release();
    }
  }

  private async run(client: PoolClient, sql: string): Promise<RowCursor> {
    const result: QueryArrayResult<unknown[]> = await client.query({
      text: sql,
      rowMode: "array",
    });
    return new BufferedRowCursor(
      result.fields.map((f) => f.name),
      result.rows,
    );
  }

  private isPoolClient(client: Pool | PoolClient): client is PoolClient {
    return "release" in client && typeof client.release === "function";
  }
}

import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Pool, PoolClient } from "pg";
import { PgSqlExecutor } from "../../src/adapters/persistence/pg-executor.js";
import { BufferedRowCursor } from "../../src/adapters/persistence/buffered-row-cursor.js";
import type { ScanTarget } from "../../src/core/ports/row-query-executor.port.js";

function collector(): { values: unknown[]; targets: (n: number) => ScanTarget[] } {
  const values: unknown[] = [];
  return {
    values,
    targets: (n) =>
      Array.from({ length: n }, () => ({ assign: (v: unknown) => void values.push(v) })),
  };
}

describe("PgSqlExecutor", () => {
  let client: { query: ReturnType<typeof vi.fn>; release: ReturnType<typeof vi.fn> };
  let pool: { connect: ReturnType<typeof vi.fn> };

  beforeEach(() => {
    client = {
      query: vi.fn().mockResolvedValue({
        fields: [{ name: "id" }, { name: "name" }, { name: "id" }],
        rows: [
          [1, "a", 10],
          [2, "b", 20],
        ],
      }),
      release: vi.fn(),
    };
    pool = { connect: vi.fn().mockResolvedValue(client) };
  });

  it("should query in array row mode", async () => {
    const executor = new PgSqlExecutor(pool as unknown as Pool);

    await executor.query("SELECT id, name, id FROM person");

    expect(client.query).toHaveBeenCalledWith({
      text: "SELECT id, name, id FROM person",
      rowMode: "array",
    });
  });

  it("should keep column order and repeated names", async () => {
    const executor = new PgSqlExecutor(pool as unknown as Pool);

    const cursor = await executor.query("SELECT id, name, id FROM person");

    expect(cursor.columns()).toEqual(["id", "name", "id"]);
    const { values, targets } = collector();
    await cursor.next();
    await cursor.scan(targets(3));
    expect(values).toEqual([1, "a", 10]);
  });

  it("should release a pooled client after the query", async () => {
    const executor = new PgSqlExecutor(pool as unknown as Pool);

    await executor.query("SELECT 1");

    expect(pool.connect).toHaveBeenCalledOnce();
    expect(client.release).toHaveBeenCalledOnce();
  });

  it("should release a pooled client when the query fails", async () => {
    client.query.mockRejectedValue(new Error("syntax error at or near \"SELEC\""));
    const executor = new PgSqlExecutor(pool as unknown as Pool);

    await expect(executor.query("SELEC 1")).rejects.toThrow("syntax error");
    expect(client.release).toHaveBeenCalledOnce();
  });

  it("should leave a caller's client checked out", async () => {
    const executor = new PgSqlExecutor(client as unknown as PoolClient);

    await executor.query("SELECT 1");

    expect(client.query).toHaveBeenCalledOnce();
    expect(client.release).not.toHaveBeenCalled();
  });
});

describe("BufferedRowCursor", () => {
  it("should walk the rows in order", async () => {
    const cursor = new BufferedRowCursor(["a"], [[1], [2]]);
    const { values, targets } = collector();

    while (await cursor.next()) {
      await cursor.scan(targets(1));
    }

    expect(values).toEqual([1, 2]);
    expect(await cursor.next()).toBe(false);
    expect(cursor.err()).toBeUndefined();
  });

  it("should reject a scan before next()", async () => {
    const cursor = new BufferedRowCursor(["a"], [[1]]);

    await expect(cursor.scan(collector().targets(1))).rejects.toThrow(
      "scan called without a current row",
    );
  });

  it("should reject a target count that differs from the row", async () => {
    const cursor = new BufferedRowCursor(["a", "b"], [[1, 2]]);
    await cursor.next();

    await expect(cursor.scan(collector().targets(1))).rejects.toThrow(
      "expected 2 scan targets, got 1",
    );
  });

  it("should stop after close", async () => {
    const cursor = new BufferedRowCursor(["a"], [[1], [2]]);
    await cursor.next();
    await cursor.close();

    expect(await cursor.next()).toBe(false);
    await expect(cursor.scan(collector().targets(1))).rejects.toThrow("Cursor is closed");
  });
});

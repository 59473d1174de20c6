/**
 * Query Session
 *
 * Entry point for callers: wires the pg executor, the interpolator and the
 * diagnostics sink into selectAll / selectOne.
 *
 * @example
 * ```typescript
 * const session = new QuerySession(pool, { diagnostics: new OtelDiagnostics() });
 *
 * const accounts = sequence(AccountRecord);
 * const count = await session.selectAll(accounts, "SELECT id, display_name FROM account");
 *
 * const account = single(AccountRecord);
 * const found = await session.selectOne(account, "SELECT * FROM account WHERE id = 7");
 * ```
 */

import type { Pool, PoolClient } from "pg";
import type {
  RecordCollection,
  SingleRecord,
} from "../core/domain/destination/destination.js";
import { QueryPipeline } from "../core/domain/services/query-pipeline.js";
import {
  createSessionConfig,
  type QuerySessionConfig,
} from "../core/domain/value-objects/session-config.js";
import type { DiagnosticsPort } from "../core/ports/diagnostics.port.js";
import {
  literalInterpolator,
  type Interpolator,
} from "../core/ports/interpolator.port.js";
import type { RowQueryExecutor } from "../core/ports/row-query-executor.port.js";
import { SelectAllUseCase } from "../core/use-cases/select-all.use-case.js";
import { SelectOneUseCase } from "../core/use-cases/select-one.use-case.js";
import { PgSqlExecutor } from "../adapters/persistence/pg-executor.js";
import { NoopDiagnostics } from "../adapters/telemetry/metrics.js";

export interface QuerySessionOptions {
  interpolator?: Interpolator;
  diagnostics?: DiagnosticsPort;
  config?: Partial<QuerySessionConfig>;
  /** Monotonic clock in nanoseconds */
  clock?: () => bigint;
}

export class QuerySession {
  private readonly executor: RowQueryExecutor;
  private readonly selectAllUseCase: SelectAllUseCase;
  private readonly selectOneUseCase: SelectOneUseCase;

  constructor(
    poolOrExecutor: Pool | PoolClient | RowQueryExecutor,
    options: QuerySessionOptions = {},
  ) {
    if (this.isRowQueryExecutor(poolOrExecutor)) {
      this.executor = poolOrExecutor;
    } else {
      this.executor = new PgSqlExecutor(poolOrExecutor);
    }

    const pipeline = new QueryPipeline({
      executor: this.executor,
      interpolator: options.interpolator ?? literalInterpolator,
      diagnostics: options.diagnostics ?? new NoopDiagnostics(),
      config: createSessionConfig(options.config),
      clock: options.clock,
    });
    this.selectAllUseCase = new SelectAllUseCase(pipeline);
    this.selectOneUseCase = new SelectOneUseCase(pipeline);
  }

  /**
   * Store every row of the query into a record sequence or mapping.
   * @returns number of rows stored
   */
  selectAll<T extends object>(
    destination: RecordCollection<T>,
    template: string,
    ...params: unknown[]
  ): Promise<number> {
    return this.selectAllUseCase.execute(destination, template, params);
  }

  /**
   * Fill a single record from the first row of the query.
   * @returns false when the query returned no row
   */
  selectOne<T extends object>(
    destination: SingleRecord<T>,
    template: string,
    ...params: unknown[]
  ): Promise<boolean> {
    return this.selectOneUseCase.execute(destination, template, params);
  }

  private isRowQueryExecutor(
    obj: Pool | PoolClient | RowQueryExecutor,
  ): obj is RowQueryExecutor {
    // pg.Pool and pg.PoolClient both expose connect(); executors do not.
    return !("connect" in obj) && !("release" in obj);
  }
}

/**
 * Query Pipeline
 *
 * Interpolate -> execute -> assemble, with one timing emitted per call
 * whatever the outcome.
 */

import {
  ExecutionError,
  InterpolationError,
  describeCause,
} from "../errors/index.js";
import type { RecordSink } from "../destination/destination.js";
import type { DiagnosticsPort } from "../../ports/diagnostics.port.js";
import type { Interpolator } from "../../ports/interpolator.port.js";
import type {
  RowCursor,
  RowQueryExecutor,
} from "../../ports/row-query-executor.port.js";
import {
  queryErrorEventName,
  timingName,
  type QuerySessionConfig,
  type SelectOperation,
} from "../value-objects/session-config.js";
import { assembleRows, type AssembleOptions } from "./result-assembler.js";

export interface QueryPipelineDeps {
  executor: RowQueryExecutor;
  interpolator: Interpolator;
  diagnostics: DiagnosticsPort;
  config: QuerySessionConfig;
  /** Monotonic clock in nanoseconds */
  clock?: () => bigint;
}

export class QueryPipeline {
  private readonly clock: () => bigint;

  constructor(private readonly deps: QueryPipelineDeps) {
    this.clock = deps.clock ?? (() => process.hrtime.bigint());
  }

  async run<T extends object>(
    operation: SelectOperation,
    sink: RecordSink<T>,
    template: string,
    params: readonly unknown[],
    options: AssembleOptions = {},
  ): Promise<number> {
    const startedAt = this.clock();
    let sql = template;

    try {
      sql = this.interpolate(template, params);
      const cursor = await this.open(operation, sql);
      return await assembleRows(cursor, sink, options);
    } finally {
      const durationNanos = Number(this.clock() - startedAt);
      this.notify(() =>
        this.deps.diagnostics.recordTiming(
          timingName(this.deps.config),
          durationNanos,
          { sql },
        ),
      );
    }
  }

  private interpolate(template: string, params: readonly unknown[]): string {
    try {
      return this.deps.interpolator.interpolate(template, params);
    } catch (error) {
      if (error instanceof InterpolationError) throw error;
      throw new InterpolationError(describeCause(error), { cause: error });
    }
  }

  private async open(
    operation: SelectOperation,
    sql: string,
  ): Promise<RowCursor> {
    try {
      return await this.deps.executor.query(sql);
    } catch (error) {
      const failure = new ExecutionError(sql, error);
      this.notify(() =>
        this.deps.diagnostics.recordError(
          queryErrorEventName(this.deps.config, operation),
          failure,
          { sql },
        ),
      );
      if (this.deps.config.logErrors) {
        console.error(`[QueryPipeline] ${operation} failed: ${failure.message}`, {
          sql,
        });
      }
      throw failure;
    }
  }

  /** Diagnostics never change the outcome of a select. */
  private notify(emit: () => void): void {
    try {
      emit();
    } catch (error) {
      console.warn("[QueryPipeline] Diagnostics sink failed:", error);
    }
  }
}

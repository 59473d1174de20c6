/**
 * Result Assembler
 *
 * Drives a cursor row by row: builds the binding plan on the first row,
 * scans each row into a fresh record and stores it in the destination.
 *
 * Failure semantics:
 * - the first failure stops iteration; records stored before it stay stored
 * - the cursor is closed on every path
 * - cursor.err() is reported only when nothing failed before it
 */

import {
  IterationError,
  ScanError,
  SelectError,
} from "../errors/index.js";
import type { RecordSink } from "../destination/destination.js";
import type { RowCursor } from "../../ports/row-query-executor.port.js";
import { BindingPlan } from "./binding-plan.js";

export interface AssembleOptions {
  /** Stop after this many rows (selectOne passes 1). */
  limit?: number;
}

/**
 * @returns number of records stored
 * @throws SelectError carrying the number of records stored before the failure
 */
export async function assembleRows<T extends object>(
  cursor: RowCursor,
  sink: RecordSink<T>,
  options: AssembleOptions = {},
): Promise<number> {
  const progress = { rowCount: 0 };
  let failure: SelectError | undefined;

  try {
    await iterate(cursor, sink, options.limit, progress);
  } catch (error) {
    failure =
      error instanceof SelectError
        ? error
        : new IterationError(progress.rowCount, error);
  }

  try {
    await cursor.close();
  } catch (closeError) {
    if (failure === undefined) {
      failure = new IterationError(progress.rowCount, closeError);
    } else {
      console.error(
        `[ResultAssembler] Cursor close failed after ${failure.name}:`,
        closeError,
      );
    }
  }

  if (failure !== undefined) throw failure;
  return progress.rowCount;
}

async function iterate<T extends object>(
  cursor: RowCursor,
  sink: RecordSink<T>,
  limit: number | undefined,
  progress: { rowCount: number },
): Promise<void> {
  let plan: BindingPlan<T> | undefined;

  while (true) {
    let hasRow: boolean;
    try {
      hasRow = await cursor.next();
    } catch (error) {
      throw new IterationError(progress.rowCount, error);
    }
    if (!hasRow) break;

    plan ??= BindingPlan.build(sink.recordType, cursor.columns());

    const record = sink.recordType.create();
    try {
      await cursor.scan(plan.targetsFor(record));
    } catch (error) {
      throw new ScanError(progress.rowCount, error);
    }

    sink.store(record);
    progress.rowCount++;

    // Stopped early: the cursor was not exhausted, so err() does not apply.
    if (limit !== undefined && progress.rowCount >= limit) return;
  }

  const iterationError = cursor.err();
  if (iterationError) {
    throw new IterationError(progress.rowCount, iterationError);
  }
}

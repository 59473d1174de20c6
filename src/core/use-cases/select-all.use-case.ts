/**
 * Select All Use Case
 *
 * Runs a query and stores every row into a record sequence or mapping.
 * Existing entries of the destination are kept; a mapping keeps the last
 * row seen for each key.
 */

import { inspectDestination } from "../domain/destination/destination-inspector.js";
import type { RecordCollection } from "../domain/destination/destination.js";
import type { QueryPipeline } from "../domain/services/query-pipeline.js";

export class SelectAllUseCase {
  constructor(private readonly pipeline: QueryPipeline) {}

  /**
   * @returns number of rows stored, overwritten mapping entries included
   * @throws ShapeError before any I/O when the destination is not a sequence or mapping
   * @throws SelectError otherwise; records stored before the failure stay in the destination
   */
  async execute<T extends object>(
    destination: RecordCollection<T>,
    template: string,
    params: readonly unknown[] = [],
  ): Promise<number> {
    inspectDestination(destination, ["sequence", "mapping"]);
    return this.pipeline.run("select_all", destination, template, params);
  }
}

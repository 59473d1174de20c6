/**
 * Select One Use Case
 *
 * Fills a single record from the first row of a query.
 */

import { inspectDestination } from "../domain/destination/destination-inspector.js";
import type { SingleRecord } from "../domain/destination/destination.js";
import type { QueryPipeline } from "../domain/services/query-pipeline.js";

export class SelectOneUseCase {
  constructor(private readonly pipeline: QueryPipeline) {}

  /**
   * @returns false when the query returned no row; the target is untouched
   */
  async execute<T extends object>(
    destination: SingleRecord<T>,
    template: string,
    params: readonly unknown[] = [],
  ): Promise<boolean> {
    inspectDestination(destination, ["single"]);
    const rowCount = await this.pipeline.run(
      "select_one",
      destination,
      template,
      params,
      { limit: 1 },
    );
    return rowCount > 0;
  }
}

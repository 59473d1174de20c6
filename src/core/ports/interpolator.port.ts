/**
 * Interpolator Port
 *
 * Merges a SQL template and its parameters into literal SQL.
 */

import { InterpolationError } from "../domain/errors/index.js";

export interface Interpolator {
  /**
   * @throws when the parameters cannot be merged into the template
   */
  interpolate(template: string, params: readonly unknown[]): string;
}

/**
 * Accepts literal SQL only: the template is returned unchanged and any
 * parameter is rejected.
 */
export const literalInterpolator: Interpolator = {
  interpolate(template: string, params: readonly unknown[]): string {
    if (params.length > 0) {
      throw new InterpolationError(
        `No interpolator configured for ${params.length} parameter(s)`,
      );
    }
    return template;
  },
};

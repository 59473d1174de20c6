/**
 * Diagnostics Port
 *
 * Fire-and-forget sink for query timings and query errors.
 */

export type DiagnosticTags = Record<string, string>;

export interface DiagnosticsPort {
  recordTiming(name: string, durationNanos: number, tags: DiagnosticTags): void;

  recordError(name: string, error: Error, tags: DiagnosticTags): void;
}

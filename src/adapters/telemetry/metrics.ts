/**
 * OpenTelemetry Metrics
 *
 * DiagnosticsPort backed by @opentelemetry/api. Timings go to one histogram
 * per timing name (unit ns), errors to one counter per event name; tags
 * become metric attributes. Without a registered SDK the API is a no-op.
 */

import {
  metrics,
  type Counter,
  type Histogram,
  type Meter,
} from "@opentelemetry/api";
import type {
  DiagnosticTags,
  DiagnosticsPort,
} from "../../core/ports/diagnostics.port.js";

export const METER_NAME = "pg-record-mapper";

// ============================================
// OpenTelemetry Implementation
// ============================================

export class OtelDiagnostics implements DiagnosticsPort {
  private readonly histograms = new Map<string, Histogram>();
  private readonly counters = new Map<string, Counter>();

  constructor(private readonly meter: Meter = metrics.getMeter(METER_NAME)) {}

  recordTiming(name: string, durationNanos: number, tags: DiagnosticTags): void {
    let histogram = this.histograms.get(name);
    if (!histogram) {
      histogram = this.meter.createHistogram(name, {
        description: "Select duration",
        unit: "ns",
      });
      this.histograms.set(name, histogram);
    }
    histogram.record(durationNanos, tags);
  }

  recordError(name: string, error: Error, tags: DiagnosticTags): void {
    let counter = this.counters.get(name);
    if (!counter) {
      counter = this.meter.createCounter(name, {
        description: "Select failures",
      });
      this.counters.set(name, counter);
    }
    counter.add(1, { ...tags, "error.type": error.name });
  }
}

// ============================================
// No-op Implementation
// ============================================

export class NoopDiagnostics implements DiagnosticsPort {
  recordTiming(
    _name: string,
    _durationNanos: number,
    _tags: DiagnosticTags,
  ): void {}
  recordError(_name: string, _error: Error, _tags: DiagnosticTags): void {}
}

/**
 * Session Config Value Object
 *
 * Names under which selects report diagnostics, and logging switches.
 */

export interface QuerySessionConfig {
  /** Prefix of every diagnostic name */
  metricPrefix: string;
  /** Log query failures to the console */
  logErrors: boolean;
}

export const DEFAULT_SESSION_CONFIG: QuerySessionConfig = {
  metricPrefix: "record_mapper",
  logErrors: true,
};

/**
 * Create session config from partial config
 */
export function createSessionConfig(
  overrides: Partial<QuerySessionConfig> = {},
): QuerySessionConfig {
  return { ...DEFAULT_SESSION_CONFIG, ...overrides };
}

/**
 * Read session config from environment variables:
 * RECORD_MAPPER_METRIC_PREFIX, RECORD_MAPPER_LOG_ERRORS ("false" or "0" to disable)
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): QuerySessionConfig {
  const logErrors = env.RECORD_MAPPER_LOG_ERRORS?.trim().toLowerCase();
  return createSessionConfig({
    metricPrefix:
      env.RECORD_MAPPER_METRIC_PREFIX || DEFAULT_SESSION_CONFIG.metricPrefix,
    logErrors:
      logErrors === undefined || logErrors === ""
        ? DEFAULT_SESSION_CONFIG.logErrors
        : !["false", "0", "no", "off"].includes(logErrors),
  });
}

export type SelectOperation = "select_all" | "select_one";

/** Timing name shared by both operations, e.g. record_mapper.select */
export function timingName(config: QuerySessionConfig): string {
  return `${config.metricPrefix}.select`;
}

/** Error event name, e.g. record_mapper.select_one.query_error */
export function queryErrorEventName(
  config: QuerySessionConfig,
  operation: SelectOperation,
): string {
  return `${config.metricPrefix}.${operation}.query_error`;
}

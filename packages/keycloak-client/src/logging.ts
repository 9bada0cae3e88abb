/**
 * Log severity, ordered from most to least verbose.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** function type for custom logging */
export type Log = (
  level: LogLevel,
  message: string,
  data?: Readonly<Record<string, unknown>>
) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * A log function that discards everything.
 * Used when no log function is configured.
 */
export const silentLog: Log = () => undefined;

/**
 * Creates a log function writing `[keycloak]` prefixed lines to stderr.
 *
 * @param minLevel - Messages below this level are dropped (default: 'info')
 * @returns A Log function
 *
 * @example
 * ```typescript
 * const client = createKeycloakClient({
 *   baseUrl: 'https://sso.example.com',
 *   log: createConsoleLog('debug'),
 * });
 * ```
 */
export const createConsoleLog = (minLevel: LogLevel = 'info'): Log => {
  const threshold = LEVEL_ORDER[minLevel];

  return (level, message, data) => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    if (data === undefined) {
      console.error(`[keycloak] ${level}: ${message}`);
    } else {
      console.error(`[keycloak] ${level}: ${message}`, data);
    }
  };
};

/**
 * Logger contract accepted by engine operations.
 * The CLI's command logger satisfies it; library callers can pass their own.
 */
export interface MergeLogger {
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  debug(message: string, data?: unknown): void;
}

const noop = (): void => {};

export const silentLogger: MergeLogger = {
  info: noop,
  warn: noop,
  error: noop,
  debug: noop,
};

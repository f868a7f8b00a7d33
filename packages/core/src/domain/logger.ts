/**
 * The slice of `console` the resolvers log through.
 */
export type Logger = Pick<Console, 'debug' | 'warn' | 'error'>;

/**
 * Logger that drops everything. Used when the caller passes none.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

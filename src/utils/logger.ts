/**
 * Console logging for the detectors.
 *
 * `debug` prints only when GAZEDT_DEBUG is set, so library calls stay quiet by default.
 * `warn` reports data problems such as split fixations, except under production and test runs.
 */
function env(key: string): string | undefined {
  return typeof process === 'undefined' ? undefined : process.env?.[key];
}

export const logger = {
  debug: (...args: unknown[]) => {
    if (env('GAZEDT_DEBUG')) console.debug(...args);
  },
  warn: (...args: unknown[]) => {
    const mode = env('NODE_ENV');
    if (mode !== 'production' && mode !== 'test') console.warn(...args);
  },
};

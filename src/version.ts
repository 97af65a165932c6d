/** Package version, appended to the User-Agent header. */
export const VERSION = '0.1.0';

/**
 * Package version, reported by every CLI binary through --version.
 */
export const VERSION = '0.1.0';

import path from 'path';

/**
 * Root of this package's compiled or source tree (`src/` under ts-jest, `dist/` when built).
 * Stack frames under it are library internals and are dropped from synthesized backtraces.
 */
export const LIBRARY_ROOT = path.resolve(__dirname, '..');

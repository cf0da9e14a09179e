/**
 * @comptext/codex
 *
 * The codex knowledge base: entries, the lettered module catalog, search,
 * filters and statistics. No I/O; the runtime host loads codex files.
 */

export type { CodexEntry, CodexModule, CodexStatistics } from './types.js';
export { Codex, DEFAULT_MAX_RESULTS, MAX_SEARCH_RESULTS } from './codex.js';
export { CODEX_MODULES, resolveModule } from './modules.js';
export { CodexError, CodexQueryError } from './errors.js';
export { MAX_QUERY_LENGTH, sanitizeText, truncateText, validateQuery } from './text.js';

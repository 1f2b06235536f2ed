export { PatternCatalog, type PatternMatch } from './catalog.js';
export { DEFAULT_PATTERNS, DEFAULT_REDACTION_MARKER } from './defaults.js';

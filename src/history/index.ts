export { InMemoryHistoryStore, estimateTokens, type HistoryRecord, type HistoryStore } from './store.js';

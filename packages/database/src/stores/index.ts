export { MemoryStatsStore } from './memory-store.js';

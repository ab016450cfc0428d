export { InMemoryItemStore } from './in-memory-item-store.js';

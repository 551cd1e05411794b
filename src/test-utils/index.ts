// Re-export test helpers
export { ManualClock } from './manual-clock';
export { buildTestConfig } from './test-config';
export type { TestDeviceEntry } from './test-config';
export { InMemoryReadingStore } from '../readings/test-utils/in-memory-reading.store';

/**
 * @tbx/test-utils
 *
 * Shared test utilities: probe mocks, statistics builders and fixtures
 */

// Fixture loading
export {
  loadText,
  loadJson,
  getFixturePath,
  STATS_FIXTURE,
} from './fixtures/loader.js';

// Mock services
export {
  createMockProber,
  probeResult,
  probeTable,
  type MockProber,
  type MockProberConfig,
  type ProbeSpec,
} from './mocks/mock-prober.js';

// Builders
export {
  EndgameStatsBuilder,
  endgameStats,
  statsStore,
} from './builders/endgame-stats-builder.js';

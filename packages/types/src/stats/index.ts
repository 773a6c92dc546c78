/**
 * Statistics type exports
 *
 * Re-exports raw and aggregated endgame statistics types from @tbx/core.
 */

export type {
  // Raw store shapes
  TableFileInfo,
  RawLongestEntry,
  RawSideHistogram,
  RawEndgameStats,
  // Aggregated records
  EndgameCounts,
  EndgamePercentages,
  EndgameStatsRecord,
  EndgameSummary,
  HistogramRow,
  SideHistogramRows,
  LongestEntry,
  PositionHistogram,
  StatsWarning,
  HistogramOptions,
} from '@tbx/core';

// Analysis exports
export { formatNumber, formatOrdinal, formatDuration } from './format';
export { possibilities, RunStatistics, introLines, summaryLines } from './Statistics';
export type { SolutionRecord, RunSummary } from './Statistics';

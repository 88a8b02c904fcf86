// Run statistics for the solve command.
// Counters come from the search trace; wall time excludes time spent
// printing solutions.

import { spaces } from '../../board/geometry';
import type { SolveTrace } from '../types';
import { formatDuration, formatNumber, formatOrdinal } from './format';

// n! / (n - k)!
function permutations(n: number, k: number): bigint {
  let result = 1n;
  for (let i = n - k + 1; i <= n; i++) {
    result *= BigInt(i);
  }
  return result;
}

/**
 * Size of the naive search space: every way to put tiles in slots, times
 * three rotations per tile.
 */
export function possibilities(order: number, tileCount: number): bigint {
  const slots = spaces(order);
  const n = Math.max(slots, tileCount);
  const k = Math.min(slots, tileCount);
  return permutations(n, k) * 3n ** BigInt(tileCount);
}

export interface SolutionRecord {
  attempts: number;
  failures: number;
  elapsedSeconds: number;
}

export interface RunSummary {
  elapsedSeconds: number;
  attempts: number;
  failures: number;
  solutionCount: number;
  solutions: SolutionRecord[];
}

export class RunStatistics {
  private readonly clock: () => number;
  private startedAt = 0;
  private excludedMs = 0;
  private readonly records: SolutionRecord[] = [];

  // clock returns milliseconds
  constructor(clock: () => number = () => performance.now()) {
    this.clock = clock;
  }

  start(): void {
    this.startedAt = this.clock();
    this.excludedMs = 0;
    this.records.length = 0;
  }

  // Solving time so far, not counting excluded work
  elapsedSeconds(): number {
    return (this.clock() - this.startedAt - this.excludedMs) / 1000;
  }

  recordSolution(trace: SolveTrace): SolutionRecord {
    const record: SolutionRecord = {
      attempts: trace.attempts,
      failures: trace.failures,
      elapsedSeconds: this.elapsedSeconds()
    };
    this.records.push(record);
    return record;
  }

  // Run work whose time should not count as solving
  exclude<T>(work: () => T): T {
    const before = this.clock();
    try {
      return work();
    } finally {
      this.excludedMs += this.clock() - before;
    }
  }

  finish(trace: SolveTrace): RunSummary {
    return {
      elapsedSeconds: this.elapsedSeconds(),
      attempts: trace.attempts,
      failures: trace.failures,
      solutionCount: this.records.length,
      solutions: [...this.records]
    };
  }
}

// ============= Reports =============

export function introLines(order: number, tileCount: number): string[] {
  return [
    `The puzzle has ${formatNumber(tileCount)} tiles.`,
    `The puzzle has ${formatNumber(spaces(order))} spaces.`,
    `The puzzle has ${formatNumber(possibilities(order, tileCount))} combinations.`
  ];
}

export function summaryLines(summary: RunSummary, totalCombinations: bigint): string[] {
  const { elapsedSeconds, attempts, failures } = summary;
  const lines = [
    `I spent ${formatDuration(elapsedSeconds)} solving the puzzle.`,
    `I tried ${formatNumber(attempts)} combinations.`
  ];

  if (elapsedSeconds > 0) {
    lines.push(`I checked ${formatNumber(attempts / elapsedSeconds)} combinations per second.`);
  }
  if (attempts > 0) {
    const fullSearch = (elapsedSeconds * Number(totalCombinations)) / attempts;
    lines.push(`I would have needed ${formatDuration(fullSearch)} to try all possible combinations.`);
  }

  lines.push(
    `I had ${formatNumber(failures)} failed attempts.`,
    `I found ${formatNumber(summary.solutionCount)} solutions.`
  );

  summary.solutions.forEach((record, i) => {
    lines.push(
      `I found the ${formatOrdinal(i + 1)} solution after ${formatDuration(record.elapsedSeconds)} ` +
      `with ${formatNumber(record.attempts)} tries and ${formatNumber(record.failures)} fails.`
    );
  });

  return lines;
}

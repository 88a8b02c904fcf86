// Exhaustive depth-first search over the first empty slot in row-major order.
//
// The first empty slot is always the most constrained one: everything above
// and to its left is already filled, so a dead end there prunes the branch.

import type { Tile } from '../../tiles/types';
import { ROTATIONS } from '../../tiles/types';
import { rotateTile } from '../../tiles/TileBuilder';
import type { Board } from '../../board/Board';
import type { SearchBranch, SolveTrace, SolverOptions, SolverResult } from '../types';
import { createTrace } from '../types';
import { SolverState, createSolverState } from './SolverState';

export interface SearchOptions {
  trace?: SolveTrace;
  // Epoch milliseconds after which the search stops early
  deadline?: number;
}

interface SearchContext {
  trace: SolveTrace;
  deadline?: number;
}

function isPastDeadline(ctx: SearchContext): boolean {
  if (ctx.deadline !== undefined && Date.now() > ctx.deadline) {
    ctx.trace.timedOut = true;
  }
  return ctx.trace.timedOut;
}

function* search(state: SolverState, ctx: SearchContext): Generator<Board, void, undefined> {
  const { trace } = ctx;
  trace.nodesExplored++;
  trace.maxDepth = Math.max(trace.maxDepth, state.depth);

  if (isPastDeadline(ctx)) return;

  const slot = state.board.firstEmpty();
  if (!slot) {
    trace.solutions++;
    yield state.board.clone();
    return;
  }

  const { row, col } = slot;
  const remaining = state.remaining;

  for (let k = 0; k < remaining.length; k++) {
    for (const rotation of ROTATIONS) {
      const candidate = rotateTile(remaining[k], rotation);
      trace.attempts++;
      if (!state.fitsAt(row, col, candidate)) continue;

      state.apply(row, col, k, candidate);
      try {
        yield* search(state, ctx);
      } finally {
        state.revert(row, col, remaining);
      }

      if (trace.timedOut) return;
    }
  }

  // Every candidate for this slot has been tried
  trace.failures++;
}

/**
 * Lazily enumerate every complete board reachable from `board` with `tiles`.
 * Each yielded board is an independent snapshot. Stopping iteration early
 * releases the search with nothing left behind.
 */
export function* solve(
  board: Board,
  tiles: readonly Tile[],
  options: SearchOptions = {}
): Generator<Board, void, undefined> {
  const ctx: SearchContext = {
    trace: options.trace ?? createTrace(),
    deadline: options.deadline
  };
  yield* search(createSolverState(board, tiles), ctx);
}

/**
 * Split the search at the first empty slot: one independent branch per
 * fitting (tile, rotation). Solving the branches in order gives exactly the
 * solutions of `solve` on the root, in the same order.
 */
export function splitAtFirstSlot(board: Board, tiles: readonly Tile[]): SearchBranch[] {
  const state = createSolverState(board, tiles);
  const slot = state.board.firstEmpty();
  if (!slot) {
    return [state.toBranch()];
  }

  const branches: SearchBranch[] = [];
  const remaining = state.remaining;

  remaining.forEach((tile, k) => {
    for (const rotation of ROTATIONS) {
      const candidate = rotateTile(tile, rotation);
      if (!state.fitsAt(slot.row, slot.col, candidate)) continue;

      state.apply(slot.row, slot.col, k, candidate);
      branches.push(state.toBranch());
      state.revert(slot.row, slot.col, remaining);
    }
  });

  return branches;
}

// Drive the search and collect solutions under the given limits
export function solvePuzzle(board: Board, tiles: readonly Tile[], options: SolverOptions = {}): SolverResult {
  const mode = options.mode ?? 'all';
  const maxSolutions = options.maxSolutions ?? (mode === 'first' ? 1 : Infinity);
  const trace = createTrace();
  const deadline = options.timeoutMs !== undefined ? Date.now() + options.timeoutMs : undefined;

  const solutions: Board[] = [];
  let solutionCount = 0;

  for (const solution of solve(board, tiles, { trace, deadline })) {
    solutionCount++;
    if (mode !== 'count') {
      solutions.push(solution);
    }
    options.onSolution?.(solution, solutionCount, trace);
    if (solutionCount >= maxSolutions) break;
  }

  return { solutions, solutionCount, trace, timedOut: trace.timedOut };
}

// Count solutions (stops at `max`)
export function countSolutions(board: Board, tiles: readonly Tile[], max: number = Infinity): number {
  return solvePuzzle(board, tiles, { mode: 'count', maxSolutions: max }).solutionCount;
}

export function hasUniqueSolution(board: Board, tiles: readonly Tile[]): boolean {
  return countSolutions(board, tiles, 2) === 1;
}

export function isSolvable(board: Board, tiles: readonly Tile[]): boolean {
  return countSolutions(board, tiles, 1) > 0;
}

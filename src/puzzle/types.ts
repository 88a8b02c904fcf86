// Puzzle system types
import type { Face, Figure, Tile } from '../tiles/types';
import type { Board } from '../board/Board';

// ============= Puzzle Types =============

export interface Puzzle {
  // Boundary faces in frame winding order
  boundary: Face[];
  // Tiles to place, in input order
  tiles: Tile[];
}

// On-disk form: face codes only
export interface PuzzleDocument {
  board: string[];
  tiles: string[][];
}

// ============= Validation Types =============

export type ValidationIssue =
  | { kind: 'count-mismatch'; expected: number; actual: number }
  | { kind: 'parity-mismatch'; figure: Figure; upperCount: number; lowerCount: number };

export interface ValidationResult {
  valid: boolean;
  issues: ValidationIssue[];
}

export interface FigureCount {
  upper: number;
  lower: number;
}

// ============= Solver Types =============

export interface SolverOptions {
  mode?: 'first' | 'count' | 'all';  // defaults to 'all'
  maxSolutions?: number;
  timeoutMs?: number;
  // Called once per solution as it is found
  onSolution?: (board: Board, index: number, trace: SolveTrace) => void;
}

// Counters threaded through one search
export interface SolveTrace {
  attempts: number;       // (tile, rotation) candidates tested
  failures: number;       // slots whose candidates were all tried
  nodesExplored: number;
  maxDepth: number;
  solutions: number;
  timedOut: boolean;
}

export interface SolverResult {
  solutions: Board[];
  solutionCount: number;
  trace: SolveTrace;
  timedOut: boolean;
}

// Independent subproblem below one root placement
export interface SearchBranch {
  board: Board;
  tiles: Tile[];
}

export function createTrace(): SolveTrace {
  return {
    attempts: 0,
    failures: 0,
    nodesExplored: 0,
    maxDepth: 0,
    solutions: 0,
    timedOut: false
  };
}

// ============= Generator Types =============

export interface GenerationConfig {
  order: number;
  seed?: string;
  requireUniqueSolution?: boolean;
  maxAttempts?: number;
}

export interface PuzzleWithSolution {
  puzzle: Puzzle;
  solution: Board;
}

// Puzzle System - Types, Validation, Solver, Generator

// Re-export types
export type {
  Puzzle,
  PuzzleDocument,
  ValidationIssue,
  ValidationResult,
  SolverOptions,
  SolverResult,
  SolveTrace,
  SearchBranch,
  GenerationConfig,
  PuzzleWithSolution
} from './types';
export { createTrace } from './types';

export * from './errors';

// Loading API
export {
  parseBoard,
  parseTiles,
  parseBoardText,
  parseTilesText,
  parsePuzzleText,
  puzzleFromDocument,
  puzzleToDocument,
  serializePuzzle,
  loadBoard,
  loadTiles,
  loadPuzzle,
  loadPuzzleFile
} from './io/PuzzleLoader';

// Validation API
export { validatePuzzle, assertValidPuzzle, findEdgeConflicts, isSolvedBoard } from './validation';

// Solver API
export {
  solve,
  solvePuzzle,
  splitAtFirstSlot,
  countSolutions,
  hasUniqueSolution,
  isSolvable
} from './solver';

// Generator API
export { generatePuzzle, buildSolution, derivePuzzle } from './generator';

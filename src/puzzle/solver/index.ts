// Solver exports
export { SolverState, createSolverState, withoutIndex } from './SolverState';
export {
  solve,
  solvePuzzle,
  splitAtFirstSlot,
  countSolutions,
  hasUniqueSolution,
  isSolvable
} from './Backtracker';
export type { SearchOptions } from './Backtracker';

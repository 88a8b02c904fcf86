// Validation exports
export {
  validatePuzzle,
  assertValidPuzzle,
  figureCounts,
  issueToError,
  findEdgeConflicts,
  isSolvedBoard
} from './ConsistencyValidator';
export type { EdgeConflict } from './ConsistencyValidator';

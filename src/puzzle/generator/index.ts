// Generator exports
export { buildSolution } from './SolutionBuilder';
export { derivePuzzle } from './PuzzleDeriver';

import type { GenerationConfig, PuzzleWithSolution } from '../types';
import { buildFrame } from '../../board/Board';
import { hasUniqueSolution } from '../solver';
import { createRandom } from '../utils/random';
import { buildSolution } from './SolutionBuilder';
import { derivePuzzle } from './PuzzleDeriver';

export interface GenerationOutcome {
  result: PuzzleWithSolution | null;
  attempts: number;
}

// Generate a puzzle together with the board it was derived from.
// Without a uniqueness requirement the first attempt always succeeds.
export function generatePuzzle(config: GenerationConfig): GenerationOutcome {
  const random = createRandom(config.seed);
  const maxAttempts = config.requireUniqueSolution ? config.maxAttempts ?? 50 : 1;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const solution = buildSolution(config.order, random);
    const puzzle = derivePuzzle(solution, random);

    if (config.requireUniqueSolution && !hasUniqueSolution(buildFrame(config.order, puzzle.boundary), puzzle.tiles)) {
      continue;
    }

    return { result: { puzzle, solution }, attempts: attempt };
  }

  return { result: null, attempts: maxAttempts };
}

// Puzzle Deriver - turns a solved board into a puzzle.
// The boundary is read back in winding order; the tiles are randomly
// rotated and shuffled so the solver has to rediscover the placement.

import { rotateTile } from '../../tiles/TileBuilder';
import type { Board } from '../../board/Board';
import type { Puzzle } from '../types';
import type { Random } from '../utils/random';
import { randomInt, shuffle } from '../utils/random';

export function derivePuzzle(solution: Board, random: Random): Puzzle {
  const tiles = solution.placedTiles().map(tile => rotateTile(tile, randomInt(random, 0, 2)));
  return {
    boundary: solution.frameFaces(),
    tiles: shuffle(random, tiles)
  };
}

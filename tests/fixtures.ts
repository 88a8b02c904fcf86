// Small order-1 puzzles shared by the tests
import { buildFrame } from '../src/board/Board';
import type { Board } from '../src/board/Board';
import type { Tile } from '../src/tiles/types';
import { parseFace, parseTile } from '../src/tiles/TileBuilder';

export interface Fixture {
  board: Board;
  tiles: Tile[];
}

function fixture(boundary: string[], tiles: string[][]): Fixture {
  return {
    board: buildFrame(1, boundary.map(parseFace)),
    tiles: tiles.map(parseTile)
  };
}

// Exactly one solution; tiles are rotated and shuffled
export const UNIQUE_BOUNDARY = ['1u', '6u', '3l', '4l', '2l', '5l'];
export const UNIQUE_TILES = [
  ['6u', '4l', '3u'],
  ['1l', '1u', '2u'],
  ['5l', '6l', '4u'],
  ['4u', '1l', '6l'],
  ['2u', '3l', '5u'],
  ['3u', '5u', '2l']
];

export function uniquePuzzle(): Fixture {
  return fixture(UNIQUE_BOUNDARY, UNIQUE_TILES);
}

// The placed tiles of the unique solution, by slot
export const UNIQUE_SOLUTION: Array<[number, number, string]> = [
  [1, 1, '1l 1u 2u'],
  [2, 0, '3u 5u 2l'],
  [2, 1, '4u 1l 6l'],
  [3, 0, '3l 5u 2u'],
  [3, 1, '4l 3u 6u'],
  [4, 1, '4u 5l 6l']
];

// Two identical tiles, so the same board is found twice
export function twinPuzzle(): Fixture {
  return fixture(
    ['5u', '2u', '6u', '5u', '6l', '1u'],
    [
      ['5l', '4l', '4l'],
      ['3u', '1l', '2l'],
      ['3l', '6l', '4u'],
      ['5l', '1u', '2u'],
      ['3u', '1l', '2l'],
      ['3l', '4u', '6u']
    ]
  );
}

// Balanced figure counts, but one tile is a mirror image and cannot fit
export function unsolvablePuzzle(): Fixture {
  const tiles = UNIQUE_TILES.map(codes => [...codes]);
  tiles[2] = ['4u', '6l', '5l'];
  return fixture(UNIQUE_BOUNDARY, tiles);
}

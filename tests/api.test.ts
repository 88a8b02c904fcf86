import { describe, expect, it } from 'vitest';
import {
  MalformedBoardError,
  PuzzleError,
  assertValidPuzzle,
  parsePuzzleText,
  solvePuzzle
} from '../src/puzzle';
import { buildFrame } from '../src/board/Board';
import { renderBoard } from '../src/tiles/renderer';
import { UNIQUE_BOUNDARY, UNIQUE_TILES } from './fixtures';

describe('puzzle API', () => {
  it('goes from puzzle text to a printed solution', () => {
    const puzzle = parsePuzzleText(JSON.stringify({ board: UNIQUE_BOUNDARY, tiles: UNIQUE_TILES }));
    const board = buildFrame(1, puzzle.boundary);
    assertValidPuzzle(board, puzzle.tiles);

    const { solutions } = solvePuzzle(board, puzzle.tiles);
    expect(solutions).toHaveLength(1);
    expect(renderBoard(solutions[0]).split('\n')[0]).toBe(`${' '.repeat(16)}/-- 4l --\\`);
  });

  it('raises every puzzle problem as a PuzzleError', () => {
    let caught: unknown;
    try {
      parsePuzzleText(JSON.stringify({ board: ['1u'], tiles: [] }));
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(MalformedBoardError);
    expect(caught).toBeInstanceOf(PuzzleError);
    expect(caught).toMatchObject({ kind: 'malformed-board', name: 'MalformedBoardError', faceCount: 1 });
  });
});

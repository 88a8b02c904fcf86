// Errors raised while loading, validating or laying out a puzzle.
// The solver itself never throws: an unsolvable puzzle has no solutions.

import type { Figure } from '../tiles/types';

export type PuzzleErrorKind =
  | 'malformed-face'
  | 'malformed-tile'
  | 'malformed-board'
  | 'count-mismatch'
  | 'parity-mismatch'
  | 'geometry'
  | 'puzzle-file';

export abstract class PuzzleError extends Error {
  abstract readonly kind: PuzzleErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MalformedFaceError extends PuzzleError {
  readonly kind = 'malformed-face';

  constructor(readonly code: string) {
    super(`Malformed face: ${code}`);
  }
}

export class MalformedTileError extends PuzzleError {
  readonly kind = 'malformed-tile';

  constructor(readonly codes: readonly string[]) {
    super(`Malformed tile: [${codes.join(', ')}]`);
  }
}

export class MalformedBoardError extends PuzzleError {
  readonly kind = 'malformed-board';

  constructor(readonly faceCount: number) {
    super(`Malformed board: ${faceCount} boundary faces (expected a positive multiple of 6)`);
  }
}

export class CountMismatchError extends PuzzleError {
  readonly kind = 'count-mismatch';

  constructor(readonly expected: number, readonly actual: number) {
    super(`Malformed game: ${actual} tiles for ${expected} spaces.`);
  }
}

export class ParityMismatchError extends PuzzleError {
  readonly kind = 'parity-mismatch';

  constructor(readonly figure: Figure, readonly upperCount: number, readonly lowerCount: number) {
    super(`Malformed game: Figure ${figure} has ${lowerCount} lower and ${upperCount} upper parts.`);
  }
}

export class GeometryError extends PuzzleError {
  readonly kind = 'geometry';
}

export class PuzzleFileError extends PuzzleError {
  readonly kind = 'puzzle-file';

  constructor(readonly source: string, detail: string) {
    super(`${source}: ${detail}`);
  }
}

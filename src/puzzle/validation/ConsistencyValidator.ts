import type { Face, Figure, Tile } from '../../tiles/types';
import { FIGURES } from '../../tiles/types';
import { fits, tileFaces } from '../../tiles/TileBuilder';
import type { Board } from '../../board/Board';
import type { SlotRef } from '../../board/geometry';
import type { FigureCount, ValidationIssue, ValidationResult } from '../types';
import { CountMismatchError, ParityMismatchError } from '../errors';

// Upper/lower tally per figure over the frame and every tile face
export function figureCounts(board: Board, tiles: readonly Tile[]): Map<Figure, FigureCount> {
  const counts = new Map<Figure, FigureCount>();
  for (const figure of FIGURES) {
    counts.set(figure, { upper: 0, lower: 0 });
  }

  const faces: Face[] = [...board.frameFaces(), ...tiles.flatMap(tileFaces)];
  for (const face of faces) {
    const count = counts.get(face.figure);
    if (!count) continue;
    if (face.orientation === 'upper') {
      count.upper++;
    } else {
      count.lower++;
    }
  }

  return counts;
}

/**
 * Check that a tile multiset can fill a board at all.
 * Reports a count mismatch first, then every figure whose upper and lower
 * halves do not pair up, in figure order.
 */
export function validatePuzzle(board: Board, tiles: readonly Tile[]): ValidationResult {
  const issues: ValidationIssue[] = [];

  const expected = board.interiorCount();
  if (tiles.length !== expected) {
    issues.push({ kind: 'count-mismatch', expected, actual: tiles.length });
  }

  for (const [figure, count] of figureCounts(board, tiles)) {
    if (count.upper !== count.lower) {
      issues.push({
        kind: 'parity-mismatch',
        figure,
        upperCount: count.upper,
        lowerCount: count.lower
      });
    }
  }

  return { valid: issues.length === 0, issues };
}

export function issueToError(issue: ValidationIssue): CountMismatchError | ParityMismatchError {
  switch (issue.kind) {
    case 'count-mismatch':
      return new CountMismatchError(issue.expected, issue.actual);
    case 'parity-mismatch':
      return new ParityMismatchError(issue.figure, issue.upperCount, issue.lowerCount);
  }
}

// Throw the first issue found, if any
export function assertValidPuzzle(board: Board, tiles: readonly Tile[]): void {
  const [first] = validatePuzzle(board, tiles).issues;
  if (first) {
    throw issueToError(first);
  }
}

// ============= Placed board checks =============

export interface EdgeConflict {
  row: number;
  col: number;
  neighbor: SlotRef;
  face: Face;
  neighborFace: Face;
}

// Every filled interior edge whose neighbour shows a face that does not fit
export function findEdgeConflicts(board: Board): EdgeConflict[] {
  const conflicts: EdgeConflict[] = [];

  for (const { row, col } of board.interiorPositions()) {
    const tile = board.tileAt(row, col);
    if (!tile) continue;

    for (const neighbor of board.neighbors(row, col)) {
      const neighborFace = board.faceAt(neighbor.row, neighbor.col, neighbor.edge);
      const face = tile[neighbor.edge];
      if (neighborFace && !fits(face, neighborFace)) {
        conflicts.push({ row, col, neighbor, face, neighborFace });
      }
    }
  }

  return conflicts;
}

// A complete board with every edge matched
export function isSolvedBoard(board: Board): boolean {
  return board.isComplete() && findEdgeConflicts(board).length === 0;
}

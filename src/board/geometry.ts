// Hexagram board geometry.
//
// A board of order s has 2 + 4s rows of triangles. Triangles alternate
// pointing up and down with the row parity, and the star is mirrored about
// the waist row 2s, where the column offset of neighbours changes sign.

import type { Edge } from '../tiles/types';
import { GeometryError } from '../puzzle/errors';

// A slot position plus the edge through which it is reached
export interface SlotRef {
  row: number;
  col: number;
  edge: Edge;
}

export interface SlotPosition {
  row: number;
  col: number;
}

function assertOrder(order: number): void {
  if (!Number.isInteger(order) || order < 1) {
    throw new GeometryError(`Board order must be a positive integer, got ${order}`);
  }
}

/**
 * Row lengths of the board, first row first.
 * s, (s+2, s+1), (s+3, s+2), …, (2s+1, 2s), then the same sequence mirrored.
 */
export function rowLengths(order: number): number[] {
  assertOrder(order);
  const upper: number[] = [order];
  for (let l = order; l < 2 * order; l++) {
    upper.push(l + 2, l + 1);
  }
  return [...upper, ...[...upper].reverse()];
}

// Number of interior (fillable) slots
export function spaces(order: number): number {
  return 6 * order * order;
}

// Number of boundary faces the frame winding consumes
export function boundaryLength(order: number): number {
  return 6 * order;
}

export function waistRow(order: number): number {
  return 2 * order;
}

// Order of the board a boundary of this many faces belongs to, if any
export function orderForBoundary(length: number): number | null {
  if (!Number.isInteger(length) || length < 6 || length % 6 !== 0) return null;
  return length / 6;
}

export function isOnBoard(order: number, row: number, col: number): boolean {
  const lengths = rowLengths(order);
  return row >= 0 && row < lengths.length && col >= 0 && col < lengths[row];
}

// ============= Frame winding =============

export interface FrameAnchor extends SlotPosition {
  edge: Edge;
}

/**
 * Frame anchors in the order boundary faces are consumed: top edge, upper
 * right, lower right, bottom (right to left), lower left, upper left.
 */
export function frameAnchors(order: number): FrameAnchor[] {
  const lengths = rowLengths(order);
  const last = lengths.length - 1;
  const waist = waistRow(order);
  const anchors: FrameAnchor[] = [];

  for (let col = 0; col < lengths[0]; col++) {
    anchors.push({ row: 0, col, edge: 'base' });
  }
  for (let row = 1; row < waist; row += 2) {
    anchors.push({ row, col: lengths[row] - 1, edge: 'left' });
  }
  for (let row = waist + 2; row <= 4 * order; row += 2) {
    anchors.push({ row, col: lengths[row] - 1, edge: 'right' });
  }
  for (let col = lengths[last] - 1; col >= 0; col--) {
    anchors.push({ row: last, col, edge: 'base' });
  }
  for (let row = 4 * order; row > waist + 1; row -= 2) {
    anchors.push({ row, col: 0, edge: 'left' });
  }
  for (let row = waist - 1; row > 0; row -= 2) {
    anchors.push({ row, col: 0, edge: 'right' });
  }

  return anchors;
}

// Interior (fillable) slots in row-major order
export function interiorPositions(order: number): SlotPosition[] {
  const frame = new Set(frameAnchors(order).map(a => `${a.row},${a.col}`));
  const positions: SlotPosition[] = [];
  rowLengths(order).forEach((length, row) => {
    for (let col = 0; col < length; col++) {
      if (!frame.has(`${row},${col}`)) positions.push({ row, col });
    }
  });
  return positions;
}

// ============= Adjacency =============

/**
 * The three neighbours of a slot, in base, right, left order.
 * Each neighbour is matched through its own edge of the same name.
 */
export function neighbors(order: number, row: number, col: number): SlotRef[] {
  if (!isOnBoard(order, row, col)) {
    throw new GeometryError(`Slot (${row}, ${col}) is not on a board of order ${order}`);
  }

  const off = row % 2 === 1 ? -1 : 1;
  const waist = waistRow(order);

  let baseCol: number;
  if (row < waist) {
    baseCol = col + off;
  } else if (row > waist + 1) {
    baseCol = col - off;
  } else {
    baseCol = col;
  }

  return [
    { row: row + off, col: baseCol, edge: 'base' },
    { row: row - off, col: row <= waist ? col : col - off, edge: 'right' },
    { row: row - off, col: row <= waist ? col + off : col, edge: 'left' }
  ];
}

// Text rendering of tiles and boards.
//
// Odd rows hold upward triangles, drawn "/left base right\", even rows hold
// downward ones, drawn "\right base left/". The board is printed last row
// first so the star reads the right way up.

import type { Face, Tile } from './types';
import { faceCode } from './TileBuilder';
import type { Board } from '../board/Board';

const INDENT_UNIT = ' '.repeat(8);
const SLOT_GAP = ' '.repeat(6);
const EMPTY_SLOT = ' '.repeat(10);

interface EdgeFaces {
  base: Face | null;
  right: Face | null;
  left: Face | null;
}

export function faceLabel(face: Face | null): string {
  return face ? faceCode(face) : '--';
}

function edgesLabel(faces: EdgeFaces, row: number): string {
  const base = faceLabel(faces.base);
  const right = faceLabel(faces.right);
  const left = faceLabel(faces.left);
  return row % 2 === 1 ? `/${left} ${base} ${right}\\` : `\\${right} ${base} ${left}/`;
}

export function tileLabel(tile: Tile | null, row: number = 1): string {
  return tile ? edgesLabel(tile, row) : EMPTY_SLOT;
}

// A frame slot shows only its anchored face
export function slotLabel(board: Board, row: number, col: number): string {
  const slot = board.slotAt(row, col);
  if (!slot) return EMPTY_SLOT;
  if (slot.kind === 'interior') return tileLabel(slot.tile, row);
  return edgesLabel(
    {
      base: board.faceAt(row, col, 'base'),
      right: board.faceAt(row, col, 'right'),
      left: board.faceAt(row, col, 'left')
    },
    row
  );
}

/**
 * Indentation (in units of eight spaces) of each printed line, top line first.
 */
export function lineOffsets(order: number): number[] {
  const offsets: number[] = [order + 1];
  for (let i = 0; i < order; i++) {
    offsets.push(order - 1 - i, order - i);
  }
  for (let i = 0; i < order; i++) {
    offsets.push(i + 1, i);
  }
  offsets.push(order + 1);
  return offsets;
}

export function renderBoardLines(board: Board): string[] {
  const offsets = lineOffsets(board.order);
  const lines: string[] = [];

  for (let row = board.rows.length - 1, line = 0; row >= 0; row--, line++) {
    const labels = board.rows[row].map((_, col) => slotLabel(board, row, col));
    lines.push(INDENT_UNIT.repeat(offsets[line]) + labels.join(SLOT_GAP));
  }

  return lines;
}

export function renderBoard(board: Board): string {
  return renderBoardLines(board).join('\n');
}

export function renderTiles(tiles: readonly Tile[]): string {
  return tiles.map(tile => tileLabel(tile)).join('\n');
}

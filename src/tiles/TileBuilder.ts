// Face codes, tile construction and rotation.
// Tiles are plain immutable values: rotating returns a new tile, so a rotated
// copy stored on the board never shares state with the tile it came from.

import type { Edge, Face, FaceCode, Figure, Orientation, Rotation, Tile } from './types';
import { FIGURES, ROTATIONS } from './types';
import { MalformedFaceError, MalformedTileError } from '../puzzle/errors';

const FACE_PATTERN = /^([1-6])([lu])$/i;

function isFigure(value: number): value is Figure {
  return FIGURES.some(f => f === value);
}

// ============= Faces =============

export function createFace(figure: Figure, orientation: Orientation): Face {
  return { figure, orientation };
}

export function parseFace(code: FaceCode): Face {
  const match = FACE_PATTERN.exec(code);
  if (!match) {
    throw new MalformedFaceError(code);
  }
  const figure = Number(match[1]);
  if (!isFigure(figure)) {
    throw new MalformedFaceError(code);
  }
  const orientation: Orientation = match[2].toLowerCase() === 'u' ? 'upper' : 'lower';
  return createFace(figure, orientation);
}

export function faceCode(face: Face): FaceCode {
  return `${face.figure}${face.orientation === 'upper' ? 'u' : 'l'}`;
}

// The other half of a face's picture
export function counterpart(face: Face): Face {
  return createFace(face.figure, face.orientation === 'upper' ? 'lower' : 'upper');
}

// Two faces fit when they show opposite halves of the same figure
export function fits(a: Face, b: Face): boolean {
  return a.figure === b.figure && a.orientation !== b.orientation;
}

export function facesEqual(a: Face, b: Face): boolean {
  return a.figure === b.figure && a.orientation === b.orientation;
}

// ============= Tiles =============

export function createTile(base: Face, right: Face, left: Face): Tile {
  return { base, right, left };
}

// Parse a tile from its three face codes in base, right, left order
export function parseTile(codes: readonly FaceCode[]): Tile {
  if (codes.length !== 3) {
    throw new MalformedTileError(codes);
  }
  const [base, right, left] = codes.map(parseFace);
  return createTile(base, right, left);
}

export function tileEdge(tile: Tile, edge: Edge): Face {
  return tile[edge];
}

export function tileFaces(tile: Tile): [Face, Face, Face] {
  return [tile.base, tile.right, tile.left];
}

export function tileCode(tile: Tile): string {
  return tileFaces(tile).map(faceCode).join(' ');
}

export function tilesEqual(a: Tile, b: Tile): boolean {
  return facesEqual(a.base, b.base) && facesEqual(a.right, b.right) && facesEqual(a.left, b.left);
}

function normalizeRotation(amount: number): Rotation {
  const r = ((Math.trunc(amount) % 3) + 3) % 3;
  return r === 1 ? 1 : r === 2 ? 2 : 0;
}

/**
 * Rotate a tile by `amount` steps of 120°.
 * One step moves the left face to the base, the base face to the right and
 * the right face to the left; two steps is the inverse.
 */
export function rotateTile(tile: Tile, amount: number = 1): Tile {
  switch (normalizeRotation(amount)) {
    case 1:
      return createTile(tile.left, tile.base, tile.right);
    case 2:
      return createTile(tile.right, tile.left, tile.base);
    default:
      return createTile(tile.base, tile.right, tile.left);
  }
}

// All three orientations of a tile, in rotation order 0, 1, 2
export function tileRotations(tile: Tile): Tile[] {
  return ROTATIONS.map(rotation => rotateTile(tile, rotation));
}

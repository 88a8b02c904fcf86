// Face and tile model shared by the board, solver and renderer

// Which picture a face carries
export type Figure = 1 | 2 | 3 | 4 | 5 | 6;

// Upper and lower halves of one figure fit together
export type Orientation = 'upper' | 'lower';

// Edge positions on a triangle
export type Edge = 'base' | 'right' | 'left';

// Rotation steps of 120°
export type Rotation = 0 | 1 | 2;

export interface Face {
  readonly figure: Figure;
  readonly orientation: Orientation;
}

// A physical triangle: one face per edge position
export interface Tile {
  readonly base: Face;
  readonly right: Face;
  readonly left: Face;
}

// Face code format: "<figure><u|l>", e.g. "3u"
export type FaceCode = string;

export const FIGURES: readonly Figure[] = [1, 2, 3, 4, 5, 6];
export const ORIENTATIONS: readonly Orientation[] = ['upper', 'lower'];
export const EDGES: readonly Edge[] = ['base', 'right', 'left'];
export const ROTATIONS: readonly Rotation[] = [0, 1, 2];

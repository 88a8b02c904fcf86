import type { Edge, Face, Tile } from '../tiles/types';
import { tileEdge } from '../tiles/TileBuilder';
import { GeometryError } from '../puzzle/errors';
import type { SlotPosition, SlotRef } from './geometry';
import { boundaryLength, frameAnchors, neighbors, rowLengths } from './geometry';

// Fixed boundary face anchored at one edge; never filled by the search
export interface FrameSlot {
  readonly kind: 'frame';
  readonly edge: Edge;
  readonly face: Face;
}

// Fillable slot holding one rotated tile, or null while empty
export interface InteriorSlot {
  readonly kind: 'interior';
  readonly tile: Tile | null;
}

export type Slot = FrameSlot | InteriorSlot;

const EMPTY: InteriorSlot = { kind: 'interior', tile: null };

export class Board {
  readonly order: number;
  private slots: Slot[][];

  private constructor(order: number, slots: Slot[][]) {
    this.order = order;
    this.slots = slots;
  }

  // Build the initial board: frame fixed, interior empty
  static fromBoundary(order: number, boundary: readonly Face[]): Board {
    const lengths = rowLengths(order);
    const expected = boundaryLength(order);
    if (boundary.length !== expected) {
      throw new GeometryError(
        `A board of order ${order} needs ${expected} boundary faces, got ${boundary.length}`
      );
    }

    const slots: Slot[][] = lengths.map(length => new Array<Slot>(length).fill(EMPTY));
    frameAnchors(order).forEach((anchor, i) => {
      slots[anchor.row][anchor.col] = { kind: 'frame', edge: anchor.edge, face: boundary[i] };
    });

    return new Board(order, slots);
  }

  get rows(): ReadonlyArray<ReadonlyArray<Slot>> {
    return this.slots;
  }

  slotAt(row: number, col: number): Slot | undefined {
    return this.slots[row]?.[col];
  }

  tileAt(row: number, col: number): Tile | null {
    const slot = this.slotAt(row, col);
    return slot?.kind === 'interior' ? slot.tile : null;
  }

  // Face showing through `edge` of a slot: the tile's face, or the frame face
  // when the frame is anchored at that edge
  faceAt(row: number, col: number, edge: Edge): Face | null {
    const slot = this.slotAt(row, col);
    if (!slot) return null;
    if (slot.kind === 'frame') {
      return slot.edge === edge ? slot.face : null;
    }
    return slot.tile ? tileEdge(slot.tile, edge) : null;
  }

  neighbors(row: number, col: number): SlotRef[] {
    return neighbors(this.order, row, col);
  }

  place(row: number, col: number, tile: Tile): void {
    this.assertInterior(row, col);
    this.slots[row][col] = { kind: 'interior', tile };
  }

  clear(row: number, col: number): void {
    this.assertInterior(row, col);
    this.slots[row][col] = EMPTY;
  }

  // First empty interior slot in row-major order
  firstEmpty(): SlotPosition | null {
    for (let row = 0; row < this.slots.length; row++) {
      const line = this.slots[row];
      for (let col = 0; col < line.length; col++) {
        const slot = line[col];
        if (slot.kind === 'interior' && slot.tile === null) {
          return { row, col };
        }
      }
    }
    return null;
  }

  isComplete(): boolean {
    return this.firstEmpty() === null;
  }

  interiorPositions(): SlotPosition[] {
    const positions: SlotPosition[] = [];
    this.slots.forEach((line, row) => {
      line.forEach((slot, col) => {
        if (slot.kind === 'interior') positions.push({ row, col });
      });
    });
    return positions;
  }

  interiorCount(): number {
    return this.interiorPositions().length;
  }

  // Boundary faces in winding order
  frameFaces(): Face[] {
    const faces: Face[] = [];
    for (const anchor of frameAnchors(this.order)) {
      const slot = this.slots[anchor.row][anchor.col];
      if (slot.kind === 'frame') faces.push(slot.face);
    }
    return faces;
  }

  placedTiles(): Tile[] {
    const tiles: Tile[] = [];
    for (const line of this.slots) {
      for (const slot of line) {
        if (slot.kind === 'interior' && slot.tile) tiles.push(slot.tile);
      }
    }
    return tiles;
  }

  // Slot objects are immutable, so copying the rows is enough
  clone(): Board {
    return new Board(this.order, this.slots.map(line => [...line]));
  }

  private assertInterior(row: number, col: number): void {
    const slot = this.slotAt(row, col);
    if (slot?.kind !== 'interior') {
      throw new GeometryError(`Slot (${row}, ${col}) is not an interior slot`);
    }
  }
}

// Build the starting board for a boundary of the given order
export function buildFrame(order: number, boundary: readonly Face[]): Board {
  return Board.fromBoundary(order, boundary);
}

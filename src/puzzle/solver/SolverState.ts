// Solver state: the board being filled and the tiles not yet placed.
// The state owns a private copy of the board; callers' boards are never touched.

import type { Tile } from '../../tiles/types';
import { fits } from '../../tiles/TileBuilder';
import type { Board } from '../../board/Board';
import type { SearchBranch } from '../types';

export class SolverState {
  readonly board: Board;

  // Remaining tiles, in input order. Replaced (never mutated) on each placement.
  remaining: readonly Tile[];

  depth = 0;

  constructor(board: Board, tiles: readonly Tile[]) {
    this.board = board.clone();
    this.remaining = [...tiles];
  }

  // Check a tile against every neighbour that already shows a face on the shared edge
  fitsAt(row: number, col: number, tile: Tile): boolean {
    for (const neighbor of this.board.neighbors(row, col)) {
      const face = this.board.faceAt(neighbor.row, neighbor.col, neighbor.edge);
      if (face && !fits(tile[neighbor.edge], face)) {
        return false;
      }
    }
    return true;
  }

  // Place a rotated tile taken from `index` of the remaining tiles
  apply(row: number, col: number, index: number, tile: Tile): void {
    this.board.place(row, col, tile);
    this.remaining = withoutIndex(this.remaining, index);
    this.depth++;
  }

  // Undo a placement, restoring the remaining tiles seen before it
  revert(row: number, col: number, remaining: readonly Tile[]): void {
    this.board.clear(row, col);
    this.remaining = remaining;
    this.depth--;
  }

  toBranch(): SearchBranch {
    return { board: this.board.clone(), tiles: [...this.remaining] };
  }
}

export function withoutIndex<T>(items: readonly T[], index: number): T[] {
  return [...items.slice(0, index), ...items.slice(index + 1)];
}

export function createSolverState(board: Board, tiles: readonly Tile[]): SolverState {
  return new SolverState(board, tiles);
}

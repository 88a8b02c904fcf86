// Solution Builder - fills a whole board with matching faces.
// Every shared edge gets a random face on one side and its counterpart on
// the other, so the resulting board is a solution by construction.

import type { Edge, Face } from '../../tiles/types';
import { FIGURES, ORIENTATIONS } from '../../tiles/types';
import { counterpart, createFace, createTile } from '../../tiles/TileBuilder';
import { Board } from '../../board/Board';
import { frameAnchors, interiorPositions, neighbors } from '../../board/geometry';
import { GeometryError } from '../errors';
import type { Random } from '../utils/random';
import { randomChoice } from '../utils/random';

function slotKey(row: number, col: number, edge?: Edge): string {
  return edge ? `${row},${col},${edge}` : `${row},${col}`;
}

function randomFace(random: Random): Face {
  return createFace(randomChoice(random, FIGURES), randomChoice(random, ORIENTATIONS));
}

export function buildSolution(order: number, random: Random): Board {
  const anchors = frameAnchors(order);
  const anchorIndex = new Map(anchors.map((a, i) => [slotKey(a.row, a.col), i]));
  const positions = interiorPositions(order);

  const faces = new Map<string, Face>();
  const boundary: (Face | undefined)[] = new Array(anchors.length).fill(undefined);

  for (const { row, col } of positions) {
    for (const neighbor of neighbors(order, row, col)) {
      const key = slotKey(row, col, neighbor.edge);
      if (faces.has(key)) continue;

      const face = randomFace(random);
      faces.set(key, face);

      const frameIndex = anchorIndex.get(slotKey(neighbor.row, neighbor.col));
      if (frameIndex !== undefined) {
        boundary[frameIndex] = counterpart(face);
      } else {
        faces.set(slotKey(neighbor.row, neighbor.col, neighbor.edge), counterpart(face));
      }
    }
  }

  const frame = boundary.filter((face): face is Face => face !== undefined);
  if (frame.length !== anchors.length) {
    throw new GeometryError(`Frame of order ${order} has slots no interior slot touches`);
  }

  const board = Board.fromBoundary(order, frame);
  for (const { row, col } of positions) {
    const face = (edge: Edge): Face => {
      const found = faces.get(slotKey(row, col, edge));
      if (!found) {
        throw new GeometryError(`No face assigned to ${edge} of slot (${row}, ${col})`);
      }
      return found;
    };
    board.place(row, col, createTile(face('base'), face('right'), face('left')));
  }

  return board;
}

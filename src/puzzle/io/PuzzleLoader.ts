// Puzzle files: YAML (or JSON, which YAML reads too) lists of face codes,
// checked with zod before parsing.
//
//   board.yaml   [1u, 6u, 3l, ...]                       boundary in winding order
//   tiles.yaml   - [1l, 1u, 2u]                          base, right, left
//   puzzle.json  { "board": [...], "tiles": [[...], ...] }

import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { Face, Tile } from '../../tiles/types';
import { faceCode, parseFace, parseTile, tileFaces } from '../../tiles/TileBuilder';
import { orderForBoundary } from '../../board/geometry';
import type { Puzzle, PuzzleDocument } from '../types';
import { MalformedBoardError, PuzzleFileError } from '../errors';

const faceCodeSchema = z.string();
export const boardSchema = z.array(faceCodeSchema);
export const tilesSchema = z.array(z.array(faceCodeSchema));
export const puzzleDocumentSchema = z.object({
  board: boardSchema,
  tiles: tilesSchema
});

// ============= Parsing =============

// Boundary faces; the count must fit a whole board order
export function parseBoard(codes: readonly string[]): Face[] {
  if (orderForBoundary(codes.length) === null) {
    throw new MalformedBoardError(codes.length);
  }
  return codes.map(parseFace);
}

export function parseTiles(entries: readonly (readonly string[])[]): Tile[] {
  return entries.map(parseTile);
}

export function puzzleFromDocument(document: PuzzleDocument): Puzzle {
  return {
    boundary: parseBoard(document.board),
    tiles: parseTiles(document.tiles)
  };
}

export function puzzleToDocument(puzzle: Puzzle): PuzzleDocument {
  return {
    board: puzzle.boundary.map(faceCode),
    tiles: puzzle.tiles.map(tile => tileFaces(tile).map(faceCode))
  };
}

export function serializePuzzle(puzzle: Puzzle): string {
  return `${JSON.stringify(puzzleToDocument(puzzle), null, 2)}\n`;
}

// ============= Decoding =============

function readDocument(text: string, source: string): unknown {
  try {
    return parseYaml(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new PuzzleFileError(source, `cannot parse (${detail})`);
  }
}

export function decode<T>(schema: z.ZodType<T>, value: unknown, source: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : 'root';
    throw new PuzzleFileError(source, `${where}: ${issue.message}`);
  }
  return result.data;
}

export function parseBoardText(text: string, source = 'board'): Face[] {
  return parseBoard(decode(boardSchema, readDocument(text, source), source));
}

export function parseTilesText(text: string, source = 'tiles'): Tile[] {
  return parseTiles(decode(tilesSchema, readDocument(text, source), source));
}

export function parsePuzzleText(text: string, source = 'puzzle'): Puzzle {
  return puzzleFromDocument(decode(puzzleDocumentSchema, readDocument(text, source), source));
}

// ============= Files =============

export interface PuzzlePaths {
  boardPath: string;
  tilesPath: string;
}

async function readSource(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new PuzzleFileError(path, `cannot read file (${detail})`);
  }
}

export async function loadBoard(path: string): Promise<Face[]> {
  return parseBoardText(await readSource(path), path);
}

export async function loadTiles(path: string): Promise<Tile[]> {
  return parseTilesText(await readSource(path), path);
}

// Load separate board and tile files
export async function loadPuzzle(paths: PuzzlePaths): Promise<Puzzle> {
  const [tiles, boundary] = await Promise.all([loadTiles(paths.tilesPath), loadBoard(paths.boardPath)]);
  return { boundary, tiles };
}

// Load a combined puzzle file
export async function loadPuzzleFile(path: string): Promise<Puzzle> {
  return parsePuzzleText(await readSource(path), path);
}

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { faceCode, tileCode } from '../src/tiles/TileBuilder';
import {
  loadBoard,
  loadPuzzle,
  loadPuzzleFile,
  parseBoard,
  parseBoardText,
  parsePuzzleText,
  parseTiles,
  parseTilesText,
  puzzleToDocument,
  serializePuzzle
} from '../src/puzzle/io/PuzzleLoader';
import {
  MalformedBoardError,
  MalformedFaceError,
  MalformedTileError,
  PuzzleFileError
} from '../src/puzzle/errors';
import { UNIQUE_BOUNDARY, UNIQUE_TILES } from './fixtures';

const dataDir = fileURLToPath(new URL('../data/', import.meta.url));

describe('parsing', () => {
  it('parses boards and tiles', () => {
    expect(parseBoard(UNIQUE_BOUNDARY).map(faceCode)).toEqual(UNIQUE_BOUNDARY);
    expect(parseTiles([['1L', '2u', '3U']]).map(tileCode)).toEqual(['1l 2u 3u']);
  });

  it('rejects a boundary that fits no board', () => {
    expect(() => parseBoard(['1u', '1l', '2u', '2l', '3u'])).toThrow(MalformedBoardError);
    expect(() => parseBoard([])).toThrow(MalformedBoardError);
  });

  it('rejects bad faces and tiles', () => {
    expect(() => parseBoard(['1u', '1l', '2u', '2l', '3u', 'x'])).toThrow(MalformedFaceError);
    expect(() => parseTiles([['1u', '2l']])).toThrow(MalformedTileError);
  });

  it('reads YAML lists as well as JSON', () => {
    expect(parseBoardText('- 1u\n- 6u\n- 3l\n- 4l\n- 2l\n- 5l\n').map(faceCode)).toEqual(UNIQUE_BOUNDARY);
    expect(parseTilesText('- [1l, 2U, 3u]\n').map(tileCode)).toEqual(['1l 2u 3u']);
  });

  it('rejects face codes with surrounding spaces', () => {
    expect(() => parseBoardText('["1u ", "6u", "3l", "4l", "2l", "5l"]')).toThrow(MalformedFaceError);
    expect(() => parseTilesText('[["1l", " 1u", "2u"]]')).toThrow(MalformedFaceError);
  });

  it('reports unparseable text against its source', () => {
    expect(() => parseBoardText('["1u', 'board.yaml')).toThrow(PuzzleFileError);
    expect(() => parseBoardText('["1u', 'board.yaml')).toThrow(/^board\.yaml: cannot parse/);
  });

  it('reports the first schema problem with its path', () => {
    expect(() => parseBoardText('["1u", 2]', 'board.json')).toThrow(/^board\.json: 1: /);
    expect(() => parseTilesText('{"a": 1}', 'tiles.json')).toThrow(/^tiles\.json: root: /);
    expect(() => parsePuzzleText('{"board": []}', 'p.json')).toThrow(/^p\.json: tiles: /);
  });

  it('round-trips a puzzle through its JSON form', () => {
    const puzzle = parsePuzzleText(JSON.stringify({ board: UNIQUE_BOUNDARY, tiles: UNIQUE_TILES }));
    const text = serializePuzzle(puzzle);

    expect(text.endsWith('}\n')).toBe(true);
    expect(parsePuzzleText(text)).toEqual(puzzle);
    expect(puzzleToDocument(puzzle)).toEqual({ board: UNIQUE_BOUNDARY, tiles: UNIQUE_TILES });
  });
});

describe('files', () => {
  let dir = '';

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'star-tiles-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads the bundled YAML board and tiles', async () => {
    const puzzle = await loadPuzzle({
      boardPath: path.join(dataDir, 'board.yaml'),
      tilesPath: path.join(dataDir, 'tiles.yaml')
    });
    expect(puzzle.boundary.map(faceCode)).toEqual(UNIQUE_BOUNDARY);
    expect(puzzle.tiles.map(tileCode)).toEqual(UNIQUE_TILES.map(codes => codes.join(' ')));
  });

  it('loads JSON board and tile files', async () => {
    const boardPath = path.join(dir, 'board.json');
    const tilesPath = path.join(dir, 'tiles.json');
    await writeFile(boardPath, JSON.stringify(UNIQUE_BOUNDARY), 'utf8');
    await writeFile(tilesPath, JSON.stringify(UNIQUE_TILES), 'utf8');

    const puzzle = await loadPuzzle({ boardPath, tilesPath });
    expect(puzzle.boundary.map(faceCode)).toEqual(UNIQUE_BOUNDARY);
    expect(puzzle.tiles).toHaveLength(6);
  });

  it('loads a combined puzzle file', async () => {
    const file = path.join(dir, 'puzzle.json');
    await writeFile(file, JSON.stringify({ board: UNIQUE_BOUNDARY, tiles: UNIQUE_TILES }), 'utf8');
    const puzzle = await loadPuzzleFile(file);
    expect(puzzle.tiles).toHaveLength(6);
  });

  it('names the file that cannot be read', async () => {
    const missing = path.join(dir, 'missing.json');
    await expect(loadBoard(missing)).rejects.toThrow(PuzzleFileError);
    await expect(loadBoard(missing)).rejects.toThrow(`${missing}: cannot read file`);
  });
});

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { CliIO } from '../src/cli';
import { main } from '../src/cli';
import { ConfigError, DEFAULT_BOARD_PATH, DEFAULT_TILES_PATH, USAGE, parseCliArgs } from '../src/config';
import { parsePuzzleText } from '../src/puzzle/io/PuzzleLoader';

const boardPath = fileURLToPath(new URL('../data/board.yaml', import.meta.url));
const tilesPath = fileURLToPath(new URL('../data/tiles.yaml', import.meta.url));

function captureIO(): CliIO & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: text => stdout.push(text),
    err: text => stderr.push(text)
  };
}

describe('parseCliArgs', () => {
  it('solves the bundled puzzle by default', () => {
    expect(parseCliArgs([])).toEqual({
      command: 'solve',
      board: DEFAULT_BOARD_PATH,
      tiles: DEFAULT_TILES_PATH,
      quiet: false
    });
  });

  it('reads generate options', () => {
    expect(parseCliArgs(['generate', '-s', '2', '--unique', '--seed', 'abc'])).toEqual({
      command: 'generate',
      order: 2,
      seed: 'abc',
      unique: true,
      attempts: 50
    });
  });

  it('treats --help as the help command', () => {
    expect(parseCliArgs(['solve', '--help'])).toEqual({ command: 'help' });
  });

  it.each([
    [['--bogus']],
    [['solve', '--max', '0']],
    [['solve', '--timeout', 'soon']],
    [['generate']],
    [['generate', '--order', '9']],
    [['frobnicate']]
  ])('rejects %j', argv => {
    expect(() => parseCliArgs(argv)).toThrow(ConfigError);
  });

  it('names the offending option', () => {
    expect(() => parseCliArgs(['generate', '--order', '9'])).toThrow(/^--order: /);
  });
});

describe('main', () => {
  let dir = '';

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'star-tiles-cli-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('solves a puzzle and reports the run', async () => {
    const io = captureIO();
    const code = await main(['solve', '--board', boardPath, '--tiles', tilesPath], io);

    expect(code).toBe(0);
    expect(io.stdout.slice(0, 4)).toEqual([
      'The puzzle has six tiles.',
      'The puzzle has six spaces.',
      'The puzzle has 524,880 combinations.',
      '--- Solution 1 ---'
    ]);
    expect(io.stdout[4].split('\n')).toHaveLength(6);
    expect(io.stdout).toContain('I found one solutions.');
    expect(io.stderr).toEqual([]);
  });

  it('omits boards when quiet', async () => {
    const io = captureIO();
    await main(['solve', '-q', '-b', boardPath, '-t', tilesPath], io);
    expect(io.stdout.some(line => line.startsWith('--- Solution'))).toBe(false);
    expect(io.stdout).toContain('I found one solutions.');
  });

  it('reports puzzle errors with exit code 1', async () => {
    const io = captureIO();
    const missing = path.join(dir, 'missing.json');
    const code = await main(['solve', '--board', missing, '--tiles', tilesPath], io);

    expect(code).toBe(1);
    expect(io.stderr).toHaveLength(1);
    expect(io.stderr[0].startsWith(`${missing}: cannot read file`)).toBe(true);
  });

  it('reports usage errors with exit code 2', async () => {
    const io = captureIO();
    expect(await main(['--bogus'], io)).toBe(2);
    expect(io.stderr[0].endsWith(USAGE)).toBe(true);
  });

  it('prints usage for help', async () => {
    const io = captureIO();
    expect(await main(['help'], io)).toBe(0);
    expect(io.stdout).toEqual([USAGE]);
  });

  it('prints a generated puzzle', async () => {
    const io = captureIO();
    expect(await main(['generate', '--order', '1', '--seed', 's1'], io)).toBe(0);
    expect(io.stdout).toHaveLength(1);

    const puzzle = parsePuzzleText(io.stdout[0]);
    expect(puzzle.boundary).toHaveLength(6);
    expect(puzzle.tiles).toHaveLength(6);
  });

  it('fails when no unique puzzle is found', async () => {
    const io = captureIO();
    const code = await main(['generate', '--order', '1', '--seed', 'u2', '--unique', '--attempts', '1'], io);
    expect(code).toBe(1);
    expect(io.stdout).toEqual([]);
    expect(io.stderr).toEqual(['No puzzle with a unique solution found in 1 attempts.']);
  });

  it('writes a generated puzzle to a file', async () => {
    const io = captureIO();
    const out = path.join(dir, 'puzzle.json');
    expect(await main(['generate', '--order', '1', '--seed', 's1', '--out', out], io)).toBe(0);
    expect(io.stdout).toEqual([`Wrote an order 1 puzzle with 6 tiles to ${out}.`]);

    const puzzle = parsePuzzleText(await readFile(out, 'utf8'));
    expect(puzzle.tiles).toHaveLength(6);
  });
});

// Command line driver: load, validate, solve and report; or generate puzzles

import { writeFile } from 'node:fs/promises';
import type { GenerateConfig, SolveConfig } from './config';
import { ConfigError, USAGE, parseCliArgs } from './config';
import { buildFrame } from './board/Board';
import { orderForBoundary } from './board/geometry';
import { renderBoard } from './tiles/renderer';
import type { Puzzle } from './puzzle/types';
import { MalformedBoardError, PuzzleError } from './puzzle/errors';
import { loadPuzzle, loadPuzzleFile, serializePuzzle } from './puzzle/io/PuzzleLoader';
import { assertValidPuzzle } from './puzzle/validation';
import { solvePuzzle } from './puzzle/solver';
import { generatePuzzle } from './puzzle/generator';
import { RunStatistics, introLines, possibilities, summaryLines } from './puzzle/analysis';

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
}

const consoleIO: CliIO = {
  out: text => console.log(text),
  err: text => console.error(text)
};

async function readPuzzle(config: SolveConfig): Promise<Puzzle> {
  if (config.puzzle) {
    return loadPuzzleFile(config.puzzle);
  }
  return loadPuzzle({ boardPath: config.board, tilesPath: config.tiles });
}

export async function runSolve(config: SolveConfig, io: CliIO, stats = new RunStatistics()): Promise<number> {
  const { boundary, tiles } = await readPuzzle(config);

  const order = orderForBoundary(boundary.length);
  if (order === null) {
    throw new MalformedBoardError(boundary.length);
  }

  const board = buildFrame(order, boundary);
  assertValidPuzzle(board, tiles);

  introLines(order, tiles.length).forEach(line => io.out(line));

  stats.start();
  const result = solvePuzzle(board, tiles, {
    mode: 'count',
    maxSolutions: config.max,
    timeoutMs: config.timeout,
    onSolution: (solution, index, trace) => {
      stats.recordSolution(trace);
      if (config.quiet) return;
      stats.exclude(() => {
        io.out(`--- Solution ${index} ---`);
        io.out(renderBoard(solution));
      });
    }
  });

  const summary = stats.finish(result.trace);
  summaryLines(summary, possibilities(order, tiles.length)).forEach(line => io.out(line));
  if (result.timedOut) {
    io.err(`Search stopped after ${config.timeout} ms; more solutions may exist.`);
  }

  return 0;
}

export async function runGenerate(config: GenerateConfig, io: CliIO): Promise<number> {
  const { result, attempts } = generatePuzzle({
    order: config.order,
    seed: config.seed,
    requireUniqueSolution: config.unique,
    maxAttempts: config.attempts
  });

  if (!result) {
    io.err(`No puzzle with a unique solution found in ${attempts} attempts.`);
    return 1;
  }

  const text = serializePuzzle(result.puzzle);
  if (config.out) {
    await writeFile(config.out, text, 'utf8');
    io.out(`Wrote an order ${config.order} puzzle with ${result.puzzle.tiles.length} tiles to ${config.out}.`);
  } else {
    io.out(text.trimEnd());
  }

  return 0;
}

// Returns the process exit code; puzzle and usage errors are reported, others propagate
export async function main(argv: readonly string[], io: CliIO = consoleIO): Promise<number> {
  try {
    const config = parseCliArgs(argv);
    switch (config.command) {
      case 'help':
        io.out(USAGE);
        return 0;
      case 'generate':
        return await runGenerate(config, io);
      case 'solve':
        return await runSolve(config, io);
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      io.err(`${error.message}\n${USAGE}`);
      return 2;
    }
    if (error instanceof PuzzleError) {
      io.err(error.message);
      return 1;
    }
    throw error;
  }
}

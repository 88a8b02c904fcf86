// Command line configuration: parsed with node:util, checked with zod

import { parseArgs } from 'node:util';
import { z } from 'zod';

export const DEFAULT_BOARD_PATH = 'data/board.yaml';
export const DEFAULT_TILES_PATH = 'data/tiles.yaml';

const solveConfigSchema = z.object({
  command: z.literal('solve'),
  board: z.string().min(1).default(DEFAULT_BOARD_PATH),
  tiles: z.string().min(1).default(DEFAULT_TILES_PATH),
  puzzle: z.string().min(1).optional(),
  max: z.coerce.number().int().positive().optional(),
  timeout: z.coerce.number().int().positive().optional(),
  quiet: z.boolean().default(false)
});

const generateConfigSchema = z.object({
  command: z.literal('generate'),
  order: z.coerce.number().int().min(1).max(4),
  seed: z.string().min(1).optional(),
  unique: z.boolean().default(false),
  attempts: z.coerce.number().int().positive().default(50),
  out: z.string().min(1).optional()
});

const helpConfigSchema = z.object({
  command: z.literal('help')
});

const cliConfigSchema = z.discriminatedUnion('command', [
  solveConfigSchema,
  generateConfigSchema,
  helpConfigSchema
]);

export type SolveConfig = z.infer<typeof solveConfigSchema>;
export type GenerateConfig = z.infer<typeof generateConfigSchema>;
export type CliConfig = z.infer<typeof cliConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const USAGE = [
  'Usage:',
  '  star-tiles solve [--board FILE] [--tiles FILE] [--puzzle FILE] [--max N] [--timeout MS] [--quiet]',
  '  star-tiles generate --order N [--seed TEXT] [--unique] [--attempts N] [--out FILE]',
  '  star-tiles help'
].join('\n');

export function parseCliArgs(argv: readonly string[]): CliConfig {
  let parsed: ReturnType<typeof parseOptions>;
  try {
    parsed = parseOptions(argv);
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }

  const { values, positionals } = parsed;
  const command = values.help ? 'help' : positionals[0] ?? 'solve';

  // Options the chosen command does not take are stripped by the schema
  const result = cliConfigSchema.safeParse({ ...values, command });
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? `--${issue.path.join('.')}: ` : '';
    throw new ConfigError(`${where}${issue.message}`);
  }
  return result.data;
}

function parseOptions(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      board: { type: 'string', short: 'b' },
      tiles: { type: 'string', short: 't' },
      puzzle: { type: 'string', short: 'p' },
      max: { type: 'string', short: 'n' },
      timeout: { type: 'string' },
      quiet: { type: 'boolean', short: 'q' },
      order: { type: 'string', short: 's' },
      seed: { type: 'string' },
      unique: { type: 'boolean', short: 'u' },
      attempts: { type: 'string' },
      out: { type: 'string', short: 'o' },
      help: { type: 'boolean', short: 'h' }
    }
  });
}

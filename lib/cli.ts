/**
 * Argument parsing and table printing for scripts/run_pipeline.ts
 */

import { clampTopN, isSortColumn, OUTPUT_COLUMNS, type OutputRow } from './rank';
import type { ScoreVariant, SortColumn } from '@/types';

export const USAGE =
  'Usage: npx tsx scripts/run_pipeline.ts [--top N] [--v1] [--sort column] [--raw-dir dir] [--out-dir dir]';

export type CliOptions = {
  top: number;
  variant: ScoreVariant;
  sortBy?: SortColumn;
  rawDir?: string;
  outDir?: string;
  help: boolean;
};

const VALUE_FLAGS = ['--top', '--sort', '--raw-dir', '--out-dir'] as const;
type ValueFlag = typeof VALUE_FLAGS[number];

function isValueFlag(flag: string): flag is ValueFlag {
  return (VALUE_FLAGS as readonly string[]).includes(flag);
}

/**
 * Accepts both `--flag value` and `--flag=value`. Throws on unknown flags.
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const options: CliOptions = { top: clampTopN(undefined), variant: 'v2', help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      options.help = true;
      continue;
    }
    if (arg === '--v1') {
      options.variant = 'v1';
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    if (!isValueFlag(flag)) {
      throw new Error(`Unknown argument: ${arg}\n${USAGE}`);
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined) {
      throw new Error(`Missing value for ${flag}\n${USAGE}`);
    }

    switch (flag) {
      case '--top':
        options.top = clampTopN(value);
        break;
      case '--sort':
        if (!isSortColumn(value)) {
          throw new Error(`Invalid sort column: ${value}`);
        }
        options.sortBy = value;
        break;
      case '--raw-dir':
        options.rawDir = value;
        break;
      case '--out-dir':
        options.outDir = value;
        break;
    }
  }

  return options;
}

/**
 * Fixed-width text table, numbers right-aligned
 */
export function formatTable(rows: OutputRow[]): string {
  const cells = rows.map(row => OUTPUT_COLUMNS.map(c => String(row[c])));
  const widths = OUTPUT_COLUMNS.map((c, i) =>
    Math.max(c.length, ...cells.map(r => r[i].length))
  );

  const line = (values: string[]) =>
    values
      .map((v, i) => (OUTPUT_COLUMNS[i] === 'canonical_model' ? v.padEnd(widths[i]) : v.padStart(widths[i])))
      .join('  ')
      .trimEnd();

  return [line([...OUTPUT_COLUMNS]), ...cells.map(line)].join('\n');
}

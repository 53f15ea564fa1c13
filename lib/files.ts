/**
 * On-disk layout:
 *   data/raw/*.json         imported thread batches, named
 *                           import_<YYYYMMDD_HHMMSS>_<seq>_<source> so that
 *                           file-name order is import order
 *   data/processed/*        published tables of the latest run
 *
 * Every write goes to a temp file first and is renamed into place, so a reader
 * never opens a half-written table.
 */

import fs from 'fs';
import path from 'path';
import { InvalidImportError } from './errors';
import { parseImportPayload, type ImportBatch } from './ingest';
import { comparatorFor, OUTPUT_COLUMNS, toOutputRow, VARIANT_COLUMN, type OutputRow } from './rank';
import type { PipelineRun, ScoreVariant } from '@/types';

export const OUTPUT_FILES = {
  json: 'ranked_models.json',
  v1: 'ranked_models.csv',
  v2: 'ranked_models_v2.csv',
  candidates: 'model_candidates.json',
} as const;

export function safeFilename(name: string): string {
  return Array.from(name || 'upload.json')
    .map(ch => (/[A-Za-z0-9._-]/.test(ch) ? ch : '_'))
    .join('');
}

function tempPath(target: string): string {
  return `${target}.tmp-${process.pid}`;
}

export function writeFileAtomic(target: string, contents: string): void {
  fs.mkdirSync(path.dirname(target), { recursive: true });
  const tmp = tempPath(target);
  fs.writeFileSync(tmp, contents, 'utf-8');
  fs.renameSync(tmp, target);
}

/**
 * Read every JSON batch in a directory. A file that is not valid JSON or has an
 * unsupported shape is reported and skipped.
 */
export function readRawDir(dir: string): { batches: ImportBatch[]; failed: string[] } {
  if (!fs.existsSync(dir)) return { batches: [], failed: [] };

  const files = fs.readdirSync(dir).filter(f => f.endsWith('.json')).sort();
  const batches: ImportBatch[] = [];
  const failed: string[] = [];

  for (const file of files) {
    try {
      const payload: unknown = JSON.parse(fs.readFileSync(path.join(dir, file), 'utf-8'));
      batches.push(parseImportPayload(payload, file));
    } catch (error) {
      if (error instanceof SyntaxError || error instanceof InvalidImportError) {
        failed.push(file);
        console.warn(`[import] Skipping ${file}: ${error.message}`);
        continue;
      }
      throw error;
    }
  }

  return { batches, failed };
}

const SEQ_DIGITS = 4;

export function writeRawBatch(dir: string, source: string, payload: unknown, now: Date = new Date()): string {
  const ts = now.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
  const name = safeFilename(source);
  const prefix = `import_${ts}_`;

  // Next sequence number within this second, whatever the source name
  let seq = 0;
  if (fs.existsSync(dir)) {
    for (const file of fs.readdirSync(dir)) {
      if (!file.startsWith(prefix)) continue;
      const n = Number.parseInt(file.slice(prefix.length, prefix.length + SEQ_DIGITS), 10);
      if (Number.isInteger(n) && n >= seq) seq = n + 1;
    }
  }

  const target = path.join(dir, `${prefix}${String(seq).padStart(SEQ_DIGITS, '0')}_${name}`);
  writeFileAtomic(target, JSON.stringify(payload, null, 2));
  return target;
}

function csvCell(value: string | number): string {
  const s = String(value);
  return /[",\n\r]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

export function toCsv(rows: OutputRow[]): string {
  const lines = [OUTPUT_COLUMNS.join(',')];
  for (const row of rows) {
    lines.push(OUTPUT_COLUMNS.map(c => csvCell(row[c])).join(','));
  }
  return `${lines.join('\n')}\n`;
}

// Exports keep every entity, not just the Top-N
function fullTable(run: PipelineRun, variant: ScoreVariant): OutputRow[] {
  return [...run.result.stats]
    .sort(comparatorFor(VARIANT_COLUMN[variant]))
    .map((s, i) => toOutputRow({ ...s, rank: i + 1 }));
}

/**
 * Publish a run's tables. Temp files are all written before any rename; if
 * staging fails, the temp files are removed and the previous tables stay.
 */
export function publishRun(dir: string, run: PipelineRun): string[] {
  fs.mkdirSync(dir, { recursive: true });

  const outputs: [string, string][] = [
    [OUTPUT_FILES.json, JSON.stringify({
      run_id: run.runId,
      completed_at: run.completedAt,
      fingerprint: run.result.fingerprint,
      report: run.result.report,
      rows: fullTable(run, 'v2'),
    }, null, 2)],
    [OUTPUT_FILES.v1, toCsv(fullTable(run, 'v1'))],
    [OUTPUT_FILES.v2, toCsv(fullTable(run, 'v2'))],
    [OUTPUT_FILES.candidates, JSON.stringify(run.result.candidates, null, 2)],
  ];

  const staged: { tmp: string; target: string }[] = [];
  try {
    for (const [name, contents] of outputs) {
      const target = path.join(dir, name);
      const tmp = tempPath(target);
      fs.writeFileSync(tmp, contents, 'utf-8');
      staged.push({ tmp, target });
    }

    for (const { tmp, target } of staged) {
      fs.renameSync(tmp, target);
    }
  } catch (error) {
    for (const { tmp } of staged) {
      fs.rmSync(tmp, { force: true });
    }
    throw error;
  }

  console.log(`[export] Wrote ${staged.length} files to ${dir}`);
  return staged.map(s => s.target);
}

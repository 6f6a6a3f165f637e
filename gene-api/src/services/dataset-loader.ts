/**
 * Dataset Loader
 * Parses a BioMart-style delimited export into gene records and seeds
 * the store on first start.
 */

import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { GeneStore } from './gene-store';
import { logger } from '../utils/logger';
import { GeneRecord, SeedResult } from '../types';

export const SOURCE_COLUMNS = {
  geneStableId: 'Gene stable ID',
  geneName: 'Gene name',
  geneDescription: 'Gene description',
  chromosome: 'Chromosome/scaffold name',
  geneStart: 'Gene start (bp)',
  geneEnd: 'Gene end (bp)',
  strand: 'Strand',
  geneType: 'Gene type',
} as const;

const DELIMITERS = ['\t', '|', ','] as const;

type SourceRow = Record<string, string | undefined>;

export function parseInteger(value: string | undefined): number | null {
  const trimmed = value?.trim();
  if (!trimmed || !/^[+-]?\d+$/.test(trimmed)) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

export function cleanString(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Pick the delimiter that occurs most often in the header line.
 * Ties go to tab, then pipe, then comma.
 */
export function detectDelimiter(content: string): string {
  const newline = content.indexOf('\n');
  const header = newline === -1 ? content : content.slice(0, newline);

  let best: string = ',';
  let bestCount = 0;
  for (const delimiter of DELIMITERS) {
    const occurrences = header.split(delimiter).length - 1;
    if (occurrences > bestCount) {
      best = delimiter;
      bestCount = occurrences;
    }
  }
  return best;
}

export function toGeneRecord(row: SourceRow): GeneRecord | null {
  const geneStableId = cleanString(row[SOURCE_COLUMNS.geneStableId]);
  if (!geneStableId) {
    return null;
  }

  return {
    geneStableId,
    geneName: cleanString(row[SOURCE_COLUMNS.geneName]),
    geneDescription: cleanString(row[SOURCE_COLUMNS.geneDescription]),
    chromosome: cleanString(row[SOURCE_COLUMNS.chromosome]),
    geneStart: parseInteger(row[SOURCE_COLUMNS.geneStart]),
    geneEnd: parseInteger(row[SOURCE_COLUMNS.geneEnd]),
    strand: parseInteger(row[SOURCE_COLUMNS.strand]),
    geneType: cleanString(row[SOURCE_COLUMNS.geneType]),
  };
}

export function parseDataset(content: string): GeneRecord[] {
  if (content.trim() === '') {
    return [];
  }

  const rows: SourceRow[] = parse(content, {
    bom: true,
    columns: (header: string[]) => header.map((name) => name.trim()),
    delimiter: detectDelimiter(content),
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
  });

  if (rows.length > 0) {
    const present = new Set(Object.keys(rows[0]));
    const missing = Object.values(SOURCE_COLUMNS).filter((column) => !present.has(column));
    if (missing.length > 0) {
      logger.warn('Dataset is missing expected columns', { missing });
    }
  }

  const records: GeneRecord[] = [];
  let skipped = 0;
  for (const row of rows) {
    const record = toGeneRecord(row);
    if (record) {
      records.push(record);
    } else {
      skipped++;
    }
  }

  if (skipped > 0) {
    logger.debug('Skipped rows without a stable id', { skipped });
  }

  return records;
}

/**
 * Read and parse the dataset file. A missing file yields no records.
 */
export async function loadDataset(filePath: string): Promise<GeneRecord[]> {
  if (!fs.existsSync(filePath)) {
    logger.warn('Dataset file not found, nothing to load', { filePath });
    return [];
  }

  const content = await fs.promises.readFile(filePath, 'utf-8');
  return parseDataset(content);
}

export interface InitializeOptions {
  dataFile: string;
}

/**
 * Create the schema and seed it from the dataset when the table is empty.
 *
 * The empty-check and the insert are not guarded by any cross-process
 * lock. Deployments sharing one database file across processes must run
 * the first initialisation from a single process.
 */
export async function initializeGeneStore(
  store: GeneStore,
  options: InitializeOptions
): Promise<SeedResult> {
  await store.ensureSchema();

  if (!(await store.isEmpty())) {
    logger.info('Gene store already seeded, skipping load');
    return { status: 'skipped', inserted: 0 };
  }

  const records = await loadDataset(options.dataFile);
  if (records.length === 0) {
    logger.warn('Dataset is empty, serving an empty gene store', { dataFile: options.dataFile });
    return { status: 'empty', inserted: 0 };
  }

  const inserted = await store.bulkInsert(records);
  logger.info('Gene store seeded', { inserted, dataFile: options.dataFile });

  return { status: 'seeded', inserted };
}

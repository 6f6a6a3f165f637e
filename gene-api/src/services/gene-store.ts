/**
 * Gene Store
 * Single-table persistence for gene records (SQLite via drizzle-orm)
 */

import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { drizzle, BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { AnyColumn, SQL, and, asc, count, eq, isNotNull, or, sql } from 'drizzle-orm';
import { resolveSqlitePath } from '../config';
import { genes, GENES_SCHEMA_SQL } from '../db/schema';
import { StorageWriteError } from '../utils/errors';
import { logger } from '../utils/logger';
import { FindOptions, FindResult, GeneFilters, GeneRecord } from '../types';

/** Rows per INSERT statement, well under SQLite's bound-parameter limit. */
const INSERT_BATCH_SIZE = 500;

export interface GeneStore {
  ensureSchema(): Promise<void>;
  isEmpty(): Promise<boolean>;
  count(): Promise<number>;
  bulkInsert(records: GeneRecord[]): Promise<number>;
  getById(geneStableId: string): Promise<GeneRecord | null>;
  find(filters: GeneFilters, options: FindOptions): Promise<FindResult>;
  findByName(geneName: string): Promise<GeneRecord | null>;
  close(): Promise<void>;
}

// gene_start ascending with nulls last; stable id settles ties
const START_ORDER = [sql`${genes.geneStart} asc nulls last`, asc(genes.geneStableId)];

function containsIgnoreCase(column: AnyColumn, value: string): SQL {
  return sql`instr(lower(${column}), lower(${value})) > 0`;
}

export function buildGeneFilter(filters: GeneFilters): SQL | undefined {
  const conditions: SQL[] = [];

  if (filters.chromosome) {
    conditions.push(eq(genes.chromosome, filters.chromosome));
  }
  if (filters.geneType) {
    conditions.push(containsIgnoreCase(genes.geneType, filters.geneType));
  }
  if (filters.search) {
    const match = or(
      containsIgnoreCase(genes.geneName, filters.search),
      containsIgnoreCase(genes.geneDescription, filters.search)
    );
    if (match) {
      conditions.push(match);
    }
  }

  return conditions.length > 0 ? and(...conditions) : undefined;
}

export class SqliteGeneStore implements GeneStore {
  private readonly db: BetterSQLite3Database;

  constructor(private readonly sqlite: Database.Database) {
    this.db = drizzle(sqlite);
  }

  async ensureSchema(): Promise<void> {
    this.sqlite.exec(GENES_SCHEMA_SQL);
  }

  async isEmpty(): Promise<boolean> {
    const row = this.db.select({ id: genes.geneStableId }).from(genes).limit(1).get();
    return row === undefined;
  }

  async count(): Promise<number> {
    const row = this.db.select({ total: count() }).from(genes).get();
    return row?.total ?? 0;
  }

  /**
   * Insert every record in one transaction. Nothing is written if any
   * row is rejected.
   */
  async bulkInsert(records: GeneRecord[]): Promise<number> {
    if (records.length === 0) {
      return 0;
    }

    try {
      this.db.transaction((tx) => {
        for (let i = 0; i < records.length; i += INSERT_BATCH_SIZE) {
          tx.insert(genes).values(records.slice(i, i + INSERT_BATCH_SIZE)).run();
        }
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new StorageWriteError(`Failed to insert ${records.length} genes: ${reason}`, error);
    }

    return records.length;
  }

  async getById(geneStableId: string): Promise<GeneRecord | null> {
    const row = this.db.select().from(genes).where(eq(genes.geneStableId, geneStableId)).get();
    return row ?? null;
  }

  async find(filters: GeneFilters, options: FindOptions): Promise<FindResult> {
    const where = buildGeneFilter(filters);

    // count and page read the same snapshot
    return this.db.transaction((tx) => {
      const totalRow = tx.select({ total: count() }).from(genes).where(where).get();
      const items = tx
        .select()
        .from(genes)
        .where(where)
        .orderBy(...START_ORDER)
        .limit(options.limit)
        .offset(options.offset)
        .all();

      return { total: totalRow?.total ?? 0, items };
    });
  }

  async findByName(geneName: string): Promise<GeneRecord | null> {
    const row = this.db
      .select()
      .from(genes)
      .where(and(isNotNull(genes.geneName), sql`lower(${genes.geneName}) = lower(${geneName})`))
      .orderBy(...START_ORDER)
      .limit(1)
      .get();

    return row ?? null;
  }

  async close(): Promise<void> {
    if (this.sqlite.open) {
      this.sqlite.close();
    }
  }
}

/**
 * Open the store named by a DATABASE_URL. The caller owns the handle and
 * must close it.
 */
export function openGeneStore(databaseUrl: string): SqliteGeneStore {
  const file = resolveSqlitePath(databaseUrl);
  const inMemory = file === ':memory:';

  if (!inMemory) {
    fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
  }

  const sqlite = new Database(file);
  if (!inMemory) {
    sqlite.pragma('journal_mode = WAL');
  }

  logger.debug('Gene store opened', { file });
  return new SqliteGeneStore(sqlite);
}

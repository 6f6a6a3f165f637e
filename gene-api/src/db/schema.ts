/**
 * Genes table: one row per gene, keyed by its stable id.
 */

import { index, integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';

export const genes = sqliteTable(
  'genes',
  {
    geneStableId: text('gene_stable_id').primaryKey(),
    geneName: text('gene_name'),
    geneDescription: text('gene_description'),
    chromosome: text('chromosome'),
    geneStart: integer('gene_start'),
    geneEnd: integer('gene_end'),
    strand: integer('strand'),
    geneType: text('gene_type'),
  },
  (table) => ({
    nameIdx: index('ix_genes_gene_name').on(table.geneName),
    chromosomeIdx: index('ix_genes_chromosome').on(table.chromosome),
    typeIdx: index('ix_genes_gene_type').on(table.geneType),
  })
);

// drizzle-kit is not part of the runtime, so the table is created from DDL.
export const GENES_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS genes (
  gene_stable_id TEXT PRIMARY KEY NOT NULL,
  gene_name TEXT,
  gene_description TEXT,
  chromosome TEXT,
  gene_start INTEGER,
  gene_end INTEGER,
  strand INTEGER,
  gene_type TEXT
);

CREATE INDEX IF NOT EXISTS ix_genes_gene_name ON genes (gene_name);
CREATE INDEX IF NOT EXISTS ix_genes_chromosome ON genes (chromosome);
CREATE INDEX IF NOT EXISTS ix_genes_gene_type ON genes (gene_type);
`;

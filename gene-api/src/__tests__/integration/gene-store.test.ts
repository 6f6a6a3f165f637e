/**
 * Gene Store Integration Tests
 * Runs against an in-memory SQLite database
 */

import { openGeneStore, SqliteGeneStore } from '../../services/gene-store';
import { StorageWriteError } from '../../utils/errors';
import { GeneRecord } from '../../types';

function gene(id: string, overrides: Partial<GeneRecord> = {}): GeneRecord {
  return {
    geneStableId: id,
    geneName: null,
    geneDescription: null,
    chromosome: '21',
    geneStart: null,
    geneEnd: null,
    strand: null,
    geneType: 'protein_coding',
    ...overrides,
  };
}

const GENES: GeneRecord[] = [
  gene('TESTG01', { geneName: 'ALPHA1', geneStart: 5000, geneDescription: 'alpha kinase' }),
  gene('TESTG02', { geneName: 'BRCAX', geneStart: 1000, geneDescription: 'repair factor' }),
  gene('TESTG03', { geneStart: 3000, geneType: 'lncRNA', geneDescription: 'long noncoding' }),
  gene('TESTG04', { geneName: 'SODX', geneStart: null }),
  gene('TESTG05', { geneName: 'sodx', geneStart: 2000, geneDescription: 'brca interacting', geneType: 'processed_pseudogene' }),
  gene('TESTG06', { geneName: 'MIRT1', geneStart: 700, chromosome: 'KI270872.1', geneType: 'miRNA' }),
  gene('TESTG00', { geneName: 'NULLSTART', geneStart: null }),
];

const ids = (records: GeneRecord[]): string[] => records.map((r) => r.geneStableId);

describe('SqliteGeneStore', () => {
  let store: SqliteGeneStore;

  beforeEach(async () => {
    store = openGeneStore(':memory:');
    await store.ensureSchema();
  });

  afterEach(async () => {
    await store.close();
  });

  describe('schema and seeding', () => {
    it('creates the schema idempotently', async () => {
      await expect(store.ensureSchema()).resolves.toBeUndefined();
      await expect(store.isEmpty()).resolves.toBe(true);
    });

    it('inserts all records in one call', async () => {
      await expect(store.bulkInsert(GENES)).resolves.toBe(7);
      await expect(store.isEmpty()).resolves.toBe(false);
      await expect(store.count()).resolves.toBe(7);
    });

    it('inserts batches larger than one statement', async () => {
      const many = Array.from({ length: 1203 }, (_, i) => gene(`BULK${i}`, { geneStart: i }));

      await store.bulkInsert(many);

      await expect(store.count()).resolves.toBe(1203);
    });

    it('rejects duplicate stable ids and writes nothing', async () => {
      const duplicated = [...GENES, gene('TESTG01', { geneName: 'DUPLICATE' })];

      await expect(store.bulkInsert(duplicated)).rejects.toBeInstanceOf(StorageWriteError);
      await expect(store.count()).resolves.toBe(0);
    });

    it('treats an empty insert as a no-op', async () => {
      await expect(store.bulkInsert([])).resolves.toBe(0);
      await expect(store.isEmpty()).resolves.toBe(true);
    });
  });

  describe('lookups', () => {
    beforeEach(async () => {
      await store.bulkInsert(GENES);
    });

    it('gets a gene by stable id', async () => {
      await expect(store.getById('TESTG02')).resolves.toEqual(GENES[1]);
      await expect(store.getById('MISSING')).resolves.toBeNull();
    });

    it('finds by name case-insensitively, lowest start first', async () => {
      const match = await store.findByName('SODX');
      expect(match?.geneStableId).toBe('TESTG05');

      const lower = await store.findByName('alpha1');
      expect(lower?.geneStableId).toBe('TESTG01');
    });

    it('matches names exactly, not as patterns', async () => {
      await expect(store.findByName('ALPHA')).resolves.toBeNull();
      await expect(store.findByName('%')).resolves.toBeNull();
    });

    it('returns a null-start gene when it is the only match', async () => {
      const match = await store.findByName('nullstart');
      expect(match?.geneStableId).toBe('TESTG00');
    });
  });

  describe('find', () => {
    beforeEach(async () => {
      await store.bulkInsert(GENES);
    });

    it('orders by start with nulls last and id as tie-break', async () => {
      const { total, items } = await store.find({}, { offset: 0, limit: 50 });

      expect(total).toBe(7);
      expect(ids(items)).toEqual([
        'TESTG06',
        'TESTG02',
        'TESTG05',
        'TESTG03',
        'TESTG01',
        'TESTG00',
        'TESTG04',
      ]);
    });

    it('filters by exact chromosome', async () => {
      const { total, items } = await store.find({ chromosome: '21' }, { offset: 0, limit: 50 });

      expect(total).toBe(6);
      expect(items.every((g) => g.chromosome === '21')).toBe(true);

      const partial = await store.find({ chromosome: '2' }, { offset: 0, limit: 50 });
      expect(partial.total).toBe(0);
    });

    it('filters gene type by case-insensitive substring', async () => {
      const { items } = await store.find({ geneType: 'CODING' }, { offset: 0, limit: 50 });
      expect(ids(items)).toEqual(['TESTG02', 'TESTG01', 'TESTG00', 'TESTG04']);
    });

    it('searches name or description', async () => {
      const { total, items } = await store.find({ search: 'BrCa' }, { offset: 0, limit: 50 });

      expect(total).toBe(2);
      expect(ids(items)).toEqual(['TESTG02', 'TESTG05']);
    });

    it('does not treat wildcard characters as patterns', async () => {
      const { total } = await store.find({ search: '%' }, { offset: 0, limit: 50 });
      expect(total).toBe(0);
    });

    it('combines filters', async () => {
      const { items } = await store.find(
        { chromosome: '21', geneType: 'protein', search: 'sod' },
        { offset: 0, limit: 50 }
      );
      expect(ids(items)).toEqual(['TESTG04']);
    });

    it('pages without changing the total', async () => {
      const first = await store.find({}, { offset: 0, limit: 3 });
      const second = await store.find({}, { offset: 3, limit: 3 });
      const last = await store.find({}, { offset: 6, limit: 3 });

      expect([first.total, second.total, last.total]).toEqual([7, 7, 7]);
      expect(ids(first.items)).toEqual(['TESTG06', 'TESTG02', 'TESTG05']);
      expect(ids(second.items)).toEqual(['TESTG03', 'TESTG01', 'TESTG00']);
      expect(ids(last.items)).toEqual(['TESTG04']);
    });

    it('returns an empty page past the end', async () => {
      const { total, items } = await store.find({}, { offset: 100, limit: 10 });
      expect(total).toBe(7);
      expect(items).toEqual([]);
    });
  });
});

/**
 * Gene Query Service
 * The three read operations behind both request adapters
 */

import { GeneStore } from './gene-store';
import { InvalidArgumentError, NotFoundError } from '../utils/errors';
import {
  GeneListResponse,
  GeneRecord,
  GeneResponse,
  ListGenesParams,
} from '../types';

export const DEFAULT_PAGE = 1;
export const DEFAULT_PAGE_SIZE = 25;
export const MAX_PAGE_SIZE = 200;
/** Largest page whose row offset stays a safe integer at any page size. */
export const MAX_PAGE = Math.floor(Number.MAX_SAFE_INTEGER / MAX_PAGE_SIZE);

export function toGeneResponse(record: GeneRecord): GeneResponse {
  return {
    gene_stable_id: record.geneStableId,
    gene_name: record.geneName,
    gene_description: record.geneDescription,
    chromosome: record.chromosome,
    gene_start: record.geneStart,
    gene_end: record.geneEnd,
    strand: record.strand,
    gene_type: record.geneType,
  };
}

function assertPagination(page: number, pageSize: number): void {
  if (!Number.isInteger(page) || page < 1) {
    throw new InvalidArgumentError('page must be an integer greater than or equal to 1');
  }
  if (page > MAX_PAGE) {
    throw new InvalidArgumentError(`page must be an integer no greater than ${MAX_PAGE}`);
  }
  if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
    throw new InvalidArgumentError(`page_size must be an integer between 1 and ${MAX_PAGE_SIZE}`);
  }
}

export class GeneQueryService {
  constructor(private readonly store: GeneStore) {}

  async listGenes(params: ListGenesParams = {}): Promise<GeneListResponse> {
    const page = params.page ?? DEFAULT_PAGE;
    const pageSize = params.pageSize ?? DEFAULT_PAGE_SIZE;
    assertPagination(page, pageSize);

    const { total, items } = await this.store.find(
      {
        chromosome: params.chromosome || undefined,
        geneType: params.geneType || undefined,
        search: params.search || undefined,
      },
      { offset: (page - 1) * pageSize, limit: pageSize }
    );

    return {
      total,
      page,
      page_size: pageSize,
      items: items.map(toGeneResponse),
    };
  }

  async getGene(geneStableId: string): Promise<GeneResponse> {
    const gene = await this.store.getById(geneStableId);
    if (!gene) {
      throw new NotFoundError();
    }
    return toGeneResponse(gene);
  }

  async getGeneByName(geneName: string): Promise<GeneResponse> {
    const gene = await this.store.findByName(geneName);
    if (!gene) {
      throw new NotFoundError();
    }
    return toGeneResponse(gene);
  }

  async countGenes(): Promise<number> {
    return this.store.count();
  }
}

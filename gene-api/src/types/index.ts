/**
 * Gene API Types
 */

// ============ Gene Types ============

/** One row of the `genes` table. */
export interface GeneRecord {
  geneStableId: string;
  geneName: string | null;
  geneDescription: string | null;
  chromosome: string | null;
  geneStart: number | null;
  geneEnd: number | null;
  strand: number | null;
  geneType: string | null;
}

/** Wire shape shared by the HTTP and event adapters. */
export interface GeneResponse {
  gene_stable_id: string;
  gene_name: string | null;
  gene_description: string | null;
  chromosome: string | null;
  gene_start: number | null;
  gene_end: number | null;
  strand: number | null;
  gene_type: string | null;
}

export interface GeneListResponse {
  total: number;
  page: number;
  page_size: number;
  items: GeneResponse[];
}

// ============ Query Types ============

export interface GeneFilters {
  chromosome?: string;
  geneType?: string;
  search?: string;
}

export interface FindOptions {
  offset: number;
  limit: number;
}

export interface FindResult {
  total: number;
  items: GeneRecord[];
}

export interface ListGenesParams extends GeneFilters {
  page?: number;
  pageSize?: number;
}

// ============ Seed Types ============

export type SeedStatus = 'skipped' | 'empty' | 'seeded';

export interface SeedResult {
  status: SeedStatus;
  inserted: number;
}

// ============ API Types ============

export interface WelcomeResponse {
  message: string;
}

export interface HealthCheckResponse {
  status: 'healthy' | 'degraded';
  records: number;
  version: string;
  timestamp: number;
}

export interface ErrorDetail {
  loc: string[];
  msg: string;
}

export interface HttpErrorBody {
  detail: string | ErrorDetail[];
}

// ============ Event Types ============

/**
 * Inbound serverless request envelope. Covers both the REST-style
 * (`httpMethod` / `path`) and HTTP-API-style (`requestContext.http`,
 * `rawPath`) shapes.
 */
export interface GatewayEvent {
  httpMethod?: string;
  path?: string;
  rawPath?: string;
  pathParameters?: Record<string, string | undefined> | null;
  queryStringParameters?: Record<string, string | undefined> | null;
  requestContext?: {
    stage?: string;
    http?: {
      method?: string;
    };
  };
}

export interface GatewayResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * Serverless Event Adapter
 *
 * Answers the same routes as the HTTP app from a request/response event,
 * without a long-lived server. Path segmentation and parameter parsing
 * happen here; the query service does the rest.
 */

import { config } from '../config';
import { GeneQueryService } from '../services/query-service';
import { GeneApiError, InvalidArgumentError } from '../utils/errors';
import { logger } from '../utils/logger';
import { GatewayEvent, GatewayResponse, ListGenesParams } from '../types';

const JSON_HEADERS = { 'Content-Type': 'application/json' };
const BY_NAME = 'by-name';

export type QueryServiceFactory = () => Promise<GeneQueryService>;
export type EventHandler = (event: GatewayEvent) => Promise<GatewayResponse>;

function respond(statusCode: number, body: unknown): GatewayResponse {
  return { statusCode, headers: { ...JSON_HEADERS }, body: JSON.stringify(body) };
}

export function resolveMethod(event: GatewayEvent): string {
  return (event.httpMethod ?? event.requestContext?.http?.method ?? 'GET').toUpperCase();
}

/**
 * Split the request path into decoded segments, dropping the stage
 * prefix when the gateway includes it.
 */
export function resolveSegments(event: GatewayEvent): string[] {
  const proxy = event.pathParameters?.proxy;
  const rawPath = proxy ?? event.rawPath ?? event.path ?? '/';

  const segments = rawPath
    .split('/')
    .filter((segment) => segment !== '')
    .map((segment) => {
      try {
        return decodeURIComponent(segment);
      } catch {
        return segment;
      }
    });

  const stage = event.requestContext?.stage;
  if (proxy === undefined && stage && stage !== '$default' && segments[0] === stage) {
    segments.shift();
  }

  return segments;
}

function parseIntParam(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw === '') {
    return undefined;
  }
  if (!/^\s*[+-]?\d+\s*$/.test(raw)) {
    throw new InvalidArgumentError(`${name} must be an integer`);
  }
  return Number(raw);
}

export function parseListParams(
  query: Record<string, string | undefined> | null | undefined
): ListGenesParams {
  const params = query ?? {};
  return {
    page: parseIntParam('page', params.page),
    pageSize: parseIntParam('page_size', params.page_size),
    chromosome: params.chromosome || undefined,
    geneType: params.gene_type || undefined,
    search: params.search || undefined,
  };
}

async function route(
  queryService: GeneQueryService,
  segments: string[],
  event: GatewayEvent
): Promise<GatewayResponse> {
  if (segments.length === 0) {
    return respond(200, { message: `Welcome to ${config.api.title}` });
  }

  if (segments[0] !== 'genes') {
    return respond(404, { message: 'Not Found' });
  }

  if (segments.length === 1) {
    const params = parseListParams(event.queryStringParameters);
    return respond(200, await queryService.listGenes(params));
  }

  if (segments.length === 2 && segments[1] !== BY_NAME) {
    return respond(200, await queryService.getGene(segments[1]));
  }

  if (segments.length === 3 && segments[1] === BY_NAME) {
    return respond(200, await queryService.getGeneByName(segments[2]));
  }

  return respond(404, { message: 'Not Found' });
}

/**
 * Build the event handler. `init` runs once per container; a failed
 * initialisation is retried on the next event.
 */
export function createEventHandler(init: QueryServiceFactory): EventHandler {
  let ready: Promise<GeneQueryService> | undefined;

  const getQueryService = (): Promise<GeneQueryService> => {
    if (!ready) {
      ready = init().catch((error: unknown) => {
        ready = undefined;
        throw error;
      });
    }
    return ready;
  };

  return async (event: GatewayEvent): Promise<GatewayResponse> => {
    const method = resolveMethod(event);
    if (method !== 'GET') {
      return respond(405, { message: 'Method Not Allowed' });
    }

    try {
      const queryService = await getQueryService();
      return await route(queryService, resolveSegments(event), event);
    } catch (error) {
      if (error instanceof GeneApiError && error.statusCode < 500) {
        return respond(error.statusCode, { message: error.message });
      }

      logger.error('Unhandled error in event handler', {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      return respond(500, { message: 'Internal server error' });
    }
  };
}

import { NextFunction, Request, Response, Router } from 'express';
import { matchedData, query, validationResult } from 'express-validator';
import rateLimit from 'express-rate-limit';
import { config } from '../config';
import {
  DEFAULT_PAGE,
  DEFAULT_PAGE_SIZE,
  GeneQueryService,
  MAX_PAGE,
  MAX_PAGE_SIZE,
} from '../services/query-service';
import { ErrorDetail, HttpErrorBody } from '../types';

const listValidators = [
  query('page')
    .optional()
    .isInt({ min: 1 })
    .withMessage('page must be an integer greater than or equal to 1')
    .bail()
    .isInt({ max: MAX_PAGE })
    .withMessage(`page must be an integer no greater than ${MAX_PAGE}`)
    .toInt(),
  query('page_size')
    .optional()
    .isInt({ min: 1, max: MAX_PAGE_SIZE })
    .withMessage(`page_size must be an integer between 1 and ${MAX_PAGE_SIZE}`)
    .toInt(),
  query('chromosome').optional().isString().withMessage('chromosome must be a string'),
  query('gene_type').optional().isString().withMessage('gene_type must be a string'),
  query('search').optional().isString().withMessage('search must be a string'),
];

function intParam(value: unknown, fallback: number): number {
  return typeof value === 'number' ? value : fallback;
}

function stringParam(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * /genes routes. The query service is created once per process and
 * shared across requests.
 */
export function createGenesRouter(queryService: GeneQueryService): Router {
  const router = Router();

  router.use(rateLimit({
    windowMs: config.rateLimit.windowMs,
    limit: config.rateLimit.max,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    message: { detail: 'Too many requests, please try again later' },
  }));

  /**
   * GET /genes
   * List genes, filtered and paginated
   */
  router.get('/', listValidators, async (req: Request, res: Response, next: NextFunction) => {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      const detail: ErrorDetail[] = errors.array().map((error) => ({
        loc: ['query', error.type === 'field' ? error.path : error.type],
        msg: String(error.msg),
      }));
      const body: HttpErrorBody = { detail };
      res.status(422).json(body);
      return;
    }

    try {
      const params = matchedData(req, { locations: ['query'] });
      const result = await queryService.listGenes({
        page: intParam(params.page, DEFAULT_PAGE),
        pageSize: intParam(params.page_size, DEFAULT_PAGE_SIZE),
        chromosome: stringParam(params.chromosome),
        geneType: stringParam(params.gene_type),
        search: stringParam(params.search),
      });
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /genes/by-name/:geneName
   * Case-insensitive lookup; lowest gene_start wins
   */
  router.get('/by-name/:geneName', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await queryService.getGeneByName(req.params.geneName));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /genes/:geneStableId
   */
  router.get('/:geneStableId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await queryService.getGene(req.params.geneStableId));
    } catch (error) {
      next(error);
    }
  });

  return router;
}

export default createGenesRouter;

import type { Request } from 'express';
import { SulidService, ValidationError } from '../services/sulidService';
import { DecodeError } from '../sulid/errors';
import logger from '../utils/logger';

// Express 的 Request/Response 满足这两个接口
export type SulidRequest = Pick<Request, 'query' | 'params'>;

export interface JsonResponse {
  status(code: number): JsonResponse;
  json(body: unknown): unknown;
}

export class SulidController {
  private sulidService: SulidService;

  constructor(sulidService: SulidService = new SulidService()) {
    this.sulidService = sulidService;
  }

  /**
   * Generate one or more SULIDs
   * @param req Express request, optional `count` query parameter
   * @param res Express response
   */
  public generate(req: SulidRequest, res: JsonResponse): void {
    try {
      const { count } = req.query;

      let countNumber = 1;
      if (count !== undefined) {
        // 只接受十进制整数
        if (typeof count !== 'string' || !/^\d+$/.test(count)) {
          res.status(400).json({ error: 'count must be a positive integer' });
          return;
        }
        countNumber = parseInt(count, 10);
      }

      const sulids = this.sulidService.generate(countNumber);
      res.status(200).json({ sulids });
    } catch (error) {
      this.handleError(error, res);
    }
  }

  /**
   * Decode a SULID into its fields
   * @param req Express request
   * @param res Express response
   */
  public describe(req: SulidRequest, res: JsonResponse): void {
    try {
      const { id } = req.params;
      const description = this.sulidService.describe(id);
      res.status(200).json({ sulid: description });
    } catch (error) {
      this.handleError(error, res);
    }
  }

  /**
   * Get the successor of a SULID (random field + 1)
   * @param req Express request
   * @param res Express response
   */
  public next(req: SulidRequest, res: JsonResponse): void {
    try {
      const { id } = req.params;
      const next = this.sulidService.next(id);

      if (next === null) {
        res.status(409).json({ error: 'Random component exhausted for this timestamp and worker' });
        return;
      }

      res.status(200).json({ sulid: next });
    } catch (error) {
      this.handleError(error, res);
    }
  }

  /**
   * Get the configured generator
   * @param req Express request
   * @param res Express response
   */
  public getGeneratorInfo(req: SulidRequest, res: JsonResponse): void {
    try {
      res.status(200).json({ generator: this.sulidService.generatorInfo() });
    } catch (error) {
      this.handleError(error, res);
    }
  }

  private handleError(error: unknown, res: JsonResponse): void {
    if (error instanceof DecodeError) {
      res.status(400).json({ error: error.message, kind: error.kind });
      return;
    }
    if (error instanceof ValidationError) {
      res.status(400).json({ error: error.message });
      return;
    }

    logger.error('Error in SULID controller', { error });
    res.status(500).json({
      error: error instanceof Error ? error.message : 'An unexpected error occurred',
    });
  }
}

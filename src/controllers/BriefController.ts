import { Response } from 'express';
import { AuthenticatedRequest } from '../middleware/auth';
import { BriefRepository } from '../repositories/BriefRepository';
import { BriefService } from '../services/briefs/BriefService';
import { briefQuerySchema, briefRequestSchema, parseOrThrow } from '../models/validation';
import { briefToJson } from '../models/transformers';
import { sendControllerError } from './errors';

/**
 * BriefController handles daily brief generation and retrieval
 */
export class BriefController {
  constructor(
    private briefService: BriefService,
    private briefRepository: BriefRepository
  ) {}

  /**
   * POST /briefs - Generate (or regenerate) a user's brief for a date
   */
  async generate(req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      const body = parseOrThrow(briefRequestSchema, req.body);

      const brief = await this.briefService.generateBrief(
        { userId: body.user_id, date: body.date, maxItems: body.max_items },
        req.user?.token
      );

      res.status(201).json(briefToJson(brief));
    } catch (error) {
      sendControllerError(res, error, 'generate brief');
    }
  }

  /**
   * GET /briefs?user_id=&date= - Brief for a user on a date (default today)
   */
  async getForUser(req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      const query = parseOrThrow(briefQuerySchema, req.query);
      const briefDate = query.date ?? new Date().toISOString().slice(0, 10);
      const brief = await this.briefRepository.getByUserAndDate(query.user_id, briefDate);

      if (!brief) {
        res.status(404).json({
          error: 'Brief not found',
          message: `No brief for user ${query.user_id} on ${briefDate}`
        });
        return;
      }

      res.json(briefToJson(brief));
    } catch (error) {
      sendControllerError(res, error, 'get brief');
    }
  }

  /**
   * GET /briefs/:brief_id
   */
  async getById(req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      const brief = await this.briefRepository.getById(req.params.brief_id);

      if (!brief) {
        res.status(404).json({
          error: 'Brief not found',
          message: `Brief ${req.params.brief_id} not found`
        });
        return;
      }

      res.json(briefToJson(brief));
    } catch (error) {
      sendControllerError(res, error, 'get brief');
    }
  }
}

import { Response } from 'express';
import { AuthenticatedRequest } from '../middleware/auth';
import { ClassificationRepository } from '../repositories/ClassificationRepository';
import { ClassificationPipeline } from '../services/classification/ClassificationPipeline';
import {
  classificationQuerySchema,
  classificationRequestSchema,
  classificationStatsQuerySchema,
  classificationUpdateSchema,
  parseOrThrow
} from '../models/validation';
import { classificationToJson } from '../models/transformers';
import { ClassificationFilters } from '../types/models';
import { sendControllerError } from './errors';

/**
 * ClassificationController handles HTTP requests for classifying messages and
 * querying stored classifications
 */
export class ClassificationController {
  constructor(
    private pipeline: ClassificationPipeline,
    private classificationRepository: ClassificationRepository
  ) {}

  /**
   * POST /classifications - Classify messages by ID or for a user
   */
  async classify(req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      const body = parseOrThrow(classificationRequestSchema, req.body);

      const outcome = await this.pipeline.classify(
        { messageIds: body.message_ids, userId: body.user_id },
        { token: req.user?.token, authenticatedUserId: req.user?.id }
      );

      res.status(201).json({
        classifications: outcome.classifications.map(classificationToJson),
        total_processed: outcome.totalProcessed,
        success_count: outcome.successCount,
        error_count: outcome.errorCount
      });
    } catch (error) {
      sendControllerError(res, error, 'classify messages');
    }
  }

  /**
   * GET /classifications - List classifications with filters and pagination
   */
  async list(req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      const query = parseOrThrow(classificationQuerySchema, req.query);

      const filters: ClassificationFilters = {
        label: query.label,
        userId: query.user_id,
        msgId: query.msg_id,
        minPriority: query.min_priority,
        maxPriority: query.max_priority,
        createdAfter: query.created_after,
        createdBefore: query.created_before
      };

      const [classifications, total] = await Promise.all([
        this.classificationRepository.list({
          ...filters,
          limit: query.limit,
          offset: query.offset,
          sort: query.sort
        }),
        this.classificationRepository.count(filters)
      ]);

      res.json({
        classifications: classifications.map(classificationToJson),
        pagination: {
          limit: query.limit,
          offset: query.offset,
          total
        }
      });
    } catch (error) {
      sendControllerError(res, error, 'list classifications');
    }
  }

  /**
   * GET /classifications/stats - Label counts and average priority
   */
  async stats(req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      const query = parseOrThrow(classificationStatsQuerySchema, req.query);
      const stats = await this.classificationRepository.getStats(query.user_id);

      res.json({
        total: stats.total,
        by_label: stats.byLabel,
        average_priority: stats.averagePriority
      });
    } catch (error) {
      sendControllerError(res, error, 'get classification stats');
    }
  }

  /**
   * GET /classifications/:cls_id
   */
  async getById(req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      const classification = await this.classificationRepository.getById(req.params.cls_id);

      if (!classification) {
        res.status(404).json({
          error: 'Classification not found',
          message: `Classification ${req.params.cls_id} not found`
        });
        return;
      }

      res.json(classificationToJson(classification));
    } catch (error) {
      sendControllerError(res, error, 'get classification');
    }
  }

  /**
   * PATCH /classifications/:cls_id - Update label and/or priority
   */
  async update(req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      const body = parseOrThrow(classificationUpdateSchema, req.body);
      const classification = await this.classificationRepository.update(req.params.cls_id, body);

      if (!classification) {
        res.status(404).json({
          error: 'Classification not found',
          message: `Classification ${req.params.cls_id} not found`
        });
        return;
      }

      res.json(classificationToJson(classification));
    } catch (error) {
      sendControllerError(res, error, 'update classification');
    }
  }

  /**
   * DELETE /classifications/:cls_id
   */
  async delete(req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      const deleted = await this.classificationRepository.delete(req.params.cls_id);

      if (!deleted) {
        res.status(404).json({
          error: 'Classification not found',
          message: `Classification ${req.params.cls_id} not found`
        });
        return;
      }

      res.json({ message: `Classification ${req.params.cls_id} deleted` });
    } catch (error) {
      sendControllerError(res, error, 'delete classification');
    }
  }
}

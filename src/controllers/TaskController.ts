import { Response } from 'express';
import { AuthenticatedRequest } from '../middleware/auth';
import { TaskRepository } from '../repositories/TaskRepository';
import { ClassificationRepository } from '../repositories/ClassificationRepository';
import { TaskService } from '../services/tasks/TaskService';
import {
  parseOrThrow,
  taskCreateSchema,
  taskGenerationSchema,
  taskQuerySchema,
  taskUpdateSchema
} from '../models/validation';
import { taskToJson } from '../models/transformers';
import { sendControllerError } from './errors';

/**
 * TaskController handles task generation and task CRUD
 */
export class TaskController {
  constructor(
    private taskService: TaskService,
    private taskRepository: TaskRepository,
    private classificationRepository: ClassificationRepository
  ) {}

  /**
   * POST /tasks/generate - Generate tasks from classifications
   */
  async generate(req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      const body = parseOrThrow(taskGenerationSchema, req.body);

      const outcome = await this.taskService.generateTasks(
        { classificationIds: body.classification_ids, userId: body.user_id },
        req.user?.token
      );

      res.status(201).json({
        tasks: outcome.tasks.map(taskToJson),
        total_generated: outcome.totalGenerated,
        success_count: outcome.successCount,
        error_count: outcome.errorCount
      });
    } catch (error) {
      sendControllerError(res, error, 'generate tasks');
    }
  }

  /**
   * POST /tasks
   */
  async create(req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      const body = parseOrThrow(taskCreateSchema, req.body);

      if (body.source_classification_id) {
        const source = await this.classificationRepository.getById(body.source_classification_id);
        if (!source) {
          res.status(404).json({
            error: 'Classification not found',
            message: `Classification ${body.source_classification_id} not found`
          });
          return;
        }
      }

      const task = await this.taskRepository.create({
        userId: body.user_id,
        sourceMessageId: body.source_message_id,
        sourceClassificationId: body.source_classification_id,
        title: body.title,
        description: body.description,
        status: body.status,
        dueDate: body.due_date,
        priority: body.priority
      });

      res.status(201).json(taskToJson(task));
    } catch (error) {
      sendControllerError(res, error, 'create task');
    }
  }

  /**
   * GET /tasks
   */
  async list(req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      const query = parseOrThrow(taskQuerySchema, req.query);
      const filters = { userId: query.user_id, status: query.status, minPriority: query.min_priority };

      const [tasks, total] = await Promise.all([
        this.taskRepository.list({ ...filters, limit: query.limit, offset: query.offset }),
        this.taskRepository.count(filters)
      ]);

      res.json({
        tasks: tasks.map(taskToJson),
        pagination: {
          limit: query.limit,
          offset: query.offset,
          total
        }
      });
    } catch (error) {
      sendControllerError(res, error, 'list tasks');
    }
  }

  /**
   * GET /tasks/:task_id
   */
  async getById(req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      const task = await this.taskRepository.getById(req.params.task_id);

      if (!task) {
        res.status(404).json({
          error: 'Task not found',
          message: `Task ${req.params.task_id} not found`
        });
        return;
      }

      res.json(taskToJson(task));
    } catch (error) {
      sendControllerError(res, error, 'get task');
    }
  }

  /**
   * PATCH /tasks/:task_id
   */
  async update(req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      const body = parseOrThrow(taskUpdateSchema, req.body);

      const task = await this.taskRepository.update(req.params.task_id, {
        title: body.title,
        description: body.description,
        status: body.status,
        priority: body.priority,
        dueDate: body.due_date
      });

      if (!task) {
        res.status(404).json({
          error: 'Task not found',
          message: `Task ${req.params.task_id} not found`
        });
        return;
      }

      res.json(taskToJson(task));
    } catch (error) {
      sendControllerError(res, error, 'update task');
    }
  }

  /**
   * DELETE /tasks/:task_id
   */
  async delete(req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      const deleted = await this.taskRepository.delete(req.params.task_id);

      if (!deleted) {
        res.status(404).json({
          error: 'Task not found',
          message: `Task ${req.params.task_id} not found`
        });
        return;
      }

      res.json({ message: `Task ${req.params.task_id} deleted` });
    } catch (error) {
      sendControllerError(res, error, 'delete task');
    }
  }
}

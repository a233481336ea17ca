import Joi from 'joi';
import {
  CLASSIFICATION_LABELS,
  ClassificationLabel,
  MAX_PRIORITY,
  MIN_PRIORITY,
  TASK_STATUSES,
  TaskStatus
} from '../types/models';

/**
 * Validation schemas for request bodies and query strings. Wire payloads use
 * snake_case; transformers map validated values onto the camelCase models.
 */

export interface ClassificationRequestBody {
  message_ids?: string[];
  user_id?: string;
}

export interface ClassificationUpdateBody {
  label?: ClassificationLabel;
  priority?: number;
}

export interface ClassificationQuery {
  label?: ClassificationLabel;
  user_id?: string;
  msg_id?: string;
  min_priority?: number;
  max_priority?: number;
  created_after?: Date;
  created_before?: Date;
  limit: number;
  offset: number;
  sort: 'created_at' | 'priority';
}

export interface ClassificationStatsQuery {
  user_id?: string;
}

export interface TaskCreateBody {
  user_id: string;
  source_message_id?: string | null;
  source_classification_id?: string | null;
  title: string;
  description?: string | null;
  status?: TaskStatus;
  due_date?: string | null;
  priority: number;
}

export interface TaskUpdateBody {
  title?: string;
  description?: string | null;
  status?: TaskStatus;
  priority?: number;
  due_date?: string | null;
}

export interface TaskQuery {
  user_id?: string;
  status?: TaskStatus;
  min_priority?: number;
  limit: number;
  offset: number;
}

export interface TaskGenerationBody {
  classification_ids: string[];
  user_id: string;
}

export interface BriefRequestBody {
  user_id: string;
  date?: string;
  max_items: number;
}

export interface BriefQuery {
  user_id: string;
  date?: string;
}

const DATE_ONLY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const userIdField = Joi.string().trim().min(1).max(255);
const priorityField = Joi.number().integer().min(MIN_PRIORITY).max(MAX_PRIORITY);
const labelField = Joi.string().valid(...CLASSIFICATION_LABELS);
const statusField = Joi.string().valid(...TASK_STATUSES);
const dateOnlyField = Joi.string()
  .pattern(DATE_ONLY_PATTERN)
  .custom((value: string, helpers) => (isCalendarDate(value) ? value : helpers.error('date.calendar')))
  .messages({
    'string.pattern.base': '{{#label}} must be a date in YYYY-MM-DD format',
    'date.calendar': '{{#label}} must be a valid calendar date'
  });

export const classificationRequestSchema = Joi.object<ClassificationRequestBody>({
  message_ids: Joi.array().items(Joi.string().uuid()).min(1).unique(),
  user_id: userIdField
})
  .or('message_ids', 'user_id')
  .messages({
    'object.missing': "Either 'message_ids' or 'user_id' must be provided"
  });

export const classificationUpdateSchema = Joi.object<ClassificationUpdateBody>({
  label: labelField,
  priority: priorityField
})
  .or('label', 'priority')
  .messages({
    'object.missing': "At least one of 'label' or 'priority' must be provided"
  });

export const classificationQuerySchema = Joi.object<ClassificationQuery>({
  label: labelField,
  user_id: userIdField,
  msg_id: Joi.string().uuid(),
  min_priority: priorityField,
  max_priority: priorityField,
  created_after: Joi.date().iso(),
  created_before: Joi.date().iso(),
  limit: Joi.number().integer().min(1).max(100).default(50),
  offset: Joi.number().integer().min(0).default(0),
  sort: Joi.string().valid('created_at', 'priority').default('created_at')
}).custom((value: ClassificationQuery, helpers) => {
  if (
    value.min_priority !== undefined &&
    value.max_priority !== undefined &&
    value.min_priority > value.max_priority
  ) {
    return helpers.message({ custom: 'min_priority must not exceed max_priority' });
  }
  return value;
});

export const classificationStatsQuerySchema = Joi.object<ClassificationStatsQuery>({
  user_id: userIdField
});

export const taskCreateSchema = Joi.object<TaskCreateBody>({
  user_id: userIdField.required(),
  source_message_id: Joi.string().uuid().allow(null),
  source_classification_id: Joi.string().uuid().allow(null),
  title: Joi.string().trim().min(1).max(500).required(),
  description: Joi.string().allow('', null),
  status: statusField,
  due_date: dateOnlyField.allow(null),
  priority: priorityField.required()
});

export const taskUpdateSchema = Joi.object<TaskUpdateBody>({
  title: Joi.string().trim().min(1).max(500),
  description: Joi.string().allow('', null),
  status: statusField,
  priority: priorityField,
  due_date: dateOnlyField.allow(null)
})
  .min(1)
  .messages({
    'object.min': 'At least one field must be provided'
  });

export const taskQuerySchema = Joi.object<TaskQuery>({
  user_id: userIdField,
  status: statusField,
  min_priority: priorityField,
  limit: Joi.number().integer().min(1).max(100).default(50),
  offset: Joi.number().integer().min(0).default(0)
});

export const taskGenerationSchema = Joi.object<TaskGenerationBody>({
  classification_ids: Joi.array().items(Joi.string().uuid()).min(1).unique().required(),
  user_id: userIdField.required()
});

export const briefRequestSchema = Joi.object<BriefRequestBody>({
  user_id: userIdField.required(),
  date: dateOnlyField,
  max_items: Joi.number().integer().min(1).max(200).default(50)
});

export const briefQuerySchema = Joi.object<BriefQuery>({
  user_id: userIdField.required(),
  date: dateOnlyField
});

const VALIDATION_OPTIONS: Joi.ValidationOptions = { abortEarly: false, stripUnknown: true };

// Custom validation error class
export class ValidationError extends Error {
  public details: Joi.ValidationErrorItem[];

  constructor(message: string, details: Joi.ValidationErrorItem[]) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Validate input against a schema, returning the converted value or throwing
 * a ValidationError carrying every failure.
 */
export function parseOrThrow<T>(schema: Joi.ObjectSchema<T>, input: unknown): T {
  const result = schema.validate(input ?? {}, VALIDATION_OPTIONS);
  if (result.error) {
    throw new ValidationError(result.error.message, result.error.details);
  }
  return result.value;
}

// Domain-specific validation functions
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isClassificationLabel(value: unknown): value is ClassificationLabel {
  return CLASSIFICATION_LABELS.some(label => label === value);
}

export function clampPriority(value: number): number {
  return Math.min(MAX_PRIORITY, Math.max(MIN_PRIORITY, Math.round(value)));
}

export function isCalendarDate(value: string): boolean {
  if (!DATE_ONLY_PATTERN.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

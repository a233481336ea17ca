import {
  Brief,
  BriefItem,
  BriefRow,
  Classification,
  ClassificationEvent,
  ClassificationRow,
  Task,
  TaskRow,
  TaskStatus
} from '../types/models';
import { isClassificationLabel } from './validation';

/**
 * Transformation functions between database rows, model objects and the
 * snake_case JSON served over HTTP
 */

// Classification transformations
export function classificationRowToModel(row: ClassificationRow): Classification {
  if (!isClassificationLabel(row.label)) {
    throw new Error(`Unknown classification label in row ${row.cls_id}: ${row.label}`);
  }
  return {
    clsId: row.cls_id,
    msgId: row.msg_id,
    userId: row.user_id,
    label: row.label,
    priority: row.priority,
    createdAt: new Date(row.created_at)
  };
}

export function classificationModelToRow(classification: Classification): ClassificationRow {
  return {
    cls_id: classification.clsId,
    msg_id: classification.msgId,
    user_id: classification.userId,
    label: classification.label,
    priority: classification.priority,
    created_at: classification.createdAt.toISOString()
  };
}

export function classificationToJson(classification: Classification) {
  return {
    cls_id: classification.clsId,
    msg_id: classification.msgId,
    user_id: classification.userId,
    label: classification.label,
    priority: classification.priority,
    created_at: classification.createdAt.toISOString()
  };
}

export function classificationToEvent(classification: Classification): ClassificationEvent {
  return {
    cls_id: classification.clsId,
    msg_id: classification.msgId,
    label: classification.label,
    priority: classification.priority,
    created_at: classification.createdAt.toISOString()
  };
}

// Task transformations
function toTaskStatus(value: string): TaskStatus {
  return value === 'done' ? 'done' : 'open';
}

export function taskRowToModel(row: TaskRow): Task {
  return {
    taskId: row.task_id,
    userId: row.user_id,
    sourceMessageId: row.source_message_id,
    sourceClassificationId: row.source_classification_id,
    title: row.title,
    description: row.description,
    status: toTaskStatus(row.status),
    dueDate: row.due_date,
    priority: row.priority,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at)
  };
}

export function taskModelToRow(task: Task): TaskRow {
  return {
    task_id: task.taskId,
    user_id: task.userId,
    source_message_id: task.sourceMessageId,
    source_classification_id: task.sourceClassificationId,
    title: task.title,
    description: task.description,
    status: task.status,
    due_date: task.dueDate,
    priority: task.priority,
    created_at: task.createdAt.toISOString(),
    updated_at: task.updatedAt.toISOString()
  };
}

export function taskToJson(task: Task) {
  return {
    task_id: task.taskId,
    user_id: task.userId,
    source_message_id: task.sourceMessageId,
    source_classification_id: task.sourceClassificationId,
    title: task.title,
    description: task.description,
    status: task.status,
    due_date: task.dueDate,
    priority: task.priority,
    created_at: task.createdAt.toISOString(),
    updated_at: task.updatedAt.toISOString()
  };
}

// Brief transformations
interface StoredBriefItem {
  classification_id: string;
  message_id: string;
  title: string;
  description: string;
  priority_score: number;
  channel: BriefItem['channel'];
  sender: string;
  received_at: string;
  extracted_tasks: string[] | null;
}

export function briefItemToJson(item: BriefItem): StoredBriefItem {
  return {
    classification_id: item.classificationId,
    message_id: item.messageId,
    title: item.title,
    description: item.description,
    priority_score: item.priorityScore,
    channel: item.channel,
    sender: item.sender,
    received_at: item.receivedAt.toISOString(),
    extracted_tasks: item.extractedTasks
  };
}

function briefItemFromJson(item: StoredBriefItem): BriefItem {
  return {
    classificationId: item.classification_id,
    messageId: item.message_id,
    title: item.title,
    description: item.description,
    priorityScore: item.priority_score,
    channel: item.channel,
    sender: item.sender,
    receivedAt: new Date(item.received_at),
    extractedTasks: item.extracted_tasks
  };
}

export function briefRowToModel(row: BriefRow): Brief {
  const items: StoredBriefItem[] = JSON.parse(row.items);
  return {
    briefId: row.brief_id,
    userId: row.user_id,
    briefDate: row.brief_date,
    totalItems: row.total_items,
    highPriorityCount: row.high_priority_count,
    todoCount: row.todo_count,
    followupCount: row.followup_count,
    items: items.map(briefItemFromJson),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at)
  };
}

export function briefModelToRow(brief: Brief): BriefRow {
  return {
    brief_id: brief.briefId,
    user_id: brief.userId,
    brief_date: brief.briefDate,
    total_items: brief.totalItems,
    high_priority_count: brief.highPriorityCount,
    todo_count: brief.todoCount,
    followup_count: brief.followupCount,
    items: JSON.stringify(brief.items.map(briefItemToJson)),
    created_at: brief.createdAt.toISOString(),
    updated_at: brief.updatedAt.toISOString()
  };
}

export function briefToJson(brief: Brief) {
  return {
    brief_id: brief.briefId,
    user_id: brief.userId,
    brief_date: brief.briefDate,
    total_items: brief.totalItems,
    high_priority_count: brief.highPriorityCount,
    todo_count: brief.todoCount,
    followup_count: brief.followupCount,
    items: brief.items.map(briefItemToJson),
    created_at: brief.createdAt.toISOString(),
    updated_at: brief.updatedAt.toISOString()
  };
}

/**
 * Core data models for the message classification service
 */

export type ClassificationLabel = 'todo' | 'followup' | 'noise';
export const CLASSIFICATION_LABELS: readonly ClassificationLabel[] = ['todo', 'followup', 'noise'];

export type ChannelType = 'gmail' | 'slack';
export const CHANNEL_TYPES: readonly ChannelType[] = ['gmail', 'slack'];

export type TaskStatus = 'open' | 'done';
export const TASK_STATUSES: readonly TaskStatus[] = ['open', 'done'];

export const MIN_PRIORITY = 1;
export const MAX_PRIORITY = 10;
export const HIGH_PRIORITY_THRESHOLD = 8;

/**
 * A message as served by the integrations service. Messages are fetched on
 * demand and never stored here.
 */
export interface Message {
  msgId: string;
  accountId: string | null;
  externalId: string;
  channel: ChannelType;
  sender: string;
  subject: string | null;
  snippet: string;
  receivedAt: Date;
  rawRef: string | null;
  priority: number | null;
  createdAt: Date;
}

export interface Classification {
  clsId: string;
  msgId: string;
  userId: string | null;
  label: ClassificationLabel;
  priority: number;
  createdAt: Date;
}

export interface Task {
  taskId: string;
  userId: string;
  sourceMessageId: string | null;
  sourceClassificationId: string | null;
  title: string;
  description: string | null;
  status: TaskStatus;
  dueDate: string | null; // YYYY-MM-DD
  priority: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface BriefItem {
  classificationId: string;
  messageId: string;
  title: string;
  description: string;
  priorityScore: number;
  channel: ChannelType;
  sender: string;
  receivedAt: Date;
  extractedTasks: string[] | null;
}

export interface Brief {
  briefId: string;
  userId: string;
  briefDate: string; // YYYY-MM-DD
  totalItems: number;
  highPriorityCount: number;
  todoCount: number;
  followupCount: number;
  items: BriefItem[];
  createdAt: Date;
  updatedAt: Date;
}

export interface ClassificationEvent {
  cls_id: string;
  msg_id: string;
  label: ClassificationLabel;
  priority: number;
  created_at: string;
}

// Request / response shapes

export interface ClassificationRequest {
  messageIds?: string[];
  userId?: string;
}

export interface ClassificationOutcome {
  classifications: Classification[];
  totalProcessed: number;
  successCount: number;
  errorCount: number;
}

export interface ClassificationUpdate {
  label?: ClassificationLabel;
  priority?: number;
}

export interface ClassificationFilters {
  label?: ClassificationLabel;
  userId?: string;
  msgId?: string;
  minPriority?: number;
  maxPriority?: number;
  createdAfter?: Date;
  createdBefore?: Date;
}

export interface ClassificationListOptions extends ClassificationFilters {
  limit?: number;
  offset?: number;
  sort?: 'created_at' | 'priority';
}

export interface ClassificationStats {
  total: number;
  byLabel: Record<ClassificationLabel, number>;
  averagePriority: number | null;
}

export interface TaskCreate {
  userId: string;
  sourceMessageId?: string | null;
  sourceClassificationId?: string | null;
  title: string;
  description?: string | null;
  status?: TaskStatus;
  dueDate?: string | null;
  priority: number;
}

export interface TaskUpdate {
  title?: string;
  description?: string | null;
  status?: TaskStatus;
  priority?: number;
  dueDate?: string | null;
}

export interface TaskListOptions {
  userId?: string;
  status?: TaskStatus;
  minPriority?: number;
  limit?: number;
  offset?: number;
}

export interface TaskGenerationRequest {
  classificationIds: string[];
  userId: string;
}

export interface TaskGenerationOutcome {
  tasks: Task[];
  totalGenerated: number;
  successCount: number;
  errorCount: number;
}

export interface BriefRequest {
  userId: string;
  date?: string;
  maxItems?: number;
}

// Database row interfaces (for SQLite storage)

export interface ClassificationRow {
  cls_id: string;
  msg_id: string;
  user_id: string | null;
  label: string;
  priority: number;
  created_at: string;
}

export interface TaskRow {
  task_id: string;
  user_id: string;
  source_message_id: string | null;
  source_classification_id: string | null;
  title: string;
  description: string | null;
  status: string;
  due_date: string | null;
  priority: number;
  created_at: string;
  updated_at: string;
}

export interface BriefRow {
  brief_id: string;
  user_id: string;
  brief_date: string;
  total_items: number;
  high_priority_count: number;
  todo_count: number;
  followup_count: number;
  items: string; // JSON array
  created_at: string;
  updated_at: string;
}

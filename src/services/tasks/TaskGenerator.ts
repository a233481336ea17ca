import { Classification, HIGH_PRIORITY_THRESHOLD, Message, TaskCreate } from '../../types/models';

export interface GeneratedTasks {
  tasks: TaskCreate[];
  successCount: number;
  errorCount: number;
}

const TITLE_SNIPPET_LENGTH = 50;
const FRIDAY = 5;
const DAY_MS = 24 * 60 * 60 * 1000;

function toDateOnly(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function formatReceived(date: Date): string {
  return `${toDateOnly(date)} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`;
}

/**
 * Turns todo/followup classifications into tasks. Dates are computed in UTC.
 */
export class TaskGenerator {
  constructor(private readonly now: () => Date = () => new Date()) {}

  /**
   * Generate one task per actionable classification. Noise is skipped and
   * counted neither as a success nor as an error; a classification whose
   * message is unavailable is an error.
   */
  generate(classifications: Classification[], messages: Message[], userId: string): GeneratedTasks {
    const messageMap = new Map(messages.map(message => [message.msgId, message]));
    const tasks: TaskCreate[] = [];
    let errorCount = 0;

    for (const classification of classifications) {
      const message = messageMap.get(classification.msgId);
      if (!message) {
        console.error(`❌ Message ${classification.msgId} not found for classification ${classification.clsId}`);
        errorCount++;
        continue;
      }

      if (classification.label === 'noise') {
        continue;
      }

      tasks.push({
        userId,
        sourceMessageId: message.msgId,
        sourceClassificationId: classification.clsId,
        title: this.generateTitle(message),
        description: this.generateDescription(message, classification),
        status: 'open',
        dueDate: this.determineDueDate(classification, message),
        priority: classification.priority
      });
    }

    return { tasks, successCount: tasks.length, errorCount };
  }

  generateTitle(message: Message): string {
    if (message.subject) {
      return message.subject;
    }
    if (message.snippet) {
      return message.snippet.length > TITLE_SNIPPET_LENGTH
        ? `${message.snippet.substring(0, TITLE_SNIPPET_LENGTH)}...`
        : message.snippet;
    }
    return `Task from ${message.sender}`;
  }

  generateDescription(message: Message, classification: Classification): string {
    const parts: string[] = [];

    if (message.subject) {
      parts.push(`Subject: ${message.subject}`);
    }
    parts.push(`From: ${message.sender}`);
    parts.push(`Channel: ${message.channel}`);
    parts.push(`Received: ${formatReceived(message.receivedAt)}`);

    if (message.snippet) {
      parts.push(`\nMessage:\n${message.snippet}`);
    }

    parts.push(`\nClassification: ${classification.label} (Priority: ${classification.priority})`);

    return parts.join('\n');
  }

  /**
   * Explicit deadlines in the text win; otherwise the due date follows the
   * label and priority
   */
  determineDueDate(classification: Classification, message: Message): string | null {
    const content = `${message.subject ?? ''} ${message.snippet}`.toLowerCase();
    const today = this.now();
    const daysUntilFriday = (FRIDAY - today.getUTCDay() + 7) % 7;
    const plusDays = (days: number): string => toDateOnly(new Date(today.getTime() + days * DAY_MS));

    if (content.includes('eod today') || content.includes('end of day today')) {
      return plusDays(0);
    }
    if (content.includes('eod tomorrow') || content.includes('tomorrow')) {
      return plusDays(1);
    }
    if (content.includes('this week')) {
      return plusDays(daysUntilFriday);
    }
    if (content.includes('next week')) {
      return plusDays(daysUntilFriday + 7);
    }
    if (classification.label === 'todo') {
      return plusDays(classification.priority >= HIGH_PRIORITY_THRESHOLD ? 1 : 3);
    }
    if (classification.label === 'followup') {
      return plusDays(5);
    }
    return null;
  }
}

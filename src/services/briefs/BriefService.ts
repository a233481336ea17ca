import { v4 as uuidv4 } from 'uuid';
import {
  Brief,
  BriefItem,
  BriefRequest,
  Classification,
  HIGH_PRIORITY_THRESHOLD,
  Message
} from '../../types/models';
import { ClassificationRepository } from '../../repositories/ClassificationRepository';
import { TaskRepository } from '../../repositories/TaskRepository';
import { BriefRepository } from '../../repositories/BriefRepository';
import { IntegrationsClient } from '../integrations/IntegrationsClient';

const DEFAULT_MAX_ITEMS = 50;
const DESCRIPTION_LENGTH = 200;
const DAY_MS = 24 * 60 * 60 * 1000;

function truncate(text: string, length: number): string {
  return text.length > length ? `${text.substring(0, length)}...` : text;
}

/**
 * Builds a user's daily brief from the day's actionable classifications
 */
export class BriefService {
  constructor(
    private readonly classificationRepository: ClassificationRepository,
    private readonly taskRepository: TaskRepository,
    private readonly briefRepository: BriefRepository,
    private readonly integrations: IntegrationsClient,
    private readonly now: () => Date = () => new Date()
  ) {}

  async generateBrief(request: BriefRequest, token?: string): Promise<Brief> {
    const briefDate = request.date ?? this.now().toISOString().slice(0, 10);
    const dayStart = new Date(`${briefDate}T00:00:00.000Z`);
    const dayEnd = new Date(dayStart.getTime() + DAY_MS);

    const classifications = await this.classificationRepository.getActionableForUser(
      request.userId,
      dayStart,
      dayEnd,
      request.maxItems ?? DEFAULT_MAX_ITEMS
    );

    const messageIds = classifications.map(classification => classification.msgId);
    const { messages } = await this.integrations.getMessagesByIds(messageIds, token);
    const messageMap = new Map(messages.map(message => [message.msgId, message]));
    const taskTitles = await this.taskRepository.getTitlesByMessageIds(request.userId, messageIds);

    const items: BriefItem[] = [];
    let todoCount = 0;
    let followupCount = 0;
    let highPriorityCount = 0;

    for (const classification of classifications) {
      const message = messageMap.get(classification.msgId);
      if (!message) {
        console.warn(`Skipping brief item for ${classification.msgId}: message unavailable`);
        continue;
      }

      items.push(this.buildItem(classification, message, taskTitles.get(message.msgId) ?? null));

      if (classification.label === 'todo') todoCount++;
      if (classification.label === 'followup') followupCount++;
      if (classification.priority >= HIGH_PRIORITY_THRESHOLD) highPriorityCount++;
    }

    const now = this.now();
    const brief = await this.briefRepository.upsert({
      briefId: uuidv4(),
      userId: request.userId,
      briefDate,
      totalItems: items.length,
      highPriorityCount,
      todoCount,
      followupCount,
      items,
      createdAt: now,
      updatedAt: now
    });

    console.log(`✅ Brief for ${request.userId} on ${briefDate}: ${items.length} items (${highPriorityCount} high priority)`);
    return brief;
  }

  private buildItem(classification: Classification, message: Message, extractedTasks: string[] | null): BriefItem {
    return {
      classificationId: classification.clsId,
      messageId: message.msgId,
      title: message.subject || truncate(message.snippet, 50) || `Message from ${message.sender}`,
      description: truncate(message.snippet, DESCRIPTION_LENGTH),
      priorityScore: classification.priority,
      channel: message.channel,
      sender: message.sender,
      receivedAt: message.receivedAt,
      extractedTasks
    };
  }
}

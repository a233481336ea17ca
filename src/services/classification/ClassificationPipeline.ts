import { v4 as uuidv4 } from 'uuid';
import { Classification, ClassificationOutcome, ClassificationRequest, Message } from '../../types/models';
import { ClassificationRepository } from '../../repositories/ClassificationRepository';
import { IntegrationsClient } from '../integrations/IntegrationsClient';
import { MessageClassifier } from '../ml/MessageClassifier';
import { ClassificationEventPublisher } from '../events/ClassificationEventPublisher';

export interface PipelineContext {
  token?: string;
  authenticatedUserId?: string;
}

const USER_MESSAGE_LIMIT = 50;

/**
 * Classification request pipeline: resolve messages, skip those already
 * classified, classify the rest, persist and publish.
 */
export class ClassificationPipeline {
  constructor(
    private readonly integrations: IntegrationsClient,
    private readonly classifier: MessageClassifier,
    private readonly repository: ClassificationRepository,
    private readonly publisher: ClassificationEventPublisher
  ) {}

  async classify(request: ClassificationRequest, context: PipelineContext = {}): Promise<ClassificationOutcome> {
    const { messages, requested } = await this.resolveMessages(request, context.token);
    const ownerId = request.userId ?? context.authenticatedUserId ?? null;

    const existing = await this.repository.getByMessageIds(messages.map(message => message.msgId));
    const existingByMessage = new Map(existing.map(classification => [classification.msgId, classification]));

    const results: Classification[] = [];
    const created: Classification[] = [];

    for (const message of messages) {
      const stored = existingByMessage.get(message.msgId);
      if (stored) {
        results.push(stored);
        continue;
      }

      try {
        const classification = await this.classifyMessage(message, ownerId);
        const { classification: saved, created: isNew } = await this.repository.insertIfAbsent(classification);
        results.push(saved);
        if (isNew) {
          created.push(saved);
        }
      } catch (error) {
        console.error(`❌ Failed to classify message ${message.msgId}:`, error);
      }
    }

    for (const classification of created) {
      this.publisher.publish(classification).catch(error => {
        console.error(`❌ Event publish failed for ${classification.clsId}:`, error);
      });
    }

    console.log(
      `✅ Classified ${created.length} new, ${results.length - created.length} existing of ${requested} messages`
    );

    return {
      classifications: results,
      totalProcessed: requested,
      successCount: results.length,
      errorCount: requested - results.length
    };
  }

  private async classifyMessage(message: Message, ownerId: string | null): Promise<Classification> {
    const result = await this.classifier.classify(message);
    return {
      clsId: uuidv4(),
      msgId: message.msgId,
      userId: ownerId,
      label: result.label,
      priority: result.priority,
      createdAt: new Date()
    };
  }

  private async resolveMessages(
    request: ClassificationRequest,
    token?: string
  ): Promise<{ messages: Message[]; requested: number }> {
    if (request.messageIds && request.messageIds.length > 0) {
      const { messages, missing } = await this.integrations.getMessagesByIds(request.messageIds, token);
      if (missing.length > 0) {
        console.warn(`Messages not found in integrations service: ${missing.join(', ')}`);
      }
      return { messages, requested: request.messageIds.length };
    }

    if (request.userId) {
      const messages = await this.integrations.getMessages({
        token,
        userId: request.userId,
        limit: USER_MESSAGE_LIMIT
      });
      return { messages, requested: messages.length };
    }

    return { messages: [], requested: 0 };
  }
}

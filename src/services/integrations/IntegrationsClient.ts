import { CHANNEL_TYPES, ChannelType, Message } from '../../types/models';
import { isRecord } from '../../models/validation';

export interface IntegrationsClientConfig {
  baseUrl: string;
  timeoutMs: number;
}

export interface GetMessagesOptions {
  token?: string;
  userId?: string;
  limit?: number;
  channel?: ChannelType;
}

export interface MessagesByIdsResult {
  messages: Message[];
  missing: string[];
}

/**
 * Raised when the integrations service cannot be reached or answers with an
 * unexpected status
 */
export class IntegrationsError extends Error {
  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = 'IntegrationsError';
  }
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

function parseTimestamp(value: unknown): Date | null {
  if (value instanceof Date) {
    return isNaN(value.getTime()) ? null : value;
  }
  if (typeof value !== 'string' && typeof value !== 'number') {
    return null;
  }
  const parsed = new Date(value);
  return isNaN(parsed.getTime()) ? null : parsed;
}

function isChannel(value: unknown): value is ChannelType {
  return CHANNEL_TYPES.some(channel => channel === value);
}

/**
 * Client for the integrations service that owns Gmail/Slack message storage
 */
export class IntegrationsClient {
  constructor(private readonly config: IntegrationsClientConfig) {}

  /**
   * Fetch messages visible to the caller, optionally narrowed to one user
   */
  async getMessages(options: GetMessagesOptions = {}): Promise<Message[]> {
    const params = new URLSearchParams({ limit: String(options.limit ?? 50) });
    if (options.channel) {
      params.set('channel', options.channel);
    }
    if (options.userId) {
      params.set('user_id', options.userId);
    }

    const response = await this.request(`/messages?${params.toString()}`, options.token);
    if (!response.ok) {
      throw new IntegrationsError(`Integrations service returned ${response.status} for message list`, response.status);
    }

    const data: unknown = await response.json();
    const items = Array.isArray(data) ? data : isRecord(data) && Array.isArray(data.messages) ? data.messages : null;
    if (!items) {
      throw new IntegrationsError('Integrations service returned an unexpected message list payload');
    }

    const messages: Message[] = [];
    for (const item of items) {
      try {
        messages.push(this.parseMessage(item));
      } catch (error) {
        console.error('❌ Skipping unparseable message from integrations service:', error);
      }
    }
    return messages;
  }

  /**
   * Fetch a single message by ID; null when the service reports 404
   */
  async getMessageById(messageId: string, token?: string): Promise<Message | null> {
    const response = await this.request(`/messages/${encodeURIComponent(messageId)}`, token);

    if (response.status === 404) {
      return null;
    }
    if (!response.ok) {
      throw new IntegrationsError(`Integrations service returned ${response.status} for message ${messageId}`, response.status);
    }

    return this.parseMessage(await response.json());
  }

  /**
   * Fetch multiple messages by ID in parallel. Messages that are missing or
   * fail to load are reported in `missing` rather than failing the batch.
   */
  async getMessagesByIds(messageIds: string[], token?: string): Promise<MessagesByIdsResult> {
    const settled = await Promise.allSettled(messageIds.map(id => this.getMessageById(id, token)));

    const messages: Message[] = [];
    const missing: string[] = [];
    settled.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled' && outcome.value) {
        messages.push(outcome.value);
        return;
      }
      if (outcome.status === 'rejected') {
        console.error(`❌ Error fetching message ${messageIds[index]}:`, outcome.reason);
      }
      missing.push(messageIds[index]);
    });

    return { messages, missing };
  }

  /**
   * Parse message data from an API response. Field names vary between
   * integrations versions, so several aliases are accepted.
   */
  parseMessage(data: unknown): Message {
    if (!isRecord(data)) {
      throw new Error('Message payload must be an object');
    }

    const msgId = optionalString(data.msg_id) ?? optionalString(data.message_id) ?? optionalString(data.id);
    if (!msgId) {
      throw new Error('Message payload has no id');
    }

    const receivedAt = parseTimestamp(data.received_at);
    if (!receivedAt) {
      throw new Error(`Message ${msgId} has no valid received_at`);
    }

    return {
      msgId,
      accountId: optionalString(data.account_id),
      externalId: typeof data.external_id === 'string' ? data.external_id : '',
      channel: isChannel(data.channel) ? data.channel : 'gmail',
      sender: typeof data.sender === 'string' ? data.sender : '',
      subject: optionalString(data.subject),
      snippet: typeof data.snippet === 'string' ? data.snippet : '',
      receivedAt,
      rawRef: optionalString(data.raw_ref),
      priority: typeof data.priority === 'number' ? data.priority : null,
      createdAt: parseTimestamp(data.created_at) ?? new Date()
    };
  }

  private async request(pathAndQuery: string, token?: string): Promise<Response> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }

    try {
      return await fetch(`${this.config.baseUrl}${pathAndQuery}`, {
        headers,
        signal: AbortSignal.timeout(this.config.timeoutMs)
      });
    } catch (error) {
      throw new IntegrationsError(
        `Failed to reach integrations service: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }
}

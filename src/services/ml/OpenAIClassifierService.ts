import OpenAI from 'openai';
import { ClassificationLabel, Message } from '../../types/models';
import { clampPriority, isClassificationLabel, isRecord } from '../../models/validation';

export interface OpenAIClassifierOptions {
  apiKey: string;
  model: string;
}

export interface LlmClassification {
  label: ClassificationLabel;
  priority: number;
  reasoning: string;
}

const MAX_SNIPPET_LENGTH = 2000;

const SYSTEM_PROMPT =
  'You are an assistant that triages inbound messages for a busy professional. ' +
  'Classify each message as "todo" (the recipient must act), "followup" (the recipient should check back or track progress) ' +
  'or "noise" (no action needed), and score its priority from 1 (ignore) to 10 (drop everything). Always respond with valid JSON.';

/**
 * Service for integrating with OpenAI API to classify messages
 */
export class OpenAIClassifierService {
  private openai: OpenAI;
  private model: string;

  constructor(options: OpenAIClassifierOptions) {
    if (!options.apiKey) {
      throw new Error('OpenAI API key is required');
    }

    this.openai = new OpenAI({
      apiKey: options.apiKey
    });

    this.model = options.model;
  }

  getModel(): string {
    return this.model;
  }

  /**
   * Classify a message into todo/followup/noise with a 1-10 priority
   */
  async classifyMessage(message: Message): Promise<LlmClassification> {
    try {
      const response = await this.openai.chat.completions.create({
        model: this.model,
        messages: [
          {
            role: 'system',
            content: SYSTEM_PROMPT
          },
          {
            role: 'user',
            content: this.buildClassificationPrompt(message)
          }
        ],
        temperature: 0.1, // Low temperature for consistent results
        max_tokens: 300,
        response_format: { type: 'json_object' }
      });

      return this.parseClassificationResponse(response.choices[0]?.message?.content ?? null);
    } catch (error) {
      console.error(`OpenAI classification error for message ${message.msgId}:`, error);
      throw new Error(`Failed to classify message: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }

  /**
   * Build the classification prompt for OpenAI
   */
  buildClassificationPrompt(message: Message): string {
    const content = this.sanitizeMessageContent(message);

    return `Classify the following ${content.channel} message.

MESSAGE:
From: ${content.sender}
Subject: ${content.subject}
Received: ${content.receivedAt}
Content: ${content.snippet}

Guidance:
- Explicit requests, deadlines and assignments are "todo".
- Status checks, reminders and threads awaiting someone else's reply are "followup".
- Newsletters, marketing, automated notifications and FYIs are "noise".
- Urgent language, near deadlines and senior senders raise priority.

Respond with a JSON object:
{
  "label": "todo" | "followup" | "noise",
  "priority": integer from 1 to 10,
  "reasoning": "one sentence explaining the decision"
}`;
  }

  /**
   * Sanitize message content for OpenAI processing
   */
  private sanitizeMessageContent(message: Message): {
    channel: string;
    sender: string;
    subject: string;
    snippet: string;
    receivedAt: string;
  } {
    let snippet = message.snippet || '';

    // Truncate content if too long (OpenAI has token limits)
    if (snippet.length > MAX_SNIPPET_LENGTH) {
      snippet = snippet.substring(0, MAX_SNIPPET_LENGTH) + '... [truncated]';
    }

    snippet = snippet
      .replace(/\b\d{4}[-\s]?\d{4}[-\s]?\d{4}[-\s]?\d{4}\b/g, '[CARD_NUMBER]') // Credit card numbers
      .replace(/\b\d{3}-\d{2}-\d{4}\b/g, '[SSN]') // Social security numbers
      .replace(/\b\d{10,}\b/g, '[PHONE]'); // Phone numbers

    return {
      channel: message.channel === 'slack' ? 'Slack' : 'email',
      sender: message.sender || '[Unknown Sender]',
      subject: message.subject || '[No Subject]',
      snippet,
      receivedAt: message.receivedAt.toISOString()
    };
  }

  /**
   * Parse OpenAI classification response
   */
  private parseClassificationResponse(content: string | null): LlmClassification {
    if (!content) {
      throw new Error('Empty response from OpenAI');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      console.error('Failed to parse OpenAI response:', content, error);
      throw new Error('Invalid JSON response from OpenAI');
    }

    if (!isRecord(parsed)) {
      throw new Error('Invalid JSON response from OpenAI');
    }

    const { label, priority, reasoning } = parsed;

    if (!isClassificationLabel(label)) {
      throw new Error('Invalid label value in response');
    }

    if (typeof priority !== 'number' || !Number.isFinite(priority)) {
      throw new Error('Invalid priority value in response');
    }

    return {
      label,
      priority: clampPriority(priority),
      reasoning: typeof reasoning === 'string' ? reasoning.substring(0, 500) : ''
    };
  }
}

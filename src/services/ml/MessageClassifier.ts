import { ClassificationLabel, MAX_PRIORITY, Message } from '../../types/models';
import { KeywordClassifier } from './KeywordClassifier';
import { OpenAIClassifierService } from './OpenAIClassifierService';

export type ClassifierMode = 'openai' | 'keyword';

export interface MessageClassificationResult {
  msgId: string;
  label: ClassificationLabel;
  priority: number;
  method: 'openai' | 'keyword' | 'fallback';
  reasoning?: string;
}

interface SenderRule {
  keywords: string[];
  boost: number;
}

// Applied in order; each boost is capped independently
const SENDER_RULES: SenderRule[] = [
  { keywords: ['ceo', 'boss'], boost: 3 },
  { keywords: ['legal'], boost: 2 },
  { keywords: ['manager'], boost: 1 }
];

/**
 * Raise priority for senders whose address marks them as senior or legal
 */
export function applyBusinessRules(sender: string, basePriority: number): number {
  const normalizedSender = sender.toLowerCase();
  let priority = basePriority;

  for (const rule of SENDER_RULES) {
    if (rule.keywords.some(keyword => normalizedSender.includes(keyword))) {
      priority = Math.min(MAX_PRIORITY, priority + rule.boost);
    }
  }

  return priority;
}

/**
 * Main message classifier. Uses OpenAI when configured and falls back to
 * keyword scoring when it is not, or when a call fails.
 */
export class MessageClassifier {
  constructor(
    private readonly keywordClassifier: KeywordClassifier,
    private readonly openaiService: OpenAIClassifierService | null = null
  ) {}

  getMode(): ClassifierMode {
    return this.openaiService ? 'openai' : 'keyword';
  }

  /**
   * Classify a single message
   */
  async classify(message: Message): Promise<MessageClassificationResult> {
    if (this.openaiService) {
      try {
        const result = await this.openaiService.classifyMessage(message);
        return {
          msgId: message.msgId,
          label: result.label,
          priority: applyBusinessRules(message.sender, result.priority),
          method: 'openai',
          reasoning: result.reasoning
        };
      } catch (error) {
        console.error(`OpenAI classification failed for message ${message.msgId}, using fallback:`, error);
        return this.classifyWithKeywords(message, 'fallback');
      }
    }

    return this.classifyWithKeywords(message, 'keyword');
  }

  private classifyWithKeywords(
    message: Message,
    method: 'keyword' | 'fallback'
  ): MessageClassificationResult {
    const result = this.keywordClassifier.classify(message);
    return {
      msgId: message.msgId,
      label: result.label,
      priority: applyBusinessRules(message.sender, result.priority),
      method
    };
  }
}

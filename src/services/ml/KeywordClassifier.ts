import { ClassificationLabel, Message } from '../../types/models';

export interface KeywordScores {
  urgency: number;
  action: number;
  followup: number;
  noise: number;
}

export interface KeywordClassification {
  label: ClassificationLabel;
  priority: number;
  scores: KeywordScores;
}

const URGENCY_INDICATORS = ['urgent', 'asap', 'deadline', 'due tomorrow', 'critical', 'immediately'];
const ACTION_INDICATORS = ['need to', 'should', 'must', 'please', 'can you', 'action', 'task', 'todo'];
const FOLLOWUP_INDICATORS = ['follow up', 'follow-up', 'reminder', 'check', 'status', 'update'];
const NOISE_INDICATORS = ['newsletter', 'unsubscribe', 'marketing', 'promotion', 'sale'];

function countMatches(content: string, indicators: string[]): number {
  return indicators.filter(indicator => content.includes(indicator)).length;
}

/**
 * Deterministic keyword classifier. Used when no LLM is configured and as the
 * fallback when an LLM call fails.
 */
export class KeywordClassifier {
  score(message: Pick<Message, 'subject' | 'snippet'>): KeywordScores {
    const content = `${message.subject ?? ''} ${message.snippet}`.toLowerCase();
    return {
      urgency: countMatches(content, URGENCY_INDICATORS),
      action: countMatches(content, ACTION_INDICATORS),
      followup: countMatches(content, FOLLOWUP_INDICATORS),
      noise: countMatches(content, NOISE_INDICATORS)
    };
  }

  classify(message: Pick<Message, 'subject' | 'snippet'>): KeywordClassification {
    const scores = this.score(message);
    return {
      label: this.labelFor(scores),
      priority: this.basePriorityFor(scores),
      scores
    };
  }

  private labelFor({ urgency, action, followup, noise }: KeywordScores): ClassificationLabel {
    if (noise > 0 && action === 0) {
      return 'noise';
    }
    if (urgency >= 2 || (urgency >= 1 && action >= 2)) {
      return 'todo';
    }
    if (action >= 2) {
      return 'todo';
    }
    if (followup >= 1) {
      return 'followup';
    }
    return 'noise';
  }

  private basePriorityFor({ urgency, action }: KeywordScores): number {
    if (urgency >= 2) return 9;
    if (urgency >= 1) return 7;
    if (action >= 2) return 6;
    if (action >= 1) return 5;
    return 3;
  }
}

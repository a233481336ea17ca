import { ClassificationEvent, HIGH_PRIORITY_THRESHOLD } from '../../types/models';
import { isClassificationLabel, isRecord } from '../../models/validation';

export type EventHandlingResult =
  | { status: 'success'; processed: string; highPriority: boolean }
  | { status: 'error'; message: string };

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Decode a payload that is either raw JSON or base64-encoded JSON, as push
 * deliveries wrap it
 */
export function decodeEventPayload(payload: string | Buffer): ClassificationEvent | null {
  const text = typeof payload === 'string' ? payload : payload.toString('utf8');

  let parsed = parseJson(text);
  if (parsed === undefined) {
    parsed = parseJson(Buffer.from(text, 'base64').toString('utf8'));
  }

  if (!isRecord(parsed)) {
    return null;
  }

  const { cls_id, msg_id, label, priority, created_at } = parsed;
  if (
    typeof cls_id !== 'string' ||
    typeof msg_id !== 'string' ||
    !isClassificationLabel(label) ||
    typeof priority !== 'number'
  ) {
    return null;
  }

  return {
    cls_id,
    msg_id,
    label,
    priority,
    created_at: typeof created_at === 'string' ? created_at : ''
  };
}

/**
 * Consumer-side handling of a single classification event
 */
export function handleClassificationEvent(payload: string | Buffer): EventHandlingResult {
  const event = decodeEventPayload(payload);
  if (!event) {
    console.error('❌ [EVENTS] Received undecodable classification event');
    return { status: 'error', message: 'Invalid classification event payload' };
  }

  console.log(
    `[EVENTS] Classification ${event.cls_id}: message=${event.msg_id} label=${event.label} priority=${event.priority}`
  );

  const highPriority = event.priority >= HIGH_PRIORITY_THRESHOLD;
  if (highPriority) {
    console.log(`🚨 [EVENTS] High priority message ${event.msg_id} (priority ${event.priority})`);
  }

  return { status: 'success', processed: event.cls_id, highPriority };
}

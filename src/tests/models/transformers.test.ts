import {
  briefModelToRow,
  briefRowToModel,
  briefToJson,
  classificationModelToRow,
  classificationRowToModel,
  classificationToEvent,
  classificationToJson,
  taskRowToModel,
  taskToJson
} from '../../models/transformers';
import { Brief, Classification, TaskRow } from '../../types/models';

describe('Model Transformers', () => {
  const classification: Classification = {
    clsId: 'cls-1',
    msgId: 'msg-1',
    userId: 'user-1',
    label: 'todo',
    priority: 7,
    createdAt: new Date('2024-03-01T10:00:00.000Z')
  };

  describe('classification transformations', () => {
    it('should convert a model to a row', () => {
      expect(classificationModelToRow(classification)).toEqual({
        cls_id: 'cls-1',
        msg_id: 'msg-1',
        user_id: 'user-1',
        label: 'todo',
        priority: 7,
        created_at: '2024-03-01T10:00:00.000Z'
      });
    });

    it('should convert a row back to the model', () => {
      expect(classificationRowToModel(classificationModelToRow(classification))).toEqual(classification);
    });

    it('should reject rows with an unknown label', () => {
      const row = { ...classificationModelToRow(classification), label: 'spam' };
      expect(() => classificationRowToModel(row)).toThrow('Unknown classification label in row cls-1: spam');
    });

    it('should serialise to snake_case JSON', () => {
      expect(classificationToJson(classification)).toEqual({
        cls_id: 'cls-1',
        msg_id: 'msg-1',
        user_id: 'user-1',
        label: 'todo',
        priority: 7,
        created_at: '2024-03-01T10:00:00.000Z'
      });
    });

    it('should build the published event without user_id', () => {
      expect(classificationToEvent(classification)).toEqual({
        cls_id: 'cls-1',
        msg_id: 'msg-1',
        label: 'todo',
        priority: 7,
        created_at: '2024-03-01T10:00:00.000Z'
      });
    });
  });

  describe('task transformations', () => {
    const row: TaskRow = {
      task_id: 'task-1',
      user_id: 'user-1',
      source_message_id: 'msg-1',
      source_classification_id: null,
      title: 'Send report',
      description: null,
      status: 'done',
      due_date: '2024-03-04',
      priority: 6,
      created_at: '2024-03-01T10:00:00.000Z',
      updated_at: '2024-03-02T10:00:00.000Z'
    };

    it('should convert a row to the model', () => {
      const task = taskRowToModel(row);
      expect(task.status).toBe('done');
      expect(task.updatedAt).toEqual(new Date('2024-03-02T10:00:00.000Z'));
    });

    it('should treat unknown statuses as open', () => {
      expect(taskRowToModel({ ...row, status: 'archived' }).status).toBe('open');
    });

    it('should serialise to the same shape as the row', () => {
      expect(taskToJson(taskRowToModel(row))).toEqual(row);
    });
  });

  describe('brief transformations', () => {
    const brief: Brief = {
      briefId: 'brief-1',
      userId: 'user-1',
      briefDate: '2024-03-01',
      totalItems: 1,
      highPriorityCount: 1,
      todoCount: 1,
      followupCount: 0,
      items: [
        {
          classificationId: 'cls-1',
          messageId: 'msg-1',
          title: 'Contract review',
          description: 'Please review the contract',
          priorityScore: 9,
          channel: 'gmail',
          sender: 'legal@example.com',
          receivedAt: new Date('2024-03-01T08:30:00.000Z'),
          extractedTasks: ['Contract review']
        }
      ],
      createdAt: new Date('2024-03-01T12:00:00.000Z'),
      updatedAt: new Date('2024-03-01T12:00:00.000Z')
    };

    it('should store items as a JSON string', () => {
      const row = briefModelToRow(brief);
      expect(JSON.parse(row.items)).toEqual([
        {
          classification_id: 'cls-1',
          message_id: 'msg-1',
          title: 'Contract review',
          description: 'Please review the contract',
          priority_score: 9,
          channel: 'gmail',
          sender: 'legal@example.com',
          received_at: '2024-03-01T08:30:00.000Z',
          extracted_tasks: ['Contract review']
        }
      ]);
    });

    it('should restore the model from a row', () => {
      expect(briefRowToModel(briefModelToRow(brief))).toEqual(brief);
    });

    it('should serialise items in the JSON response', () => {
      const json = briefToJson(brief);
      expect(json.brief_date).toBe('2024-03-01');
      expect(json.items[0].priority_score).toBe(9);
      expect(json.items[0].received_at).toBe('2024-03-01T08:30:00.000Z');
    });
  });
});

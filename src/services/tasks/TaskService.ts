import { TaskGenerationOutcome, TaskGenerationRequest } from '../../types/models';
import { ClassificationRepository } from '../../repositories/ClassificationRepository';
import { TaskRepository } from '../../repositories/TaskRepository';
import { IntegrationsClient } from '../integrations/IntegrationsClient';
import { TaskGenerator } from './TaskGenerator';

/**
 * Orchestrates task generation: load classifications, fetch their messages,
 * generate and store tasks
 */
export class TaskService {
  constructor(
    private readonly classificationRepository: ClassificationRepository,
    private readonly taskRepository: TaskRepository,
    private readonly integrations: IntegrationsClient,
    private readonly generator: TaskGenerator
  ) {}

  async generateTasks(request: TaskGenerationRequest, token?: string): Promise<TaskGenerationOutcome> {
    const classifications = await this.classificationRepository.getByIds(request.classificationIds);
    const missingCount = request.classificationIds.length - classifications.length;
    if (missingCount > 0) {
      console.warn(`${missingCount} classification(s) not found for task generation`);
    }

    const messageIds = Array.from(new Set(classifications.map(classification => classification.msgId)));
    const { messages } = await this.integrations.getMessagesByIds(messageIds, token);

    const generated = this.generator.generate(classifications, messages, request.userId);
    const tasks = await this.taskRepository.batchCreate(generated.tasks);

    console.log(`✅ Generated ${tasks.length} tasks from ${request.classificationIds.length} classifications`);

    return {
      tasks,
      totalGenerated: request.classificationIds.length,
      successCount: generated.successCount,
      errorCount: generated.errorCount + missingCount
    };
  }
}

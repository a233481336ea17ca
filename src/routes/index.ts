import { Router } from 'express';
import { Database } from 'sqlite';
import { AppConfig } from '../config';
import { ClassificationController } from '../controllers/ClassificationController';
import { TaskController } from '../controllers/TaskController';
import { BriefController } from '../controllers/BriefController';
import { HealthController } from '../controllers/HealthController';
import { ClassificationRepository } from '../repositories/ClassificationRepository';
import { TaskRepository } from '../repositories/TaskRepository';
import { BriefRepository } from '../repositories/BriefRepository';
import { IntegrationsClient } from '../services/integrations/IntegrationsClient';
import { KeywordClassifier } from '../services/ml/KeywordClassifier';
import { OpenAIClassifierService } from '../services/ml/OpenAIClassifierService';
import { MessageClassifier } from '../services/ml/MessageClassifier';
import { ClassificationEventPublisher } from '../services/events/ClassificationEventPublisher';
import { ClassificationPipeline } from '../services/classification/ClassificationPipeline';
import { TaskGenerator } from '../services/tasks/TaskGenerator';
import { TaskService } from '../services/tasks/TaskService';
import { BriefService } from '../services/briefs/BriefService';
import { authenticateToken, optionalAuth } from '../middleware/auth';

/**
 * Initialize and configure all API routes
 */
export function createRoutes(config: AppConfig, db: Database): Router {
  const router = Router();

  // Initialize repositories
  const classificationRepository = new ClassificationRepository(db);
  const taskRepository = new TaskRepository(db);
  const briefRepository = new BriefRepository(db);

  // Initialize services
  const integrationsClient = new IntegrationsClient(config.integrations);
  const openaiService = config.openai.apiKey
    ? new OpenAIClassifierService({ apiKey: config.openai.apiKey, model: config.openai.model })
    : null;
  const classifier = new MessageClassifier(new KeywordClassifier(), openaiService);
  const publisher = new ClassificationEventPublisher({
    enabled: config.events.enabled,
    channel: config.events.channel,
    redisUrl: config.redisUrl
  });

  const pipeline = new ClassificationPipeline(integrationsClient, classifier, classificationRepository, publisher);
  const taskService = new TaskService(classificationRepository, taskRepository, integrationsClient, new TaskGenerator());
  const briefService = new BriefService(classificationRepository, taskRepository, briefRepository, integrationsClient);

  console.log(
    openaiService
      ? `🔧 Classifier mode: openai (${openaiService.getModel()})`
      : `🔧 Classifier mode: ${classifier.getMode()}`
  );

  // Initialize controllers
  const healthController = new HealthController({
    db,
    classifierMode: classifier.getMode(),
    eventsEnabled: publisher.isEnabled()
  });
  const classificationController = new ClassificationController(pipeline, classificationRepository);
  const taskController = new TaskController(taskService, taskRepository, classificationRepository);
  const briefController = new BriefController(briefService, briefRepository);

  // Health routes (no authentication required)
  router.get('/', healthController.root.bind(healthController));
  router.get('/health', healthController.health.bind(healthController));
  router.get('/health/:path_echo', healthController.health.bind(healthController));

  router.use(config.auth.required ? authenticateToken(config.auth.jwtSecret) : optionalAuth(config.auth.jwtSecret));

  // Classification routes
  router.post('/classifications', classificationController.classify.bind(classificationController));
  router.get('/classifications', classificationController.list.bind(classificationController));
  router.get('/classifications/stats', classificationController.stats.bind(classificationController));
  router.get('/classifications/:cls_id', classificationController.getById.bind(classificationController));
  router.patch('/classifications/:cls_id', classificationController.update.bind(classificationController));
  router.delete('/classifications/:cls_id', classificationController.delete.bind(classificationController));

  // Task routes
  router.post('/tasks/generate', taskController.generate.bind(taskController));
  router.post('/tasks', taskController.create.bind(taskController));
  router.get('/tasks', taskController.list.bind(taskController));
  router.get('/tasks/:task_id', taskController.getById.bind(taskController));
  router.patch('/tasks/:task_id', taskController.update.bind(taskController));
  router.delete('/tasks/:task_id', taskController.delete.bind(taskController));

  // Brief routes
  router.post('/briefs', briefController.generate.bind(briefController));
  router.get('/briefs', briefController.getForUser.bind(briefController));
  router.get('/briefs/:brief_id', briefController.getById.bind(briefController));

  return router;
}

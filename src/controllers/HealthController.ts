import os from 'os';
import { Request, Response } from 'express';
import { Database } from 'sqlite';
import { pingDatabase } from '../config/database';
import { ClassifierMode } from '../services/ml/MessageClassifier';

export const SERVICE_NAME = 'message-classification-service';
export const SERVICE_VERSION = '1.0.0';

export interface HealthDependencies {
  db: Database;
  classifierMode: ClassifierMode;
  eventsEnabled: boolean;
}

/**
 * First external IPv4 address of this host, or loopback when there is none
 */
export function getHostAddress(interfaces: ReturnType<typeof os.networkInterfaces> = os.networkInterfaces()): string {
  for (const addresses of Object.values(interfaces)) {
    const external = addresses?.find(address => address.family === 'IPv4' && !address.internal);
    if (external) {
      return external.address;
    }
  }
  return '127.0.0.1';
}

/**
 * HealthController serves the service index and health probes
 */
export class HealthController {
  constructor(private deps: HealthDependencies) {}

  /**
   * GET / - Service index
   */
  root(req: Request, res: Response): void {
    res.json({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      resources: ['/health', '/classifications', '/tasks', '/briefs']
    });
  }

  /**
   * GET /health and GET /health/:path_echo
   */
  async health(req: Request, res: Response): Promise<void> {
    const databaseOk = await pingDatabase(this.deps.db);

    res.json({
      status: 200,
      status_message: 'OK',
      timestamp: new Date().toISOString(),
      ip_address: getHostAddress(),
      echo: typeof req.query.echo === 'string' ? req.query.echo : null,
      path_echo: req.params.path_echo ?? null,
      checks: {
        database: databaseOk ? 'ok' : 'unavailable',
        classifier_mode: this.deps.classifierMode,
        events: this.deps.eventsEnabled ? 'enabled' : 'disabled'
      }
    });
  }
}

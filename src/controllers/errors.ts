import { Response } from 'express';
import { ValidationError } from '../models/validation';
import { IntegrationsError } from '../services/integrations/IntegrationsClient';

/**
 * Map an error thrown inside a controller to the JSON error response
 */
export function sendControllerError(res: Response, error: unknown, action: string): void {
  if (error instanceof ValidationError) {
    res.status(400).json({
      error: 'Validation failed',
      message: error.message,
      details: error.details.map(detail => ({ field: detail.path.join('.'), message: detail.message }))
    });
    return;
  }

  if (error instanceof IntegrationsError) {
    console.error(`❌ Integrations service error while trying to ${action}:`, error);
    res.status(502).json({
      error: 'Integrations service error',
      message: error.message
    });
    return;
  }

  console.error(`❌ Failed to ${action}:`, error);
  res.status(500).json({
    error: 'Internal server error',
    message: `Failed to ${action}`
  });
}

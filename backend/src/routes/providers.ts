import { Router } from 'express';
import type { Logger } from '../logger';
import type { Gateways } from '../providers';
import type { FallbackManager } from '../services/fallbackManager';

export interface ProvidersRouterDeps {
  fallbackManager: FallbackManager;
  gateways: Gateways;
  logger: Logger;
}

export function createProvidersRouter({ fallbackManager, gateways, logger }: ProvidersRouterDeps): Router {
  const router = Router();

  router.get('/health', (req, res) => {
    res.json({
      providers: {
        transcription: gateways.transcription.describe(),
        completion: gateways.completion.describe(),
        synthesis: gateways.synthesis.describe(),
      },
      health: fallbackManager.snapshot(),
      timestamp: new Date().toISOString(),
    });
  });

  // Admin action: forget every failure streak and re-enable all providers.
  router.post('/reset', (req, res) => {
    fallbackManager.reset();
    logger.warn({ component: 'providers-routes' }, 'Provider health reset by admin request');
    res.status(204).end();
  });

  return router;
}

import { Router, Request, Response } from 'express';
import { IdentificationService } from '../services/identification';

function nameParam(req: Request): string | undefined {
  const { name } = req.query;
  if (typeof name !== 'string') return undefined;
  const trimmed = name.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function createIdentifyRouter(service: IdentificationService): Router {
  const router = Router();

  router.get('/analyze', (req: Request, res: Response) => {
    const name = nameParam(req);
    if (!name) {
      return res.status(400).json({ error: 'Query parameter "name" is required' });
    }

    try {
      res.json({ name, parsed: service.analyze(name) });
    } catch (error) {
      console.error('Analyze error:', error);
      res.status(500).json({ error: 'Failed to analyze release name' });
    }
  });

  router.get('/', async (req: Request, res: Response) => {
    const name = nameParam(req);
    if (!name) {
      return res.status(400).json({ error: 'Query parameter "name" is required' });
    }

    // Stop querying the index once the client has gone away
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      const { parsed, outcome } = await service.identify(name, { signal: controller.signal });

      switch (outcome.status) {
        case 'resolved':
          return res.json({ name, parsed, result: outcome.result, fromCache: outcome.fromCache });
        case 'transient_error':
          return res.status(503).json({
            error: 'Media index unavailable, try again later',
            details: outcome.message,
            name,
            parsed,
            queryUsed: outcome.queryUsed,
            attempts: outcome.attempts,
          });
        case 'cancelled':
          console.log(`Identification of "${name}" cancelled after ${outcome.attempts} attempt(s)`);
          return;
      }
    } catch (error) {
      console.error('Identify error:', error);
      res.status(500).json({ error: 'Failed to identify release name' });
    }
  });

  return router;
}

import { Router, Request, Response } from 'express';
import { LookupCache } from '../models/lookupCache';

export function createCacheRouter(cache: LookupCache): Router {
  const router = Router();

  router.get('/stats', (req: Request, res: Response) => {
    try {
      res.json(cache.stats());
    } catch (error) {
      console.error('Cache stats error:', error);
      res.status(500).json({ error: 'Failed to read cache stats' });
    }
  });

  router.delete('/', (req: Request, res: Response) => {
    try {
      cache.clear();
      console.log('Lookup cache cleared');
      res.json({ success: true, message: 'Lookup cache cleared' });
    } catch (error) {
      console.error('Cache clear error:', error);
      res.status(500).json({ error: 'Failed to clear cache' });
    }
  });

  return router;
}

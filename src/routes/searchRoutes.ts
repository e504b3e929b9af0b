import { Router } from 'express';
import type { SearchController } from '../controllers/searchController';

export const createSearchRouter = (controller: SearchController): Router => {
  const router = Router();
  const uploadMiddleware = controller.getUploaderMiddleware();

  router.get('/health', controller.health);
  router.post('/search', uploadMiddleware, controller.handleSearch);
  router.post('/cache/invalidate', controller.handleInvalidateCache);
  router.put('/credentials', controller.handleUpdateCredentials);

  return router;
};

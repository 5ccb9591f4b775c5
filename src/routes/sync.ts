import { Router } from 'express';
import { SyncController } from '../controllers/syncController.js';
import type { ArchiveServices } from '../services/archiveServices.js';

export function createSyncRouter(services: ArchiveServices): Router {
  const router: Router = Router();
  const controller = new SyncController(services);

  /**
   * List entities with unresolved merge conflicts
   * GET /api/sync/conflicts
   */
  router.get('/conflicts', (req, res) => controller.listConflicts(req, res));

  /**
   * Settle one conflicting field
   * POST /api/sync/conflicts/:entityId
   */
  router.post('/conflicts/:entityId', (req, res) => controller.resolveConflict(req, res));

  /**
   * Merge a note page
   * PUT /api/sync/:kind/:id
   */
  router.put('/:kind/:id', (req, res) => controller.mergeNotePage(req, res));

  return router;
}

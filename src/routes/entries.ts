import { Router } from 'express';
import { EntryController } from '../controllers/entryController.js';
import type { ArchiveServices } from '../services/archiveServices.js';

export function createEntriesRouter(services: ArchiveServices): Router {
  const router: Router = Router();
  const controller = new EntryController(services);

  /**
   * Reconcile one entry descriptor
   * POST /api/entries?mode=replace|merge
   */
  router.post('/', (req, res) => controller.reconcile(req, res));

  /**
   * Reconcile several entries
   * POST /api/entries/batch
   */
  router.post('/batch', (req, res) => controller.reconcileBatch(req, res));

  /**
   * Entry with its associations grouped by kind
   * GET /api/entries/:date
   */
  router.get('/:date', (req, res) => controller.getEntry(req, res));

  /**
   * Soft-delete an entry
   * DELETE /api/entries/:date
   */
  router.delete('/:date', (req, res) => controller.deleteEntry(req, res));

  return router;
}

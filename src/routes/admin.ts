/**
 * Admin routes for archive maintenance
 *
 * Endpoints:
 * - POST /admin/sweep - Run the tombstone sweep
 * - GET /admin/integrity - Scan the store for integrity issues
 * - GET /admin/association-tombstones - Recently removed associations
 * - GET /admin/association-tombstones/stats - Counts by kind and source
 */

import { Router } from 'express';
import { AdminController } from '../controllers/adminController.js';
import type { ArchiveServices } from '../services/archiveServices.js';

export function createAdminRouter(services: ArchiveServices): Router {
  const router: Router = Router();
  const controller = new AdminController(services);

  router.post('/sweep', (req, res) => controller.sweep(req, res));
  router.get('/integrity', (req, res) => controller.integrity(req, res));
  router.get('/association-tombstones', (req, res) => controller.listAssociationTombstones(req, res));
  router.get('/association-tombstones/stats', (req, res) => controller.associationTombstoneStats(req, res));

  return router;
}

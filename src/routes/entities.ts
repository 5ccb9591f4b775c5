import { Router } from 'express';
import { EntityController } from '../controllers/entityController.js';
import type { ArchiveServices } from '../services/archiveServices.js';

export function createEntitiesRouter(services: ArchiveServices): Router {
  const router: Router = Router();
  const controller = new EntityController(services);

  router.get('/Poem/:id/versions', (req, res) => controller.getPoemHistory(req, res));
  router.get('/:kind/:id/members', (req, res) => controller.getSequence(req, res));
  router.get('/:kind/:id', (req, res) => controller.getEntity(req, res));
  router.get('/:kind', (req, res) => controller.listEntities(req, res));

  return router;
}

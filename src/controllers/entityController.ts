import type { Request, Response } from 'express';
import { entityKindSchema, entityParamsSchema, listEntitiesQuerySchema, sequenceKindSchema } from '../schemas/http.js';
import type { ArchiveServices } from '../services/archiveServices.js';
import { sendError, sendValidationError } from './errorResponse.js';

export class EntityController {
  constructor(private readonly services: ArchiveServices) {}

  /**
   * GET /api/entities/:kind?includeDeleted=true
   */
  async listEntities(req: Request, res: Response): Promise<void> {
    const kind = entityKindSchema.safeParse(req.params.kind);
    const query = listEntitiesQuerySchema.safeParse(req.query);
    if (!kind.success) {
      sendValidationError(res, 'entity kind', kind.error.issues);
      return;
    }
    if (!query.success) {
      sendValidationError(res, 'query', query.error.issues);
      return;
    }

    try {
      const entities = await this.services.reader.listEntities(kind.data, { includeDeleted: query.data.includeDeleted });
      res.json({ entities });
    } catch (error) {
      sendError(res, error);
    }
  }

  /**
   * Entity with its computed aggregates
   * GET /api/entities/:kind/:id
   */
  async getEntity(req: Request, res: Response): Promise<void> {
    const params = entityParamsSchema.safeParse(req.params);
    if (!params.success) {
      sendValidationError(res, 'entity reference', params.error.issues);
      return;
    }

    try {
      res.json(await this.services.reader.getEntity(params.data.kind, params.data.id));
    } catch (error) {
      sendError(res, error);
    }
  }

  /**
   * Thread or arc members in chronological order
   * GET /api/entities/:kind/:id/members
   */
  async getSequence(req: Request, res: Response): Promise<void> {
    const kind = sequenceKindSchema.safeParse(req.params.kind);
    if (!kind.success) {
      sendValidationError(res, 'sequence kind', kind.error.issues);
      return;
    }

    try {
      res.json(await this.services.reader.getSequence(kind.data, req.params.id));
    } catch (error) {
      sendError(res, error);
    }
  }

  /**
   * GET /api/entities/Poem/:id/versions
   */
  async getPoemHistory(req: Request, res: Response): Promise<void> {
    try {
      res.json(await this.services.reader.getPoemHistory(req.params.id));
    } catch (error) {
      sendError(res, error);
    }
  }
}

import type { Request, Response } from 'express';
import { conflictResolutionSchema, notePageSchema } from '../schemas/notePage.js';
import { syncParamsSchema } from '../schemas/http.js';
import type { ArchiveServices } from '../services/archiveServices.js';
import { errorBody, sendError, sendValidationError } from './errorResponse.js';

export class SyncController {
  constructor(private readonly services: ArchiveServices) {}

  /**
   * Merge an edited note page back into the store
   * PUT /api/sync/:kind/:id   body: { fields }
   *
   * Responds 409 with the merge result when some fields conflict; the
   * non-conflicting fields are applied either way.
   */
  async mergeNotePage(req: Request, res: Response): Promise<void> {
    const params = syncParamsSchema.safeParse(req.params);
    const body = notePageSchema.safeParse(req.body);
    if (!params.success) {
      sendValidationError(res, 'sync subject', params.error.issues);
      return;
    }
    if (!body.success) {
      sendValidationError(res, 'note page', body.error.issues);
      return;
    }

    try {
      const { error, ...result } = await this.services.arbiter.mergeNotePage(
        params.data.kind,
        params.data.id,
        body.data.fields
      );
      if (error) {
        res.status(409).json({ ...errorBody(error), result });
        return;
      }
      res.json({ result });
    } catch (error) {
      sendError(res, error);
    }
  }

  /**
   * GET /api/sync/conflicts
   */
  async listConflicts(_req: Request, res: Response): Promise<void> {
    try {
      res.json({ conflicts: await this.services.arbiter.listConflicts() });
    } catch (error) {
      sendError(res, error);
    }
  }

  /**
   * POST /api/sync/conflicts/:entityId   body: { field, choice }
   */
  async resolveConflict(req: Request, res: Response): Promise<void> {
    const body = conflictResolutionSchema.safeParse(req.body);
    if (!body.success) {
      sendValidationError(res, 'conflict resolution', body.error.issues);
      return;
    }

    try {
      const state = await this.services.arbiter.resolveConflict(req.params.entityId, body.data.field, body.data.choice);
      res.json({ state });
    } catch (error) {
      sendError(res, error);
    }
  }
}

import type { Request, Response } from 'express';
import { associationTombstonesQuerySchema, sweepRequestSchema } from '../schemas/http.js';
import type { ArchiveServices } from '../services/archiveServices.js';
import { nowIso } from '../utils/dates.js';
import { sendError, sendValidationError } from './errorResponse.js';

export class AdminController {
  constructor(private readonly services: ArchiveServices) {}

  /**
   * Run the tombstone sweep now
   * POST /admin/sweep   body: { graceDays?, orphanMinAgeMinutes? }
   */
  async sweep(req: Request, res: Response): Promise<void> {
    const body = sweepRequestSchema.safeParse(req.body ?? {});
    if (!body.success) {
      sendValidationError(res, 'sweep request', body.error.issues);
      return;
    }

    try {
      res.json({ report: await this.services.sweeper.sweep(body.data) });
    } catch (error) {
      sendError(res, error);
    }
  }

  /**
   * GET /admin/integrity
   */
  async integrity(_req: Request, res: Response): Promise<void> {
    try {
      res.json({ report: await this.services.checkIntegrity() });
    } catch (error) {
      sendError(res, error);
    }
  }

  /**
   * Removed associations and who removed them
   * GET /admin/association-tombstones?kind=&sourceId=&limit=
   */
  async listAssociationTombstones(req: Request, res: Response): Promise<void> {
    const query = associationTombstonesQuerySchema.safeParse(req.query);
    if (!query.success) {
      sendValidationError(res, 'query', query.error.issues);
      return;
    }

    try {
      res.json({ tombstones: await this.services.reader.listAssociationTombstones(query.data) });
    } catch (error) {
      sendError(res, error);
    }
  }

  /**
   * GET /admin/association-tombstones/stats
   */
  async associationTombstoneStats(_req: Request, res: Response): Promise<void> {
    try {
      res.json({ stats: await this.services.reader.getAssociationTombstoneStats(nowIso()) });
    } catch (error) {
      sendError(res, error);
    }
  }
}

import type { Request, Response } from 'express';
import { entryDateParamsSchema, reconcileBatchSchema, reconcileModeSchema } from '../schemas/http.js';
import type { ArchiveServices } from '../services/archiveServices.js';
import { errorBody, sendError, sendValidationError } from './errorResponse.js';

export class EntryController {
  constructor(private readonly services: ArchiveServices) {}

  /**
   * Reconcile one entry descriptor
   * POST /api/entries?mode=replace|merge
   */
  async reconcile(req: Request, res: Response): Promise<void> {
    const mode = reconcileModeSchema.safeParse(req.query.mode);
    if (!mode.success) {
      sendValidationError(res, 'mode', mode.error.issues);
      return;
    }

    try {
      const report = await this.services.reconciler.reconcile(req.body, mode.data);
      res.status(report.entryCreated ? 201 : 200).json({ report });
    } catch (error) {
      sendError(res, error);
    }
  }

  /**
   * Reconcile several independent entries; one failure does not stop the others
   * POST /api/entries/batch
   */
  async reconcileBatch(req: Request, res: Response): Promise<void> {
    const body = reconcileBatchSchema.safeParse(req.body);
    if (!body.success) {
      sendValidationError(res, 'batch request', body.error.issues);
      return;
    }

    try {
      const outcomes = await this.services.reconciler.reconcileMany(body.data.descriptors, {
        mode: body.data.mode,
        concurrency: body.data.concurrency,
      });
      res.json({
        outcomes: outcomes.map((outcome) =>
          outcome.status === 'fulfilled'
            ? outcome
            : { status: outcome.status, date: outcome.date, error: errorBody(outcome.error) }
        ),
      });
    } catch (error) {
      sendError(res, error);
    }
  }

  /**
   * GET /api/entries/:date
   */
  async getEntry(req: Request, res: Response): Promise<void> {
    const params = entryDateParamsSchema.safeParse(req.params);
    if (!params.success) {
      sendValidationError(res, 'entry date', params.error.issues);
      return;
    }

    try {
      res.json(await this.services.reader.getEntry(params.data.date));
    } catch (error) {
      sendError(res, error);
    }
  }

  /**
   * Soft-delete an entry
   * DELETE /api/entries/:date
   */
  async deleteEntry(req: Request, res: Response): Promise<void> {
    const params = entryDateParamsSchema.safeParse(req.params);
    if (!params.success) {
      sendValidationError(res, 'entry date', params.error.issues);
      return;
    }

    try {
      res.json({ report: await this.services.reconciler.deleteEntry(params.data.date) });
    } catch (error) {
      sendError(res, error);
    }
  }
}

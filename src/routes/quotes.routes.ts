import path from 'node:path';
import { Router, type Request, type Response } from 'express';
import { formatPercent } from '../lib/numbers';
import { asyncErrorHandler } from '../middleware/validation/errors';
import { downloadParamSchema, quoteRequestSchema } from '../schemas/quotes.schema';
import type { ComputedQuote, QuoteService } from '../services/quotes.service';

function serializeComputed(computed: ComputedQuote) {
  return {
    jobType: computed.estimate.jobType,
    quantity: computed.estimate.quantity,
    laborRate: computed.laborRate,
    lines: computed.lines,
    summary: computed.summary,
    warnings: computed.warnings,
    fxSource: computed.fx.source
  };
}

export function createQuotesRouter(quotes: QuoteService) {
  const router = Router();

  router.get(
    '/quotes/options',
    asyncErrorHandler(async (_req: Request, res: Response) => {
      const jobTypes = await quotes.listJobTypes();
      const { defaults } = quotes;
      return res.json({
        jobTypes: jobTypes.jobTypes,
        jobTypesSource: jobTypes.source,
        defaults: {
          currency: defaults.currency,
          laborRate: defaults.laborRate,
          markupPct: formatPercent(defaults.markupPct),
          vatPct: formatPercent(defaults.vatPct),
          quoteValidDays: defaults.quoteValidDays
        }
      });
    })
  );

  router.post(
    '/quotes/preview',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = quoteRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: 'Invalid request body.', details: parsed.error.flatten() });
      }
      const inputs = quotes.resolveInputs(parsed.data);
      const computed = await quotes.computeQuote(inputs);
      return res.json({ currency: inputs.currency, ...serializeComputed(computed) });
    })
  );

  router.post(
    '/quotes',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = quoteRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: 'Invalid request body.', details: parsed.error.flatten() });
      }
      const inputs = quotes.resolveInputs(parsed.data);
      const built = await quotes.buildQuote(inputs);
      return res.status(201).json({
        quoteId: built.record.quoteId,
        quoteDate: built.record.quoteDate,
        validUntil: built.record.validUntil,
        currency: inputs.currency,
        ...serializeComputed(built.computed),
        deliveries: built.deliveries,
        downloads: [built.files.markdownPath, built.files.textPath, built.files.pdfPath].map((file) =>
          path.basename(file)
        )
      });
    })
  );

  router.get('/quotes/download/:filename', (req: Request, res: Response) => {
    const filename = downloadParamSchema.safeParse(req.params.filename);
    if (!filename.success) {
      return res.status(400).json({ error: 'Invalid file name.' });
    }
    const root = path.resolve(quotes.defaults.outputDir);
    return res.sendFile(filename.data, { root, dotfiles: 'deny' }, (err) => {
      if (err && !res.headersSent) {
        res.status(404).json({ error: 'File not found.' });
      }
    });
  });

  return router;
}

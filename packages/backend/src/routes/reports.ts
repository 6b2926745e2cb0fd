import { Router, type Request, type Response } from 'express';
import {
  type PageOwnerReportSet,
  type RenderOptions,
  type ReportView,
  isReportView,
  parseMemoryUnit,
  renderReportView,
  toKilobytes,
} from '@po-tools/parser';
import type { AppConfig } from '../config.js';
import type { ReportStore } from '../store.js';

function viewToJson(reports: PageOwnerReportSet, view: ReportView): unknown {
  switch (view) {
    case 'modules':
      return reports.modules.map((r) => ({ ...r, kilobytes: toKilobytes(r.pages) }));
    case 'module-order':
      return reports.moduleOrders.map((r) => ({ ...r, kilobytes: toKilobytes(r.pages) }));
    case 'orders':
      return {
        orders: reports.orders.orders.map((o) => ({ ...o, kilobytes: toKilobytes(o.pages) })),
        totalPages: reports.orders.totalPages,
        totalKilobytes: toKilobytes(reports.orders.totalPages),
        skippedLines: reports.orders.skippedLines,
      };
    case 'analysis':
      return reports.analysis;
    case 'slabs':
      return {
        functions: reports.analysis.slabs,
        byOrder: reports.analysis.slabByOrder,
        byProcess: reports.analysis.slabByProcess,
      };
  }
}

function renderOptions(req: Request, defaults: RenderOptions): RenderOptions {
  const unit = req.query.unit ? parseMemoryUnit(String(req.query.unit)) : undefined;
  const top = req.query.top ? parseInt(String(req.query.top), 10) : NaN;
  return {
    ...defaults,
    unit: unit ?? defaults.unit,
    topN: top > 0 ? top : defaults.topN,
  };
}

/**
 * GET /api/reports/:id
 *   Parse summary of an uploaded dump.
 * GET /api/reports/:id/:view
 *   view = modules | module-order | orders | analysis | slabs
 *   ?format=json (default) | text, ?unit=K|M|G, ?top=N (analysis and slabs text)
 */
export function createReportsRouter(config: AppConfig, store: ReportStore): Router {
  const router = Router();

  router.get('/:id', (req: Request, res: Response) => {
    const id = String(req.params.id);
    const stored = store.get(id);
    if (!stored) {
      return res.status(404).json({ error: `Report ${id} not found` });
    }
    res.json({
      id,
      filename: stored.filename,
      size: stored.size,
      parseStats: stored.reports.parseStats,
      totalLines: stored.reports.totalLines,
    });
  });

  router.get('/:id/:view', (req: Request, res: Response) => {
    const id = String(req.params.id);
    const view = String(req.params.view);
    const format = String(req.query.format ?? 'json');

    const stored = store.get(id);
    if (!stored) {
      return res.status(404).json({ error: `Report ${id} not found` });
    }
    if (!isReportView(view)) {
      return res.status(400).json({ error: `Unknown report view: ${view}` });
    }

    if (format === 'text') {
      const lines = renderReportView(stored.reports, view, renderOptions(req, config.render));
      return res.type('text/plain').send(lines.join('\n') + '\n');
    }
    if (format !== 'json') {
      return res.status(400).json({ error: `Unknown format: ${format}` });
    }
    res.json(viewToJson(stored.reports, view));
  });

  return router;
}

import { Router, type Request, type Response } from 'express';
import multer from 'multer';
import path from 'node:path';
import fs from 'node:fs';
import crypto from 'node:crypto';
import { buildReportSet } from '@po-tools/parser';
import type { AppConfig } from '../config.js';
import type { ReportStore } from '../store.js';

const TEXT_EXTENSIONS = new Set(['', '.txt', '.log']);

function isTextDump(file: Express.Multer.File): boolean {
  return file.mimetype.startsWith('text/') ||
    file.mimetype === 'application/octet-stream' ||
    TEXT_EXTENSIONS.has(path.extname(file.originalname).toLowerCase());
}

function getUpload(config: AppConfig) {
  fs.mkdirSync(config.uploadDir, { recursive: true });

  const storage = multer.diskStorage({
    destination: config.uploadDir,
    filename: (_req, _file, cb) => {
      cb(null, `${crypto.randomUUID()}.txt`);
    },
  });

  return multer({
    storage,
    limits: { fileSize: config.maxFileSize },
    fileFilter: (_req, file, cb) => {
      if (isTextDump(file)) {
        cb(null, true);
      } else {
        cb(new Error('Only plain-text page_owner dumps are accepted'));
      }
    },
  });
}

/**
 * POST /api/upload
 * Upload a page_owner dump; it is parsed right away and the file removed.
 * Returns { id, filename, size, summary }.
 */
export function createUploadRouter(config: AppConfig, store: ReportStore): Router {
  const router = Router();

  router.post('/', (req: Request, res: Response) => {
    const upload = getUpload(config);
    upload.single('file')(req, res, (err: unknown) => {
      if (err) {
        const message = err instanceof Error ? err.message : String(err);
        return res.status(400).json({ error: message });
      }

      if (!req.file) {
        return res.status(400).json({ error: 'No file uploaded' });
      }

      const { path: filePath, originalname, size } = req.file;
      const id = path.basename(req.file.filename, path.extname(req.file.filename));

      try {
        const reports = buildReportSet(fs.readFileSync(filePath, 'utf-8'));
        store.set(id, { filename: originalname, size, reports });

        res.json({
          id,
          filename: originalname,
          size,
          summary: {
            totalLines: reports.totalLines,
            blocks: reports.parseStats.blocks,
            events: reports.parseStats.events,
            modules: reports.modules.length,
            totalPages: reports.orders.totalPages,
            skipped: reports.parseStats.skipped,
          },
        });
      } catch (parseErr) {
        const message = parseErr instanceof Error ? parseErr.message : String(parseErr);
        console.error('[upload] Failed to parse', originalname, message);
        res.status(500).json({ error: message });
      } finally {
        fs.rmSync(filePath, { force: true });
      }
    });
  });

  return router;
}

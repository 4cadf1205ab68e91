import express, { type ErrorRequestHandler, type Request, type Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import path from 'path';

import { type AuditOptions, auditSnapshot } from './audit.js';
import type { AppConfig } from './config.js';
import { DATATAPE_CONTENT_TYPE, buildDatatape } from './datatape.js';
import { UnavailableError, UnreadableWorkbookError, UnsupportedFormatError } from './errors.js';
import { loadWorkbookBuffer } from './loader.js';
import { createLogger } from './logger.js';
import type { Narrator } from './narrative.js';
import type { AuditReport } from './types.js';

const log = createLogger('http');

export type AppDeps = { narrator?: Narrator };

function statusFor(e: unknown): number {
  if (e instanceof UnsupportedFormatError) return 415;
  if (e instanceof UnreadableWorkbookError) return 422;
  return 500;
}

function fail(res: Response, e: unknown) {
  const status = statusFor(e);
  if (status === 500) log.error('request failed', e);
  res.status(status).json({ ok: false, error: (e as Error).message });
}

export function createApp(config: AppConfig, deps: AppDeps = {}) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: config.maxUploadBytes, files: 1 } });
  const auditOptions: AuditOptions = {
    balanceTolerance: config.audit.balanceTolerance,
    maxRangeCells: config.audit.maxRangeCells,
    balanceSheet: config.audit.balanceSheet
  };

  /** Audit the uploaded file, or answer 400 and return undefined when there is none. `?requireFormulas=true` rejects CSV. */
  function auditUpload(req: Request, res: Response): AuditReport | undefined {
    if (!req.file) {
      res.status(400).json({ ok: false, error: 'No workbook uploaded (multipart field "file")' });
      return undefined;
    }
    const snapshot = loadWorkbookBuffer(req.file.buffer, req.file.originalname || 'upload.xlsx', {
      requireFormulas: req.query.requireFormulas === 'true'
    });
    return auditSnapshot(snapshot, auditOptions);
  }

  /* ================= Audit APIs ================= */

  app.get('/api/health', (_req, res) => res.json({ ok: true }));

  app.post('/api/audit', upload.single('file'), (req, res) => {
    try {
      const report = auditUpload(req, res);
      if (report) res.json({ ok: true, report });
    } catch (e) {
      fail(res, e);
    }
  });

  app.post('/api/audit/datatape', upload.single('file'), (req, res) => {
    try {
      const report = auditUpload(req, res);
      if (!report) return;
      const name = `${path.parse(report.source).name || 'workbook'}-datatape.xlsx`;
      res.setHeader('Content-Type', DATATAPE_CONTENT_TYPE);
      res.setHeader('Content-Disposition', `attachment; filename="${name.replace(/"/g, '')}"`);
      res.send(buildDatatape(report));
    } catch (e) {
      fail(res, e);
    }
  });

  app.post('/api/audit/narrative', upload.single('file'), async (req, res) => {
    try {
      const report = auditUpload(req, res);
      if (!report) return;
      if (!deps.narrator) {
        res.json({ ok: true, report, narrative: null, narrativeError: 'No narrative provider configured' });
        return;
      }
      try {
        const narrative = await deps.narrator.summarize(report);
        res.json({ ok: true, report, narrative });
      } catch (e) {
        if (!(e instanceof UnavailableError)) throw e;
        log.warn(e.message);
        res.json({ ok: true, report, narrative: null, narrativeError: e.message });
      }
    } catch (e) {
      fail(res, e);
    }
  });

  const onUploadError: ErrorRequestHandler = (err, _req, res, next) => {
    if (!(err instanceof multer.MulterError)) return next(err);
    const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
    res.status(status).json({ ok: false, error: err.message });
  };
  app.use(onUploadError);

  return app;
}

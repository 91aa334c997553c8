import express from 'express';
import cors from 'cors';
import multer from 'multer';

import { resolveTaxRates, type Config } from './config.js';
import { ReportError } from './errors.js';
import { enhanceBuffer, previewBuffer } from './report.js';

function errorStatus(e: unknown) {
  return e instanceof ReportError ? 400 : 500;
}

function errorMessage(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}

export function createApp(config: Config) {
  const app = express();
  app.use(cors());

  const upload = multer({ storage: multer.memoryStorage() });

  app.get('/api/health', (_req, res) => res.json({ ok: true }));

  /* ========== Upload an export, download the enhanced report ========== */
  app.post('/api/enhance', upload.single('file'), async (req, res) => {
    try {
      if (!req.file) return res.status(400).json({ ok: false, error: 'No spreadsheet uploaded' });
      const taxRates = resolveTaxRates(config.taxRates, req.body ?? {});
      const out = await enhanceBuffer(req.file.buffer, req.file.originalname || 'Portfolio.xlsx', taxRates);

      res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
      res.setHeader('Content-Disposition', `attachment; filename="${out.fileName.replace(/"/g, '')}"`);
      return res.send(out.data);
    } catch (e) {
      if (errorStatus(e) === 500) console.error('Enhance failed:', e);
      return res.status(errorStatus(e)).json({ ok: false, error: errorMessage(e) });
    }
  });

  /* ========== Same pipeline, report model as JSON ========== */
  app.post('/api/preview', upload.single('file'), async (req, res) => {
    try {
      if (!req.file) return res.status(400).json({ ok: false, error: 'No spreadsheet uploaded' });
      const taxRates = resolveTaxRates(config.taxRates, req.body ?? {});
      const model = await previewBuffer(req.file.buffer, taxRates);
      return res.json({ ok: true, taxRates, workbook: model.toJSON() });
    } catch (e) {
      if (errorStatus(e) === 500) console.error('Preview failed:', e);
      return res.status(errorStatus(e)).json({ ok: false, error: errorMessage(e) });
    }
  });

  return app;
}

import express, { Request, Response } from 'express';
import http from 'http';
import cors from 'cors';
import helmet from 'helmet';
import { CONFIG } from './config';
import { escapeXml } from './chart';
import type { BucketedCountSeries } from './types';

export interface ChartPage {
  title: string;
  svg: string;
  series: BucketedCountSeries;
}

export function renderPage(page: ChartPage): string {
  const inline = page.svg.replace(/^<\?xml[^>]*\?>\s*/, '');
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>${escapeXml(page.title)}</title>
</head>
<body style="margin: 20px; font-family: Arial, sans-serif;">
${inline}
  <p>${page.series.counts.length} second(s) starting at ${page.series.start}. <a href="/chart.svg">SVG</a> · <a href="/api/v1/series">JSON</a></p>
</body>
</html>
`;
}

/** Read-only viewer for one rendered chart. */
export function createServer(page: ChartPage) {
  const app = express();
  app.disable('x-powered-by');
  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(cors({ origin: CONFIG.corsOrigin === '*' ? true : CONFIG.corsOrigin }));

  const html = renderPage(page);

  app.get('/api/v1/health', (_req: Request, res: Response) => res.json({ ok: true }));

  app.get('/api/v1/series', (_req: Request, res: Response) => {
    res.json(page.series);
  });

  app.get('/chart.svg', (_req: Request, res: Response) => {
    res.type('image/svg+xml').send(page.svg);
  });

  app.get('/', (_req: Request, res: Response) => {
    res.type('html').send(html);
  });

  const server = http.createServer(app);
  return { app, server };
}

import fs from 'fs';
import path from 'path';
import request from 'supertest';
import { afterEach, describe, expect, it } from 'vitest';
import { countTicks, escapeXml, renderSvgChart } from '../src/chart';
import { NoDataError } from '../src/errors';
import { plotFileSet, showChart } from '../src/plotter';
import { createServer, renderPage } from '../src/server';
import { cleanup, logDir } from './helpers/tmp';

afterEach(cleanup);

describe('countTicks', () => {
  it('covers the maximum with integer steps', () => {
    expect(countTicks(3)).toEqual([0, 1, 2, 3]);
    expect(countTicks(10)).toEqual([0, 2, 4, 6, 8, 10]);
    expect(countTicks(11)).toEqual([0, 3, 6, 9, 12]);
    expect(countTicks(0)).toEqual([0, 1]);
  });
});

describe('renderSvgChart', () => {
  it('plots one point per bucket', () => {
    const svg = renderSvgChart({ start: 10, counts: [2, 2, 1] }, { width: 300, height: 230, title: 'a < b' });
    // plot area: x 80..260, y 60..160, y max 2
    expect(svg).toContain('<polyline points="80,60 170,60 260,110"');
    expect(svg.match(/<circle /g)).toHaveLength(3);
    expect(svg).toContain('<title>2s: 1</title>');
    expect(svg).toContain('class="chart-title">a &lt; b</text>');
    expect(svg).toContain('Seconds since 10</text>');
  });

  it('places a single bucket on the y axis', () => {
    const svg = renderSvgChart({ start: 3, counts: [4] }, { width: 300, height: 230 });
    expect(svg).toContain('<polyline points="80,60"');
  });

  it('refuses an empty series', () => {
    expect(() => renderSvgChart({ start: 0, counts: [] })).toThrow(NoDataError);
  });
});

describe('escapeXml', () => {
  it('escapes markup characters', () => {
    expect(escapeXml('"a" & <b>')).toBe('&quot;a&quot; &amp; &lt;b&gt;');
  });
});

describe('plotFileSet', () => {
  it('writes the chart when an outfile is given', () => {
    const dir = logDir({ 'ts_a': '10.0\n10.9\n', 'ts_b': '11.0\n11.9\n12.0\n' });
    const outfile = path.join(dir, 'chart.svg');
    const result = plotFileSet('ts_', { directory: dir, outfile });
    expect(result.series).toEqual({ start: 10, counts: [2, 2, 1] });
    expect(result.title).toBe('ts_: events per second');
    expect(fs.readFileSync(outfile, 'utf8')).toBe(result.svg);
  });

  it('signals NoDataError for an empty file set', () => {
    const dir = logDir({ 'other': '1\n' });
    expect(() => plotFileSet('ts_', { directory: dir })).toThrow(NoDataError);
  });

  it('signals NoDataError when no values survive', () => {
    const dir = logDir({ 'ts_a': 'garbage\n' });
    const outfile = path.join(dir, 'chart.svg');
    expect(() => plotFileSet('ts_', { directory: dir, outfile })).toThrow(NoDataError);
    expect(fs.existsSync(outfile)).toBe(false);
  });

  it('signals NoDataError when trimming leaves nothing', () => {
    const dir = logDir({ 'ts_a': '10.2\n11.4\n' });
    expect(() => plotFileSet('ts_', { directory: dir, boundary: 'trim' })).toThrow(NoDataError);
  });
});

describe('chart viewer', () => {
  const page = { title: 'rate', svg: renderSvgChart({ start: 10, counts: [2, 2, 1] }), series: { start: 10, counts: [2, 2, 1] } };

  it('serves the page, the image and the series', async () => {
    const { app } = createServer(page);
    const html = await request(app).get('/').expect(200);
    expect(html.headers['content-type']).toContain('text/html');
    expect(html.text).toBe(renderPage(page));

    const svg = await request(app).get('/chart.svg').expect(200);
    expect(svg.headers['content-type']).toContain('image/svg+xml');

    const series = await request(app).get('/api/v1/series').expect(200);
    expect(series.body).toEqual({ start: 10, counts: [2, 2, 1] });

    const health = await request(app).get('/api/v1/health').expect(200);
    expect(health.body).toEqual({ ok: true });
  });

  it('inlines the svg without its xml declaration', () => {
    const html = renderPage(page);
    expect(html).not.toContain('<?xml');
    expect(html).toContain('<svg width="1200" height="600"');
    expect(html).toContain('3 second(s) starting at 10.');
  });

  it('listens on the requested port', async () => {
    const { url, server } = await showChart(page, '127.0.0.1', 0);
    try {
      expect(url).toMatch(/^http:\/\/127\.0\.0\.1:\d+\/$/);
      const res = await request(url).get('api/v1/health').expect(200);
      expect(res.body).toEqual({ ok: true });
    } finally {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });
});

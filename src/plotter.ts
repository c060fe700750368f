import fs from 'fs';
import http from 'http';
import { renderSvgChart } from './chart';
import { CONFIG } from './config';
import { NoDataError } from './errors';
import { FileSetReader } from './fileSetReader';
import { createServer, ChartPage } from './server';
import { bucketTimestamps } from './stats';
import type { BucketOptions } from './types';

export interface PlotOptions extends BucketOptions {
  outfile?: string;
  title?: string;
}

export interface PlotResult extends ChartPage {
  outfile?: string;
}

/**
 * Buckets a timestamp file set and renders it. With `outfile` the SVG is
 * written there; otherwise the caller gets the page to display.
 */
export function plotFileSet(baseName: string, options: PlotOptions = {}, reader = new FileSetReader(options)): PlotResult {
  const fileSet = reader.resolve(baseName);
  if (fileSet.paths.length === 0) {
    throw new NoDataError(`nothing to plot: no files starting with "${baseName}" in ${fileSet.directory}`);
  }
  const merged = reader.read(fileSet);
  const series = bucketTimestamps(merged.values, options.boundary);
  if (series.counts.length === 0) {
    throw new NoDataError(`nothing to plot: no complete seconds of data in files starting with "${baseName}"`);
  }
  const title = options.title ?? `${baseName}: events per second`;
  const svg = renderSvgChart(series, { title });
  if (options.outfile) fs.writeFileSync(options.outfile, svg);
  return { title, svg, series, outfile: options.outfile };
}

/** Serves the chart until the process is stopped; resolves with its URL once listening. */
export function showChart(page: ChartPage, host = CONFIG.viewerHost, port = CONFIG.viewerPort): Promise<{ url: string; server: http.Server }> {
  const { server } = createServer(page);
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve({ url: `http://${host}:${portOf(server, port)}/`, server });
    });
  });
}

// port 0 asks the OS for one; report the port actually bound
function portOf(server: http.Server, requested: number): number {
  const addr = server.address();
  return addr !== null && typeof addr === 'object' ? addr.port : requested;
}

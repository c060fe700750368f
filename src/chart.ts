import { CONFIG } from './config';
import { NoDataError } from './errors';
import type { BucketedCountSeries } from './types';

export interface ChartOptions {
  title?: string;
  width?: number;
  height?: number;
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/** Integer ticks from 0 through the first step at or above `max` (at least 1). */
export function countTicks(max: number, target = 5): number[] {
  const top = Math.max(1, max);
  const step = Math.max(1, Math.ceil(top / target));
  const ticks: number[] = [];
  for (let t = 0; t < top + step; t += step) ticks.push(t);
  return ticks;
}

/**
 * Line-and-point chart of a per-second count series. x is seconds since the
 * earliest bucket, y is the number of events in that second.
 */
export function renderSvgChart(series: BucketedCountSeries, options: ChartOptions = {}): string {
  if (series.counts.length === 0) throw new NoDataError('nothing to plot: the series is empty');

  const width = options.width ?? CONFIG.chartWidth;
  const height = options.height ?? CONFIG.chartHeight;
  const title = options.title ?? 'Events per second';
  const margin = { top: 60, right: 40, bottom: 70, left: 80 };
  const chartWidth = width - margin.left - margin.right;
  const chartHeight = height - margin.top - margin.bottom;

  const yTicks = countTicks(series.counts.reduce((a, b) => Math.max(a, b), 0));
  const yMax = yTicks[yTicks.length - 1];
  const xSpan = Math.max(1, series.counts.length - 1);
  const xScale = (index: number) => margin.left + (index / xSpan) * chartWidth;
  const yScale = (count: number) => margin.top + chartHeight - (count / yMax) * chartHeight;

  const xTickInterval = Math.max(1, Math.ceil(series.counts.length / 10));
  const xTicks = series.counts.map((_, i) => i).filter((i) => i % xTickInterval === 0);

  const points = series.counts.map((c, i) => `${xScale(i)},${yScale(c)}`).join(' ');

  return `<?xml version="1.0" encoding="UTF-8"?>
<svg width="${width}" height="${height}" xmlns="http://www.w3.org/2000/svg" style="background: white;">
  <defs>
    <style>
      .chart-title { font: bold 20px Arial, sans-serif; text-anchor: middle; fill: #333; }
      .axis-title { font: bold 14px Arial, sans-serif; text-anchor: middle; fill: #666; }
      .axis-label { font: 12px Arial, sans-serif; fill: #666; }
      .grid-line { stroke: #e0e0e0; stroke-width: 1; }
      .axis-line { stroke: #333; stroke-width: 2; }
    </style>
  </defs>
  <text x="${width / 2}" y="35" class="chart-title">${escapeXml(title)}</text>
${yTicks.map((t) => `  <line x1="${margin.left}" y1="${yScale(t)}" x2="${margin.left + chartWidth}" y2="${yScale(t)}" class="grid-line"/>
  <text x="${margin.left - 10}" y="${yScale(t) + 4}" class="axis-label" text-anchor="end">${t}</text>
`).join('')}${xTicks.map((i) => `  <text x="${xScale(i)}" y="${margin.top + chartHeight + 20}" class="axis-label" text-anchor="middle">${i}</text>
`).join('')}  <line x1="${margin.left}" y1="${margin.top + chartHeight}" x2="${margin.left + chartWidth}" y2="${margin.top + chartHeight}" class="axis-line"/>
  <line x1="${margin.left}" y1="${margin.top}" x2="${margin.left}" y2="${margin.top + chartHeight}" class="axis-line"/>
  <polyline points="${points}" fill="none" stroke="#17a2b8" stroke-width="2"/>
${series.counts.map((c, i) => `  <circle cx="${xScale(i)}" cy="${yScale(c)}" r="3" fill="#17a2b8"><title>${i}s: ${c}</title></circle>
`).join('')}  <text x="${margin.left + chartWidth / 2}" y="${height - 20}" class="axis-title">Seconds since ${series.start}</text>
  <text x="25" y="${margin.top + chartHeight / 2}" class="axis-title" transform="rotate(-90, 25, ${margin.top + chartHeight / 2})">Events per second</text>
</svg>
`;
}


export const CONFIG = {
  viewerHost: String(process.env.VIEWER_HOST || '127.0.0.1'),
  viewerPort: Number(process.env.VIEWER_PORT || 43118),
  corsOrigin: process.env.CORS_ORIGIN || '*',
  chartWidth: Number(process.env.CHART_WIDTH || 1200),
  chartHeight: Number(process.env.CHART_HEIGHT || 600),
  verbose: process.env.VERBOSE === '1' || process.env.VERBOSE === 'true',
};

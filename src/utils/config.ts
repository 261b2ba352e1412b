import path from 'path';
import { fileURLToPath } from 'url';
import { Config } from '../types/index.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const projectRoot = path.resolve(__dirname, '../..');

const dataDir = process.env.DUESYNC_DATA_DIR ?? path.join(projectRoot, 'data');

export const config: Config = {
  canvas: {
    baseUrl: (process.env.CANVAS_BASE_URL ?? 'https://canvas.instructure.com').replace(/\/$/, ''),
    accessToken: process.env.CANVAS_ACCESS_TOKEN ?? '',
    pageSize: 100,
  },
  cache: {
    ttl: 10 * 60 * 1000,
    fetchTimeout: 30 * 1000,
  },
  calendar: {
    defaultCalendarName: 'Coursework',
  },
  paths: {
    dataDir,
    database: path.join(dataDir, 'sync.db'),
    logFile: path.join(dataDir, 'sync.log'),
  },
  logging: {
    level: process.env.LOG_LEVEL ?? 'info',
  },
};

import path from 'path';

function readInt(name: string, fallback: number, min = 0): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isInteger(value) && value >= min ? value : fallback;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  exportDir: string;
  maxUploadMb: number;
  sessionTtlMs: number;
  defaultAtlasPadding: number;
}

export function loadConfig(): AppConfig {
  return {
    port: readInt('PORT', 3001, 1),
    nodeEnv: process.env.NODE_ENV || 'development',
    exportDir: path.resolve(process.env.EXPORT_DIR || './exports'),
    maxUploadMb: readInt('MAX_UPLOAD_MB', 25, 1),
    sessionTtlMs: readInt('SESSION_TTL_MS', 30 * 60 * 1000, 1000),
    defaultAtlasPadding: readInt('DEFAULT_ATLAS_PADDING', 2),
  };
}

export const config: AppConfig = loadConfig();

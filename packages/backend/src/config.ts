import os from 'node:os';
import path from 'node:path';
import { type RenderOptions, renderOptionsFromEnv } from '@po-tools/parser';

export interface AppConfig {
  port: number;
  uploadDir: string;
  maxFileSize: number;  // bytes
  reportTtlMs: number;
  render: RenderOptions;
}

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

export function loadConfig(): AppConfig {
  return {
    port: parseInt(env('PORT', '8000'), 10),
    uploadDir: env('UPLOAD_DIR', path.join(os.tmpdir(), 'po-tools-uploads')),
    maxFileSize: parseInt(env('MAX_FILE_SIZE', String(200 * 1024 * 1024)), 10), // 200MB
    reportTtlMs: parseInt(env('REPORT_TTL_MS', String(60 * 60 * 1000)), 10),  // 1 hour
    render: renderOptionsFromEnv(process.env),
  };
}

let currentConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!currentConfig) {
    currentConfig = loadConfig();
  }
  return currentConfig;
}

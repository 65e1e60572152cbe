import dotenv from 'dotenv';
import os from 'os';
import path from 'path';

// Load environment variables
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

export interface Config {
  // Server
  port: number;
  nodeEnv: string;

  // File paths
  tempDir: string;
  ffprobePath: string;

  // Matching
  confidenceThreshold: number;
  strictMatching: boolean;

  // Subtitle processing defaults
  shiftFrames: number;
  forceResample: boolean;
  noResample: boolean;

  // Output naming
  releaseTag: string;
}

function getEnvString(key: string, defaultValue: string = ''): string {
  return process.env[key] ?? defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvFloat(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export function loadConfig(): Config {
  return {
    // Server
    port: getEnvNumber('PORT', 3001),
    nodeEnv: getEnvString('NODE_ENV', 'development'),

    // File paths
    tempDir: getEnvString('TEMP_DIR', path.join(os.tmpdir(), 'subpair')),
    ffprobePath: getEnvString('FFPROBE_PATH', 'ffprobe'),

    // Matching
    confidenceThreshold: Math.min(1, Math.max(0, getEnvFloat('CONFIDENCE_THRESHOLD', 0.7))),
    strictMatching: getEnvBoolean('STRICT_MATCHING', false),

    // Subtitle processing defaults
    shiftFrames: getEnvNumber('SHIFT_FRAMES', 0),
    forceResample: getEnvBoolean('FORCE_RESAMPLE', false),
    noResample: getEnvBoolean('NO_RESAMPLE', false),

    // Output naming
    releaseTag: getEnvString('RELEASE_TAG', 'MySubs'),
  };
}

export const config = loadConfig();

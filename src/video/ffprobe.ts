import { spawn, execSync } from 'child_process';
import path from 'path';
import { config } from '../config';
import { Resolution } from '../subtitles/types';

/**
 * Video stream facts the subtitle pipeline and output naming depend on
 */
export interface MediaProbe {
  getResolution(videoPath: string): Promise<Resolution | null>;
  getVideoParams(videoPath: string): Promise<string[]>;
}

/**
 * A probe that can also report on the tool behind it
 */
export interface ProbeTool extends MediaProbe {
  isAvailable(): boolean;
  getVersion(): string | null;
}

/**
 * Encoding details of the first video stream
 */
export interface StreamDetails {
  bitDepth: string | null;
  encoder: string | null;
}

const STANDARD_HEIGHTS = [480, 720, 1080, 2160];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstStream(output: string): Record<string, unknown> | null {
  const data: unknown = JSON.parse(output);
  if (!isRecord(data) || !Array.isArray(data.streams)) return null;
  const stream: unknown = data.streams[0];
  return isRecord(stream) ? stream : null;
}

/**
 * Reads width/height from `ffprobe -show_entries stream=width,height -of json`
 * @returns The resolution, or null when either dimension is missing or zero
 */
export function parseResolutionOutput(output: string): Resolution | null {
  const stream = firstStream(output);
  if (!stream) return null;

  const { width, height } = stream;
  if (typeof width !== 'number' || typeof height !== 'number' || width <= 0 || height <= 0) {
    return null;
  }
  return { width, height };
}

export function parseStreamDetails(output: string): StreamDetails {
  const stream = firstStream(output);
  if (!stream) return { bitDepth: null, encoder: null };

  const bitDepth = stream.bits_per_raw_sample;
  const tags = stream.tags;
  const encoder = isRecord(tags) ? tags.encoder : undefined;

  return {
    bitDepth: typeof bitDepth === 'string' || typeof bitDepth === 'number' ? String(bitDepth) : null,
    encoder: typeof encoder === 'string' ? encoder : null,
  };
}

/**
 * Builds release-style tags for an output filename, e.g. ["1080p", "10bit", "HEVC"]
 */
export function buildVideoParams(
  resolution: Resolution | null,
  details: StreamDetails,
  fileName: string
): string[] {
  const params: string[] = [];

  if (resolution) {
    params.push(
      STANDARD_HEIGHTS.includes(resolution.height)
        ? `${resolution.height}p`
        : `${resolution.width}x${resolution.height}`
    );
  }

  const lowerName = fileName.toLowerCase();
  if (details.bitDepth && details.bitDepth !== '8') {
    params.push(`${details.bitDepth}bit`);
  } else if (lowerName.includes('10bit') || lowerName.includes('10 bit')) {
    params.push('10bit');
  }

  const encoder = details.encoder?.toLowerCase() ?? '';
  if (encoder.includes('x265') || encoder.includes('hevc')) {
    params.push('HEVC');
  } else if (encoder.includes('x264') || encoder.includes('avc')) {
    params.push('h264');
  }

  return params;
}

/**
 * ffprobe wrapper for reading video stream properties
 */
export class VideoProber implements ProbeTool {
  private ffprobePath: string;

  constructor(ffprobePath?: string) {
    this.ffprobePath = ffprobePath ?? (config.ffprobePath || 'ffprobe');
  }

  /**
   * Checks if ffprobe is available in the system
   */
  isAvailable(): boolean {
    try {
      execSync(`${this.ffprobePath} -version`, { stdio: 'pipe' });
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Gets the ffprobe version string
   * @returns Version string or null if not available
   */
  getVersion(): string | null {
    try {
      const output = execSync(`${this.ffprobePath} -version`, { encoding: 'utf-8' });
      const match = output.match(/ffprobe version ([^\s]+)/);
      return match?.[1] ?? null;
    } catch {
      return null;
    }
  }

  /**
   * Gets the resolution of the first video stream
   * @returns Resolution, or null when it cannot be determined
   */
  async getResolution(videoPath: string): Promise<Resolution | null> {
    try {
      const output = await this.runProbe([
        '-select_streams', 'v:0',
        '-show_entries', 'stream=width,height',
        '-of', 'json',
        videoPath,
      ]);
      return parseResolutionOutput(output);
    } catch (error) {
      console.warn(
        `Could not get resolution for ${path.basename(videoPath)}:`,
        error instanceof Error ? error.message : error
      );
      return null;
    }
  }

  /**
   * Gets release-style parameters (resolution, bit depth, codec) for naming
   */
  async getVideoParams(videoPath: string): Promise<string[]> {
    const resolution = await this.getResolution(videoPath);
    let details: StreamDetails = { bitDepth: null, encoder: null };

    try {
      const output = await this.runProbe([
        '-select_streams', 'v:0',
        '-show_entries', 'stream=bits_per_raw_sample:stream_tags=encoder',
        '-of', 'json',
        videoPath,
      ]);
      details = parseStreamDetails(output);
    } catch (error) {
      console.warn(
        `Could not get video parameters for ${path.basename(videoPath)}:`,
        error instanceof Error ? error.message : error
      );
    }

    return buildVideoParams(resolution, details, path.basename(videoPath));
  }

  private runProbe(args: string[]): Promise<string> {
    return this.runCommand(this.ffprobePath, ['-v', 'error', ...args]);
  }

  /**
   * Runs a command with the given arguments
   * @returns Promise that resolves with stdout when command completes
   */
  private runCommand(command: string, args: string[]): Promise<string> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] });

      let stdout = '';
      let stderr = '';

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('close', (code) => {
        if (code === 0) {
          resolve(stdout);
        } else {
          reject(new Error(`Command failed with code ${code}: ${stderr}`));
        }
      });

      child.on('error', (err) => {
        reject(new Error(`Failed to start command: ${err.message}`));
      });
    });
  }
}

export const videoProber = new VideoProber();

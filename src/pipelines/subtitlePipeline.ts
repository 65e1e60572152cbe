import path from 'path';
import { config } from '../config';
import { resampleSubtitle, shiftSubtitleTiming, TempWorkspace, tempWorkspace } from '../subtitles';
import { MediaProbe, videoProber } from '../video/ffprobe';

export interface PrepareRequest {
  videoPath: string;
  subtitlePath: string;
  /** Signed frame offset, 0 to keep timing */
  shiftFrames?: number;
  forceResample?: boolean;
  noResample?: boolean;
}

export interface PreparedSubtitle {
  /** Final subtitle path, the input path when nothing changed */
  subtitlePath: string;
  shifted: boolean;
  resampled: boolean;
}

/**
 * Readies a matched subtitle for its video: timing shift, then resample
 * to the video resolution. Transform failures leave the subtitle as is.
 */
export class SubtitlePipeline {
  private probe: MediaProbe;
  private workspace: TempWorkspace;

  constructor(probe?: MediaProbe, workspace?: TempWorkspace) {
    this.probe = probe ?? videoProber;
    this.workspace = workspace ?? tempWorkspace;
  }

  async prepare(request: PrepareRequest): Promise<PreparedSubtitle> {
    const shiftFrames = request.shiftFrames ?? config.shiftFrames;
    const forceResample = request.forceResample ?? config.forceResample;
    const noResample = request.noResample ?? config.noResample;

    let current = request.subtitlePath;
    let shifted = false;
    let resampled = false;

    // Stage 1: Timing shift
    if (shiftFrames !== 0) {
      const output = shiftSubtitleTiming(current, shiftFrames, { workspace: this.workspace });
      shifted = output !== current;
      current = output;
    }

    // Stage 2: Resample to the video resolution
    if (!noResample) {
      const resolution = await this.probe.getResolution(request.videoPath);
      if (!resolution) {
        console.warn(
          `Could not determine resolution of ${path.basename(request.videoPath)}, skipping subtitle resample`
        );
      } else {
        const output = resampleSubtitle(current, resolution, {
          force: forceResample,
          workspace: this.workspace,
        });
        resampled = output !== current;
        current = output;
      }
    }

    return { subtitlePath: current, shifted, resampled };
  }
}

/**
 * Runs the subtitle pipeline for a single video/subtitle pair
 */
export function prepareSubtitle(request: PrepareRequest, probe?: MediaProbe): Promise<PreparedSubtitle> {
  return new SubtitlePipeline(probe).prepare(request);
}

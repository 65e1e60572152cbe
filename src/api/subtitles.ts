import fs from 'fs';
import { Router, Request, Response } from 'express';
import { config } from '../config';
import { extractLangFromFilename, generateOutputFilename } from '../filenames';
import { SubtitlePipeline } from '../pipelines/subtitlePipeline';
import { MediaProbe } from '../video/ffprobe';
import { asyncHandler } from './asyncHandler';
import { isBody, readBoolean, readNumber, readString } from './validation';

export function createSubtitlesRouter(probe: MediaProbe): Router {
  const router = Router();
  const pipeline = new SubtitlePipeline(probe);

  /**
   * POST /api/subtitles/prepare
   * Shift and resample a subtitle for its video, and name the muxed output
   */
  router.post(
    '/prepare',
    asyncHandler(async (req: Request, res: Response) => {
      const body: unknown = req.body;
      if (!isBody(body)) {
        res.status(400).json({ error: 'Expected a JSON object body' });
        return;
      }

      const videoPath = readString(body, 'videoPath');
      const subtitlePath = readString(body, 'subtitlePath');
      const shiftFrames = readNumber(body, 'shiftFrames');
      const forceResample = readBoolean(body, 'forceResample');
      const noResample = readBoolean(body, 'noResample');
      const releaseTag = readString(body, 'releaseTag');

      if (!videoPath || !subtitlePath) {
        res.status(400).json({ error: 'Missing required fields', required: ['videoPath', 'subtitlePath'] });
        return;
      }

      if (shiftFrames === null || (shiftFrames !== undefined && !Number.isInteger(shiftFrames))) {
        res.status(400).json({ error: 'shiftFrames must be an integer' });
        return;
      }

      if (forceResample === null || noResample === null || releaseTag === null) {
        res.status(400).json({ error: 'Invalid request fields' });
        return;
      }

      if (!fs.existsSync(subtitlePath)) {
        res.status(404).json({ error: `Subtitle not found: ${subtitlePath}` });
        return;
      }

      const prepared = await pipeline.prepare({
        videoPath,
        subtitlePath,
        shiftFrames,
        forceResample,
        noResample,
      });
      const videoParams = await probe.getVideoParams(videoPath);

      res.json({
        ...prepared,
        language: extractLangFromFilename(subtitlePath),
        outputFilename: generateOutputFilename(videoPath, releaseTag ?? config.releaseTag, videoParams),
      });
    })
  );

  return router;
}

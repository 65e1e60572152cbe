import fs from 'fs';
import { Router, Request, Response } from 'express';
import { config } from '../config';
import { findSubtitleFiles, isConfident, subtitleMatcher, summarizeMatches } from '../matching';
import { asyncHandler } from './asyncHandler';
import { isBody, readBoolean, readNumber, readString, readStringArray } from './validation';

const router = Router();

/**
 * POST /api/match
 * Pair each video with its best subtitle
 */
router.post(
  '/',
  asyncHandler(async (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!isBody(body)) {
      res.status(400).json({ error: 'Expected a JSON object body' });
      return;
    }

    const videos = readStringArray(body, 'videos');
    const subtitles = readStringArray(body, 'subtitles');
    const subtitleRoot = readString(body, 'subtitleRoot');
    const strict = readBoolean(body, 'strict');
    const threshold = readNumber(body, 'threshold');

    if (!videos) {
      res.status(400).json({ error: 'videos must be a list of paths' });
      return;
    }

    if (subtitles === null || subtitleRoot === null || strict === null || threshold === null) {
      res.status(400).json({
        error: 'Invalid request fields',
        expected: { subtitles: 'string[]', subtitleRoot: 'string', strict: 'boolean', threshold: 'number' },
      });
      return;
    }

    if (threshold !== undefined && (threshold < 0 || threshold > 1)) {
      res.status(400).json({ error: 'threshold must be between 0 and 1' });
      return;
    }

    let candidates: string[];
    if (subtitles) {
      candidates = subtitles;
    } else if (subtitleRoot) {
      if (!fs.existsSync(subtitleRoot) || !fs.statSync(subtitleRoot).isDirectory()) {
        res.status(400).json({ error: `Subtitle directory not found: ${subtitleRoot}` });
        return;
      }
      candidates = findSubtitleFiles(subtitleRoot);
    } else {
      res.status(400).json({ error: 'Provide subtitles or subtitleRoot' });
      return;
    }

    const confidenceThreshold = threshold ?? config.confidenceThreshold;
    const results = subtitleMatcher.matchBatch(videos, candidates, strict ?? config.strictMatching);

    res.json({
      results: results.map((result) => ({
        ...result,
        confident: result.subtitlePath !== null && isConfident(result, confidenceThreshold),
      })),
      summary: summarizeMatches(results, confidenceThreshold),
      threshold: confidenceThreshold,
    });
  })
);

/**
 * POST /api/match/alternatives
 * Rank every candidate subtitle for one video
 */
router.post(
  '/alternatives',
  asyncHandler(async (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!isBody(body)) {
      res.status(400).json({ error: 'Expected a JSON object body' });
      return;
    }

    const video = readString(body, 'video');
    const subtitles = readStringArray(body, 'subtitles');
    const limit = readNumber(body, 'limit');

    if (!video || !subtitles) {
      res.status(400).json({ error: 'Missing required fields', required: ['video', 'subtitles'] });
      return;
    }

    if (limit === null || (limit !== undefined && (!Number.isInteger(limit) || limit < 0))) {
      res.status(400).json({ error: 'limit must be a non-negative integer' });
      return;
    }

    res.json({
      video,
      alternatives: subtitleMatcher.getAlternativeMatches(video, subtitles, limit),
    });
  })
);

export default router;

import { Router } from 'express';
import { ProbeTool, videoProber } from '../video/ffprobe';
import { createHealthRouter } from './health';
import matchRouter from './match';
import { createSubtitlesRouter } from './subtitles';

export function createApiRouter(prober: ProbeTool = videoProber): Router {
  const router = Router();

  router.use('/health', createHealthRouter(prober));
  router.use('/match', matchRouter);
  router.use('/subtitles', createSubtitlesRouter(prober));

  return router;
}

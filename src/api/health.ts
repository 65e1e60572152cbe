import { Router, Request, Response } from 'express';
import { config } from '../config';
import { ProbeTool } from '../video/ffprobe';

export function createHealthRouter(prober: ProbeTool): Router {
  const router = Router();

  /**
   * GET /api/health
   * Health check endpoint
   */
  router.get('/', (_req: Request, res: Response) => {
    const ffprobeAvailable = prober.isAvailable();
    const ffprobeVersion = ffprobeAvailable ? prober.getVersion() : null;

    res.json({
      status: ffprobeAvailable ? 'healthy' : 'degraded',
      services: {
        ffprobe: {
          available: ffprobeAvailable,
          version: ffprobeVersion,
        },
      },
      config: {
        confidenceThreshold: config.confidenceThreshold,
        strictMatching: config.strictMatching,
        shiftFrames: config.shiftFrames,
        forceResample: config.forceResample,
        noResample: config.noResample,
        releaseTag: config.releaseTag,
      },
    });
  });

  return router;
}

import { createApp } from './app';
import { config } from './config';
import { tempWorkspace } from './subtitles';

const app = createApp();

// Start server
const port = config.port;

const server = app.listen(port, () => {
  console.info(`\n🎬 Subpair`);
  console.info(`   Server running on http://localhost:${port}`);
  console.info(`   Environment: ${config.nodeEnv}`);
  console.info(`   Temp directory: ${tempWorkspace.directory}`);
  console.info(`\n   API Endpoints:`);
  console.info(`   - GET  /api/health                - Check service status`);
  console.info(`   - POST /api/match                 - Match videos to subtitles`);
  console.info(`   - POST /api/match/alternatives    - Rank subtitles for one video`);
  console.info(`   - POST /api/subtitles/prepare     - Shift and resample a subtitle`);
  console.info(`\n`);
});

const shutdown = (): void => {
  server.close(() => {
    tempWorkspace.cleanup();
    process.exit(0);
  });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

export default app;

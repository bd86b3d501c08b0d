import { DEFAULT_CONFIG, loadConfigFile } from './config.js';
import { createApp } from './app.js';

const DEFAULT_PORT = 3000;

/**
 * Start the server
 */
async function bootstrap() {
  const args = process.argv.slice(2);
  const portArg = args.find(a => a.startsWith('--port='));
  const port = portArg ? parseInt(portArg.split('=')[1], 10) : DEFAULT_PORT;
  const configArg = args.find(a => a.startsWith('--config='));

  const config = configArg
    ? await loadConfigFile(configArg.slice('--config='.length))
    : DEFAULT_CONFIG;

  const app = createApp(config);

  const server = app.listen(port, () => {
    console.log(`Scenario Weaver API listening on http://localhost:${port}`);
  });

  // Graceful shutdown handler
  const shutdown = (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

bootstrap().catch(err => {
  console.error('Failed to start server:', err instanceof Error ? err.message : err);
  process.exit(1);
});

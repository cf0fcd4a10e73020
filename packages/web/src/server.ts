import { createApp } from './app.js';
import { loadEnv } from './config/env.js';

const env = loadEnv();

const app = createApp({
  defaultIterations: env.DEFAULT_ITERATIONS,
  maxIterations: env.MAX_ITERATIONS,
  callCost: env.CALL_COST
});

// Start server
const server = app.listen(env.PORT, () => {
  console.log(`
╔════════════════════════════════════════════════════════════╗
║                   Poker Odds API                           ║
║                                                            ║
║   Listening on: http://localhost:${env.PORT}                      ║
║                                                            ║
║   Press Ctrl+C to stop the server                          ║
╚════════════════════════════════════════════════════════════╝
`);
});

function shutdown(): void {
  console.log('\nShutting down...');
  server.close(() => {
    console.log('Server stopped.');
    process.exit(0);
  });
}

// Graceful shutdown
process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

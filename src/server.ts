/**
 * Server Entry Point
 */

import { createServer } from 'http';
import { createApp } from './app';
import { env } from './config/env';

const startServer = (): void => {
  const app = createApp();
  const httpServer = createServer(app);

  httpServer.listen(env.PORT, () => {
    console.log('');
    console.log('🚀 ═══════════════════════════════════════════════════════');
    console.log('🚀 Site digest server is running');
    console.log(`🚀 Environment: ${env.NODE_ENV}`);
    console.log(`🚀 Port: ${env.PORT}`);
    console.log(`🚀 Fallback engine: ${env.FALLBACK_ENABLED ? 'enabled' : 'disabled'}`);
    console.log(`🚀 API: http://localhost:${env.PORT}/health`);
    console.log('🚀 ═══════════════════════════════════════════════════════');
    console.log('');
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`${signal} signal received: closing HTTP server`);
    httpServer.close(() => {
      console.log('HTTP server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

// Start the server
try {
  startServer();
} catch (error) {
  console.error('Failed to start server:', error);
  process.exit(1);
}

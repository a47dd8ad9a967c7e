import { config as loadEnv } from 'dotenv';
import { loadConfig } from './config.js';
import { createApp } from './app.js';
import { ConnectionServer } from './server.js';
import { ConfigError } from './errors.js';

loadEnv();

// Catch unhandled promise rejections to prevent silent crashes
process.on('unhandledRejection', (reason) => {
  console.error('[FATAL] Unhandled promise rejection:', reason);
});

async function main() {
  const { server: config, runtime } = await loadConfig();

  const app = createApp(config, {
    corsOrigin: runtime.corsOrigin,
    trustProxy: runtime.trustProxy,
    rateLimitWrite: runtime.rateLimitWrite,
    logRequests: runtime.logRequests,
  });
  const server = new ConnectionServer(app, { tls: config.tls });

  const address = await server.listen(runtime.port, runtime.host);
  const protocol = server.secure ? 'https' : 'http';

  console.log('');
  console.log('='.repeat(50));
  console.log('  sharedir');
  console.log('='.repeat(50));
  console.log(`  ${protocol.toUpperCase()}:  ${protocol}://${runtime.host}:${address.port}`);
  console.log(`  Root:   ${config.root.absolute}`);
  console.log(`  TLS:    ${config.tls ? 'Enabled' : 'Disabled'}`);
  console.log(`  Auth:   ${config.credential ? 'Basic credential required' : 'No authentication'}`);
  console.log('='.repeat(50));
  console.log('');

  // Graceful shutdown
  const shutdown = () => {
    console.log('\n[shutdown] Closing server...');
    const live = server.connectionStates();
    console.log(`[shutdown] ${live.serving} serving, ${live.handshaking} handshaking`);
    server.close().then(
      () => {
        console.log('[shutdown] Server closed');
        process.exit(0);
      },
      (err) => {
        console.error('[shutdown] close failed:', err);
        process.exit(1);
      },
    );
    // Force exit after 5s if graceful close hangs
    setTimeout(() => {
      console.log('[shutdown] Forced exit');
      process.exit(1);
    }, 5000).unref();
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  if (err instanceof ConfigError) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error('Failed to start server:', err);
  }
  process.exit(1);
});

/**
 * server/index.ts
 *
 * Entry point of the Stateless App Runner.
 *
 * STARTUP ORDER: configuration (and with it the secret key) is settled once,
 * here, before the server accepts its first request. Nothing changes it
 * afterwards.
 */

import { createApp } from './app.js';
import { loadConfig } from './config.js';

const config = loadConfig();

if (config.secretKeySource === 'generated') {
  console.warn(
    `No SECRET_KEY set. Generated a random key for this process: ${config.secretKey}\n` +
      'Links issued with it become invalid when the server restarts.'
  );
}

const app = createApp(config);

app.listen(config.port, () => {
  console.log(`
╔═══════════════════════════════════════════════════════════════════╗
║              STATELESS APP RUNNER                                 ║
╠═══════════════════════════════════════════════════════════════════╣
║  Status: RUNNING                                                  ║
║  Port: ${String(config.port).padEnd(59)}║
║  Link domain: ${config.domain.padEnd(52)}║
║  Secret key: ${(config.secretKeySource === 'env' ? 'from SECRET_KEY' : 'generated (volatile)').padEnd(53)}║
║  Content limit: ${`${config.maxContentBytes} bytes`.padEnd(50)}║
║                                                                   ║
║  Nothing is stored. Every application lives in its own link.      ║
╚═══════════════════════════════════════════════════════════════════╝
  `);
});

export { app };

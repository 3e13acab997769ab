import { config, validateEnv } from './config.js';
import { ActivityRegistry } from './activities/registry.js';
import { SEED_ACTIVITIES } from './activities/seed.js';
import { createActivitiesServer } from './http/server.js';

function main(): void {
  validateEnv();

  const log = config.LOG_ENABLED;
  const registry = new ActivityRegistry(SEED_ACTIVITIES, { enforceCapacity: config.ENFORCE_CAPACITY, log });
  const server = createActivitiesServer(registry, { staticDir: config.STATIC_DIR, log });

  const shutdown = (signal: string) => {
    console.log(`\n[Shutdown] ${signal} received, closing server. Registrations are not persisted.`);
    server.close(err => {
      if (err) console.error('[Shutdown] Close failed:', err);
      process.exit(err ? 1 : 0);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  server.listen(config.PORT, config.HOST, () => {
    console.log(`[Server] Mergington High School activities API on http://${config.HOST}:${config.PORT}`);
    console.log(`[Server] ${registry.size} activities loaded, capacity ${config.ENFORCE_CAPACITY ? 'enforced' : 'not enforced'}`);
  });
}

main();

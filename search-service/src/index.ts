import { ZodError } from 'zod';
import { loadConfig } from './config.js';
import type { Config } from './config.js';
import { buildServer } from './api/server.js';

let config: Config;
try {
  config = loadConfig();
} catch (err) {
  const detail = err instanceof ZodError
    ? err.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    : String(err);
  console.error(`Error: invalid configuration: ${detail}`);
  process.exit(1);
}

const app = buildServer(config);

try {
  await app.listen({ port: config.port, host: config.host });
} catch (err) {
  app.log.error(err);
  process.exit(1);
}

process.on('SIGTERM', () => {
  app.close().then(
    () => process.exit(0),
    (err: unknown) => {
      app.log.error(err);
      process.exit(1);
    },
  );
});

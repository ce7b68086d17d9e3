import { serve } from '@hono/node-server';
import { TargetLoader, initOracleClient } from './db/target-loader.js';
import { connectDocker } from './runtime/docker-runtime.js';
import { StatusService } from './services/status-service.js';
import { QueryService } from './services/query-service.js';
import { LogService } from './services/log-service.js';
import { SessionStore } from './web/session-store.js';
import { createApp } from './web/app.js';
import { errorMessage } from './errors.js';

async function main(): Promise<void> {
  const loader = new TargetLoader();
  const port = loader.listenPort();
  const targets = loader.loadTargets();

  initOracleClient();
  const runtime = await connectDocker();

  const app = createApp({
    targets,
    statusService: new StatusService(),
    queryService: new QueryService(),
    logService: new LogService(runtime),
    sessions: new SessionStore()
  });

  serve({ fetch: app.fetch, port }, (info) => {
    console.log(`🚀 Oracle DB Monitor listening on http://localhost:${info.port}`);
  });
}

main().catch((error: unknown) => {
  console.error(`❌ Failed to start: ${errorMessage(error)}`);
  process.exit(1);
});

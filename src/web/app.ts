import { Hono } from 'hono';
import type { Context } from 'hono';
import { getCookie, setCookie } from 'hono/cookie';
import { z } from 'zod';
import { TargetConfig, TargetSummary } from '../types.js';
import { connectionString } from '../db/connection-resolver.js';
import { StatusService } from '../services/status-service.js';
import { QueryService } from '../services/query-service.js';
import { LogService } from '../services/log-service.js';
import { errorMessage } from '../errors.js';
import { SessionStore } from './session-store.js';
import { renderPanel, renderPanelError } from './panel.js';
import { renderDashboard } from './page.js';

export const SESSION_COOKIE = 'monitor_session';

export interface AppDeps {
  targets: TargetConfig[];
  statusService: StatusService;
  queryService: QueryService;
  logService: LogService;
  sessions: SessionStore;
}

const queryBodySchema = z.object({
  statement: z.string()
});

function summarize(target: TargetConfig): TargetSummary {
  return {
    key: target.key,
    name: target.name,
    connectionString: connectionString(target),
    sid: target.sidOrService,
    containerName: target.containerName
  };
}

function sessionId(c: Context, sessions: SessionStore): string {
  const existing = getCookie(c, SESSION_COOKIE);
  if (existing && sessions.touch(existing)) return existing;

  const id = sessions.create();
  setCookie(c, SESSION_COOKIE, id, { httpOnly: true, sameSite: 'Lax', path: '/' });
  return id;
}

export function createApp(deps: AppDeps): Hono {
  const { targets, statusService, queryService, logService, sessions } = deps;
  const app = new Hono();

  const findTarget = (key: string) => targets.find((t) => t.key === key);

  // Each panel probes and renders on its own; a throw here only replaces that panel.
  async function loadPanel(target: TargetConfig, sid: string) {
    try {
      const status = await statusService.probe(target);
      const logs = await logService.fetchLogs(target.containerName);
      const warning = sessions.takeWarning(sid, target.key);
      return renderPanel({ target, status, logs, console: sessions.get(sid, target.key), warning });
    } catch (error) {
      console.error(`❌ Error loading ${target.name} panel: ${errorMessage(error)}`);
      return renderPanelError(target, errorMessage(error));
    }
  }

  app.get('/', async (c) => {
    const sid = sessionId(c, sessions);
    const panels: Array<ReturnType<typeof renderPanel>> = [];
    for (const target of targets) {
      panels.push(await loadPanel(target, sid));
    }
    return c.html(renderDashboard(panels));
  });

  app.post('/targets/:key/query', async (c) => {
    const target = findTarget(c.req.param('key'));
    if (!target) return c.text(`Unknown target: ${c.req.param('key')}`, 404);

    const sid = sessionId(c, sessions);
    const body = await c.req.parseBody();
    const statement = typeof body.statement === 'string' ? body.statement : '';
    const previous = sessions.get(sid, target.key);

    const result = await queryService.execute(target, statement);
    if (result.status === 'failure' && result.code === 'EMPTY_INPUT') {
      // A blank submission keeps the last result on screen.
      sessions.set(sid, target.key, { statement, result: previous?.result, warning: result.errorMessage });
    } else {
      sessions.set(sid, target.key, { statement, result });
    }
    return c.redirect(`/#${target.key}-query`, 303);
  });

  app.get('/api/targets', (c) => c.json(targets.map(summarize)));

  app.get('/api/targets/:key/status', async (c) => {
    const target = findTarget(c.req.param('key'));
    if (!target) return c.json({ error: `Unknown target: ${c.req.param('key')}` }, 404);
    return c.json(await statusService.probe(target));
  });

  app.get('/api/targets/:key/logs', async (c) => {
    const target = findTarget(c.req.param('key'));
    if (!target) return c.json({ error: `Unknown target: ${c.req.param('key')}` }, 404);
    const logs = await logService.fetchLogs(target.containerName);
    return c.json({ containerName: target.containerName, logs });
  });

  app.post('/api/targets/:key/query', async (c) => {
    const target = findTarget(c.req.param('key'));
    if (!target) return c.json({ error: `Unknown target: ${c.req.param('key')}` }, 404);

    let payload: unknown;
    try {
      payload = await c.req.json();
    } catch (error) {
      return c.json({ error: `Invalid JSON body: ${errorMessage(error)}` }, 400);
    }

    const parsed = queryBodySchema.safeParse(payload);
    if (!parsed.success) {
      return c.json({ error: 'Body must be an object with a string "statement"' }, 400);
    }
    return c.json(await queryService.execute(target, parsed.data.statement));
  });

  return app;
}

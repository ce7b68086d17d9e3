import { describe, it, expect, beforeEach } from 'vitest';
import { createApp } from '../src/web/app.js';
import { StatusService } from '../src/services/status-service.js';
import { QueryService } from '../src/services/query-service.js';
import { LogService } from '../src/services/log-service.js';
import { SessionStore } from '../src/web/session-store.js';
import { SessionOpener } from '../src/db/oracle-session.js';
import { StatusRecord, TargetConfig } from '../src/types.js';
import { FakeOracle, FakeRuntime, healthyInstance, makeTarget } from './fakes.js';

const db1 = makeTarget();
const db2 = makeTarget({
    key: 'db2',
    name: 'Database 2',
    host: 'oracle-db2',
    sidOrService: 'ORCLCDB2',
    pdbName: 'ORCLPDB2',
    containerName: 'oracle-db2'
});

const REFUSED = 'ORA-12541: Cannot connect. No listener at host oracle-db2 port 1521.';

describe('dashboard app', () => {
    let online: FakeOracle;
    let offline: FakeOracle;
    let open: SessionOpener;
    let runtime: FakeRuntime;

    beforeEach(() => {
        const healthy = healthyInstance(42);
        online = new FakeOracle((sql) => {
            if (sql === 'SELECT 1 AS X FROM DUAL') return { columns: ['X'], rows: [[1]] };
            return healthy(sql);
        });
        offline = new FakeOracle(healthy, new Error(REFUSED));
        open = (descriptor) => (descriptor.dsn.startsWith('oracle-db1') ? online.open(descriptor) : offline.open(descriptor));
        runtime = new FakeRuntime({ 'oracle-db1': 'DATABASE IS READY TO USE!' });
    });

    function build(statusService: StatusService = new StatusService(open), sessions = new SessionStore()) {
        return createApp({
            targets: [db1, db2],
            statusService,
            queryService: new QueryService(open),
            logService: new LogService(runtime),
            sessions
        });
    }

    async function startSession(app: ReturnType<typeof createApp>) {
        const res = await app.request('/');
        const cookie = res.headers.get('set-cookie') ?? '';
        return { Cookie: cookie.split(';')[0] };
    }

    it('should render a reachable panel next to an unreachable one', async () => {
        const res = await build().request('/');
        const page = await res.text();

        expect(res.status).toBe(200);
        expect(page).toContain('Status: Online 🟢');
        expect(page).toContain('<span class="value">42</span>');
        expect(page).toContain('<span class="value">OPEN / ACTIVE</span>');
        expect(page).toContain('Status: Initializing / Offline ⏳');
        expect(page).toContain(`<pre>${REFUSED}</pre>`);
        expect(page).toContain('<pre class="logs">DATABASE IS READY TO USE!</pre>');
        expect(page).toContain('<pre class="logs">Error reading logs for oracle-db2: No such container: oracle-db2</pre>');
        expect(page).toContain('<code>oracle-db2:1521/ORCLPDB2</code>');
        expect(page).toContain('<code>ORCLCDB1</code>');
        expect(online.closed).toBe(1);
    });

    it('should issue a session cookie on first visit', async () => {
        const res = await build().request('/');
        const cookie = res.headers.get('set-cookie') ?? '';
        expect(cookie).toMatch(/^monitor_session=[0-9a-f-]{36};/);
        expect(cookie).toContain('HttpOnly');
    });

    it('should fetch the logs again when Refresh Logs is followed', async () => {
        const app = build();
        const page = await (await app.request('/')).text();
        expect(page).toContain('<a class="button" href="/?logs=db1#db1-logs">Refresh Logs Database 1</a>');

        runtime.logs['oracle-db1'] = 'Pluggable database ORCLPDB1 opened read write';
        const callsBefore = runtime.calls.length;
        const refreshed = await (await app.request('/?logs=db1')).text();

        expect(runtime.calls.length).toBe(callsBefore + 2);
        expect(refreshed).toContain('<pre class="logs">Pluggable database ORCLPDB1 opened read write</pre>');
    });

    it('should replace a session cookie the server never issued', async () => {
        const res = await build().request('/', { headers: { Cookie: 'monitor_session=made-up' } });
        const cookie = res.headers.get('set-cookie') ?? '';

        expect(cookie).toMatch(/^monitor_session=[0-9a-f-]{36};/);
        expect(cookie).not.toContain('made-up');
    });

    it('should keep the session map bounded under many new cookies', async () => {
        const sessions = new SessionStore({ maxSessions: 10 });
        const app = build(new StatusService(open), sessions);

        for (let i = 0; i < 500; i++) {
            await app.request('/targets/db1/query', {
                method: 'POST',
                headers: { Cookie: `monitor_session=x${i}` },
                body: new URLSearchParams({ statement: ' ' })
            });
        }
        expect(sessions.size).toBe(10);
    });

    it('should isolate a panel that fails to render', async () => {
        class ExplodingStatus extends StatusService {
            async probe(target: TargetConfig): Promise<StatusRecord> {
                if (target.key === 'db1') throw new Error('renderer exploded');
                return super.probe(target);
            }
        }
        const page = await (await build(new ExplodingStatus(open)).request('/')).text();

        expect(page).toContain('Error loading Database 1 panel: renderer exploded');
        expect(page).toContain('Status: Initializing / Offline ⏳');
    });

    it('should keep the last query result per target for the session', async () => {
        const app = build();
        const headers = await startSession(app);

        const post = await app.request('/targets/db1/query', {
            method: 'POST',
            headers,
            body: new URLSearchParams({ statement: 'SELECT 1 AS X FROM DUAL' })
        });
        expect(post.status).toBe(303);
        expect(post.headers.get('location')).toBe('/#db1-query');

        const page = await (await app.request('/', { headers })).text();
        expect(page).toContain('<strong>Results (1 rows):</strong>');
        expect(page).toContain('<th>X</th>');
        expect(page).toContain('<td>1</td>');
        expect(page).toContain('>SELECT 1 AS X FROM DUAL</textarea>');

        const otherSession = await (await app.request('/', { headers: { Cookie: 'monitor_session=someone-else' } })).text();
        expect(otherSession).not.toContain('Results (');
    });

    it('should warn on a blank statement and keep the previous result', async () => {
        const app = build();
        const headers = await startSession(app);

        await app.request('/targets/db1/query', {
            method: 'POST',
            headers,
            body: new URLSearchParams({ statement: 'SELECT 1 AS X FROM DUAL' })
        });
        const opensBefore = online.opened.length;
        await app.request('/targets/db1/query', { method: 'POST', headers, body: new URLSearchParams({ statement: '   ' }) });
        expect(online.opened.length).toBe(opensBefore);

        const first = await (await app.request('/', { headers })).text();
        expect(first).toContain('<div class="alert warning">Please enter a SQL query.</div>');
        expect(first).toContain('<strong>Results (1 rows):</strong>');

        const second = await (await app.request('/', { headers })).text();
        expect(second).not.toContain('Please enter a SQL query.');
    });

    it('should show a failed query inline', async () => {
        const app = build();
        const headers = await startSession(app);

        await app.request('/targets/db2/query', { method: 'POST', headers, body: new URLSearchParams({ statement: 'SELECT 1 FROM DUAL' }) });
        const page = await (await app.request('/', { headers })).text();

        expect(page).toContain(`<div class="alert error">Error: ${REFUSED}</div>`);
    });

    it('should list targets without credentials', async () => {
        const res = await build().request('/api/targets');
        expect(await res.json()).toEqual([
            { key: 'db1', name: 'Database 1', connectionString: 'oracle-db1:1521/ORCLPDB1', sid: 'ORCLCDB1', containerName: 'oracle-db1' },
            { key: 'db2', name: 'Database 2', connectionString: 'oracle-db2:1521/ORCLPDB2', sid: 'ORCLCDB2', containerName: 'oracle-db2' }
        ]);
    });

    it('should serve status, logs and queries as JSON', async () => {
        const app = build();

        expect(await (await app.request('/api/targets/db2/status')).json()).toEqual({
            targetName: 'Database 2',
            reachable: false,
            errorMessage: REFUSED
        });
        expect(await (await app.request('/api/targets/db1/logs')).json()).toEqual({
            containerName: 'oracle-db1',
            logs: 'DATABASE IS READY TO USE!'
        });

        const query = await app.request('/api/targets/db1/query', {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify({ statement: 'SELECT 1 AS X FROM DUAL' })
        });
        expect(query.status).toBe(200);
        expect(await query.json()).toEqual({ status: 'success', columns: ['X'], rows: [{ X: 1 }] });
    });

    it('should reject unknown targets and malformed bodies', async () => {
        const app = build();

        const missing = await app.request('/api/targets/db3/status');
        expect(missing.status).toBe(404);
        expect(await missing.json()).toEqual({ error: 'Unknown target: db3' });

        const bad = await app.request('/api/targets/db1/query', {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify({ sql: 'SELECT 1 FROM DUAL' })
        });
        expect(bad.status).toBe(400);
        expect(online.opened).toHaveLength(0);
    });
});

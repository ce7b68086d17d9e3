import { html } from 'hono/html';
import { QueryResult, Row, StatusRecord, TargetConfig } from '../types.js';
import { connectionString } from '../db/connection-resolver.js';
import { describeMode } from '../services/status-service.js';
import { ConsoleState } from './session-store.js';

export interface PanelView {
  target: TargetConfig;
  status: StatusRecord;
  logs: string;
  console?: ConsoleState;
  warning?: string;
}

const QUERY_PLACEHOLDER = 'SELECT * FROM v$session WHERE ROWNUM <= 5';

export function renderPanel(view: PanelView) {
  const { target } = view;
  return html`<section class="panel" id="${target.key}">
  <h2>${target.name}</h2>
  ${renderStatus(target, view.status)}
  ${renderLogs(target, view.logs)}
  ${renderConsole(target, view.console, view.warning)}
  ${renderInfo(target)}
</section>`;
}

export function renderPanelError(target: TargetConfig, message: string) {
  return html`<section class="panel" id="${target.key}">
  <div class="alert error">Error loading ${target.name} panel: ${message}</div>
</section>`;
}

function renderStatus(target: TargetConfig, status: StatusRecord) {
  if (status.reachable) {
    return html`<div class="tab" id="${target.key}-status">
  <h3>🚦 Status</h3>
  <div class="alert success">Status: Online 🟢</div>
  <div class="metrics">
    <div class="metric"><span class="label">Sessions</span><span class="value">${status.sessionCount}</span></div>
    <div class="metric"><span class="label">Version</span><span class="value">${status.version}</span></div>
    <div class="metric"><span class="label">Mode</span><span class="value">${describeMode(status)}</span></div>
  </div>
</div>`;
  }

  return html`<div class="tab" id="${target.key}-status">
  <h3>🚦 Status</h3>
  <div class="alert warning">Status: Initializing / Offline ⏳</div>
  <p class="caption">Database is building or starting up.</p>
  <details>
    <summary>Show Connection Error</summary>
    <pre>${status.errorMessage ?? 'Unknown'}</pre>
  </details>
</div>`;
}

function renderLogs(target: TargetConfig, logs: string) {
  return html`<div class="tab" id="${target.key}-logs">
  <h3>📜 Live Logs</h3>
  <a class="button" href="/?logs=${target.key}#${target.key}-logs">Refresh Logs ${target.name}</a>
  <pre class="logs">${logs}</pre>
</div>`;
}

function renderConsole(target: TargetConfig, state: ConsoleState | undefined, warning: string | undefined) {
  return html`<div class="tab" id="${target.key}-query">
  <h3>🔍 Query</h3>
  <p class="caption">Run SQL on <strong>${target.name}</strong> (as SYSDBA)</p>
  <form method="post" action="/targets/${target.key}/query">
    <textarea name="statement" rows="5" placeholder="${QUERY_PLACEHOLDER}">${state?.statement ?? ''}</textarea>
    <button type="submit">Run Query</button>
  </form>
  ${warning ? html`<div class="alert warning">${warning}</div>` : ''}
  ${state?.result ? renderResult(state.result) : ''}
</div>`;
}

export function renderResult(result: QueryResult) {
  switch (result.status) {
    case 'success':
      return html`<p><strong>Results (${result.rows.length} rows):</strong></p>
<table>
  <thead><tr>${result.columns.map((column) => html`<th>${column}</th>`)}</tr></thead>
  <tbody>${result.rows.map((row) => renderRow(result.columns, row))}</tbody>
</table>`;
    case 'acknowledged':
      return html`<div class="alert success">${result.message}</div>`;
    case 'failure':
      return html`<div class="alert error">Error: ${result.errorMessage}</div>`;
  }
}

function renderRow(columns: string[], row: Row) {
  return html`<tr>${columns.map((column) => html`<td>${formatCell(row[column])}</td>`)}</tr>`;
}

export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return 'NULL';
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return value.toString('hex');
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function renderInfo(target: TargetConfig) {
  return html`<div class="tab" id="${target.key}-info">
  <h3>ℹ️ Info</h3>
  <p><strong>Connection String:</strong> <code>${connectionString(target)}</code></p>
  <p><strong>SID:</strong> <code>${target.sidOrService}</code></p>
</div>`;
}

import { html, raw } from 'hono/html';

type Fragment = ReturnType<typeof html>;

const STYLES = `
  body { font-family: system-ui, sans-serif; margin: 0 2rem 2rem; color: #1f2328; }
  header { display: flex; align-items: center; justify-content: space-between; }
  .columns { display: grid; grid-template-columns: 1fr 1fr; gap: 2rem; }
  .panel { min-width: 0; }
  .tab { border-top: 1px solid #d0d7de; padding: 0.5rem 0 1rem; }
  .alert { padding: 0.6rem 0.8rem; border-radius: 6px; margin: 0.5rem 0; }
  .alert.success { background: #dafbe1; }
  .alert.warning { background: #fff3cd; color: #7a4a00; }
  .alert.error { background: #ffebe9; color: #82071e; }
  .metrics { display: flex; gap: 1.5rem; }
  .metric .label { display: block; font-size: 0.8rem; color: #57606a; }
  .metric .value { font-size: 1.4rem; }
  .caption { color: #57606a; font-size: 0.85rem; }
  pre { background: #f6f8fa; padding: 0.75rem; overflow: auto; max-height: 24rem; }
  textarea { width: 100%; font-family: monospace; }
  table { border-collapse: collapse; font-size: 0.85rem; }
  th, td { border: 1px solid #d0d7de; padding: 0.25rem 0.5rem; text-align: left; }
  .button { display: inline-block; padding: 0.3rem 0.7rem; border: 1px solid #d0d7de; border-radius: 6px; text-decoration: none; }
`;

export const DASHBOARD_TITLE = '📊 Oracle Database Setup Monitor';

export function renderDashboard(panels: Fragment[]) {
  return html`<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>Oracle DB Monitor</title>
  <style>${raw(STYLES)}</style>
</head>
<body>
  <header>
    <h1>${DASHBOARD_TITLE}</h1>
    <a class="button" href="/">Refresh</a>
  </header>
  <div class="columns">${panels}</div>
</body>
</html>`;
}

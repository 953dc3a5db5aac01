import type { RecordEntity, RecordPage } from '../types';

const ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => ESCAPES[ch] ?? ch);
}

/** `YYYY-MM-DD HH:MM:SS` in server local time. */
export function formatTimestamp(ms: number): string {
  const d = new Date(ms);
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

function field(name: string, value = '', required = false): string {
  return `<input name="${name}" placeholder="${name}" value="${escapeHtml(value)}"${required ? ' required' : ''}>`;
}

function row(r: RecordEntity): string {
  return `
      <tr>
        <td>${r.id}</td>
        <td>${escapeHtml(r.externalKey)}</td>
        <td>${escapeHtml(r.name)}</td>
        <td>${escapeHtml(r.rights ?? '')}</td>
        <td>${escapeHtml(r.status ?? '')}</td>
        <td>${escapeHtml(r.remarks ?? '')}</td>
        <td>${formatTimestamp(r.updatedAt)}</td>
        <td>
          <form method="post" action="/update/${r.id}">
            ${field('externalKey', r.externalKey)}
            ${field('name', r.name)}
            ${field('rights', r.rights)}
            ${field('status', r.status)}
            ${field('remarks', r.remarks)}
            <button type="submit">Update</button>
          </form>
          <form method="post" action="/delete/${r.id}">
            <button type="submit">Delete</button>
          </form>
        </td>
      </tr>`;
}

/**
 * Server-rendered listing for the form/redirect deployment.
 */
export function renderListPage(page: RecordPage, search?: string): string {
  const rows = page.records.map(row).join('');
  return `<!doctype html>
<html>
  <head>
    <meta charset="utf-8">
    <title>Records</title>
  </head>
  <body>
    <h1>Records</h1>
    <form method="get" action="/">
      <input name="search" placeholder="Search by key or name" value="${escapeHtml(search ?? '')}">
      <button type="submit">Search</button>
    </form>
    <form method="post" action="/add">
      ${field('externalKey', '', true)}
      ${field('name', '', true)}
      ${field('rights')}
      ${field('status')}
      ${field('remarks')}
      <button type="submit">Add</button>
    </form>
    <p>Showing ${page.records.length} of ${page.total}</p>
    <table>
      <thead>
        <tr><th>ID</th><th>External Key</th><th>Name</th><th>Rights</th><th>Status</th><th>Remarks</th><th>Timestamp</th><th></th></tr>
      </thead>
      <tbody>${rows}
      </tbody>
    </table>
    <a href="/export/csv">Export CSV</a>
  </body>
</html>
`;
}

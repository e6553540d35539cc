import { GeneratedReport } from "../report/service.js";
import { REPORT_MODES } from "../report/dates.js";
import { escapeHtml } from "../report/templates.js";
import { LogEntry } from "../store/types.js";

export interface PageData {
  entries: LogEntry[];
  projects: string[];
  today: string;
  report?: GeneratedReport;
}

const STYLE = `
  body { font-family: system-ui, sans-serif; max-width: 960px; margin: 2rem auto; padding: 0 1rem; color: #222; }
  form.entry { display: grid; grid-template-columns: 1fr 2fr 10rem auto; gap: .5rem; margin-bottom: 1.5rem; }
  input, button { padding: .4rem .6rem; font: inherit; }
  nav a { margin-right: 1rem; }
  table { width: 100%; border-collapse: collapse; }
  td, th { text-align: left; padding: .3rem .5rem; border-bottom: 1px solid #ddd; }
  .report { background: #f7f7f7; padding: 1rem; border-radius: 6px; margin: 1rem 0; }
  .error { color: #b00020; }
`;

const SCRIPT = `
  async function post(url, body) {
    const res = await fetch(url, { method: "POST", body: body ? new URLSearchParams(body) : undefined });
    const data = await res.json();
    if (!data.success) { document.getElementById("error").textContent = data.error; return false; }
    return true;
  }
  document.getElementById("entry-form").addEventListener("submit", async (event) => {
    event.preventDefault();
    if (await post("/add_log", new FormData(event.target))) location.reload();
  });
  for (const button of document.querySelectorAll("button[data-delete]")) {
    button.addEventListener("click", async () => {
      if (confirm("Delete this entry?") && await post("/delete_log/" + button.dataset.delete)) location.reload();
    });
  }
  const copy = document.getElementById("copy-report");
  if (copy) copy.addEventListener("click", () => navigator.clipboard.writeText(document.getElementById("report-text").textContent));
`;

function renderEntryRow(entry: LogEntry): string {
  return `<tr><td>${entry.id}</td><td>${escapeHtml(entry.date)}</td><td>${escapeHtml(entry.project)}</td>` +
    `<td>${escapeHtml(entry.description)}</td><td><button data-delete="${entry.id}">Delete</button></td></tr>`;
}

function renderReportSection(report: GeneratedReport): string {
  const note = report.enriched ? " <small>(AI enriched)</small>" : "";
  return `<section class="report">
    <h3>${escapeHtml(report.mode)} report${note}</h3>
    ${report.html}
    <button id="copy-report">Copy as text</button>
    <pre id="report-text" hidden>${escapeHtml(report.text)}</pre>
  </section>`;
}

export function renderPage(data: PageData): string {
  const projectOptions = data.projects.map((p) => `<option value="${escapeHtml(p)}">`).join("");
  const reportLinks = REPORT_MODES.map((mode) => `<a href="/report/${mode}">${mode}</a>`).join("");
  const rows = data.entries.length > 0
    ? data.entries.map(renderEntryRow).join("")
    : `<tr><td colspan="5">No log entries yet.</td></tr>`;

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>Work Log</title>
  <style>${STYLE}</style>
</head>
<body>
  <h1>Work Log</h1>
  <form id="entry-form" class="entry">
    <input name="project" list="projects" placeholder="Project (Misc)">
    <datalist id="projects">${projectOptions}</datalist>
    <input name="description" placeholder="What did you work on?" required>
    <input name="date" type="date" value="${escapeHtml(data.today)}">
    <button type="submit">Add</button>
  </form>
  <p id="error" class="error"></p>
  <nav>Reports: ${reportLinks}</nav>
  ${data.report ? renderReportSection(data.report) : ""}
  <h2>Recent entries</h2>
  <table>
    <thead><tr><th>ID</th><th>Date</th><th>Project</th><th>Description</th><th></th></tr></thead>
    <tbody>${rows}</tbody>
  </table>
  <script>${SCRIPT}</script>
</body>
</html>`;
}

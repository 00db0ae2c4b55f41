/**
 * HTML Reporter
 *
 * Self-contained single-page report: grade card, score bar, severity
 * summary, and a findings table. Every interpolated value is escaped.
 */

import { Severity, type Finding, type Grade, type ScoredReport } from "../types/index.js";
import { TOOL_NAME, TOOL_VERSION } from "../config.js";
import { getSeverityEmoji } from "../utils/severity.js";
import type { Reporter } from "./types.js";

const HTML_ESCAPES: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

function severityClass(severity: Severity): string {
  switch (severity) {
    case Severity.CRITICAL:
      return "critical";
    case Severity.HIGH:
      return "high";
    case Severity.MEDIUM:
      return "medium";
    case Severity.LOW:
      return "low";
    default:
      return "info";
  }
}

function gradeClass(grade: Grade): string {
  switch (grade) {
    case "A":
      return "grade-a";
    case "B":
      return "grade-b";
    case "C":
      return "grade-c";
    default:
      return "grade-f";
  }
}

const STYLES = `
  :root {
    --bg: #0d1117; --surface: #161b22; --border: #30363d;
    --text: #e6edf3; --muted: #8b949e;
    --critical: #f85149; --high: #ff7b72; --medium: #e3b341; --low: #3fb950; --info: #58a6ff;
  }
  * { box-sizing: border-box; margin: 0; padding: 0; }
  body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', sans-serif;
    background: var(--bg); color: var(--text); padding: 2rem; line-height: 1.6; }
  .container { max-width: 1100px; margin: 0 auto; }
  header { border-bottom: 1px solid var(--border); padding-bottom: 1.5rem; margin-bottom: 2rem; }
  h1 { font-size: 1.5rem; font-weight: 700; }
  .meta { color: var(--muted); font-size: 0.875rem; margin-top: 0.25rem; }
  .summary-grid { display: grid; grid-template-columns: repeat(auto-fit, minmax(150px, 1fr)); gap: 1rem; margin-bottom: 2rem; }
  .stat-card { background: var(--surface); border: 1px solid var(--border); border-radius: 8px; padding: 1rem; text-align: center; }
  .stat-card .count { font-size: 2rem; font-weight: 700; }
  .stat-card .label { font-size: 0.75rem; color: var(--muted); text-transform: uppercase; }
  .critical { color: var(--critical); } .high { color: var(--high); }
  .medium { color: var(--medium); } .low { color: var(--low); } .info { color: var(--info); }
  .grade-card { background: var(--surface); border: 1px solid var(--border); border-radius: 8px;
    padding: 1.5rem; margin-bottom: 2rem; display: flex; align-items: center; gap: 1.5rem; }
  .grade-letter { font-size: 4rem; font-weight: 900; line-height: 1; }
  .grade-a { color: var(--low); } .grade-b { color: #57ab5a; } .grade-c { color: var(--medium); }
  .grade-f { color: var(--critical); }
  .score-bar { width: 200px; height: 8px; background: var(--border); border-radius: 4px; margin-top: 0.75rem; overflow: hidden; }
  .score-fill { height: 100%; background: var(--critical); }
  .findings-table { width: 100%; border-collapse: collapse; }
  .findings-table th { text-align: left; padding: 0.75rem 1rem; background: var(--surface);
    border-bottom: 1px solid var(--border); font-size: 0.8rem; text-transform: uppercase; color: var(--muted); }
  .findings-table td { padding: 1rem; border-bottom: 1px solid var(--border); vertical-align: top; font-size: 0.9rem; }
  .badge { display: inline-block; padding: 0.2em 0.6em; border-radius: 4px; font-size: 0.75rem;
    font-weight: 600; text-transform: uppercase; border: 1px solid currentColor; }
  .remediation { border-left: 3px solid var(--info); padding: 0.5rem 0.75rem; margin-top: 0.5rem; font-size: 0.85rem; }
  .muted { color: var(--muted); font-size: 0.85rem; }
  code { font-family: 'JetBrains Mono', 'Fira Code', monospace; font-size: 0.85em;
    background: var(--surface); padding: 0.1em 0.4em; border-radius: 3px; }
  .no-findings { text-align: center; padding: 3rem; color: var(--muted); }
  footer { margin-top: 2rem; padding-top: 1rem; border-top: 1px solid var(--border);
    font-size: 0.8rem; color: var(--muted); text-align: center; }
`;

function renderFindingRow(finding: Finding): string {
  const lines = finding.lines.length > 0
    ? `<br><span class="muted">Line${finding.lines.length > 1 ? "s" : ""}: ${finding.lines.join(", ")}</span>`
    : "";
  const file = finding.file ? `<code>${escapeHtml(finding.file)}</code>` : "";
  const remediation = finding.remediation
    ? `<div class="remediation">💡 ${escapeHtml(finding.remediation)}</div>`
    : "";
  const swc = finding.swcId ? `<div class="muted">Ref: ${escapeHtml(finding.swcId)}</div>` : "";

  return `      <tr>
        <td><span class="badge ${severityClass(finding.severity)}">${getSeverityEmoji(finding.severity)} ${escapeHtml(finding.severity)}</span></td>
        <td><code>${escapeHtml(finding.id)}</code></td>
        <td>
          <strong>${escapeHtml(finding.title)}</strong>
          <div class="muted">${escapeHtml(finding.description)}</div>
          ${remediation}
          ${swc}
        </td>
        <td>${file}${lines}</td>
        <td><span class="muted">${escapeHtml(finding.source)}</span></td>
      </tr>`;
}

function renderFindings(findings: readonly Finding[]): string {
  if (findings.length === 0) {
    return `  <div class="no-findings">
    <div>✅ No findings detected. Review manually before mainnet deployment.</div>
  </div>`;
  }

  return `  <table class="findings-table">
    <thead>
      <tr><th>Severity</th><th>ID</th><th>Title</th><th>Location</th><th>Source</th></tr>
    </thead>
    <tbody>
${findings.map(renderFindingRow).join("\n")}
    </tbody>
  </table>`;
}

function statCard(count: number, label: string, className = ""): string {
  const countClass = className ? `count ${className}` : "count";
  return `<div class="stat-card"><div class="${countClass}">${count}</div><div class="label">${label}</div></div>`;
}

export function renderHtmlReport(report: ScoredReport): string {
  const { summary } = report;
  const target = escapeHtml(report.target);

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${TOOL_NAME} Report: ${target}</title>
<style>${STYLES}</style>
</head>
<body>
<div class="container">
  <header>
    <h1>🔐 ${TOOL_NAME}: Smart Contract Security Report</h1>
    <div class="meta">Target: <code>${target}</code> | Generated: ${escapeHtml(report.generatedAt)}</div>
  </header>

  <div class="grade-card">
    <div class="grade-letter ${gradeClass(report.grade)}">${report.grade}</div>
    <div>
      <div>${escapeHtml(report.verdict)}</div>
      <div class="score-bar"><div class="score-fill" style="width: ${report.riskScore}%;"></div></div>
      <div class="muted">Risk score: ${report.riskScore}/100</div>
    </div>
  </div>

  <div class="summary-grid">
    ${statCard(summary.total, "Total")}
    ${statCard(summary.critical, "Critical", "critical")}
    ${statCard(summary.high, "High", "high")}
    ${statCard(summary.medium, "Medium", "medium")}
    ${statCard(summary.low, "Low", "low")}
    ${statCard(summary.informational, "Info", "info")}
    ${statCard(summary.optimization, "Optimization", "info")}
  </div>

${renderFindings(report.findings)}

  <footer>
    Generated by <strong>${TOOL_NAME} v${TOOL_VERSION}</strong><br>
    This report is a tool-assisted analysis. Always conduct a manual audit before mainnet deployment.
  </footer>
</div>
</body>
</html>
`;
}

export class HtmlReporter implements Reporter {
  readonly name = "html" as const;
  readonly extension = "html";

  render(report: ScoredReport): string {
    return renderHtmlReport(report);
  }
}

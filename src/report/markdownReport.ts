import type { ExtractionReport, ReportFinding } from './extractionReport';

function fmtLoc(f: ReportFinding): string {
  if (!f.location) return '';
  const { module, instance, file } = f.location;
  const where = instance ? `${module}.${instance}` : module;
  return file ? `${where} (${file})` : where;
}

function countByKind(findings: ReportFinding[]): Record<string, number> {
  const out: Record<string, number> = {};
  for (const f of findings) out[f.kind] = (out[f.kind] ?? 0) + 1;
  return out;
}

function cell(s: string): string {
  return s.replace(/\|/g, '\\|');
}

export function reportToMarkdown(report: ExtractionReport): string {
  const lines: string[] = [];
  const warnings = report.findings.filter((f) => f.severity !== 'info');
  const byKind = countByKind(report.findings);

  lines.push(`# Extraction report`);
  lines.push('');
  lines.push(`- Tool: **${report.tool.name}** ${report.tool.version}`);
  lines.push(`- Input: \`${report.input}\``);
  lines.push(`- Started: ${report.startedAtIso}`);
  lines.push(`- Finished: ${report.finishedAtIso}`);
  lines.push(`- Top module: **${report.topModule}**`);
  lines.push(`- Modules declared: **${report.modulesDeclared}**`);
  lines.push(`- Instances in tree: **${report.instancesInTree}**`);
  lines.push(`- Findings: **${report.findings.length}** (warnings: **${warnings.length}**)`);
  lines.push('');

  lines.push(`## Findings summary`);
  lines.push('');
  lines.push(`| Kind | Count |`);
  lines.push(`|---|---:|`);
  const fk = Object.keys(byKind).sort((a, b) => a.localeCompare(b));
  for (const k of fk) lines.push(`| ${k} | ${byKind[k]} |`);
  if (fk.length === 0) lines.push(`| (none) | 0 |`);
  lines.push('');

  lines.push(`## All findings`);
  lines.push('');
  lines.push(`| Severity | Kind | Location | Message |`);
  lines.push(`|---|---|---|---|`);
  const all = [...report.findings];
  all.sort((a, b) => {
    const ak = a.kind.localeCompare(b.kind);
    if (ak !== 0) return ak;
    const al = fmtLoc(a).localeCompare(fmtLoc(b));
    if (al !== 0) return al;
    return a.message.localeCompare(b.message);
  });
  for (const f of all) {
    lines.push(`| ${f.severity} | ${f.kind} | ${cell(fmtLoc(f))} | ${cell(f.message)} |`);
  }
  if (all.length === 0) lines.push(`| (none) | (none) |  |  |`);
  lines.push('');
  return lines.join('\n');
}

import { stableStringify } from '../ir/deterministicJson';

export type ReportSeverity = 'info' | 'warning' | 'error';

export type ReportLocation = {
  /** Module type the finding is about. */
  module: string;
  /** Instance name inside `module`, when the finding concerns one instantiation. */
  instance?: string;
  /** Source file declaring `module`, when known. */
  file?: string;
};

export type ReportFindingKind =
  | 'topModuleSelection'
  | 'topModuleFallback'
  | 'duplicateInstance'
  | 'recursiveInstantiation'
  | 'unresolvedModule'
  | 'note';

export type ReportFinding = {
  kind: ReportFindingKind;
  severity: ReportSeverity;
  message: string;
  location?: ReportLocation;
};

export type ExtractionReport = {
  schema: 'extraction-report-v1';
  tool: { name: string; version: string };
  /** Elaborated description the hierarchy was extracted from. */
  input: string;
  startedAtIso: string;
  finishedAtIso: string;
  topModule: string;
  modulesDeclared: number;
  instancesInTree: number;
  findings: ReportFinding[];
};

export function createEmptyReport(args: {
  toolName: string;
  toolVersion: string;
  input: string;
  startedAtIso?: string;
}): ExtractionReport {
  const now = args.startedAtIso ?? new Date().toISOString();
  return {
    schema: 'extraction-report-v1',
    tool: { name: args.toolName, version: args.toolVersion },
    input: args.input,
    startedAtIso: now,
    finishedAtIso: now,
    topModule: '',
    modulesDeclared: 0,
    instancesInTree: 0,
    findings: [],
  };
}

export function addFinding(report: ExtractionReport, finding: ReportFinding): void {
  report.findings.push(finding);
}

export function finalizeReport(report: ExtractionReport, finishedAtIso?: string): ExtractionReport {
  report.finishedAtIso = finishedAtIso ?? new Date().toISOString();
  return report;
}

export function serializeReport(report: ExtractionReport): string {
  // Keep it deterministic for tests and CI diffs.
  return stableStringify(report);
}

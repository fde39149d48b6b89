import { stableStringify } from '../ir/deterministicJson';
import type { NodeSummary } from '../ir/treeModel';
import type { DiffRecord } from './architectureComparator';

export type NodeSummaryJson = {
  Module_name: string;
  Instance_name: string;
  Port: string[];
};

export type DiffRecordJson = {
  file: string;
  expected: NodeSummaryJson | 'missing';
  actual: NodeSummaryJson | 'missing';
};

export type DiffReportJson = {
  Diff_Arch: DiffRecordJson[];
};

const KEY_ORDER = ['Diff_Arch', 'file', 'expected', 'actual', 'Module_name', 'Instance_name', 'Port'] as const;

function summaryToJson(s: NodeSummary | 'missing'): NodeSummaryJson | 'missing' {
  if (s === 'missing') return s;
  return { Module_name: s.moduleName, Instance_name: s.instanceName, Port: [...s.ports] };
}

export function diffRecordToJson(r: DiffRecord): DiffRecordJson {
  return { file: r.file, expected: summaryToJson(r.expected), actual: summaryToJson(r.actual) };
}

export function diffReportToJson(records: readonly DiffRecord[]): DiffReportJson {
  return { Diff_Arch: records.map(diffRecordToJson) };
}

export function serializeDiffReport(records: readonly DiffRecord[]): string {
  return stableStringify(diffReportToJson(records), 2, KEY_ORDER);
}

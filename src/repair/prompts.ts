import { diffRecordToJson } from '../compare/diffReport';
import type { DiffRecord } from '../compare/architectureComparator';
import type { ChatMessage } from './chatClient';

export const SPEC_INTERPRETER_SYSTEM_PROMPT = `You read the design specification of a digital system and describe its intended module hierarchy as JSON.

Output exactly one JSON object and nothing else: no prose, no markdown, no comments.

The object describes the top-level module and nests recursively:

{
  "Module_name": "module type name",
  "Instance_name": "instance name, Top for the root",
  "Port": ["root: bare port names", "submodules: port_name : signal_name"],
  "Instances": [ { "Module_name": "...", "Instance_name": "...", "Port": [], "Instances": [] } ]
}

Rules:
- Every object has all four fields; use [] or "" when the specification says nothing.
- Only list modules, instances, ports and connections the specification states. Do not invent any.
- Submodule ports use the "port_name : signal_name" form when the connection is described.
- Write all names in English.`;

export const REPAIR_SYSTEM_PROMPT = `You are an RTL engineer fixing structural mismatches between a design specification and a Verilog/SystemVerilog source file.

You receive the file path, a JSON description of one mismatch ("expected" is the specification side, "actual" is what the elaborated RTL contains, "missing" marks an absent instance), and the full current file.

Change only what the mismatch requires (module names, instance names, ports, port connections, missing or extra instances) and keep all other logic as it is.
Reply with the complete corrected file and nothing else: no explanation and no markdown fences.`;

export function buildSpecInterpreterMessages(specText: string): ChatMessage[] {
  return [
    { role: 'system', content: SPEC_INTERPRETER_SYSTEM_PROMPT },
    { role: 'user', content: specText },
  ];
}

export function buildRepairMessages(record: DiffRecord, filePath: string, content: string): ChatMessage[] {
  const user = [
    `File: ${filePath}`,
    '',
    'Mismatch:',
    JSON.stringify(diffRecordToJson(record), null, 2),
    '',
    'Current file content:',
    content,
  ].join('\n');
  return [
    { role: 'system', content: REPAIR_SYSTEM_PROMPT },
    { role: 'user', content: user },
  ];
}

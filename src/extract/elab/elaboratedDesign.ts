import { XMLParser, XMLValidator } from 'fast-xml-parser';

import { ExtractionError } from '../../errors';

/**
 * Flat description of an elaborated design as emitted by the elaborator's XML dump:
 * every module once, its declared ports, and its direct submodule instances with their
 * port-to-signal connections.
 */
export type ElabPort = {
  name: string;
  /** input | output | inout */
  direction: string;
  /** Declared variable type, "" when absent. */
  type: string;
};

export type ElabConnection = {
  port: string;
  /** As written by the elaborator (e.g. in/out), "" when absent. */
  direction: string;
  signals: string[];
};

export type ElabInstance = {
  name: string;
  /** Instantiated module type. */
  moduleType: string;
  connections: ElabConnection[];
};

export type ElabModule = {
  name: string;
  isTop: boolean;
  /** Resolved from the module's loc file id, "" when unknown. */
  sourceFile: string;
  ports: ElabPort[];
  instances: ElabInstance[];
};

export type ElaboratedDesign = {
  modules: ElabModule[];
  /** file id → filename */
  files: Record<string, string>;
};

const PORT_DIRECTIONS = new Set(['input', 'output', 'inout']);
const ARRAY_TAGS = new Set(['file', 'module', 'var', 'instance', 'port', 'varref']);

type XmlRecord = Record<string, unknown>;

function isRecord(v: unknown): v is XmlRecord {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function asArray(v: unknown): unknown[] {
  if (v === undefined || v === null) return [];
  return Array.isArray(v) ? v : [v];
}

function records(v: unknown): XmlRecord[] {
  return asArray(v).filter(isRecord);
}

function attr(node: XmlRecord, name: string): string | undefined {
  const v = node[`@_${name}`];
  if (v === undefined || v === null) return undefined;
  return String(v);
}

/**
 * Collect every element named `tag` anywhere below `root`, in document order. Matching elements
 * are not searched further.
 */
function findAll(root: unknown, tag: string): XmlRecord[] {
  const found: XmlRecord[] = [];
  const stack: Array<{ value: unknown; match: boolean }> = [{ value: root, match: false }];
  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    const { value, match } = frame;
    if (Array.isArray(value)) {
      for (let i = value.length - 1; i >= 0; i--) stack.push({ value: value[i], match });
      continue;
    }
    if (!isRecord(value)) continue;
    if (match) {
      found.push(value);
      continue;
    }
    const entries = Object.entries(value);
    for (let i = entries.length - 1; i >= 0; i--) {
      const [key, child] = entries[i];
      if (key.startsWith('@_')) continue;
      stack.push({ value: child, match: key === tag });
    }
  }
  return found;
}

function parseConnections(instance: XmlRecord): ElabConnection[] {
  const out: ElabConnection[] = [];
  for (const port of records(instance.port)) {
    const name = attr(port, 'name');
    if (!name) continue;
    const signals: string[] = [];
    for (const ref of records(port.varref)) {
      const sig = attr(ref, 'name');
      if (sig) signals.push(sig);
    }
    out.push({ port: name, direction: attr(port, 'direction') ?? '', signals });
  }
  return out;
}

function parseModule(node: XmlRecord, files: Record<string, string>): ElabModule {
  const name = attr(node, 'name');
  if (!name) throw new ExtractionError('Elaborated design contains a <module> without a name');

  const loc = attr(node, 'loc');
  const fileId = loc ? loc.split(',')[0] : '';
  const sourceFile = fileId ? files[fileId] ?? '' : '';

  const ports: ElabPort[] = [];
  for (const v of records(node.var)) {
    const dir = attr(v, 'dir');
    const portName = attr(v, 'name');
    if (!dir || !portName || !PORT_DIRECTIONS.has(dir)) continue;
    ports.push({ name: portName, direction: dir, type: attr(v, 'vartype') ?? '' });
  }

  const instances: ElabInstance[] = [];
  for (const inst of records(node.instance)) {
    const instName = attr(inst, 'name');
    const moduleType = attr(inst, 'defName');
    if (!instName || !moduleType) continue;
    instances.push({ name: instName, moduleType, connections: parseConnections(inst) });
  }

  return { name, isTop: attr(node, 'topModule') === '1', sourceFile, ports, instances };
}

/**
 * Parse the elaborator's XML dump into a flat module list.
 *
 * Fails with ExtractionError when the text is not well-formed XML or declares no module.
 */
export function parseElaboratedXml(text: string): ElaboratedDesign {
  const valid = XMLValidator.validate(text);
  if (valid !== true) {
    throw new ExtractionError(
      `Malformed elaborated design XML at line ${valid.err.line}, column ${valid.err.col}: ${valid.err.msg}`,
    );
  }

  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseAttributeValue: false,
    isArray: (tagName, _jPath, _isLeafNode, isAttribute) => !isAttribute && ARRAY_TAGS.has(tagName),
  });
  const doc: unknown = parser.parse(text);

  const files: Record<string, string> = {};
  for (const filesNode of findAll(doc, 'files')) {
    for (const f of records(filesNode.file)) {
      const id = attr(f, 'id');
      const filename = attr(f, 'filename');
      if (id && filename) files[id] = filename;
    }
  }

  const modules = findAll(doc, 'module').map((m) => parseModule(m, files));
  if (modules.length === 0) {
    throw new ExtractionError('Elaborated design declares no modules');
  }
  return { modules, files };
}

import { createEmptyReport } from '../../report/extractionReport';
import { buildHierarchyTree, formatConnection } from '../elab/buildTree';
import { parseElaboratedXml } from '../elab/elaboratedDesign';
import { TOP_ALU_XML, design, inst, mod } from './fixtures';

function emptyReport() {
  return createEmptyReport({ toolName: 'rtl-archcheck', toolVersion: 'test', input: 'test.xml', startedAtIso: 'T0' });
}

describe('buildHierarchyTree', () => {
  test('builds the root with bare ports and children with port : signal connections', () => {
    const tree = buildHierarchyTree(parseElaboratedXml(TOP_ALU_XML), 'top');
    expect(tree).toEqual({
      moduleName: 'top',
      instanceName: 'Top',
      sourceLocation: 'rtl/top.v',
      ports: ['clk', 'rst', 'result'],
      children: [
        {
          moduleName: 'alu',
          instanceName: 'u_alu',
          sourceLocation: 'rtl/alu.v',
          ports: ['clk : clk', 'y : result'],
          children: [],
        },
      ],
    });
  });

  test('expands a module type at every site it is instantiated', () => {
    const tree = buildHierarchyTree(
      design(mod('top', [inst('u0', 'mid'), inst('u1', 'mid')]), mod('mid', [inst('u_leaf', 'leaf')]), mod('leaf')),
      'top',
    );
    expect(tree.children.map((c) => c.children.map((g) => g.instanceName))).toEqual([['u_leaf'], ['u_leaf']]);
  });

  test('truncates self-instantiation and records it', () => {
    const report = emptyReport();
    const tree = buildHierarchyTree(design(mod('top', [inst('u_a', 'a')]), mod('a', [inst('u_self', 'a')])), 'top', report);

    const a = tree.children[0];
    expect(a.instanceName).toBe('u_a');
    expect(a.children).toEqual([
      { moduleName: 'a', instanceName: 'u_self', sourceLocation: 'a.v', ports: [], children: [] },
    ]);
    expect(report.findings).toEqual([
      {
        kind: 'recursiveInstantiation',
        severity: 'warning',
        message: 'a is instantiated inside its own hierarchy; subtree truncated',
        location: { module: 'a', instance: 'u_self', file: 'a.v' },
      },
    ]);
  });

  test('terminates on a two-module cycle', () => {
    const tree = buildHierarchyTree(design(mod('p', [inst('u_q', 'q')]), mod('q', [inst('u_p', 'p')])), 'p');
    expect(tree.children[0].children[0]).toEqual({
      moduleName: 'p',
      instanceName: 'u_p',
      sourceLocation: 'p.v',
      ports: [],
      children: [],
    });
  });

  test('keeps undeclared module types as leaves with no source file', () => {
    const report = emptyReport();
    const tree = buildHierarchyTree(design(mod('top', [inst('u_ip', 'vendor_ip')])), 'top', report);
    expect(tree.children).toEqual([
      { moduleName: 'vendor_ip', instanceName: 'u_ip', sourceLocation: '', ports: [], children: [] },
    ]);
    expect(report.findings.map((f) => f.kind)).toEqual(['unresolvedModule']);
  });

  test('keeps the last of two same-named instances in the first slot', () => {
    const report = emptyReport();
    const tree = buildHierarchyTree(
      design(mod('top', [inst('u_x', 'p'), inst('u_y', 'p'), inst('u_x', 'q')]), mod('p'), mod('q')),
      'top',
      report,
    );
    expect(tree.children.map((c) => `${c.instanceName}:${c.moduleName}`)).toEqual(['u_x:q', 'u_y:p']);
    expect(report.findings.map((f) => f.kind)).toEqual(['duplicateInstance']);
  });
});

describe('formatConnection', () => {
  test('joins fanned-out signals', () => {
    expect(formatConnection({ port: 'bus', direction: 'in', signals: ['lo', 'hi'] })).toBe('bus : lo, hi');
  });

  test('keeps an unconnected port', () => {
    expect(formatConnection({ port: 'nc', direction: 'out', signals: [] })).toBe('nc : ');
  });
});

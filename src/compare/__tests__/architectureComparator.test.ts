import { CompareError } from '../../errors';
import type { TreeNode } from '../../ir/treeModel';
import { compareArchitectures, compareTreeJson, portsEqual } from '../architectureComparator';
import { diffReportToJson, serializeDiffReport } from '../diffReport';

function node(
  moduleName: string,
  instanceName: string,
  ports: string[] = [],
  children: TreeNode[] = [],
  sourceLocation = '',
): TreeNode {
  return { moduleName, instanceName, sourceLocation, ports, children };
}

describe('portsEqual', () => {
  test('ignores whitespace and order', () => {
    expect(portsEqual(['a : x', 'b : y'], ['b:y', 'a:x'])).toBe(true);
  });

  test('compares as a multiset', () => {
    expect(portsEqual(['a', 'a', 'b'], ['a', 'b', 'b'])).toBe(false);
    expect(portsEqual(['a'], ['a', 'a'])).toBe(false);
  });
});

describe('compareArchitectures', () => {
  test('finds nothing for structurally identical trees', () => {
    const expected = node('top', 'Top', ['clk'], [node('ModA', 'U1', ['a : x', 'b : y'])]);
    const actual = node('top', 'Top', ['clk'], [node('ModA', 'U1', ['b:y', 'a:x'], [], 'rtl/a.v')], 'rtl/top.v');
    expect(compareArchitectures(expected, actual)).toEqual([]);
  });

  test('ignores sibling order', () => {
    const expected = node('top', 'Top', [], [node('A', 'u_a'), node('B', 'u_b')]);
    const actual = node('top', 'Top', [], [node('B', 'u_b'), node('A', 'u_a')]);
    expect(compareArchitectures(expected, actual)).toEqual([]);
  });

  test('reports a module name mismatch even when ports match', () => {
    const expected = node('top', 'Top', [], [node('ModA', 'U1', ['p1'])]);
    const actual = node('top', 'Top', [], [node('ModX', 'U1', ['p1'], [], 'rtl/x.v')], 'rtl/top.v');
    expect(compareArchitectures(expected, actual)).toEqual([
      {
        file: 'rtl/x.v',
        expected: { moduleName: 'ModA', instanceName: 'U1', ports: ['p1'] },
        actual: { moduleName: 'ModX', instanceName: 'U1', ports: ['p1'] },
      },
    ]);
  });

  test('reports a port mismatch even when the module name matches, under the parent file', () => {
    const expected = node('top', 'Top', [], [node('ModA', 'U1', ['p1 : s1'])]);
    const actual = node('top', 'Top', [], [node('ModA', 'U1', ['p1 : s2'])], 'rtl/top.v');
    expect(compareArchitectures(expected, actual)).toEqual([
      {
        file: 'rtl/top.v',
        expected: { moduleName: 'ModA', instanceName: 'U1', ports: ['p1 : s1'] },
        actual: { moduleName: 'ModA', instanceName: 'U1', ports: ['p1 : s2'] },
      },
    ]);
  });

  test('files a root mismatch without any source under Top Level', () => {
    const records = compareArchitectures(node('top', 'Top', ['clk']), node('top', 'Top', ['clock']));
    expect(records.map((r) => r.file)).toEqual(['Top Level']);
  });

  test('reports an expected-only instance once without descending into it', () => {
    const expected = node('top', 'Top', [], [node('ModA', 'U1', ['p1']), node('ModB', 'U2', [], [node('Leaf', 'L1')])]);
    const actual = node('top', 'Top', [], [node('ModA', 'U1', ['p1'])], 'rtl/top.v');
    expect(diffReportToJson(compareArchitectures(expected, actual))).toEqual({
      Diff_Arch: [
        { file: 'rtl/top.v', expected: { Module_name: 'ModB', Instance_name: 'U2', Port: [] }, actual: 'missing' },
      ],
    });
  });

  test('reports an actual-only instance once under its own file', () => {
    const expected = node('top', 'Top');
    const actual = node('top', 'Top', [], [node('Extra', 'u_extra', [], [node('Leaf', 'L1')], 'rtl/extra.v')], 'rtl/top.v');
    expect(compareArchitectures(expected, actual)).toEqual([
      { file: 'rtl/extra.v', expected: 'missing', actual: { moduleName: 'Extra', instanceName: 'u_extra', ports: [] } },
    ]);
  });

  test('keeps comparing below a mismatching node', () => {
    const expected = node('top', 'Top', [], [node('ModA', 'U1', ['p'], [node('Leaf', 'L1', ['q'])])]);
    const actual = node('top', 'Top', [], [node('ModZ', 'U1', ['p'], [node('Leaf', 'L1', ['r'])], 'rtl/z.v')]);
    expect(compareArchitectures(expected, actual).map((r) => r.file)).toEqual(['rtl/z.v', 'rtl/z.v']);
  });

  test('orders expected siblings first, then actual-only ones', () => {
    const expected = node('top', 'Top', [], [node('A', 'u_a'), node('B', 'u_b')]);
    const actual = node('top', 'Top', [], [node('C', 'u_c'), node('B', 'u_b', ['x'])]);
    const records = compareArchitectures(expected, actual);
    expect(
      records.map((r) => {
        const side = r.expected === 'missing' ? r.actual : r.expected;
        return side === 'missing' ? '?' : side.instanceName;
      }),
    ).toEqual(['u_a', 'u_b', 'u_c']);
  });

  test('is idempotent', () => {
    const expected = node('top', 'Top', ['a'], [node('ModB', 'U2')]);
    const actual = node('top', 'Top', ['b'], [node('ModC', 'U3')]);
    expect(serializeDiffReport(compareArchitectures(expected, actual))).toBe(
      serializeDiffReport(compareArchitectures(expected, actual)),
    );
  });
});

describe('compareTreeJson', () => {
  test('compares JSON projections', () => {
    const expected = { Module_name: 'top', Instance_name: 'Top', Port: [], Instances: [{ Module_name: 'ModA', Instance_name: 'U1', Port: ['p1'] }] };
    const actual = { Module_name: 'top', Instance_name: 'Top', File_path: '', Port: [], Instances: [{ Module_name: 'ModA', Instance_name: 'U1', File_path: 'a.v', Port: ['p1'], Instances: [] }] };
    expect(compareTreeJson(expected, actual)).toEqual([]);
  });

  test('fails with CompareError on a malformed side', () => {
    expect(() => compareTreeJson({ Module_name: 'top', Instance_name: 'Top' }, { Instance_name: 'Top' })).toThrow(
      CompareError,
    );
    expect(() => compareTreeJson([], { Module_name: 'top', Instance_name: 'Top' })).toThrow(
      /^Expected architecture is not a valid hierarchy tree/,
    );
  });
});

describe('serializeDiffReport', () => {
  test('writes records in the fixed key order', () => {
    const text = serializeDiffReport([
      { file: 'a.v', expected: { moduleName: 'M', instanceName: 'u', ports: [] }, actual: 'missing' },
    ]);
    expect(text).toBe(
      [
        '{',
        '  "Diff_Arch": [',
        '    {',
        '      "file": "a.v",',
        '      "expected": {',
        '        "Module_name": "M",',
        '        "Instance_name": "u",',
        '        "Port": []',
        '      },',
        '      "actual": "missing"',
        '    }',
        '  ]',
        '}',
        '',
      ].join('\n'),
    );
  });
});

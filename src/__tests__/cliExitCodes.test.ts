import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { main, runCompare, runExtract, runRepair, type CliContext } from '../cli';
import { TOP_ALU_XML } from '../extract/__tests__/fixtures';
import type { TreeNode } from '../ir/treeModel';
import type { ValidationOutcome } from '../repair/commandTools';
import type { Logger } from '../util/logger';

function mkTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'rtl-archcheck-cli-'));
}

function writeFile(p: string, content: string): void {
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, content, 'utf8');
}

function captureLogger(): Logger & { errors: string[] } {
  const errors: string[] = [];
  return {
    errors,
    info: () => undefined,
    warn: () => undefined,
    error: (m) => errors.push(m),
    debug: () => undefined,
  };
}

const TOP_ALU_TREE: TreeNode = {
  moduleName: 'top',
  instanceName: 'Top',
  sourceLocation: '',
  ports: ['clk', 'rst', 'result'],
  children: [{ moduleName: 'alu', instanceName: 'u_alu', sourceLocation: '', ports: ['clk : clk', 'y : result'], children: [] }],
};

/** In-process collaborators: the elaborator "produces" a fixed XML, the harness returns a fixed verdict. */
function fakeContext(dir: string, verdict: ValidationOutcome, logger: Logger): CliContext {
  const xmlPath = path.join(dir, 'Vtop.xml');
  writeFile(xmlPath, TOP_ALU_XML);
  return {
    logger,
    env: { OPENAI_API_KEY: 'test-secret' },
    collaborators: () => ({
      interpreter: { interpret: async () => TOP_ALU_TREE },
      elaborator: { elaborate: async () => xmlPath },
      repairer: { proposeFix: async () => undefined },
      harness: { validate: async () => verdict },
    }),
  };
}

const tree = (ports: string[]) => JSON.stringify({ Module_name: 'top', Instance_name: 'Top', Port: ports });

describe('CLI exit codes', () => {
  test('compare returns 3 with --fail-on-diff and differences, 0 otherwise', async () => {
    const dir = mkTmpDir();
    writeFile(path.join(dir, 'e.json'), tree(['a']));
    writeFile(path.join(dir, 'a.json'), tree(['b']));
    const paths = { expected: path.join(dir, 'e.json'), actual: path.join(dir, 'a.json'), output: path.join(dir, 'd.json') };
    const logger = captureLogger();

    expect(await runCompare({ ...paths, failOnDiff: true }, { logger })).toBe(3);
    expect(await runCompare({ ...paths, failOnDiff: false }, { logger })).toBe(0);
    expect(fs.existsSync(paths.output)).toBe(true);
  });

  test('compare returns 2 on malformed input', async () => {
    const dir = mkTmpDir();
    writeFile(path.join(dir, 'e.json'), '{"Instance_name": "Top"}');
    writeFile(path.join(dir, 'a.json'), tree([]));
    const logger = captureLogger();

    const code = await runCompare(
      { expected: path.join(dir, 'e.json'), actual: path.join(dir, 'a.json'), output: path.join(dir, 'd.json'), failOnDiff: false },
      { logger },
    );
    expect(code).toBe(2);
    expect(logger.errors[0]).toMatch(/^\[compare\] Expected architecture is not a valid hierarchy tree/);
  });

  test('extract returns 0 on success and 2 on a missing input', async () => {
    const dir = mkTmpDir();
    writeFile(path.join(dir, 'Vtop.xml'), TOP_ALU_XML);
    const logger = captureLogger();

    expect(await runExtract({ xml: path.join(dir, 'Vtop.xml'), outDir: dir, dot: false, verbose: false }, { logger })).toBe(0);
    expect(fs.existsSync(path.join(dir, 'Vtop_hierarchy.json'))).toBe(true);
    expect(await runExtract({ xml: path.join(dir, 'none.xml'), outDir: dir, dot: false, verbose: false }, { logger })).toBe(2);
  });

  test('run returns 2 before any work when the API key is missing', async () => {
    const logger = captureLogger();
    expect(await runRepair({ workDir: mkTmpDir() }, { logger, env: {} })).toBe(2);
    expect(logger.errors).toEqual([
      'Invalid configuration: inference API key is missing (set OPENAI_API_KEY or pass --api-key)',
    ]);
  });

  test('run returns 0 on success and 1 when the clean hierarchy fails simulation', async () => {
    const dir = mkTmpDir();
    writeFile(path.join(dir, 'spec.md'), 'top with one alu\n');
    const logger = captureLogger();

    expect(await runRepair({ workDir: dir, specPath: 'spec.md' }, fakeContext(dir, { passed: true }, logger))).toBe(0);
    expect(
      await runRepair({ workDir: dir, specPath: 'spec.md' }, fakeContext(dir, { passed: false, reason: 'sim failed' }, logger)),
    ).toBe(1);
  });
});

describe('main', () => {
  test('the default command runs the loop', async () => {
    const dir = mkTmpDir();
    writeFile(path.join(dir, 'spec.md'), 'top with one alu\n');
    const ctx = fakeContext(dir, { passed: true }, captureLogger());

    expect(await main(['node', 'rtl-archcheck', '--work-dir', dir, '--spec', 'spec.md'], ctx)).toBe(0);
    expect(fs.existsSync(path.join(dir, 'Repair_Summary.json'))).toBe(true);
  });

  test('a non-numeric bound is a config error before any work', async () => {
    const dir = mkTmpDir();
    writeFile(path.join(dir, 'spec.md'), 'top with one alu\n');
    const logger = captureLogger();
    const argv = ['node', 'rtl-archcheck', '--work-dir', dir, '--spec', 'spec.md', '--max-iterations', 'abc', '--timeout-ms', 'ten'];

    expect(await main(argv, fakeContext(dir, { passed: true }, logger))).toBe(2);
    expect(logger.errors).toEqual([
      'Invalid configuration: maxIterations must be a positive integer (got NaN); timeoutMs must be a non-negative integer (got NaN)',
    ]);
    expect(fs.existsSync(path.join(dir, 'SPEC.json'))).toBe(false);
    expect(fs.existsSync(path.join(dir, 'Repair_Summary.json'))).toBe(false);
  });

  test('compare takes positional paths', async () => {
    const dir = mkTmpDir();
    writeFile(path.join(dir, 'e.json'), tree(['a']));
    writeFile(path.join(dir, 'a.json'), tree(['a']));
    const out = path.join(dir, 'd.json');

    const code = await main(['node', 'rtl-archcheck', 'compare', path.join(dir, 'e.json'), path.join(dir, 'a.json'), out, '--fail-on-diff'], {
      logger: captureLogger(),
    });
    expect(code).toBe(0);
    expect(fs.readFileSync(out, 'utf8')).toBe('{\n  "Diff_Arch": []\n}\n');
  });

  test('interpret writes the expected hierarchy without file paths', async () => {
    const dir = mkTmpDir();
    writeFile(path.join(dir, 'spec.md'), 'top with one alu\n');
    const out = path.join(dir, 'SPEC.json');

    const code = await main(['node', 'rtl-archcheck', 'interpret', path.join(dir, 'spec.md'), '--out', out], fakeContext(dir, { passed: true }, captureLogger()));
    expect(code).toBe(0);
    const written: unknown = JSON.parse(fs.readFileSync(out, 'utf8'));
    expect(written).toEqual({
      Module_name: 'top',
      Instance_name: 'Top',
      Port: ['clk', 'rst', 'result'],
      Instances: [{ Module_name: 'alu', Instance_name: 'u_alu', Port: ['clk : clk', 'y : result'], Instances: [] }],
    });
  });

  test('--version exits 0', async () => {
    const write = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    try {
      expect(await main(['node', 'rtl-archcheck', '--version'])).toBe(0);
    } finally {
      write.mockRestore();
    }
  });

  test('an unknown option is a usage error', async () => {
    const write = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    try {
      expect(await main(['node', 'rtl-archcheck', 'compare', '--no-such-flag'])).toBe(2);
    } finally {
      write.mockRestore();
    }
  });
});

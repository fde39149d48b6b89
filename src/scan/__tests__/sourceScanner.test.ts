import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { scanSourceFiles } from '../sourceScanner';

async function mkFile(p: string, content = 'module m; endmodule\n'): Promise<void> {
  await fs.mkdir(path.dirname(p), { recursive: true });
  await fs.writeFile(p, content, 'utf8');
}

async function mkTempDir(): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), 'rtl-archcheck-scan-'));
}

describe('scanSourceFiles', () => {
  test('returns stable sorted RTL sources only', async () => {
    const dir = await mkTempDir();
    await mkFile(path.join(dir, 'rtl/top.sv'));
    await mkFile(path.join(dir, 'rtl/alu.v'));
    await mkFile(path.join(dir, 'include/defs.vh'));
    await mkFile(path.join(dir, 'include/pkg.svh'));
    await mkFile(path.join(dir, 'Makefile'), 'all:\n');
    await mkFile(path.join(dir, 'rtl/notes.txt'), 'x');

    const r1 = await scanSourceFiles({ sourceRoot: dir });
    const r2 = await scanSourceFiles({ sourceRoot: dir });

    expect(r1).toEqual(r2);
    expect(r1).toEqual(['include/defs.vh', 'include/pkg.svh', 'rtl/alu.v', 'rtl/top.sv']);
  });

  test('default excludes remove build output, backups and testbenches unless includeTestbenches=true', async () => {
    const dir = await mkTempDir();
    await mkFile(path.join(dir, 'rtl/top.v'));
    await mkFile(path.join(dir, 'rtl/top.v.bak'));
    await mkFile(path.join(dir, 'work/obj_dir/Vtop.v'));
    await mkFile(path.join(dir, 'tb/top_tb.sv'));
    await mkFile(path.join(dir, 'rtl/alu_tb.v'));

    const noTb = await scanSourceFiles({ sourceRoot: dir });
    expect(noTb).toEqual(['rtl/top.v']);

    const withTb = await scanSourceFiles({ sourceRoot: dir, includeTestbenches: true });
    expect(withTb).toEqual(['rtl/alu_tb.v', 'rtl/top.v', 'tb/top_tb.sv']);
  });

  test('additional excludes and the file cap are applied', async () => {
    const dir = await mkTempDir();
    await mkFile(path.join(dir, 'rtl/a.v'));
    await mkFile(path.join(dir, 'rtl/b.v'));
    await mkFile(path.join(dir, 'vendor/ip.v'));

    expect(await scanSourceFiles({ sourceRoot: dir, excludeGlobs: ['**/vendor/**'] })).toEqual(['rtl/a.v', 'rtl/b.v']);
    expect(await scanSourceFiles({ sourceRoot: dir, maxFiles: 1 })).toEqual(['rtl/a.v']);
  });
});

import { describe, it, expect } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { formatUnitsForStdout, modulePath, writeOutputUnits } from '../src/writer';

async function createTempDir(prefix: string): Promise<string> {
  const base = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  return base;
}

describe('modulePath', () => {
  it('maps dotted modules to nested files', () => {
    expect(modulePath('geo', ['geo'])).toBe('geo.pxd');
    expect(modulePath('A.B', ['A', 'A.B'])).toBe(path.join('A', 'B.pxd'));
  });

  it('uses __init__.pxd for modules with submodules', () => {
    expect(modulePath('A', ['A', 'A.B'])).toBe(path.join('A', '__init__.pxd'));
  });
});

describe('writeOutputUnits', () => {
  it('writes one file per module and creates package files', async () => {
    const outputDir = path.join(await createTempDir('pxdlower-write-'), 'out');

    const result = await writeOutputUnits([
      { module: 'gfx.core', text: 'core\n' },
      { module: 'gfx.ui', text: 'ui\n' }
    ], outputDir);

    expect(result.generatedFiles).toEqual([
      path.join(outputDir, 'gfx', 'core.pxd'),
      path.join(outputDir, 'gfx', 'ui.pxd')
    ]);
    expect(result.packageFiles).toEqual([path.join(outputDir, 'gfx', '__init__.pxd')]);
    expect(await fs.readFile(path.join(outputDir, 'gfx', 'core.pxd'), 'utf-8')).toBe('core\n');
    expect(await fs.readFile(path.join(outputDir, 'gfx', '__init__.pxd'), 'utf-8')).toBe('');
  });

  it('leaves existing package files alone', async () => {
    const outputDir = await createTempDir('pxdlower-existing-');
    await fs.mkdir(path.join(outputDir, 'gfx'));
    await fs.writeFile(path.join(outputDir, 'gfx', '__init__.pxd'), 'keep\n');

    const result = await writeOutputUnits([{ module: 'gfx.core', text: 'core\n' }], outputDir);

    expect(result.packageFiles).toEqual([]);
    expect(await fs.readFile(path.join(outputDir, 'gfx', '__init__.pxd'), 'utf-8')).toBe('keep\n');
  });

  it('writes a package module into its __init__.pxd', async () => {
    const outputDir = await createTempDir('pxdlower-package-');

    const result = await writeOutputUnits([
      { module: 'A', text: 'outer\n' },
      { module: 'A.B', text: 'inner\n' }
    ], outputDir);

    expect(result.packageFiles).toEqual([]);
    expect(await fs.readFile(path.join(outputDir, 'A', '__init__.pxd'), 'utf-8')).toBe('outer\n');
    expect(await fs.readFile(path.join(outputDir, 'A', 'B.pxd'), 'utf-8')).toBe('inner\n');
  });
});

describe('formatUnitsForStdout', () => {
  it('prints a single unit as is', () => {
    expect(formatUnitsForStdout([{ module: 'geo', text: 'a\n' }])).toBe('a\n');
  });

  it('marks each unit with its path when there are several', () => {
    expect(formatUnitsForStdout([
      { module: 'geo', text: 'a\n' },
      { module: 'app', text: 'b\n' }
    ])).toBe('#  geo.pxd\na\n\n#  app.pxd\nb\n');
  });
});

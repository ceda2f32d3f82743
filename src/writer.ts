import { promises as fs } from 'fs';
import path from 'path';
import type { OutputUnit } from './codegen/unit-codegen';

export interface WriterResult {
  generatedFiles: string[];
  // empty `__init__.pxd` files created for intermediate packages
  packageFiles: string[];
}

/**
 * Relative path of a module's file: `A.B` -> `A/B.pxd`, or `A/B/__init__.pxd`
 * when another module lives below `A.B`.
 */
export function modulePath(module: string, allModules: readonly string[]): string {
  const segments = module.split('.');
  const isPackage = allModules.some(other => other.startsWith(`${module}.`));
  return isPackage
    ? path.join(...segments, '__init__.pxd')
    : path.join(...segments.slice(0, -1), `${segments[segments.length - 1]}.pxd`);
}

export async function writeOutputUnits(units: readonly OutputUnit[], outputDir: string): Promise<WriterResult> {
  const resolvedOutput = path.resolve(outputDir);
  const modules = units.map(unit => unit.module);
  const written = new Set<string>();
  const generatedFiles: string[] = [];
  const packageFiles: string[] = [];

  await fs.mkdir(resolvedOutput, { recursive: true });

  for (const unit of units) {
    const filePath = path.join(resolvedOutput, modulePath(unit.module, modules));
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, unit.text);
    written.add(filePath);
    generatedFiles.push(filePath);
  }

  for (const module of modules) {
    const segments = module.split('.');
    for (let depth = 1; depth < segments.length; depth++) {
      const initPath = path.join(resolvedOutput, ...segments.slice(0, depth), '__init__.pxd');
      if (written.has(initPath)) {
        continue;
      }
      written.add(initPath);
      try {
        await fs.access(initPath);
      } catch {
        await fs.writeFile(initPath, '');
        packageFiles.push(initPath);
      }
    }
  }

  return { generatedFiles, packageFiles };
}

/**
 * All units in one stream, each preceded by a `#  <path>` marker when there
 * is more than one.
 */
export function formatUnitsForStdout(units: readonly OutputUnit[]): string {
  if (units.length === 1) {
    return units[0].text;
  }
  const modules = units.map(unit => unit.module);
  return units
    .map(unit => `#  ${modulePath(unit.module, modules).split(path.sep).join('/')}\n${unit.text}`)
    .join('\n');
}

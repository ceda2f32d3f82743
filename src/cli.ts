#!/usr/bin/env node

// CLI for pxdlower

import { promises as fs, readFileSync } from 'fs';
import path from 'path';
import { BindingGenerator, GeneratorOptions } from './generator';
import { writeOutputUnits, formatUnitsForStdout } from './writer';
import { formatGeneratorError } from './errors';
import { logger, LogLevel } from './logger';

// Get version from package.json
function getVersion(): string {
  // Walk up to find package.json (handles both src/ and dist/)
  let dir = __dirname;
  for (let i = 0; i < 5; i++) {
    const pkgPath = path.join(dir, 'package.json');
    try {
      const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
      return '0.0.0';
    } catch {
      dir = path.dirname(dir);
    }
  }
  return '0.0.0';
}

export type CliFlag = 'noimport' | 'autodefine' | 'defines';

const FLAGS: readonly CliFlag[] = ['noimport', 'autodefine', 'defines'];

export interface CliOptions {
  inputs?: string[];
  output?: string;
  recursive?: boolean;
  headers?: string;
  includeRoots?: string[];
  warningLevel?: number;
  directory?: boolean;
  flags?: CliFlag[];
  strict?: boolean;
  importAll?: boolean;
  rootModule?: string;
  system?: boolean;
  help?: boolean;
  version?: boolean;
  verbose?: boolean;
}

function requireValue(args: string[], i: number, arg: string): string {
  if (i + 1 >= args.length) {
    throw new Error(`Missing value for ${arg}`);
  }
  return args[i + 1];
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--verbose':
        options.verbose = true;
        logger.setLevel(LogLevel.DEBUG);
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '-v':
      case '--version':
        options.version = true;
        break;
      case '-o':
      case '--output':
        options.output = requireValue(args, i++, arg);
        break;
      case '-r':
      case '--recursive':
        options.recursive = true;
        break;
      case '-H':
      case '--headers':
        options.headers = requireValue(args, i++, arg);
        break;
      case '-I':
      case '--include': {
        const roots = requireValue(args, i++, arg).split(',').map(s => s.trim()).filter(s => s.length > 0);
        options.includeRoots = (options.includeRoots || []).concat(roots);
        break;
      }
      case '-W':
      case '--warning-level': {
        const value = requireValue(args, i++, arg);
        const level = parseInt(value, 10);
        if (isNaN(level) || level < 0 || level > 5) {
          throw new Error(`Invalid warning level: ${value}. Must be a number from 0 to 5`);
        }
        options.warningLevel = level;
        break;
      }
      case '-D':
      case '--directory':
        options.directory = true;
        break;
      case '-f':
      case '--flag': {
        const value = requireValue(args, i++, arg);
        const flag = FLAGS.find(candidate => candidate === value);
        if (!flag) {
          throw new Error(`Unknown flag: ${value}. Must be one of ${FLAGS.join(', ')}`);
        }
        options.flags = (options.flags || []).concat(flag);
        break;
      }
      case '--strict':
        options.strict = true;
        break;
      case '--import-all':
        options.importAll = true;
        break;
      case '--root-module':
        options.rootModule = requireValue(args, i++, arg);
        break;
      case '--system':
        options.system = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new Error(`Unknown option: ${arg}`);
        }
        options.inputs = options.inputs || [];
        options.inputs.push(arg);
        break;
    }
  }
  return options;
}

/**
 * Maps parsed flags onto generator options; unset flags stay unset so the
 * generator's defaults apply.
 */
export function toGeneratorOptions(options: CliOptions): GeneratorOptions {
  const flags = new Set(options.flags ?? []);
  const result: GeneratorOptions = {
    recursive: options.recursive === true,
    strict: options.strict === true,
    importAll: options.importAll === true,
    systemHeaders: options.system === true,
    noImport: flags.has('noimport'),
    autoDefine: flags.has('autodefine'),
    defines: flags.has('defines')
  };
  if (options.includeRoots) result.includeRoots = options.includeRoots;
  if (options.headers !== undefined) result.headerPattern = options.headers;
  if (options.warningLevel !== undefined) result.warningLevel = options.warningLevel;
  if (options.rootModule !== undefined) result.rootModule = options.rootModule;
  return result;
}

export function showHelp(): void {
  console.log(`
pxdlower - C/C++ AST to Cython .pxd declaration generator

Usage: pxdlower [options] <ast.json>...

Options:
  -h, --help                Show this help message
  -v, --version             Show version number
  -o, --output <dir>        Output directory (default: print to stdout)
  -r, --recursive           Emit declarations from included headers too
  -H, --headers <glob>      Headers matching the pattern count as inputs
  -I, --include <dir>       Include root stripped from header names (can be used multiple times)
  -W, --warning-level <n>   Report warnings of severity n and above (default: 2)
  -D, --directory           Treat inputs as directories of AST dumps
  -f, --flag <flag>         Output flag: noimport, autodefine or defines (can be used multiple times)
  --strict                  Fail on front-end diagnostics of severity 3 and above
  --import-all              Import types from headers outside the run instead of stubbing them
  --root-module <name>      Module for the global namespace (default: first header's name)
  --system                  Write header names as <name>
  --verbose                 Print debug output

Examples:
  pxdlower zlib.h.json
  pxdlower -o ./pxd -I include include/zlib.h.json
  pxdlower -D -o ./pxd -f autodefine ./ast
  pxdlower --root-module gfx -W 1 widget.hpp.json
`);
}

export function showVersion(): void {
  console.log(`pxdlower ${getVersion()}`);
}

async function collectJsonFiles(dir: string): Promise<string[]> {
  const files: string[] = [];
  const pending = [dir];
  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined) {
      break;
    }
    const entries = await fs.readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const entryPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        pending.push(entryPath);
      } else if (entry.name.endsWith('.json')) {
        files.push(entryPath);
      }
    }
  }
  return files.sort();
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const options = parseArgs(args);

  if (options.help) {
    showHelp();
    return;
  }

  if (options.version) {
    showVersion();
    return;
  }

  if (!options.inputs || options.inputs.length === 0) {
    console.error('Error: No input files specified');
    console.error('Use --help for usage information');
    process.exit(1);
  }

  // Check if inputs exist
  for (const input of options.inputs) {
    try {
      await fs.access(input);
    } catch {
      console.error(`Error: Input '${input}' does not exist`);
      process.exit(1);
    }
  }

  let inputFiles = options.inputs;
  if (options.directory) {
    inputFiles = [];
    for (const dir of options.inputs) {
      inputFiles.push(...await collectJsonFiles(dir));
    }
    logger.debug(`Found ${inputFiles.length} AST file(s)`);
  }

  const generator = new BindingGenerator(toGeneratorOptions(options));
  const result = await generator.generateFromFiles(inputFiles);

  if (result.errors.length > 0) {
    console.error('Generation errors:');
    for (const error of result.errors) {
      console.error(`  ${formatGeneratorError(error)}`);
    }
    process.exit(1);
  }

  if (!options.output) {
    process.stdout.write(formatUnitsForStdout(result.units));
    return;
  }

  const written = await writeOutputUnits(result.units, options.output);
  for (const file of written.generatedFiles) {
    console.error(`Generated ${file}`);
  }
}

if (require.main === module) {
  main().catch(error => {
    console.error(`Error: ${error instanceof Error ? error.message : error}`);
    process.exit(1);
  });
}

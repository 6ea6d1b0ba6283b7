#!/usr/bin/env node
import 'dotenv/config';
import { basename, dirname, extname, join, resolve } from 'node:path';
import { loadConfig } from './config.js';
import { COLOR, consoleLogger } from './log.js';
import { isCompileError } from './errors.js';
import { defaultPalette, loadPaletteDir } from './palette/load.js';
import { compileWorkflow } from './compiler/compile.js';
import { compileUnified } from './compiler/unified.js';
import { verifyDocument } from './compiler/verify.js';
import { readJsonFile, writeJson } from './io/files.js';
import type { TargetDocument } from './types/target.js';
import type { CompileWarning } from './diagnostics.js';

const USAGE = 'Usage: convoflow <source.json> [output.json] [--palette dir] [--unified] [--skip-validate] [--max-depth n] [--seed s]';
const VALUE_FLAGS = ['--palette', '--max-depth', '--seed', '--output', '-o'];

function arg(name: string, fallback?: string): string | undefined {
  const ix = process.argv.findIndex(a => a === name || a.startsWith(name + '='));
  if (ix === -1) return fallback;
  const val = process.argv[ix];
  if (val.includes('=')) return val.slice(val.indexOf('=') + 1);
  return process.argv[ix + 1] ?? fallback;
}

function flag(name: string): boolean {
  return process.argv.includes(name);
}

function positionals(): string[] {
  const out: string[] = [];
  const argv = process.argv.slice(2);
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (VALUE_FLAGS.includes(a)) { i++; continue; }
    if (a.startsWith('-')) continue;
    out.push(a);
  }
  return out;
}

function defaultOutputPath(input: string): string {
  return join(dirname(input), `${basename(input, extname(input))}_pipeline.json`);
}

function printWarnings(warnings: CompileWarning[]) {
  if (warnings.length === 0) return;
  const byKind = new Map<string, number>();
  for (const w of warnings) byKind.set(w.kind, (byKind.get(w.kind) ?? 0) + 1);
  console.log(COLOR.yellow(`\n${warnings.length} warning(s): ${Array.from(byKind, ([k, n]) => `${k} ×${n}`).join(', ')}`));
  if (byKind.has('deep-branch-fanout')) {
    console.log(COLOR.gray('  Deep branch points fan out without gating: agents on paths the caller did not take may still run.'));
    console.log(COLOR.gray('  Raise MAX_ROUTING_DEPTH (or --max-depth) to gate them at the cost of one classifier call each.'));
  }
}

async function main(): Promise<number> {
  const config = loadConfig();
  const [input, positionalOutput] = positionals();
  if (!input) {
    console.error(USAGE);
    return 2;
  }
  const maxDepthArg = arg('--max-depth');
  const maxRoutingDepth = maxDepthArg === undefined ? config.maxRoutingDepth : Number(maxDepthArg);
  if (!Number.isInteger(maxRoutingDepth) || maxRoutingDepth < 0) {
    console.error(`--max-depth must be a non-negative integer, got '${maxDepthArg}'`);
    return 2;
  }

  const inputPath = resolve(process.cwd(), input);
  const outputPath = resolve(process.cwd(), arg('--output') ?? arg('-o') ?? positionalOutput ?? defaultOutputPath(input));
  const paletteDir = arg('--palette') ?? config.paletteDir;
  const logger = consoleLogger({ quiet: config.quiet, logSteps: config.logSteps });

  const palette = paletteDir ? loadPaletteDir(resolve(process.cwd(), paletteDir)) : defaultPalette();
  logger.info(`palette: ${paletteDir ?? 'built-in'} (${palette.types().join(', ')})`);

  const raw = await readJsonFile(inputPath);
  const options = { palette, maxRoutingDepth, idSeed: arg('--seed') ?? config.idSeed, logger };

  let document: TargetDocument;
  let warnings: CompileWarning[];
  if (flag('--unified')) {
    const result = compileUnified(raw, options);
    document = result.document;
    warnings = result.warnings;
  } else {
    const result = compileWorkflow(raw, options);
    document = result.document;
    warnings = result.warnings;
    const s = result.stats;
    if (!config.quiet) {
      console.log(`\n${COLOR.green('✓ compiled')} ${document.name}`);
      console.log(COLOR.gray(`  ${s.sourceNodes} source nodes (${s.orphanNodes} orphaned), ${s.branchPoints} branch points (${s.routedBranchPoints} routed)`));
      console.log(COLOR.gray(`  ${s.instances} components, ${s.connections} connections, ${s.prunedInstances} pruned`));
    }
  }

  if (!flag('--skip-validate')) {
    const verdict = verifyDocument(document, palette);
    if (!verdict.pass) {
      console.error(COLOR.red(`✗ output failed validation (${verdict.issues.length} issue(s))`));
      for (const issue of verdict.issues) console.error(`  - ${issue}`);
      return 1;
    }
  }

  await writeJson(outputPath, document);
  if (!config.quiet) {
    printWarnings(warnings);
    console.log(`\n${COLOR.green('✓ saved')} ${outputPath}`);
  }
  return 0;
}

main()
  .then(code => { process.exitCode = code; })
  .catch(err => {
    if (isCompileError(err)) {
      console.error(COLOR.red(`✗ ${err.kind} error: ${err.message}`));
    } else {
      console.error('[fatal]', err);
    }
    process.exitCode = 1;
  });

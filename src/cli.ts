#!/usr/bin/env node

import fs from 'node:fs/promises';

import { Command, CommanderError } from 'commander';

import {
  EXIT_ABORTED,
  EXIT_DIFF_FOUND,
  EXIT_OK,
  exitCodeForOutcome,
  integerOption,
  optionalString,
  parseBoolish,
  parseIntish,
  resolveComparePaths,
  stringList,
} from './cli/args';
import { loadRepairConfig, type RepairConfig, type RepairConfigOverrides } from './config/repairConfig';
import { compareArchitectureFiles } from './core/compareArchitectureFiles';
import { createDefaultCollaborators, type RepairCollaborators } from './core/defaultCollaborators';
import { extractHierarchyFromXml } from './core/extractHierarchyFromXml';
import { runRepairLoop } from './core/repairOrchestrator';
import { ArchCheckError, errorMessage } from './errors';
import { writeTreeJsonFile } from './ir/writeTreeJson';
import type { ChatClient } from './repair/chatClient';
import { buildFileInventory, writeFileInventoryFile } from './scan/inventory';
import { createConsoleLogger, type Logger } from './util/logger';
import { withTimeout } from './util/timeout';
import { TOOL_NAME, VERSION } from './version';

type Env = Record<string, string | undefined>;

/** Seams for tests: the environment, the log sink and the external collaborators. */
export type CliContext = {
  logger?: Logger;
  env?: Env;
  collaborators?: (config: RepairConfig) => RepairCollaborators;
  chat?: ChatClient;
};

function loadConfigOrReport(overrides: RepairConfigOverrides, env: Env, log: Logger): RepairConfig | undefined {
  try {
    return loadRepairConfig(overrides, env);
  } catch (e) {
    log.error(errorMessage(e));
    return undefined;
  }
}

function reportFailure(e: unknown, log: Logger): number {
  const stage = e instanceof ArchCheckError ? `[${e.stage}] ` : '';
  log.error(`${stage}${errorMessage(e)}`);
  return EXIT_ABORTED;
}

export async function runRepair(overrides: RepairConfigOverrides, ctx: CliContext = {}): Promise<number> {
  const log = ctx.logger ?? createConsoleLogger();
  const config = loadConfigOrReport(overrides, ctx.env ?? process.env, log);
  if (!config) return EXIT_ABORTED;

  const collaborators = ctx.collaborators ? ctx.collaborators(config) : createDefaultCollaborators(config, ctx.chat);
  const result = await runRepairLoop({ config, ...collaborators, logger: log });
  log.info(`Run summary written to ${config.summaryJsonPath}`);
  return exitCodeForOutcome(result.outcome);
}

export type ExtractCommandOptions = {
  xml: string;
  outDir?: string;
  dot: boolean;
  report?: string;
  verbose: boolean;
};

export async function runExtract(opts: ExtractCommandOptions, ctx: CliContext = {}): Promise<number> {
  const log = ctx.logger ?? createConsoleLogger({ verbose: opts.verbose });
  try {
    const result = await extractHierarchyFromXml(opts.xml, { outDir: opts.outDir, dot: opts.dot, reportPath: opts.report });
    log.info(`Top module: ${result.top.name} (${result.top.strategy})`);
    if (result.top.bestEffort) log.warn(`Top module was chosen heuristically from: ${result.top.candidates.join(', ')}`);
    log.info(`Module hierarchy written to ${result.outputs.hierarchyText}`);
    log.info(`Port connections written to ${result.outputs.portsText}`);
    log.info(`Hierarchy JSON written to ${result.outputs.json}`);
    if (result.outputs.dot) log.info(`DOT graphs written to ${result.outputs.dot} and ${result.outputs.nestedDot ?? ''}`);
    if (result.outputs.report) log.info(`Report written to ${result.outputs.report}`);
    log.debug(`Instances in tree: ${result.report.instancesInTree}; findings: ${result.report.findings.length}`);
    return EXIT_OK;
  } catch (e) {
    return reportFailure(e, log);
  }
}

export type CompareCommandOptions = {
  expected: string;
  actual: string;
  output: string;
  failOnDiff: boolean;
};

export async function runCompare(opts: CompareCommandOptions, ctx: CliContext = {}): Promise<number> {
  const log = ctx.logger ?? createConsoleLogger();
  try {
    const records = await compareArchitectureFiles(opts.expected, opts.actual, opts.output);
    log.info(`Found ${records.length} difference(s). Diff report written to ${opts.output}`);
    return opts.failOnDiff && records.length > 0 ? EXIT_DIFF_FOUND : EXIT_OK;
  } catch (e) {
    return reportFailure(e, log);
  }
}

export async function runInterpret(overrides: RepairConfigOverrides, ctx: CliContext = {}): Promise<number> {
  const log = ctx.logger ?? createConsoleLogger();
  const config = loadConfigOrReport(overrides, ctx.env ?? process.env, log);
  if (!config) return EXIT_ABORTED;

  const { interpreter } = ctx.collaborators ? ctx.collaborators(config) : createDefaultCollaborators(config, ctx.chat);
  try {
    const specText = await fs.readFile(config.specPath, 'utf8');
    const tree = await withTimeout('spec inference', config.timeoutMs, () => interpreter.interpret(specText));
    await writeTreeJsonFile(config.expectedJsonPath, tree, { includeFilePath: false });
    log.info(`Expected architecture written to ${config.expectedJsonPath}`);
    return EXIT_OK;
  } catch (e) {
    return reportFailure(e, log);
  }
}

export type ScanCommandOptions = {
  sourceRoots: string[];
  out: string;
  exclude: string[];
  includeTestbenches: boolean;
  maxFiles?: number;
  verbose: boolean;
};

export async function runScan(opts: ScanCommandOptions, ctx: CliContext = {}): Promise<number> {
  const log = ctx.logger ?? createConsoleLogger({ verbose: opts.verbose });
  const inv = await buildFileInventory(opts.sourceRoots, {
    excludeGlobs: opts.exclude,
    includeTestbenches: opts.includeTestbenches,
    maxFiles: opts.maxFiles,
  });
  await writeFileInventoryFile(opts.out, inv);
  const total = inv.roots.reduce((n, r) => n + r.files.length, 0);
  log.debug(`Scanned ${total} RTL source file(s). Wrote: ${opts.out}`);
  return EXIT_OK;
}

type RawOptions = Record<string, unknown>;

function addRunOptions(cmd: Command): Command {
  return cmd
    .option('--spec <file>', 'Design specification (default ../docs/spec.md)')
    .option('--work-dir <dir>', 'Directory the build commands run in (default .)')
    .option('--elaborate-cmd <cmd>', 'Command producing the elaborated XML (default "make xml")')
    .option('--xml <file>', 'Elaborated XML produced by the elaborate command (default ./work/obj_dir/Vtop.xml)')
    .option('--validate-cmd <cmd>', 'Build + simulation command (default "make all")')
    .option('--log <file>', 'Simulation log path (default ./sim.log)')
    .option('--max-iterations <n>', 'Repair iteration bound (default 5)')
    .option('--timeout-ms <n>', 'Bound on every external call, 0 disables (default 600000)')
    .option('--model <name>', 'Inference model (default gpt-4o)')
    .option('--base-url <url>', 'OpenAI-compatible endpoint')
    .option('--api-key <key>', 'Inference API key (default $OPENAI_API_KEY)')
    .option('--source-root <dir...>', 'RTL roots searched when a mismatch names a missing file')
    .option('--pass-marker <text...>', 'Case-insensitive log substrings meaning "validation passed"')
    .option('-v, --verbose', 'Verbose logging', false);
}

function runOverrides(raw: RawOptions): RepairConfigOverrides {
  return {
    specPath: optionalString(raw.spec),
    workDir: optionalString(raw.workDir),
    elaborateCommand: optionalString(raw.elaborateCmd),
    elaboratedXmlPath: optionalString(raw.xml),
    validateCommand: optionalString(raw.validateCmd),
    logPath: optionalString(raw.log),
    maxIterations: integerOption(raw.maxIterations),
    timeoutMs: integerOption(raw.timeoutMs),
    model: optionalString(raw.model),
    baseUrl: optionalString(raw.baseUrl),
    inferenceApiKey: optionalString(raw.apiKey),
    sourceRoots: stringList(raw.sourceRoot),
    passMarkers: stringList(raw.passMarker),
  };
}

/** Parse `argv` and run the selected command; resolves to the process exit code. */
export async function main(argv: string[], ctx: CliContext = {}): Promise<number> {
  let exitCode = EXIT_OK;
  const loggerFor = (raw: RawOptions): Logger => ctx.logger ?? createConsoleLogger({ verbose: parseBoolish(raw.verbose, false) });

  const program = new Command();
  program
    .name(TOOL_NAME)
    .description('Check RTL module hierarchy against a design specification and repair structural mismatches')
    .version(VERSION)
    .enablePositionalOptions()
    .exitOverride();

  addRunOptions(program).action(async (raw: RawOptions) => {
    exitCode = await runRepair(runOverrides(raw), { ...ctx, logger: loggerFor(raw) });
  });

  addRunOptions(program.command('run').description('Run the bounded check-and-repair loop (default command)')).action(
    async (raw: RawOptions) => {
      exitCode = await runRepair(runOverrides(raw), { ...ctx, logger: loggerFor(raw) });
    },
  );

  program
    .command('extract')
    .description('Extract the module hierarchy from an elaborated-design XML file')
    .argument('<xml>', 'Elaborated design XML')
    .option('--out-dir <dir>', 'Directory for the generated files (default .)')
    .option('--dot [bool]', 'Also write Graphviz DOT graphs (default false)')
    .option('--report <file>', 'Extraction report (.md or .json)')
    .option('-v, --verbose', 'Verbose logging', false)
    .action(async (xml: string, raw: RawOptions) => {
      exitCode = await runExtract(
        {
          xml,
          outDir: optionalString(raw.outDir),
          dot: parseBoolish(raw.dot, false),
          report: optionalString(raw.report),
          verbose: parseBoolish(raw.verbose, false),
        },
        { ...ctx, logger: loggerFor(raw) },
      );
    });

  program
    .command('compare')
    .description('Compare expected and actual hierarchy JSON files and write the diff report')
    .argument('[expected]', 'Expected hierarchy JSON (default SPEC.json)')
    .argument('[actual]', 'Actual hierarchy JSON (default Vtop_hierarchy.json)')
    .argument('[output]', 'Diff report JSON (default Diff_Arch.json)')
    .option('--fail-on-diff [bool]', 'Exit 3 when differences exist (default false)')
    .action(async (expected: string | undefined, actual: string | undefined, output: string | undefined, raw: RawOptions) => {
      exitCode = await runCompare(
        { ...resolveComparePaths([expected, actual, output]), failOnDiff: parseBoolish(raw.failOnDiff, false) },
        { ...ctx, logger: loggerFor(raw) },
      );
    });

  program
    .command('interpret')
    .description('Infer the expected hierarchy JSON from a design specification')
    .argument('[spec]', 'Design specification (default ../docs/spec.md)')
    .option('--out <file>', 'Expected hierarchy JSON (default SPEC.json)')
    .option('--timeout-ms <n>', 'Bound on the inference call (default 600000)')
    .option('--model <name>', 'Inference model (default gpt-4o)')
    .option('--base-url <url>', 'OpenAI-compatible endpoint')
    .option('--api-key <key>', 'Inference API key (default $OPENAI_API_KEY)')
    .action(async (spec: string | undefined, raw: RawOptions) => {
      exitCode = await runInterpret(
        {
          specPath: optionalString(spec),
          expectedJsonPath: optionalString(raw.out),
          timeoutMs: integerOption(raw.timeoutMs),
          model: optionalString(raw.model),
          baseUrl: optionalString(raw.baseUrl),
          inferenceApiKey: optionalString(raw.apiKey),
        },
        { ...ctx, logger: loggerFor(raw) },
      );
    });

  program
    .command('scan')
    .description('Scan RTL source roots and emit a deterministic file inventory JSON')
    .requiredOption('--source <dir...>', 'RTL source root(s)')
    .requiredOption('--out <file>', 'Output JSON file')
    .option('--exclude <glob...>', 'Additional exclude glob(s)', [])
    .option('--include-testbenches [bool]', 'Include testbench files (default false)')
    .option('--max-files <n>', 'Safety cap (default no cap)')
    .option('-v, --verbose', 'Verbose logging', false)
    .action(async (raw: RawOptions) => {
      exitCode = await runScan(
        {
          sourceRoots: stringList(raw.source) ?? ['.'],
          out: String(raw.out),
          exclude: stringList(raw.exclude) ?? [],
          includeTestbenches: parseBoolish(raw.includeTestbenches, false),
          maxFiles: parseIntish(raw.maxFiles),
          verbose: parseBoolish(raw.verbose, false),
        },
        { ...ctx, logger: loggerFor(raw) },
      );
    });

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (e) {
    if (e instanceof CommanderError) {
      // --help and --version end parsing through the same path as usage errors
      return e.exitCode === 0 ? EXIT_OK : EXIT_ABORTED;
    }
    (ctx.logger ?? createConsoleLogger()).error(errorMessage(e));
    return EXIT_ABORTED;
  }
}

// Run CLI only when executed directly (not when imported in tests)
if (require.main === module) {
  main(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      // eslint-disable-next-line no-console
      console.error(errorMessage(e));
      process.exitCode = EXIT_ABORTED;
    },
  );
}

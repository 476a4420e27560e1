/**
 * Command-line interface.
 *
 *   master-dispatch auto <input> [-r ref ...] [--blend]
 *   master-dispatch master <target> <reference>
 *   master-dispatch batch <folder> [-r ref ...]
 *   master-dispatch album <folder> [-r ref ...]
 *   master-dispatch blend <target> -r ref1 -r ref2 [...]
 *   master-dispatch presets
 *   master-dispatch history [--limit n] [--clear]
 *   master-dispatch config [set <key> <value>]
 *
 * Exit codes: 0 success (batch and blend runs with some failures included),
 * 1 failed single/album units, cancelled runs or fatal errors, 2 usage errors.
 */

import * as path from 'path';
import { parseArgs } from 'util';
import { DEFAULT_SETTINGS } from '../shared/types';
import type { AppSettings, ProcessingPlan, Strategy } from '../shared/types';
import { buildPlan, classify } from './services/classifier';
import type { ClassifierInput } from './services/classifier';
import { resolveInput, resolveReferences } from './services/candidateResolver';
import type { ResolverOptions } from './services/candidateResolver';
import { Dispatcher } from './services/dispatcher';
import type { DispatchResult } from './services/dispatcher';
import { DispatchLedger } from './services/dispatchLedger';
import { isPipelineError } from './services/errors';
import { Logger } from './services/logger';
import type { LoggerOptions } from './services/logger';
import { HttpMasteringEngine } from './services/masteringEngine';
import type { MasteringEngine } from './services/masteringEngine';
import { listPresets } from './services/presets';
import { FolderReferenceLibrary } from './services/referenceLibrary';
import { buildRunReport, writeRunReport } from './services/reportWriter';
import type { RunReportInput } from './services/reportWriter';
import { RunHistory } from './services/runHistory';
import {
  SettingsManager,
  applyEnvironmentOverrides,
  serializeSettings,
  validateEndpoint,
  validateSettings,
} from './services/settingsManager';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

/** Collaborators the CLI builds by default; tests pass their own */
export interface CliDependencies {
  io?: CliIO;
  env?: NodeJS.ProcessEnv;
  settingsManager?: SettingsManager;
  logger?: Logger;
  createEngine?: (endpoint: string) => MasteringEngine;
  /** null disables history regardless of settings */
  history?: RunHistory | null;
  /** Overrides for the candidate resolver (probe, extractor, ...) */
  resolverOptions?: Partial<ResolverOptions>;
  /** Aborting cancels the running dispatch */
  signal?: AbortSignal;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const DISPATCH_COMMANDS = ['auto', 'master', 'batch', 'album', 'blend'] as const;
type DispatchCommand = (typeof DISPATCH_COMMANDS)[number];

const FORCED_STRATEGY: Record<Exclude<DispatchCommand, 'auto'>, Strategy> = {
  master: 'single',
  batch: 'batch',
  album: 'album',
  blend: 'blended',
};

const USAGE = `Usage: master-dispatch <command> [options]

Commands:
  auto <input>              Resolve any input and pick the strategy automatically
  master <target> <ref>     Master one track against one reference
  batch <folder>            Master every track, preset per genre
  album <folder>            Master an album against one shared reference and sequence it
  blend <target> -r <ref>   Master one track against 2-5 references (profiles A-D)
  presets                   List mastering presets
  history                   List past runs
  config [set <k> <v>]      Show the settings, or change and save one setting

Options:
  -r, --reference <path>    Reference track (repeatable, at most 5)
      --blend               Require a blended run (auto)
  -p, --preset <name>       Preset override
  -o, --output <dir>        Output folder
  -c, --concurrency <n>     Concurrent mastering calls (1-10)
      --endpoint <url>      Mastering engine URL
      --report <file>       Also write the run report to a file
      --limit <n>           Runs to list (history)
      --clear               Delete the run history (history)
  -h, --help                Show this help`;

/** Bad command line; exits with EXIT_USAGE */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const defaultIO: CliIO = {
  stdout: (line) => process.stdout.write(line + '\n'),
  stderr: (line) => process.stderr.write(line + '\n'),
};

// ─── Argument Parsing ────────────────────────────────────────────────────────

export interface ParsedCommand {
  command: string | null;
  positionals: string[];
  references: string[];
  blend: boolean;
  preset: string | null;
  output: string | null;
  concurrency: number | null;
  endpoint: string | null;
  report: string | null;
  limit: number | null;
  clear: boolean;
  help: boolean;
}

function parseInteger(flag: string, value: string | undefined): number | null {
  if (value === undefined) return null;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new UsageError(`--${flag} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function parseRawArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        reference: { type: 'string', short: 'r', multiple: true },
        blend: { type: 'boolean' },
        preset: { type: 'string', short: 'p' },
        output: { type: 'string', short: 'o' },
        concurrency: { type: 'string', short: 'c' },
        endpoint: { type: 'string' },
        report: { type: 'string' },
        limit: { type: 'string' },
        clear: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error: unknown) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * @throws UsageError for unknown options or malformed values
 */
export function parseCommandLine(argv: readonly string[]): ParsedCommand {
  const { values, positionals } = parseRawArgs(argv);
  const concurrency = parseInteger('concurrency', values.concurrency);
  if (concurrency !== null && concurrency > 10) {
    throw new UsageError(`--concurrency must be between 1 and 10, got ${concurrency}`);
  }
  if (values.endpoint !== undefined && !validateEndpoint(values.endpoint)) {
    throw new UsageError(`--endpoint must be an http(s) URL, got "${values.endpoint}"`);
  }

  return {
    command: positionals[0] ?? null,
    positionals: positionals.slice(1),
    references: values.reference ?? [],
    blend: values.blend ?? false,
    preset: values.preset ?? null,
    output: values.output ?? null,
    concurrency,
    endpoint: values.endpoint ?? null,
    report: values.report ?? null,
    limit: parseInteger('limit', values.limit),
    clear: values.clear ?? false,
    help: values.help ?? false,
  };
}

function isDispatchCommand(command: string): command is DispatchCommand {
  return (DISPATCH_COMMANDS as readonly string[]).includes(command);
}

// ─── Exit Codes ──────────────────────────────────────────────────────────────

/**
 * Exit code for a finished dispatch. Partial batch and blend failures still
 * exit 0; any failed single or album unit, and any cancelled unit, exits 1.
 */
export function exitCodeFor(result: DispatchResult): number {
  if (result.cancelled.length > 0) return EXIT_FAILURE;
  if (result.failures.length === 0) return EXIT_OK;
  return result.strategy === 'batch' || result.strategy === 'blended' ? EXIT_OK : EXIT_FAILURE;
}

// ─── Commands ────────────────────────────────────────────────────────────────

/**
 * Logger for a CLI run: warnings and errors echo to stderr, everything goes
 * to the daily log file in `logDir` (default folder when unset).
 */
export function createCliLogger(io: CliIO, options: Pick<LoggerOptions, 'logDir' | 'writeToFile'> = {}): Logger {
  return new Logger({
    ...options,
    echo: (line, entry) => {
      if (entry.level !== 'INFO') io.stderr(line);
    },
  });
}

async function loadSettings(args: ParsedCommand, deps: CliDependencies, logger: Logger): Promise<AppSettings> {
  const manager = deps.settingsManager ?? new SettingsManager({ logger });
  if (!manager.isInitialized()) {
    await manager.initialize();
  }
  const fromEnv = applyEnvironmentOverrides(manager.get(), deps.env ?? process.env);
  return validateSettings({
    ...fromEnv,
    outputDir: args.output ?? fromEnv.outputDir,
    concurrency: args.concurrency ?? fromEnv.concurrency,
    masteringEndpoint: args.endpoint ?? fromEnv.masteringEndpoint,
  });
}

function openHistory(settings: AppSettings, deps: CliDependencies, logger: Logger): RunHistory | null {
  if (deps.history !== undefined) return deps.history;
  if (!settings.recordHistory) return null;
  try {
    const history = new RunHistory();
    history.initialize();
    return history;
  } catch (error: unknown) {
    logger.warn(`Run history unavailable: ${error instanceof Error ? error.message : String(error)}`, {
      step: 'history',
    });
    return null;
  }
}

async function planFor(
  command: DispatchCommand,
  args: ParsedCommand,
  settings: AppSettings,
  resolverOptions: ResolverOptions,
): Promise<ProcessingPlan> {
  const expected = command === 'master' ? 2 : 1;
  if (args.positionals.length !== expected) {
    throw new UsageError(
      command === 'master'
        ? 'master takes a target and a reference: master <target> <reference>'
        : `${command} takes exactly one input`,
    );
  }
  if (command === 'master' && args.references.length > 0) {
    throw new UsageError('master takes its reference as the second argument, not -r');
  }

  const rawReferences = command === 'master' ? [args.positionals[1]] : args.references;
  const resolved = await resolveInput(args.positionals[0], resolverOptions);
  const references = await resolveReferences(rawReferences, resolverOptions);

  const input: ClassifierInput = {
    kind: resolved.kind,
    candidates: resolved.candidates,
    references,
    root: resolved.root,
    presetOverride: args.preset,
    requestBlend: args.blend || command === 'blend',
  };

  if (command === 'auto') {
    return classify(input, {
      numberedRatio: settings.numberedRatio,
      albumMinTracks: settings.albumMinTracks,
      albumMaxTracks: settings.albumMaxTracks,
    });
  }

  const strategy = FORCED_STRATEGY[command];
  if ((strategy === 'single' || strategy === 'blended') && resolved.candidates.length !== 1) {
    throw new UsageError(`${command} takes one target track, "${args.positionals[0]}" resolved to ${resolved.candidates.length}`);
  }
  return buildPlan(strategy, input);
}

async function runDispatch(
  command: DispatchCommand,
  args: ParsedCommand,
  deps: CliDependencies,
  io: CliIO,
): Promise<number> {
  // Settings choose the log folder, so they are read with a console-only logger
  const settings = await loadSettings(args, deps, deps.logger ?? createCliLogger(io, { writeToFile: false }));
  const logger = deps.logger ?? createCliLogger(io, { logDir: settings.logDir ?? undefined });
  if (!deps.logger) {
    await logger.initialize();
  }

  const ledger = new DispatchLedger();
  const input = args.positionals.join(' ');
  let result: DispatchResult | null = null;
  let exitCode = EXIT_FAILURE;

  try {
    const resolverOptions: ResolverOptions = {
      searchRoots: settings.searchRoots.length > 0 ? settings.searchRoots : undefined,
      workspaceDir: path.join(path.resolve(settings.outputDir), 'work'),
      logger,
      ...deps.resolverOptions,
    };
    const plan = await planFor(command, args, settings, resolverOptions);
    logger.info(`Plan: ${plan.strategy}`, { step: 'classifying' });

    const engine = deps.createEngine
      ? deps.createEngine(settings.masteringEndpoint)
      : new HttpMasteringEngine({ endpoint: settings.masteringEndpoint });
    const dispatcher = new Dispatcher({
      engine,
      outputDir: settings.outputDir,
      concurrency: settings.concurrency,
      logger,
      ledger,
      referenceLibrary: settings.referenceLibraryDir ? new FolderReferenceLibrary(settings.referenceLibraryDir) : undefined,
      blendPolicy: { dominantShare: settings.blendDominantShare },
      onProgress: (update) => {
        if (update.currentUnit) {
          logger.info(`[${update.processedUnits}/${update.totalUnits}] ${update.currentUnit}`, { step: 'progress' });
        }
      },
    });

    const onAbort = (): void => dispatcher.cancel();
    deps.signal?.addEventListener('abort', onAbort, { once: true });
    try {
      result = await dispatcher.dispatch(plan);
    } finally {
      deps.signal?.removeEventListener('abort', onAbort);
    }

    exitCode = exitCodeFor(result);
    await emitReport(io, args, { input, result, ledger });
  } catch (error: unknown) {
    if (error instanceof UsageError) {
      io.stderr(error.message);
      io.stderr(USAGE);
      return EXIT_USAGE;
    }
    if (!isPipelineError(error)) {
      throw error;
    }
    logger.logPipelineError(error);
    io.stderr(error.toUserMessage());
    if (ledger.size > 0) {
      await emitReport(io, args, { input, result: null, ledger, error });
    }
  }

  const history = openHistory(settings, deps, logger);
  if (history) {
    const summary = ledger.summary();
    history.record({
      input,
      strategy: result?.strategy ?? 'failed',
      successCount: summary.successCount,
      failureCount: summary.failureCount,
      cohesion: result?.sequence?.cohesion ?? null,
    });
    if (deps.history === undefined) {
      history.close();
    }
  }

  return exitCode;
}

async function emitReport(io: CliIO, args: ParsedCommand, report: RunReportInput): Promise<void> {
  const text = buildRunReport(report);
  io.stdout(text.trimEnd());
  if (args.report) {
    await writeRunReport(path.resolve(args.report), text);
    io.stdout(`Report written to ${path.resolve(args.report)}`);
  }
}

function runPresets(io: CliIO): number {
  for (const preset of listPresets()) {
    const { config } = preset;
    io.stdout(
      `${preset.name.padEnd(14)} ${preset.kind.padEnd(9)} threshold=${config.threshold.toFixed(2)} limiter=${config.limiter ? 'on' : 'off'}  ${preset.description}`,
    );
  }
  return EXIT_OK;
}

function runHistoryCommand(args: ParsedCommand, deps: CliDependencies, io: CliIO): number {
  const history = deps.history ?? new RunHistory();
  if (!history.isOpen()) {
    history.initialize();
  }
  try {
    if (args.clear) {
      history.clear();
      io.stdout('Run history cleared');
      return EXIT_OK;
    }
    const runs = history.list(args.limit ?? undefined);
    if (runs.length === 0) {
      io.stdout('No runs recorded');
    }
    for (const run of runs) {
      const cohesion = run.cohesion !== null ? `  cohesion=${run.cohesion.toFixed(1)}` : '';
      io.stdout(
        `#${run.id}  ${run.createdAt}  ${run.strategy.padEnd(7)}  ok=${run.successCount} failed=${run.failureCount}${cohesion}  ${run.input}`,
      );
    }
    return EXIT_OK;
  } finally {
    if (!deps.history) {
      history.close();
    }
  }
}

function isSettingKey(key: string): key is keyof AppSettings {
  return Object.prototype.hasOwnProperty.call(DEFAULT_SETTINGS, key);
}

/** JSON values (numbers, booleans, null, arrays) as such; anything else as a string */
export function parseSettingValue(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error: unknown) {
    if (error instanceof SyntaxError) return raw;
    throw error;
  }
}

async function runConfigCommand(args: ParsedCommand, deps: CliDependencies, io: CliIO): Promise<number> {
  const manager = deps.settingsManager ?? new SettingsManager();
  if (!manager.isInitialized()) {
    await manager.initialize();
  }

  const [action, key, value] = args.positionals;
  if (action === undefined) {
    io.stdout(serializeSettings(manager.get()));
    io.stdout(`Settings file: ${manager.getFilePath()}`);
    return EXIT_OK;
  }
  if (action !== 'set' || key === undefined || value === undefined || args.positionals.length !== 3) {
    throw new UsageError('config takes no arguments, or: config set <key> <value>');
  }
  if (!isSettingKey(key)) {
    throw new UsageError(`Unknown setting "${key}". Available: ${Object.keys(DEFAULT_SETTINGS).join(', ')}`);
  }

  // Invalid values fall back to their defaults, so the stored value is echoed
  const saved = await manager.save(validateSettings({ ...manager.get(), [key]: parseSettingValue(value) }));
  io.stdout(`${key} = ${JSON.stringify(saved[key])}`);
  return EXIT_OK;
}

// ─── Entry ───────────────────────────────────────────────────────────────────

/**
 * Runs one CLI invocation and returns its exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const io = deps.io ?? defaultIO;

  let args: ParsedCommand;
  try {
    args = parseCommandLine(argv);
  } catch (error: unknown) {
    if (error instanceof UsageError) {
      io.stderr(error.message);
      io.stderr(USAGE);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (args.help) {
    io.stdout(USAGE);
    return EXIT_OK;
  }

  const command = args.command;
  if (command === null) {
    io.stderr(USAGE);
    return EXIT_USAGE;
  }
  if (command === 'presets') {
    return runPresets(io);
  }
  if (command === 'history') {
    return runHistoryCommand(args, deps, io);
  }
  if (command === 'config') {
    try {
      return await runConfigCommand(args, deps, io);
    } catch (error: unknown) {
      if (!(error instanceof UsageError)) throw error;
      io.stderr(error.message);
      io.stderr(USAGE);
      return EXIT_USAGE;
    }
  }
  if (isDispatchCommand(command)) {
    return runDispatch(command, args, deps, io);
  }

  io.stderr(`Unknown command "${command}"`);
  io.stderr(USAGE);
  return EXIT_USAGE;
}

/**
 * Command line front end
 *
 * Scans a path with live progress, then prints the ring layout of the
 * focused directory as text (or the tree as JSON).
 */

import * as path from 'path';
import { parseArgs } from 'util';
import { ScanSession, createBundleMatcher, findEntryByPath } from '@diskrings/scanner';
import type { FileSystemEntry, ScanOutcome, ScanProgress } from '@diskrings/scanner';
import { ChartViewState } from '@diskrings/sunburst';
import { loadConfig, resolveSettings } from './config';
import { createScanLogger, debugLog, ensureDebugDir, setDebugEnabled } from './debug';
import { formatPercent } from './format';
import { renderReport, toJsonTree } from './report';

export const USAGE = `Usage: diskrings [path] [options]

Options:
  --apparent-size     Measure logical file sizes instead of allocated blocks
  --depth <n>         Rings shown without expansion (default 3)
  --focus <path>      Report on a directory inside the scanned tree
  --expand <path>     Show one more ring below this directory (repeatable)
  --json              Print the scanned tree as JSON
  -h, --help          Show this help`;

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_CANCELLED = 130;

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Redraws the progress line; undefined clears it. Omit to hide progress. */
  progress?: (line: string | undefined) => void;
  cwd: string;
  /** Hook for wiring cancellation (SIGINT) to the running session */
  onSession?: (session: ScanSession) => void;
  /** Called once the scan has settled, before any output; undo onSession wiring here */
  onSessionSettled?: (session: ScanSession) => void;
}

function progressLine(event: ScanProgress): string {
  return `${formatPercent(event.fraction * 100)} ${event.currentItemName}`;
}

function resolveInTree(root: FileSystemEntry, target: string, cwd: string): FileSystemEntry | undefined {
  return findEntryByPath(root, path.resolve(cwd, target));
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'apparent-size': { type: 'boolean', default: false },
      depth: { type: 'string' },
      focus: { type: 'string' },
      expand: { type: 'string', multiple: true },
      json: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false }
    }
  });
}

export async function runCli(argv: string[], io: CliIO): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    io.stderr(`${error instanceof Error ? error.message : String(error)}\n${USAGE}`);
    return EXIT_USAGE;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    io.stdout(USAGE);
    return EXIT_OK;
  }
  if (positionals.length > 1) {
    io.stderr(`Expected at most one path, got ${positionals.length}\n${USAGE}`);
    return EXIT_USAGE;
  }

  const settings = resolveSettings(await loadConfig(io.cwd));
  setDebugEnabled(settings.debug);
  await ensureDebugDir();

  if (values.depth !== undefined) {
    const depth = Number(values.depth);
    if (!Number.isInteger(depth) || depth < 1) {
      io.stderr(`--depth expects a positive integer, got ${values.depth}`);
      return EXIT_USAGE;
    }
    settings.layout.baseDepth = depth;
  }

  const target = path.resolve(io.cwd, positionals[0] ?? '.');
  const session = new ScanSession({
    sizeMode: values['apparent-size'] ? 'logical' : settings.sizeMode,
    isBundle: createBundleMatcher(settings.bundleExtensions),
    logger: createScanLogger()
  });

  const showProgress = io.progress;
  if (showProgress) {
    session.on('progress', (event: ScanProgress) => showProgress(progressLine(event)));
  }
  io.onSession?.(session);

  debugLog(`[cli] scanning ${target}`);
  let outcome: ScanOutcome;
  try {
    outcome = await session.start(target);
  } finally {
    io.onSessionSettled?.(session);
  }
  io.progress?.(undefined);

  if (outcome.status === 'cancelled') {
    io.stderr('Scan cancelled');
    return EXIT_CANCELLED;
  }
  if (outcome.status === 'failed') {
    io.stderr(`Cannot scan: ${outcome.error.message}`);
    return EXIT_FAILURE;
  }

  const root = outcome.root;
  let view = ChartViewState.create(root);

  if (values.focus !== undefined) {
    const focus = resolveInTree(root, values.focus, io.cwd);
    if (!focus || !focus.children) {
      io.stderr(`--focus ${values.focus} is not a directory in the scanned tree`);
      return EXIT_USAGE;
    }
    view = focus.id === root.id ? view : view.drillDown(focus);
  }

  for (const expandPath of values.expand ?? []) {
    const entry = resolveInTree(root, expandPath, io.cwd);
    if (!entry) {
      io.stderr(`--expand ${expandPath} is not in the scanned tree`);
      return EXIT_USAGE;
    }
    view = view.toggleExpansion(entry);
  }

  if (values.json) {
    io.stdout(JSON.stringify(toJsonTree(view.focus), null, 2));
    return EXIT_OK;
  }

  const rings = view.rings(settings.layout);
  io.stdout(renderReport(view.focus, rings, { maxSlicesPerRing: settings.maxSlicesPerRing }).join('\n'));
  return EXIT_OK;
}

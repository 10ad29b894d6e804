import type { Configuration } from '../../core/configuration.js';
import { ErrorCode, PathwiseError, invalidArgument } from '../../core/errors.js';
import { Result, ok, err } from '../../core/result.js';
import { bootstrap } from '../../bootstrap.js';
import { Graph, loadGraphFile, sampleGraph } from '../../graph/graph-builder.js';
import { summaryToJSON, type PathReport, type PathRunSummary } from '../../services/path-service.js';
import * as ui from '../ui.js';

export interface LongestOptions {
  readonly vertexId?: number;
  readonly graphFile?: string;
  readonly json: boolean;
  readonly overrides: Partial<Configuration>;
}

/**
 * Parse `longest` arguments: [vertex-id] [--graph FILE] [--json]
 * [--traversal recursive|iterative] [--continue-on-cycle]
 */
export function parseLongestArgs(args: readonly string[]): Result<LongestOptions, PathwiseError> {
  let vertexId: number | undefined;
  let graphFile: string | undefined;
  let json = false;
  const overrides: { -readonly [K in keyof Configuration]?: Configuration[K] } = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--graph' || arg === '-g') {
      const next = args[i + 1];
      if (!next || next.startsWith('-')) {
        return err(invalidArgument('--graph requires a file path'));
      }
      graphFile = next;
      i++;
    } else if (arg === '--json') {
      json = true;
    } else if (arg === '--traversal') {
      const next = args[i + 1];
      if (next !== 'recursive' && next !== 'iterative') {
        return err(invalidArgument('--traversal must be recursive or iterative'));
      }
      overrides.traversal = next;
      i++;
    } else if (arg === '--continue-on-cycle') {
      overrides.stopOnCycle = false;
    } else if (/^-\d+$/.test(arg)) {
      return err(invalidArgument('Invalid vertex ID. Please provide a non-negative integer', { value: arg }));
    } else if (arg.startsWith('-')) {
      return err(invalidArgument(`Unknown flag: ${arg}`));
    } else if (vertexId === undefined) {
      if (!/^\d+$/.test(arg) || !Number.isSafeInteger(Number(arg))) {
        return err(invalidArgument('Invalid vertex ID. Please provide a non-negative integer', { value: arg }));
      }
      vertexId = Number(arg);
    } else {
      return err(invalidArgument(`Unexpected argument: ${arg}`));
    }
  }

  return ok({ vertexId, graphFile, json, overrides });
}

export const formatReport = (report: PathReport): string =>
  `Longest path from vertex ${report.vertexId}: ${report.length}`;

/**
 * Plain-text lines for a batch run, in the order they are printed
 */
export function formatSummary(summary: PathRunSummary): { stdout: string[]; stderr: string[] } {
  const stderr: string[] = summary.failures.map(
    (failure) => `Skipped vertex ${failure.vertexId}: ${failure.error.message}`
  );

  if (summary.cycle) {
    stderr.push(`Error processing the graph: ${summary.cycle.message}`);
    stderr.push('Further calculations on this graph are stopped due to detected cycle.');
  }

  return { stdout: summary.reports.map(formatReport), stderr };
}

const describeError = (error: PathwiseError): string =>
  error.code === ErrorCode.CYCLE_DETECTED
    ? `Error processing the graph: ${error.message}`
    : `Error during calculation: ${error.message}`;

/**
 * Run the `longest` command
 * @returns process exit code
 */
export function runLongest(args: readonly string[]): number {
  const parsed = parseLongestArgs(args);
  if (!parsed.ok) {
    ui.error(parsed.error.message);
    return 1;
  }
  const options = parsed.value;

  const servicesResult = bootstrap({ overrides: options.overrides });
  if (!servicesResult.ok) {
    ui.error(`Bootstrap failed: ${servicesResult.error.message}`);
    return 1;
  }
  const { pathService } = servicesResult.value;

  let graph: Graph;
  if (options.graphFile) {
    const loaded = loadGraphFile(options.graphFile);
    if (!loaded.ok) {
      ui.error(loaded.error.message);
      return 1;
    }
    graph = loaded.value;
  } else {
    graph = sampleGraph();
  }

  if (options.vertexId !== undefined) {
    const result = pathService.longestFrom(graph, options.vertexId);
    if (!result.ok) {
      if (options.json) ui.stdout(JSON.stringify({ error: result.error.toJSON() }));
      ui.error(describeError(result.error));
      return 1;
    }
    ui.stdout(options.json ? JSON.stringify(result.value) : formatReport(result.value));
    return 0;
  }

  const summaryResult = pathService.longestForAll(graph);
  if (!summaryResult.ok) {
    ui.error(describeError(summaryResult.error));
    return 1;
  }
  const summary = summaryResult.value;

  if (options.json) {
    ui.stdout(JSON.stringify(summaryToJSON(summary)));
  } else {
    const lines = formatSummary(summary);
    lines.stdout.forEach((line) => ui.stdout(line));
    lines.stderr.forEach((line) => ui.error(line));
  }

  return summary.cycle || summary.failures.length > 0 ? 1 : 0;
}

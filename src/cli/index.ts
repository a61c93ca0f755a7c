#!/usr/bin/env node
/**
 * tracegraph CLI - build the trace graph for a project and report on it.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { TraceGraphError } from '../core/errors.js';
import { setLogLevel } from '../core/logger.js';
import { NODE_KINDS, type Diagnostic, type Severity } from '../core/types.js';
import { exportJson } from '../export/json.js';
import { formatCoverageReport, formatMetrics } from '../export/report.js';
import { buildGraph, type BuildResult } from '../graph/builder.js';
import { annotateCoverage } from '../graph/metrics.js';
import { traverseGraph } from '../graph/traverse.js';
import { collectSourceUnits, findProjectRoot, loadConfigFile } from '../storage/files.js';

const program = new Command();

program
  .name('tracegraph')
  .description('Requirements traceability graph: link requirements, code, tests and results')
  .version('0.1.0')
  .option('-C, --cwd <dir>', 'Project directory (searched upwards for .tracegraph.yaml)', process.cwd())
  .option('--verbose', 'Log debug output to stderr');

/**
 * Load config and sources, then build the graph.
 */
function loadProject(): BuildResult {
  const globals = program.opts<{ cwd: string; verbose?: boolean }>();
  if (globals.verbose) setLogLevel('debug');

  const root = findProjectRoot(globals.cwd);
  const config = loadConfigFile(root);
  const units = collectSourceUnits(root ?? globals.cwd, config);
  return buildGraph(units, config);
}

/**
 * Run a command action, turning tracegraph errors into a message and exit 1.
 */
function run<A extends unknown[]>(action: (...args: A) => void): (...args: A) => void {
  return (...args: A) => {
    try {
      action(...args);
    } catch (error) {
      if (error instanceof TraceGraphError) {
        console.error(chalk.red(error.message));
        process.exit(1);
      }
      throw error;
    }
  };
}

const SEVERITY_COLOR: Record<Severity, (text: string) => string> = {
  error: chalk.red,
  warning: chalk.yellow,
  info: chalk.gray,
};

function formatDiagnostic(diagnostic: Diagnostic): string {
  const where = diagnostic.location ? `${diagnostic.location.path}:${diagnostic.location.line} ` : '';
  const tag = SEVERITY_COLOR[diagnostic.severity](`${diagnostic.severity} ${diagnostic.code}`);
  return `${tag} ${chalk.gray(where)}${diagnostic.message}`;
}

function parseDepth(value: string): number {
  const depth = Number.parseInt(value, 10);
  if (!Number.isFinite(depth) || depth < 0) {
    throw new TraceGraphError(`Invalid depth: ${value}`, 'CONFIG_ERROR');
  }
  return depth;
}

// Validate command
program
  .command('validate')
  .description('Build the graph and report diagnostics')
  .option('--strict', 'Treat warnings as errors')
  .option('--json', 'Print diagnostics as JSON')
  .action(
    run((options: { strict?: boolean; json?: boolean }) => {
      const { graph, diagnostics } = loadProject();

      if (options.json) {
        console.log(JSON.stringify(diagnostics, null, 2));
      } else {
        for (const diagnostic of diagnostics) {
          console.log(formatDiagnostic(diagnostic));
        }
      }

      const errors = diagnostics.filter((d) => d.severity === 'error').length;
      const warnings = diagnostics.filter((d) => d.severity === 'warning').length;
      const failed = errors > 0 || (options.strict === true && warnings > 0);

      if (!options.json) {
        const summary = `${graph.size} nodes, ${errors} errors, ${warnings} warnings`;
        console.log(failed ? chalk.red(summary) : chalk.green(summary));
      }
      if (failed) process.exitCode = 1;
    })
  );

// Trace command
program
  .command('trace')
  .description('Print the coverage tree for every root')
  .option('-d, --depth <n>', 'Requirement levels to show below each root')
  .action(
    run((options: { depth?: string }) => {
      const { graph } = loadProject();
      annotateCoverage(graph);
      const maxDepth = options.depth === undefined ? undefined : parseDepth(options.depth);
      console.log(formatCoverageReport(graph, { maxDepth }));
    })
  );

// Get command
program
  .command('get <id>')
  .description('Show a node with its parents, children and metrics')
  .option('-d, --depth <n>', 'Traversal depth for related nodes', '1')
  .action(
    run((id: string, options: { depth: string }) => {
      const { graph } = loadProject();
      annotateCoverage(graph);
      const node = graph.getNode(id);

      console.log(chalk.cyan(`${node.id} (${node.kind})`));
      console.log(chalk.bold(node.label));
      if (node.source) console.log(chalk.gray(`${node.source.path}:${node.source.line}`));
      if (node.kind === 'requirement') {
        console.log(chalk.gray(`Level: ${node.fields.level} | Status: ${node.fields.status}`));
        console.log();
        console.log(node.fields.body);
      }
      console.log();

      const metrics = graph.getMetrics(node.id);
      if (metrics) console.log(formatMetrics(metrics));

      for (const step of traverseGraph(graph, id, 'both', parseDepth(options.depth))) {
        if (step.node.id === id) continue;
        console.log(`${'  '.repeat(step.depth)}${chalk.cyan(step.node.id)} - ${step.node.label}`);
      }
    })
  );

// List command
program
  .command('list <kind>')
  .description(`List nodes of one kind (${NODE_KINDS.join(', ')})`)
  .action(
    run((kind: string) => {
      const nodeKind = NODE_KINDS.find((candidate) => candidate === kind);
      if (!nodeKind) {
        console.error(chalk.red(`Unknown kind: ${kind}`));
        process.exit(1);
      }

      const { graph } = loadProject();
      for (const node of graph.nodesOfKind(nodeKind)) {
        console.log(`${chalk.cyan(node.id)} - ${node.label}`);
      }
    })
  );

// Export command
program
  .command('export')
  .description('Export the graph')
  .option('-f, --format <format>', 'Export format (json)', 'json')
  .option('--metrics', 'Include coverage metrics')
  .action(
    run((options: { format: string; metrics?: boolean }) => {
      if (options.format !== 'json') {
        console.error(chalk.red(`Unknown format: ${options.format}`));
        process.exit(1);
      }

      const { graph } = loadProject();
      if (options.metrics) annotateCoverage(graph);
      console.log(exportJson(graph, { metrics: options.metrics === true, classification: true }));
    })
  );

program.parse();

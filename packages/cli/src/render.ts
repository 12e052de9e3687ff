// packages/cli/src/render.ts — Terminal rendering for reports, run progress, removal plans and history

import type { Identity, RemovalPlan, Report, RunEvent, RunRecord, ScoreRecord } from '@fleetsweep/core';
import { TYPE_LABELS, formatPercentage } from '@fleetsweep/core';
import chalk from 'chalk';
import ora from 'ora';

const HEADING_RULE = '#'.repeat(10);

/** Case-insensitive by name, then by id. */
function compareByName(a: Identity, b: Identity): number {
  const left = a.name.toUpperCase();
  const right = b.name.toUpperCase();
  if (left !== right) return left < right ? -1 : 1;
  return a.id - b.id;
}

/**
 * Render one report as plain text blocks: a `##########` heading per result
 * followed by one `id<TAB>name` line per object. Verbose output adds the All and
 * Used results plus each result's description.
 */
export function formatReport(report: Report, options: { verbose: boolean }): string {
  const lines: string[] = [chalk.bold(report.heading), ''];

  if (report.isEmpty) {
    lines.push(chalk.gray(`No ${TYPE_LABELS[report.type].plural} in the catalog.`), '');
    return lines.join('\n');
  }

  for (const result of report.results) {
    if (!options.verbose && !result.includeInNonVerbose) continue;
    lines.push(`${HEADING_RULE} ${result.heading}:`);
    if (options.verbose) lines.push(chalk.gray(result.description));
    for (const object of [...result.objects].sort(compareByName)) {
      lines.push(`${object.id}\t${object.name}`);
    }
    lines.push('');
  }

  for (const [section, entries] of report.metadata) {
    lines.push(`${HEADING_RULE} ${section}:`);
    for (const [label, entry] of entries) {
      if (entry.kind === 'count') {
        lines.push(`${label}: ${entry.count}`);
      } else {
        const { ratio, rank } = entry.score;
        lines.push(
          `${label}: ${formatPercentage(ratio)} (${entry.count}/${entry.population}) ${rank.label} [${rank.range}]`,
        );
      }
    }
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Listener for run events that drives one spinner per report on stderr.
 */
export function createProgressRenderer(): (event: RunEvent) => void {
  let spinner: ReturnType<typeof ora> | null = null;

  return (event: RunEvent) => {
    switch (event.type) {
      case 'run.started':
        console.error(chalk.gray(`Run ${event.runId}: ${event.kinds.length} report(s)`));
        break;

      case 'report.started':
        spinner = ora({ text: `Building ${event.kind} report...`, stream: process.stderr }).start();
        break;

      case 'report.completed':
        spinner?.succeed(
          `${event.kind} (${event.resultCount} results, ${event.durationMs}ms)`,
        );
        spinner = null;
        break;

      case 'report.failed':
        spinner?.fail(`${event.kind}: ${event.error}`);
        spinner = null;
        break;

      case 'run.completed':
        if (event.failureCount > 0) {
          console.error(chalk.red(`${event.failureCount} report(s) aborted`));
        }
        break;
    }
  };
}

export function formatRemovalPlan(plan: RemovalPlan): string[] {
  const lines: string[] = [];
  for (const entry of plan.entries) {
    if (entry.status === 'missing') {
      const name = entry.requestedName ? ` ${entry.requestedName}` : '';
      lines.push(chalk.red(`  ✗ ${entry.type} ${entry.id}${name} (not in catalog)`));
      continue;
    }
    const mismatch = entry.nameMismatch
      ? chalk.yellow(` (listed as "${entry.requestedName ?? ''}")`)
      : '';
    lines.push(chalk.green(`  ✓ ${entry.type} ${entry.id} ${entry.catalogName ?? ''}`) + mismatch);
  }
  lines.push('');
  lines.push(`${plan.found} to remove, ${plan.missing} not found`);
  return lines;
}

export function formatRunHistory(
  runs: readonly RunRecord[],
  scoresFor: (runId: string) => ScoreRecord[],
): string[] {
  if (runs.length === 0) return [chalk.gray('No report runs recorded.')];

  const lines: string[] = [];
  for (const run of runs) {
    const status = run.failures > 0 ? chalk.red(`${run.failures} aborted`) : chalk.green('ok');
    lines.push(
      `${chalk.bold(run.id)}  ${new Date(run.startedAt).toISOString()}  ${run.server ?? '-'}  ${run.kinds.length} report(s), ${status}`,
    );
    for (const score of scoresFor(run.id)) {
      lines.push(`    ${score.kind} ${score.label}: ${formatPercentage(score.ratio)} (${score.count}/${score.population})`);
    }
  }
  return lines;
}

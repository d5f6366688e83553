// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Terminal formatting for library queries and reports.
 */

import chalk from 'chalk';
import type { ComparisonSnapshot, ExplorationSummary } from '../store/types.js';
import { isJsonObject } from '../types.js';
import type { ExplorationStatus, JsonObject, JsonValue, ResultRecord, StageRecord } from '../types.js';

const STATUS_COLORS: Record<ExplorationStatus, (text: string) => string> = {
  pending: chalk.gray,
  running: chalk.cyan,
  completed: chalk.green,
  failed: chalk.red,
  stopped: chalk.yellow,
};

/**
 * Left-align cells into columns separated by two spaces.
 */
export function formatTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map(row => (row[column] ?? '').length))
  );
  const render = (cells: string[]): string =>
    cells.map((cell, column) => cell.padEnd(widths[column])).join('  ').trimEnd();

  return [render(headers), render(widths.map(width => '-'.repeat(width))), ...rows.map(render)].join('\n');
}

function formatScore(score: number | null): string {
  return score === null ? '-' : score.toFixed(1);
}

/** Date part of an ISO timestamp. */
function day(timestamp: string): string {
  return timestamp.slice(0, 10);
}

export function formatExplorationList(explorations: ExplorationSummary[]): string {
  if (explorations.length === 0) {
    return chalk.dim('No explorations found.');
  }
  const rows = explorations.map(exploration => [
    exploration.id,
    exploration.appName,
    exploration.category,
    exploration.persona,
    exploration.status,
    formatScore(exploration.uxScore),
    formatScore(exploration.complexityScore),
    day(exploration.createdAt),
  ]);
  return formatTable(['ID', 'App', 'Category', 'Persona', 'Status', 'UX', 'Complexity', 'Created'], rows);
}

export function formatStages(stages: StageRecord[]): string {
  if (stages.length === 0) {
    return chalk.dim('No stages recorded.');
  }
  return stages
    .map(stage => {
      const header = `${stage.stageNumber}. ${stage.stageName} [${stage.status}]`;
      const lines = [chalk.bold(header)];
      if (stage.errorMessage) {
        lines.push(chalk.red(`   ${stage.errorMessage}`));
      }
      if (stage.content) {
        const preview = stage.content.length > 200 ? `${stage.content.slice(0, 200)}...` : stage.content;
        lines.push(chalk.dim(`   ${preview.replace(/\n/g, '\n   ')}`));
      }
      return lines.join('\n');
    })
    .join('\n\n');
}

export function colorStatus(status: ExplorationStatus): string {
  return STATUS_COLORS[status](status);
}

function stringList(value: JsonValue | undefined): string[] {
  if (!Array.isArray(value)) return [];
  return value.map(item => {
    if (typeof item === 'string') return item;
    if (isJsonObject(item)) {
      const title = item.title ?? item.issue ?? item.description;
      if (typeof title === 'string') return title;
    }
    return JSON.stringify(item);
  });
}

function section(title: string, items: string[]): string[] {
  if (items.length === 0) return [];
  return ['', chalk.bold(title), ...items.map(item => `  • ${item}`)];
}

/**
 * Human-readable summary of a stored report.
 */
export function formatReport(result: ResultRecord): string {
  const report: JsonObject = result.report;
  const lines = [
    chalk.bold(`UX score: ${formatScore(result.uxScore)}   Complexity: ${formatScore(result.complexityScore)}`),
  ];

  if (typeof report.summary === 'string') {
    lines.push('', report.summary);
  }
  lines.push(...section('Strengths', stringList(report.positive)));
  lines.push(...section('Issues', stringList(report.issues)));
  lines.push(...section('Recommendations', stringList(report.recommendations)));
  lines.push(...section('Dark patterns', stringList(report.dark_patterns_detected)));

  return lines.join('\n');
}

export function formatComparison(snapshots: ComparisonSnapshot[]): string {
  if (snapshots.length === 0) {
    return chalk.dim('No comparison snapshots saved.');
  }
  const rows = snapshots.map(snapshot => [
    snapshot.snapshotName,
    snapshot.appName,
    snapshot.category,
    snapshot.persona,
    snapshot.uxScore.toFixed(1),
    snapshot.complexityScore.toFixed(1),
  ]);
  return formatTable(['Snapshot', 'App', 'Category', 'Persona', 'UX', 'Complexity'], rows);
}

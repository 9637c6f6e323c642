/**
 * Output Renderer
 * Layer: infra
 *
 * Provided ports:
 *   - output.render
 *
 * Generates summary for GitHub step summary and console.
 */

import * as fs from 'fs';
import type { SummaryData } from './types';

// -----------------------------------------------------------------------------
// Port: output.render
// -----------------------------------------------------------------------------

export interface RenderResult {
  /** Markdown for step summary */
  markdown: string;
  /** Plain text for console */
  console: string;
}

/**
 * Renders the summary data to markdown and console formats.
 */
export function render(data: SummaryData): RenderResult {
  const markdown = renderMarkdown(data);
  const consoleText = renderConsole(data);
  return { markdown, console: consoleText };
}

// -----------------------------------------------------------------------------
// Markdown rendering
// -----------------------------------------------------------------------------

/**
 * Renders full markdown summary for $GITHUB_STEP_SUMMARY.
 */
export function renderMarkdown(data: SummaryData): string {
  const { outcome, checks, duration_seconds } = data;

  const lines: string[] = [];

  lines.push('## Heartbeat Watchdog');
  lines.push('');

  const status = outcome.success ? 'healthy' : 'expired';
  lines.push(
    `**Status:** ${status} | **Duration:** ${formatDuration(duration_seconds)} | **Passes:** ${outcome.passes}`,
  );
  lines.push('');

  if (checks.length > 0) {
    lines.push('| Check | Status | Window | Heartbeat file |');
    lines.push('|-------|--------|-------:|----------------|');
    for (const check of checks) {
      const marker = check.status === 'expired' ? '**expired**' : 'alive';
      lines.push(
        `| ${check.name} | ${marker} | ${formatDuration(check.window_seconds)} | \`${check.path}\` |`,
      );
    }
    lines.push('');
  }

  if (!outcome.success) {
    lines.push(`> ${outcome.error.message}`);
    lines.push('');
  }

  return lines.join('\n');
}

// -----------------------------------------------------------------------------
// Console rendering
// -----------------------------------------------------------------------------

/**
 * Renders concise console output.
 */
export function renderConsole(data: SummaryData): string {
  const { outcome, checks, duration_seconds } = data;
  const duration = formatDuration(duration_seconds);

  if (outcome.success) {
    return `Heartbeat watchdog: ${checks.length} check(s) healthy for ${duration} (${outcome.passes} passes)`;
  }
  return `Heartbeat watchdog: ${outcome.error.names.length} of ${checks.length} check(s) expired after ${duration} (${outcome.passes} passes)`;
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

/**
 * Formats duration in human-readable form.
 */
export function formatDuration(seconds: number): string {
  if (seconds < 60) {
    return `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const secs = seconds % 60;
  if (minutes < 60) {
    return secs > 0 ? `${minutes}m ${secs}s` : `${minutes}m`;
  }
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return mins > 0 ? `${hours}h ${mins}m` : `${hours}h`;
}

// -----------------------------------------------------------------------------
// GitHub Step Summary
// -----------------------------------------------------------------------------

/**
 * Writes markdown to GitHub step summary.
 */
export function writeStepSummary(markdown: string): void {
  const summaryPath = process.env['GITHUB_STEP_SUMMARY'];
  if (summaryPath) {
    fs.appendFileSync(summaryPath, markdown + '\n');
  }
}

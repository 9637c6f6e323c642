/**
 * Action handler
 * Layer: action
 *
 * Required ports:
 *   - config.read
 *   - output.render
 *
 * Reads inputs, supervises the heartbeats, publishes outputs and the step
 * summary, and fails the step when a heartbeat expired.
 */

import * as core from '@actions/core';
import { readConfig } from './config';
import { superviseHeartbeats, defaultSuperviseDeps } from './supervise';
import type { SuperviseDeps } from './supervise';
import { render, writeStepSummary } from './output';

export async function run(deps: SuperviseDeps = defaultSuperviseDeps): Promise<void> {
  try {
    const config = readConfig();
    core.info(
      `Supervising ${config.heartbeats.length} heartbeat(s) for ${config.duration_seconds}s ` +
        `(period ${config.period_seconds}s)`,
    );

    const data = await superviseHeartbeats(config, deps);
    const { outcome } = data;

    const { markdown, console: consoleText } = render(data);
    core.info(consoleText);
    writeStepSummary(markdown);

    core.setOutput('status', outcome.success ? 'healthy' : 'expired');
    core.setOutput('expired', outcome.success ? '' : outcome.error.names.join(','));
    core.setOutput('passes', outcome.passes);

    if (!outcome.success) {
      core.setFailed(outcome.error.message);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    core.setFailed(message);
  }
}

/**
 * Logger
 * Layer: infra
 *
 * Default WatchdogLogger backed by @actions/core. Outside a runner the
 * calls degrade to plain stdout lines (debug lines are ::debug:: commands
 * that only show when step debugging is enabled).
 */

import * as core from '@actions/core';
import type { WatchdogLogger } from './types';

export const actionsLogger: WatchdogLogger = {
  info: (message) => core.info(message),
  debug: (message) => core.debug(message),
  warning: (message) => core.warning(message),
};

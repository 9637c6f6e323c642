/**
 * Main Entry
 * Layer: action
 *
 * GitHub Action entry point (action.yml `runs.main`).
 */

import { run } from './action';

run();

/**
 * Panel View
 *
 * Renders a panel's state changes to the terminal: an ora spinner while the
 * job runs, the batch progress bar in the spinner text, and an error block
 * for every failure the worker reports.
 */

import type { EventEmitter } from 'node:events';
import ora, { type Ora } from 'ora';
import type { PanelState, PanelWarning } from '@refmaster/mastering';
import { formatProgressBar, printErrorBox, printWarning } from './output.js';

export function describeState(state: PanelState): string {
  return state.progress.visible
    ? `${formatProgressBar(state.progress.value)} ${state.status}`
    : state.status;
}

/**
 * Subscribe a terminal view to the panel. Returns the unsubscribe function.
 */
export function attachPanelView(panel: EventEmitter): () => void {
  let spinner: Ora | null = null;

  const onChange = (state: PanelState): void => {
    if (!state.runEnabled) {
      spinner ??= ora().start();
      spinner.text = describeState(state);
      return;
    }

    if (!spinner) return;
    if (state.tone === 'success') {
      spinner.succeed(state.status);
    } else {
      spinner.fail(state.status);
    }
    spinner = null;
  };

  const onFailure = (message: string): void => {
    spinner?.clear();
    printErrorBox('Error', message);
    spinner?.render();
  };

  const onWarning = (warning: PanelWarning): void => {
    printWarning(`${warning.title}: ${warning.message}`);
  };

  panel.on('change', onChange);
  panel.on('failure', onFailure);
  panel.on('warning', onWarning);

  return () => {
    panel.off('change', onChange);
    panel.off('failure', onFailure);
    panel.off('warning', onWarning);
  };
}

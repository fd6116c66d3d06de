// packages/cli/src/render.ts — Terminal rendering for monitor events

import type { EventBus, MonitorEvent } from '@zos-client/core';
import chalk from 'chalk';
import ora from 'ora';

function attemptsLabel(n: number): string {
  return n === 1 ? '1 attempt' : `${n} attempts`;
}

/** One-line description of a monitor event. */
export function describeMonitorEvent(event: MonitorEvent): string {
  const job = `${event.jobName}(${event.jobId})`;
  switch (event.type) {
    case 'monitor.started':
      return event.kind === 'status'
        ? `Waiting for ${job} to reach ${event.target}`
        : `Waiting for "${event.target}" in ${job} output`;

    case 'monitor.poll':
      return `${job} attempt ${event.attempt}/${event.maxAttempts}${event.status ? `: ${event.status}` : ''}`;

    case 'monitor.completed':
      if (!event.found) {
        return `${job} stopped running after ${attemptsLabel(event.attempts)} without the message`;
      }
      return event.kind === 'status'
        ? `${job} is ${event.status ?? 'done'} after ${attemptsLabel(event.attempts)}`
        : `Message found in ${job} after ${attemptsLabel(event.attempts)}`;

    case 'monitor.exhausted':
      return `Gave up on ${job} after ${attemptsLabel(event.attempts)}`;
  }
}

/**
 * Drive an ora spinner (on stderr, so stdout stays JSON) from monitor
 * events. Returns a function that detaches it.
 */
export function attachMonitorSpinner(bus: EventBus): () => void {
  const spinner = ora({ stream: process.stderr });

  const listener = (event: MonitorEvent) => {
    const text = describeMonitorEvent(event);
    switch (event.type) {
      case 'monitor.started':
        spinner.start(text);
        break;
      case 'monitor.poll':
        spinner.text = text;
        break;
      case 'monitor.completed':
        if (event.found) {
          spinner.succeed(chalk.green(text));
        } else {
          spinner.warn(chalk.yellow(text));
        }
        break;
      case 'monitor.exhausted':
        spinner.fail(chalk.red(text));
        break;
    }
  };

  bus.on('event', listener);
  return () => {
    bus.off('event', listener);
    if (spinner.isSpinning) spinner.stop();
  };
}

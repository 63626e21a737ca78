import type { Logger } from 'winston';
import logger from '../utils/logger.js';
import { formatDuration } from '../utils/output.js';
import type { DeviceSummary, RunObserver, StepProgressEvent, TaskOutcome } from '../types/device.js';

/** Writes run progress to the workflow log. */
export class LoggingObserver implements RunObserver {
  constructor(private readonly log: Logger = logger) {}

  onStep(event: StepProgressEvent): void {
    const level = event.status === 'Complete' ? 'debug' : 'warn';
    this.log.log(level, `Step ${event.stepIndex}/${event.stepCount} ${event.status}`, {
      device: event.deviceKey,
      task: event.task,
      command: event.command,
      attempt: event.attempt,
      elapsed: formatDuration(event.elapsedMs),
    });
  }

  onTaskFinished(deviceKey: string, outcome: TaskOutcome): void {
    const level = outcome.status === 'Complete' ? 'info' : 'warn';
    this.log.log(level, `Task ${outcome.task} ${outcome.status}`, {
      device: deviceKey,
      steps: outcome.steps.length,
      artifacts: outcome.artifacts.map((artifact) => `${artifact.remotePath}: ${artifact.status}`),
      elapsed: formatDuration(outcome.elapsedMs),
    });
  }

  onDeviceFinished(summary: DeviceSummary): void {
    const level = summary.status === 'Complete' ? 'info' : 'error';
    this.log.log(level, `Device ${summary.deviceKey} ${summary.status}`, {
      device: summary.deviceKey,
      address: summary.address,
      failedAtStep: summary.failedAtStep,
      error: summary.error,
      persistError: summary.persistError,
      elapsed: formatDuration(summary.elapsedMs),
    });
  }
}

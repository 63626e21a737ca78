import { v4 as uuidv4 } from 'uuid';
import logger, { deviceLogger } from '../utils/logger.js';
import { DeviceRunnerError, PlanningError, errorMessage } from '../utils/errors.js';
import { CommandPlanner, checkCaptures } from './command-planner.js';
import { PromptStateMachine } from './prompt-state-machine.js';
import type { SessionTransport } from './session-transport.js';
import type { ProfileStore } from './profile-store.js';
import type { RetrievalVerifier } from './retrieval-verifier.js';
import type {
  ArtifactOutcome,
  CommandStep,
  DeviceJob,
  DeviceStatus,
  DeviceSummary,
  ExecutionResult,
  ProfileState,
  RunObserver,
  RunReport,
  Session,
  StepProgressEvent,
  TaskOutcome,
  TaskSequence,
} from '../types/device.js';

export interface OrchestratorDeps {
  transport: Pick<SessionTransport, 'open' | 'close'>;
  store: Pick<ProfileStore, 'read' | 'update'>;
  verifier: Pick<RetrievalVerifier, 'retrieve'>;
  planner?: CommandPlanner;
  machine?: PromptStateMachine;
  observers?: RunObserver[];
}

export interface RunOptions {
  /** Aborts every worker still running after this long; 0 or unset disables it. */
  deadlineMs?: number;
}

interface PlannedJob {
  job: DeviceJob;
  sequences: TaskSequence[];
}

class WorkerAborted extends DeviceRunnerError {
  constructor(reason: string) {
    super('Aborted', reason);
    this.name = 'WorkerAborted';
  }
}

function abortReason(signal: AbortSignal): string {
  return typeof signal.reason === 'string' ? signal.reason : 'Cancelled';
}

function pause(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

/**
 * Runs planned task sequences, one worker per device. Steps of one device
 * run strictly in order over its single session; devices run concurrently
 * and a failure or abort of one never reaches another.
 */
export class TaskOrchestrator {
  private readonly transport: OrchestratorDeps['transport'];
  private readonly store: OrchestratorDeps['store'];
  private readonly verifier: OrchestratorDeps['verifier'];
  private readonly planner: CommandPlanner;
  private readonly machine: PromptStateMachine;
  private readonly observers: RunObserver[];
  private readonly controllers = new Map<string, AbortController>();

  constructor(deps: OrchestratorDeps) {
    this.transport = deps.transport;
    this.store = deps.store;
    this.verifier = deps.verifier;
    this.planner = deps.planner ?? new CommandPlanner();
    this.machine = deps.machine ?? new PromptStateMachine();
    this.observers = [...(deps.observers ?? [])];
  }

  addObserver(observer: RunObserver): void {
    this.observers.push(observer);
  }

  async run(job: DeviceJob, options: RunOptions = {}): Promise<DeviceSummary> {
    const report = await this.runAll([job], options);
    return report.devices[0];
  }

  /**
   * Plans every job, then runs them concurrently. Planning errors reject
   * before any session is opened; per-device failures only show up in the
   * report.
   */
  async runAll(jobs: readonly DeviceJob[], options: RunOptions = {}): Promise<RunReport> {
    const runId = uuidv4();
    const startedAt = new Date();

    const seen = new Set<string>();
    for (const job of jobs) {
      if (seen.has(job.deviceKey)) {
        throw new PlanningError('DuplicateDevice', `Device ${job.deviceKey} is listed more than once`, {
          deviceKey: job.deviceKey,
        });
      }
      seen.add(job.deviceKey);
    }

    const planned: PlannedJob[] = [];
    for (const job of jobs) {
      const state = await this.store.read(job.deviceKey);
      const sequences = this.planner.generate(job.profile, job.tasks, {
        deviceKey: job.deviceKey,
        parameters: job.parameters,
        state,
      });
      planned.push({ job, sequences });
    }

    for (const { job } of planned) {
      this.controllers.set(job.deviceKey, new AbortController());
    }

    let deadline: NodeJS.Timeout | null = null;
    if (options.deadlineMs && options.deadlineMs > 0) {
      deadline = setTimeout(() => {
        logger.warn('Run deadline reached, aborting remaining devices', { runId, deadlineMs: options.deadlineMs });
        this.cancelAll('Run deadline reached');
      }, options.deadlineMs);
    }

    logger.info('Run started', { runId, devices: planned.length });
    try {
      const devices = await Promise.all(planned.map((item) => this.work(item)));
      const exitCode = devices.every((device) => device.status === 'Complete') ? 0 : 1;
      const report: RunReport = { runId, startedAt, finishedAt: new Date(), devices, exitCode };
      logger.info('Run finished', { runId, exitCode });
      return report;
    } finally {
      if (deadline) clearTimeout(deadline);
      for (const { job } of planned) {
        this.controllers.delete(job.deviceKey);
      }
    }
  }

  /** Aborts one device's worker; false when it is not running. */
  cancel(deviceKey: string, reason = 'Cancelled'): boolean {
    const controller = this.controllers.get(deviceKey);
    if (!controller || controller.signal.aborted) {
      return false;
    }
    controller.abort(reason);
    return true;
  }

  cancelAll(reason = 'Cancelled'): void {
    for (const deviceKey of this.controllers.keys()) {
      this.cancel(deviceKey, reason);
    }
  }

  private async work({ job, sequences }: PlannedJob): Promise<DeviceSummary> {
    const { deviceKey } = job;
    const log = deviceLogger(deviceKey);
    const controller = this.controllers.get(deviceKey) ?? new AbortController();
    const signal = controller.signal;
    const startedAt = Date.now();
    const stepCount = sequences.reduce((total, sequence) => total + sequence.steps.length, 0);
    const outcomes: TaskOutcome[] = sequences.map((sequence) => ({
      task: sequence.name,
      kind: sequence.kind,
      status: 'NotRun',
      steps: [],
      artifacts: [],
      elapsedMs: 0,
    }));
    const discovered: ProfileState = {};

    let status: DeviceStatus = 'Complete';
    let failedAtStep: number | undefined;
    let error: string | undefined;
    let errorCode: string | undefined;
    let persistError: string | undefined;
    let current = -1;
    let stepIndex = 0;
    let session: Session | null = null;

    const closeOnAbort = (): void => {
      log.warn('Aborting device', { reason: abortReason(signal) });
      if (session) this.transport.close(session);
    };
    signal.addEventListener('abort', closeOnAbort, { once: true });

    try {
      session = await this.openSession(job, signal);
      const live = session;

      for (current = 0; current < sequences.length; current++) {
        const sequence = sequences[current];
        const outcome = outcomes[current];
        const taskStartedAt = Date.now();
        let failed = false;

        for (const step of sequence.steps) {
          stepIndex++;
          const { result, attempts, values } = await this.executeStep(live, step, signal, {
            deviceKey,
            task: sequence.name,
            stepIndex,
            stepCount,
          });
          if (signal.aborted) {
            throw new WorkerAborted(abortReason(signal));
          }

          outcome.steps.push({ command: step.command, attempts, result });
          if (result.status === 'Complete') {
            Object.assign(discovered, values);
            continue;
          }

          log.warn('Step failed', { task: sequence.name, stepIndex, status: result.status });
          outcome.status = result.status;
          status = 'Failed';
          failedAtStep = stepIndex;
          error = result.status === 'Error'
            ? `${sequence.name}: ${result.error}`
            : `${sequence.name}: timed out after "${step.command}"`;
          failed = true;
          break;
        }

        if (!failed) {
          outcome.artifacts = await this.retrieveArtifacts(live, sequence);
          if (signal.aborted) {
            throw new WorkerAborted(abortReason(signal));
          }
          const retrieved = outcome.artifacts.every((artifact) => artifact.status === 'Retrieved');
          outcome.status = retrieved ? 'Complete' : 'ArtifactMissing';
          if (!retrieved) {
            status = 'Failed';
          }
        }

        outcome.elapsedMs = Date.now() - taskStartedAt;
        this.notify((observer) => observer.onTaskFinished?.(deviceKey, outcome));
        if (failed) {
          break;
        }
      }
    } catch (caught) {
      if (signal.aborted || caught instanceof WorkerAborted) {
        status = 'Aborted';
        error = abortReason(signal);
        errorCode = 'Aborted';
        if (current >= 0 && current < outcomes.length) {
          outcomes[current].status = 'Aborted';
          this.notify((observer) => observer.onTaskFinished?.(deviceKey, outcomes[current]));
        }
      } else {
        status = 'Failed';
        error = errorMessage(caught);
        errorCode = caught instanceof DeviceRunnerError ? caught.code : 'Unexpected';
        log.error('Device run failed', { error: caught });
      }
    } finally {
      signal.removeEventListener('abort', closeOnAbort);
      if (session) {
        this.transport.close(session);
      }
    }

    if (Object.keys(discovered).length > 0) {
      try {
        await this.store.update(deviceKey, discovered);
      } catch (caught) {
        persistError = errorMessage(caught);
        log.error('Profile state not persisted', { error: persistError });
      }
    }

    const summary: DeviceSummary = {
      deviceKey,
      address: job.address,
      image: job.profile.image,
      status,
      failedAtStep,
      tasks: outcomes,
      discovered,
      elapsedMs: Date.now() - startedAt,
      error,
      errorCode,
      persistError,
    };
    this.notify((observer) => observer.onDeviceFinished?.(summary));
    return summary;
  }

  private openSession(job: DeviceJob, signal: AbortSignal): Promise<Session> {
    if (signal.aborted) {
      return Promise.reject(new WorkerAborted(abortReason(signal)));
    }
    const opening = this.transport.open(job.profile, { deviceKey: job.deviceKey, address: job.address }, job.viaRelay);
    return new Promise((resolve, reject) => {
      const onAbort = (): void => reject(new WorkerAborted(abortReason(signal)));
      signal.addEventListener('abort', onAbort, { once: true });
      opening.then((session) => {
        signal.removeEventListener('abort', onAbort);
        if (signal.aborted) {
          // Opened after the worker gave up on it
          this.transport.close(session);
          return;
        }
        resolve(session);
      }, (caught: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(caught);
      });
    });
  }

  private async executeStep(
    session: Session,
    step: CommandStep,
    signal: AbortSignal,
    position: Pick<StepProgressEvent, 'deviceKey' | 'task' | 'stepIndex' | 'stepCount'>
  ): Promise<{ result: ExecutionResult; attempts: number; values: Record<string, string> }> {
    const attempts = step.retry?.attempts ?? 1;
    for (let attempt = 1; ; attempt++) {
      const executed = await this.machine.execute(session, step, signal);
      if (signal.aborted) {
        return { result: executed, attempts: attempt, values: {} };
      }

      let result: ExecutionResult = executed;
      let values: Record<string, string> = {};
      if (executed.status === 'Complete') {
        const check = checkCaptures(step, executed.output);
        if (check.problems.length === 0) {
          values = check.values;
        } else {
          // Values from a failed readback are not kept
          result = { ...executed, status: 'Error', error: `verification failed: ${check.problems.join('; ')}` };
        }
      }

      this.notify((observer) => observer.onStep?.({
        ...position,
        command: step.command,
        attempt,
        status: result.status,
        elapsedMs: result.elapsedMs,
      }));

      if (result.status !== 'Timeout' || attempt >= attempts || !session.open || !step.retry) {
        return { result, attempts: attempt, values };
      }
      await pause(step.retry.backoffMs * attempt, signal);
    }
  }

  private async retrieveArtifacts(session: Session, sequence: TaskSequence): Promise<ArtifactOutcome[]> {
    if (sequence.artifacts.length === 0) {
      return [];
    }
    try {
      const files = await session.remoteFiles();
      return await this.verifier.retrieve(session.deviceKey, files, sequence.artifacts);
    } catch (caught) {
      return sequence.artifacts.map((spec): ArtifactOutcome => ({
        remotePath: spec.remotePath,
        status: 'TransferFailed',
        error: errorMessage(caught),
      }));
    }
  }

  private notify(call: (observer: RunObserver) => void): void {
    for (const observer of this.observers) {
      try {
        call(observer);
      } catch (caught) {
        logger.warn('Run observer threw', { error: errorMessage(caught) });
      }
    }
  }
}

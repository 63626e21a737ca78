import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { TaskOrchestrator } from '../services/task-orchestrator.js';
import type { SessionTransport } from '../services/session-transport.js';
import type { ProfileStore } from '../services/profile-store.js';
import type { RetrievalVerifier } from '../services/retrieval-verifier.js';
import { parseProfiles } from '../config/profiles.js';
import type { DeviceProfile } from '../config/profiles.js';
import { ConnectError, PersistFailedError, PlanningError } from '../utils/errors.js';
import type {
  ArtifactOutcome,
  ArtifactStatus,
  DeviceJob,
  DeviceSummary,
  DeviceTarget,
  ProfileState,
  RemoteFiles,
  RetrievalSpec,
  RunObserver,
  Session,
  StepProgressEvent,
  TaskOutcome,
} from '../types/device.js';
import { FakeFiles, FakeShell, scripted } from './helpers/fake-shell.js';
import type { CommandHandler } from './helpers/fake-shell.js';
import { labProfile, makeSession } from './helpers/profiles.js';

class FakeTransport implements Pick<SessionTransport, 'open' | 'close'> {
  readonly opened: string[] = [];
  readonly closed: string[] = [];
  readonly shells = new Map<string, FakeShell>();

  constructor(
    private readonly handlers: Record<string, CommandHandler>,
    private readonly failures: Record<string, Error> = {},
    private readonly files: RemoteFiles = new FakeFiles([])
  ) {}

  async open(profile: DeviceProfile, target: DeviceTarget, viaRelay: boolean): Promise<Session> {
    this.opened.push(target.deviceKey);
    const failure = this.failures[target.deviceKey];
    if (failure) {
      throw failure;
    }
    const shell = new FakeShell(this.handlers[target.deviceKey] ?? (() => undefined));
    this.shells.set(target.deviceKey, shell);
    return {
      ...makeSession(shell, target.deviceKey),
      address: target.address,
      profile,
      viaRelay,
      remoteFiles: async () => this.files,
    };
  }

  close(session: Session): void {
    if (!session.open) {
      return;
    }
    session.open = false;
    session.channel.close();
    this.closed.push(session.deviceKey);
  }
}

class MemoryStore implements Pick<ProfileStore, 'read' | 'update'> {
  readonly reads: string[] = [];
  readonly updates: Array<{ deviceKey: string; patch: ProfileState }> = [];
  failUpdates = false;

  constructor(private readonly states: Record<string, ProfileState> = {}) {}

  async read(deviceKey: string): Promise<ProfileState> {
    this.reads.push(deviceKey);
    return { ...(this.states[deviceKey] ?? {}) };
  }

  async update(deviceKey: string, patch: ProfileState): Promise<ProfileState> {
    this.updates.push({ deviceKey, patch });
    if (this.failUpdates) {
      throw new PersistFailedError(deviceKey, 3, new Error('disk full'));
    }
    const next = { ...(this.states[deviceKey] ?? {}), ...patch };
    this.states[deviceKey] = next;
    return next;
  }
}

class StubVerifier implements Pick<RetrievalVerifier, 'retrieve'> {
  readonly calls: string[][] = [];

  constructor(private readonly status: ArtifactStatus = 'Retrieved') {}

  async retrieve(_deviceKey: string, _files: RemoteFiles, specs: readonly RetrievalSpec[]): Promise<ArtifactOutcome[]> {
    this.calls.push(specs.map((spec) => spec.remotePath));
    return specs.map((spec) => ({ remotePath: spec.remotePath, status: this.status }));
  }
}

class Recorder implements RunObserver {
  readonly steps: StepProgressEvent[] = [];
  readonly tasks: Array<{ deviceKey: string; task: string; status: string }> = [];
  readonly devices: DeviceSummary[] = [];

  onStep(event: StepProgressEvent): void {
    this.steps.push(event);
  }

  onTaskFinished(deviceKey: string, outcome: TaskOutcome): void {
    this.tasks.push({ deviceKey, task: outcome.task, status: outcome.status });
  }

  onDeviceFinished(summary: DeviceSummary): void {
    this.devices.push(summary);
  }
}

const answering = scripted({
  step1: 'ok\r\n> ',
  step2: 'ok\r\n> ',
  step3: 'ok\r\n> ',
  step4: 'ok\r\n> ',
  step5: 'ok\r\n> ',
  plain: 'ok\r\n> ',
});

function job(deviceKey: string, tasks: string[], profile: DeviceProfile = labProfile()): DeviceJob {
  return { deviceKey, address: `192.0.2.${deviceKey.length}`, profile, tasks, viaRelay: false };
}

function byKey(devices: readonly DeviceSummary[], deviceKey: string): DeviceSummary {
  const found = devices.find((device) => device.deviceKey === deviceKey);
  if (!found) {
    throw new Error(`no summary for ${deviceKey}`);
  }
  return found;
}

describe('TaskOrchestrator', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('fails only the device that timed out while the others complete', async () => {
    const transport = new FakeTransport({
      X: scripted({ step1: 'ok\r\n> ', step2: 'ok\r\n> ' }),
      Y: answering,
      Z: answering,
    });
    const recorder = new Recorder();
    const orchestrator = new TaskOrchestrator({
      transport,
      store: new MemoryStore(),
      verifier: new StubVerifier(),
      observers: [recorder],
    });

    const pending = orchestrator.runAll([job('X', ['sweep']), job('Y', ['sweep']), job('Z', ['sweep'])]);
    await vi.advanceTimersByTimeAsync(2500);
    const report = await pending;

    const x = byKey(report.devices, 'X');
    expect(x).toMatchObject({ status: 'Failed', failedAtStep: 3, error: 'sweep: timed out after "step3"' });
    expect(x.tasks[0].status).toBe('Timeout');
    expect(x.tasks[0].steps.map((step) => step.result.status)).toEqual(['Complete', 'Complete', 'Timeout']);
    expect(byKey(report.devices, 'Y').status).toBe('Complete');
    expect(byKey(report.devices, 'Z').status).toBe('Complete');
    expect(report.exitCode).toBe(1);
    expect([...transport.closed].sort()).toEqual(['X', 'Y', 'Z']);
    expect(recorder.steps.filter((event) => event.deviceKey === 'Y').map((event) => event.stepIndex)).toEqual([1, 2, 3, 4, 5]);
    expect(recorder.devices).toHaveLength(3);
  });

  it('sends steps one at a time in plan order', async () => {
    const transport = new FakeTransport({ Y: answering });
    const orchestrator = new TaskOrchestrator({ transport, store: new MemoryStore(), verifier: new StubVerifier() });

    const pending = orchestrator.run(job('Y', ['sweep', 'plain']));
    await vi.advanceTimersByTimeAsync(1000);
    expect(transport.shells.get('Y')?.written).toEqual(['step1\n', 'step2\n', 'step3\n']);
    await vi.advanceTimersByTimeAsync(2000);

    const summary = await pending;
    expect(summary.status).toBe('Complete');
    expect(transport.shells.get('Y')?.written).toEqual(['step1\n', 'step2\n', 'step3\n', 'step4\n', 'step5\n', 'plain\n']);
  });

  it('persists what was discovered before a failing step', async () => {
    const store = new MemoryStore({ X: { RLSP: '12' } });
    const transport = new FakeTransport({ X: scripted({ 'show rlsp': 'rlsp 14.5\r\n> ' }) });
    const orchestrator = new TaskOrchestrator({ transport, store, verifier: new StubVerifier() });

    const pending = orchestrator.run(job('X', ['rlsp', 'sweep']));
    await vi.advanceTimersByTimeAsync(1500);
    const summary = await pending;

    expect(summary).toMatchObject({
      status: 'Failed',
      failedAtStep: 2,
      error: 'rlsp: timed out after "set rlsp 12"',
      discovered: { RLSP: '14.5' },
    });
    expect(summary.tasks.map((task) => task.status)).toEqual(['Timeout', 'NotRun']);
    expect(store.updates).toEqual([{ deviceKey: 'X', patch: { RLSP: '14.5' } }]);
  });

  it('fails a step whose readback does not match and keeps none of its values', async () => {
    const store = new MemoryStore({ X: { RLSP: '14.5' } });
    const transport = new FakeTransport({ X: scripted({ 'show config': 'rlsp 12\r\nmode south\r\n> ' }) });
    const recorder = new Recorder();
    const orchestrator = new TaskOrchestrator({ transport, store, verifier: new StubVerifier(), observers: [recorder] });

    const pending = orchestrator.run(job('X', ['readback']));
    await vi.advanceTimersByTimeAsync(1000);
    const summary = await pending;

    expect(summary).toMatchObject({
      status: 'Failed',
      failedAtStep: 1,
      error: 'readback: verification failed: RLSP: expected 14.5, found 12',
      discovered: {},
    });
    expect(summary.tasks[0].status).toBe('Error');
    expect(recorder.steps.map((event) => event.status)).toEqual(['Error']);
    expect(store.updates).toEqual([]);
  });

  it('keeps readback values that match', async () => {
    const store = new MemoryStore({ X: { RLSP: '14.5' } });
    const transport = new FakeTransport({ X: scripted({ 'show config': 'rlsp 14.50\r\nmode south\r\n> ' }) });
    const orchestrator = new TaskOrchestrator({ transport, store, verifier: new StubVerifier() });

    const pending = orchestrator.run(job('X', ['readback']));
    await vi.advanceTimersByTimeAsync(1000);
    const summary = await pending;

    expect(summary.status).toBe('Complete');
    expect(store.updates).toEqual([{ deviceKey: 'X', patch: { RLSP: '14.50', MODE: 'south' } }]);
  });

  it('reports a persistence failure without changing the device status', async () => {
    const store = new MemoryStore({ X: { RLSP: '12' } });
    store.failUpdates = true;
    const transport = new FakeTransport({ X: scripted({ 'show rlsp': 'rlsp 14.5\r\n> ', 'set rlsp 12': 'done\r\n> ' }) });
    const orchestrator = new TaskOrchestrator({ transport, store, verifier: new StubVerifier() });

    const pending = orchestrator.run(job('X', ['rlsp']));
    await vi.advanceTimersByTimeAsync(1000);
    const summary = await pending;

    expect(summary.status).toBe('Complete');
    expect(summary.persistError).toBe('Persisting state for X failed after 3 attempt(s): disk full');
  });

  it('aborts devices still running at the deadline', async () => {
    const transport = new FakeTransport({ X: answering, Y: answering });
    const orchestrator = new TaskOrchestrator({ transport, store: new MemoryStore(), verifier: new StubVerifier() });

    const pending = orchestrator.runAll([job('X', ['sweep']), job('Y', ['plain'])], { deadlineMs: 1000 });
    await vi.advanceTimersByTimeAsync(1500);
    const report = await pending;

    const x = byKey(report.devices, 'X');
    expect(x).toMatchObject({ status: 'Aborted', errorCode: 'Aborted', error: 'Run deadline reached' });
    expect(x.failedAtStep).toBeUndefined();
    expect(x.tasks[0].status).toBe('Aborted');
    expect(x.tasks[0].steps).toHaveLength(2);
    expect(transport.shells.get('X')?.closed).toBe(true);
    expect(byKey(report.devices, 'Y').status).toBe('Complete');
    expect(report.exitCode).toBe(1);
  });

  it('cancels a single device on request', async () => {
    const transport = new FakeTransport({ X: answering, Y: answering });
    const orchestrator = new TaskOrchestrator({ transport, store: new MemoryStore(), verifier: new StubVerifier() });

    const pending = orchestrator.runAll([job('X', ['sweep']), job('Y', ['sweep'])]);
    await vi.advanceTimersByTimeAsync(500);
    expect(orchestrator.cancel('X', 'Operator stop')).toBe(true);
    expect(orchestrator.cancel('nobody')).toBe(false);
    await vi.advanceTimersByTimeAsync(2000);
    const report = await pending;

    expect(byKey(report.devices, 'X')).toMatchObject({ status: 'Aborted', error: 'Operator stop' });
    expect(byKey(report.devices, 'X').tasks[0].steps).toHaveLength(1);
    expect(byKey(report.devices, 'Y').status).toBe('Complete');
  });

  it('retries a step that declares a retry policy, with growing backoff', async () => {
    const catalog = parseProfiles({
      FLAKY: {
        username: 'operator',
        promptMarker: '>',
        tasks: {
          poll: { steps: [{ command: 'poll', timeoutMs: 200, retry: { attempts: 3, backoffMs: 100 } }] },
        },
      },
    });
    const profile = catalog.get('FLAKY');
    if (!profile) {
      throw new Error('FLAKY profile missing');
    }
    let polls = 0;
    const transport = new FakeTransport({
      X: (command, shell) => {
        polls++;
        if (command === 'poll' && polls === 3) {
          shell.reply('ready\r\n> ', 100);
        }
      },
    });
    const recorder = new Recorder();
    const orchestrator = new TaskOrchestrator({
      transport,
      store: new MemoryStore(),
      verifier: new StubVerifier(),
      observers: [recorder],
    });

    const pending = orchestrator.run(job('X', ['poll'], profile));
    await vi.advanceTimersByTimeAsync(1050);
    expect(recorder.steps.map((event) => event.status)).toEqual(['Timeout', 'Timeout']);
    await vi.advanceTimersByTimeAsync(100);
    const summary = await pending;

    expect(summary.status).toBe('Complete');
    expect(summary.tasks[0].steps[0].attempts).toBe(3);
    expect(recorder.steps.map((event) => [event.attempt, event.status])).toEqual([
      [1, 'Timeout'],
      [2, 'Timeout'],
      [3, 'Complete'],
    ]);
  });

  it('does not retry a step without a retry policy', async () => {
    const transport = new FakeTransport({});
    const orchestrator = new TaskOrchestrator({ transport, store: new MemoryStore(), verifier: new StubVerifier() });

    const pending = orchestrator.run(job('X', ['plain']));
    await vi.advanceTimersByTimeAsync(1500);
    const summary = await pending;

    expect(summary.tasks[0].steps[0].attempts).toBe(1);
    expect(transport.shells.get('X')?.written).toEqual(['plain\n']);
  });

  it('rejects planning errors before opening any session', async () => {
    const transport = new FakeTransport({});
    const orchestrator = new TaskOrchestrator({ transport, store: new MemoryStore(), verifier: new StubVerifier() });

    const error = await orchestrator.runAll([job('X', ['plain']), job('Y', ['rlsp'])]).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PlanningError);
    expect(error).toMatchObject({ kind: 'UnresolvedParameter' });
    expect(transport.opened).toEqual([]);
  });

  it('rejects a device listed twice before reading any state', async () => {
    const store = new MemoryStore();
    const orchestrator = new TaskOrchestrator({ transport: new FakeTransport({}), store, verifier: new StubVerifier() });

    await expect(orchestrator.runAll([job('X', ['plain']), job('X', ['sweep'])])).rejects.toMatchObject({
      kind: 'DuplicateDevice',
    });
    expect(store.reads).toEqual([]);
  });

  it('reports a connect failure with its reason code', async () => {
    const transport = new FakeTransport({}, {
      X: new ConnectError('AuthRejected', 'target', 'Authentication rejected by target 192.0.2.1'),
    });
    const orchestrator = new TaskOrchestrator({ transport, store: new MemoryStore(), verifier: new StubVerifier() });

    const summary = await orchestrator.run(job('X', ['plain']));

    expect(summary).toMatchObject({
      status: 'Failed',
      errorCode: 'AuthRejected',
      error: 'Authentication rejected by target 192.0.2.1',
    });
    expect(summary.tasks.map((task) => task.status)).toEqual(['NotRun']);
  });

  it('marks a task whose artifacts are missing and keeps going', async () => {
    const transport = new FakeTransport({
      X: scripted({
        'debug hal': 'Connected\r\n',
        'ec 0': 'done\r\nhal> ',
        'ec 1': 'done\r\nhal> ',
        'ec 2': 'done\r\nhal> ',
        'quit hal': 'bye\r\n> ',
      }),
    });
    const verifier = new StubVerifier('MissingArtifact');
    const orchestrator = new TaskOrchestrator({ transport, store: new MemoryStore(), verifier });

    const pending = orchestrator.run(job('X', ['ec']));
    await vi.advanceTimersByTimeAsync(2500);
    const summary = await pending;

    expect(summary.tasks.map((task) => [task.task, task.status])).toEqual([
      ['hal:setup', 'Complete'],
      ['ec', 'ArtifactMissing'],
      ['hal:teardown', 'Complete'],
    ]);
    expect(summary.status).toBe('Failed');
    expect(summary.failedAtStep).toBeUndefined();
    expect(verifier.calls).toEqual([['/tmp/EC_*.dat']]);
  });

  it('keeps notifying other observers when one throws', async () => {
    const recorder = new Recorder();
    const orchestrator = new TaskOrchestrator({
      transport: new FakeTransport({ X: answering }),
      store: new MemoryStore(),
      verifier: new StubVerifier(),
      observers: [{
        onStep: () => {
          throw new Error('observer broke');
        },
      }],
    });
    orchestrator.addObserver(recorder);

    const pending = orchestrator.run(job('X', ['plain']));
    await vi.advanceTimersByTimeAsync(500);
    const summary = await pending;

    expect(summary.status).toBe('Complete');
    expect(recorder.steps).toHaveLength(1);
    expect(recorder.tasks).toEqual([{ deviceKey: 'X', task: 'plain', status: 'Complete' }]);
    expect(recorder.devices).toHaveLength(1);
  });
});

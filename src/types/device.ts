import type { EventEmitter } from 'events';
import type { DeviceProfile, ParameterValue } from '../config/profiles.js';

export type { DeviceProfile, ParameterValue };

// Shell and file seams implemented over ssh2 and by the in-process fakes

export interface ShellChannel extends Pick<EventEmitter, 'removeListener'> {
  on(event: 'data', listener: (chunk: string) => void): this;
  on(event: 'close', listener: () => void): this;
  write(data: string): void;
  close(): void;
}

export interface RemoteEntry {
  path: string;
  size: number;
}

export interface RemoteFiles {
  /** null when the path does not exist */
  stat(path: string): Promise<RemoteEntry | null>;
  /** Regular files directly under `dir`; empty when the directory is missing. */
  list(dir: string): Promise<RemoteEntry[]>;
  download(remotePath: string, localPath: string): Promise<void>;
}

export interface DeviceTarget {
  deviceKey: string;
  address: string;
}

export interface Session {
  readonly id: string;
  readonly deviceKey: string;
  readonly address: string;
  readonly profile: DeviceProfile;
  readonly channel: ShellChannel;
  readonly viaRelay: boolean;
  readonly openedAt: number;
  open: boolean;
  lastActivityAt: number;
  remoteFiles(): Promise<RemoteFiles>;
}

// Planned work

export interface CaptureRule {
  key: string;
  pattern: RegExp;
  required: boolean;
}

export interface RetryPolicy {
  attempts: number;
  backoffMs: number;
}

export interface CommandStep {
  command: string;
  /** Any one of these must appear before the prompt counts. */
  validation?: readonly string[];
  delayBeforePromptMs: number;
  timeoutMs: number;
  promptMarker: string;
  awaitPrompt: boolean;
  quietPeriodMs: number;
  lineTerminator: string;
  captures: readonly CaptureRule[];
  /** Expected captured values; a mismatch turns a Complete result into an Error. */
  expect?: Readonly<Record<string, string>>;
  retry?: RetryPolicy;
}

export interface RetrievalSpec {
  task: string;
  remotePath: string;
  minSize: number;
  localName?: string;
}

export type SequenceKind = 'task' | 'setup' | 'teardown';

export interface TaskSequence {
  name: string;
  kind: SequenceKind;
  steps: CommandStep[];
  artifacts: RetrievalSpec[];
}

export interface PlanContext {
  deviceKey: string;
  parameters?: Record<string, ParameterValue>;
  state?: ProfileState;
}

// Step results

export type ExecutionStatus = 'Complete' | 'Timeout' | 'Error';

interface ExecutionBase {
  /** Everything received, decoded but not normalized */
  raw: string;
  /** Normalized text: no ANSI or control characters, trimmed non-empty lines */
  output: string;
  startedAt: number;
  finishedAt: number;
  elapsedMs: number;
}

export interface CompleteResult extends ExecutionBase {
  status: 'Complete';
}

export interface TimeoutResult extends ExecutionBase {
  status: 'Timeout';
}

export interface ErrorResult extends ExecutionBase {
  status: 'Error';
  error: string;
}

export type ExecutionResult = CompleteResult | TimeoutResult | ErrorResult;

// Persisted per-device facts

export type StateValue = string | number | boolean | null | StateValue[] | { [key: string]: StateValue };
export type ProfileState = { [key: string]: StateValue };

// Retrieval outcomes

export type VerificationOutcome =
  | { status: 'ok'; spec: RetrievalSpec; entries: RemoteEntry[] }
  | { status: 'MissingArtifact'; spec: RetrievalSpec; path: string }
  | { status: 'EmptyArtifact'; spec: RetrievalSpec; path: string; size: number };

export type ArtifactStatus = 'Retrieved' | 'MissingArtifact' | 'EmptyArtifact' | 'TransferFailed';

export interface ArtifactOutcome {
  remotePath: string;
  status: ArtifactStatus;
  size?: number;
  localPath?: string;
  error?: string;
}

// Run reporting

export type TaskStatus = ExecutionStatus | 'ArtifactMissing' | 'Aborted' | 'NotRun';
export type DeviceStatus = 'Complete' | 'Failed' | 'Aborted';

export interface StepRecord {
  command: string;
  attempts: number;
  result: ExecutionResult;
}

export interface TaskOutcome {
  task: string;
  kind: SequenceKind;
  status: TaskStatus;
  steps: StepRecord[];
  artifacts: ArtifactOutcome[];
  elapsedMs: number;
}

export interface DeviceSummary {
  deviceKey: string;
  address: string;
  image: string;
  status: DeviceStatus;
  /** 1-based index over every planned step of the device */
  failedAtStep?: number;
  tasks: TaskOutcome[];
  discovered: ProfileState;
  elapsedMs: number;
  error?: string;
  errorCode?: string;
  persistError?: string;
}

export interface RunReport {
  runId: string;
  startedAt: Date;
  finishedAt: Date;
  devices: DeviceSummary[];
  exitCode: 0 | 1;
}

export interface DeviceJob {
  deviceKey: string;
  address: string;
  profile: DeviceProfile;
  tasks: string[];
  viaRelay: boolean;
  parameters?: Record<string, ParameterValue>;
}

export interface StepProgressEvent {
  deviceKey: string;
  task: string;
  command: string;
  stepIndex: number;
  stepCount: number;
  attempt: number;
  status: ExecutionStatus;
  elapsedMs: number;
}

export interface RunObserver {
  onStep?(event: StepProgressEvent): void;
  onTaskFinished?(deviceKey: string, outcome: TaskOutcome): void;
  onDeviceFinished?(summary: DeviceSummary): void;
}

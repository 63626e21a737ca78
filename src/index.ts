export { default as config, loadConfig } from './config/index.js';
export type { Config } from './config/index.js';
export {
  getProfile,
  loadProfiles,
  parseProfiles,
  supportedTasks,
  withOverrides,
} from './config/profiles.js';
export type { CatalogDefaults, ProfileCatalog, ProfileOverrides } from './config/profiles.js';
export * from './utils/errors.js';
export { cleanOutput, normalizeHardwareId } from './utils/output.js';
export { KeyedLock } from './utils/keyed-lock.js';
export { CommandPlanner, applyCaptures, checkCaptures, expandRange } from './services/command-planner.js';
export type { CaptureCheck, SubBand } from './services/command-planner.js';
export { PromptStateMachine, findValidation } from './services/prompt-state-machine.js';
export type { MachineState, ReadyOptions } from './services/prompt-state-machine.js';
export { SessionTransport, transportOptionsFromConfig } from './services/session-transport.js';
export type { TransportOptions, RelayOptions } from './services/session-transport.js';
export { Ssh2Dialer, SftpFiles, SshShellChannel } from './services/ssh-dialer.js';
export type { HopOptions, SshDialer, SshHop } from './services/ssh-dialer.js';
export { ProfileStore, mergeState } from './services/profile-store.js';
export type { ProfileStoreOptions, StateFileSystem } from './services/profile-store.js';
export { RetrievalVerifier, collect, verify } from './services/retrieval-verifier.js';
export { TaskOrchestrator } from './services/task-orchestrator.js';
export type { OrchestratorDeps, RunOptions } from './services/task-orchestrator.js';
export {
  HttpIdentityResolver,
  StaticIdentityResolver,
  createIdentityResolver,
  isAddress,
} from './services/identity-resolver.js';
export type { DeviceIdentity, IdentityResolver } from './services/identity-resolver.js';
export { LoggingObserver } from './services/observers.js';
export type * from './types/device.js';

#!/usr/bin/env node

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import config from './config/index.js';
import { getProfile, loadProfiles, supportedTasks, withOverrides } from './config/profiles.js';
import logger from './utils/logger.js';
import { DeviceRunnerError, IdentityLookupError, errorMessage } from './utils/errors.js';
import { formatDuration, normalizeHardwareId } from './utils/output.js';
import { createIdentityResolver, isAddress } from './services/identity-resolver.js';
import { LoggingObserver } from './services/observers.js';
import { ProfileStore } from './services/profile-store.js';
import { RetrievalVerifier } from './services/retrieval-verifier.js';
import { SessionTransport, transportOptionsFromConfig } from './services/session-transport.js';
import { Ssh2Dialer } from './services/ssh-dialer.js';
import { TaskOrchestrator } from './services/task-orchestrator.js';
import { collect, parseInteger, parseParams, parsePositiveInteger } from './cli-options.js';
import type {
  DeviceJob,
  DeviceSummary,
  RunObserver,
  RunReport,
  StepProgressEvent,
  TaskOutcome,
  TaskStatus,
} from './types/device.js';

interface RunCommandOptions {
  image: string;
  task: string[];
  env: string;
  ip?: string;
  skipRelay?: boolean;
  timeout?: number;
  deadline?: number;
  param: string[];
  output?: string;
  verbose?: boolean;
}

const STATUS_COLOR: Record<TaskStatus | DeviceSummary['status'], (text: string) => string> = {
  Complete: chalk.green,
  Timeout: chalk.red,
  Error: chalk.red,
  Failed: chalk.red,
  ArtifactMissing: chalk.yellow,
  Aborted: chalk.magenta,
  NotRun: chalk.gray,
};

class ConsoleObserver implements RunObserver {
  constructor(private readonly verbose: boolean) {}

  onStep(event: StepProgressEvent): void {
    if (!this.verbose && event.status === 'Complete') {
      return;
    }
    const retry = event.attempt > 1 ? chalk.gray(` (attempt ${event.attempt})`) : '';
    console.log(chalk.gray(`[${event.deviceKey}] ${event.task} ${event.stepIndex}/${event.stepCount} `)
      + `${event.command} ${STATUS_COLOR[event.status](event.status)} ${chalk.gray(formatDuration(event.elapsedMs))}${retry}`);
  }

  onTaskFinished(deviceKey: string, outcome: TaskOutcome): void {
    const mark = outcome.status === 'Complete' ? chalk.green('✓') : chalk.red('✗');
    console.log(`${mark} [${deviceKey}] ${outcome.task} ${STATUS_COLOR[outcome.status](outcome.status)}`);
  }

  onDeviceFinished(summary: DeviceSummary): void {
    console.log(`${STATUS_COLOR[summary.status](`■ ${summary.deviceKey} ${summary.status}`)} ${chalk.gray(formatDuration(summary.elapsedMs))}`);
  }
}

function printReport(report: RunReport, lookupFailures: Map<string, string>): void {
  console.log();
  console.log(chalk.cyan.bold(`Run ${report.runId}`));
  for (const device of report.devices) {
    const failedAt = device.failedAtStep ? chalk.gray(` (failed at step ${device.failedAtStep})`) : '';
    console.log(`${chalk.white.bold(device.deviceKey)} ${device.address} ${STATUS_COLOR[device.status](device.status)}${failedAt}`);
    for (const task of device.tasks) {
      console.log(`  ${task.task.padEnd(28)} ${STATUS_COLOR[task.status](task.status.padEnd(16))} ${chalk.gray(formatDuration(task.elapsedMs))}`);
      for (const artifact of task.artifacts) {
        const where = artifact.localPath ? chalk.gray(` -> ${artifact.localPath}`) : '';
        console.log(chalk.gray(`    ${artifact.remotePath} ${artifact.status}`) + where);
      }
    }
    if (device.error) {
      console.log(chalk.red(`  ${device.error}`));
    }
    if (device.persistError) {
      console.log(chalk.yellow(`  state not saved: ${device.persistError}`));
    }
  }
  for (const [hardwareId, reason] of lookupFailures) {
    console.log(`${chalk.white.bold(hardwareId)} ${chalk.red('Unresolved')} ${chalk.gray(reason)}`);
  }
}

async function writeReport(report: RunReport, outputDir: string): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const file = join(outputDir, `run-${report.runId}.json`);
  await writeFile(file, JSON.stringify(report, null, 2), 'utf-8');
  return file;
}

async function runCommand(ids: string[], options: RunCommandOptions): Promise<void> {
  if (options.verbose) {
    logger.level = 'debug';
  }

  const catalog = loadProfiles();
  const profile = withOverrides(getProfile(catalog, options.image), { timeoutMs: options.timeout });
  const parameters = parseParams(options.param);
  const transportOptions = transportOptionsFromConfig();
  const viaRelay = !options.skipRelay && transportOptions.relay !== undefined;
  if (!options.skipRelay && !viaRelay) {
    console.log(chalk.yellow('No relay host configured; connecting to targets directly'));
  }

  const jobs: DeviceJob[] = [];
  const lookupFailures = new Map<string, string>();

  if (options.ip) {
    if (ids.length !== 1) {
      throw new InvalidArgumentError('--ip takes exactly one device id.');
    }
    if (!isAddress(options.ip)) {
      throw new InvalidArgumentError(`"${options.ip}" is not an IP address or hostname.`);
    }
    jobs.push({ deviceKey: normalizeHardwareId(ids[0]), address: options.ip, profile, tasks: options.task, viaRelay, parameters });
  } else {
    const resolver = createIdentityResolver(options.env);
    for (const id of ids) {
      try {
        const identity = await resolver.resolve(id);
        console.log(chalk.gray(`${identity.hardwareId} -> ${identity.address} ${identity.nodeIdentity}`));
        jobs.push({ deviceKey: identity.deviceKey, address: identity.address, profile, tasks: options.task, viaRelay, parameters });
      } catch (error) {
        if (!(error instanceof IdentityLookupError)) {
          throw error;
        }
        lookupFailures.set(id, `${error.kind}: ${error.message}`);
      }
    }
  }

  const transport = new SessionTransport(new Ssh2Dialer(), transportOptions);
  const orchestrator = new TaskOrchestrator({
    transport,
    store: new ProfileStore(),
    verifier: new RetrievalVerifier(options.output ?? config.paths.outputDir),
    observers: [new LoggingObserver(), new ConsoleObserver(Boolean(options.verbose))],
  });

  const onInterrupt = (): void => {
    console.log(chalk.yellow('\nInterrupted, aborting running devices...'));
    orchestrator.cancelAll('Interrupted');
  };
  process.once('SIGINT', onInterrupt);

  try {
    const report = await orchestrator.runAll(jobs, { deadlineMs: options.deadline ?? config.run.deadlineMs });
    printReport(report, lookupFailures);
    const file = await writeReport(report, options.output ?? config.paths.outputDir);
    console.log(chalk.gray(`Report written to ${file}`));
    process.exitCode = report.exitCode === 0 && lookupFailures.size === 0 ? 0 : 1;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    transport.closeAll();
  }
}

const program = new Command();

program
  .name('device-runner')
  .description('Run command sequences on network devices over SSH')
  .version('1.0.0');

program
  .command('run')
  .description('Run tasks on one or more devices')
  .argument('<ids...>', 'Hardware identifiers (MAC addresses)')
  .requiredOption('--image <tag>', 'Image/firmware profile tag')
  .requiredOption('-t, --task <names...>', 'Tasks to run, in order')
  .option('-e, --env <selector>', 'Identity lookup environment', 'PROD')
  .option('--ip <address>', 'Target address, skipping identity lookup (single device)')
  .option('--skip-relay', 'Connect to the target directly')
  .option('--timeout <ms>', 'Override the profile and task timeouts', parsePositiveInteger)
  .option('--deadline <ms>', 'Abort devices still running after this long', parseInteger)
  .option('-p, --param <key=value>', 'Template parameter (repeatable)', collect, [])
  .option('-o, --output <dir>', 'Directory for retrieved artifacts and the run report')
  .option('-v, --verbose', 'Log every step')
  .action(runCommand);

program
  .command('profiles')
  .description('List image profiles and their tasks')
  .option('--image <tag>', 'Only this image')
  .action((options: { image?: string }) => {
    const catalog = loadProfiles();
    const profiles = options.image ? [getProfile(catalog, options.image)] : [...catalog.values()];
    for (const profile of profiles) {
      console.log(chalk.cyan.bold(profile.image) + (profile.description ? chalk.gray(` ${profile.description}`) : ''));
      for (const task of supportedTasks(profile)) {
        const description = profile.tasks[task].description;
        console.log(`  ${task}${description ? chalk.gray(` - ${description}`) : ''}`);
      }
    }
  });

program
  .command('state')
  .description('Print the persisted state of a device')
  .argument('<id>', 'Hardware identifier')
  .action(async (id: string) => {
    const state = await new ProfileStore().read(normalizeHardwareId(id));
    console.log(JSON.stringify(state, null, 2));
  });

program
  .command('resolve')
  .description('Resolve a hardware identifier to its address')
  .argument('<id>', 'Hardware identifier')
  .option('-e, --env <selector>', 'Identity lookup environment', 'PROD')
  .action(async (id: string, options: { env: string }) => {
    const identity = await createIdentityResolver(options.env).resolve(id);
    console.log(JSON.stringify(identity, null, 2));
  });

program.parseAsync().catch((error: unknown) => {
  const label = error instanceof DeviceRunnerError ? `${error.code}:` : 'Fatal error:';
  console.error(chalk.red(label), errorMessage(error));
  logger.debug('Fatal error', { error });
  process.exit(1);
});

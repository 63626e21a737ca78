import { readFileSync } from 'fs';
import type { Duplex } from 'stream';
import { v4 as uuidv4 } from 'uuid';
import config from '../config/index.js';
import type { Config } from '../config/index.js';
import logger from '../utils/logger.js';
import { ConnectError, SessionConflictError, errorMessage } from '../utils/errors.js';
import type { ConnectHop } from '../utils/errors.js';
import { isRecord } from '../utils/output.js';
import { PromptStateMachine } from './prompt-state-machine.js';
import type { HopOptions, SshDialer, SshHop } from './ssh-dialer.js';
import type { DeviceProfile, DeviceTarget, Session } from '../types/device.js';

export interface RelayOptions {
  host: string;
  port: number;
  username: string;
  password?: string;
  privateKey?: Buffer | string;
}

export interface TransportOptions {
  relay?: RelayOptions;
  targetPort: number;
  connectTimeoutMs: number;
  initialPromptTimeoutMs: number;
}

interface LiveEntry {
  hops: SshHop[];
  session: Session | null;
}

export function transportOptionsFromConfig(cfg: Config = config): TransportOptions {
  const { relay, session } = cfg;
  return {
    relay: relay.host && relay.username
      ? {
        host: relay.host,
        port: relay.port,
        username: relay.username,
        password: relay.password,
        privateKey: relay.privateKeyPath ? readFileSync(relay.privateKeyPath) : undefined,
      }
      : undefined,
    targetPort: session.targetPort,
    connectTimeoutMs: session.connectTimeoutMs,
    initialPromptTimeoutMs: session.initialPromptTimeoutMs,
  };
}

export function isAuthFailure(error: unknown): boolean {
  return isRecord(error) && error.level === 'client-authentication';
}

/**
 * Opens and owns interactive shell sessions, at most one per device key.
 * With a relay the target handshake runs over a direct-tcpip channel of the
 * relay connection.
 */
export class SessionTransport {
  private readonly live = new Map<string, LiveEntry>();

  constructor(
    private readonly dialer: SshDialer,
    private readonly options: TransportOptions,
    private readonly machine: PromptStateMachine = new PromptStateMachine()
  ) {}

  async open(profile: DeviceProfile, target: DeviceTarget, viaRelay: boolean): Promise<Session> {
    const { deviceKey, address } = target;
    if (this.live.has(deviceKey)) {
      throw new SessionConflictError(deviceKey);
    }

    // Reserve the key before the first await
    const entry: LiveEntry = { hops: [], session: null };
    this.live.set(deviceKey, entry);
    const log = logger.child({ device: deviceKey });

    try {
      let sock: Duplex | undefined;
      if (viaRelay) {
        const relay = this.options.relay;
        if (!relay) {
          throw new ConnectError('RelayUnreachable', 'relay', 'No relay host is configured');
        }
        log.info('Connecting to relay', { relay: `${relay.host}:${relay.port}` });
        const relayHop = await this.dial('relay', { ...relay, readyTimeoutMs: this.options.connectTimeoutMs });
        entry.hops.push(relayHop);

        try {
          sock = await relayHop.forwardOut(address, this.options.targetPort);
        } catch (error) {
          throw new ConnectError(
            'TargetUnreachable',
            'target',
            `Relay could not reach ${address}:${this.options.targetPort}: ${errorMessage(error)}`,
            error
          );
        }
      }

      log.info('Connecting to target', { address, viaRelay });
      const targetHop = await this.dial('target', {
        host: address,
        port: this.options.targetPort,
        username: profile.username,
        password: profile.password,
        readyTimeoutMs: this.options.connectTimeoutMs,
        sock,
      });
      entry.hops.push(targetHop);

      const channel = await targetHop.openShell().catch((error: unknown) => {
        throw new ConnectError('TargetUnreachable', 'target', `Shell request refused: ${errorMessage(error)}`, error);
      });

      const now = Date.now();
      const session: Session = {
        id: uuidv4(),
        deviceKey,
        address,
        profile,
        channel,
        viaRelay,
        openedAt: now,
        open: true,
        lastActivityAt: now,
        remoteFiles: () => targetHop.files(),
      };
      entry.session = session;

      channel.on('close', () => {
        if (session.open) {
          log.warn('Shell closed by remote');
          this.close(session);
        }
      });

      const ready = await this.machine.awaitReady(channel, {
        promptMarker: profile.promptMarker,
        timeoutMs: this.options.initialPromptTimeoutMs,
        quietPeriodMs: profile.quietPeriodMs,
      });
      if (ready.status !== 'Complete') {
        throw new ConnectError(
          'TargetUnreachable',
          'target',
          `No initial prompt "${profile.promptMarker}" from ${address} (${ready.status === 'Error' ? ready.error : 'timeout'})`
        );
      }

      log.info('Session open', { sessionId: session.id });
      return session;
    } catch (error) {
      this.release(deviceKey, entry);
      throw error;
    }
  }

  /** Safe to call repeatedly and after errors. */
  close(session: Session): void {
    if (!session.open) {
      return;
    }
    session.open = false;
    const entry = this.live.get(session.deviceKey);
    if (entry && entry.session === session) {
      this.release(session.deviceKey, entry);
    } else {
      session.channel.close();
    }
    logger.info('Session closed', { device: session.deviceKey, sessionId: session.id });
  }

  closeAll(): void {
    for (const entry of [...this.live.values()]) {
      if (entry.session) {
        this.close(entry.session);
      }
    }
  }

  isOpen(deviceKey: string): boolean {
    return this.live.get(deviceKey)?.session?.open ?? false;
  }

  private async dial(hop: ConnectHop, options: HopOptions): Promise<SshHop> {
    try {
      return await this.dialer.connect(options);
    } catch (error) {
      if (isAuthFailure(error)) {
        throw new ConnectError('AuthRejected', hop, `Authentication rejected by ${hop} ${options.host}`, error);
      }
      throw new ConnectError(
        hop === 'relay' ? 'RelayUnreachable' : 'TargetUnreachable',
        hop,
        `Cannot connect to ${hop} ${options.host}:${options.port}: ${errorMessage(error)}`,
        error
      );
    }
  }

  private release(deviceKey: string, entry: LiveEntry): void {
    if (entry.session) {
      entry.session.open = false;
      entry.session.channel.close();
    }
    for (const hop of [...entry.hops].reverse()) {
      hop.end();
    }
    entry.hops = [];
    if (this.live.get(deviceKey) === entry) {
      this.live.delete(deviceKey);
    }
  }
}

import { EventEmitter } from 'events';
import { StringDecoder } from 'string_decoder';
import type { Duplex } from 'stream';
import { Client } from 'ssh2';
import type { ClientChannel, SFTPWrapper } from 'ssh2';
import logger from '../utils/logger.js';
import { isRecord } from '../utils/output.js';
import type { RemoteEntry, RemoteFiles, ShellChannel } from '../types/device.js';

export interface HopOptions {
  host: string;
  port: number;
  username: string;
  password?: string;
  privateKey?: Buffer | string;
  readyTimeoutMs: number;
  /** Stream to run the handshake over instead of a new TCP socket */
  sock?: Duplex;
}

export interface SshHop {
  forwardOut(host: string, port: number): Promise<Duplex>;
  openShell(): Promise<ShellChannel>;
  files(): Promise<RemoteFiles>;
  end(): void;
}

export interface SshDialer {
  connect(options: HopOptions): Promise<SshHop>;
}

export interface ShellChannelEvents {
  data: (chunk: string) => void;
  close: () => void;
}

export declare interface SshShellChannel {
  on<U extends keyof ShellChannelEvents>(event: U, listener: ShellChannelEvents[U]): this;
  emit<U extends keyof ShellChannelEvents>(event: U, ...args: Parameters<ShellChannelEvents[U]>): boolean;
}

/** Decodes the ssh2 channel's byte stream into text events. */
export class SshShellChannel extends EventEmitter implements ShellChannel {
  private readonly decoder = new StringDecoder('utf8');
  private closed = false;

  constructor(private readonly stream: ClientChannel) {
    super();
    const onBytes = (data: Buffer): void => {
      const text = this.decoder.write(data);
      if (text.length > 0) {
        this.emit('data', text);
      }
    };
    stream.on('data', onBytes);
    stream.stderr.on('data', onBytes);
    stream.on('close', () => {
      this.closed = true;
      this.emit('close');
    });
  }

  write(data: string): void {
    if (this.closed) {
      throw new Error('Shell channel is closed');
    }
    this.stream.write(data);
  }

  close(): void {
    if (!this.closed) {
      this.stream.end();
    }
  }
}

const S_IFMT = 0o170000;
const S_IFREG = 0o100000;
const SFTP_NO_SUCH_FILE = 2;

function isMissing(error: Error): boolean {
  return isRecord(error) && error.code === SFTP_NO_SUCH_FILE;
}

function joinRemote(dir: string, name: string): string {
  return dir.endsWith('/') ? `${dir}${name}` : `${dir}/${name}`;
}

export class SftpFiles implements RemoteFiles {
  constructor(private readonly sftp: SFTPWrapper) {}

  stat(path: string): Promise<RemoteEntry | null> {
    return new Promise((resolve, reject) => {
      this.sftp.stat(path, (err, stats) => {
        if (err) {
          if (isMissing(err)) resolve(null);
          else reject(err);
          return;
        }
        resolve({ path, size: stats.size });
      });
    });
  }

  list(dir: string): Promise<RemoteEntry[]> {
    return new Promise((resolve, reject) => {
      this.sftp.readdir(dir, (err, entries) => {
        if (err) {
          if (isMissing(err)) resolve([]);
          else reject(err);
          return;
        }
        resolve(entries
          .filter((entry) => (entry.attrs.mode & S_IFMT) === S_IFREG)
          .map((entry) => ({ path: joinRemote(dir, entry.filename), size: entry.attrs.size })));
      });
    });
  }

  download(remotePath: string, localPath: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.sftp.fastGet(remotePath, localPath, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}

class Ssh2Hop implements SshHop {
  private sftp: Promise<RemoteFiles> | null = null;

  constructor(private readonly client: Client, private readonly label: string) {}

  forwardOut(host: string, port: number): Promise<Duplex> {
    return new Promise((resolve, reject) => {
      this.client.forwardOut('127.0.0.1', 0, host, port, (err, channel) => {
        if (err) reject(err);
        else resolve(channel);
      });
    });
  }

  openShell(): Promise<ShellChannel> {
    return new Promise((resolve, reject) => {
      this.client.shell({ term: 'vt100', cols: 200, rows: 50 }, (err, stream) => {
        if (err) reject(err);
        else resolve(new SshShellChannel(stream));
      });
    });
  }

  files(): Promise<RemoteFiles> {
    if (!this.sftp) {
      this.sftp = new Promise<RemoteFiles>((resolve, reject) => {
        this.client.sftp((err, sftp) => {
          if (err) {
            // A failed subsystem request may be asked for again
            this.sftp = null;
            reject(err);
            return;
          }
          resolve(new SftpFiles(sftp));
        });
      });
    }
    return this.sftp;
  }

  end(): void {
    logger.debug('Closing SSH hop', { hop: this.label });
    this.client.end();
  }
}

export class Ssh2Dialer implements SshDialer {
  connect(options: HopOptions): Promise<SshHop> {
    return new Promise((resolve, reject) => {
      const client = new Client();
      const label = `${options.username}@${options.host}:${options.port}`;
      let ready = false;

      client.on('ready', () => {
        ready = true;
        logger.debug('SSH hop ready', { hop: label });
        resolve(new Ssh2Hop(client, label));
      });

      client.on('error', (err) => {
        if (!ready) {
          reject(err);
          return;
        }
        logger.warn('SSH hop error', { hop: label, error: err.message });
      });

      client.connect({
        host: options.host,
        port: options.port,
        username: options.username,
        password: options.password,
        privateKey: options.privateKey,
        readyTimeout: options.readyTimeoutMs,
        sock: options.sock,
        keepaliveInterval: 15000,
      });
    });
  }
}

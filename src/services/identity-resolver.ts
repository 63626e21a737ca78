import { readFileSync } from 'fs';
import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import config from '../config/index.js';
import type { Config } from '../config/index.js';
import logger from '../utils/logger.js';
import { IdentityLookupError, errorMessage } from '../utils/errors.js';
import { normalizeHardwareId } from '../utils/output.js';

export interface DeviceIdentity {
  hardwareId: string;
  deviceKey: string;
  address: string;
  nodeIdentity: string;
  displayName: string;
}

export interface IdentityResolver {
  resolve(hardwareId: string): Promise<DeviceIdentity>;
}

const ipSchema = z.string().ip();
const ipv4Schema = z.string().ip({ version: 'v4' });
const HOSTNAME = /^(?=.{1,253}$)[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?(?:\.[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?)*$/i;

export function isAddress(value: string): boolean {
  return ipSchema.safeParse(value).success || HOSTNAME.test(value);
}

/** `24a1861dda90` -> `24:a1:86:1d:da:90`; other ids are returned unchanged. */
export function toColonMac(hardwareId: string): string {
  const key = normalizeHardwareId(hardwareId);
  return /^[0-9a-f]{12}$/.test(key) ? (key.match(/../g) ?? []).join(':') : hardwareId;
}

const queryResponseSchema = z.object({
  status: z.string(),
  error: z.string().optional(),
  data: z.object({
    result: z.array(z.object({ metric: z.record(z.string()) })),
  }).optional(),
});

export interface HttpIdentityOptions {
  baseUrl: string;
  metric: string;
  token?: string;
  timeoutMs?: number;
  /** Preconfigured client, e.g. one with a custom adapter */
  http?: AxiosInstance;
}

/**
 * Looks devices up in a Prometheus-compatible telemetry API. The instant
 * query selects the metric's series for the hardware id; the series labels
 * carry the addresses.
 */
export class HttpIdentityResolver implements IdentityResolver {
  private readonly http: AxiosInstance;
  private readonly metric: string;

  constructor(options: HttpIdentityOptions) {
    this.metric = options.metric;
    this.http = options.http ?? axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs ?? 15000,
      headers: options.token ? { Authorization: `Bearer ${options.token}` } : {},
    });
  }

  async resolve(hardwareId: string): Promise<DeviceIdentity> {
    const mac = toColonMac(hardwareId);
    const query = `${this.metric}{cmMacAddr="${mac}"}`;

    let body: unknown;
    try {
      const response = await this.http.get<unknown>('/api/v1/query', { params: { query } });
      body = response.data;
    } catch (error) {
      throw new IdentityLookupError('LookupFailed', `Identity lookup for ${mac} failed: ${errorMessage(error)}`, { hardwareId });
    }

    const parsed = queryResponseSchema.safeParse(body);
    if (!parsed.success || parsed.data.status !== 'success' || !parsed.data.data) {
      const reason = parsed.success ? parsed.data.error ?? parsed.data.status : 'unexpected response shape';
      throw new IdentityLookupError('LookupFailed', `Identity lookup for ${mac} failed: ${reason}`, { hardwareId });
    }

    const candidates = new Map<string, Record<string, string>>();
    for (const { metric } of parsed.data.data.result) {
      const address = pickAddress(metric);
      if (address && !candidates.has(address)) {
        candidates.set(address, metric);
      }
    }

    if (candidates.size === 0) {
      throw new IdentityLookupError('NotFound', `No address known for ${mac}`, { hardwareId });
    }
    if (candidates.size > 1) {
      throw new IdentityLookupError('Ambiguous', `${mac} maps to ${candidates.size} addresses: ${[...candidates.keys()].join(', ')}`, {
        hardwareId,
        addresses: [...candidates.keys()],
      });
    }

    const [[address, labels]] = [...candidates.entries()];
    logger.debug('Identity resolved', { hardwareId: mac, address });
    return {
      hardwareId: mac,
      deviceKey: normalizeHardwareId(hardwareId),
      address,
      nodeIdentity: labels.fnName ?? '',
      displayName: labels.cpeHostName ?? mac,
    };
  }
}

function pickAddress(labels: Record<string, string>): string | undefined {
  const ipv4 = labels.cpeIpv4Addr;
  if (ipv4 && ipv4 !== '0.0.0.0' && ipv4Schema.safeParse(ipv4).success) {
    return ipv4;
  }
  const ipv6 = labels.cpeIpv6Addr;
  if (ipv6 && ipSchema.safeParse(ipv6).success) {
    return ipv6;
  }
  return undefined;
}

const mappingSchema = z.record(z.union([
  z.string().min(1),
  z.object({
    address: z.string().min(1),
    nodeIdentity: z.string().optional(),
    displayName: z.string().optional(),
  }),
]));

export type IdentityMapping = z.infer<typeof mappingSchema>;

/** Fixed hardware id to address table, for labs and tests. */
export class StaticIdentityResolver implements IdentityResolver {
  private readonly entries = new Map<string, { address: string; nodeIdentity?: string; displayName?: string }>();

  constructor(mapping: IdentityMapping) {
    const parsed = mappingSchema.parse(mapping);
    for (const [hardwareId, entry] of Object.entries(parsed)) {
      const value = typeof entry === 'string' ? { address: entry } : entry;
      if (!isAddress(value.address)) {
        throw new IdentityLookupError('LookupFailed', `Invalid address "${value.address}" for ${hardwareId}`, { hardwareId });
      }
      this.entries.set(normalizeHardwareId(hardwareId), value);
    }
  }

  static fromFile(path: string): StaticIdentityResolver {
    try {
      return new StaticIdentityResolver(mappingSchema.parse(JSON.parse(readFileSync(path, 'utf-8'))));
    } catch (error) {
      if (error instanceof IdentityLookupError) {
        throw error;
      }
      throw new IdentityLookupError('LookupFailed', `Cannot load identity map ${path}: ${errorMessage(error)}`, { path });
    }
  }

  async resolve(hardwareId: string): Promise<DeviceIdentity> {
    const deviceKey = normalizeHardwareId(hardwareId);
    const entry = this.entries.get(deviceKey);
    if (!entry) {
      throw new IdentityLookupError('NotFound', `No address known for ${hardwareId}`, { hardwareId });
    }
    return {
      hardwareId,
      deviceKey,
      address: entry.address,
      nodeIdentity: entry.nodeIdentity ?? '',
      displayName: entry.displayName ?? hardwareId,
    };
  }
}

/**
 * Static map when IDENTITY_MAP_PATH is set, otherwise the telemetry API
 * configured for the environment selector.
 */
export function createIdentityResolver(environment: string, cfg: Config = config): IdentityResolver {
  if (cfg.paths.identityMap) {
    return StaticIdentityResolver.fromFile(cfg.paths.identityMap);
  }
  const selector = environment.toUpperCase();
  const baseUrl = cfg.lookup.environments[selector];
  if (!baseUrl) {
    throw new IdentityLookupError(
      'LookupFailed',
      `No lookup URL configured for environment ${selector} (set LOOKUP_URL_${selector})`,
      { environment: selector }
    );
  }
  return new HttpIdentityResolver({
    baseUrl,
    metric: cfg.lookup.metric,
    token: cfg.lookup.token,
    timeoutMs: cfg.lookup.timeoutMs,
  });
}

import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig } from '../config/index.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const cfg = loadConfig({});

    expect(cfg.nodeEnv).toBe('development');
    expect(cfg.logging.level).toBe('info');
    expect(cfg.session).toEqual({
      targetPort: 22,
      connectTimeoutMs: 90000,
      initialPromptTimeoutMs: 20000,
      quietPeriodMs: 300,
    });
    expect(cfg.persistence).toEqual({ attempts: 3, backoffMs: 50 });
    expect(cfg.run.deadlineMs).toBe(0);
    expect(cfg.relay.host).toBeUndefined();
    expect(cfg.paths.profiles.endsWith('config/device-profiles.json')).toBe(true);
  });

  it('collects one lookup URL per environment selector and skips blank ones', () => {
    const cfg = loadConfig({
      LOOKUP_URL_PROD: 'https://lookup.example.test',
      LOOKUP_URL_DEV: '  ',
      RELAY_HOST: 'relay.example.test',
      RELAY_USERNAME: 'operator',
    });

    expect(cfg.lookup.environments).toEqual({ PROD: 'https://lookup.example.test' });
    expect(cfg.relay.host).toBe('relay.example.test');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'chatty' })).toThrow(ZodError);
    expect(() => loadConfig({ RELAY_PORT: '70000' })).toThrow(ZodError);
  });
});

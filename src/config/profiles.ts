import { readFileSync } from 'fs';
import { z } from 'zod';
import config from './index.js';
import { ProfileCatalogError, errorMessage } from '../utils/errors.js';

const captureSchema = z.object({
  key: z.string().min(1),
  pattern: z.string().min(1),
  /** No match fails the step */
  required: z.boolean().default(false),
});

const stepSchema = z.object({
  command: z.string(),
  validation: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]).optional(),
  delayBeforePromptMs: z.number().int().nonnegative().optional(),
  timeoutMs: z.number().int().positive().optional(),
  promptMarker: z.string().min(1).optional(),
  awaitPrompt: z.boolean().default(true),
  capture: z.array(captureSchema).default([]),
  // Readback: captured key -> expected value, numeric when both sides parse
  expect: z.record(z.union([z.string(), z.number()])).optional(),
  repeat: z.object({
    range: z.string().min(1),
    as: z.string().regex(/^\w+$/),
  }).optional(),
  retry: z.object({
    attempts: z.number().int().min(1).max(10),
    backoffMs: z.number().int().nonnegative().default(2000),
  }).optional(),
});

const artifactSchema = z.object({
  remotePath: z.string().min(1),
  minSize: z.number().int().nonnegative().default(1),
  localName: z.string().min(1).optional(),
});

const taskSchema = z.object({
  description: z.string().optional(),
  steps: z.array(stepSchema).min(1),
  requires: z.array(z.string().min(1)).default([]),
  timeoutMs: z.number().int().positive().optional(),
  artifacts: z.array(artifactSchema).default([]),
});

const prerequisiteSchema = z.object({
  setup: z.array(stepSchema).min(1),
  teardown: z.array(stepSchema).default([]),
});

const parameterValue = z.union([z.string(), z.number(), z.boolean()]);

const profileSchema = z.object({
  description: z.string().optional(),
  username: z.string().min(1),
  password: z.string().default(''),
  promptMarker: z.string().min(1),
  promptMarkers: z.record(z.string().min(1)).default({}),
  lineTerminator: z.string().default('\n'),
  defaultTimeoutMs: z.number().int().positive().default(20000),
  quietPeriodMs: z.number().int().nonnegative().optional(),
  parameters: z.record(parameterValue).default({}),
  prerequisites: z.record(prerequisiteSchema).default({}),
  tasks: z.record(taskSchema),
});

const catalogSchema = z.record(profileSchema);

type ProfileShape = z.infer<typeof profileSchema>;

export type StepTemplate = z.infer<typeof stepSchema>;
export type TaskTemplate = z.infer<typeof taskSchema>;
export type PrerequisiteTemplate = z.infer<typeof prerequisiteSchema>;
export type ArtifactTemplate = z.infer<typeof artifactSchema>;
export type ParameterValue = z.infer<typeof parameterValue>;

export type DeepReadonly<T> = T extends ReadonlyArray<infer U>
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type DeviceProfile = DeepReadonly<Omit<ProfileShape, 'quietPeriodMs'> & { image: string; quietPeriodMs: number }>;
export type ProfileCatalog = ReadonlyMap<string, DeviceProfile>;

export interface ProfileOverrides {
  /** Replaces the profile default and every task-level timeout. */
  timeoutMs?: number;
  parameters?: Record<string, ParameterValue>;
}

function deepFreeze<T>(value: T): DeepReadonly<T>;
function deepFreeze(value: unknown): unknown {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/** Values a profile inherits when it sets none of its own. */
export interface CatalogDefaults {
  quietPeriodMs: number;
}

export function parseProfiles(
  raw: unknown,
  source = 'profile catalog',
  defaults: CatalogDefaults = { quietPeriodMs: config.session.quietPeriodMs }
): ProfileCatalog {
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProfileCatalogError(`Invalid ${source}: ${parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ')}`);
  }

  const catalog = new Map<string, DeviceProfile>();
  for (const [image, profile] of Object.entries(parsed.data)) {
    for (const [task, template] of Object.entries(profile.tasks)) {
      const unknown = template.requires.filter((id) => !(id in profile.prerequisites));
      if (unknown.length > 0) {
        throw new ProfileCatalogError(
          `Task ${image}/${task} requires unknown prerequisite(s): ${unknown.join(', ')}`
        );
      }
    }
    catalog.set(image, deepFreeze({ ...profile, image, quietPeriodMs: profile.quietPeriodMs ?? defaults.quietPeriodMs }));
  }
  return catalog;
}

export function loadProfiles(path: string = config.paths.profiles): ProfileCatalog {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ProfileCatalogError(`Cannot read profile catalog ${path}: ${errorMessage(error)}`, { path });
  }
  return parseProfiles(raw, `profile catalog ${path}`);
}

export function getProfile(catalog: ProfileCatalog, image: string): DeviceProfile {
  const profile = catalog.get(image);
  if (!profile) {
    throw new ProfileCatalogError(`Unknown image tag "${image}" (known: ${[...catalog.keys()].join(', ')})`, { image });
  }
  return profile;
}

export function supportedTasks(profile: DeviceProfile): string[] {
  return Object.keys(profile.tasks);
}

/**
 * Derived frozen copy with invocation overrides applied. The source profile
 * is never touched, so workers sharing the catalog never see each other's
 * overrides.
 */
export function withOverrides(profile: DeviceProfile, overrides: ProfileOverrides): DeviceProfile {
  const { timeoutMs, parameters } = overrides;
  if (timeoutMs === undefined && parameters === undefined) {
    return profile;
  }

  const tasks: Record<string, DeviceProfile['tasks'][string]> = {};
  for (const [name, task] of Object.entries(profile.tasks)) {
    tasks[name] = timeoutMs === undefined ? task : { ...task, timeoutMs: undefined };
  }

  return deepFreeze({
    ...profile,
    defaultTimeoutMs: timeoutMs ?? profile.defaultTimeoutMs,
    parameters: { ...profile.parameters, ...parameters },
    tasks,
  });
}

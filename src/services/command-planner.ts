import { PlanningError, errorMessage } from '../utils/errors.js';
import logger from '../utils/logger.js';
import type {
  CaptureRule,
  CommandStep,
  DeviceProfile,
  ParameterValue,
  PlanContext,
  RetrievalSpec,
  TaskSequence,
} from '../types/device.js';

export interface SubBand {
  index: number;
  start: number;
  end: number;
  width: number;
}

const UNIT: Record<string, number> = { '': 1, K: 1e3, M: 1e6, G: 1e9 };
const VALUE = String.raw`(\d+(?:\.\d+)?)\s*([KMG]?)`;
const RANGE_PATTERN = new RegExp(`^${VALUE}\\s*-\\s*${VALUE}\\s*\\(\\s*${VALUE}\\s*\\)$`, 'i');
const SINGLE_PATTERN = new RegExp(`^${VALUE}\\s*\\(\\s*${VALUE}\\s*\\)$`, 'i');
const PLACEHOLDER = /\{\{\s*([\w.-]+)\s*\}\}/g;

function toHz(value: string, unit: string): number {
  return parseFloat(value) * UNIT[unit.toUpperCase()];
}

// Twelve significant digits absorb binary rounding (0.7 + 2 * 0.1 -> 0.9)
function settle(value: number): number {
  return Number(value.toPrecision(12));
}

/**
 * Expands `A-B(S)` into contiguous sub-bands of width S covering [A, B); the
 * last one is clipped at B. `C(W)` is a single band. Comma-separated lists
 * are concatenated. Units K, M and G scale by powers of 1000.
 */
export function expandRange(expression: string): SubBand[] {
  const bands: SubBand[] = [];
  const parts = expression.split(',').map((part) => part.trim());

  for (const part of parts) {
    const range = RANGE_PATTERN.exec(part);
    if (range) {
      const start = toHz(range[1], range[2]);
      const stop = toHz(range[3], range[4]);
      const step = toHz(range[5], range[6]);
      if (!(step > 0) || !(start < stop)) {
        throw new PlanningError('InvalidRange', `Range "${part}" needs start < end and a positive step`, { expression });
      }
      const count = Math.ceil(settle((stop - start) / step));
      for (let i = 0; i < count; i++) {
        const bandStart = settle(start + i * step);
        if (bandStart >= stop) {
          break;
        }
        const bandEnd = Math.min(settle(bandStart + step), stop);
        bands.push({ index: bands.length, start: bandStart, end: bandEnd, width: settle(bandEnd - bandStart) });
      }
      continue;
    }

    const single = SINGLE_PATTERN.exec(part);
    if (single) {
      const start = toHz(single[1], single[2]);
      const width = toHz(single[3], single[4]);
      if (!(width > 0)) {
        throw new PlanningError('InvalidRange', `Band "${part}" needs a positive width`, { expression });
      }
      bands.push({ index: bands.length, start, end: start + width, width });
      continue;
    }

    throw new PlanningError('InvalidRange', `Malformed range "${part}"`, { expression });
  }

  return bands;
}

type Scope = Record<string, ParameterValue>;

function owns(scope: Scope, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(scope, name);
}

type TaskSpec = DeviceProfile['tasks'][string];
type StepSpec = TaskSpec['steps'][number];

class Resolver {
  private readonly scopes: Scope[];

  constructor(profile: DeviceProfile, context: PlanContext) {
    const state: Scope = {};
    for (const [key, value] of Object.entries(context.state ?? {})) {
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        state[key] = value;
      }
    }
    // Earlier scopes win
    this.scopes = [
      { deviceKey: context.deviceKey },
      context.parameters ?? {},
      state,
      profile.parameters,
    ];
  }

  lookup(name: string, locals: Scope): ParameterValue | undefined {
    if (owns(locals, name)) {
      return locals[name];
    }
    for (const scope of this.scopes) {
      if (owns(scope, name)) {
        return scope[name];
      }
    }
    return undefined;
  }

  render(template: string, locals: Scope, where: string): string {
    return template.replace(PLACEHOLDER, (_match, name: string) => {
      const value = this.lookup(name, locals);
      if (value === undefined) {
        throw new PlanningError('UnresolvedParameter', `Unresolved placeholder {{${name}}} in ${where}`, { name });
      }
      return String(value);
    });
  }
}

function compileCaptures(rules: StepSpec['capture'], where: string): CaptureRule[] {
  return rules.map((rule) => {
    try {
      return { key: rule.key, pattern: new RegExp(rule.pattern, 'm'), required: rule.required };
    } catch (error) {
      throw new PlanningError('InvalidTask', `Invalid capture pattern for "${rule.key}" in ${where}`, {
        pattern: rule.pattern,
        cause: errorMessage(error),
      });
    }
  });
}

/**
 * Turns a device profile's declarative templates into the ordered step list
 * a worker executes. Everything that can be rejected is rejected here,
 * before any connection is opened.
 */
export class CommandPlanner {
  generate(profile: DeviceProfile, selectedTasks: readonly string[], context: PlanContext): TaskSequence[] {
    const tasks = [...new Set(selectedTasks)];
    if (tasks.length === 0) {
      throw new PlanningError('InvalidTask', 'No task requested');
    }
    const unknown = tasks.filter((name) => !Object.prototype.hasOwnProperty.call(profile.tasks, name));
    if (unknown.length > 0) {
      throw new PlanningError(
        'InvalidTask',
        `Task(s) ${unknown.join(', ')} not supported by image ${profile.image} (supported: ${Object.keys(profile.tasks).join(', ')})`,
        { image: profile.image, tasks: unknown }
      );
    }

    const resolver = new Resolver(profile, context);

    // First and last position of every prerequisite among the requested tasks
    const first = new Map<string, number>();
    const last = new Map<string, number>();
    tasks.forEach((name, position) => {
      for (const id of profile.tasks[name].requires) {
        if (!first.has(id)) first.set(id, position);
        last.set(id, position);
      }
    });

    const sequences: TaskSequence[] = [];
    tasks.forEach((name, position) => {
      const template = profile.tasks[name];

      for (const id of template.requires) {
        if (first.get(id) === position) {
          const prerequisite = profile.prerequisites[id];
          sequences.push({
            name: `${id}:setup`,
            kind: 'setup',
            steps: this.resolveSteps(profile, prerequisite.setup, undefined, resolver, `prerequisite ${id}`),
            artifacts: [],
          });
        }
      }

      sequences.push({
        name,
        kind: 'task',
        steps: this.resolveSteps(profile, template.steps, template.timeoutMs, resolver, `task ${name}`),
        artifacts: this.resolveArtifacts(name, template, resolver),
      });

      const closing = [...first.keys()]
        .filter((id) => last.get(id) === position && profile.prerequisites[id].teardown.length > 0)
        .reverse();
      for (const id of closing) {
        sequences.push({
          name: `${id}:teardown`,
          kind: 'teardown',
          steps: this.resolveSteps(profile, profile.prerequisites[id].teardown, undefined, resolver, `prerequisite ${id}`),
          artifacts: [],
        });
      }
    });

    logger.debug('Planned sequences', {
      device: context.deviceKey,
      sequences: sequences.map((sequence) => `${sequence.name}(${sequence.steps.length})`),
    });
    return sequences;
  }

  private resolveSteps(
    profile: DeviceProfile,
    templates: readonly StepSpec[],
    taskTimeoutMs: number | undefined,
    resolver: Resolver,
    where: string
  ): CommandStep[] {
    const steps: CommandStep[] = [];
    for (const template of templates) {
      const iterations: Scope[] = [{}];
      if (template.repeat) {
        const { as } = template.repeat;
        const range = resolver.render(template.repeat.range, {}, where);
        iterations.splice(0, 1, ...expandRange(range).map((band) => ({
          [as]: band.start,
          [`${as}_end`]: band.end,
          [`${as}_width`]: band.width,
          [`${as}_center`]: band.start + band.width / 2,
          [`${as}_index`]: band.index,
        })));
      }

      const captures = compileCaptures(template.capture, where);
      const marker = template.promptMarker;
      const promptMarker = marker === undefined
        ? profile.promptMarker
        : profile.promptMarkers[marker] ?? marker;

      for (const locals of iterations) {
        const validation = template.validation === undefined
          ? undefined
          : (typeof template.validation === 'string' ? [template.validation] : template.validation)
            .map((text) => resolver.render(text, locals, where));

        steps.push({
          command: resolver.render(template.command, locals, where),
          validation,
          delayBeforePromptMs: template.delayBeforePromptMs ?? 0,
          timeoutMs: template.timeoutMs ?? taskTimeoutMs ?? profile.defaultTimeoutMs,
          promptMarker,
          awaitPrompt: template.awaitPrompt,
          quietPeriodMs: profile.quietPeriodMs,
          lineTerminator: profile.lineTerminator,
          captures,
          expect: this.resolveExpect(template, captures, resolver, locals, where),
          retry: template.retry ? { ...template.retry } : undefined,
        });
      }
    }
    return steps;
  }

  private resolveExpect(
    template: StepSpec,
    captures: readonly CaptureRule[],
    resolver: Resolver,
    locals: Scope,
    where: string
  ): Record<string, string> | undefined {
    if (!template.expect) {
      return undefined;
    }
    const expected: Record<string, string> = {};
    for (const [key, value] of Object.entries(template.expect)) {
      if (!captures.some((rule) => rule.key === key)) {
        throw new PlanningError('InvalidTask', `Expected value for "${key}" has no capture rule in ${where}`, { key });
      }
      expected[key] = typeof value === 'number' ? String(value) : resolver.render(value, locals, where);
    }
    return expected;
  }

  private resolveArtifacts(task: string, template: TaskSpec, resolver: Resolver): RetrievalSpec[] {
    return template.artifacts.map((artifact) => ({
      task,
      remotePath: resolver.render(artifact.remotePath, {}, `artifacts of ${task}`),
      minSize: artifact.minSize,
      localName: artifact.localName === undefined
        ? undefined
        : resolver.render(artifact.localName, {}, `artifacts of ${task}`),
    }));
  }
}

export interface CaptureCheck {
  values: Record<string, string>;
  /** One line per missing required capture or mismatched readback value */
  problems: string[];
}

function sameValue(found: string, expected: string): boolean {
  const a = Number(found);
  const b = Number(expected);
  if (found.trim() !== '' && expected.trim() !== '' && Number.isFinite(a) && Number.isFinite(b)) {
    return a === b;
  }
  return found.toLowerCase() === expected.toLowerCase();
}

/**
 * Captures a completed step's values and checks them against its required
 * rules and expected readback values. An empty expected value is not checked.
 */
export function checkCaptures(step: Pick<CommandStep, 'captures' | 'expect'>, output: string): CaptureCheck {
  const values = applyCaptures(step.captures, output);
  const expected = step.expect ?? {};
  const problems: string[] = [];

  for (const rule of step.captures) {
    if (rule.required && values[rule.key] === undefined && !expected[rule.key]) {
      problems.push(`${rule.key}: not found`);
    }
  }
  for (const [key, value] of Object.entries(expected)) {
    if (value === '') {
      continue;
    }
    const found = values[key];
    if (found === undefined) {
      problems.push(`${key}: expected ${value}, not found`);
    } else if (!sameValue(found, value)) {
      problems.push(`${key}: expected ${value}, found ${found}`);
    }
  }
  return { values, problems };
}

/** Applies a step's capture rules to its normalized output. */
export function applyCaptures(captures: readonly CaptureRule[], output: string): Record<string, string> {
  const found: Record<string, string> = {};
  for (const rule of captures) {
    const match = rule.pattern.exec(output);
    if (match) {
      found[rule.key] = (match[1] ?? match[0]).trim();
    }
  }
  return found;
}


import { InvalidArgumentError } from 'commander';
import type { ParameterValue } from './types/device.js';

export function parseInteger(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

/** Rejects 0 too; a zero step timeout would fail every step at once. */
export function parsePositiveInteger(value: string): number {
  const parsed = parseInteger(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/** `key=value` pairs; numeric values become numbers. */
export function parseParams(pairs: string[]): Record<string, ParameterValue> {
  const parameters: Record<string, ParameterValue> = {};
  for (const pair of pairs) {
    const index = pair.indexOf('=');
    if (index <= 0) {
      throw new InvalidArgumentError(`Parameter "${pair}" is not key=value.`);
    }
    const value = pair.slice(index + 1);
    parameters[pair.slice(0, index)] = /^-?\d+(\.\d+)?$/.test(value) ? Number(value) : value;
  }
  return parameters;
}

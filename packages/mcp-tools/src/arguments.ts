/**
 * Argument normalization
 *
 * Turns the untyped argument bag of a tool call into values the tool can use, driven only
 * by the tool's parameter map. Lenient by contract: bad integers fall back to defaults and
 * oversized ones are clamped. Only required parameters and datetimes can fail.
 */

import { ValidationFailedError } from '@outlook-connector/core';
import { DATETIME_EXAMPLE, parseDateTimeArgument } from './datetime.js';
import type { ArgumentValue, ParameterMap, ParameterSpec } from './types.js';

/**
 * Read access to normalized arguments
 */
export class ToolArguments {
  constructor(private readonly values: ReadonlyMap<string, ArgumentValue>) {}

  has(name: string): boolean {
    return this.values.has(name);
  }

  /** Integer parameters always carry a default, so a value is always present */
  integer(name: string): number {
    const value = this.values.get(name);
    if (typeof value !== 'number') {
      throw new Error(`Argument ${name} is not a normalized integer`);
    }
    return value;
  }

  string(name: string): string {
    const value = this.optionalString(name);
    if (value === undefined) {
      throw new Error(`Argument ${name} is not a normalized string`);
    }
    return value;
  }

  optionalString(name: string): string | undefined {
    const value = this.values.get(name);
    return typeof value === 'string' ? value : undefined;
  }

  stringList(name: string): string[] | undefined {
    const value = this.values.get(name);
    return Array.isArray(value) ? [...value] : undefined;
  }

  toJSON(): Record<string, ArgumentValue> {
    return Object.fromEntries(this.values);
  }
}

/**
 * `+Infinity` (e.g. `1e400` after JSON parsing) is kept so it can be clamped
 */
function toInteger(raw: unknown): number | undefined {
  let value = Number.NaN;
  if (typeof raw === 'number') {
    value = raw;
  } else if (typeof raw === 'string' && raw.trim() !== '') {
    value = Number(raw.trim());
  }
  if (Number.isNaN(value) || value === Number.NEGATIVE_INFINITY) {
    return undefined;
  }
  return Math.trunc(value);
}

function normalizeInteger(raw: unknown, spec: ParameterSpec): number | undefined {
  const fallback = typeof spec.default === 'number' ? spec.default : undefined;
  const value = toInteger(raw);

  if (value === undefined || (spec.minimum !== undefined && value < spec.minimum)) {
    return fallback;
  }
  if (spec.maximum !== undefined && value > spec.maximum) {
    return spec.maximum;
  }
  return Number.isFinite(value) ? value : fallback;
}

function normalizeString(raw: unknown, spec: ParameterSpec): string | undefined {
  if (typeof raw === 'string' && raw !== '') {
    return raw;
  }
  return typeof spec.default === 'string' ? spec.default : undefined;
}

function normalizeStringList(raw: unknown): string[] | undefined {
  if (typeof raw === 'string') {
    return raw === '' ? undefined : [raw];
  }
  if (Array.isArray(raw)) {
    return raw.filter((item): item is string => typeof item === 'string' && item !== '');
  }
  return undefined;
}

function normalizeDateTime(field: string, raw: unknown, spec: ParameterSpec): string | undefined {
  const value = normalizeString(raw, spec);
  if (value === undefined) {
    return undefined;
  }

  const canonical = parseDateTimeArgument(value);
  if (canonical === null) {
    throw new ValidationFailedError(field, `Could not parse ${field}: ${value}`, DATETIME_EXAMPLE);
  }
  return canonical;
}

function normalizeValue(field: string, raw: unknown, spec: ParameterSpec): ArgumentValue | undefined {
  switch (spec.type) {
    case 'integer':
      return normalizeInteger(raw, spec);
    case 'string':
      return normalizeString(raw, spec);
    case 'string[]':
      return normalizeStringList(raw);
    case 'datetime':
      return normalizeDateTime(field, raw, spec);
  }
}

/**
 * Normalize every declared parameter. Undeclared arguments are dropped.
 */
export function normalizeArguments(
  parameters: ParameterMap,
  raw: Record<string, unknown> = {}
): ToolArguments {
  const values = new Map<string, ArgumentValue>();

  for (const [field, spec] of Object.entries(parameters)) {
    const value = normalizeValue(field, raw[field], spec);
    if (value === undefined) {
      if (spec.required) {
        throw new ValidationFailedError(field, `Missing required argument: ${field}`);
      }
      continue;
    }
    values.set(field, value);
  }

  return new ToolArguments(values);
}

/**
 * Centralized argument validation for tool invocations
 *
 * Tools declare their parameters as a JSON-Schema object; the dispatcher
 * validates every raw payload against it before a handler runs, so handlers
 * never see unknown, missing or mistyped parameters.
 *
 * Coercion is applied only where it is unambiguous:
 * - numeric strings → number / integer
 * - "true" / "false" (any case) → boolean
 */

import { ValidationError } from '../errors/mcpErrors.js';

export type ParameterType = 'string' | 'number' | 'integer' | 'boolean' | 'array';

export type ArgumentValue = string | number | boolean | string[];

export interface ParameterSchema {
  type: ParameterType;
  description: string;
  default?: string | number | boolean;
  enum?: readonly string[];
  /** Arrays hold strings only */
  items?: { type: 'string' };
  minLength?: number;
  /** JSON-Schema regular expression the whole string must match */
  pattern?: string;
  minItems?: number;
  minimum?: number;
  maximum?: number;
  examples?: readonly unknown[];
}

export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, ParameterSchema>;
  required?: string[];
  additionalProperties: false;
}

export type ToolArguments = Record<string, ArgumentValue>;

const NUMERIC = /^\s*[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?\s*$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export class MCPValidator {

  /**
   * Validate a raw argument payload against a tool's input schema.
   * Returns the coerced arguments with defaults applied.
   *
   * @throws {ValidationError} on the first violation found
   */
  static validateArguments(schema: ToolInputSchema, raw: unknown): ToolArguments {
    if (raw === undefined || raw === null) {
      raw = {};
    }
    if (!isRecord(raw)) {
      throw new ValidationError('arguments', `expected an object, got ${describe(raw)}`);
    }

    for (const field of Object.keys(raw)) {
      if (!Object.prototype.hasOwnProperty.call(schema.properties, field)) {
        throw new ValidationError(field, 'unknown parameter');
      }
    }

    const required = new Set(schema.required ?? []);
    const result: ToolArguments = {};

    for (const [field, parameter] of Object.entries(schema.properties)) {
      const value = raw[field];
      if (value === undefined || value === null) {
        if (required.has(field)) {
          throw new ValidationError(field, 'is required');
        }
        if (parameter.default !== undefined) {
          result[field] = parameter.default;
        }
        continue;
      }
      result[field] = this.validateParameter(field, parameter, value);
    }

    return result;
  }

  /**
   * Coerce and check one value against its parameter schema
   */
  static validateParameter(field: string, parameter: ParameterSchema, value: unknown): ArgumentValue {
    switch (parameter.type) {
      case 'string':
        return this.validateString(field, parameter, value);
      case 'number':
      case 'integer':
        return this.validateNumber(field, parameter, value);
      case 'boolean':
        return this.validateBoolean(field, value);
      case 'array':
        return this.validateArray(field, parameter, value);
    }
  }

  private static validateString(field: string, parameter: ParameterSchema, value: unknown): string {
    if (typeof value !== 'string') {
      throw new ValidationError(field, `expected string, got ${describe(value)}`, value);
    }
    if (parameter.minLength !== undefined && value.length < parameter.minLength) {
      throw new ValidationError(field, `must be at least ${parameter.minLength} characters long`, value);
    }
    if (parameter.pattern !== undefined && !new RegExp(parameter.pattern, 'u').test(value)) {
      throw new ValidationError(field, `must match pattern ${parameter.pattern}`, value);
    }
    if (parameter.enum && !parameter.enum.includes(value)) {
      throw new ValidationError(field, `must be one of: ${parameter.enum.join(', ')}`, value);
    }
    return value;
  }

  private static validateNumber(field: string, parameter: ParameterSchema, value: unknown): number {
    let number: number;
    if (typeof value === 'number') {
      number = value;
    } else if (typeof value === 'string' && NUMERIC.test(value)) {
      number = Number(value);
    } else {
      throw new ValidationError(field, `expected ${parameter.type}, got ${describe(value)}`, value);
    }

    if (!Number.isFinite(number)) {
      throw new ValidationError(field, 'must be a finite number', value);
    }
    if (parameter.type === 'integer' && !Number.isInteger(number)) {
      throw new ValidationError(field, 'must be an integer', value);
    }
    if (parameter.minimum !== undefined && number < parameter.minimum) {
      throw new ValidationError(field, `must be at least ${parameter.minimum}`, value);
    }
    if (parameter.maximum !== undefined && number > parameter.maximum) {
      throw new ValidationError(field, `must be at most ${parameter.maximum}`, value);
    }
    return number;
  }

  private static validateBoolean(field: string, value: unknown): boolean {
    if (typeof value === 'boolean') {
      return value;
    }
    if (typeof value === 'string') {
      const normalized = value.trim().toLowerCase();
      if (normalized === 'true') return true;
      if (normalized === 'false') return false;
    }
    throw new ValidationError(field, `expected boolean, got ${describe(value)}`, value);
  }

  private static validateArray(field: string, parameter: ParameterSchema, value: unknown): string[] {
    if (!Array.isArray(value)) {
      throw new ValidationError(field, `expected array, got ${describe(value)}`, value);
    }
    const items: string[] = [];
    for (const [index, item] of value.entries()) {
      if (typeof item !== 'string') {
        throw new ValidationError(`${field}[${index}]`, `expected string, got ${describe(item)}`, item);
      }
      items.push(item);
    }
    if (parameter.minItems !== undefined && items.length < parameter.minItems) {
      throw new ValidationError(field, `must contain at least ${parameter.minItems} items`, value);
    }
    return items;
  }
}

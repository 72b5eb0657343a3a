/**
 * Shared parameter schemas for filesystem tools
 */

import type { ParameterSchema } from '../../../utils/validation.js';

export const PATH_SCHEMA: ParameterSchema = {
  type: 'string',
  description: 'Path relative to the cloud drive root, e.g. "My Files/reports". Use "/" for the root.',
  minLength: 1,
  examples: ['/', 'My Files', 'My Files/reports/q3.xlsx']
};

export const SOURCE_SCHEMA: ParameterSchema = {
  type: 'string',
  description: 'Source file or directory path',
  minLength: 1
};

export const DESTINATION_SCHEMA: ParameterSchema = {
  type: 'string',
  description: 'Destination path',
  minLength: 1
};

export const PATHS_SCHEMA: ParameterSchema = {
  type: 'array',
  description: 'File or directory paths',
  items: { type: 'string' },
  minItems: 1,
  examples: [['My Files/old.txt', 'My Files/archive']]
};

export const INCLUDE_DELETED_SCHEMA: ParameterSchema = {
  type: 'boolean',
  description: 'Include deleted files and directories',
  default: false
};

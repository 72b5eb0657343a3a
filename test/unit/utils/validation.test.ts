import { expect } from 'chai';
import { describe, it } from 'mocha';
import { ValidationError } from '../../../src/errors/mcpErrors.js';
import { MCPValidator, type ToolInputSchema } from '../../../src/utils/validation.js';

const schema: ToolInputSchema = {
  type: 'object',
  properties: {
    path: { type: 'string', description: 'Path', minLength: 1 },
    recursive: { type: 'boolean', description: 'Recurse', default: false },
    limit: { type: 'integer', description: 'Limit', minimum: 1, maximum: 100 },
    ratio: { type: 'number', description: 'Ratio' },
    access: { type: 'string', description: 'Access', enum: ['RO', 'RW'] },
    name: { type: 'string', description: 'Name', pattern: '^[^/]+$' },
    paths: { type: 'array', description: 'Paths', items: { type: 'string' }, minItems: 1 }
  },
  required: ['path'],
  additionalProperties: false
};

function validationMessage(raw: unknown): string {
  try {
    MCPValidator.validateArguments(schema, raw);
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.message;
    }
    throw error;
  }
  throw new Error('Expected validation to fail');
}

describe('MCPValidator', () => {
  it('should apply defaults to missing optional parameters', () => {
    expect(MCPValidator.validateArguments(schema, { path: '/' })).to.deep.equal({ path: '/', recursive: false });
  });

  it('should coerce numeric strings and boolean words', () => {
    const args = MCPValidator.validateArguments(schema, { path: '/', recursive: 'TRUE', limit: ' 10 ', ratio: '2.5e1' });
    expect(args).to.deep.equal({ path: '/', recursive: true, limit: 10, ratio: 25 });
  });

  it('should reject a missing required parameter', () => {
    expect(validationMessage({})).to.equal('Invalid argument "path": is required');
    expect(validationMessage({ path: null })).to.equal('Invalid argument "path": is required');
  });

  it('should treat absent arguments as an empty object', () => {
    expect(validationMessage(undefined)).to.equal('Invalid argument "path": is required');
  });

  it('should reject arguments that are not an object', () => {
    expect(validationMessage(['/'])).to.equal('Invalid argument "arguments": expected an object, got array');
    expect(validationMessage('/')).to.equal('Invalid argument "arguments": expected an object, got string');
  });

  it('should reject unknown parameters', () => {
    expect(validationMessage({ path: '/', force: true })).to.equal('Invalid argument "force": unknown parameter');
  });

  it('should reject type mismatches that cannot be coerced', () => {
    expect(validationMessage({ path: 5 })).to.equal('Invalid argument "path": expected string, got number');
    expect(validationMessage({ path: '/', recursive: 'yes' })).to.equal('Invalid argument "recursive": expected boolean, got string');
    expect(validationMessage({ path: '/', limit: 'ten' })).to.equal('Invalid argument "limit": expected integer, got string');
    expect(validationMessage({ path: '/', paths: 'a' })).to.equal('Invalid argument "paths": expected array, got string');
  });

  it('should check string constraints', () => {
    expect(validationMessage({ path: '' })).to.equal('Invalid argument "path": must be at least 1 characters long');
    expect(validationMessage({ path: '/', access: 'RX' })).to.equal('Invalid argument "access": must be one of: RO, RW');
    expect(validationMessage({ path: '/', name: 'a/b' })).to.equal('Invalid argument "name": must match pattern ^[^/]+$');
  });

  it('should check numeric constraints', () => {
    expect(validationMessage({ path: '/', limit: 1.5 })).to.equal('Invalid argument "limit": must be an integer');
    expect(validationMessage({ path: '/', limit: 0 })).to.equal('Invalid argument "limit": must be at least 1');
    expect(validationMessage({ path: '/', limit: '101' })).to.equal('Invalid argument "limit": must be at most 100');
  });

  it('should check array items and length', () => {
    expect(validationMessage({ path: '/', paths: [] })).to.equal('Invalid argument "paths": must contain at least 1 items');
    expect(validationMessage({ path: '/', paths: ['a', 3] })).to.equal('Invalid argument "paths[1]": expected string, got number');
  });
});

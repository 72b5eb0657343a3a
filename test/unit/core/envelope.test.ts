import { expect } from 'chai';
import { describe, it } from 'mocha';
import {
  failure,
  httpStatusOf,
  kindOf,
  parseEnvelope,
  redact,
  serializeEnvelope,
  success,
  toEnvelope,
  toWire,
  UNEXPECTED_FAILURE_MESSAGE
} from '../../../src/core/envelope.js';
import {
  AuthenticationError,
  BackendError,
  ForbiddenError,
  SessionExpiredError,
  UnknownToolError,
  ValidationError
} from '../../../src/errors/mcpErrors.js';

describe('Result envelope', () => {
  describe('kindOf', () => {
    it('should classify the error taxonomy', () => {
      expect(kindOf(new UnknownToolError('x'))).to.equal('UnknownTool');
      expect(kindOf(new ForbiddenError('x', 'admin', 'user'))).to.equal('Forbidden');
      expect(kindOf(new ValidationError('path', 'is required'))).to.equal('InvalidArgument');
      expect(kindOf(new AuthenticationError('rejected'))).to.equal('Auth');
      expect(kindOf(new SessionExpiredError())).to.equal('Auth');
      expect(kindOf(new BackendError('timeout'))).to.equal('Backend');
      expect(kindOf(new RangeError('out of range'))).to.equal('Backend');
      expect(kindOf('a thrown string')).to.equal('Backend');
    });
  });

  describe('toEnvelope', () => {
    it('should wrap a successful value', () => {
      expect(toEnvelope({ ok: true, value: ['a'] })).to.deep.equal({ ok: true, payload: ['a'] });
    });

    it('should keep the message of a classified error', () => {
      const envelope = toEnvelope({ ok: false, error: new ValidationError('path', 'is required') });
      expect(envelope).to.deep.equal({ ok: false, kind: 'InvalidArgument', message: 'Invalid argument "path": is required' });
    });

    it('should append backend detail', () => {
      const envelope = toEnvelope({ ok: false, error: new BackendError('Portal request POST /api/ failed with status 500', 500, 'disk full') });
      expect(envelope).to.deep.equal({
        ok: false,
        kind: 'Backend',
        message: 'Portal request POST /api/ failed with status 500: disk full'
      });
    });

    it('should hide the message of an unclassified error', () => {
      const envelope = toEnvelope({ ok: false, error: new Error('at Object.<anonymous> (/srv/app/secret.js:1:1)') });
      expect(envelope).to.deep.equal({ ok: false, kind: 'Backend', message: UNEXPECTED_FAILURE_MESSAGE });
    });

    it('should redact secrets from failure messages', () => {
      const envelope = toEnvelope({ ok: false, error: new BackendError('login echoed test-secret twice: test-secret') }, ['test-secret']);
      expect(envelope).to.deep.equal({ ok: false, kind: 'Backend', message: 'login echoed *** twice: ***' });
    });
  });

  it('should ignore empty secrets when redacting', () => {
    expect(redact('nothing to hide', [''])).to.equal('nothing to hide');
  });

  describe('wire form', () => {
    it('should render success and failure', () => {
      expect(toWire(success({ a: 1 }))).to.deep.equal({ result: { a: 1 } });
      expect(toWire(success(undefined))).to.deep.equal({ result: null });
      expect(toWire(failure('Forbidden', 'no'))).to.deep.equal({ error: { kind: 'Forbidden', message: 'no' } });
    });

    it('should serialize to the exact wire text', () => {
      expect(serializeEnvelope(success('Created: a'))).to.equal('{"result":"Created: a"}');
      expect(serializeEnvelope(failure('UnknownTool', 'Unknown tool: x')))
        .to.equal('{"error":{"kind":"UnknownTool","message":"Unknown tool: x"}}');
    });

    it('should preserve kind and message through serialize and parse', () => {
      const original = failure('Auth', 'Portal session expired again after re-authentication');
      expect(parseEnvelope(serializeEnvelope(original))).to.deep.equal(original);
    });

    it('should parse a success envelope', () => {
      expect(parseEnvelope('{"result":[1,2]}')).to.deep.equal({ ok: true, payload: [1, 2] });
    });

    it('should reject malformed envelopes', () => {
      expect(() => parseEnvelope('[]')).to.throw('Envelope must be a JSON object');
      expect(() => parseEnvelope('{"result":1,"error":{}}')).to.throw('Envelope must carry exactly one of "result" or "error"');
      expect(() => parseEnvelope('{"error":{"kind":"Teapot","message":"x"}}')).to.throw('Envelope error has an unknown kind or a non-string message');
      expect(() => parseEnvelope('{"error":"x"}')).to.throw('Envelope error must carry "kind" and "message"');
    });
  });

  it('should map kinds to HTTP status codes', () => {
    expect(httpStatusOf(success(null))).to.equal(200);
    expect(httpStatusOf(failure('InvalidArgument', ''))).to.equal(400);
    expect(httpStatusOf(failure('Auth', ''))).to.equal(401);
    expect(httpStatusOf(failure('Forbidden', ''))).to.equal(403);
    expect(httpStatusOf(failure('UnknownTool', ''))).to.equal(404);
    expect(httpStatusOf(failure('Backend', ''))).to.equal(502);
  });
});

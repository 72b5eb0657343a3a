import { expect } from 'chai';
import { describe, it } from 'mocha';
import {
  CredentialResolver,
  describeCredentials,
  flatEnvSource,
  namespacedEnvSource,
  scopeSatisfies
} from '../../../src/config/credentials.js';
import { ConfigError } from '../../../src/errors/mcpErrors.js';

function resolveError(resolver: CredentialResolver): ConfigError {
  try {
    resolver.resolve();
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected resolve() to fail');
}

describe('CredentialResolver', () => {
  const complete = { host: 'portal.test', user: 'alice', password: 'test-secret' };

  it('should resolve with defaults for scope, tls and port', () => {
    const credentials = new CredentialResolver([complete]).resolve();

    expect(credentials).to.deep.equal({
      host: 'portal.test',
      user: 'alice',
      secret: 'test-secret',
      scope: 'user',
      tls: true,
      port: 443
    });
  });

  it('should default the port to 80 without TLS', () => {
    const credentials = new CredentialResolver([{ ...complete, ssl: 'false' }]).resolve();
    expect(credentials.tls).to.be.false;
    expect(credentials.port).to.equal(80);
  });

  it('should take each key from the first source that has it', () => {
    const resolver = new CredentialResolver([
      { host: 'launch.test' },
      { host: 'env.test', user: 'bob', password: 'test-secret', scope: 'ADMIN' }
    ]);
    const credentials = resolver.resolve();

    expect(credentials.host).to.equal('launch.test');
    expect(credentials.user).to.equal('bob');
    expect(credentials.scope).to.equal('admin');
  });

  it('should treat empty strings as absent', () => {
    const credentials = new CredentialResolver([{ host: '' }, complete]).resolve();
    expect(credentials.host).to.equal('portal.test');
  });

  it('should trim host and user but keep the password verbatim', () => {
    const credentials = new CredentialResolver([{ host: ' portal.test ', user: ' alice ', password: ' test-secret ' }]).resolve();
    expect(credentials.host).to.equal('portal.test');
    expect(credentials.user).to.equal('alice');
    expect(credentials.secret).to.equal(' test-secret ');
  });

  it('should list every missing key', () => {
    const error = resolveError(new CredentialResolver([{ user: 'alice' }]));
    expect(error.message).to.equal('Missing portal configuration: host, password');
    expect(error.data).to.deep.equal({ keys: ['host', 'password'] });
  });

  it('should reject an unknown scope', () => {
    const error = resolveError(new CredentialResolver([{ ...complete, scope: 'root' }]));
    expect(error.message).to.equal('Scope error: value must be "admin" or "user": root');
  });

  it('should reject an unparsable ssl flag', () => {
    const error = resolveError(new CredentialResolver([{ ...complete, ssl: 'maybe' }]));
    expect(error.message).to.equal('Invalid ssl: expected true or false, got "maybe"');
  });

  it('should reject a port out of range', () => {
    const error = resolveError(new CredentialResolver([{ ...complete, port: '70000' }]));
    expect(error.message).to.equal('Invalid port: 70000');
  });

  it('should accept numeric and boolean values from a launch file', () => {
    const credentials = new CredentialResolver([{ ...complete, ssl: false, port: 8080 }]).resolve();
    expect(credentials.tls).to.be.false;
    expect(credentials.port).to.equal(8080);
  });

  describe('environment sources', () => {
    it('should read the namespaced form, preferring connector.ssl', () => {
      const source = namespacedEnvSource({
        'portal.mcp.settings.host': 'ns.test',
        'portal.mcp.settings.ssl': 'true',
        'portal.mcp.settings.connector.ssl': 'false'
      });
      expect(source.host).to.equal('ns.test');
      expect(source.ssl).to.equal('false');
    });

    it('should read the flat form', () => {
      const source = flatEnvSource({ PORTAL_ADDR: 'flat.test', PORTAL_USER: 'carol', PORTAL_PASS: 'test-secret', PORTAL_PORT: '8443' });
      expect(source).to.deep.equal({
        scope: undefined,
        host: 'flat.test',
        user: 'carol',
        password: 'test-secret',
        ssl: undefined,
        port: '8443'
      });
    });

    it('should prefer launch file, then namespaced, then flat values', () => {
      const resolver = CredentialResolver.fromEnvironment(
        {
          'portal.mcp.settings.user': 'namespaced',
          PORTAL_ADDR: 'flat.test',
          PORTAL_USER: 'flat',
          PORTAL_PASS: 'test-secret'
        },
        { scope: 'admin' }
      );
      const credentials = resolver.resolve();

      expect(credentials.scope).to.equal('admin');
      expect(credentials.user).to.equal('namespaced');
      expect(credentials.host).to.equal('flat.test');
    });
  });
});

describe('describeCredentials', () => {
  it('should never include the secret', () => {
    const text = describeCredentials({ host: 'portal.test', port: 443, user: 'alice', secret: 'test-secret', scope: 'user', tls: true });
    expect(text).to.equal('alice@https://portal.test:443 (user scope)');
  });
});

describe('scopeSatisfies', () => {
  it('should let admin cover user but not the reverse', () => {
    expect(scopeSatisfies('admin', 'user')).to.be.true;
    expect(scopeSatisfies('admin', 'admin')).to.be.true;
    expect(scopeSatisfies('user', 'user')).to.be.true;
    expect(scopeSatisfies('user', 'admin')).to.be.false;
  });
});

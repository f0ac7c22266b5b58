import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { InvalidTokenError } from '@modelcontextprotocol/sdk/server/auth/errors.js';
import { buildAuthContext, createStaticTokenVerifier } from './auth.js';
import { ConfigurationError } from './errors.js';

describe('buildAuthContext', () => {
  it('installs no middleware when auth is off', () => {
    const context = buildAuthContext({ mode: 'none' });
    assert.equal(context.mode, 'none');
    assert.equal(context.middleware, null);
  });

  it('requires a token in bearer mode', () => {
    assert.throws(() => buildAuthContext({ mode: 'bearer' }), ConfigurationError);
    assert.throws(() => buildAuthContext({ mode: 'bearer', bearerToken: '' }), ConfigurationError);
  });

  it('installs bearer middleware when a token is configured', () => {
    const context = buildAuthContext({ mode: 'bearer', bearerToken: 'test-token' });
    assert.equal(context.mode, 'bearer');
    assert.equal(typeof context.middleware, 'function');
  });
});

describe('createStaticTokenVerifier', () => {
  const verifier = createStaticTokenVerifier('test-token');

  it('accepts the configured token', async () => {
    const info = await verifier.verifyAccessToken('test-token');
    assert.equal(info.token, 'test-token');
    assert.equal(info.clientId, 'local-user');
    assert.deepEqual(info.scopes, ['mcp:tools']);
    assert.ok(info.expiresAt !== undefined && info.expiresAt > Date.now() / 1000);
  });

  it('rejects any other token', async () => {
    await assert.rejects(verifier.verifyAccessToken('wrong-token'), InvalidTokenError);
    await assert.rejects(verifier.verifyAccessToken(''), InvalidTokenError);
  });
});

import { expect } from 'chai';
import { parseTokenResponse } from './token-response.js';
import { normalizeScope } from './utils.js';
import { tokenData } from '../../fixtures/test-data.js';
import { expectOAuthError } from '../../testUtils/testHelpers.js';

describe('parseTokenResponse', () => {
  it('parses the minimal RFC 6749 response', () => {
    expect(parseTokenResponse(JSON.stringify(tokenData.minimal))).to.deep.equal(
      {
        accessToken: 'abc',
        tokenType: 'bearer',
        raw: { access_token: 'abc', token_type: 'bearer' },
      }
    );
  });

  it('maps optional fields', () => {
    const token = parseTokenResponse(JSON.stringify(tokenData.full));

    expect(token.accessToken).to.equal('test-access-token');
    expect(token.tokenType).to.equal('Bearer');
    expect(token.refreshToken).to.equal('test-refresh-token');
    expect(token.expiresIn).to.equal(3600);
    expect(token.scope).to.equal('read write');
  });

  it('accepts numeric-string expiry and comma-delimited scopes', () => {
    const token = parseTokenResponse(JSON.stringify(tokenData.loose));

    expect(token.expiresIn).to.equal(7200);
    expect(token.scope).to.equal('repo user:email');
  });

  it('keeps unknown fields in raw', () => {
    const token = parseTokenResponse(
      JSON.stringify({ ...tokenData.minimal, id_token: 'test-id-token' })
    );
    expect(token.raw.id_token).to.equal('test-id-token');
  });

  it('treats null optional fields as absent', () => {
    const token = parseTokenResponse(
      JSON.stringify({ ...tokenData.minimal, refresh_token: null, scope: null })
    );
    expect(token).to.not.have.property('refreshToken');
    expect(token).to.not.have.property('scope');
  });

  it('rejects bodies that are not JSON', async () => {
    const error = await expectOAuthError(
      () => parseTokenResponse('access_token=abc&token_type=bearer'),
      'ExchangeFailure',
      'invalid_response'
    );
    expect(error.error_description).to.equal(
      'Token endpoint returned a body that is not valid JSON'
    );
  });

  it('rejects JSON that is not an object', async () => {
    await expectOAuthError(
      () => parseTokenResponse('["abc"]'),
      'ExchangeFailure',
      'invalid_response'
    );
  });

  it('rejects a missing access_token', async () => {
    const error = await expectOAuthError(
      () =>
        parseTokenResponse(JSON.stringify({ token_type: 'bearer' }), {
          endpoint: 'token_endpoint',
        }),
      'ExchangeFailure',
      'invalid_response'
    );
    expect(error.error_description).to.equal('missing access_token');
    expect(error.endpoint).to.equal('token_endpoint');
  });

  it('rejects a missing token_type', async () => {
    const error = await expectOAuthError(
      () => parseTokenResponse(JSON.stringify({ access_token: 'abc' })),
      'ExchangeFailure'
    );
    expect(error.error_description).to.equal('missing token_type');
  });

  it('rejects an empty token_type', async () => {
    const error = await expectOAuthError(
      () =>
        parseTokenResponse(
          JSON.stringify({ access_token: 'abc', token_type: '' })
        ),
      'ExchangeFailure',
      'invalid_response'
    );
    expect(error.error_description).to.equal('token_type is empty');
  });

  it('surfaces an error object returned with a 2xx status', async () => {
    const error = await expectOAuthError(
      () =>
        parseTokenResponse(
          JSON.stringify({
            error: 'bad_verification_code',
            error_description: 'The code passed is incorrect or expired.',
          })
        ),
      'ExchangeFailure',
      'bad_verification_code'
    );
    expect(error.error_description).to.equal(
      'The code passed is incorrect or expired.'
    );
  });
});

describe('normalizeScope', () => {
  it('collapses separators', () => {
    expect(normalizeScope('a,b  c')).to.equal('a b c');
    expect(normalizeScope(' , ')).to.equal(undefined);
    expect(normalizeScope(null)).to.equal(undefined);
  });
});

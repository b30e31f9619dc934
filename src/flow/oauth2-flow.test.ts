import { expect } from 'chai';
import { OAuth2Flow, readCallbackParam } from './oauth2-flow.js';
import type { StateGenerator } from './state.js';
import { OAuthConfig } from '../config/oauth-config.js';
import { DefaultLogger } from '../logging/logger.js';
import type { TokenResponse } from '../types.js';
import { ErrorNormalizer } from '../utils/error-normalizer.js';
import { testConfigs } from '../fixtures/test-data.js';
import { defaultTestToken, RecordingAdapter } from '../testUtils/adapters.js';
import { RecordingStateStore } from '../testUtils/stateStores.js';
import { createTestLogger, expectOAuthError } from '../testUtils/testHelpers.js';

type GitHubUser = { login: string };

const fixedState: StateGenerator = {
  generate: () => 'test-state',
  verify: (expected, received) => expected === received,
};

describe('OAuth2Flow', () => {
  const config = new OAuthConfig(testConfigs.valid);

  function createFlow(adapter = new RecordingAdapter()) {
    const { logger, transport } = createTestLogger();
    const flow = new OAuth2Flow<GitHubUser>(config, {
      adapter,
      logger,
      stateGenerator: fixedState,
    });
    return { flow, adapter, logs: transport };
  }

  describe('logger', () => {
    it('creates a default logger named after the config', () => {
      const flow = new OAuth2Flow(config);
      expect(flow.logger).to.be.instanceOf(DefaultLogger);
    });

    it('can replace its logger', () => {
      const flow = new OAuth2Flow(config);
      const { logger } = createTestLogger();
      flow.setLogger(logger);
      expect(flow.logger).to.equal(logger);
    });
  });

  describe('getRedirect', () => {
    it('stores a fresh state and redirects with 303', async () => {
      const { flow, adapter } = createFlow();
      const store = new RecordingStateStore();

      const redirect = await flow.getRedirect(store, ['read:user'], [
        ['prompt', 'consent'],
      ]);

      expect(redirect).to.deep.equal({
        status: 303,
        location: 'https://auth.example.com/oauth/authorize?state=test-state',
      });
      expect(store.stored).to.deep.equal(['test-state']);
      expect(adapter.authorizationCalls).to.deep.equal([
        {
          state: 'test-state',
          scopes: ['read:user'],
          extras: [['prompt', 'consent']],
        },
      ]);
    });

    it('builds the URI with the default adapter', async () => {
      const { logger } = createTestLogger();
      const flow = new OAuth2Flow(config, { logger });
      const store = new RecordingStateStore();

      const { location } = await flow.getRedirect(store, ['openid']);
      const url = new URL(location);

      expect(url.origin + url.pathname).to.equal(
        'https://auth.example.com/oauth/authorize'
      );
      expect(url.searchParams.get('state')).to.equal(store.stored[0]);
      expect(url.searchParams.get('scope')).to.equal('openid');
    });

    it('issues a different state for every attempt', async () => {
      const { logger } = createTestLogger();
      const flow = new OAuth2Flow(config, { logger });
      const store = new RecordingStateStore();

      await flow.getRedirect(store);
      await flow.getRedirect(store);

      expect(store.stored).to.have.length(2);
      expect(store.stored[0]).to.not.equal(store.stored[1]);
    });

    it('logs each stage with the state redacted', async () => {
      const { flow, logs } = createFlow();

      await flow.getRedirect(new RecordingStateStore(), ['openid']);

      expect(logs.logs).to.deep.equal([
        {
          message: 'Login initiated',
          level: 'Info',
          stage: 'Initiated',
          scopes: ['openid'],
        },
        {
          message: 'Authorization URI built',
          level: 'Debug',
          stage: 'AwaitingCallback',
          location:
            'https://auth.example.com/oauth/authorize?state=%5Bredacted%5D',
        },
        {
          message: 'Redirect issued',
          level: 'Info',
          stage: 'AwaitingCallback',
        },
      ]);
    });

    it('stores nothing when the URI cannot be built', async () => {
      const { flow } = createFlow(
        new RecordingAdapter({
          authorizationError: ErrorNormalizer.create(
            'InvalidUri',
            'invalid_uri',
            'Authorization endpoint is not an absolute URI'
          ),
        })
      );
      const store = new RecordingStateStore();

      await expectOAuthError(
        () => flow.getRedirect(store),
        'InvalidUri',
        'invalid_uri'
      );
      expect(store.stored).to.deep.equal([]);
    });

    it('normalizes unexpected adapter errors as InvalidUri', async () => {
      const { flow, logs } = createFlow(
        new RecordingAdapter({ authorizationError: new Error('boom') })
      );

      const error = await expectOAuthError(
        () => flow.getRedirect(new RecordingStateStore()),
        'InvalidUri',
        'server_error'
      );
      expect(error.provider).to.equal('example');
      expect(error.endpoint).to.equal('authorization_endpoint');
      expect(logs.messages('Error')).to.deep.equal(['Login attempt failed']);
    });
  });

  describe('handleCallback', () => {
    it('exchanges the code when the state matches', async () => {
      const { flow, adapter } = createFlow();
      const store = new RecordingStateStore('test-state');

      const token: TokenResponse<GitHubUser> = await flow.handleCallback(
        store,
        { code: 'test-code', state: 'test-state' }
      );

      expect(token).to.deep.equal(defaultTestToken);
      expect(adapter.exchangeCalls).to.have.length(1);
      expect(adapter.exchangeCalls[0]?.request).to.deep.equal({
        type: 'authorization_code',
        code: 'test-code',
      });
      expect(store.pending).to.equal(undefined);
      expect(store.clears).to.equal(1);
    });

    it('accepts URLSearchParams', async () => {
      const { flow } = createFlow();
      const token = await flow.handleCallback(
        new RecordingStateStore('test-state'),
        new URLSearchParams('code=test-code&state=test-state')
      );
      expect(token.accessToken).to.equal('test-access-token');
    });

    it('forwards the abort signal to the adapter', async () => {
      const { flow, adapter } = createFlow();
      const controller = new AbortController();

      await flow.handleCallback(
        new RecordingStateStore('test-state'),
        { code: 'test-code', state: 'test-state' },
        { signal: controller.signal }
      );

      expect(adapter.exchangeCalls[0]?.options?.signal).to.equal(
        controller.signal
      );
    });

    it('rejects a state that differs from the pending one', async () => {
      const { flow, adapter, logs } = createFlow();
      const store = new RecordingStateStore('test-state');

      const error = await expectOAuthError(
        () =>
          flow.handleCallback(store, { code: 'test-code', state: 'other-state' }),
        'StateMismatch',
        'invalid_state'
      );

      expect(error.statusCode).to.equal(400);
      expect(error.error_description).to.equal(
        'State parameter does not match the pending login attempt'
      );
      expect(adapter.exchangeCalls).to.have.length(0);
      expect(store.pending).to.equal(undefined);
      expect(logs.logs).to.deep.equal([
        {
          message: 'State mismatch on callback, possible CSRF attempt',
          level: 'Warn',
          stage: 'Failed',
          pendingState: true,
          receivedState: true,
        },
      ]);
    });

    it('rejects a callback when no login is pending', async () => {
      const { flow } = createFlow();

      const error = await expectOAuthError(
        () =>
          flow.handleCallback(new RecordingStateStore(), {
            code: 'test-code',
            state: 'test-state',
          }),
        'StateMismatch'
      );
      expect(error.error_description).to.equal(
        'No login attempt is pending for this session'
      );
    });

    it('rejects a callback without state', async () => {
      const { flow } = createFlow();
      const store = new RecordingStateStore('test-state');

      await expectOAuthError(
        () => flow.handleCallback(store, { code: 'test-code' }),
        'StateMismatch'
      );
      expect(store.pending).to.equal(undefined);
    });

    it('rejects repeated state parameters', async () => {
      const { flow } = createFlow();

      await expectOAuthError(
        () =>
          flow.handleCallback(
            new RecordingStateStore('test-state'),
            new URLSearchParams('code=c&state=test-state&state=test-state')
          ),
        'StateMismatch'
      );
      await expectOAuthError(
        () =>
          flow.handleCallback(new RecordingStateStore('test-state'), {
            code: 'c',
            state: ['test-state', 'test-state'],
          }),
        'StateMismatch'
      );
    });

    it('fails a replayed callback', async () => {
      const { flow, adapter } = createFlow();
      const store = new RecordingStateStore('test-state');
      const query = { code: 'test-code', state: 'test-state' };

      await flow.handleCallback(store, query);
      await expectOAuthError(
        () => flow.handleCallback(store, query),
        'StateMismatch'
      );
      expect(adapter.exchangeCalls).to.have.length(1);
    });

    it('reports a provider error without calling the token endpoint', async () => {
      const { flow, adapter } = createFlow();
      const store = new RecordingStateStore('test-state');

      const error = await expectOAuthError(
        () =>
          flow.handleCallback(store, {
            error: 'access_denied',
            error_description: 'The user denied the request',
            state: 'test-state',
          }),
        'ProviderDenied',
        'access_denied'
      );

      expect(error.statusCode).to.equal(403);
      expect(error.error_description).to.equal('The user denied the request');
      expect(error.endpoint).to.equal('authorization_endpoint');
      expect(adapter.exchangeCalls).to.have.length(0);
      expect(store.pending).to.equal(undefined);
    });

    it('describes a provider error that has no description', async () => {
      const { flow } = createFlow();

      const error = await expectOAuthError(
        () =>
          flow.handleCallback(new RecordingStateStore('test-state'), {
            error: 'access_denied',
            state: 'test-state',
          }),
        'ProviderDenied'
      );
      expect(error.error_description).to.equal(
        'Authorization was denied: access_denied'
      );
    });

    it('treats a provider error without a pending login as a state mismatch', async () => {
      const { flow, adapter, logs } = createFlow();

      const error = await expectOAuthError(
        () =>
          flow.handleCallback(new RecordingStateStore(), {
            error: 'access_denied',
            error_description: 'The user denied the request',
          }),
        'StateMismatch',
        'invalid_state'
      );

      expect(error.error_description).to.equal(
        'No login attempt is pending for this session'
      );
      expect(adapter.exchangeCalls).to.have.length(0);
      expect(logs.logs).to.deep.equal([
        {
          message: 'State mismatch on callback, possible CSRF attempt',
          level: 'Warn',
          stage: 'Failed',
          pendingState: false,
          receivedState: false,
        },
      ]);
    });

    it('treats a provider error with a different state as a state mismatch', async () => {
      const { flow } = createFlow();

      await expectOAuthError(
        () =>
          flow.handleCallback(new RecordingStateStore('test-state'), {
            error: 'access_denied',
            state: 'other-state',
          }),
        'StateMismatch'
      );
    });

    it('reports a callback with neither code nor error', async () => {
      const { flow, adapter } = createFlow();

      await expectOAuthError(
        () =>
          flow.handleCallback(new RecordingStateStore('test-state'), {
            state: 'test-state',
          }),
        'MissingCode',
        'invalid_request'
      );
      expect(adapter.exchangeCalls).to.have.length(0);
    });

    it('surfaces the adapter error kind', async () => {
      const providerError = ErrorNormalizer.create(
        'ExchangeError',
        'invalid_grant',
        'Code already used',
        { endpoint: 'token_endpoint' },
        400
      );
      const { flow, logs } = createFlow(
        new RecordingAdapter({ exchangeError: providerError })
      );

      const error = await expectOAuthError(
        () =>
          flow.handleCallback(new RecordingStateStore('test-state'), {
            code: 'test-code',
            state: 'test-state',
          }),
        'ExchangeError',
        'invalid_grant'
      );

      expect(error.statusCode).to.equal(400);
      expect(error.provider).to.equal('example');
      expect(logs.logs.map((record) => record.stage)).to.deep.equal([
        'Validated',
        'Failed',
      ]);
    });

    it('wraps unexpected adapter errors as ExchangeFailure', async () => {
      const { flow } = createFlow(
        new RecordingAdapter({ exchangeError: new Error('socket hang up') })
      );

      const error = await expectOAuthError(
        () =>
          flow.handleCallback(new RecordingStateStore('test-state'), {
            code: 'test-code',
            state: 'test-state',
          }),
        'ExchangeFailure'
      );
      expect(error.endpoint).to.equal('token_endpoint');
    });

    it('logs the validated and exchanged stages', async () => {
      const { flow, logs } = createFlow();

      await flow.handleCallback(new RecordingStateStore('test-state'), {
        code: 'test-code',
        state: 'test-state',
      });

      expect(logs.logs).to.deep.equal([
        { message: 'Callback validated', level: 'Info', stage: 'Validated' },
        {
          message: 'Token exchanged',
          level: 'Info',
          stage: 'Exchanged',
          grantType: 'authorization_code',
          tokenType: 'bearer',
          hasRefreshToken: false,
          expiresIn: undefined,
        },
      ]);
    });
  });

  describe('safeHandleCallback', () => {
    it('returns the token on success', async () => {
      const { flow } = createFlow();

      const result = await flow.safeHandleCallback(
        new RecordingStateStore('test-state'),
        { code: 'test-code', state: 'test-state' }
      );

      expect(result).to.deep.equal({ success: true, data: defaultTestToken });
    });

    it('returns the error instead of throwing', async () => {
      const { flow } = createFlow();

      const result = await flow.safeHandleCallback(new RecordingStateStore(), {
        code: 'test-code',
        state: 'test-state',
      });

      expect(result.success).to.equal(false);
      if (!result.success) {
        expect(result.error.kind).to.equal('StateMismatch');
      }
    });

    it('normalizes a failing state store', async () => {
      const { flow } = createFlow();
      const store = new RecordingStateStore();
      store.loadAndClear = () => Promise.reject(new Error('session unavailable'));

      const result = await flow.safeHandleCallback(store, {});

      expect(result.success).to.equal(false);
      if (!result.success) {
        expect(result.error.kind).to.equal('ExchangeFailure');
        expect(result.error.error_description).to.equal('session unavailable');
      }
    });
  });

  describe('refresh', () => {
    it('exchanges a refresh token through the adapter', async () => {
      const refreshed: TokenResponse = {
        accessToken: 'new-access-token',
        tokenType: 'bearer',
        refreshToken: 'new-refresh-token',
        expiresIn: 3600,
        scope: 'read',
        raw: {},
      };
      const { flow, adapter } = createFlow(
        new RecordingAdapter({ token: refreshed })
      );

      const token = await flow.refresh('test-refresh-token');

      expect(token).to.deep.equal(refreshed);
      expect(adapter.exchangeCalls[0]?.request).to.deep.equal({
        type: 'refresh_token',
        refreshToken: 'test-refresh-token',
      });
    });
  });
});

describe('readCallbackParam', () => {
  it('reads single values', () => {
    expect(readCallbackParam({ code: 'abc' }, 'code')).to.equal('abc');
    expect(
      readCallbackParam(new URLSearchParams('code=abc'), 'code')
    ).to.equal('abc');
  });

  it('treats missing and repeated values as absent', () => {
    expect(readCallbackParam({}, 'code')).to.equal(undefined);
    expect(readCallbackParam({ code: ['a', 'b'] }, 'code')).to.equal(undefined);
    expect(
      readCallbackParam(new URLSearchParams('code=a&code=b'), 'code')
    ).to.equal(undefined);
  });
});

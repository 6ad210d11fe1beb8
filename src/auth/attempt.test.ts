import * as openpgp from 'openpgp';
import { AttemptDeps, AuthAttempt } from './attempt';
import { toAuthInfo } from './mappers';
import { SRPClient } from './srp';
import { KeyUnlocker } from './unlock';
import { resolveConfig } from '../config';
import { deriveKeyPassphrase } from '../crypto/key-password';
import { OpenPGPKeyRingProvider } from '../crypto/keys';
import { ErrorCode } from '../errors/types';
import { AuthInfo } from '../types/auth';
import { FakeAuthTransport } from '../test/fake-transport';
import { generateLockedKey, InProcessSRPServer, SignedModulus, signModulus } from '../test/srp-server';
import { logger, LogLevel } from '../utils/logger';

const USERNAME = 'alice@example.com';
const PASSWORD = 'correct';
const KEY_SALT = 'MDEyMzQ1Njc4OWFiY2RlZg==';

describe('AuthAttempt', () => {
  let signed: SignedModulus;
  let privateKey: string;
  let transport: FakeAuthTransport;
  let deps: AttemptDeps<openpgp.PrivateKey>;

  function withConfig(overrides: Partial<AttemptDeps<openpgp.PrivateKey>['config']>): AttemptDeps<openpgp.PrivateKey> {
    return { ...deps, config: { ...deps.config, ...overrides } };
  }

  async function fetchAuthInfo(): Promise<AuthInfo> {
    const response = await transport.getAuthInfo({ ClientID: 'Web', ClientSecret: '', Username: USERNAME });
    return toAuthInfo(USERNAME, response);
  }

  beforeAll(async () => {
    logger.setLevel(LogLevel.SILENT);
    signed = await signModulus();
    privateKey = await generateLockedKey(await deriveKeyPassphrase(PASSWORD, KEY_SALT));
  }, 60_000);

  afterAll(() => {
    logger.setLevel(LogLevel.INFO);
  });

  beforeEach(async () => {
    const server = await InProcessSRPServer.create(PASSWORD, signed);
    transport = new FakeAuthTransport({ server, signed, privateKey, keySalt: KEY_SALT });
    deps = {
      transport,
      srp: new SRPClient({ modulusKey: signed.modulusKey }),
      unlocker: new KeyUnlocker(new OpenPGPKeyRingProvider()),
      config: resolveConfig({}, {}),
      consumedAuthInfo: new WeakSet<AuthInfo>(),
    };
  }, 30_000);

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('authenticate', () => {
    test('walks from idle to authenticated with the right password', async () => {
      const attempt = new AuthAttempt(deps, USERNAME);
      expect(attempt.status).toBe('idle');

      const credentials = await attempt.authenticate(PASSWORD);

      expect(attempt.status).toBe('authenticated');
      expect(credentials).toMatchObject({ uid: 'uid-1', accessToken: 'access-1', refreshToken: 'refresh-1' });
      expect(transport.authInfoRequests).toEqual([{ ClientID: 'Web', ClientSecret: '', Username: USERNAME }]);
      expect(transport.authRequests).toHaveLength(1);
      expect(transport.authRequests[0]).toMatchObject({ Username: USERNAME, SRPSession: 'sess1', TwoFactorCode: '' });
    }, 30_000);

    test('forwards the two-factor code', async () => {
      const attempt = new AuthAttempt(deps, USERNAME);
      await attempt.authenticate(PASSWORD, { twoFactorCode: '123456' });

      expect(transport.authRequests[0].TwoFactorCode).toBe('123456');
    }, 30_000);

    test('fails with INVALID_CREDENTIALS when the server rejects the proof', async () => {
      const attempt = new AuthAttempt(deps, USERNAME);

      await expect(attempt.authenticate('correcu')).rejects.toMatchObject({ code: ErrorCode.INVALID_CREDENTIALS });
      expect(attempt.state).toMatchObject({ status: 'failed', reason: ErrorCode.INVALID_CREDENTIALS });
    }, 30_000);

    test('refuses a tampered server proof and hands back no credentials', async () => {
      transport.tamperServerProof = true;
      const attempt = new AuthAttempt(deps, USERNAME);

      await expect(attempt.authenticate(PASSWORD)).rejects.toMatchObject({ code: ErrorCode.SERVER_PROOF_MISMATCH });
      expect(attempt.state).toMatchObject({ status: 'failed', reason: ErrorCode.SERVER_PROOF_MISMATCH });
      expect(attempt.state).not.toHaveProperty('credentials');
    }, 30_000);

    test('refuses a server that accepts any proof but does not know the verifier', async () => {
      transport.acceptAnyClientProof = true;
      const attempt = new AuthAttempt(deps, USERNAME);

      await expect(attempt.authenticate('correcu')).rejects.toMatchObject({ code: ErrorCode.SERVER_PROOF_MISMATCH });
    }, 30_000);

    test('uses a fresh client ephemeral for every attempt', async () => {
      await new AuthAttempt(deps, USERNAME).authenticate(PASSWORD);
      await new AuthAttempt(deps, USERNAME).authenticate(PASSWORD);

      expect(transport.authRequests).toHaveLength(2);
      expect(transport.authRequests[0].ClientEphemeral).not.toBe(transport.authRequests[1].ClientEphemeral);
      expect(transport.authRequests[0].ClientProof).not.toBe(transport.authRequests[1].ClientProof);
    }, 60_000);

    test('rejects a second call', async () => {
      const attempt = new AuthAttempt(deps, USERNAME);
      await attempt.authenticate(PASSWORD);

      await expect(attempt.authenticate(PASSWORD)).rejects.toMatchObject({
        code: ErrorCode.INVALID_STATE,
        message: 'Cannot authenticate while attempt is authenticated',
      });
      expect(attempt.status).toBe('authenticated');
    }, 30_000);
  });

  describe('supplied auth info', () => {
    test('is used once without fetching again', async () => {
      const info = await fetchAuthInfo();
      await new AuthAttempt(deps, USERNAME).authenticate(PASSWORD, { authInfo: info });

      expect(transport.authInfoRequests).toHaveLength(1);
      expect(transport.authRequests[0].SRPSession).toBe('sess1');
    }, 30_000);

    test('is replaced by fresh parameters once consumed', async () => {
      const info = await fetchAuthInfo();
      await new AuthAttempt(deps, USERNAME).authenticate(PASSWORD, { authInfo: info });
      await new AuthAttempt(deps, USERNAME).authenticate(PASSWORD, { authInfo: info });

      expect(transport.authInfoRequests).toHaveLength(2);
      expect(transport.authRequests.map((request) => request.SRPSession)).toEqual(['sess1', 'sess2']);
    }, 60_000);

    test('is reused when the config allows it', async () => {
      const reuseDeps = withConfig({ allowSrpSessionReuse: true });
      const info = await fetchAuthInfo();
      await new AuthAttempt(reuseDeps, USERNAME).authenticate(PASSWORD, { authInfo: info });

      // The in-process server answers each session once
      await expect(new AuthAttempt(reuseDeps, USERNAME).authenticate(PASSWORD, { authInfo: info }))
        .rejects.toMatchObject({ code: ErrorCode.UNKNOWN_ERROR, message: 'Unknown SRP session sess1' });
      expect(transport.authInfoRequests).toHaveLength(1);
    }, 60_000);

    test('for another user is ignored', async () => {
      const info = await fetchAuthInfo();
      await new AuthAttempt(deps, 'bob@example.com').authenticate(PASSWORD, { authInfo: info });

      expect(transport.authInfoRequests).toHaveLength(2);
      expect(transport.authInfoRequests[1].Username).toBe('bob@example.com');
    }, 30_000);
  });

  describe('cancellation', () => {
    test('an aborted signal stops the attempt before any request', async () => {
      const controller = new AbortController();
      controller.abort();
      const attempt = new AuthAttempt(deps, USERNAME);

      await expect(attempt.authenticate(PASSWORD, { signal: controller.signal })).rejects.toMatchObject({
        code: ErrorCode.OPERATION_CANCELLED,
        message: 'Authentication cancelled',
      });
      expect(attempt.state).toMatchObject({ status: 'failed', reason: ErrorCode.OPERATION_CANCELLED });
      expect(transport.authInfoRequests).toHaveLength(0);
    });

    test('aborting after the parameters arrive skips the proof submission', async () => {
      const controller = new AbortController();
      const getAuthInfo = transport.getAuthInfo.bind(transport);
      jest.spyOn(transport, 'getAuthInfo').mockImplementation(async (request) => {
        const response = await getAuthInfo(request);
        controller.abort();
        return response;
      });
      const attempt = new AuthAttempt(deps, USERNAME);

      await expect(attempt.authenticate(PASSWORD, { signal: controller.signal })).rejects.toMatchObject({
        code: ErrorCode.OPERATION_CANCELLED,
      });
      expect(transport.authRequests).toHaveLength(0);
    }, 30_000);
  });

  describe('unlock', () => {
    test('moves an authenticated attempt to unlocked', async () => {
      const attempt = new AuthAttempt(deps, USERNAME);
      const credentials = await attempt.authenticate(PASSWORD);

      const identity = await attempt.unlock(PASSWORD);

      expect(attempt.status).toBe('unlocked');
      expect(identity.credentials).toBe(credentials);
      expect(identity.keys).toHaveLength(1);
    }, 60_000);

    test('a wrong password keeps the attempt authenticated', async () => {
      const attempt = new AuthAttempt(deps, USERNAME);
      await attempt.authenticate(PASSWORD);

      await expect(attempt.unlock('incorrect')).rejects.toMatchObject({ code: ErrorCode.DECRYPTION_FAILED });
      expect(attempt.status).toBe('authenticated');

      await attempt.unlock(PASSWORD);
      expect(attempt.status).toBe('unlocked');
    }, 60_000);

    test('cancellation fails the attempt', async () => {
      const attempt = new AuthAttempt(deps, USERNAME);
      await attempt.authenticate(PASSWORD);
      const controller = new AbortController();
      controller.abort();

      await expect(attempt.unlock(PASSWORD, controller.signal)).rejects.toMatchObject({
        code: ErrorCode.OPERATION_CANCELLED,
      });
      expect(attempt.status).toBe('failed');
    }, 30_000);

    test('is refused before authentication', async () => {
      const attempt = new AuthAttempt(deps, USERNAME);

      await expect(attempt.unlock(PASSWORD)).rejects.toMatchObject({
        code: ErrorCode.INVALID_STATE,
        message: 'Cannot unlock while attempt is idle',
      });
      expect(attempt.status).toBe('idle');
    });
  });
});

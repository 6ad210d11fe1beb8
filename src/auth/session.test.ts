import { Session } from './session';
import { ErrorCode } from '../errors/types';
import { PasswordMode, SessionCredentials } from '../types/auth';
import { captureError } from '../test/errors';

function credentials(accessToken: string): SessionCredentials {
  return {
    uid: 'uid-1',
    accessToken,
    refreshToken: `refresh-for-${accessToken}`,
    tokenType: 'Bearer',
    scope: 'full self mail',
    expiresIn: 3600,
    eventId: 'event-1',
    passwordMode: PasswordMode.Single,
    privateKey: 'armored-key',
    keySalt: 'key-salt',
  };
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('Session', () => {
  test('starts empty', () => {
    const session = new Session<string>();
    expect(session.current).toBeNull();
    expect(session.isUnlocked()).toBe(false);
    expect(captureError(() => session.require())).toMatchObject({
      code: ErrorCode.NOT_AUTHENTICATED,
      message: 'No active session',
    });
  });

  test('commit replaces every field at once', () => {
    const session = new Session<string>();
    const state = session.commit({ credentials: credentials('access-1'), keys: ['key-a'] });

    expect(state).toEqual({
      uid: 'uid-1',
      accessToken: 'access-1',
      credentials: credentials('access-1'),
      keys: ['key-a'],
    });
    expect(Object.isFrozen(state)).toBe(true);
    expect(session.require()).toBe(state);
    expect(session.isUnlocked()).toBe(true);
  });

  test('replaceCredentials keeps the unlocked keys', () => {
    const session = new Session<string>();
    session.commit({ credentials: credentials('access-1'), keys: ['key-a'] });

    const state = session.replaceCredentials(credentials('access-2'));

    expect(state.accessToken).toBe('access-2');
    expect(state.credentials.refreshToken).toBe('refresh-for-access-2');
    expect(state.keys).toEqual(['key-a']);
  });

  test('replaceCredentials needs a session', () => {
    const session = new Session<string>();
    expect(() => session.replaceCredentials(credentials('access-2'))).toThrow('No active session');
  });

  test('clear forgets the session', () => {
    const session = new Session<string>();
    session.commit({ credentials: credentials('access-1'), keys: [] });
    session.clear();
    expect(session.current).toBeNull();
  });

  describe('runExclusive', () => {
    test('runs sections one at a time in call order', async () => {
      const session = new Session<string>();
      const events: string[] = [];
      const gate = deferred();

      const first = session.runExclusive(async () => {
        events.push('first:start');
        await gate.promise;
        events.push('first:end');
        return 1;
      });
      const second = session.runExclusive(async () => {
        events.push('second:start');
        return 2;
      });

      await new Promise((resolve) => setImmediate(resolve));
      expect(events).toEqual(['first:start']);

      gate.resolve();
      await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
      expect(events).toEqual(['first:start', 'first:end', 'second:start']);
    });

    test('a failing section does not block the next one', async () => {
      const session = new Session<string>();

      const failing = session.runExclusive(async () => {
        throw new Error('boom');
      });
      const next = session.runExclusive(async () => 'ran');

      await expect(failing).rejects.toThrow('boom');
      await expect(next).resolves.toBe('ran');
    });
  });
});

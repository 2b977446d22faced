jest.mock('../util/logger', () => ({
  __esModule: true,
  default: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { SessionManager } from './session';
import { AuthRejectedError } from '../util/errors';

function tokenSequence() {
  let issued = 0;
  return jest.fn(async () => `test-token-${++issued}`);
}

describe('SessionManager', () => {
  it('should authenticate lazily and reuse the session', async () => {
    const authenticate = tokenSequence();
    const sessions = new SessionManager(authenticate);

    expect(authenticate).not.toHaveBeenCalled();

    const first = await sessions.current();
    const second = await sessions.current();

    expect(first).toBe(second);
    expect(first.token).toBe('test-token-1');
    expect(first.generation).toBe(1);
    expect(authenticate).toHaveBeenCalledTimes(1);
  });

  it('should replace the session wholesale on renewal', async () => {
    const sessions = new SessionManager(tokenSequence());

    const first = await sessions.current();
    const renewed = await sessions.renew(first);

    expect(renewed).not.toBe(first);
    expect(first.token).toBe('test-token-1');
    expect(renewed.token).toBe('test-token-2');
    expect(renewed.generation).toBe(2);
    expect(await sessions.current()).toBe(renewed);
  });

  it('should not log in again for a session that was already renewed', async () => {
    const authenticate = tokenSequence();
    const sessions = new SessionManager(authenticate);

    const stale = await sessions.current();
    const renewed = await sessions.renew(stale);
    const again = await sessions.renew(stale);

    expect(again).toBe(renewed);
    expect(authenticate).toHaveBeenCalledTimes(2);
  });

  it('should share one login between concurrent renewals', async () => {
    const authenticate = tokenSequence();
    const sessions = new SessionManager(authenticate);
    const stale = await sessions.current();

    const [a, b] = await Promise.all([sessions.renew(stale), sessions.renew(stale)]);

    expect(a).toBe(b);
    expect(a.token).toBe('test-token-2');
    expect(authenticate).toHaveBeenCalledTimes(2);
  });

  it('should surface a failed login and allow a later attempt', async () => {
    const authenticate = jest.fn<Promise<string>, []>()
      .mockRejectedValueOnce(new AuthRejectedError(401))
      .mockResolvedValueOnce('test-token-1');
    const sessions = new SessionManager(authenticate);

    await expect(sessions.current()).rejects.toBeInstanceOf(AuthRejectedError);
    await expect(sessions.current()).resolves.toMatchObject({ token: 'test-token-1', generation: 1 });
  });
});

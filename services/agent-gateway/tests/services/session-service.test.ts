import { beforeEach, describe, expect, it } from 'vitest';
import { SessionError } from '../../src/errors/index.js';
import { MessageService } from '../../src/services/message-service.js';
import { generateSessionKey, maskSessionKey, SessionService } from '../../src/services/session-service.js';
import { InMemoryDataStore } from '../../src/store/memory-store.js';
import { loadFixtureConfig, makeInstance } from '../helpers.js';

describe('SessionService', () => {
  const sessionConfig = loadFixtureConfig().session;
  let current: Date;
  let store: InMemoryDataStore;
  let sessions: SessionService;

  const now = (): Date => current;
  const advanceMinutes = (minutes: number): void => {
    current = new Date(current.getTime() + minutes * 60 * 1000);
  };

  beforeEach(() => {
    current = new Date('2026-03-01T09:00:00.000Z');
    store = new InMemoryDataStore({ now });
    sessions = new SessionService(store.sessions, sessionConfig, { now });
  });

  describe('createSession', () => {
    it('creates anonymous sessions by default', async () => {
      const session = await sessions.createSession();

      expect(session.isAnonymous).toBe(true);
      expect(session.email).toBeNull();
      expect(session.agentInstanceId).toBeNull();
      expect(session.sessionKey).toMatch(/^[A-Za-z0-9_-]{32}$/);
    });

    it('marks sessions with an email as identified', async () => {
      const session = await sessions.createSession({ email: 'user@example.com', metadata: { source: 'widget' } });

      expect(session.isAnonymous).toBe(false);
      expect(session.email).toBe('user@example.com');
      expect(session.meta).toEqual({ source: 'widget' });
    });

    it('regenerates the key after a collision', async () => {
      const keys = ['dup-key', 'dup-key', 'fresh-key'];
      const colliding = new SessionService(store.sessions, sessionConfig, { now, keyGenerator: () => keys.shift() ?? '' });

      await colliding.createSession();
      const second = await colliding.createSession();

      expect(second.sessionKey).toBe('fresh-key');
    });

    it('gives up after three collisions', async () => {
      const constant = new SessionService(store.sessions, sessionConfig, { now, keyGenerator: () => 'same-key' });
      await constant.createSession();

      await expect(constant.createSession()).rejects.toThrow(
        new SessionError('Failed to create a unique session key after 3 attempts').message
      );
    });
  });

  describe('lookups', () => {
    it('finds sessions by key and id', async () => {
      const created = await sessions.createSession();

      expect((await sessions.getSessionByKey(created.sessionKey))?.id).toBe(created.id);
      expect((await sessions.getSessionById(created.id))?.sessionKey).toBe(created.sessionKey);
      expect(await sessions.getSessionByKey('')).toBeNull();
      expect(await sessions.getSessionByKey('unknown')).toBeNull();
    });
  });

  describe('resolveChatSession', () => {
    const support = makeInstance();
    const sales = makeInstance({ id: 'instance-2', instanceSlug: 'sales', displayName: 'Acme Sales' });

    it('creates and binds a session when there is none', async () => {
      const { session, replaced } = await sessions.resolveChatSession(null, support);

      expect(replaced).toBe(true);
      expect(session).toMatchObject({
        accountId: 'account-1',
        accountSlug: 'acme',
        agentInstanceId: 'instance-1',
        agentInstanceSlug: 'support',
      });
    });

    it('binds an unbound session in place', async () => {
      const fresh = await sessions.createSession();

      const { session, replaced } = await sessions.resolveChatSession(fresh, support);

      expect(replaced).toBe(false);
      expect(session.id).toBe(fresh.id);
      expect(session.agentInstanceId).toBe('instance-1');
    });

    it('keeps a session already bound to the instance', async () => {
      const { session: bound } = await sessions.resolveChatSession(null, support);

      const { session, replaced } = await sessions.resolveChatSession(bound, support);

      expect(replaced).toBe(false);
      expect(session.id).toBe(bound.id);
    });

    it('replaces a session bound to another instance and keeps its email', async () => {
      const identified = await sessions.createSession({ email: 'user@example.com' });
      const { session: bound } = await sessions.resolveChatSession(identified, support);

      const { session, replaced } = await sessions.resolveChatSession(bound, sales);

      expect(replaced).toBe(true);
      expect(session.id).not.toBe(bound.id);
      expect(session.agentInstanceSlug).toBe('sales');
      expect(session.email).toBe('user@example.com');
      expect((await sessions.getSessionById(bound.id))?.agentInstanceSlug).toBe('support');
    });

    it('replaces a session idle past the inactivity window', async () => {
      const { session: bound } = await sessions.resolveChatSession(null, support);

      advanceMinutes(30);
      expect(sessions.isSessionActive(bound)).toBe(true);

      advanceMinutes(1);
      const { session, replaced } = await sessions.resolveChatSession(bound, support);
      expect(replaced).toBe(true);
      expect(session.id).not.toBe(bound.id);
    });
  });

  describe('updates', () => {
    it('moves last activity forward', async () => {
      const created = await sessions.createSession();
      advanceMinutes(5);

      await sessions.updateLastActivity(created.id);

      expect((await sessions.getSessionById(created.id))?.lastActivityAt).toEqual(new Date('2026-03-01T09:05:00.000Z'));
    });

    it('identifies a session by email', async () => {
      const created = await sessions.createSession();

      const updated = await sessions.updateSessionEmail(created.id, 'user@example.com');

      expect(updated.isAnonymous).toBe(false);
      expect(updated.email).toBe('user@example.com');
    });

    it('rejects updates to unknown sessions', async () => {
      await expect(sessions.updateSessionEmail('missing', 'user@example.com')).rejects.toThrow('Session missing not found');
      await expect(sessions.updateSessionContext('missing', makeInstance())).rejects.toThrow(SessionError);
    });
  });

  describe('listSessions', () => {
    it('filters by account and counts messages', async () => {
      const messages = new MessageService(store.messages);
      const { session: first } = await sessions.resolveChatSession(null, makeInstance());
      advanceMinutes(1);
      const { session: second } = await sessions.resolveChatSession(null, makeInstance());
      advanceMinutes(1);
      await sessions.resolveChatSession(null, makeInstance({ id: 'other', accountSlug: 'globex', instanceSlug: 'helpdesk' }));
      await messages.saveMessagePair({
        sessionId: first.id,
        agentInstanceId: 'instance-1',
        userMessage: 'Hello',
        assistantMessage: 'Hi there',
        llmRequestId: null,
      });

      const { sessions: listed, total } = await sessions.listSessions({ accountSlug: 'acme', limit: 10, offset: 0 });

      expect(total).toBe(2);
      expect(listed.map(session => session.id)).toEqual([second.id, first.id]);
      expect(listed.map(session => session.messageCount)).toEqual([0, 2]);
    });
  });

  describe('getCookieConfig', () => {
    it('maps the session settings onto cookie options', () => {
      expect(sessions.getCookieConfig()).toEqual({
        name: 'test_session',
        maxAgeMs: 604800000,
        secure: false,
        httpOnly: true,
        sameSite: 'lax',
      });
    });
  });
});

describe('session keys', () => {
  it('generates URL-safe keys of the requested length', () => {
    expect(generateSessionKey()).toHaveLength(32);
    expect(generateSessionKey(12)).toMatch(/^[A-Za-z0-9_-]{12}$/);
  });

  it('masks all but the first eight characters', () => {
    expect(maskSessionKey('abcdefghijklmnop')).toBe('abcdefgh...');
  });
});

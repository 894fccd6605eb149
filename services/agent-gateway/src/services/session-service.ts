import { randomInt } from 'crypto';
import { AppConfig } from '../config/app-config.js';
import { DuplicateKeyError, errorMessage, SessionError } from '../errors/index.js';
import { SessionListFilter, SessionListItem, SessionRepository } from '../store/types.js';
import { AgentInstance, CookieConfig, JsonObject, Session } from '../types/index.js';

const SESSION_KEY_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_';
const SESSION_KEY_LENGTH = 32;
const MAX_CREATE_ATTEMPTS = 3;

export function generateSessionKey(length: number = SESSION_KEY_LENGTH): string {
  let key = '';
  for (let i = 0; i < length; i++) {
    key += SESSION_KEY_ALPHABET[randomInt(SESSION_KEY_ALPHABET.length)];
  }
  return key;
}

export function maskSessionKey(sessionKey: string): string {
  return `${sessionKey.slice(0, 8)}...`;
}

export interface CreateSessionOptions {
  email?: string | null;
  metadata?: JsonObject;
}

export type SessionConfig = AppConfig['session'];

export class SessionService {
  private readonly sessions: SessionRepository;
  private readonly config: SessionConfig;
  private readonly now: () => Date;
  private readonly keyGenerator: () => string;

  constructor(
    sessions: SessionRepository,
    config: SessionConfig,
    options: { now?: () => Date; keyGenerator?: () => string } = {}
  ) {
    this.sessions = sessions;
    this.config = config;
    this.now = options.now ?? (() => new Date());
    this.keyGenerator = options.keyGenerator ?? (() => generateSessionKey());
  }

  async createSession(options: CreateSessionOptions = {}): Promise<Session> {
    const email = options.email || null;

    for (let attempt = 1; attempt <= MAX_CREATE_ATTEMPTS; attempt++) {
      const sessionKey = this.keyGenerator();
      try {
        const session = await this.sessions.create({
          sessionKey,
          email,
          isAnonymous: !email,
          meta: options.metadata ?? {},
        });
        console.log(`[session] Created session ${maskSessionKey(sessionKey)} (anonymous: ${session.isAnonymous})`);
        return session;
      } catch (error) {
        if (error instanceof DuplicateKeyError) {
          console.warn(`[session] Session key collision on attempt ${attempt}, regenerating`);
          continue;
        }
        throw new SessionError(`Failed to create session: ${errorMessage(error)}`);
      }
    }

    throw new SessionError(`Failed to create a unique session key after ${MAX_CREATE_ATTEMPTS} attempts`);
  }

  async getSessionByKey(sessionKey: string): Promise<Session | null> {
    if (!sessionKey) return null;
    return this.sessions.findByKey(sessionKey);
  }

  async getSessionById(sessionId: string): Promise<Session | null> {
    return this.sessions.findById(sessionId);
  }

  async updateSessionContext(sessionId: string, instance: AgentInstance): Promise<Session> {
    const updated = await this.sessions.updateContext(
      sessionId,
      {
        accountId: instance.accountId,
        accountSlug: instance.accountSlug,
        agentInstanceId: instance.id,
        agentInstanceSlug: instance.instanceSlug,
      },
      this.now()
    );
    if (!updated) {
      throw new SessionError(`Session ${sessionId} not found`);
    }
    return updated;
  }

  async updateLastActivity(sessionId: string): Promise<void> {
    await this.sessions.touch(sessionId, this.now());
  }

  async updateSessionEmail(sessionId: string, email: string): Promise<Session> {
    const updated = await this.sessions.updateEmail(sessionId, email, this.now());
    if (!updated) {
      throw new SessionError(`Session ${sessionId} not found`);
    }
    return updated;
  }

  isSessionActive(session: Session, inactivityMinutes: number = this.config.inactivity_minutes): boolean {
    const idleMs = this.now().getTime() - session.lastActivityAt.getTime();
    return idleMs <= inactivityMinutes * 60 * 1000;
  }

  /**
   * Returns a session usable for chatting with `instance`. An unbound session
   * is bound on first use; a session bound to another instance, or one that
   * has gone idle, is replaced so histories never cross instances.
   */
  async resolveChatSession(session: Session | null, instance: AgentInstance): Promise<{ session: Session; replaced: boolean }> {
    if (session && this.isSessionActive(session)) {
      if (session.agentInstanceId === instance.id) {
        return { session, replaced: false };
      }
      if (session.agentInstanceId === null) {
        return { session: await this.updateSessionContext(session.id, instance), replaced: false };
      }
    }

    const fresh = await this.createSession({ email: session?.email ?? null });
    return { session: await this.updateSessionContext(fresh.id, instance), replaced: true };
  }

  /** Newest first, with per-session message counts. */
  async listSessions(filter: SessionListFilter): Promise<{ sessions: SessionListItem[]; total: number }> {
    return this.sessions.list(filter);
  }

  getCookieConfig(): CookieConfig {
    return {
      name: this.config.cookie_name,
      maxAgeMs: this.config.cookie_max_age * 1000,
      secure: this.config.cookie_secure,
      httpOnly: this.config.cookie_httponly,
      sameSite: this.config.cookie_samesite,
    };
  }
}

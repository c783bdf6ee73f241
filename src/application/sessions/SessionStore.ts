import { createConsoleLikeLogger, type ConsoleLikeLogger } from '../../infrastructure/logging/createConsoleLikeLogger';

export type SessionState = 'selecting_preference' | 'awaiting_payload';

export const INITIAL_STATE: SessionState = 'selecting_preference';

export interface Session {
  readonly userId: number;
  readonly chatId: number;
  readonly state: SessionState;
  /** `true` envia enquetes anônimas; `false` mostra quem votou. */
  readonly anonymous: boolean;
  readonly lastActivityAt: number;
  readonly requestCount: number;
  readonly createdAt: number;
}

export type SessionPatch = Partial<Pick<Session, 'chatId' | 'state' | 'anonymous' | 'lastActivityAt' | 'requestCount'>>;

export interface SessionRepository {
  load(userId: number): Promise<Session | undefined>;
  save(session: Session): Promise<void>;
  saveMany(sessions: readonly Session[]): Promise<void>;
  reconnect(): Promise<void>;
}

export class InMemorySessionRepository implements SessionRepository {
  private readonly store = new Map<number, Session>();

  async load(userId: number): Promise<Session | undefined> {
    return this.store.get(userId);
  }

  async save(session: Session): Promise<void> {
    this.store.set(session.userId, session);
  }

  async saveMany(sessions: readonly Session[]): Promise<void> {
    sessions.forEach((session) => this.store.set(session.userId, session));
  }

  async reconnect(): Promise<void> {
    // nada a reabrir
  }

  get size(): number {
    return this.store.size;
  }
}

export function createSession(userId: number, chatId: number, now: number): Session {
  return {
    userId,
    chatId,
    state: INITIAL_STATE,
    anonymous: true,
    lastActivityAt: now,
    requestCount: 0,
    createdAt: now,
  };
}

export interface SessionStoreOptions {
  readonly repository?: SessionRepository;
  readonly retentionMs: number;
  readonly now?: () => number;
  readonly logger?: ConsoleLikeLogger;
}

export interface SweepResult {
  readonly evicted: number;
  readonly persisted: boolean;
}

export type PersistResult = { readonly ok: true; readonly count: number } | { readonly ok: false; readonly error: Error };

/**
 * Dono exclusivo do ciclo de vida das sessões. Cache em memória com
 * leitura através do repositório durável e varredura por inatividade.
 */
export class SessionStore {
  private readonly sessions = new Map<number, Session>();
  private readonly repository: SessionRepository;
  private readonly retentionMs: number;
  private readonly now: () => number;
  private readonly logger: ConsoleLikeLogger;

  constructor(options: SessionStoreOptions) {
    this.repository = options.repository ?? new InMemorySessionRepository();
    this.retentionMs = options.retentionMs;
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger ?? createConsoleLikeLogger({ component: 'sessions' });
  }

  async get(userId: number, chatId: number): Promise<Session> {
    const cached = this.sessions.get(userId);
    if (cached) {
      return cached.chatId === chatId ? cached : this.put({ ...cached, chatId });
    }

    try {
      const stored = await this.repository.load(userId);
      if (stored) {
        const current = this.sessions.get(userId);
        if (current) {
          return current;
        }
        return this.put({ ...stored, chatId });
      }
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.warn(`[sessions] falha ao carregar sessão ${userId}: ${err.message}`);
    }

    return this.sessions.get(userId) ?? this.put(createSession(userId, chatId, this.now()));
  }

  peek(userId: number): Session | undefined {
    return this.sessions.get(userId);
  }

  update(userId: number, patch: SessionPatch): Session | undefined {
    const current = this.sessions.get(userId);
    if (!current) {
      return undefined;
    }
    return this.put({ ...current, ...patch });
  }

  /** Marca atividade e conta mais uma requisição. */
  touch(userId: number): Session | undefined {
    const current = this.sessions.get(userId);
    if (!current) {
      return undefined;
    }
    return this.put({ ...current, lastActivityAt: this.now(), requestCount: current.requestCount + 1 });
  }

  /**
   * Tira um retrato das sessões expiradas, persiste e só então remove as
   * que não foram tocadas depois do retrato.
   */
  async sweep(): Promise<SweepResult> {
    const cutoff = this.now() - this.retentionMs;
    const candidates = Array.from(this.sessions.values()).filter((session) => session.lastActivityAt < cutoff);
    if (candidates.length === 0) {
      return { evicted: 0, persisted: true };
    }

    const persistence = await this.persist(candidates);
    if (!persistence.ok) {
      this.logger.warn(`[sessions] varredura: falha ao persistir ${candidates.length} sessões: ${persistence.error.message}`);
    }

    let evicted = 0;
    for (const candidate of candidates) {
      const current = this.sessions.get(candidate.userId);
      if (current && current.lastActivityAt === candidate.lastActivityAt) {
        this.sessions.delete(candidate.userId);
        evicted += 1;
      }
    }
    if (evicted > 0) {
      this.logger.info(`[sessions] varredura removeu ${evicted} sessões inativas`);
    }
    return { evicted, persisted: persistence.ok };
  }

  async backup(): Promise<PersistResult> {
    const snapshot = Array.from(this.sessions.values());
    if (snapshot.length === 0) {
      return { ok: true, count: 0 };
    }
    const result = await this.persist(snapshot);
    if (!result.ok) {
      this.logger.warn(`[sessions] backup falhou: ${result.error.message}`);
    }
    return result;
  }

  async reconnect(): Promise<boolean> {
    try {
      await this.repository.reconnect();
      return true;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`[sessions] falha ao reabrir o repositório: ${err.message}`);
      return false;
    }
  }

  get size(): number {
    return this.sessions.size;
  }

  private put(session: Session): Session {
    this.sessions.set(session.userId, session);
    return session;
  }

  private async persist(sessions: readonly Session[]): Promise<PersistResult> {
    try {
      await this.repository.saveMany(sessions);
      return { ok: true, count: sessions.length };
    } catch (error) {
      return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
    }
  }
}

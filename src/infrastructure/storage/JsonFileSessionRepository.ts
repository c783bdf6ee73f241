import fs from 'node:fs/promises';
import path from 'node:path';
import type { Session, SessionRepository, SessionState } from '../../application/sessions/SessionStore';
import { createConsoleLikeLogger, type ConsoleLikeLogger } from '../logging/createConsoleLikeLogger';

const STATES: readonly SessionState[] = ['selecting_preference', 'awaiting_payload'];

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isState(value: unknown): value is SessionState {
  return STATES.some((state) => state === value);
}

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseSession(entry: unknown): Session | null {
  if (!isRecord(entry)) {
    return null;
  }
  const state = entry.state;
  if (
    !isFiniteNumber(entry.userId)
    || !isFiniteNumber(entry.chatId)
    || !isState(state)
    || typeof entry.anonymous !== 'boolean'
    || !isFiniteNumber(entry.lastActivityAt)
    || !isFiniteNumber(entry.requestCount)
    || !isFiniteNumber(entry.createdAt)
  ) {
    return null;
  }
  return {
    userId: entry.userId,
    chatId: entry.chatId,
    state,
    anonymous: entry.anonymous,
    lastActivityAt: entry.lastActivityAt,
    requestCount: entry.requestCount,
    createdAt: entry.createdAt,
  };
}

function parseSessionList(raw: string): Map<number, Session> {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    throw new Error('conteúdo não é uma lista de sessões');
  }
  const sessions = new Map<number, Session>();
  parsed.forEach((value: unknown) => {
    const session = parseSession(value);
    if (session) {
      sessions.set(session.userId, session);
    }
  });
  return sessions;
}

/**
 * Repositório em arquivo JSON único. As gravações são encadeadas e feitas
 * em arquivo temporário seguido de `rename`. Um arquivo ilegível é movido
 * para `<arquivo>.corrupt` e o repositório recomeça vazio.
 */
export class JsonFileSessionRepository implements SessionRepository {
  private cache: Map<number, Session> | null = null;
  private loading: Promise<Map<number, Session>> | null = null;
  private writes: Promise<void> = Promise.resolve();
  private readonly logger: ConsoleLikeLogger;

  constructor(private readonly filePath: string, logger?: ConsoleLikeLogger) {
    this.logger = logger ?? createConsoleLikeLogger({ component: 'sessions' });
  }

  async load(userId: number): Promise<Session | undefined> {
    const sessions = await this.read();
    return sessions.get(userId);
  }

  async save(session: Session): Promise<void> {
    await this.saveMany([session]);
  }

  async saveMany(sessions: readonly Session[]): Promise<void> {
    const current = await this.read();
    sessions.forEach((session) => current.set(session.userId, session));
    await this.flush(current);
  }

  async reconnect(): Promise<void> {
    await this.writes;
    this.cache = null;
    this.loading = null;
    await this.read();
  }

  private async read(): Promise<Map<number, Session>> {
    if (this.cache) {
      return this.cache;
    }
    this.loading = this.loading ?? this.readFromDisk();
    try {
      const loaded = await this.loading;
      this.cache = loaded;
      return loaded;
    } catch (error) {
      this.loading = null;
      throw error;
    }
  }

  private async readFromDisk(): Promise<Map<number, Session>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isRecord(error) && error.code === 'ENOENT') {
        return new Map();
      }
      throw error;
    }
    try {
      return parseSessionList(raw);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      const aside = `${this.filePath}.corrupt`;
      await fs.rename(this.filePath, aside);
      this.logger.warn(`[sessions] ${this.filePath} ilegível (${err.message}); movido para ${aside}`);
      return new Map();
    }
  }

  private async flush(sessions: Map<number, Session>): Promise<void> {
    const body = JSON.stringify(Array.from(sessions.values()), null, 2);
    const run = async (): Promise<void> => {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      const tmp = `${this.filePath}.tmp`;
      await fs.writeFile(tmp, body, 'utf8');
      await fs.rename(tmp, this.filePath);
    };
    const next = this.writes.then(run, run);
    this.writes = next.catch(() => undefined);
    await next;
  }
}

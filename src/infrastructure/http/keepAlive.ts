import { createConsoleLikeLogger, type ConsoleLikeLogger } from '../logging/createConsoleLikeLogger';
import type { ScheduledTask } from '../telegram/LifecycleManager';

export const HEALTH_PATH = '/health';

export type KeepAliveFetch = (
  url: string,
  init: { readonly headers: Record<string, string>; readonly signal: AbortSignal },
) => Promise<{ readonly ok: boolean; readonly status: number }>;

export interface KeepAliveOptions {
  readonly publicUrl: string;
  readonly intervalMs: number;
  readonly timeoutMs?: number;
  readonly fetch?: KeepAliveFetch;
  readonly logger?: ConsoleLikeLogger;
}

export function resolveHealthUrl(publicUrl: string): string {
  return `${publicUrl.replace(/\/+$/, '')}${HEALTH_PATH}`;
}

/**
 * Consulta o próprio `/health` pela URL pública para a hospedagem não
 * suspender o serviço por inatividade.
 */
export function createKeepAliveTask(options: KeepAliveOptions): ScheduledTask {
  const url = resolveHealthUrl(options.publicUrl);
  const timeoutMs = options.timeoutMs ?? 5_000;
  const request: KeepAliveFetch = options.fetch ?? ((target, init) => fetch(target, init));
  const logger = options.logger ?? createConsoleLikeLogger({ component: 'keepalive' });
  return {
    name: 'keep-alive',
    intervalMs: options.intervalMs,
    run: async () => {
      const response = await request(url, {
        headers: { 'User-Agent': 'quiz-poll-bot-keepalive' },
        signal: AbortSignal.timeout(timeoutMs),
      });
      if (!response.ok) {
        logger.warn(`[keepalive] ${url} respondeu ${response.status}`);
        return false;
      }
      logger.debug?.(`[keepalive] ${url} ok`);
      return true;
    },
  };
}

import { createConsoleLikeLogger, type ConsoleLikeLogger } from '../../infrastructure/logging/createConsoleLikeLogger';
import type { QuestionRecord } from '../../validation/quizPayload';
import type {
  MessageOptions,
  QuizPollRequest,
  QuizTransport,
  SentMessage,
  SentPoll,
  TransportOutcome,
} from './QuizTransport';

export interface DeliveryConfig {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxRetryAfterMs: number;
  readonly retryAfterPaddingMs: number;
  readonly pollSpacingMs: number;
  readonly minPollOptions: number;
  readonly maxPollOptions: number;
}

export const DEFAULT_DELIVERY_CONFIG: DeliveryConfig = Object.freeze({
  maxAttempts: 3,
  baseDelayMs: 2_000,
  maxRetryAfterMs: 30_000,
  retryAfterPaddingMs: 1_000,
  pollSpacingMs: 50,
  minPollOptions: 2,
  maxPollOptions: 10,
});

export interface DeliveryHealthSink {
  recordSuccess(): void;
  recordError(source: string, error?: Error): void;
}

export interface DeliveryServiceOptions {
  readonly transport: QuizTransport;
  readonly config?: Partial<DeliveryConfig>;
  readonly health?: DeliveryHealthSink;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly logger?: ConsoleLikeLogger;
}

export interface DeliveryStats {
  readonly successes: number;
  readonly failures: number;
}

/** Pergunta pronta para envio; `correctOptionId` ausente vira 0. */
export interface PollDraft {
  readonly question: string;
  readonly options: readonly string[];
  readonly correctOptionId?: number;
  readonly explanation?: string;
}

async function sleep(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Envio confiável sobre o transporte. Todas as primitivas passam por
 * `withRetry`; o retorno `null` significa "este passo não aconteceu".
 */
export class DeliveryService {
  private readonly transport: QuizTransport;
  private readonly config: DeliveryConfig;
  private readonly health?: DeliveryHealthSink;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: ConsoleLikeLogger;
  private successes = 0;
  private failures = 0;

  constructor(options: DeliveryServiceOptions) {
    this.transport = options.transport;
    this.config = { ...DEFAULT_DELIVERY_CONFIG, ...options.config };
    this.health = options.health;
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? createConsoleLikeLogger({ component: 'delivery' });
    if (this.config.maxAttempts < 1) {
      throw new Error('maxAttempts deve ser pelo menos 1');
    }
  }

  async sendMessage(chatId: number, text: string, options?: MessageOptions): Promise<SentMessage | null> {
    return this.withRetry('sendMessage', () => this.transport.sendMessage(chatId, text, options));
  }

  async editMessage(message: SentMessage, text: string, options?: MessageOptions): Promise<SentMessage | null> {
    return this.withRetry('editMessage', () => this.transport.editMessage(message, text, options));
  }

  async sendQuizPoll(chatId: number, draft: PollDraft, anonymous: boolean): Promise<SentPoll | null> {
    const request = this.buildPollRequest(chatId, draft, anonymous);
    if (!request) {
      return null;
    }
    return this.withRetry('sendQuizPoll', () => this.transport.sendQuizPoll(request));
  }

  /**
   * Envia uma enquete por pergunta, na ordem, e devolve quantas o
   * transporte confirmou. `shouldContinue` interrompe o lote (timeout).
   */
  async sendQuiz(
    chatId: number,
    questions: readonly QuestionRecord[],
    anonymous: boolean,
    shouldContinue: () => boolean = () => true,
  ): Promise<number> {
    let acknowledged = 0;
    for (let index = 0; index < questions.length; index += 1) {
      if (!shouldContinue()) {
        break;
      }
      const sent = await this.sendQuizPoll(chatId, questions[index], anonymous);
      if (sent) {
        acknowledged += 1;
      }
      if (index < questions.length - 1 && this.config.pollSpacingMs > 0) {
        await this.sleep(this.config.pollSpacingMs);
      }
    }
    return acknowledged;
  }

  stats(): DeliveryStats {
    return { successes: this.successes, failures: this.failures };
  }

  private buildPollRequest(chatId: number, draft: PollDraft, anonymous: boolean): QuizPollRequest | null {
    const correctOptionId = draft.correctOptionId ?? 0;
    const { minPollOptions, maxPollOptions } = this.config;
    let problem: string | null = null;
    if (typeof draft.question !== 'string' || draft.question.trim().length === 0) {
      problem = 'pergunta vazia';
    } else if (!Array.isArray(draft.options) || draft.options.length < minPollOptions || draft.options.length > maxPollOptions) {
      problem = `quantidade de opções fora de ${minPollOptions}-${maxPollOptions}`;
    } else if (!Number.isInteger(correctOptionId) || correctOptionId < 0 || correctOptionId >= draft.options.length) {
      problem = `correctOptionId ${correctOptionId} fora do intervalo`;
    }
    if (problem) {
      this.logger.warn(`[delivery] enquete recusada antes do envio: ${problem}`);
      return null;
    }
    const request: QuizPollRequest = {
      chatId,
      question: draft.question,
      options: draft.options,
      correctOptionId,
      anonymous,
    };
    return draft.explanation ? { ...request, explanation: draft.explanation } : request;
  }

  private async withRetry<T>(label: string, call: () => Promise<TransportOutcome<T>>): Promise<T | null> {
    const { maxAttempts, baseDelayMs, maxRetryAfterMs, retryAfterPaddingMs } = this.config;
    const maxRateLimitWaits = maxAttempts * 10;
    let attempt = 1;
    let rateLimitWaits = 0;
    let lastError: Error | undefined;

    while (attempt <= maxAttempts) {
      let outcome: TransportOutcome<T>;
      try {
        outcome = await call();
      } catch (error) {
        outcome = { kind: 'malformed', error: toError(error) };
      }

      if (outcome.kind === 'ok') {
        this.successes += 1;
        this.health?.recordSuccess();
        return outcome.value;
      }

      lastError = outcome.error;

      if (outcome.kind === 'rate_limited') {
        rateLimitWaits += 1;
        if (rateLimitWaits > maxRateLimitWaits) {
          this.logger.warn(`[delivery] ${label}: limite de esperas por rate limit atingido`);
          break;
        }
        const waitMs = Math.min(outcome.retryAfterMs + retryAfterPaddingMs, maxRetryAfterMs);
        this.logger.warn(`[delivery] ${label}: transporte pediu para aguardar ${waitMs}ms`);
        await this.sleep(waitMs);
        continue;
      }

      if (outcome.kind === 'malformed') {
        this.logger.warn(`[delivery] ${label}: requisição rejeitada: ${outcome.error.message}`);
        break;
      }

      if (attempt < maxAttempts) {
        const delay = baseDelayMs * attempt;
        this.logger.debug?.(`[delivery] ${label}: falha transitória (tentativa ${attempt}), nova tentativa em ${delay}ms`);
        await this.sleep(delay);
      }
      attempt += 1;
    }

    this.failures += 1;
    this.health?.recordError(label, lastError);
    this.logger.warn(`[delivery] ${label}: desistindo: ${lastError?.message ?? 'sem detalhes'}`);
    return null;
  }
}

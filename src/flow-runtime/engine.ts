import { CALLBACK_ANONYMOUS, CALLBACK_ATTRIBUTED, TEXT, type QuizTextConfig } from '../config/messages';
import type { DeliveryService } from '../application/messaging/DeliveryService';
import type { MessageOptions, SentMessage } from '../application/messaging/QuizTransport';
import type { AuditLog, AuditRecord } from '../application/sessions/AuditLog';
import { INITIAL_STATE, type Session, type SessionState, type SessionStore } from '../application/sessions/SessionStore';
import { createConsoleLikeLogger, type ConsoleLikeLogger } from '../infrastructure/logging/createConsoleLikeLogger';
import {
  DEFAULT_VALIDATION_LIMITS,
  validateQuizPayload,
  type ValidationIssue,
  type ValidationLimits,
} from '../validation/quizPayload';
import { KeyedSerialQueue } from './keyedSerialQueue';
import type { RateController } from './rateController';
import { withTimeout } from './timeout';

export type EventKind = 'begin' | 'preference' | 'text' | 'help' | 'template' | 'quickstart' | 'status' | 'toggle';

export interface InboundEvent {
  readonly userId: number;
  readonly chatId: number;
  readonly kind: EventKind;
  /** Texto enviado (`text`) ou dado do botão (`preference`). */
  readonly payload?: string;
  readonly firstName?: string;
  /** Mensagem com o teclado de escolha, editada ao confirmar a preferência. */
  readonly sourceMessageId?: number;
}

export type SubmissionResult = 'delivered' | 'partial' | 'validation_failed' | 'decode_failed';

export interface SubmissionOutcome {
  readonly result: SubmissionResult;
  readonly total: number;
  readonly delivered: number;
  readonly errors: readonly ValidationIssue[];
}

export type EventStatus = 'handled' | 'rate_limited' | 'timed_out' | 'failed';

export interface EventOutcome {
  readonly status: EventStatus;
  readonly state: SessionState;
  readonly submission?: SubmissionOutcome;
  readonly retryAfterMs?: number;
}

export interface EngineHealthSink {
  recordRequest(): void;
  recordError(source: string, error?: Error): void;
}

export interface QuizFlowEngineOptions {
  readonly store: SessionStore;
  readonly delivery: DeliveryService;
  readonly rate: RateController;
  readonly health?: EngineHealthSink;
  readonly audit?: AuditLog;
  readonly texts?: QuizTextConfig;
  readonly limits?: ValidationLimits;
  readonly eventTimeoutMs?: number;
  readonly messageSpacingMs?: number;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly now?: () => number;
  readonly logger?: ConsoleLikeLogger;
}

export const DEFAULT_EVENT_TIMEOUT_MS = 30_000;

const MARKDOWN: MessageOptions = { parseMode: 'Markdown' };

/** Marca de uma execução; depois do timeout nada mais chega ao usuário. */
interface EventRun {
  expired: boolean;
}

async function sleep(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}

export function parsePreference(payload: string | undefined): boolean | null {
  const value = String(payload ?? '').trim().toLowerCase();
  if (value === CALLBACK_ANONYMOUS || value === 'anonymous' || value === 'true') {
    return true;
  }
  if (value === CALLBACK_ATTRIBUTED || value === 'attributed' || value === 'false') {
    return false;
  }
  return null;
}

/**
 * Máquina de estados da conversa. Um evento por vez por usuário; usuários
 * diferentes em paralelo. O ciclo é
 * `selecting_preference → awaiting_payload → selecting_preference`.
 */
export class QuizFlowEngine {
  private readonly store: SessionStore;
  private readonly delivery: DeliveryService;
  private readonly rate: RateController;
  private readonly health?: EngineHealthSink;
  private readonly audit?: AuditLog;
  private readonly texts: QuizTextConfig;
  private readonly limits: ValidationLimits;
  private readonly eventTimeoutMs: number;
  private readonly messageSpacingMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly logger: ConsoleLikeLogger;
  private readonly queue = new KeyedSerialQueue<number>();

  constructor(options: QuizFlowEngineOptions) {
    this.store = options.store;
    this.delivery = options.delivery;
    this.rate = options.rate;
    this.health = options.health;
    this.audit = options.audit;
    this.texts = options.texts ?? TEXT;
    this.limits = options.limits ?? DEFAULT_VALIDATION_LIMITS;
    this.eventTimeoutMs = options.eventTimeoutMs ?? DEFAULT_EVENT_TIMEOUT_MS;
    this.messageSpacingMs = options.messageSpacingMs ?? 100;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger ?? createConsoleLikeLogger({ component: 'engine' });
  }

  async handleEvent(event: InboundEvent): Promise<EventOutcome> {
    const decision = this.rate.check(event.userId);
    if (!decision.allowed) {
      this.logger.debug?.(`[engine] usuário ${event.userId} limitado (${decision.window}) por ${decision.retryAfterMs}ms`);
      if (decision.fresh) {
        const seconds = Math.ceil(decision.retryAfterMs / 1000);
        await this.delivery.sendMessage(event.chatId, this.texts.rateLimited(seconds));
      }
      return {
        status: 'rate_limited',
        state: this.store.peek(event.userId)?.state ?? INITIAL_STATE,
        retryAfterMs: decision.retryAfterMs,
      };
    }
    this.health?.recordRequest();

    return this.queue.run(event.userId, async () => {
      const run: EventRun = { expired: false };
      const timed = await withTimeout(this.process(event, run), this.eventTimeoutMs);
      if (timed.ok) {
        return timed.value;
      }
      run.expired = true;
      this.logger.warn(`[engine] evento ${event.kind} do usuário ${event.userId} excedeu ${this.eventTimeoutMs}ms`);
      return { status: 'timed_out', state: this.store.peek(event.userId)?.state ?? INITIAL_STATE };
    });
  }

  private async process(event: InboundEvent, run: EventRun): Promise<EventOutcome> {
    await this.store.get(event.userId, event.chatId);
    const session = this.store.touch(event.userId);
    if (!session) {
      return { status: 'failed', state: INITIAL_STATE };
    }

    try {
      return await this.dispatch(event, session, run);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`[engine] falha ao processar ${event.kind} do usuário ${event.userId}: ${err.message}`);
      this.health?.recordError('engine', err);
      this.setState(event.userId, INITIAL_STATE, run);
      await this.send(event.chatId, this.texts.genericError, run, MARKDOWN);
      await this.restart(event.chatId, run);
      return { status: 'failed', state: this.currentState(event.userId) };
    }
  }

  private async dispatch(event: InboundEvent, session: Session, run: EventRun): Promise<EventOutcome> {
    switch (event.kind) {
      case 'begin':
        await this.begin(event, run);
        break;
      case 'preference': {
        const anonymous = parsePreference(event.payload);
        if (anonymous === null) {
          this.logger.warn(`[engine] preferência desconhecida: ${String(event.payload)}`);
          break;
        }
        await this.choosePreference(event, anonymous, run);
        break;
      }
      case 'text': {
        if (session.state !== 'awaiting_payload') {
          await this.send(event.chatId, this.texts.redirect, run, MARKDOWN);
          await this.begin(event, run);
          break;
        }
        const submission = await this.submitPayload(event, session, run);
        return { status: 'handled', state: this.currentState(event.userId), submission };
      }
      case 'help':
        await this.send(event.chatId, this.texts.help, run, MARKDOWN);
        break;
      case 'quickstart':
        await this.send(event.chatId, this.texts.quickstart, run, MARKDOWN);
        break;
      case 'template': {
        const header = await this.send(event.chatId, this.texts.templateHeader, run, MARKDOWN);
        if (header) {
          const template = await this.send(event.chatId, this.texts.jsonTemplate, run);
          if (template) {
            await this.send(event.chatId, this.texts.templateHint, run, MARKDOWN);
          }
        }
        break;
      }
      case 'status':
        await this.send(
          event.chatId,
          this.texts.status({
            name: event.firstName || 'User',
            chatId: event.chatId,
            anonymous: session.anonymous,
            activeUsers: this.store.size,
          }),
          run,
          MARKDOWN,
        );
        break;
      case 'toggle':
        await this.send(event.chatId, this.texts.toggle(session.anonymous), run, {
          ...MARKDOWN,
          keyboard: this.texts.toggleButtons,
        });
        break;
    }
    return { status: 'handled', state: this.currentState(event.userId) };
  }

  private async begin(event: InboundEvent, run: EventRun): Promise<void> {
    this.setState(event.userId, 'selecting_preference', run);
    const greeting = `${this.texts.greeting(event.firstName || 'Friend')}\n\n${this.texts.welcomeBody}`;
    await this.send(event.chatId, greeting, run, MARKDOWN);
    await this.showStyleChoice(event.chatId, run);
  }

  private async choosePreference(event: InboundEvent, anonymous: boolean, run: EventRun): Promise<void> {
    if (run.expired) {
      return;
    }
    this.store.update(event.userId, { anonymous, state: 'awaiting_payload' });
    this.appendAudit({ at: this.now(), userId: event.userId, kind: 'preference_changed', detail: { anonymous } });

    const confirmation = this.texts.preferenceSelected(anonymous);
    if (event.sourceMessageId !== undefined) {
      const source: SentMessage = { chatId: event.chatId, messageId: event.sourceMessageId };
      await this.edit(source, confirmation, run, MARKDOWN);
    } else {
      await this.send(event.chatId, confirmation, run, MARKDOWN);
    }
    await this.pause(run);
    await this.send(event.chatId, this.texts.jsonTemplate, run);
    await this.pause(run);
    await this.send(event.chatId, this.texts.payloadInstructions(anonymous), run, MARKDOWN);
  }

  private async submitPayload(event: InboundEvent, session: Session, run: EventRun): Promise<SubmissionOutcome> {
    const anonymous = session.anonymous;
    // o estado volta ao início antes de qualquer envio: timeout ou falha
    // de transporte nunca deixam o usuário preso aguardando o JSON
    this.setState(event.userId, 'selecting_preference', run);

    const processing = await this.send(event.chatId, this.texts.processing, run, MARKDOWN);
    const report = async (text: string, options?: MessageOptions): Promise<void> => {
      if (processing) {
        await this.edit(processing, text, run, options);
      } else {
        await this.send(event.chatId, text, run, options);
      }
    };

    const validation = validateQuizPayload(event.payload ?? '', this.limits);
    let outcome: SubmissionOutcome;
    if (!validation.ok) {
      const first = validation.errors[0];
      const text = validation.kind === 'decode'
        ? this.texts.decodeError
        : this.texts.validationError(first?.message ?? 'Invalid format');
      await report(text);
      outcome = {
        result: validation.kind === 'decode' ? 'decode_failed' : 'validation_failed',
        total: 0,
        delivered: 0,
        errors: validation.errors,
      };
    } else {
      const total = validation.questions.length;
      await report(this.texts.validated(total, anonymous), MARKDOWN);
      const delivered = await this.delivery.sendQuiz(event.chatId, validation.questions, anonymous, () => !run.expired);
      if (delivered === total) {
        await report(this.texts.completed(delivered, anonymous), MARKDOWN);
      } else {
        await report(this.texts.partial(delivered, total), MARKDOWN);
      }
      outcome = { result: delivered === total ? 'delivered' : 'partial', total, delivered, errors: [] };
      this.logger.info(`[engine] ${delivered}/${total} enquetes entregues ao usuário ${event.userId}`);
    }

    this.appendAudit({
      at: this.now(),
      userId: event.userId,
      kind: 'payload_submitted',
      detail: { result: outcome.result, total: outcome.total, delivered: outcome.delivered, anonymous },
    });
    await this.restart(event.chatId, run);
    return outcome;
  }

  private async restart(chatId: number, run: EventRun): Promise<void> {
    await this.pause(run);
    await this.send(chatId, this.texts.restartHeader, run, MARKDOWN);
    await this.pause(run);
    await this.send(chatId, this.texts.welcomeBody, run, MARKDOWN);
    await this.pause(run);
    await this.showStyleChoice(chatId, run);
  }

  private async showStyleChoice(chatId: number, run: EventRun): Promise<void> {
    await this.send(chatId, this.texts.styleChoice, run, { ...MARKDOWN, keyboard: this.texts.styleButtons });
  }

  private setState(userId: number, state: SessionState, run: EventRun): void {
    if (run.expired) {
      return;
    }
    this.store.update(userId, { state });
  }

  private currentState(userId: number): SessionState {
    return this.store.peek(userId)?.state ?? INITIAL_STATE;
  }

  private async send(chatId: number, text: string, run: EventRun, options?: MessageOptions): Promise<SentMessage | null> {
    if (run.expired) {
      return null;
    }
    return this.delivery.sendMessage(chatId, text, options);
  }

  private async edit(message: SentMessage, text: string, run: EventRun, options?: MessageOptions): Promise<SentMessage | null> {
    if (run.expired) {
      return null;
    }
    return this.delivery.editMessage(message, text, options);
  }

  private async pause(run: EventRun): Promise<void> {
    if (run.expired || this.messageSpacingMs <= 0) {
      return;
    }
    await this.sleep(this.messageSpacingMs);
  }

  private appendAudit(record: AuditRecord): void {
    if (!this.audit) {
      return;
    }
    void this.audit.append(record).catch((error: unknown) => {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.warn(`[engine] falha ao registrar auditoria: ${err.message}`);
    });
  }
}

export default QuizFlowEngine;

import type { EventKind, EventOutcome, InboundEvent } from '../../flow-runtime/engine';
import { createConsoleLikeLogger, type ConsoleLikeLogger } from '../../infrastructure/logging/createConsoleLikeLogger';

interface UpdateOrigin {
  readonly userId: number;
  readonly chatId: number;
  readonly firstName?: string;
}

export type InboundUpdate =
  | (UpdateOrigin & { readonly type: 'command'; readonly command: string })
  | (UpdateOrigin & { readonly type: 'callback'; readonly data: string; readonly messageId?: number })
  | (UpdateOrigin & { readonly type: 'text'; readonly text: string });

export interface EventHandlerPort {
  handleEvent(event: InboundEvent): Promise<EventOutcome>;
}

export interface MessageRouterDeps {
  readonly engine: EventHandlerPort;
  readonly logger?: ConsoleLikeLogger;
}

export type UpdateProcessingContext = MessageRouterDeps & { readonly update: InboundUpdate };

export interface UpdateHandler {
  setNext(handler: UpdateHandler | null): UpdateHandler;
  handle(context: UpdateProcessingContext): Promise<EventOutcome | null>;
}

abstract class BaseUpdateHandler implements UpdateHandler {
  private next: UpdateHandler | null = null;

  setNext(handler: UpdateHandler | null): UpdateHandler {
    this.next = handler;
    return handler ?? this;
  }

  protected async handleNext(context: UpdateProcessingContext): Promise<EventOutcome | null> {
    if (!this.next) {
      return null;
    }
    return this.next.handle(context);
  }

  abstract handle(context: UpdateProcessingContext): Promise<EventOutcome | null>;
}

const COMMANDS: Readonly<Record<string, EventKind>> = {
  start: 'begin',
  help: 'help',
  template: 'template',
  quickstart: 'quickstart',
  status: 'status',
  toggle: 'toggle',
};

/** `/Start@QuizBot arg` → `start`. */
export function normalizeCommand(raw: string): string {
  const [head = ''] = raw.trim().split(/\s+/);
  return head.replace(/^\//, '').split('@')[0].toLowerCase();
}

function toEvent(update: InboundUpdate, kind: EventKind, extra: Partial<InboundEvent> = {}): InboundEvent {
  return {
    userId: update.userId,
    chatId: update.chatId,
    firstName: update.firstName,
    kind,
    ...extra,
  };
}

class CommandUpdateHandler extends BaseUpdateHandler {
  async handle(context: UpdateProcessingContext): Promise<EventOutcome | null> {
    const { update } = context;
    if (update.type !== 'command') {
      return this.handleNext(context);
    }
    const kind = COMMANDS[normalizeCommand(update.command)];
    if (!kind) {
      return this.handleNext(context);
    }
    return context.engine.handleEvent(toEvent(update, kind));
  }
}

class CallbackUpdateHandler extends BaseUpdateHandler {
  private readonly preferencePattern = /^anonymous_(true|false)$/;

  async handle(context: UpdateProcessingContext): Promise<EventOutcome | null> {
    const { update } = context;
    if (update.type !== 'callback' || !this.preferencePattern.test(update.data)) {
      return this.handleNext(context);
    }
    return context.engine.handleEvent(
      toEvent(update, 'preference', { payload: update.data, sourceMessageId: update.messageId }),
    );
  }
}

class TextUpdateHandler extends BaseUpdateHandler {
  async handle(context: UpdateProcessingContext): Promise<EventOutcome | null> {
    const { update } = context;
    if (update.type !== 'text' || update.text.trim().length === 0) {
      return this.handleNext(context);
    }
    return context.engine.handleEvent(toEvent(update, 'text', { payload: update.text }));
  }
}

class DiscardUpdateHandler extends BaseUpdateHandler {
  async handle(context: UpdateProcessingContext): Promise<EventOutcome | null> {
    context.logger?.debug?.(`[router] atualização descartada (${context.update.type}) do usuário ${context.update.userId}`);
    return null;
  }
}

/**
 * Traduz atualizações do transporte em eventos da máquina de estados.
 * Comandos desconhecidos e botões que não são de preferência são descartados.
 */
export class MessageRouter {
  private readonly head: UpdateHandler;
  private readonly deps: MessageRouterDeps;

  constructor(deps: MessageRouterDeps) {
    this.deps = { ...deps, logger: deps.logger ?? createConsoleLikeLogger({ component: 'router' }) };
    const command = new CommandUpdateHandler();
    const callback = new CallbackUpdateHandler();
    const text = new TextUpdateHandler();
    const discard = new DiscardUpdateHandler();
    command.setNext(callback).setNext(text).setNext(discard);
    this.head = command;
  }

  async route(update: InboundUpdate): Promise<EventOutcome | null> {
    return this.head.handle({ ...this.deps, update });
  }
}

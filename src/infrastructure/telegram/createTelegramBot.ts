import { run, sequentialize, type RunnerHandle } from '@grammyjs/runner';
import { Bot, type BotConfig, type Context } from 'grammy';
import type { InboundUpdate, MessageRouter } from '../../application/messaging/MessageRouter';
import { createConsoleLikeLogger, type ConsoleLikeLogger } from '../logging/createConsoleLikeLogger';

interface SenderLike {
  readonly id: number;
  readonly first_name: string;
}

export interface TextMessageLike {
  readonly text: string;
  readonly chat: { readonly id: number };
  readonly from?: SenderLike;
}

export interface CallbackQueryLike {
  readonly data?: string;
  readonly from: SenderLike;
  readonly message?: { readonly message_id: number; readonly chat: { readonly id: number } };
}

/** Texto iniciado por `/` vira comando; o resto é conteúdo livre. */
export function toTextUpdate(message: TextMessageLike): InboundUpdate | null {
  if (!message.from) {
    return null;
  }
  const origin = { userId: message.from.id, chatId: message.chat.id, firstName: message.from.first_name };
  if (message.text.startsWith('/')) {
    return { ...origin, type: 'command', command: message.text };
  }
  return { ...origin, type: 'text', text: message.text };
}

export function toCallbackUpdate(query: CallbackQueryLike): InboundUpdate | null {
  if (typeof query.data !== 'string') {
    return null;
  }
  return {
    type: 'callback',
    userId: query.from.id,
    chatId: query.message?.chat.id ?? query.from.id,
    firstName: query.from.first_name,
    data: query.data,
    messageId: query.message?.message_id,
  };
}

/** O que o ciclo de vida precisa do bot, sem depender do grammY nos testes. */
export interface BotRuntime {
  init(): Promise<void>;
  startPolling(): Promise<void>;
  stop(): Promise<void>;
  setWebhook(url: string, secretToken?: string): Promise<void>;
  deleteWebhook(): Promise<void>;
}

export type PollingHandle = Pick<RunnerHandle, 'isRunning' | 'stop' | 'task'>;

export interface BotRuntimeOptions {
  /** Inicia o polling concorrente; o padrão é o `run` do @grammyjs/runner. */
  readonly startRunner?: (bot: Bot) => PollingHandle;
}

const startDefaultRunner = (bot: Bot): PollingHandle => run(bot);

/**
 * O polling usa o runner do grammY: updates de usuários diferentes são
 * processados em paralelo. A promessa de `startPolling` só resolve quando
 * o runner para.
 */
export function createBotRuntime(bot: Bot, options: BotRuntimeOptions = {}): BotRuntime {
  const startRunner = options.startRunner ?? startDefaultRunner;
  let handle: PollingHandle | null = null;
  return {
    init: () => bot.init(),
    startPolling: async () => {
      if (handle?.isRunning()) {
        return;
      }
      const current = startRunner(bot);
      handle = current;
      await current.task();
    },
    stop: async () => {
      const current = handle;
      handle = null;
      if (current?.isRunning()) {
        await current.stop();
      }
    },
    setWebhook: async (url, secretToken) => {
      await bot.api.setWebhook(url, secretToken ? { secret_token: secretToken } : undefined);
    },
    deleteWebhook: async () => {
      await bot.api.deleteWebhook();
    },
  };
}

export interface TelegramBotOptions {
  readonly token: string;
  readonly botConfig?: BotConfig<Context>;
  readonly logger?: ConsoleLikeLogger;
}

/** Cria o bot do grammY; erros de handler são registrados e não derrubam o processo. */
export function createTelegramBot(options: TelegramBotOptions): Bot {
  const logger = options.logger ?? createConsoleLikeLogger({ component: 'telegram' });
  const bot = new Bot(options.token, options.botConfig);
  bot.catch((botError) => {
    const err = botError.error instanceof Error ? botError.error : new Error(String(botError.error));
    logger.error(`[telegram] erro no update ${botError.ctx.update.update_id}: ${err.message}`);
  });
  return bot;
}

/**
 * Conecta botões e mensagens de texto ao roteador e responde os callbacks.
 * Updates do mesmo usuário entram no roteador na ordem em que chegaram.
 */
export function attachRouter(bot: Bot, router: Pick<MessageRouter, 'route'>, logger?: ConsoleLikeLogger): void {
  const log = logger ?? createConsoleLikeLogger({ component: 'telegram' });

  bot.use(sequentialize((ctx: Context) => ctx.from?.id.toString()));

  bot.on('callback_query:data', async (ctx) => {
    try {
      await ctx.answerCallbackQuery();
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      log.warn(`[telegram] answerCallbackQuery falhou: ${err.message}`);
    }
    const update = toCallbackUpdate(ctx.callbackQuery);
    if (update) {
      await router.route(update);
    }
  });

  bot.on('message:text', async (ctx) => {
    const update = toTextUpdate(ctx.message);
    if (update) {
      await router.route(update);
    }
  });
}

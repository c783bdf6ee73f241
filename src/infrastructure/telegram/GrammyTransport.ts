import { GrammyError, HttpError, InlineKeyboard, type Api } from 'grammy';
import type {
  InlineButton,
  MessageOptions,
  QuizPollRequest,
  QuizTransport,
  SentMessage,
  SentPoll,
  TransportOutcome,
} from '../../application/messaging/QuizTransport';

export type TelegramApi = Pick<Api, 'sendMessage' | 'editMessageText' | 'sendPoll'>;

type FailureOutcome = Exclude<TransportOutcome<never>, { readonly kind: 'ok' }>;

const RETRY_AFTER_PATTERN = /retry after (\d+)/i;

/**
 * Traduz erros do grammY para a taxonomia do transporte: 429 pede espera,
 * 5xx e falhas de rede são transitórias, o resto é requisição inválida.
 */
export function classifyTelegramError(error: unknown): FailureOutcome {
  if (error instanceof GrammyError) {
    if (error.error_code === 429) {
      const fromParameters = error.parameters?.retry_after;
      const fromDescription = RETRY_AFTER_PATTERN.exec(error.description)?.[1];
      const seconds = typeof fromParameters === 'number' ? fromParameters : Number(fromDescription ?? 1);
      return { kind: 'rate_limited', retryAfterMs: Math.max(0, seconds) * 1000, error };
    }
    if (error.error_code >= 500) {
      return { kind: 'transient', error };
    }
    return { kind: 'malformed', error };
  }
  if (error instanceof HttpError) {
    return { kind: 'transient', error };
  }
  return { kind: 'malformed', error: error instanceof Error ? error : new Error(String(error)) };
}

export function buildInlineKeyboard(rows: readonly (readonly InlineButton[])[]): InlineKeyboard {
  const keyboard = new InlineKeyboard();
  rows.forEach((row, index) => {
    row.forEach((button) => keyboard.text(button.text, button.callbackData));
    if (index < rows.length - 1) {
      keyboard.row();
    }
  });
  return keyboard;
}

function toOther(options: MessageOptions | undefined): { parse_mode?: MessageOptions['parseMode']; reply_markup?: InlineKeyboard } {
  const other: { parse_mode?: MessageOptions['parseMode']; reply_markup?: InlineKeyboard } = {};
  if (options?.parseMode) {
    other.parse_mode = options.parseMode;
  }
  if (options?.keyboard && options.keyboard.length > 0) {
    other.reply_markup = buildInlineKeyboard(options.keyboard);
  }
  return other;
}

export class GrammyTransport implements QuizTransport {
  constructor(private readonly api: TelegramApi) {}

  async sendMessage(chatId: number, text: string, options?: MessageOptions): Promise<TransportOutcome<SentMessage>> {
    try {
      const message = await this.api.sendMessage(chatId, text, toOther(options));
      return { kind: 'ok', value: { chatId: message.chat.id, messageId: message.message_id } };
    } catch (error) {
      return classifyTelegramError(error);
    }
  }

  async editMessage(message: SentMessage, text: string, options?: MessageOptions): Promise<TransportOutcome<SentMessage>> {
    try {
      const edited = await this.api.editMessageText(message.chatId, message.messageId, text, toOther(options));
      if (edited === true) {
        return { kind: 'ok', value: message };
      }
      return { kind: 'ok', value: { chatId: edited.chat.id, messageId: edited.message_id } };
    } catch (error) {
      return classifyTelegramError(error);
    }
  }

  async sendQuizPoll(request: QuizPollRequest): Promise<TransportOutcome<SentPoll>> {
    try {
      const sent = await this.api.sendPoll(
        request.chatId,
        request.question,
        request.options.map((text) => ({ text })),
        {
          type: 'quiz',
          correct_option_id: request.correctOptionId,
          is_anonymous: request.anonymous,
          ...(request.explanation ? { explanation: request.explanation } : {}),
        },
      );
      return { kind: 'ok', value: { chatId: sent.chat.id, messageId: sent.message_id, pollId: sent.poll.id } };
    } catch (error) {
      return classifyTelegramError(error);
    }
  }
}

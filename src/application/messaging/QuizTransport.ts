export type ParseMode = 'Markdown' | 'MarkdownV2' | 'HTML';

export interface InlineButton {
  readonly text: string;
  readonly callbackData: string;
}

export interface MessageOptions {
  readonly parseMode?: ParseMode;
  /** Linhas de botões inline. */
  readonly keyboard?: readonly (readonly InlineButton[])[];
}

export interface SentMessage {
  readonly chatId: number;
  readonly messageId: number;
}

export interface SentPoll extends SentMessage {
  readonly pollId: string;
}

export interface QuizPollRequest {
  readonly chatId: number;
  readonly question: string;
  readonly options: readonly string[];
  readonly correctOptionId: number;
  readonly anonymous: boolean;
  readonly explanation?: string;
}

/**
 * Resultado tipado de uma chamada ao transporte. O adaptador traduz os
 * erros da plataforma para uma destas variantes; nada é lançado.
 */
export type TransportOutcome<T> =
  | { readonly kind: 'ok'; readonly value: T }
  | { readonly kind: 'transient'; readonly error: Error }
  | { readonly kind: 'rate_limited'; readonly retryAfterMs: number; readonly error: Error }
  | { readonly kind: 'malformed'; readonly error: Error };

export interface QuizTransport {
  sendMessage(chatId: number, text: string, options?: MessageOptions): Promise<TransportOutcome<SentMessage>>;
  editMessage(message: SentMessage, text: string, options?: MessageOptions): Promise<TransportOutcome<SentMessage>>;
  sendQuizPoll(request: QuizPollRequest): Promise<TransportOutcome<SentPoll>>;
}

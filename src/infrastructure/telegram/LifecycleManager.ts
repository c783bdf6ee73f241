import type { HttpServerPort } from '../http/createHttpServer';
import { createConsoleLikeLogger, type ConsoleLikeLogger } from '../logging/createConsoleLikeLogger';
import type { BotRuntime } from './createTelegramBot';

/** Tarefa de fundo executada em intervalo fixo, independente das requisições. */
export interface ScheduledTask {
  readonly name: string;
  readonly intervalMs: number;
  run(): Promise<unknown>;
}

export interface LifecycleManagerOptions {
  readonly bot: BotRuntime;
  readonly http?: HttpServerPort;
  readonly port: number;
  /** Com URL pública o bot recebe updates por webhook; sem ela, long polling. */
  readonly webhookUrl?: string;
  readonly webhookSecret?: string;
  readonly tasks?: readonly ScheduledTask[];
  /** Executado no `stop()` depois de parar as tarefas, antes de parar o bot. */
  readonly onStop?: () => Promise<unknown>;
  readonly scheduler?: (fn: () => void, delay: number) => NodeJS.Timeout;
  readonly clearScheduler?: (timer: NodeJS.Timeout) => void;
  readonly logger?: ConsoleLikeLogger;
}

export type LifecycleMode = 'webhook' | 'polling';

/**
 * Facade do ciclo de vida: sobe o servidor HTTP, registra o webhook ou
 * inicia o polling e agenda as tarefas periódicas. `stop()` desfaz tudo
 * na ordem inversa.
 */
export class LifecycleManager {
  private readonly bot: BotRuntime;
  private readonly http?: HttpServerPort;
  private readonly port: number;
  private readonly webhookUrl?: string;
  private readonly webhookSecret?: string;
  private readonly tasks: readonly ScheduledTask[];
  private readonly onStop?: () => Promise<unknown>;
  private readonly scheduler: (fn: () => void, delay: number) => NodeJS.Timeout;
  private readonly clearScheduler: (timer: NodeJS.Timeout) => void;
  private readonly logger: ConsoleLikeLogger;
  private readonly timers: NodeJS.Timeout[] = [];
  private readonly running = new Set<string>();
  private polling: Promise<void> | null = null;
  private started = false;

  constructor(options: LifecycleManagerOptions) {
    this.bot = options.bot;
    this.http = options.http;
    this.port = options.port;
    this.webhookUrl = options.webhookUrl;
    this.webhookSecret = options.webhookSecret;
    this.tasks = options.tasks ?? [];
    this.onStop = options.onStop;
    this.scheduler = options.scheduler ?? setInterval;
    this.clearScheduler = options.clearScheduler ?? clearInterval;
    this.logger = options.logger ?? createConsoleLikeLogger({ component: 'lifecycle' });
  }

  get mode(): LifecycleMode {
    return this.webhookUrl ? 'webhook' : 'polling';
  }

  get isStarted(): boolean {
    return this.started;
  }

  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.logger.log(`[lifecycle] start() em modo ${this.mode}`);
    await this.bot.init();
    if (this.http) {
      await this.http.listen(this.port);
    }
    if (this.webhookUrl) {
      await this.bot.setWebhook(this.webhookUrl, this.webhookSecret);
      this.logger.info(`[lifecycle] webhook registrado em ${this.webhookUrl}`);
    } else {
      await this.bot.deleteWebhook();
      this.polling = this.bot.startPolling().catch((error: unknown) => {
        const err = error instanceof Error ? error : new Error(String(error));
        this.logger.error(`[lifecycle] polling encerrado com erro: ${err.message}`);
      });
    }
    for (const task of this.tasks) {
      this.schedule(task);
    }
    this.started = true;
  }

  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.started = false;
    this.logger.log('[lifecycle] stop()');
    while (this.timers.length > 0) {
      const timer = this.timers.pop();
      if (timer) {
        this.clearScheduler(timer);
      }
    }
    if (this.onStop) {
      try {
        await this.onStop();
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        this.logger.warn(`[lifecycle] onStop falhou: ${err.message}`);
      }
    }
    try {
      await this.bot.stop();
      await this.polling;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.warn(`[lifecycle] bot.stop() falhou: ${err.message}`);
    }
    this.polling = null;
    if (this.http) {
      try {
        await this.http.close();
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        this.logger.warn(`[lifecycle] http.close() falhou: ${err.message}`);
      }
    }
  }

  /** Executa uma tarefa agora; ignora se a execução anterior ainda não terminou. */
  async runTask(task: ScheduledTask): Promise<boolean> {
    if (this.running.has(task.name)) {
      this.logger.debug?.(`[lifecycle] ${task.name} ainda em execução; pulando`);
      return false;
    }
    this.running.add(task.name);
    try {
      await task.run();
      return true;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`[lifecycle] tarefa ${task.name} falhou: ${err.message}`);
      return false;
    } finally {
      this.running.delete(task.name);
    }
  }

  private schedule(task: ScheduledTask): void {
    const timer = this.scheduler(() => {
      void this.runTask(task);
    }, task.intervalMs);
    timer.unref?.();
    this.timers.push(timer);
  }
}

import path from 'node:path';
import { webhookCallback, type Bot } from 'grammy';
import type { RequestHandler } from 'express';
import { QuizFlowEngine, DEFAULT_EVENT_TIMEOUT_MS } from '../flow-runtime/engine';
import { DEFAULT_RATE_LIMITS, RateController, type RateWindowConfig } from '../flow-runtime/rateController';
import { DEFAULT_VALIDATION_LIMITS, type ValidationLimits } from '../validation/quizPayload';
import { DEFAULT_HEALTH_THRESHOLDS, HealthMonitor, type HealthThresholds, type LevelThresholds } from './health/HealthMonitor';
import { DEFAULT_DELIVERY_CONFIG, DeliveryService, type DeliveryConfig } from './messaging/DeliveryService';
import { MessageRouter } from './messaging/MessageRouter';
import type { QuizTransport } from './messaging/QuizTransport';
import type { AuditLog } from './sessions/AuditLog';
import { SessionStore, type SessionRepository } from './sessions/SessionStore';
import { createHttpApp, HttpServer, WEBHOOK_PATH, type HttpServerPort } from '../infrastructure/http/createHttpServer';
import { createKeepAliveTask, type KeepAliveFetch } from '../infrastructure/http/keepAlive';
import { createConsoleLikeLogger, type ConsoleLikeLogger } from '../infrastructure/logging/createConsoleLikeLogger';
import { JsonFileSessionRepository } from '../infrastructure/storage/JsonFileSessionRepository';
import { JsonlAuditLog } from '../infrastructure/storage/JsonlAuditLog';
import { attachRouter, createBotRuntime, createTelegramBot, type BotRuntime } from '../infrastructure/telegram/createTelegramBot';
import { GrammyTransport } from '../infrastructure/telegram/GrammyTransport';
import { LifecycleManager, type ScheduledTask } from '../infrastructure/telegram/LifecycleManager';

interface DeliverySettings extends DeliveryConfig {
  readonly messageSpacingMs: number;
}

interface RateLimitsConfig {
  readonly short: RateWindowConfig;
  readonly long: RateWindowConfig;
  readonly cooldownMs: number;
}

interface SessionsConfig {
  readonly retentionMs: number;
  readonly sweepIntervalMs: number;
  readonly dataDir: string;
}

interface HealthConfig {
  readonly intervalMs: number;
  readonly thresholds: HealthThresholds;
}

export interface ApplicationContainerConfig {
  readonly telegramToken: string;
  readonly publicUrl?: string;
  readonly webhookSecret?: string;
  readonly port: number;
  readonly eventTimeoutMs: number;
  readonly backupIntervalMs: number;
  /** Intervalo do auto-ping em `/health`; 0 desliga. Só vale com URL pública. */
  readonly keepAliveIntervalMs: number;
  readonly delivery: DeliverySettings;
  readonly validation: ValidationLimits;
  readonly rateLimits: RateLimitsConfig;
  readonly sessions: SessionsConfig;
  readonly health: HealthConfig;
}

export interface ApplicationContainerOverrides {
  readonly telegramToken?: string;
  readonly publicUrl?: string;
  readonly webhookSecret?: string;
  readonly port?: number;
  readonly eventTimeoutMs?: number;
  readonly backupIntervalMs?: number;
  readonly keepAliveIntervalMs?: number;
  readonly delivery?: Partial<DeliverySettings>;
  readonly validation?: Partial<ValidationLimits>;
  readonly rateLimits?: {
    readonly short?: Partial<RateWindowConfig>;
    readonly long?: Partial<RateWindowConfig>;
    readonly cooldownMs?: number;
  };
  readonly sessions?: Partial<SessionsConfig>;
  readonly health?: {
    readonly intervalMs?: number;
    readonly memory?: Partial<LevelThresholds>;
    readonly cpu?: Partial<LevelThresholds>;
    readonly errors?: Partial<LevelThresholds>;
    readonly memoryLimitBytes?: number;
  };
}

export interface ApplicationContainerOptions extends ApplicationContainerOverrides {
  /** Substitui o transporte do grammY (testes). */
  readonly transport?: QuizTransport;
  readonly bot?: BotRuntime;
  readonly http?: HttpServerPort;
  readonly sessionRepository?: SessionRepository;
  readonly auditLog?: AuditLog;
  readonly keepAliveFetch?: KeepAliveFetch;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly now?: () => number;
  readonly logger?: ConsoleLikeLogger;
}

/** Lê um número do ambiente; valores ausentes ou não finitos usam o padrão. */
function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

function envString(...names: readonly string[]): string | undefined {
  for (const name of names) {
    const value = process.env[name]?.trim();
    if (value) {
      return value;
    }
  }
  return undefined;
}

function levels(override: Partial<LevelThresholds> | undefined, prefix: string, fallback: LevelThresholds): LevelThresholds {
  return {
    degraded: override?.degraded ?? envNumber(`${prefix}_DEGRADED`, fallback.degraded),
    critical: override?.critical ?? envNumber(`${prefix}_CRITICAL`, fallback.critical),
  };
}

export function createConfig(overrides: ApplicationContainerOverrides = {}): ApplicationContainerConfig {
  const telegramToken = overrides.telegramToken ?? process.env.TELEGRAM_TOKEN ?? '';
  const publicUrl = overrides.publicUrl ?? envString('PUBLIC_URL', 'RENDER_EXTERNAL_URL');
  const webhookSecret = overrides.webhookSecret ?? envString('WEBHOOK_SECRET');
  const port = overrides.port ?? envNumber('PORT', 10000);
  const eventTimeoutMs = overrides.eventTimeoutMs ?? envNumber('EVENT_TIMEOUT_MS', DEFAULT_EVENT_TIMEOUT_MS);
  const backupIntervalMs = overrides.backupIntervalMs ?? envNumber('BACKUP_INTERVAL_MS', 15 * 60_000);
  const keepAliveIntervalMs = overrides.keepAliveIntervalMs ?? envNumber('KEEP_ALIVE_INTERVAL_MS', 12 * 60_000);
  const delivery: DeliverySettings = {
    maxAttempts: overrides.delivery?.maxAttempts ?? envNumber('DELIVERY_MAX_ATTEMPTS', DEFAULT_DELIVERY_CONFIG.maxAttempts),
    baseDelayMs: overrides.delivery?.baseDelayMs ?? envNumber('DELIVERY_BASE_DELAY_MS', DEFAULT_DELIVERY_CONFIG.baseDelayMs),
    maxRetryAfterMs: overrides.delivery?.maxRetryAfterMs ?? envNumber('DELIVERY_MAX_RETRY_AFTER_MS', DEFAULT_DELIVERY_CONFIG.maxRetryAfterMs),
    retryAfterPaddingMs: overrides.delivery?.retryAfterPaddingMs ?? envNumber('DELIVERY_RETRY_AFTER_PADDING_MS', DEFAULT_DELIVERY_CONFIG.retryAfterPaddingMs),
    pollSpacingMs: overrides.delivery?.pollSpacingMs ?? envNumber('POLL_SPACING_MS', DEFAULT_DELIVERY_CONFIG.pollSpacingMs),
    minPollOptions: overrides.delivery?.minPollOptions ?? DEFAULT_DELIVERY_CONFIG.minPollOptions,
    maxPollOptions: overrides.delivery?.maxPollOptions ?? DEFAULT_DELIVERY_CONFIG.maxPollOptions,
    messageSpacingMs: overrides.delivery?.messageSpacingMs ?? envNumber('MESSAGE_SPACING_MS', 100),
  };
  const validation: ValidationLimits = { ...DEFAULT_VALIDATION_LIMITS, ...overrides.validation };
  const rateLimits: RateLimitsConfig = {
    short: {
      maxRequests: overrides.rateLimits?.short?.maxRequests ?? envNumber('RATE_SHORT_MAX', DEFAULT_RATE_LIMITS.short.maxRequests),
      windowMs: overrides.rateLimits?.short?.windowMs ?? envNumber('RATE_SHORT_WINDOW_MS', DEFAULT_RATE_LIMITS.short.windowMs),
    },
    long: {
      maxRequests: overrides.rateLimits?.long?.maxRequests ?? envNumber('RATE_LONG_MAX', DEFAULT_RATE_LIMITS.long.maxRequests),
      windowMs: overrides.rateLimits?.long?.windowMs ?? envNumber('RATE_LONG_WINDOW_MS', DEFAULT_RATE_LIMITS.long.windowMs),
    },
    cooldownMs: overrides.rateLimits?.cooldownMs ?? envNumber('RATE_COOLDOWN_MS', DEFAULT_RATE_LIMITS.cooldownMs),
  };
  const sessions: SessionsConfig = {
    retentionMs: overrides.sessions?.retentionMs ?? envNumber('SESSION_RETENTION_MS', 60 * 60_000),
    sweepIntervalMs: overrides.sessions?.sweepIntervalMs ?? envNumber('SESSION_SWEEP_INTERVAL_MS', 5 * 60_000),
    dataDir: overrides.sessions?.dataDir ?? path.resolve(process.cwd(), process.env.DATA_DIR ?? 'data'),
  };
  const health: HealthConfig = {
    intervalMs: overrides.health?.intervalMs ?? envNumber('HEALTH_INTERVAL_MS', 60_000),
    thresholds: {
      memory: levels(overrides.health?.memory, 'HEALTH_MEMORY', DEFAULT_HEALTH_THRESHOLDS.memory),
      cpu: levels(overrides.health?.cpu, 'HEALTH_CPU', DEFAULT_HEALTH_THRESHOLDS.cpu),
      errors: levels(overrides.health?.errors, 'HEALTH_ERRORS', DEFAULT_HEALTH_THRESHOLDS.errors),
      memoryLimitBytes: overrides.health?.memoryLimitBytes
        ?? envNumber('HEALTH_MEMORY_LIMIT_BYTES', DEFAULT_HEALTH_THRESHOLDS.memoryLimitBytes),
    },
  };
  return {
    telegramToken,
    publicUrl,
    webhookSecret,
    port,
    eventTimeoutMs,
    backupIntervalMs,
    keepAliveIntervalMs,
    delivery,
    validation,
    rateLimits,
    sessions,
    health,
  };
}

export function resolveWebhookUrl(publicUrl: string | undefined): string | undefined {
  if (!publicUrl) {
    return undefined;
  }
  return `${publicUrl.replace(/\/+$/, '')}${WEBHOOK_PATH}`;
}

export interface ApplicationContainer {
  readonly config: ApplicationContainerConfig;
  readonly store: SessionStore;
  readonly health: HealthMonitor;
  readonly delivery: DeliveryService;
  readonly rate: RateController;
  readonly engine: QuizFlowEngine;
  readonly router: MessageRouter;
  readonly lifecycle: LifecycleManager;
  readonly tasks: readonly ScheduledTask[];
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createApplicationContainer(options: ApplicationContainerOptions = {}): ApplicationContainer {
  const config = createConfig(options);
  const logger = options.logger ?? createConsoleLikeLogger({ component: 'container' });
  const now = options.now ?? (() => Date.now());

  const needsBot = !options.transport || !options.bot;
  if (needsBot && !config.telegramToken) {
    throw new Error('TELEGRAM_TOKEN não configurado');
  }

  const repository = options.sessionRepository
    ?? new JsonFileSessionRepository(path.join(config.sessions.dataDir, 'sessions.json'), logger);
  const audit = options.auditLog ?? new JsonlAuditLog(path.join(config.sessions.dataDir, 'audit.jsonl'));
  const store = new SessionStore({ repository, retentionMs: config.sessions.retentionMs, now });
  const health = new HealthMonitor({ sessions: store, thresholds: config.health.thresholds, now });
  const rate = new RateController({ ...config.rateLimits, now });

  const bot: Bot | null = needsBot ? createTelegramBot({ token: config.telegramToken, logger }) : null;
  const transport = options.transport ?? (bot ? new GrammyTransport(bot.api) : null);
  if (!transport) {
    throw new Error('transporte indisponível');
  }

  const delivery = new DeliveryService({ transport, config: config.delivery, health, sleep: options.sleep });
  const engine = new QuizFlowEngine({
    store,
    delivery,
    rate,
    health,
    audit,
    limits: config.validation,
    eventTimeoutMs: config.eventTimeoutMs,
    messageSpacingMs: config.delivery.messageSpacingMs,
    sleep: options.sleep,
    now,
  });
  const router = new MessageRouter({ engine });
  if (bot) {
    attachRouter(bot, router, logger);
  }

  let webhook: RequestHandler | undefined;
  if (bot) {
    const handleUpdate = webhookCallback(bot, 'express', {
      secretToken: config.webhookSecret,
      onTimeout: 'return',
      timeoutMilliseconds: config.eventTimeoutMs + 5_000,
    });
    webhook = (req, res, next) => {
      handleUpdate(req, res).catch(next);
    };
  }
  const http = options.http ?? new HttpServer(createHttpApp({ health, webhook, now, logger }), logger);
  const botRuntime = options.bot ?? (bot ? createBotRuntime(bot) : null);
  if (!botRuntime) {
    throw new Error('bot indisponível');
  }

  const appendAudit = async (record: Parameters<AuditLog['append']>[0]): Promise<void> => {
    try {
      await audit.append(record);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.warn(`[container] falha ao registrar auditoria: ${err.message}`);
    }
  };

  const tasks: ScheduledTask[] = [
    {
      name: 'session-sweep',
      intervalMs: config.sessions.sweepIntervalMs,
      run: async () => {
        const result = await store.sweep();
        rate.prune();
        if (result.evicted > 0) {
          await appendAudit({ at: now(), kind: 'session_evicted', detail: { count: result.evicted, persisted: result.persisted } });
        }
      },
    },
    {
      name: 'health-check',
      intervalMs: config.health.intervalMs,
      run: async () => {
        const before = health.remediations;
        const report = await health.check();
        if (health.remediations > before) {
          await appendAudit({ at: now(), kind: 'remediation', detail: { status: report.status, reasons: report.reasons.join('; ') } });
        }
      },
    },
    {
      name: 'session-backup',
      intervalMs: config.backupIntervalMs,
      run: () => store.backup(),
    },
  ];
  if (config.publicUrl && config.keepAliveIntervalMs > 0) {
    tasks.push(createKeepAliveTask({
      publicUrl: config.publicUrl,
      intervalMs: config.keepAliveIntervalMs,
      fetch: options.keepAliveFetch,
      logger,
    }));
  }

  const lifecycle = new LifecycleManager({
    bot: botRuntime,
    http,
    port: config.port,
    webhookUrl: resolveWebhookUrl(config.publicUrl),
    webhookSecret: config.webhookSecret,
    tasks,
    onStop: () => store.backup(),
    logger,
  });

  return {
    config,
    store,
    health,
    delivery,
    rate,
    engine,
    router,
    lifecycle,
    tasks,
    start: () => lifecycle.start(),
    stop: () => lifecycle.stop(),
  };
}

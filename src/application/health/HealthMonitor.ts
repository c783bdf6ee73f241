import { createConsoleLikeLogger, type ConsoleLikeLogger } from '../../infrastructure/logging/createConsoleLikeLogger';
import type { DeliveryHealthSink } from '../messaging/DeliveryService';
import type { SweepResult } from '../sessions/SessionStore';

export type HealthStatus = 'healthy' | 'degraded' | 'critical';

export interface MemorySample {
  readonly rssBytes: number;
  readonly heapUsedBytes: number;
  readonly heapTotalBytes: number;
}

export interface CpuSample {
  readonly userMicros: number;
  readonly systemMicros: number;
}

export interface HealthSnapshot {
  readonly timestamp: number;
  readonly memory: MemorySample & { readonly ratio: number };
  readonly cpu: { readonly ratio: number };
  readonly activeSessions: number;
  readonly requests: number;
  readonly successes: number;
  readonly failures: number;
  readonly errors: number;
  readonly lastErrorAt?: number;
  readonly uptimeSec: number;
}

export interface HealthReport {
  readonly status: HealthStatus;
  readonly reasons: readonly string[];
  readonly snapshot: HealthSnapshot;
}

export interface LevelThresholds {
  readonly degraded: number;
  readonly critical: number;
}

export interface HealthThresholds {
  /** Fração de `memoryLimitBytes` usada pelo RSS. */
  readonly memory: LevelThresholds;
  /** Fração de um núcleo usada desde a última amostra. */
  readonly cpu: LevelThresholds;
  /** Erros acumulados desde o último reset. */
  readonly errors: LevelThresholds;
  readonly memoryLimitBytes: number;
}

export const DEFAULT_HEALTH_THRESHOLDS: HealthThresholds = Object.freeze({
  memory: { degraded: 0.8, critical: 0.95 },
  cpu: { degraded: 0.8, critical: 0.95 },
  errors: { degraded: 10, critical: 50 },
  memoryLimitBytes: 512 * 1024 * 1024,
});

/** O que o monitor precisa da camada de sessões para diagnosticar e remediar. */
export interface HealthSessionPort {
  readonly size: number;
  sweep(): Promise<SweepResult>;
  reconnect(): Promise<boolean>;
}

export interface HealthMonitorOptions {
  readonly sessions: HealthSessionPort;
  readonly thresholds?: Partial<HealthThresholds>;
  readonly historySize?: number;
  readonly sampleMemory?: () => MemorySample;
  readonly sampleCpu?: () => CpuSample;
  readonly now?: () => number;
  readonly logger?: ConsoleLikeLogger;
}

const LEVEL_ORDER: Record<HealthStatus, number> = { healthy: 0, degraded: 1, critical: 2 };

function classify(value: number, thresholds: LevelThresholds): HealthStatus {
  if (value >= thresholds.critical) {
    return 'critical';
  }
  if (value >= thresholds.degraded) {
    return 'degraded';
  }
  return 'healthy';
}

function defaultMemorySample(): MemorySample {
  const usage = process.memoryUsage();
  return { rssBytes: usage.rss, heapUsedBytes: usage.heapUsed, heapTotalBytes: usage.heapTotal };
}

function defaultCpuSample(): CpuSample {
  const usage = process.cpuUsage();
  return { userMicros: usage.user, systemMicros: usage.system };
}

export class HealthMonitor implements DeliveryHealthSink {
  private readonly sessions: HealthSessionPort;
  private readonly thresholds: HealthThresholds;
  private readonly historySize: number;
  private readonly sampleMemory: () => MemorySample;
  private readonly sampleCpu: () => CpuSample;
  private readonly now: () => number;
  private readonly logger: ConsoleLikeLogger;
  private readonly startedAt: number;
  private readonly archived: HealthReport[] = [];
  private cpuBaseline: { readonly at: number; readonly sample: CpuSample };
  private requests = 0;
  private successes = 0;
  private failures = 0;
  private errors = 0;
  private lastErrorAt: number | undefined;
  private remediating = false;
  private remediationCount = 0;

  constructor(options: HealthMonitorOptions) {
    this.sessions = options.sessions;
    this.thresholds = { ...DEFAULT_HEALTH_THRESHOLDS, ...options.thresholds };
    this.historySize = options.historySize ?? 60;
    this.sampleMemory = options.sampleMemory ?? defaultMemorySample;
    this.sampleCpu = options.sampleCpu ?? defaultCpuSample;
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger ?? createConsoleLikeLogger({ component: 'health' });
    this.startedAt = this.now();
    this.cpuBaseline = { at: this.startedAt, sample: this.sampleCpu() };
  }

  recordRequest(): void {
    this.requests += 1;
  }

  recordSuccess(): void {
    this.successes += 1;
  }

  recordError(source: string, error?: Error): void {
    this.failures += 1;
    this.errors += 1;
    this.lastErrorAt = this.now();
    this.logger.debug?.(`[health] erro registrado (${source}): ${error?.message ?? 'sem detalhes'}`);
  }

  /** Retrato atual sem arquivar nem remediar; usado pela sonda externa. */
  report(): HealthReport {
    return this.evaluate(false);
  }

  /**
   * Verificação periódica: arquiva o retrato e, se crítico, dispara a
   * remediação.
   */
  async check(): Promise<HealthReport> {
    const report = this.evaluate(true);
    this.archived.push(report);
    if (this.archived.length > this.historySize) {
      this.archived.splice(0, this.archived.length - this.historySize);
    }
    if (report.status !== 'healthy') {
      this.logger.warn(`[health] status ${report.status}: ${report.reasons.join('; ')}`);
    }
    if (report.status === 'critical') {
      await this.remediate();
    }
    return report;
  }

  /**
   * Força a varredura de sessões, zera o contador de erros e reabre o
   * repositório. Chamadas concorrentes não empilham.
   */
  async remediate(): Promise<boolean> {
    if (this.remediating) {
      return false;
    }
    this.remediating = true;
    try {
      this.logger.warn('[health] iniciando remediação');
      const sweep = await this.sessions.sweep();
      this.errors = 0;
      const reconnected = await this.sessions.reconnect();
      this.remediationCount += 1;
      this.logger.info(`[health] remediação concluída: ${sweep.evicted} sessões removidas, repositório ${reconnected ? 'reaberto' : 'indisponível'}`);
      return true;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`[health] remediação falhou: ${err.message}`);
      return false;
    } finally {
      this.remediating = false;
    }
  }

  get history(): readonly HealthReport[] {
    return this.archived;
  }

  get remediations(): number {
    return this.remediationCount;
  }

  private evaluate(advanceCpuBaseline: boolean): HealthReport {
    const now = this.now();
    const memory = this.sampleMemory();
    const memoryRatio = this.thresholds.memoryLimitBytes > 0 ? memory.rssBytes / this.thresholds.memoryLimitBytes : 0;

    const cpu = this.sampleCpu();
    const elapsedMicros = (now - this.cpuBaseline.at) * 1000;
    const usedMicros = (cpu.userMicros - this.cpuBaseline.sample.userMicros)
      + (cpu.systemMicros - this.cpuBaseline.sample.systemMicros);
    const cpuRatio = elapsedMicros > 0 ? Math.max(0, usedMicros / elapsedMicros) : 0;
    if (advanceCpuBaseline) {
      this.cpuBaseline = { at: now, sample: cpu };
    }

    const snapshot: HealthSnapshot = {
      timestamp: now,
      memory: { ...memory, ratio: memoryRatio },
      cpu: { ratio: cpuRatio },
      activeSessions: this.sessions.size,
      requests: this.requests,
      successes: this.successes,
      failures: this.failures,
      errors: this.errors,
      lastErrorAt: this.lastErrorAt,
      uptimeSec: Math.floor((now - this.startedAt) / 1000),
    };

    const checks: Array<{ readonly label: string; readonly value: number; readonly level: HealthStatus }> = [
      { label: 'memory', value: memoryRatio, level: classify(memoryRatio, this.thresholds.memory) },
      { label: 'cpu', value: cpuRatio, level: classify(cpuRatio, this.thresholds.cpu) },
      { label: 'errors', value: this.errors, level: classify(this.errors, this.thresholds.errors) },
    ];
    let status: HealthStatus = 'healthy';
    const reasons: string[] = [];
    for (const check of checks) {
      if (check.level === 'healthy') {
        continue;
      }
      reasons.push(`${check.label} ${check.level} (${Number(check.value.toFixed(2))})`);
      if (LEVEL_ORDER[check.level] > LEVEL_ORDER[status]) {
        status = check.level;
      }
    }
    return { status, reasons, snapshot };
  }
}

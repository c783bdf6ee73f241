export interface SlidingWindowOptions {
  readonly maxRequests: number;
  readonly windowMs: number;
  readonly cooldownMs: number;
  readonly now?: () => number;
}

export type WindowDecision =
  | { readonly allowed: true }
  | { readonly allowed: false; readonly retryAfterMs: number; readonly fresh: boolean };

interface RateWindow {
  readonly timestamps: number[];
  blockedUntil?: number;
}

/**
 * Janela deslizante por chave. Ao atingir o limite a chave fica bloqueada
 * pelo cooldown inteiro, mesmo que a janela esvazie antes disso.
 */
export class SlidingWindowLimiter<K = number> {
  private readonly windows = new Map<K, RateWindow>();
  private readonly now: () => number;

  constructor(private readonly options: SlidingWindowOptions) {
    if (options.maxRequests <= 0) {
      throw new Error('maxRequests deve ser maior que zero');
    }
    if (options.windowMs <= 0) {
      throw new Error('windowMs deve ser maior que zero');
    }
    this.now = options.now ?? (() => Date.now());
  }

  check(key: K): WindowDecision {
    const now = this.now();
    let window = this.windows.get(key);
    if (!window) {
      window = { timestamps: [] };
      this.windows.set(key, window);
    }
    this.evict(window, now);

    if (window.blockedUntil !== undefined) {
      if (now < window.blockedUntil) {
        return { allowed: false, retryAfterMs: window.blockedUntil - now, fresh: false };
      }
      window.blockedUntil = undefined;
    }

    if (window.timestamps.length >= this.options.maxRequests) {
      window.blockedUntil = now + this.options.cooldownMs;
      return { allowed: false, retryAfterMs: this.options.cooldownMs, fresh: true };
    }

    window.timestamps.push(now);
    return { allowed: true };
  }

  count(key: K): number {
    const window = this.windows.get(key);
    if (!window) {
      return 0;
    }
    this.evict(window, this.now());
    return window.timestamps.length;
  }

  isBlocked(key: K): boolean {
    const blockedUntil = this.windows.get(key)?.blockedUntil;
    return blockedUntil !== undefined && this.now() < blockedUntil;
  }

  /** Remove chaves sem eventos na janela e sem cooldown ativo. */
  prune(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, window] of this.windows) {
      this.evict(window, now);
      const blocked = window.blockedUntil !== undefined && now < window.blockedUntil;
      if (window.timestamps.length === 0 && !blocked) {
        this.windows.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.windows.size;
  }

  private evict(window: RateWindow, now: number): void {
    const threshold = now - this.options.windowMs;
    let drop = 0;
    while (drop < window.timestamps.length && window.timestamps[drop] <= threshold) {
      drop += 1;
    }
    if (drop > 0) {
      window.timestamps.splice(0, drop);
    }
  }
}

export interface RateWindowConfig {
  readonly maxRequests: number;
  readonly windowMs: number;
}

export interface RateControllerOptions {
  readonly short: RateWindowConfig;
  readonly long: RateWindowConfig;
  readonly cooldownMs: number;
  readonly now?: () => number;
}

export type RateDecision =
  | { readonly allowed: true }
  | {
    readonly allowed: false;
    readonly window: 'short' | 'long';
    readonly retryAfterMs: number;
    /** `true` apenas na requisição que iniciou o cooldown. */
    readonly fresh: boolean;
  };

export const DEFAULT_RATE_LIMITS: RateControllerOptions = Object.freeze({
  short: { maxRequests: 60, windowMs: 60_000 },
  long: { maxRequests: 1000, windowMs: 3_600_000 },
  cooldownMs: 5 * 60_000,
});

export class RateController<K = number> {
  private readonly shortWindow: SlidingWindowLimiter<K>;
  private readonly longWindow: SlidingWindowLimiter<K>;

  constructor(options: RateControllerOptions = DEFAULT_RATE_LIMITS) {
    this.shortWindow = new SlidingWindowLimiter<K>({ ...options.short, cooldownMs: options.cooldownMs, now: options.now });
    this.longWindow = new SlidingWindowLimiter<K>({ ...options.long, cooldownMs: options.cooldownMs, now: options.now });
  }

  check(key: K): RateDecision {
    const short = this.shortWindow.check(key);
    if (!short.allowed) {
      return { allowed: false, window: 'short', retryAfterMs: short.retryAfterMs, fresh: short.fresh };
    }
    const long = this.longWindow.check(key);
    if (!long.allowed) {
      return { allowed: false, window: 'long', retryAfterMs: long.retryAfterMs, fresh: long.fresh };
    }
    return { allowed: true };
  }

  prune(): number {
    return this.shortWindow.prune() + this.longWindow.prune();
  }
}

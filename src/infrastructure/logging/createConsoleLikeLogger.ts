import { formatWithOptions } from 'node:util';
import pino, {
  destination as createDestination,
  transport as createTransport,
  type DestinationStream,
  type LevelWithSilent,
  type Logger,
  type TransportSingleOptions,
} from 'pino';

/**
 * Adapta uma instância do Pino para o contrato mínimo de um `console`.
 * Os componentes recebem apenas esta interface, então os testes podem
 * injetar um objeto com `jest.fn()` no lugar do logger real.
 */
export interface ConsoleLikeLogger {
  log(message?: unknown, ...optionalParams: readonly unknown[]): void;
  info(message?: unknown, ...optionalParams: readonly unknown[]): void;
  warn(message?: unknown, ...optionalParams: readonly unknown[]): void;
  error(message?: unknown, ...optionalParams: readonly unknown[]): void;
  debug?(message?: unknown, ...optionalParams: readonly unknown[]): void;
}

export interface ConsoleLikeLoggerOptions {
  readonly level?: LevelWithSilent;
  readonly name?: string;
  readonly component?: string;
  readonly destination?: DestinationStream | string | number;
  readonly transport?: TransportSingleOptions;
}

export const DEFAULT_LOGGER_NAME = 'quiz-poll-bot';

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLevel(value: string | undefined): value is LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

function formatMessage(args: readonly unknown[]): string {
  const normalizedArgs: unknown[] = Array.from(args);
  if (normalizedArgs.length === 0 || (normalizedArgs.length === 1 && typeof normalizedArgs[0] === 'undefined')) {
    return '';
  }
  return formatWithOptions({ colors: false, depth: 5 }, ...normalizedArgs);
}

function resolveDestination(options: ConsoleLikeLoggerOptions): DestinationStream {
  if (options.transport) {
    return createTransport(options.transport);
  }
  if (options.destination !== undefined) {
    if (typeof options.destination === 'object') {
      return options.destination;
    }
    return createDestination(options.destination);
  }
  return createDestination({ sync: false });
}

const rootLoggers = new Map<string, Logger>();

function createRootLogger(options: ConsoleLikeLoggerOptions): Logger {
  const envLevel = process.env.LOG_LEVEL;
  const level: LevelWithSilent = options.level ?? (isLevel(envLevel) ? envLevel : 'info');
  const name = options.name ?? DEFAULT_LOGGER_NAME;
  return pino({ name, level, base: { service: name } }, resolveDestination(options));
}

function adapt(logger: Logger): ConsoleLikeLogger {
  const write = (method: 'info' | 'warn' | 'error' | 'debug') => {
    return (message?: unknown, ...optionalParams: readonly unknown[]): void => {
      logger[method](formatMessage([message, ...optionalParams]));
    };
  };
  return {
    log: write('info'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    debug: write('debug'),
  };
}

/** Instância raiz compartilhada por nome, criada na primeira chamada. */
export function getRootLogger(name: string = DEFAULT_LOGGER_NAME): Logger {
  let logger = rootLoggers.get(name);
  if (!logger) {
    logger = createRootLogger({ name });
    rootLoggers.set(name, logger);
  }
  return logger;
}

/**
 * Sem opções de destino ou nível, componentes com o mesmo `name`
 * compartilham uma instância raiz do Pino e recebem um child com o campo
 * `component`.
 */
export function createConsoleLikeLogger(options: ConsoleLikeLoggerOptions = {}): ConsoleLikeLogger {
  const dedicated = options.destination !== undefined || options.transport !== undefined || options.level !== undefined;
  const base = dedicated ? createRootLogger(options) : getRootLogger(options.name);
  return adapt(options.component ? base.child({ component: options.component }) : base);
}

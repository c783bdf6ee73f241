import { initializeApplication } from './src/bootstrap';
import { createConsoleLikeLogger, type ConsoleLikeLogger } from './src/infrastructure/logging/createConsoleLikeLogger';

const logger: ConsoleLikeLogger = createConsoleLikeLogger({ name: 'quiz-poll-bot' });

async function main(): Promise<void> {
  const container = initializeApplication({ logger });
  await container.start();

  const shutdown = (signal: string): void => {
    logger.log(`[main] ${signal} recebido; encerrando`);
    container.stop().then(
      () => {
        process.exitCode = 0;
      },
      (error: unknown) => {
        const err = error instanceof Error ? error : new Error(String(error));
        logger.error('Falha ao encerrar:', err);
        process.exitCode = 1;
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
  main().catch((error) => {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error('Falha ao iniciar:', err);
    process.exitCode = 1;
  });
}

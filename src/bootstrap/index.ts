import { config as loadEnv } from 'dotenv';
import { createApplicationContainer, type ApplicationContainer, type ApplicationContainerOptions } from '../application/container';

export interface BootstrapOptions extends ApplicationContainerOptions {
  /** Arquivo `.env` alternativo; por padrão o dotenv procura no diretório atual. */
  readonly envPath?: string;
}

/** Carrega o ambiente e monta o container; o bot só conecta em `start()`. */
export function initializeApplication(options: BootstrapOptions = {}): ApplicationContainer {
  const { envPath, ...containerOptions } = options;
  loadEnv(envPath ? { path: envPath } : undefined);
  const container = createApplicationContainer(containerOptions);
  const { config } = container;
  containerOptions.logger?.info(
    `[bootstrap] modo ${config.publicUrl ? 'webhook' : 'polling'}, porta ${config.port}, dados em ${config.sessions.dataDir}`,
  );
  return container;
}

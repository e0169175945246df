import { Config } from '../../infrastructure/config';
import { createContainer, Container } from '../../container';
import { ConfigError } from '../../domain/common/Errors';

/**
 * Container for a command that runs beside the API server and its workers.
 * Those processes only see each other through a shared store, so the in-memory one is refused.
 */
export async function createSharedContainer(command: string): Promise<Container> {
  const config = new Config();
  if (config.store.type === 'memory') {
    throw new ConfigError(`${command} runs in its own process and needs STORE_TYPE=redis`);
  }
  return createContainer({ config });
}

import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import type { AppConfig } from '../../../core/config';
import type { ILogger } from '../../../core/logging';
import { StartupError } from '../../../core/errors';
import type { UpstreamClient, UpstreamClientFactory } from '../../../infrastructure/providers/gemini';

export interface PoolSelection {
  readonly index: number;
  readonly client: UpstreamClient;
}

/**
 * One upstream client per configured credential, handed out round-robin.
 *
 * The set of clients is fixed at construction. `next()` advances a single
 * counter and picks `counter mod size`, so the first selection lands on
 * index `1 mod size`. Selection is synchronous; on the event loop each call
 * observes and advances the counter exactly once.
 */
@injectable()
export class CredentialPool {
  private readonly clients: readonly UpstreamClient[];
  private readonly logger: ILogger;
  private counter = 0;

  constructor(
    @inject(TYPES.AppConfig) config: AppConfig,
    @inject(TYPES.UpstreamClientFactory) clientFactory: UpstreamClientFactory,
    @inject(TYPES.Logger) logger: ILogger
  ) {
    this.logger = logger.createChild('CredentialPool');

    if (config.credentials.length === 0) {
      throw new StartupError('At least one Gemini credential is required');
    }

    this.clients = config.credentials.map((credential, index) => {
      try {
        return clientFactory(credential);
      } catch (error) {
        throw new StartupError(`Failed to create Gemini client for credential ${index}`, { cause: error });
      }
    });

    this.logger.info('Credential pool created', {
      metadata: { clients: this.clients.length }
    });
  }

  get size(): number {
    return this.clients.length;
  }

  /**
   * Number of selections made so far.
   */
  get position(): number {
    return this.counter;
  }

  next(): PoolSelection {
    this.counter = this.counter === Number.MAX_SAFE_INTEGER ? 0 : this.counter + 1;
    const index = this.counter % this.clients.length;
    return { index, client: this.clients[index] };
  }

  /**
   * Catalogs are identical across credentials, so listing always goes
   * through the first client.
   */
  primary(): UpstreamClient {
    return this.clients[0];
  }
}

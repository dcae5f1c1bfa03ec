import { node } from '@elysiajs/node';
import { ApplicationBootstrap } from './bootstrap';
import type { ListenAddress } from './core/config';
import type { ILogger } from './core/logging';
import { TYPES } from './core/container';
import { buildApiApplication, buildMetricsApplication } from './api/routes';

/**
 * The handle the Node adapter passes to the `listen` callback. Elysia's own
 * `stop()` does not see servers started through the adapter.
 */
export interface RunningListener {
  readonly port?: number;
  stop(closeActiveConnections?: boolean): Promise<void> | void;
}

type StartListener = (
  options: { hostname: string; port: number },
  onListening: (server: RunningListener) => void
) => void;

export class ApplicationServer {
  private readonly listeners: RunningListener[] = [];
  private logger?: ILogger;

  constructor(private readonly bootstrap: ApplicationBootstrap) {}

  /**
   * Resolves once every configured listener accepts connections.
   */
  async start(): Promise<void> {
    const container = await this.bootstrap.initialize();
    const { listen, metrics } = this.bootstrap.configuration;

    this.logger = container.get<ILogger>(TYPES.Logger).createChild('ApplicationServer');
    this.bootstrap.onShutdown(() => this.stopListeners());

    await this.listen('API', listen, (options, onListening) => {
      buildApiApplication(container, node()).listen(options, onListening);
    });

    if (metrics) {
      await this.listen('Metrics', metrics, (options, onListening) => {
        buildMetricsApplication(container, node()).listen(options, onListening);
      });
    }
  }

  get activeListeners(): readonly RunningListener[] {
    return this.listeners;
  }

  private listen(label: string, address: ListenAddress, startListener: StartListener): Promise<void> {
    return new Promise(resolve => {
      const onListening = (server: RunningListener): void => {
        this.listeners.push(server);
        this.logger?.info(`${label} listener started`, {
          metadata: { host: address.host, port: server.port ?? address.port }
        });
        resolve();
      };

      startListener({ hostname: address.host, port: address.port }, onListening);
    });
  }

  private async stopListeners(): Promise<void> {
    while (this.listeners.length > 0) {
      const listener = this.listeners.pop();
      await listener?.stop(true);
    }
    this.logger?.info('Listeners stopped');
  }
}

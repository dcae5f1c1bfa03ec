import { Elysia } from 'elysia';
import type { node } from '@elysiajs/node';
import { TYPES, type IApplicationContainer } from '../core/container';
import type { IMetricsService } from '../core/metrics';
import type { EmbeddingsController, ModelsController } from './controllers';
import type { ErrorPlugin } from './plugins';

export type ElysiaAdapter = ReturnType<typeof node>;

/**
 * The OpenAI-compatible surface. The error plugin goes first so its handler
 * covers every route registered after it.
 */
export function buildApiApplication(container: IApplicationContainer, adapter?: ElysiaAdapter) {
  const errorPlugin = container.get<ErrorPlugin>(TYPES.ErrorPlugin);
  const embeddingsController = container.get<EmbeddingsController>(TYPES.EmbeddingsController);
  const modelsController = container.get<ModelsController>(TYPES.ModelsController);

  return new Elysia({ name: 'api', ...(adapter ? { adapter } : {}) })
    .use(errorPlugin.createPlugin())
    .use(embeddingsController.registerRoutes())
    .use(modelsController.registerRoutes());
}

export function buildMetricsApplication(container: IApplicationContainer, adapter?: ElysiaAdapter) {
  const metricsService = container.get<IMetricsService>(TYPES.MetricsService);

  return new Elysia({ name: 'metrics', ...(adapter ? { adapter } : {}) })
    .get('/metrics', async () =>
      new Response(await metricsService.getMetricsEndpoint(), {
        headers: { 'Content-Type': metricsService.contentType }
      })
    );
}

import { existsSync } from 'node:fs';
import type { Command } from 'commander';
import { AdaptationEngine } from '@features/adaptation/adaptation-engine.js';
import { BaseModelResolver } from '@infra/base-model/base-model-resolver.js';
import { JsonlMetricsSink } from '@infra/metrics/jsonl-metrics-sink.js';
import { withCommandContext, loadConfigOrDefaults } from '@cli/utils.js';
import { formatAdaptedResponse } from '@cli/formatters/adaptation-formatter.js';

/**
 * Register `primer adapt <query>`: the full request path.
 *
 * Ctrl-C during adaptation aborts the request; nothing is generated.
 */
export function registerAdaptCommand(program: Command): void {
  program
    .command('adapt')
    .description('Adapt to the examples in a query, then generate a response')
    .argument('<query>', 'Query text containing few-shot examples')
    .option('--no-adapt', 'Skip adaptation and generate with the base model only')
    .option('--model <type>', 'Base model binding (overrides baseModel.type)')
    .option('--request-id <id>', 'Request id recorded in metrics')
    .action(withCommandContext(async (ctx, query) => {
      const localOpts = ctx.cmd.opts();
      const config = loadConfigOrDefaults(ctx.primerDir);
      const cwd = ctx.globalOpts.cwd ?? process.cwd();
      const modelType: unknown = localOpts['model'];
      const requestId: unknown = localOpts['requestId'];

      const baseModel = BaseModelResolver.resolve(
        config.baseModel,
        cwd,
        typeof modelType === 'string' ? modelType : config.baseModel.type,
      );
      const metricsSink =
        config.metrics.enabled && existsSync(ctx.primerDir)
          ? JsonlMetricsSink.forProject(ctx.primerDir)
          : undefined;

      const engine = new AdaptationEngine({ config, baseModel, metricsSink });
      const controller = new AbortController();
      const onInterrupt = () => controller.abort();
      process.once('SIGINT', onInterrupt);

      try {
        const response = await engine.respond(
          {
            query,
            disableAdaptation: localOpts['adapt'] === false,
            requestId: typeof requestId === 'string' ? requestId : undefined,
          },
          controller.signal,
        );

        if (ctx.globalOpts.json) {
          console.log(JSON.stringify(response, null, 2));
        } else {
          console.log(formatAdaptedResponse(response));
        }
      } finally {
        process.removeListener('SIGINT', onInterrupt);
        await metricsSink?.flush();
      }
    }, { needsPrimerDir: false }));
}

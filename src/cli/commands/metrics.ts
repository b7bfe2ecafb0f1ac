import type { Command } from 'commander';
import { summarizeMetrics } from '@features/metrics/metrics-summary.js';
import { JsonlMetricsSink } from '@infra/metrics/jsonl-metrics-sink.js';
import { withCommandContext } from '@cli/utils.js';
import { formatMetricsSummary } from '@cli/formatters/adaptation-formatter.js';

/**
 * Register `primer metrics`: summarize .primer/metrics/adaptation.jsonl.
 */
export function registerMetricsCommand(program: Command): void {
  program
    .command('metrics')
    .description('Summarize recorded adaptation metrics')
    .option('--last <n>', 'Only the most recent n requests', (value) => Number.parseInt(value, 10))
    .action(withCommandContext(async (ctx) => {
      const last: unknown = ctx.cmd.opts()['last'];
      const records = await JsonlMetricsSink.forProject(ctx.primerDir).readAll();
      const window = typeof last === 'number' && last > 0 ? records.slice(-last) : records;
      const summary = summarizeMetrics(window);

      if (ctx.globalOpts.json) {
        console.log(JSON.stringify(summary, null, 2));
      } else {
        console.log(formatMetricsSummary(summary));
      }
    }));
}

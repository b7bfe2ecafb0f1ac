import type { Command } from 'commander';
import type { ExtractionResult } from '@domain/types/example.js';
import { detectPatterns } from '@features/pattern-detection/pattern-detector.js';
import { extractExamples } from '@features/pattern-detection/example-extractor.js';
import { AdaptationError } from '@shared/lib/errors.js';
import { withCommandContext, loadConfigOrDefaults } from '@cli/utils.js';
import { formatExtraction, formatPatternMatches } from '@cli/formatters/adaptation-formatter.js';

/**
 * Register `primer detect <query>`: run pattern detection and extraction only.
 * No training, no generation.
 */
export function registerDetectCommand(program: Command): void {
  program
    .command('detect')
    .description('Show the few-shot pattern and examples found in a query')
    .argument('<query>', 'Query text containing few-shot examples')
    .action(withCommandContext((ctx, query) => {
      const config = loadConfigOrDefaults(ctx.primerDir);
      const matches = detectPatterns(query, config.patterns);
      const active = matches[0];

      let extraction: ExtractionResult | null = null;
      let failure: { reason: string; message: string } | null = null;
      if (active) {
        try {
          extraction = extractExamples(query, active.kind, config.patterns[active.kind]);
        } catch (err) {
          if (!(err instanceof AdaptationError)) throw err;
          failure = { reason: err.reason, message: err.message };
        }
      }

      if (ctx.globalOpts.json) {
        console.log(JSON.stringify({ matches, extraction, failure }, null, 2));
        return;
      }

      console.log(formatPatternMatches(matches));
      if (extraction) {
        console.log('');
        console.log(formatExtraction(extraction));
      }
      if (failure) {
        console.log('');
        console.log(`Extraction failed (${failure.reason}): ${failure.message}`);
      }
    }, { needsPrimerDir: false }));
}

export const PRIMER_DIRS = {
  root: '.primer',
  config: 'config.json',
  metrics: 'metrics',
  metricsLog: 'adaptation.jsonl',
} as const;

export type PrimerDirKey = keyof typeof PRIMER_DIRS;

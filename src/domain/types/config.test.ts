import { AdaptationConfigSchema } from './config.js';

describe('AdaptationConfigSchema', () => {
  it('fills every section from an empty object', () => {
    const config = AdaptationConfigSchema.parse({});

    expect(config.adapter).toEqual({
      rankSet: [8, 16, 32, 64],
      rank: 16,
      featureDim: 256,
      memoryLimitBytes: 1_048_576,
    });
    expect(config.training.maxSteps).toBe(8);
    expect(config.training.convergenceThreshold).toBe(0.01);
    expect(config.gate.confidenceThreshold).toBe(0.7);
    expect(config.baseModel.type).toBe('preview');
    expect(config.patterns['numbered-sequence']).toEqual({
      weight: 0.75,
      minExamples: 2,
      maxExamples: 12,
      minStrength: 2,
    });
  });

  it('keeps defaults for fields a partial section leaves out', () => {
    const config = AdaptationConfigSchema.parse({ training: { maxSteps: 4 } });

    expect(config.training.maxSteps).toBe(4);
    expect(config.training.minSteps).toBe(2);
  });

  it('rejects a rank outside the allowed set', () => {
    expect(AdaptationConfigSchema.safeParse({ adapter: { rank: 12 } }).success).toBe(false);
  });

  it('rejects a rank missing from the configured rank set', () => {
    const result = AdaptationConfigSchema.safeParse({ adapter: { rankSet: [8], rank: 16 } });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.path).toEqual(['adapter', 'rank']);
  });

  it('rejects minSteps above maxSteps', () => {
    const result = AdaptationConfigSchema.safeParse({ training: { minSteps: 5, maxSteps: 3 } });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('training.minSteps must not exceed training.maxSteps');
  });

  it('rejects a pattern rule whose range is inverted', () => {
    const result = AdaptationConfigSchema.safeParse({
      patterns: { analogy: { weight: 0.65, minExamples: 5, maxExamples: 3, minStrength: 2 } },
    });

    expect(result.success).toBe(false);
  });

  it('rejects a confidence threshold above 1', () => {
    expect(AdaptationConfigSchema.safeParse({ gate: { confidenceThreshold: 1.5 } }).success).toBe(false);
  });
});

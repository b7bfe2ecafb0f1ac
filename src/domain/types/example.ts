import { z } from 'zod/v4';
import { PatternKind } from './pattern.js';

export const ExampleSchema = z.object({
  /** Shared task preamble that preceded the examples */
  context: z.string(),
  input: z.string().min(1),
  output: z.string().min(1),
});

export type Example = Readonly<z.infer<typeof ExampleSchema>>;

export const ExtractionResultSchema = z.object({
  kind: PatternKind,
  examples: z.array(ExampleSchema),
  /** The trailing unpaired item the user actually wants answered */
  query: z.string().nullable(),
  /** Examples dropped because the pattern's maximum was exceeded */
  discarded: z.number().int().min(0),
});

export type ExtractionResult = z.infer<typeof ExtractionResultSchema>;

export const TrainingInstanceSchema = z.object({
  prompt: z.string(),
  target: z.string(),
  /** Index of the example held out as the supervised target */
  heldOutIndex: z.number().int().min(0),
});

export type TrainingInstance = Readonly<z.infer<typeof TrainingInstanceSchema>>;

import { z } from 'zod';
import examplesData from '../data/examples.json';
import type { ExampleDocument } from '../types.js';

const ExampleDocumentSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  description: z.string(),
  document_text: z.string(),
  expected_anomaly: z
    .enum(['IMPOSSIBLE_INSTRUCTION', 'LOGICAL_INCONSISTENCY', 'DATA_CONFLICT', 'PROTOCOL_VIOLATION'])
    .nullable(),
});

const ExamplesFileSchema = z.object({ examples: z.array(ExampleDocumentSchema) });

// Parsed once; a malformed data file fails at startup, not per request.
const EXAMPLES: readonly ExampleDocument[] = ExamplesFileSchema.parse(examplesData).examples;

/** Static demo documents: three that trigger one anomaly type each, one clean. */
export function getExamples(): { examples: ExampleDocument[] } {
  return { examples: EXAMPLES.map((e) => ({ ...e })) };
}

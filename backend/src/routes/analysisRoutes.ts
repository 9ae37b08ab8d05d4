import { Router } from 'express';
import createError from 'http-errors';
import { z } from 'zod';
import { analyzeDocument, toAnalysisResponse } from '../services/analysisService.js';
import { getExamples } from '../services/examplesService.js';

const router = Router();

const AnalyzeBodySchema = z.object({
  document_text: z.string({ required_error: 'document_text is required' }),
  document_type: z
    .string()
    .nullish()
    .transform((v) => v ?? 'medical'),
  patient_context: z
    .record(z.unknown())
    .nullish()
    .transform((v) => v ?? undefined),
});

function fieldErrors(error: z.ZodError): Record<string, string> {
  const details: Record<string, string> = {};
  for (const issue of error.issues) {
    const key = issue.path.join('.') || 'body';
    details[key] ??= issue.message;
  }
  return details;
}

/**
 * POST /api/v1/analyze
 * Flags anomaly patterns in a clinical document. Empty text is valid and yields no findings.
 */
router.post('/api/v1/analyze', async (req, res, next) => {
  const parsed = AnalyzeBodySchema.safeParse(req.body ?? {});
  if (!parsed.success) {
    return next(
      createError(400, 'invalid request body', { code: 'VALIDATION_ERROR', details: fieldErrors(parsed.error) })
    );
  }

  try {
    const result = await analyzeDocument({
      documentText: parsed.data.document_text,
      documentType: parsed.data.document_type,
      patientContext: parsed.data.patient_context,
    });
    return res.json(toAnalysisResponse(result));
  } catch (e) {
    return next(e);
  }
});

/**
 * GET /api/v1/examples
 * Fixed demo documents with the anomaly each one is expected to raise.
 */
router.get('/api/v1/examples', (_req, res) => {
  res.json(getExamples());
});

export default router;

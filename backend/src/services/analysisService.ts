import { v4 as uuidv4 } from 'uuid';
import { config, latencyFloor } from '../config.js';
import { logger } from '../logger.js';
import type { AnalysisRequest, AnalysisResponse, AnalysisResult, Anomaly, AnomalyDto } from '../types.js';
import { detectAnomalies, highestSeverity } from './detectionService.js';

const CONFIDENCE_WITH_FINDINGS = 0.95;
const CONFIDENCE_CLEAN = 0.85;

export interface AnalyzeOptions {
  /** Raises the latency floor; values below 100 ms are lifted to 100. */
  minLatencyMs?: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run detection and shape the result like a model response.
 * Responses never come back faster than the latency floor; the wait is per request.
 */
export async function analyzeDocument(request: AnalysisRequest, options: AnalyzeOptions = {}): Promise<AnalysisResult> {
  const minLatencyMs = latencyFloor(options.minLatencyMs ?? config.analysis.minLatencyMs);
  const requestId = uuidv4();
  const startedAt = Date.now();

  const anomalies = detectAnomalies(request.documentText, request.patientContext);

  const elapsed = Date.now() - startedAt;
  if (elapsed < minLatencyMs) {
    await sleep(minLatencyMs - elapsed);
  }
  const processingTimeMs = Math.max(minLatencyMs, Date.now() - startedAt);

  logger.info(
    {
      requestId,
      documentType: request.documentType,
      anomaliesFound: anomalies.length,
      highestSeverity: highestSeverity(anomalies),
      processingTimeMs,
    },
    'document analyzed'
  );

  return {
    requestId,
    timestamp: new Date().toISOString(),
    anomalies,
    processingTimeMs,
    modelUsed: config.analysis.modelUsed,
    confidence: anomalies.length > 0 ? CONFIDENCE_WITH_FINDINGS : CONFIDENCE_CLEAN,
  };
}

function toAnomalyDto(anomaly: Anomaly): AnomalyDto {
  return {
    type: anomaly.type,
    severity: anomaly.severity,
    title: anomaly.title,
    description: anomaly.description,
    evidence: anomaly.evidence,
    recommendation: anomaly.recommendation,
    protocol_reference: anomaly.protocolReference ?? null,
  };
}

export function toAnalysisResponse(result: AnalysisResult): AnalysisResponse {
  return {
    request_id: result.requestId,
    timestamp: result.timestamp,
    anomalies_found: result.anomalies.length,
    anomalies: result.anomalies.map(toAnomalyDto),
    processing_time_ms: result.processingTimeMs,
    model_used: result.modelUsed,
    confidence: result.confidence,
  };
}

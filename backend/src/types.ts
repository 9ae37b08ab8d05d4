/**
 * Anomaly detection data models and wire types.
 * Findings are ephemeral: built per request, never stored.
 */

export type AnomalyType =
  | 'impossible_instruction'
  | 'logical_inconsistency'
  | 'data_conflict'
  | 'protocol_violation';

export type SeverityLevel = 'info' | 'warning' | 'critical';

export interface Anomaly {
  type: AnomalyType;
  severity: SeverityLevel;
  title: string;
  description: string;
  evidence: string[];       // fixed per rule, not extracted from the input
  recommendation: string;
  protocolReference?: string;
}

/** Free-form patient context; only social_status.lives_alone is ever read. */
export type PatientContext = Record<string, unknown>;

export interface AnalysisRequest {
  documentText: string;
  documentType: string;
  patientContext?: PatientContext;
}

export interface AnalysisResult {
  requestId: string;
  timestamp: string;        // ISO-8601 UTC, trailing "Z"
  anomalies: Anomaly[];
  processingTimeMs: number;
  modelUsed: string;
  confidence: number;
}

export interface AnomalyDto {
  type: AnomalyType;
  severity: SeverityLevel;
  title: string;
  description: string;
  evidence: string[];
  recommendation: string;
  protocol_reference: string | null;
}

export interface AnalysisResponse {
  request_id: string;
  timestamp: string;
  anomalies_found: number;
  anomalies: AnomalyDto[];
  processing_time_ms: number;
  model_used: string;
  confidence: number;
}

export type ExpectedAnomaly = 'IMPOSSIBLE_INSTRUCTION' | 'LOGICAL_INCONSISTENCY' | 'DATA_CONFLICT' | 'PROTOCOL_VIOLATION';

export interface ExampleDocument {
  id: string;
  title: string;
  description: string;
  document_text: string;
  expected_anomaly: ExpectedAnomaly | null;
}

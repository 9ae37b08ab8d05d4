/**
 * Detection engine: evaluate every rule against the document independently.
 * A finding needs both a base match and a conflict-group match; either alone is not an anomaly.
 */

import { logger } from '../logger.js';
import { DETECTION_RULES, type ConflictGroup, type DetectionRule, type Pattern } from '../rules/detectionRules.js';
import type { Anomaly, PatientContext, SeverityLevel } from '../types.js';

export const SEVERITY_RANK: Record<SeverityLevel, number> = {
  info: 0,
  warning: 1,
  critical: 2,
};

export function conflictPatterns(group: ConflictGroup): readonly Pattern[] {
  switch (group.kind) {
    case 'instruction':
    case 'conclusion':
    case 'conflict':
    case 'value':
      return group.patterns;
    default: {
      const unreachable: never = group;
      throw new Error(`Unknown conflict group: ${JSON.stringify(unreachable)}`);
    }
  }
}

// Unanchored search, not a full match.
function anyMatch(patterns: readonly Pattern[], text: string): boolean {
  return patterns.some((p) => p.matcher(text).find());
}

function instantiate(rule: DetectionRule): Anomaly {
  const { type, severity, title, description, evidence, recommendation, protocolReference } = rule.anomaly;
  const anomaly: Anomaly = { type, severity, title, description, evidence: [...evidence], recommendation };
  if (protocolReference !== undefined) anomaly.protocolReference = protocolReference;
  return anomaly;
}

function livesAlone(context: PatientContext | undefined): boolean {
  const social = context?.social_status;
  if (social === null || typeof social !== 'object') return false;
  return 'lives_alone' in social && social.lives_alone === true;
}

export function detectAnomalies(
  text: string,
  context?: PatientContext,
  rules: readonly DetectionRule[] = DETECTION_RULES
): Anomaly[] {
  const lower = text.toLowerCase();
  const anomalies: Anomaly[] = [];

  for (const rule of rules) {
    if (!anyMatch(rule.basePatterns, lower)) continue;
    if (!anyMatch(conflictPatterns(rule.conflictGroup), lower)) continue;
    anomalies.push(instantiate(rule));
  }

  // Social-record context is read but does not change findings yet.
  if (livesAlone(context) && lower.includes('sestra')) {
    logger.debug('patient context: lives alone while document names a sister as caregiver');
  }

  return anomalies;
}

export function highestSeverity(anomalies: readonly Anomaly[]): SeverityLevel | null {
  let highest: SeverityLevel | null = null;
  for (const { severity } of anomalies) {
    if (highest === null || SEVERITY_RANK[severity] > SEVERITY_RANK[highest]) highest = severity;
  }
  return highest;
}

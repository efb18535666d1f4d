/**
 * Serialize analysis and update results for API responses: ISO date strings, arrays instead of sets.
 */

import { AnalysisRecord, DateCandidate, TargetField, UpdateOutcome, UpdateStatus } from '../types';
import { UpdatePlanEntry } from '../services/analysis/analysisViews';

export function serializeCandidate(c: DateCandidate): Record<string, unknown> {
  return {
    source: c.source,
    value: c.value.toISOString(),
    confidence: c.confidence,
    rawText: c.rawText ?? undefined,
  };
}

export function serializeRecord(r: AnalysisRecord): Record<string, unknown> {
  return {
    path: r.path,
    filename: r.filename,
    kind: r.kind,
    sizeBytes: r.sizeBytes,
    missingFields: Object.values(TargetField).filter((f) => r.missingFields.has(f)),
    candidates: r.candidates.map(serializeCandidate),
    suggestion: r.suggestion ? serializeCandidate(r.suggestion) : null,
    error: r.error ?? undefined,
  };
}

export function serializeOutcome(o: UpdateOutcome): Record<string, unknown> {
  if (o.status === UpdateStatus.Success) {
    return { ...o, date: o.date.toISOString() };
  }
  return { ...o };
}

export function serializePlanEntry(e: UpdatePlanEntry): Record<string, unknown> {
  return { ...e, date: e.date.toISOString() };
}

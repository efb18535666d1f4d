/**
 * Suggestion Ranker
 * Picks the most reliable candidate: highest confidence, ties broken by source priority.
 */

import { DateCandidate, DateSource } from '../../types';

/** Fixed reliability weight per evidence source */
export const SOURCE_CONFIDENCE: Readonly<Record<DateSource, number>> = {
  [DateSource.ExifDateTimeOriginal]: 1.0,
  [DateSource.ExifDateTimeDigitized]: 0.9,
  [DateSource.VideoCreationDate]: 0.8,
  [DateSource.FilenameDate]: 0.7,
  [DateSource.FilesystemCreation]: 0.5,
  [DateSource.FilesystemModification]: 0.3,
};

const SOURCE_PRIORITY: readonly DateSource[] = Object.values(DateSource);

export function sourcePriority(source: DateSource): number {
  return SOURCE_PRIORITY.indexOf(source);
}

function compareCandidates(a: DateCandidate, b: DateCandidate): number {
  if (a.confidence !== b.confidence) return b.confidence - a.confidence;
  return sourcePriority(a.source) - sourcePriority(b.source);
}

/**
 * Candidates in ranking order. Returns a new array.
 */
export function sortCandidates(candidates: readonly DateCandidate[]): DateCandidate[] {
  return [...candidates].sort(compareCandidates);
}

export function rankCandidates(candidates: readonly DateCandidate[]): DateCandidate | null {
  let best: DateCandidate | null = null;
  for (const candidate of candidates) {
    if (best === null || compareCandidates(candidate, best) < 0) best = candidate;
  }
  return best;
}

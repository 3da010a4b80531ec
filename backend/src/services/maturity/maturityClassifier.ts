/**
 * Maturity Classifier
 * Maps a 0-100 score onto the five maturity bands. Bands are
 * inclusive-low / exclusive-high except the top band, which includes 100.
 */

import type { MaturityLevel } from '@maturity/shared';
import { ValidationError } from '../../lib/errors.js';
import { getDefaultRuleCatalog, type MaturityBand } from './ruleCatalog.js';

export interface MaturityClassification {
  level: MaturityLevel;
  label: string;
}

export function classifyMaturity(
  score: number,
  bands: readonly MaturityBand[] = getDefaultRuleCatalog().maturityBands
): MaturityClassification {
  if (!Number.isFinite(score) || score < 0 || score > 100) {
    throw new ValidationError(`Score must be within [0, 100], got ${score}`, { score });
  }

  const lastIndex = bands.length - 1;
  const band = bands.find(
    (candidate, index) =>
      score >= candidate.min && (score < candidate.max || (index === lastIndex && score <= candidate.max))
  );

  if (!band) {
    throw new ValidationError(`No maturity band covers score ${score}`, { score });
  }

  return { level: band.level, label: band.label };
}

/**
 * The level directly above `level`, or null at the top.
 */
export function nextMaturityLevel(level: MaturityLevel): MaturityLevel | null {
  switch (level) {
    case 1:
      return 2;
    case 2:
      return 3;
    case 3:
      return 4;
    case 4:
      return 5;
    default:
      return null;
  }
}

export default {
  classifyMaturity,
  nextMaturityLevel,
};

/**
 * Pilot Validator
 * Structural gate a pilot design must pass before it can be approved.
 * Pure: reports violations, never mutates the pilot.
 */

import type { PilotDesign, PilotValidationReport } from '@maturity/shared';
import { ValidationError } from '../../lib/errors.js';

export const MIN_SUCCESS_CRITERIA = 3;
export const MIN_FAILURE_MODES = 1;

export type PilotGateInput = Pick<PilotDesign, 'successCriteria' | 'failureModes' | 'stakeholders'>;

export function evaluatePilotDesign(design: PilotGateInput): PilotValidationReport {
  const violations: string[] = [];

  // 1. Measurable success criteria
  const criteria = design.successCriteria;
  if (criteria.length < MIN_SUCCESS_CRITERIA) {
    violations.push(
      `At least ${MIN_SUCCESS_CRITERIA} success criteria are required, found ${criteria.length}`
    );
  }
  criteria.forEach((criterion, index) => {
    const label = `Success criterion ${index + 1}`;
    if (isBlank(criterion.metric)) {
      violations.push(`${label} has no metric name`);
    }
    if (typeof criterion.target !== 'number' || !Number.isFinite(criterion.target)) {
      violations.push(`${label} has no numeric target`);
    }
    if (isBlank(criterion.measurementMethod)) {
      violations.push(`${label} has no measurement method`);
    }
  });

  // 2. Anticipated failure modes, each with a mitigation
  const failureModes = design.failureModes;
  if (failureModes.length < MIN_FAILURE_MODES) {
    violations.push(`At least ${MIN_FAILURE_MODES} failure mode is required, found ${failureModes.length}`);
  }
  failureModes.forEach((mode, index) => {
    const label = `Failure mode ${index + 1}`;
    if (isBlank(mode.description)) {
      violations.push(`${label} has no description`);
    }
    if (isBlank(mode.mitigation)) {
      violations.push(`${label} has no mitigation action`);
    }
  });

  // 3. Named stakeholders
  const named = Object.entries(design.stakeholders).filter(
    ([role, person]) => !isBlank(role) && !isBlank(person)
  );
  if (named.length === 0) {
    violations.push('Stakeholder map is empty');
  }

  return { valid: violations.length === 0, violations };
}

/**
 * Throws a ValidationError naming every failed gate condition.
 */
export function assertPilotDesign(design: PilotGateInput): void {
  const report = evaluatePilotDesign(design);
  if (!report.valid) {
    throw new ValidationError(`Pilot design is incomplete: ${report.violations.join('; ')}`, {
      violations: report.violations,
    });
  }
}

function isBlank(value: string | undefined): boolean {
  return typeof value !== 'string' || value.trim().length === 0;
}

export default {
  evaluatePilotDesign,
  assertPilotDesign,
};

/**
 * Pilot State Machine
 *
 * designed ──► approved ──► in_progress ──► completed
 *     │            │              ├──────► failed
 *     └────────────┴──────────────┴──────► cancelled
 *
 * Approval is guarded by the design gate. Terminal states accept nothing.
 * Execution entries may only be appended while the pilot is in progress;
 * each append re-derives the at-risk flag from the whole log.
 */

import {
  PilotStatus,
  type ExecutionLogEntry,
  type ExecutionStatus,
  type Pilot,
  type PilotRiskSignal,
  type SuccessCriterion,
} from '@maturity/shared';
import { MS_PER_WEEK, systemClock, type Clock } from '../../lib/clock.js';
import { StateError, ValidationError } from '../../lib/errors.js';
import { assertPilotDesign } from './pilotValidator.js';

interface TransitionRule {
  to: PilotStatus;
  guard?: (pilot: Pilot) => void;
}

export const PILOT_TRANSITIONS: Readonly<Record<PilotStatus, readonly TransitionRule[]>> = {
  designed: [{ to: PilotStatus.APPROVED, guard: assertPilotDesign }, { to: PilotStatus.CANCELLED }],
  approved: [{ to: PilotStatus.IN_PROGRESS }, { to: PilotStatus.CANCELLED }],
  in_progress: [
    { to: PilotStatus.COMPLETED },
    { to: PilotStatus.FAILED },
    { to: PilotStatus.CANCELLED },
  ],
  completed: [],
  failed: [],
  cancelled: [],
};

/** Consecutive blocker entries at the tail of the log that flag a pilot. */
export const BLOCKER_RUN_THRESHOLD = 2;

export function isTerminalStatus(status: PilotStatus): boolean {
  return PILOT_TRANSITIONS[status].length === 0;
}

export function allowedTransitions(from: PilotStatus): PilotStatus[] {
  return PILOT_TRANSITIONS[from].map((rule) => rule.to);
}

export function canTransition(from: PilotStatus, to: PilotStatus): boolean {
  return PILOT_TRANSITIONS[from].some((rule) => rule.to === to);
}

/**
 * Returns the pilot in its new state. startedAt is stamped on entering
 * in_progress, endedAt on entering any terminal state.
 */
export function transitionPilot(pilot: Pilot, target: PilotStatus, clock: Clock = systemClock): Pilot {
  const rule = PILOT_TRANSITIONS[pilot.status].find((candidate) => candidate.to === target);
  if (!rule) {
    const suffix = isTerminalStatus(pilot.status) ? ` (${pilot.status} is terminal)` : '';
    throw new StateError(`Illegal pilot transition: ${pilot.status} -> ${target}${suffix}`, {
      pilotId: pilot.id,
      from: pilot.status,
      to: target,
      allowed: allowedTransitions(pilot.status),
    });
  }

  rule.guard?.(pilot);

  const now = clock.now();
  return {
    ...pilot,
    status: target,
    updatedAt: now,
    startedAt: target === PilotStatus.IN_PROGRESS ? now : pilot.startedAt,
    endedAt: isTerminalStatus(target) ? now : pilot.endedAt,
  };
}

export interface ExecutionLogInput {
  /** 1-based week index; derived from startedAt when omitted. */
  week?: number;
  status: ExecutionStatus;
  metrics?: Record<string, number>;
  blockers?: string[];
  notes?: string;
}

export interface ExecutionLogResult {
  pilot: Pilot;
  entry: ExecutionLogEntry;
}

export function appendExecutionEntry(
  pilot: Pilot,
  input: ExecutionLogInput,
  clock: Clock = systemClock
): ExecutionLogResult {
  if (pilot.status !== PilotStatus.IN_PROGRESS) {
    throw new StateError(
      `Execution entries can only be logged while a pilot is in progress (pilot ${pilot.id} is ${pilot.status})`,
      { pilotId: pilot.id, status: pilot.status }
    );
  }

  const now = clock.now();
  const week = input.week ?? deriveWeekIndex(pilot, now);
  if (!Number.isInteger(week) || week < 1) {
    throw new ValidationError(`Week must be a positive integer, got ${week}`, { week });
  }

  const previous = pilot.executionLog[pilot.executionLog.length - 1];
  if (previous && week <= previous.week) {
    const problem = week === previous.week ? 'already has an entry' : 'is earlier than the latest entry';
    throw new ValidationError(`Week ${week} ${problem} (latest logged week: ${previous.week})`, {
      week,
      latestWeek: previous.week,
    });
  }

  const metrics = input.metrics ?? {};
  for (const [metric, value] of Object.entries(metrics)) {
    if (!Number.isFinite(value)) {
      throw new ValidationError(`Metric '${metric}' must be a finite number`, { metric, value });
    }
  }

  const entry: ExecutionLogEntry = {
    week,
    recordedAt: now,
    status: input.status,
    metrics: { ...metrics },
    blockers: (input.blockers ?? []).map((blocker) => blocker.trim()).filter((blocker) => blocker.length > 0),
    notes: input.notes ?? '',
  };

  const executionLog = [...pilot.executionLog, entry];
  const riskSignals = detectRiskSignals(pilot.successCriteria, executionLog);

  return {
    entry,
    pilot: {
      ...pilot,
      executionLog,
      riskSignals,
      atRisk: riskSignals.length > 0,
      updatedAt: now,
    },
  };
}

export function deriveWeekIndex(pilot: Pilot, now: Date): number {
  if (!pilot.startedAt) {
    throw new StateError(`Pilot ${pilot.id} has no start date; supply the week explicitly`, {
      pilotId: pilot.id,
    });
  }
  const elapsed = now.getTime() - pilot.startedAt.getTime();
  return Math.max(1, Math.floor(elapsed / MS_PER_WEEK) + 1);
}

/**
 * At-risk signals for the current tail of the log:
 * - the latest BLOCKER_RUN_THRESHOLD or more entries all report blockers
 * - a success-criterion metric moved the wrong way since the previous entry
 */
export function detectRiskSignals(
  criteria: readonly SuccessCriterion[],
  log: readonly ExecutionLogEntry[]
): PilotRiskSignal[] {
  const signals: PilotRiskSignal[] = [];

  const blockedWeeks: number[] = [];
  for (let i = log.length - 1; i >= 0; i--) {
    const entry = log[i];
    if (!entry || entry.blockers.length === 0) break;
    blockedWeeks.unshift(entry.week);
  }
  if (blockedWeeks.length >= BLOCKER_RUN_THRESHOLD) {
    signals.push({ type: 'consecutive_blockers', weeks: blockedWeeks });
  }

  const latest = log[log.length - 1];
  const previous = log[log.length - 2];
  if (!latest || !previous) return signals;

  for (const criterion of criteria) {
    const currentValue = latest.metrics[criterion.metric];
    const previousValue = previous.metrics[criterion.metric];
    if (currentValue === undefined || previousValue === undefined) continue;

    const declining =
      criterion.direction === 'decrease' ? currentValue > previousValue : currentValue < previousValue;
    if (declining) {
      signals.push({
        type: 'declining_metric',
        metric: criterion.metric,
        previousValue,
        currentValue,
        direction: criterion.direction,
      });
    }
  }

  return signals;
}

export default {
  transitionPilot,
  appendExecutionEntry,
  detectRiskSignals,
  canTransition,
  allowedTransitions,
};

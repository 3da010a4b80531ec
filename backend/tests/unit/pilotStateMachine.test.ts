import { describe, it, expect } from 'vitest';
import type { Pilot } from '@maturity/shared';
import { MS_PER_WEEK } from '../../src/lib/clock.js';
import { StateError, ValidationError } from '../../src/lib/errors.js';
import {
  allowedTransitions,
  appendExecutionEntry,
  canTransition,
  detectRiskSignals,
  transitionPilot,
} from '../../src/services/pilot/pilotStateMachine.js';
import { buildPilot, ManualClock, START } from '../utils/testHelpers.js';

const DAY = 24 * 60 * 60 * 1000;

function runningPilot(overrides: Partial<Pilot> = {}): Pilot {
  return buildPilot({ status: 'in_progress', startedAt: START, ...overrides });
}

describe('transitionPilot', () => {
  it('walks designed -> approved -> in_progress -> completed', () => {
    const clock = new ManualClock();

    const approved = transitionPilot(buildPilot(), 'approved', clock);
    clock.advance(DAY);
    const running = transitionPilot(approved, 'in_progress', clock);
    clock.advance(6 * MS_PER_WEEK);
    const completed = transitionPilot(running, 'completed', clock);

    expect(approved.status).toBe('approved');
    expect(approved.startedAt).toBeNull();
    expect(running.startedAt).toEqual(new Date(START.getTime() + DAY));
    expect(completed.status).toBe('completed');
    expect(completed.startedAt).toEqual(running.startedAt);
    expect(completed.endedAt).toEqual(new Date(START.getTime() + DAY + 6 * MS_PER_WEEK));
  });

  it('rejects skipping approval', () => {
    expect(() => transitionPilot(buildPilot(), 'in_progress')).toThrow(
      'Illegal pilot transition: designed -> in_progress'
    );
  });

  it('gates approval on the design checks', () => {
    const pilot = buildPilot({ failureModes: [] });

    expect(() => transitionPilot(pilot, 'approved')).toThrow(ValidationError);
  });

  it.each(['completed', 'failed', 'cancelled'] as const)('accepts nothing once %s', (status) => {
    const pilot = buildPilot({ status });

    expect(allowedTransitions(status)).toEqual([]);
    expect(() => transitionPilot(pilot, 'approved')).toThrow(
      `Illegal pilot transition: ${status} -> approved (${status} is terminal)`
    );
  });

  it('allows cancellation from every non-terminal state', () => {
    expect(canTransition('designed', 'cancelled')).toBe(true);
    expect(canTransition('approved', 'cancelled')).toBe(true);
    expect(canTransition('in_progress', 'cancelled')).toBe(true);
    expect(canTransition('approved', 'completed')).toBe(false);
  });

  it('stamps endedAt on cancellation', () => {
    const clock = new ManualClock();
    const cancelled = transitionPilot(buildPilot(), 'cancelled', clock);

    expect(cancelled.endedAt).toEqual(START);
    expect(cancelled.startedAt).toBeNull();
  });

  it('raises StateError for illegal pairs', () => {
    expect(() => transitionPilot(buildPilot({ status: 'approved' }), 'failed')).toThrow(StateError);
  });
});

describe('appendExecutionEntry', () => {
  it('only accepts entries while in progress', () => {
    expect(() => appendExecutionEntry(buildPilot({ status: 'approved' }), { week: 1, status: 'on_track' })).toThrow(
      StateError
    );
  });

  it('derives the week from the clock when omitted', () => {
    const clock = new ManualClock();
    clock.advance(15 * DAY);

    const { entry } = appendExecutionEntry(runningPilot(), { status: 'on_track' }, clock);

    expect(entry.week).toBe(3);
    expect(entry.recordedAt).toEqual(new Date(START.getTime() + 15 * DAY));
  });

  it('starts at week 1 on the start date', () => {
    const { entry } = appendExecutionEntry(runningPilot(), { status: 'on_track' }, new ManualClock());

    expect(entry.week).toBe(1);
  });

  it('rejects a duplicate week', () => {
    const clock = new ManualClock();
    const { pilot } = appendExecutionEntry(runningPilot(), { week: 2, status: 'on_track' }, clock);

    expect(() => appendExecutionEntry(pilot, { week: 2, status: 'on_track' }, clock)).toThrow(
      'Week 2 already has an entry (latest logged week: 2)'
    );
  });

  it('rejects an out-of-order week', () => {
    const clock = new ManualClock();
    const { pilot } = appendExecutionEntry(runningPilot(), { week: 3, status: 'on_track' }, clock);

    expect(() => appendExecutionEntry(pilot, { week: 2, status: 'on_track' }, clock)).toThrow(
      'Week 2 is earlier than the latest entry (latest logged week: 3)'
    );
  });

  it('rejects non-positive weeks', () => {
    expect(() => appendExecutionEntry(runningPilot(), { week: 0, status: 'on_track' })).toThrow(
      'Week must be a positive integer, got 0'
    );
  });

  it('flags two consecutive weeks with blockers', () => {
    const clock = new ManualClock();
    const first = appendExecutionEntry(runningPilot(), { week: 1, status: 'at_risk', blockers: ['No data access'] }, clock);
    const second = appendExecutionEntry(first.pilot, { week: 2, status: 'blocked', blockers: ['Still no access'] }, clock);

    expect(first.pilot.atRisk).toBe(false);
    expect(second.pilot.atRisk).toBe(true);
    expect(second.pilot.riskSignals).toEqual([{ type: 'consecutive_blockers', weeks: [1, 2] }]);
    expect(second.pilot.status).toBe('in_progress');
  });

  it('clears the blocker signal after an unblocked week', () => {
    const clock = new ManualClock();
    let pilot = runningPilot();
    pilot = appendExecutionEntry(pilot, { week: 1, status: 'blocked', blockers: ['a'] }, clock).pilot;
    pilot = appendExecutionEntry(pilot, { week: 2, status: 'blocked', blockers: ['b'] }, clock).pilot;
    pilot = appendExecutionEntry(pilot, { week: 3, status: 'on_track', blockers: ['   '] }, clock).pilot;

    expect(pilot.atRisk).toBe(false);
    expect(pilot.executionLog[2]?.blockers).toEqual([]);
  });

  it('flags a tracked metric moving away from its target', () => {
    const clock = new ManualClock();
    const first = appendExecutionEntry(
      runningPilot(),
      { week: 1, status: 'on_track', metrics: { auto_routed_pct: 40, cycle_time_hours: 20 } },
      clock
    );
    const second = appendExecutionEntry(
      first.pilot,
      { week: 2, status: 'on_track', metrics: { auto_routed_pct: 35, cycle_time_hours: 18 } },
      clock
    );

    expect(second.pilot.atRisk).toBe(true);
    expect(second.pilot.riskSignals).toEqual([
      { type: 'declining_metric', metric: 'auto_routed_pct', previousValue: 40, currentValue: 35, direction: 'increase' },
    ]);
  });

  it('treats a rising value as a decline for decrease criteria', () => {
    const clock = new ManualClock();
    const first = appendExecutionEntry(runningPilot(), { week: 1, status: 'on_track', metrics: { cycle_time_hours: 20 } }, clock);
    const second = appendExecutionEntry(first.pilot, { week: 2, status: 'on_track', metrics: { cycle_time_hours: 24 } }, clock);

    expect(second.pilot.riskSignals).toEqual([
      { type: 'declining_metric', metric: 'cycle_time_hours', previousValue: 20, currentValue: 24, direction: 'decrease' },
    ]);
  });

  it('does not mutate the input pilot', () => {
    const pilot = runningPilot();
    appendExecutionEntry(pilot, { week: 1, status: 'on_track' }, new ManualClock());

    expect(pilot.executionLog).toEqual([]);
  });
});

describe('detectRiskSignals', () => {
  it('ignores metrics that are not success criteria', () => {
    const pilot = buildPilot();
    const entry = { recordedAt: START, status: 'on_track' as const, blockers: [], notes: '' };

    const signals = detectRiskSignals(pilot.successCriteria, [
      { ...entry, week: 1, metrics: { unrelated: 10 } },
      { ...entry, week: 2, metrics: { unrelated: 1 } },
    ]);

    expect(signals).toEqual([]);
  });
});

/**
 * Pilot Accelerator Index
 * Exports the design gate and lifecycle rules
 */

export {
  evaluatePilotDesign,
  assertPilotDesign,
  MIN_SUCCESS_CRITERIA,
  MIN_FAILURE_MODES,
  type PilotGateInput,
} from './pilotValidator.js';

export {
  PILOT_TRANSITIONS,
  BLOCKER_RUN_THRESHOLD,
  transitionPilot,
  appendExecutionEntry,
  deriveWeekIndex,
  detectRiskSignals,
  canTransition,
  allowedTransitions,
  isTerminalStatus,
  type ExecutionLogInput,
  type ExecutionLogResult,
} from './pilotStateMachine.js';

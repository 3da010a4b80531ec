/**
 * Domain Event Types
 */

export const MaturityEventType = {
  ASSESSMENT_CREATED: 'assessment.created',
  ASSESSMENT_COMPLETED: 'assessment.completed',
  ROADMAP_GENERATED: 'roadmap.generated',
  PILOT_DESIGNED: 'pilot.designed',
  PILOT_STATUS_CHANGED: 'pilot.status_changed',
  REPORT_GENERATED: 'report.generated',
} as const;

export type MaturityEventType = (typeof MaturityEventType)[keyof typeof MaturityEventType];

export interface MaturityEventPayload {
  entityId: string;
  tenantId: string;
  occurredAt: string;
  data: Record<string, unknown>;
}

export interface MaturityEvent extends MaturityEventPayload {
  eventType: MaturityEventType;
}

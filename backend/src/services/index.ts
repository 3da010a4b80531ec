/**
 * Application Services Index
 * Wires the services over one shared context
 */

import { AssessmentService } from './assessment/assessmentService.js';
import { BenchmarkService } from './benchmark/benchmarkService.js';
import { PilotService } from './pilot/pilotService.js';
import { ReportService } from './reporting/reportService.js';
import { RoadmapService } from './roadmap/roadmapService.js';
import { createServiceContext, type ServiceContext } from './serviceContext.js';

export interface MaturityServices {
  assessments: AssessmentService;
  benchmarks: BenchmarkService;
  roadmaps: RoadmapService;
  pilots: PilotService;
  reports: ReportService;
}

export function createServices(context: ServiceContext = createServiceContext()): MaturityServices {
  const assessments = new AssessmentService(context);
  const benchmarks = new BenchmarkService(context, assessments);
  const roadmaps = new RoadmapService(context, assessments);
  const pilots = new PilotService(context, assessments, roadmaps);
  const reports = new ReportService(context, { assessments, benchmarks, roadmaps, pilots });
  return { assessments, benchmarks, roadmaps, pilots, reports };
}

export { AssessmentService, BenchmarkService, PilotService, ReportService, RoadmapService };
export { createServiceContext, type ServiceContext };
export type {
  CreateAssessmentInput,
  SubmitResponsesInput,
  ScoreAssessmentInput,
} from './assessment/assessmentService.js';
export type { UpsertBenchmarkInput } from './benchmark/benchmarkService.js';
export type {
  DesignPilotInput,
  TransitionPilotInput,
  LogExecutionInput,
  LogExecutionResult,
} from './pilot/pilotService.js';
export type { GenerateReportInput, ReportCollaborators } from './reporting/reportService.js';

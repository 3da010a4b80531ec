/**
 * Report Service
 * Gathers an assessment's scores, benchmark standing, roadmap and pilot
 * progress and stores the assembled report.
 */

import { z } from 'zod';
import { AssessmentStatus, MaturityEventType, type Report } from '@maturity/shared';
import { NotFoundError, StateError } from '../../lib/errors.js';
import { createLogger } from '../../lib/logger.js';
import { parseInput } from '../../lib/schemas.js';
import type { AssessmentService } from '../assessment/assessmentService.js';
import type { BenchmarkService } from '../benchmark/benchmarkService.js';
import { buildEventPayload } from '../events/eventPublisher.js';
import { assembleReport } from '../maturity/reportAssembler.js';
import type { PilotService } from '../pilot/pilotService.js';
import type { RoadmapService } from '../roadmap/roadmapService.js';
import type { ServiceContext } from '../serviceContext.js';

const logger = createLogger('ReportService');

const generateReportSchema = z.object({
  tenantId: z.string().min(1),
  assessmentId: z.string().min(1),
  roadmapId: z.string().min(1).optional(),
  pilotId: z.string().min(1).optional(),
  includeBenchmarks: z.boolean().optional(),
});

export type GenerateReportInput = z.input<typeof generateReportSchema>;

export interface ReportCollaborators {
  assessments: AssessmentService;
  benchmarks: BenchmarkService;
  roadmaps: RoadmapService;
  pilots: PilotService;
}

export class ReportService {
  constructor(
    private readonly context: ServiceContext,
    private readonly services: ReportCollaborators
  ) {}

  async generateReport(input: GenerateReportInput): Promise<Report> {
    const data = parseInput(generateReportSchema, input, 'Invalid report request');
    const { clock, config, idFactory, repositories, publisher } = this.context;
    const { assessments, benchmarks, roadmaps, pilots } = this.services;

    const assessment = await assessments.getAssessment(data.tenantId, data.assessmentId);
    if (assessment.status !== AssessmentStatus.COMPLETED) {
      throw new StateError(
        `Cannot generate report - assessment ${assessment.id} is not completed (status: ${assessment.status})`,
        { assessmentId: assessment.id, status: assessment.status }
      );
    }

    const includeBenchmarks = data.includeBenchmarks ?? config.reportIncludeBenchmarks;
    const benchmark = includeBenchmarks
      ? await benchmarks.compareAssessment(data.tenantId, assessment.id)
      : null;
    const roadmap = data.roadmapId ? await roadmaps.getRoadmap(data.tenantId, data.roadmapId) : null;
    const pilot = data.pilotId ? await pilots.getPilot(data.tenantId, data.pilotId) : null;

    const report = assembleReport({
      id: idFactory(),
      generatedAt: clock.now(),
      assessment,
      benchmark,
      roadmap,
      pilot,
    });

    await repositories.reports.insert(report);
    logger.info(
      { tenantId: report.tenantId, reportId: report.id, assessmentId: report.assessmentId, includeBenchmarks },
      'Report generated'
    );

    await publisher.publish(
      MaturityEventType.REPORT_GENERATED,
      buildEventPayload(
        report.id,
        report.tenantId,
        {
          assessmentId: report.assessmentId,
          roadmapId: report.roadmapId,
          pilotId: report.pilotId,
          maturityLevel: report.content.maturityLevel,
        },
        clock
      )
    );

    return report;
  }

  async getReport(tenantId: string, reportId: string): Promise<Report> {
    const report = await this.context.repositories.reports.findById(tenantId, reportId);
    if (!report) {
      throw new NotFoundError('Report', reportId);
    }
    return report;
  }

  async listReports(tenantId: string, assessmentId: string): Promise<Report[]> {
    return this.context.repositories.reports.listByAssessment(tenantId, assessmentId);
  }
}

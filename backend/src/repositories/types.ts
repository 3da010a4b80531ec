/**
 * Repository Contracts
 * Persistence seams the application services depend on. Every lookup is
 * scoped by tenant. Guarded writes return false when the stored row no
 * longer matches what the caller observed; nothing is written in that case.
 */

import type {
  Assessment,
  AssessmentStatus,
  Benchmark,
  DimensionResponse,
  Industry,
  Pilot,
  Report,
  Roadmap,
  RoadmapStatus,
} from '@maturity/shared';

export interface AssessmentExpectation {
  version: number;
  statuses: readonly AssessmentStatus[];
}

export interface AssessmentListFilter {
  status?: AssessmentStatus;
}

export interface AssessmentRepository {
  insert(assessment: Assessment): Promise<void>;
  findById(tenantId: string, id: string): Promise<Assessment | null>;
  listByTenant(tenantId: string, filter?: AssessmentListFilter): Promise<Assessment[]>;
  listResponses(assessmentId: string): Promise<DimensionResponse[]>;
  /**
   * Writes `next` and upserts the responses (keyed by question) in one unit,
   * provided the stored row still has the expected version and status.
   */
  appendResponses(
    next: Assessment,
    expected: AssessmentExpectation,
    responses: readonly DimensionResponse[]
  ): Promise<boolean>;
  compareAndSet(next: Assessment, expected: AssessmentExpectation): Promise<boolean>;
}

export interface BenchmarkRepository {
  listByIndustry(industry: Industry): Promise<Benchmark[]>;
  /** Inserts or replaces the distribution for (industry, scope, period). */
  upsert(benchmark: Benchmark): Promise<Benchmark>;
}

export interface RoadmapRepository {
  insert(roadmap: Roadmap): Promise<void>;
  findById(tenantId: string, id: string): Promise<Roadmap | null>;
  listByAssessment(tenantId: string, assessmentId: string): Promise<Roadmap[]>;
  compareAndSet(next: Roadmap, expectedStatus: RoadmapStatus): Promise<boolean>;
}

export interface PilotRepository {
  insert(pilot: Pilot): Promise<void>;
  findById(tenantId: string, id: string): Promise<Pilot | null>;
  listByRoadmap(tenantId: string, roadmapId: string): Promise<Pilot[]>;
  compareAndSet(next: Pilot, expectedVersion: number): Promise<boolean>;
}

export interface ReportRepository {
  insert(report: Report): Promise<void>;
  findById(tenantId: string, id: string): Promise<Report | null>;
  listByAssessment(tenantId: string, assessmentId: string): Promise<Report[]>;
}

export interface Repositories {
  assessments: AssessmentRepository;
  benchmarks: BenchmarkRepository;
  roadmaps: RoadmapRepository;
  pilots: PilotRepository;
  reports: ReportRepository;
}

/**
 * PostgreSQL repository adapters
 */

import { postgres, type SqlExecutor } from '../../lib/postgres.js';
import type { Repositories } from '../types.js';
import { PostgresAssessmentRepository } from './assessmentRepository.js';
import { PostgresBenchmarkRepository } from './benchmarkRepository.js';
import { PostgresPilotRepository } from './pilotRepository.js';
import { PostgresReportRepository } from './reportRepository.js';
import { PostgresRoadmapRepository } from './roadmapRepository.js';

export {
  PostgresAssessmentRepository,
  PostgresBenchmarkRepository,
  PostgresPilotRepository,
  PostgresReportRepository,
  PostgresRoadmapRepository,
};

export function createPostgresRepositories(db: SqlExecutor = postgres): Repositories {
  return {
    assessments: new PostgresAssessmentRepository(db),
    benchmarks: new PostgresBenchmarkRepository(db),
    roadmaps: new PostgresRoadmapRepository(db),
    pilots: new PostgresPilotRepository(db),
    reports: new PostgresReportRepository(db),
  };
}

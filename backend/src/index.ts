/**
 * AI maturity engine
 * Scoring, benchmarking, roadmap and pilot rules plus the services that
 * persist and publish them.
 */

export * from './services/maturity/index.js';
export * from './services/pilot/index.js';
export * from './services/index.js';

export {
  RedisEventPublisher,
  buildEventPayload,
  eventChannel,
  getEventPublisher,
  resetEventPublisher,
  type EventPublisher,
  type PubSubClient,
} from './services/events/eventPublisher.js';

export type {
  AssessmentExpectation,
  AssessmentListFilter,
  AssessmentRepository,
  BenchmarkRepository,
  PilotRepository,
  ReportRepository,
  Repositories,
  RoadmapRepository,
} from './repositories/types.js';
export {
  createPostgresRepositories,
  PostgresAssessmentRepository,
  PostgresBenchmarkRepository,
  PostgresPilotRepository,
  PostgresReportRepository,
  PostgresRoadmapRepository,
} from './repositories/postgres/index.js';

export {
  ValidationError,
  StateError,
  NotFoundError,
  ConcurrencyError,
  isAppError,
  fromZodError,
  type AppError,
} from './lib/errors.js';
export { loadConfig, getConfig, type AppConfig } from './lib/config.js';
export { systemClock, MS_PER_WEEK, type Clock } from './lib/clock.js';
export { logger, createLogger, type Logger } from './lib/logger.js';
export { postgres, closePool, type SqlClient, type SqlExecutor } from './lib/postgres.js';
export { closeRedis, getRedisHealthMetrics } from './lib/redis.js';

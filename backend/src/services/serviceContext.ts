/**
 * Service Context
 * Collaborators shared by the application services. Production wiring uses
 * the PostgreSQL repositories, the Redis publisher and the system clock;
 * tests pass in-process stand-ins.
 */

import { v4 as uuidv4 } from 'uuid';
import { systemClock, type Clock } from '../lib/clock.js';
import { getConfig, type AppConfig } from '../lib/config.js';
import { createPostgresRepositories } from '../repositories/postgres/index.js';
import type { Repositories } from '../repositories/types.js';
import { getEventPublisher, type EventPublisher } from './events/eventPublisher.js';
import { getDefaultRuleCatalog, type RuleCatalog } from './maturity/ruleCatalog.js';

export interface ServiceContext {
  repositories: Repositories;
  publisher: EventPublisher;
  clock: Clock;
  catalog: RuleCatalog;
  config: AppConfig;
  idFactory: () => string;
}

export function createServiceContext(overrides: Partial<ServiceContext> = {}): ServiceContext {
  return {
    repositories: overrides.repositories ?? createPostgresRepositories(),
    publisher: overrides.publisher ?? getEventPublisher(),
    clock: overrides.clock ?? systemClock,
    catalog: overrides.catalog ?? getDefaultRuleCatalog(),
    config: overrides.config ?? getConfig(),
    idFactory: overrides.idFactory ?? uuidv4,
  };
}

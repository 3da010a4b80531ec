/**
 * Roadmap Service
 * Generates, stores and publishes improvement roadmaps for completed
 * assessments. Published roadmaps are immutable; regenerating creates a new one.
 */

import { MaturityEventType, RoadmapStatus, type Roadmap } from '@maturity/shared';
import { NotFoundError, StateError } from '../../lib/errors.js';
import { createLogger } from '../../lib/logger.js';
import type { AssessmentService } from '../assessment/assessmentService.js';
import { buildEventPayload } from '../events/eventPublisher.js';
import { generateRoadmap } from '../maturity/roadmapGenerator.js';
import type { ServiceContext } from '../serviceContext.js';

const logger = createLogger('RoadmapService');

export class RoadmapService {
  constructor(
    private readonly context: ServiceContext,
    private readonly assessments: AssessmentService
  ) {}

  async generateRoadmap(tenantId: string, assessmentId: string): Promise<Roadmap> {
    const { catalog, clock, config, idFactory, repositories, publisher } = this.context;
    const assessment = await this.assessments.getAssessment(tenantId, assessmentId);

    const generated = generateRoadmap(assessment, catalog, {
      maxInitiatives: config.roadmapMaxInitiatives,
      idFactory,
    });

    const roadmap: Roadmap = {
      id: idFactory(),
      tenantId: assessment.tenantId,
      assessmentId: assessment.id,
      status: RoadmapStatus.DRAFT,
      catalogVersion: generated.catalogVersion,
      initiatives: generated.initiatives,
      createdAt: clock.now(),
      publishedAt: null,
    };

    await repositories.roadmaps.insert(roadmap);
    logger.info(
      { tenantId, assessmentId, roadmapId: roadmap.id, initiativeCount: roadmap.initiatives.length },
      'Roadmap generated'
    );

    await publisher.publish(
      MaturityEventType.ROADMAP_GENERATED,
      buildEventPayload(
        roadmap.id,
        roadmap.tenantId,
        {
          assessmentId: roadmap.assessmentId,
          catalogVersion: roadmap.catalogVersion,
          initiativeCount: roadmap.initiatives.length,
          topInitiative: roadmap.initiatives[0]?.templateId ?? null,
        },
        clock
      )
    );

    return roadmap;
  }

  async getRoadmap(tenantId: string, roadmapId: string): Promise<Roadmap> {
    const roadmap = await this.context.repositories.roadmaps.findById(tenantId, roadmapId);
    if (!roadmap) {
      throw new NotFoundError('Roadmap', roadmapId);
    }
    return roadmap;
  }

  async listRoadmaps(tenantId: string, assessmentId: string): Promise<Roadmap[]> {
    return this.context.repositories.roadmaps.listByAssessment(tenantId, assessmentId);
  }

  async publishRoadmap(tenantId: string, roadmapId: string): Promise<Roadmap> {
    const roadmap = await this.getRoadmap(tenantId, roadmapId);
    if (roadmap.status === RoadmapStatus.PUBLISHED) {
      throw new StateError(`Roadmap ${roadmap.id} is already published`, { roadmapId: roadmap.id });
    }

    const published: Roadmap = {
      ...roadmap,
      status: RoadmapStatus.PUBLISHED,
      publishedAt: this.context.clock.now(),
    };

    const applied = await this.context.repositories.roadmaps.compareAndSet(published, RoadmapStatus.DRAFT);
    if (!applied) {
      throw new StateError(`Roadmap ${roadmap.id} was published concurrently`, { roadmapId: roadmap.id });
    }

    logger.info({ tenantId, roadmapId }, 'Roadmap published');
    return published;
  }
}

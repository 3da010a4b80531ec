import { describe, it, expect, beforeEach } from 'vitest';
import { NotFoundError, StateError } from '../../src/lib/errors.js';
import { createServices, type MaturityServices } from '../../src/services/index.js';
import {
  buildAssessment,
  buildCompletedAssessment,
  createTestContext,
  START,
  TENANT,
  type TestContext,
} from '../utils/testHelpers.js';

describe('RoadmapService', () => {
  let ctx: TestContext;
  let services: MaturityServices;

  beforeEach(async () => {
    ctx = createTestContext();
    services = createServices(ctx.context);
    await ctx.repositories.assessments.insert(buildCompletedAssessment());
  });

  it('stores a draft roadmap ranked by priority and announces it', async () => {
    const roadmap = await services.roadmaps.generateRoadmap(TENANT, 'assessment-1');

    expect(roadmap.status).toBe('draft');
    expect(roadmap.publishedAt).toBeNull();
    expect(roadmap.initiatives.map((initiative) => [initiative.templateId, initiative.priorityScore])).toEqual([
      ['governance-3-ethics', 0.45],
      ['people-4-coe', 0.4],
      ['process-5-portfolio', 0.2],
      ['technology-5-self-service', 0.2],
    ]);
    expect(await services.roadmaps.getRoadmap(TENANT, roadmap.id)).toEqual(roadmap);

    expect(ctx.publisher.events).toEqual([
      {
        eventType: 'roadmap.generated',
        entityId: roadmap.id,
        tenantId: TENANT,
        occurredAt: START.toISOString(),
        data: {
          assessmentId: 'assessment-1',
          catalogVersion: roadmap.catalogVersion,
          initiativeCount: 4,
          topInitiative: 'governance-3-ethics',
        },
      },
    ]);
  });

  it('caps the initiative count from configuration', async () => {
    ctx = createTestContext({ ROADMAP_MAX_INITIATIVES: '2' });
    services = createServices(ctx.context);
    await ctx.repositories.assessments.insert(buildCompletedAssessment());

    const roadmap = await services.roadmaps.generateRoadmap(TENANT, 'assessment-1');

    expect(roadmap.initiatives.map((initiative) => initiative.templateId)).toEqual([
      'governance-3-ethics',
      'people-4-coe',
    ]);
  });

  it('refuses assessments that are not completed', async () => {
    await ctx.repositories.assessments.insert(buildAssessment({ id: 'assessment-2' }));

    await expect(services.roadmaps.generateRoadmap(TENANT, 'assessment-2')).rejects.toThrow(StateError);
    expect(ctx.repositories.roadmaps.rows.size).toBe(0);
    expect(ctx.publisher.events).toEqual([]);
  });

  it('keeps earlier roadmaps when regenerating', async () => {
    const first = await services.roadmaps.generateRoadmap(TENANT, 'assessment-1');
    const second = await services.roadmaps.generateRoadmap(TENANT, 'assessment-1');

    const listed = await services.roadmaps.listRoadmaps(TENANT, 'assessment-1');
    expect(listed.map((roadmap) => roadmap.id).sort()).toEqual([first.id, second.id].sort());
  });

  it('publishes a draft once', async () => {
    const roadmap = await services.roadmaps.generateRoadmap(TENANT, 'assessment-1');
    ctx.clock.advance(1_000);

    const published = await services.roadmaps.publishRoadmap(TENANT, roadmap.id);

    expect(published.status).toBe('published');
    expect(published.publishedAt).toEqual(new Date(START.getTime() + 1_000));
    await expect(services.roadmaps.publishRoadmap(TENANT, roadmap.id)).rejects.toThrow(
      `Roadmap ${roadmap.id} is already published`
    );
  });

  it('hides roadmaps from other tenants', async () => {
    const roadmap = await services.roadmaps.generateRoadmap(TENANT, 'assessment-1');

    await expect(services.roadmaps.getRoadmap('tenant-b', roadmap.id)).rejects.toThrow(NotFoundError);
    await expect(services.roadmaps.generateRoadmap('tenant-b', 'assessment-1')).rejects.toThrow(NotFoundError);
  });
});

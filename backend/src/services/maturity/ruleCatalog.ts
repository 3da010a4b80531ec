/**
 * Rule Catalog
 * Versioned rule tables (dimension weights, maturity bands, initiative
 * templates) loaded from JSON and validated before use.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { DIMENSIONS } from '@maturity/shared';
import { getConfig } from '../../lib/config.js';
import { ValidationError, fromZodError } from '../../lib/errors.js';
import { createLogger } from '../../lib/logger.js';
import { dimensionSchema, effortTierSchema, maturityLevelSchema } from '../../lib/schemas.js';
import { WEIGHT_SUM_TOLERANCE } from './weighting.js';

const log = createLogger('ruleCatalog');

export const DEFAULT_CATALOG_PATH = fileURLToPath(
  new URL('../../../rules/catalog.v1.json', import.meta.url)
);

const weightSchema = z.number().min(0).max(1);

const targetLevelSchema = z.union([z.literal(2), z.literal(3), z.literal(4), z.literal(5)]);

const maturityBandSchema = z.object({
  level: maturityLevelSchema,
  label: z.string().min(1),
  min: z.number().min(0).max(100),
  max: z.number().min(0).max(100),
});

const initiativeTemplateSchema = z.object({
  id: z.string().min(1),
  dimension: dimensionSchema,
  targetLevel: targetLevelSchema,
  effort: effortTierSchema,
  title: z.string().min(1),
  description: z.string(),
});

export const ruleCatalogSchema = z
  .object({
    version: z.string().min(1),
    dimensionWeights: z.object({
      data: weightSchema,
      process: weightSchema,
      people: weightSchema,
      technology: weightSchema,
      governance: weightSchema,
    }),
    maturityBands: z.array(maturityBandSchema).length(5),
    initiativeTemplates: z.array(initiativeTemplateSchema),
  })
  .superRefine((catalog, ctx) => {
    const weightSum = DIMENSIONS.reduce((sum, dimension) => sum + catalog.dimensionWeights[dimension], 0);
    if (Math.abs(weightSum - 1) > WEIGHT_SUM_TOLERANCE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['dimensionWeights'],
        message: `Dimension weights must sum to 1.0, got ${weightSum.toFixed(3)}`,
      });
    }

    // Bands must be ordered 1..5 and tile [0, 100] without gaps
    catalog.maturityBands.forEach((band, index) => {
      if (band.level !== index + 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['maturityBands', index, 'level'],
          message: `Expected level ${index + 1}, got ${band.level}`,
        });
      }
      if (band.min >= band.max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['maturityBands', index],
          message: 'Band min must be below band max',
        });
      }
      const previous = catalog.maturityBands[index - 1];
      if (previous && previous.max !== band.min) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['maturityBands', index, 'min'],
          message: `Band ${band.level} must start where band ${previous.level} ends (${previous.max})`,
        });
      }
    });

    const first = catalog.maturityBands[0];
    const last = catalog.maturityBands[catalog.maturityBands.length - 1];
    if (first && first.min !== 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['maturityBands', 0, 'min'], message: 'Lowest band must start at 0' });
    }
    if (last && last.max !== 100) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['maturityBands', 4, 'max'], message: 'Highest band must end at 100' });
    }

    const seen = new Set<string>();
    catalog.initiativeTemplates.forEach((template, index) => {
      if (seen.has(template.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['initiativeTemplates', index, 'id'],
          message: `Duplicate template id '${template.id}'`,
        });
      }
      seen.add(template.id);
    });
  });

export type RuleCatalog = z.infer<typeof ruleCatalogSchema>;
export type MaturityBand = z.infer<typeof maturityBandSchema>;
export type InitiativeTemplate = z.infer<typeof initiativeTemplateSchema>;

export function parseRuleCatalog(input: unknown): RuleCatalog {
  const parsed = ruleCatalogSchema.safeParse(input);
  if (!parsed.success) {
    throw fromZodError(parsed.error, 'Invalid rule catalog');
  }
  return parsed.data;
}

export function loadRuleCatalog(path: string = DEFAULT_CATALOG_PATH): RuleCatalog {
  const raw = readFileSync(path, 'utf-8');

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`Rule catalog at ${path} is not valid JSON`, {
      path,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const catalog = parseRuleCatalog(document);
  log.info(
    { path, version: catalog.version, templateCount: catalog.initiativeTemplates.length },
    'Rule catalog loaded'
  );
  return catalog;
}

let defaultCatalog: RuleCatalog | null = null;

/**
 * Catalog named by RULE_CATALOG_PATH, or the bundled v1 catalog.
 */
export function getDefaultRuleCatalog(): RuleCatalog {
  if (!defaultCatalog) {
    defaultCatalog = loadRuleCatalog(getConfig().ruleCatalogPath ?? DEFAULT_CATALOG_PATH);
  }
  return defaultCatalog;
}

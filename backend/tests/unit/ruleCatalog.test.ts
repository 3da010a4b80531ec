import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ValidationError } from '../../src/lib/errors.js';
import {
  DEFAULT_CATALOG_PATH,
  getDefaultRuleCatalog,
  loadRuleCatalog,
  parseRuleCatalog,
  type RuleCatalog,
} from '../../src/services/maturity/ruleCatalog.js';

function catalogWith(overrides: Partial<RuleCatalog>): unknown {
  return { ...getDefaultRuleCatalog(), ...overrides };
}

describe('RuleCatalog', () => {
  it('loads the bundled catalog', () => {
    const catalog = getDefaultRuleCatalog();

    expect(catalog.version).toBe('2024.1');
    expect(catalog.dimensionWeights).toEqual({
      data: 0.25,
      process: 0.2,
      people: 0.2,
      technology: 0.2,
      governance: 0.15,
    });
    expect(catalog.maturityBands.map((band) => band.label)).toEqual([
      'Initial',
      'Developing',
      'Defined',
      'Managed',
      'Optimizing',
    ]);
    expect(catalog.initiativeTemplates).toHaveLength(21);
  });

  it('ships the default catalog beside the backend sources', () => {
    expect(DEFAULT_CATALOG_PATH.endsWith(join('backend', 'rules', 'catalog.v1.json'))).toBe(true);
    expect(loadRuleCatalog(DEFAULT_CATALOG_PATH)).toEqual(getDefaultRuleCatalog());
  });

  it('rejects weights that do not sum to 1', () => {
    const input = catalogWith({
      dimensionWeights: { data: 0.3, process: 0.2, people: 0.2, technology: 0.2, governance: 0.15 },
    });

    expect(() => parseRuleCatalog(input)).toThrow('Invalid rule catalog');
  });

  it('rejects bands that leave a gap', () => {
    const bands = getDefaultRuleCatalog().maturityBands.map((band) =>
      band.level === 3 ? { ...band, min: 45 } : band
    );

    try {
      parseRuleCatalog(catalogWith({ maturityBands: bands }));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error instanceof ValidationError && error.details).toEqual({
        issues: [{ path: 'maturityBands.2.min', message: 'Band 3 must start where band 2 ends (40)' }],
      });
    }
  });

  it('rejects duplicate template ids', () => {
    const templates = getDefaultRuleCatalog().initiativeTemplates;
    const first = templates[0];
    const input = catalogWith({ initiativeTemplates: first ? [first, { ...first }] : [] });

    expect(() => parseRuleCatalog(input)).toThrow(ValidationError);
  });

  it('loads an alternative catalog from disk', () => {
    const dir = mkdtempSync(join(tmpdir(), 'catalog-'));
    const path = join(dir, 'catalog.json');
    writeFileSync(path, JSON.stringify(catalogWith({ version: '2025.2', initiativeTemplates: [] })));

    const catalog = loadRuleCatalog(path);

    expect(catalog.version).toBe('2025.2');
    expect(catalog.initiativeTemplates).toEqual([]);
  });

  it('reports malformed JSON as a validation error', () => {
    const dir = mkdtempSync(join(tmpdir(), 'catalog-'));
    const path = join(dir, 'broken.json');
    writeFileSync(path, '{ "version": ');

    expect(() => loadRuleCatalog(path)).toThrow(`Rule catalog at ${path} is not valid JSON`);
  });
});

/**
 * PostgreSQL Benchmark Repository
 * Peer distributions, one row per (industry, scope, period)
 */

import type { QueryResultRow } from 'pg';
import { z } from 'zod';
import type { Benchmark, Industry } from '@maturity/shared';
import { postgres, type SqlExecutor } from '../../lib/postgres.js';
import { dimensionSchema, industrySchema } from '../../lib/schemas.js';
import type { BenchmarkRepository } from '../types.js';
import { decodeRow, jsonb } from './rows.js';

const benchmarkRowSchema = z.object({
  id: z.string(),
  industry: industrySchema,
  scope: z.union([dimensionSchema, z.literal('overall')]),
  period: z.string(),
  peer_scores: z.array(z.number()),
  updated_at: z.date(),
});

const BENCHMARK_COLUMNS = 'id, industry, scope, period, peer_scores, updated_at';

export class PostgresBenchmarkRepository implements BenchmarkRepository {
  constructor(private readonly db: SqlExecutor = postgres) {}

  async listByIndustry(industry: Industry): Promise<Benchmark[]> {
    const result = await this.db.query(
      `SELECT ${BENCHMARK_COLUMNS} FROM benchmarks WHERE industry = $1 ORDER BY scope, updated_at DESC`,
      [industry]
    );
    return result.rows.map(toBenchmark);
  }

  async upsert(benchmark: Benchmark): Promise<Benchmark> {
    const result = await this.db.query(
      `INSERT INTO benchmarks (${BENCHMARK_COLUMNS})
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT (industry, scope, period)
       DO UPDATE SET peer_scores = EXCLUDED.peer_scores, updated_at = EXCLUDED.updated_at
       RETURNING ${BENCHMARK_COLUMNS}`,
      [
        benchmark.id,
        benchmark.industry,
        benchmark.scope,
        benchmark.period,
        jsonb(benchmark.peerScores),
        benchmark.updatedAt,
      ]
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error(`Benchmark upsert returned no row for ${benchmark.industry}/${benchmark.scope}`);
    }
    return toBenchmark(row);
  }
}

function toBenchmark(row: QueryResultRow): Benchmark {
  const r = decodeRow(benchmarkRowSchema, row, 'benchmarks');
  return {
    id: r.id,
    industry: r.industry,
    scope: r.scope,
    period: r.period,
    peerScores: r.peer_scores,
    updatedAt: r.updated_at,
  };
}

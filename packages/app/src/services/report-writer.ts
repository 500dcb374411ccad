/**
 * Recommendation report: summary building and atomic JSON output
 */

import { randomUUID } from 'node:crypto';
import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { createNullLogger } from '@etfpulse/logger';
import type { Logger } from '@etfpulse/logger';
import type { AnalysisResult, Recommendation } from './analysis.js';

export interface RecommendationReport {
  generatedAt: string;
  total: number;
  counts: Record<Recommendation, number>;
  recommendations: Array<{
    symbol: string;
    name: string;
    recommendation: Recommendation;
    price: number;
    zScore: number | null;
    analyzedAt: string;
  }>;
}

export function buildReport(results: readonly AnalysisResult[], generatedAt: string): RecommendationReport {
  const counts: Record<Recommendation, number> = { buy: 0, sell: 0, hold: 0 };
  for (const result of results) {
    counts[result.recommendation] += 1;
  }

  return {
    generatedAt,
    total: results.length,
    counts,
    recommendations: results.map((result) => ({
      symbol: result.symbol,
      name: result.name,
      recommendation: result.recommendation,
      price: result.price,
      zScore: result.zScore === null ? null : Math.round(result.zScore * 1000) / 1000,
      analyzedAt: result.analyzedAt,
    })),
  };
}

/**
 * File name stamp, e.g. 20250303-020000.
 */
export function reportStamp(iso: string): string {
  return iso.slice(0, 19).replace(/[-:]/g, '').replace('T', '-');
}

export interface ReportWriterOptions {
  dir: string;
  logger?: Logger;
  now?: () => number;
}

export class ReportWriter {
  private readonly dir: string;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: ReportWriterOptions) {
    this.dir = options.dir;
    this.logger = (options.logger ?? createNullLogger()).child({ component: 'reports' });
    this.now = options.now ?? Date.now;
  }

  /**
   * Writes `report-<stamp>.json` through a temp file and rename.
   *
   * @returns Path of the written report
   */
  async write(results: readonly AnalysisResult[]): Promise<string> {
    const generatedAt = new Date(this.now()).toISOString();
    const report = buildReport(results, generatedAt);
    const target = path.join(this.dir, `report-${reportStamp(generatedAt)}.json`);
    const temp = path.join(this.dir, `.report-${randomUUID()}.tmp`);

    await mkdir(this.dir, { recursive: true });
    try {
      await writeFile(temp, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');
      await rename(temp, target);
    } catch (error) {
      await rm(temp, { force: true });
      throw error;
    }

    this.logger.info('Report written', {
      path: target,
      count: report.total,
      buy: report.counts.buy,
      sell: report.counts.sell,
      hold: report.counts.hold,
    });
    return target;
  }
}

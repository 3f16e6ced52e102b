/**
 * Report Store
 *
 * Publishes the latest ClusterReport to Redis for dashboards and
 * `fhm report`, and reads it back. Fails soft: when Redis is down the
 * monitor keeps running and the report is only kept in memory.
 */

import { Redis } from 'ioredis';
import { log } from '../logger.js';
import type { ClusterReport } from '../types.js';
import { reportToJSON } from '../monitor/report.js';

/** Redis key where the latest cluster report is written */
export const REPORT_KEY = 'monitor:health:latest';

/** The subset of ioredis the store needs */
export interface ReportCache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
  disconnect(): void;
}

export interface StoredReport {
  report: Record<string, unknown>;
  timestamp: Date;
  ageSeconds: number;
}

export class ReportStore {
  private redis: ReportCache | null = null;
  private redisAvailable = true;

  constructor(
    redisUrl: string | undefined,
    private readonly ttlSeconds: number,
    cache?: ReportCache,
  ) {
    if (cache) {
      this.redis = cache;
    } else {
      this.initRedis(redisUrl);
    }
  }

  private initRedis(redisUrl: string | undefined): void {
    if (!redisUrl) {
      log('[ReportStore] No Redis URL configured, reports stay in memory', 'debug');
      this.redisAvailable = false;
      return;
    }

    try {
      const redis = new Redis(redisUrl, {
        maxRetriesPerRequest: 1,
        connectTimeout: 5000,
        commandTimeout: 3000,
        lazyConnect: true,
        retryStrategy: (times: number) => {
          if (times > 3) {
            log('[ReportStore] Redis connection failed, giving up', 'warn');
            return null;
          }
          return Math.min(times * 200, 1000);
        },
      });

      redis.on('error', (err: Error) => {
        if (this.redisAvailable) {
          log(`[ReportStore] Redis error: ${err.message}`, 'warn');
          this.redisAvailable = false;
        }
      });

      redis.on('connect', () => {
        if (!this.redisAvailable) {
          log('[ReportStore] Redis reconnected');
        }
        this.redisAvailable = true;
      });
      this.redis = redis;
    } catch (err) {
      log(`[ReportStore] Failed to initialize Redis: ${err instanceof Error ? err.message : String(err)}`, 'warn');
      this.redisAvailable = false;
    }
  }

  get enabled(): boolean {
    return this.redis !== null;
  }

  /** Write the report; never throws. */
  async publish(report: ClusterReport): Promise<void> {
    if (!this.redis) return;
    try {
      await this.redis.set(REPORT_KEY, JSON.stringify(reportToJSON(report)), 'EX', this.ttlSeconds);
      this.redisAvailable = true;
      log(`[ReportStore] Published cycle ${report.cycle}`, 'debug');
    } catch (err) {
      if (this.redisAvailable) {
        log(`[ReportStore] Publish failed: ${err instanceof Error ? err.message : String(err)}`, 'warn');
      }
      this.redisAvailable = false;
    }
  }

  /** Latest stored report, or null if none is stored or Redis is unreachable. */
  async readLatest(now: number = Date.now()): Promise<StoredReport | null> {
    if (!this.redis) return null;
    try {
      const data = await this.redis.get(REPORT_KEY);
      if (!data) return null;
      const parsed: unknown = JSON.parse(data);
      if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return null;
      const report: Record<string, unknown> = { ...parsed };
      const timestamp = typeof report.timestamp === 'string' ? new Date(report.timestamp) : new Date(NaN);
      if (Number.isNaN(timestamp.getTime())) return null;
      return { report, timestamp, ageSeconds: (now - timestamp.getTime()) / 1000 };
    } catch (err) {
      log(`[ReportStore] Read failed: ${err instanceof Error ? err.message : String(err)}`, 'warn');
      return null;
    }
  }

  async close(): Promise<void> {
    if (this.redis) {
      this.redis.disconnect();
      this.redis = null;
    }
  }
}

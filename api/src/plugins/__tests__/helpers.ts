import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { FastifyInstance } from 'fastify';
import { loadConfig } from '../../config/index.js';
import { buildServer } from '../../server.js';
import { ReviewService } from '../../services/review.js';
import { FakeRemoteSource, type FakeSourceData } from '../../services/__tests__/fakeSource.js';
import { silentLogger } from '../../utils/logger.js';

export const RUN_TIME = new Date('2026-01-12T00:00:00Z');

export interface TestApp {
  server: FastifyInstance;
  service: ReviewService;
  source: FakeRemoteSource;
  dir: string;
  close: () => Promise<void>;
}

export async function createTestApp(data: FakeSourceData, env: Record<string, string> = {}): Promise<TestApp> {
  const dir = await mkdtemp(join(tmpdir(), 'prflow-api-'));
  const config = loadConfig({ NODE_ENV: 'test', ...env }, {});
  const source = new FakeRemoteSource(data);
  const service = new ReviewService({
    source,
    engine: config.engine,
    retry: { maxAttempts: 1 },
    snapshotDir: dir,
    logger: silentLogger(),
    now: () => RUN_TIME,
  });
  const server = await buildServer({ config, service, logging: false });
  let closed = false;

  return {
    server,
    service,
    source,
    dir,
    close: async () => {
      if (closed) return;
      closed = true;
      await server.close();
      await rm(dir, { recursive: true, force: true });
    },
  };
}

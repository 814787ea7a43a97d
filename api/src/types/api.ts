import { z } from 'zod';
import type { GovernorStats } from '../services/engine/governor.js';
import type { PoolStats } from '../services/engine/pool.js';

// Zod schemas for runtime validation
export const ReviewRequestSchema = z
  .object({
    organization: z.string().trim().min(1).optional(),
    user: z.string().trim().min(1).optional(),
    team: z.string().trim().min(1).optional(),
    since: z.coerce.date().optional(),
    until: z.coerce.date().optional(),
    days: z.coerce.number().int().positive().max(365).optional(),
    repositories: z.array(z.string().trim().min(1)).optional(),
  })
  .strict();

// Type inference from Zod schemas
export type ReviewRequestBody = z.infer<typeof ReviewRequestSchema>;

// Body of every error the server's error and 404 handlers send
export interface ApiError {
  statusCode: number;
  error: string;
  message: string;
  timestamp: string;
  stack?: string;
}

export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy' | 'degraded';
  timestamp: string;
  responseTime?: string;
  services: {
    github: boolean | string;
  };
}

export interface DetailedHealthResponse extends HealthCheckResponse {
  environment: string;
  version: string;
  uptime: number;
  memory: NodeJS.MemoryUsage;
  engine: {
    governor: GovernorStats;
    pools: PoolStats[];
  };
  rateLimit?: {
    limit: number;
    remaining: number;
    used: number;
    reset: string;
  };
}

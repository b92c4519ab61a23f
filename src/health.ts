import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { CaptureChannel } from './types';

interface Counters {
  captured: Record<CaptureChannel, number>;
  byMethod: Record<string, number>;
  byStatus: Record<string, number>;
  purged: number;
  skipped: number;
  failed: number;
}

// In-memory counters, reset with the process
export class CaptureMetrics {
  private readonly counters: Counters = {
    captured: { request: 0, service: 0 },
    byMethod: {},
    byStatus: {},
    purged: 0,
    skipped: 0,
    failed: 0,
  };

  recordCaptured(channel: CaptureChannel, method: string, status: number): void {
    this.counters.captured[channel]++;
    this.counters.byMethod[method] = (this.counters.byMethod[method] || 0) + 1;
    const statusClass = `${Math.floor(status / 100)}xx`;
    this.counters.byStatus[statusClass] = (this.counters.byStatus[statusClass] || 0) + 1;
  }

  recordPurged(): void {
    this.counters.purged++;
  }

  recordSkipped(): void {
    this.counters.skipped++;
  }

  recordFailed(): void {
    this.counters.failed++;
  }

  snapshot(): Counters {
    return {
      ...this.counters,
      captured: { ...this.counters.captured },
      byMethod: { ...this.counters.byMethod },
      byStatus: { ...this.counters.byStatus },
    };
  }
}

export function renderMetrics(m: Counters): string {
  const lines: string[] = [];

  lines.push(`# HELP captured_total Number of entries handed to a recorder`);
  lines.push(`# TYPE captured_total counter`);
  for (const [channel, count] of Object.entries(m.captured)) {
    lines.push(`captured_total{channel="${channel}"} ${count}`);
  }

  lines.push(`# HELP captured_by_method Number of entries captured by HTTP method`);
  lines.push(`# TYPE captured_by_method counter`);
  for (const [method, count] of Object.entries(m.byMethod)) {
    lines.push(`captured_by_method{method="${method}"} ${count}`);
  }

  lines.push(`# HELP captured_by_status Number of entries captured by response status class`);
  lines.push(`# TYPE captured_by_status counter`);
  for (const [status, count] of Object.entries(m.byStatus)) {
    lines.push(`captured_by_status{status="${status}"} ${count}`);
  }

  lines.push(`# HELP purged_payloads Request or response payloads replaced by the purge marker`);
  lines.push(`# TYPE purged_payloads counter`);
  lines.push(`purged_payloads ${m.purged}`);

  lines.push(`# HELP skipped_requests Requests excluded by path rules`);
  lines.push(`# TYPE skipped_requests counter`);
  lines.push(`skipped_requests ${m.skipped}`);

  lines.push(`# HELP failed_captures Captures abandoned after an error`);
  lines.push(`# TYPE failed_captures counter`);
  lines.push(`failed_captures ${m.failed}`);

  return lines.join('\n') + '\n';
}

export interface HealthOptions {
  version: string;
  metrics: CaptureMetrics;
  pending: () => number;
}

export async function registerHealthRoutes(fastify: FastifyInstance, options: HealthOptions): Promise<void> {
  fastify.get('/healthz', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({
      ok: true,
      version: options.version,
      pending: options.pending(),
    });
  });

  // Metrics endpoint (Prometheus-compatible format)
  fastify.get('/metrics', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply
      .type('text/plain')
      .status(200)
      .send(renderMetrics(options.metrics.snapshot()));
  });
}

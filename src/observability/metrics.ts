import type { FastifyInstance } from "fastify";

type LatencySeries = "request_latency" | "pipeline_latency" | "retrieval_latency" | "openai_latency";
type CounterFamily = "corrective_actions" | "quality_verdicts" | "error_rates";

export interface LatencyView {
  count: number;
  avgMs: number;
  minMs: number;
  maxMs: number;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export type MetricsSnapshot = Record<LatencySeries, LatencyView> &
  Record<CounterFamily, Record<string, number>> & { openai_usage: TokenUsage };

const round2 = (value: number): number => Math.round(value * 100) / 100;

class LatencyAccumulator {
  private samples = 0;
  private total = 0;
  private min = Number.POSITIVE_INFINITY;
  private max = 0;

  observe(durationMs: number): void {
    const value = Number.isFinite(durationMs) && durationMs > 0 ? durationMs : 0;
    this.samples += 1;
    this.total += value;
    this.min = Math.min(this.min, value);
    this.max = Math.max(this.max, value);
  }

  view(): LatencyView {
    if (this.samples === 0) {
      return { count: 0, avgMs: 0, minMs: 0, maxMs: 0 };
    }
    return {
      count: this.samples,
      avgMs: round2(this.total / this.samples),
      minMs: round2(this.min),
      maxMs: round2(this.max)
    };
  }
}

export class MetricsRegistry {
  private latencies = new Map<LatencySeries, LatencyAccumulator>();
  private counters = new Map<CounterFamily, Map<string, number>>();
  private usage: TokenUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };

  observe(series: LatencySeries, durationMs: number): void {
    let accumulator = this.latencies.get(series);
    if (!accumulator) {
      accumulator = new LatencyAccumulator();
      this.latencies.set(series, accumulator);
    }
    accumulator.observe(durationMs);
  }

  increment(family: CounterFamily, key: string, by = 1): void {
    let counter = this.counters.get(family);
    if (!counter) {
      counter = new Map();
      this.counters.set(family, counter);
    }
    counter.set(key, (counter.get(key) ?? 0) + by);
  }

  addUsage(usage: Partial<TokenUsage>): void {
    this.usage = {
      promptTokens: this.usage.promptTokens + (usage.promptTokens ?? 0),
      completionTokens: this.usage.completionTokens + (usage.completionTokens ?? 0),
      totalTokens: this.usage.totalTokens + (usage.totalTokens ?? 0)
    };
  }

  snapshot(): MetricsSnapshot {
    const latency = (series: LatencySeries): LatencyView =>
      this.latencies.get(series)?.view() ?? new LatencyAccumulator().view();
    const counts = (family: CounterFamily): Record<string, number> =>
      Object.fromEntries(this.counters.get(family) ?? []);

    return {
      request_latency: latency("request_latency"),
      pipeline_latency: latency("pipeline_latency"),
      retrieval_latency: latency("retrieval_latency"),
      openai_latency: latency("openai_latency"),
      openai_usage: { ...this.usage },
      corrective_actions: counts("corrective_actions"),
      quality_verdicts: counts("quality_verdicts"),
      error_rates: counts("error_rates")
    };
  }
}

let registry = new MetricsRegistry();

export const recordRequestLatency = (durationMs: number): void => registry.observe("request_latency", durationMs);
export const recordPipelineLatency = (durationMs: number): void => registry.observe("pipeline_latency", durationMs);
export const recordRetrievalLatency = (durationMs: number): void => registry.observe("retrieval_latency", durationMs);
export const recordOpenAILatency = (durationMs: number): void => registry.observe("openai_latency", durationMs);
export const recordOpenAIUsage = (usage: Partial<TokenUsage>): void => registry.addUsage(usage);

export const recordCorrectiveActions = (actions: readonly string[]): void => {
  for (const action of actions) {
    registry.increment("corrective_actions", action);
  }
};

export const recordQualityVerdict = (verdict: string): void => registry.increment("quality_verdicts", verdict);
export const recordErrorRate = (key: string): void => registry.increment("error_rates", key);

export const getMetricsSnapshot = (): MetricsSnapshot => registry.snapshot();

export const resetMetrics = (): void => {
  registry = new MetricsRegistry();
};

export const registerMetricsRoutes = async (app: FastifyInstance): Promise<void> => {
  app.get("/metrics", async () => getMetricsSnapshot());
};

export const registerRequestMetricsHooks = (app: FastifyInstance): void => {
  app.addHook("onRequest", async (request, reply) => {
    reply.header("x-request-id", request.id);
  });

  app.addHook("onResponse", async (_request, reply) => {
    recordRequestLatency(reply.elapsedTime);
    if (reply.statusCode >= 400) {
      recordErrorRate(`http_${reply.statusCode}`);
    }
  });
};

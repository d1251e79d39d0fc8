/**
 * Service wiring.
 *
 * Builds every long-lived component from a validated config. The HTTP app
 * and the tests both start from here; tests swap collaborators through
 * `overrides`.
 */

import type { AppConfig } from './config/schema.js';
import { AgentCatalog, loadAgentCatalog } from './integrations/agents/catalog.js';
import { LlmCodeGenerator } from './integrations/agents/code-generator.js';
import { KeywordPlanner } from './integrations/agents/keyword-planner.js';
import { LlmPlanner } from './integrations/agents/llm-planner.js';
import { MockCodeGenerator, MockSandbox } from './integrations/agents/mock-collaborators.js';
import { DatasetStore } from './integrations/datasets/dataset-store.js';
import { AgentRunner, type CodeGenerator } from './integrations/orchestration/agent-runner.js';
import { SQLiteCacheStore } from './integrations/orchestration/cache-store.js';
import { Orchestrator, type AgentExecutor } from './integrations/orchestration/orchestrator.js';
import { PlannerGateway, type PlannerService } from './integrations/orchestration/planner-gateway.js';
import { ProgressBroadcaster } from './integrations/orchestration/progress-broadcaster.js';
import { RunLedger } from './integrations/orchestration/run-ledger.js';
import { WorkerPool } from './integrations/orchestration/worker-pool.js';
import { AnalysisStore } from './integrations/persistence/analysis-store.js';
import { ProcessSandbox, type SandboxExecutor } from './integrations/sandbox/process-sandbox.js';
import { createComponentLogger } from './integrations/utilities/logger.js';
import { AnthropicClient } from './providers/anthropic-client.js';
import { CircuitBreaker } from './providers/circuit-breaker.js';
import { SlidingWindowRateLimiter } from './server/rate-limiter.js';

const log = createComponentLogger('Services');

export interface Services {
  config: AppConfig;
  store: AnalysisStore;
  datasets: DatasetStore;
  catalog: AgentCatalog;
  cache: SQLiteCacheStore;
  ledger: RunLedger;
  broadcaster: ProgressBroadcaster;
  pool: WorkerPool;
  gateway: PlannerGateway;
  orchestrator: Orchestrator;
  rateLimiter: SlidingWindowRateLimiter;
  /** Present when a real model provider is configured */
  breaker?: CircuitBreaker;
  /** `llm` or `mock` */
  mode: 'llm' | 'mock';
  startedAt: Date;
  /** Cancel live runs, stop timers and close the database */
  close(): Promise<void>;
}

export interface ServiceOverrides {
  catalog?: AgentCatalog;
  planner?: PlannerService;
  generator?: CodeGenerator;
  sandbox?: SandboxExecutor;
  /** Replaces the whole agent runner, generator and sandbox included */
  runner?: AgentExecutor;
  /** Start the periodic cache sweep (default: true) */
  sweeper?: boolean;
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const store = new AnalysisStore({ dbPath: config.storage.dbPath });
  const catalog = overrides.catalog ?? loadAgentCatalog();
  const cache = new SQLiteCacheStore(store, {
    defaultTtlMs: config.cache.ttlMs,
    maxEntries: config.cache.maxEntries,
  });
  const ledger = new RunLedger(store);
  const broadcaster = new ProgressBroadcaster({ bufferSize: config.broadcaster.subscriberBufferSize });
  const pool = new WorkerPool(config.orchestrator.maxConcurrency);
  const datasets = new DatasetStore({ ...config.upload, dir: config.storage.datasetDir });

  const apiKey = config.llm.apiKey;
  const useModel = config.llm.provider === 'anthropic' && apiKey !== undefined;
  if (config.llm.provider === 'anthropic' && !useModel) {
    log.warn('No API key configured; using the keyword planner and mock agents');
  }

  let breaker: CircuitBreaker | undefined;
  let planner: PlannerService;
  let generator: CodeGenerator;
  let sandbox: SandboxExecutor;

  if (useModel) {
    breaker = new CircuitBreaker('anthropic', config.circuitBreaker);
    breaker.on((event) => {
      if (event.type === 'state.change') {
        log.warn('Model circuit changed state', { from: event.from, to: event.to, reason: event.reason });
      }
    });
    const client = breaker.wrap(
      new AnthropicClient({
        apiKey,
        model: config.llm.model,
        baseUrl: config.llm.baseUrl,
        maxTokens: config.llm.maxTokens,
        timeoutMs: config.llm.timeoutMs,
      }),
    );
    planner = new LlmPlanner(client, { maxAgents: Math.min(4, config.orchestrator.maxAgentsPerRun) });
    generator = new LlmCodeGenerator(client, { maxTokens: config.llm.maxTokens });
    sandbox = new ProcessSandbox(config.sandbox);
  } else {
    planner = new KeywordPlanner(catalog);
    generator = new MockCodeGenerator();
    sandbox = new MockSandbox();
  }

  const runner = overrides.runner ?? new AgentRunner(overrides.generator ?? generator, overrides.sandbox ?? sandbox);
  const gateway = new PlannerGateway(overrides.planner ?? planner, catalog, {
    maxAgents: config.orchestrator.maxAgentsPerRun,
  });
  const orchestrator = new Orchestrator(
    { gateway, runner, cache, ledger, broadcaster, pool },
    { agentTimeoutMs: config.orchestrator.agentTimeoutMs, cacheTtlMs: config.cache.ttlMs },
  );
  const rateLimiter = new SlidingWindowRateLimiter(config.rateLimit);

  let sweepTimer: ReturnType<typeof setInterval> | undefined;
  if ((overrides.sweeper ?? true) && config.cache.sweepIntervalMs > 0) {
    sweepTimer = setInterval(() => {
      const removed = cache.evictExpired();
      const pruned = rateLimiter.prune();
      if (removed > 0 || pruned > 0) {
        log.debug('Periodic sweep', { cacheEntriesRemoved: removed, rateLimitKeysPruned: pruned });
      }
    }, config.cache.sweepIntervalMs);
    sweepTimer.unref();
  }

  log.info('Services ready', {
    mode: useModel ? 'llm' : 'mock',
    planner: gateway.plannerName,
    agents: catalog.size,
    maxConcurrency: pool.size,
  });

  let closed = false;
  return {
    config,
    store,
    datasets,
    catalog,
    cache,
    ledger,
    broadcaster,
    pool,
    gateway,
    orchestrator,
    rateLimiter,
    ...(breaker && { breaker }),
    mode: useModel ? 'llm' : 'mock',
    startedAt: new Date(),
    async close() {
      if (closed) return;
      closed = true;
      if (sweepTimer) clearInterval(sweepTimer);
      await orchestrator.shutdown();
      pool.drain();
      broadcaster.close();
      store.close();
      log.info('Services closed');
    },
  };
}

import { join } from "node:path";

import { discoverGroupSources, type HandlerFactory } from "./catalog/groupSource.js";
import { loadDomainExamples, loadOutputPolicy } from "./config/dataFiles.js";
import type { ToolgateSettings } from "./config/settings.js";
import { CachingEmbedder } from "./embedding/cachingEmbedder.js";
import { HashingEmbedder } from "./embedding/hashingEmbedder.js";
import { HttpEmbedder } from "./embedding/httpEmbedder.js";
import type { Embedder } from "./embedding/types.js";
import { createHttpActionHandler } from "./executor/httpActionHandler.js";
import { RegistryActionExecutor } from "./executor/registryExecutor.js";
import type { ActionExecutor } from "./executor/types.js";
import { DomainGate } from "./gate/domainGate.js";
import { OutputGate } from "./gate/outputGate.js";
import { PatternRuleSet } from "./gate/patternRules.js";
import { ActionIndex } from "./index/actionIndex.js";
import { ChatCompletionsClient } from "./llm/chatCompletionsClient.js";
import { StructuredLogger } from "./logger.js";
import { ConversationPipeline } from "./pipeline/conversationPipeline.js";
import { SessionStore } from "./pipeline/sessions.js";
import type { ActionSelector, Generator } from "./pipeline/types.js";
import { ActionRegistry, type MutationResult } from "./registry/actionRegistry.js";
import { DescriptorOverrideStore } from "./registry/overrideStore.js";
import { ContextRewriter } from "./rewrite/contextRewriter.js";
import { CandidateRouter } from "./router/candidateRouter.js";
import { InMemoryVectorStore } from "./vector/inMemoryVectorStore.js";
import type { VectorStore } from "./vector/vectorStore.js";

/** Data files looked up under `settings.dataDir`. */
export const DATA_FILES = {
  gatePatterns: "gate-patterns.json",
  domainExamples: "domain-examples.json",
  outputPolicy: "output-policy.json",
} as const;

/** Collaborators replacing the ones derived from the settings (tests, embedding hosts). */
export interface RuntimeOverrides {
  readonly logger?: StructuredLogger;
  readonly embedder?: Embedder;
  readonly store?: VectorStore;
  readonly selector?: ActionSelector;
  readonly generator?: Generator;
  /** Executor for actions registered without a handler. */
  readonly fallbackExecutor?: ActionExecutor;
  readonly handlerFactory?: HandlerFactory;
  readonly fetchImpl?: typeof fetch;
}

export interface ToolgateRuntime {
  readonly settings: ToolgateSettings;
  readonly logger: StructuredLogger;
  readonly embedder: Embedder;
  readonly store: VectorStore;
  readonly registry: ActionRegistry;
  readonly index: ActionIndex;
  readonly patterns: PatternRuleSet;
  readonly gate: DomainGate;
  readonly router: CandidateRouter;
  readonly outputGate: OutputGate;
  readonly executor: ActionExecutor;
  readonly overrides: DescriptorOverrideStore | null;
  /** Present when a selector and a generator are available. */
  readonly pipeline: ConversationPipeline | null;
  readonly sessions: SessionStore;
  /** Loads every catalog group, re-applies overrides and waits for the index. */
  start(): Promise<void>;
  /** Reloads one group, re-applies its overrides and waits for the index. */
  reloadGroup(group: string): Promise<MutationResult>;
  /** Detaches the index from the registry and flushes the log file. */
  close(): Promise<void>;
}

/**
 * Builds every process-wide component from {@link settings}. Nothing is
 * loaded into the registry until {@link ToolgateRuntime.start} runs.
 */
export async function createToolgateRuntime(
  settings: ToolgateSettings,
  overrides: RuntimeOverrides = {},
): Promise<ToolgateRuntime> {
  const logger = overrides.logger ?? new StructuredLogger({ logFile: settings.logFile });
  const fetchImpl = overrides.fetchImpl;
  const httpOptions = {
    timeoutMs: settings.http.timeoutMs,
    maxRetries: settings.http.maxRetries,
    ...(fetchImpl ? { fetchImpl } : {}),
  };

  const embedder = overrides.embedder ?? buildEmbedder(settings, fetchImpl);
  const store = overrides.store ?? new InMemoryVectorStore();
  const registry = new ActionRegistry({ logger });
  const index = new ActionIndex({ embedder, store, logger });
  const detachIndex = index.attach(registry);

  const handlerFactory: HandlerFactory =
    overrides.handlerFactory ?? ((descriptor) => createHttpActionHandler(descriptor, httpOptions));
  for (const source of await discoverGroupSources(settings.catalogDir, handlerFactory)) {
    registry.addSource(source);
  }

  const patternFile = join(settings.dataDir, DATA_FILES.gatePatterns);
  const patterns = new PatternRuleSet(logger, patternFile);
  await patterns.reloadFromFile();

  const gate = new DomainGate({
    embedder,
    patterns,
    examples: await loadDomainExamples(join(settings.dataDir, DATA_FILES.domainExamples)),
    thresholds: { highConfidence: settings.gate.highConfidence, margin: settings.gate.margin },
    minChars: settings.gate.minChars,
    logger,
  });
  const outputGate = new OutputGate(await loadOutputPolicy(join(settings.dataDir, DATA_FILES.outputPolicy)), logger);
  const router = new CandidateRouter({
    index,
    registry,
    logger,
    topK: settings.router.topK,
    minScore: settings.router.minScore,
  });
  const executor = new RegistryActionExecutor(registry, overrides.fallbackExecutor ?? null);

  const overrideStore = settings.overridesFile
    ? await DescriptorOverrideStore.open({ filePath: settings.overridesFile, registry, logger })
    : null;

  const llm = settings.llm
    ? new ChatCompletionsClient({
        baseUrl: settings.llm.baseUrl,
        model: settings.llm.model,
        apiKey: settings.llm.apiKey,
        temperature: settings.llm.temperature,
        ...httpOptions,
      })
    : null;
  const selector = overrides.selector ?? llm;
  const generator = overrides.generator ?? llm;
  const pipeline =
    selector && generator
      ? new ConversationPipeline({
          gate,
          rewriter: new ContextRewriter({
            generator,
            logger,
            maxChars: settings.rewrite.maxChars,
            contextMessages: settings.rewrite.contextMessages,
          }),
          router,
          selector,
          executor,
          outputGate,
          registry,
          logger,
          maxIterations: settings.pipeline.maxIterations,
          turnDeadlineMs: settings.pipeline.turnDeadlineMs,
        })
      : null;

  const settle = async (): Promise<void> => {
    await overrideStore?.applyAll();
    await index.whenVersion(registry.version);
  };

  return {
    settings,
    logger,
    embedder,
    store,
    registry,
    index,
    patterns,
    gate,
    router,
    outputGate,
    executor,
    overrides: overrideStore,
    pipeline,
    sessions: new SessionStore(settings.pipeline.maxHistoryMessages),
    async start() {
      const results = await registry.loadAllSources();
      await settle();
      await gate.warmUp();
      logger.info("runtime_started", {
        groups: results.length,
        actions: registry.snapshot().actions.size,
        registry_version: registry.version,
        index_documents: index.documentCount,
        pipeline: pipeline !== null,
      });
    },
    async reloadGroup(group) {
      const result = await registry.reloadGroup(group);
      await settle();
      return { ...result, version: registry.version, actionCount: registry.snapshot().actions.size };
    },
    async close() {
      detachIndex();
      await logger.flush();
    },
  };
}

function buildEmbedder(settings: ToolgateSettings, fetchImpl: typeof fetch | undefined): Embedder {
  const { embedding, http } = settings;
  if (embedding.provider === "http" && embedding.baseUrl && embedding.model) {
    const remote = new HttpEmbedder({
      baseUrl: embedding.baseUrl,
      model: embedding.model,
      apiKey: embedding.apiKey,
      ...(embedding.rolePrefixes === null ? {} : { rolePrefixes: embedding.rolePrefixes }),
      timeoutMs: http.timeoutMs,
      maxRetries: http.maxRetries,
      ...(fetchImpl ? { fetchImpl } : {}),
    });
    return embedding.cacheSize > 0 ? new CachingEmbedder(remote, embedding.cacheSize) : remote;
  }
  return new HashingEmbedder({ dimensions: embedding.dimensions });
}

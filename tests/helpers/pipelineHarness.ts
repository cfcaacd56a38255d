import type { DomainExample } from "../../src/config/dataFiles.js";
import { RegistryActionExecutor } from "../../src/executor/registryExecutor.js";
import type { ActionDefinition } from "../../src/executor/types.js";
import { DomainGate } from "../../src/gate/domainGate.js";
import { OutputGate } from "../../src/gate/outputGate.js";
import { PatternRuleSet } from "../../src/gate/patternRules.js";
import { ActionIndex } from "../../src/index/actionIndex.js";
import { ConversationPipeline } from "../../src/pipeline/conversationPipeline.js";
import type { ActionSelector, Generator } from "../../src/pipeline/types.js";
import { ActionRegistry } from "../../src/registry/actionRegistry.js";
import { ContextRewriter } from "../../src/rewrite/contextRewriter.js";
import { CandidateRouter } from "../../src/router/candidateRouter.js";
import { InMemoryVectorStore } from "../../src/vector/inMemoryVectorStore.js";
import { ScriptedGenerator, TableEmbedder, axis, defineAction, recordingHandler, testOutputPolicy } from "./fakes.js";
import { RecordingLogger } from "./recordingLogger.js";

/** Text embedded on the in-domain axis: admitted with high confidence and routed to `premium_estimate`. */
export const PREMIUM_QUERY = "How much would the cancer plan cost me per month?";
/** Text embedded on the claims axis. */
export const CLAIM_QUERY = "How do I file a claim for my hospital stay?";

export const DOMAIN_EXAMPLES: DomainExample[] = [
  { text: "how much is the cancer plan premium", label: "in" },
  { text: "what is the weather tomorrow", label: "out" },
];

export interface PipelineHarnessOptions {
  readonly selector: ActionSelector;
  readonly generator?: Generator;
  readonly maxIterations?: number;
  readonly turnDeadlineMs?: number;
  readonly definitions?: readonly ActionDefinition[];
}

export interface PipelineHarness {
  readonly pipeline: ConversationPipeline;
  readonly registry: ActionRegistry;
  readonly index: ActionIndex;
  readonly embedder: TableEmbedder;
  readonly logger: RecordingLogger;
  readonly premiumHandler: ReturnType<typeof recordingHandler>;
}

/**
 * Wires the real gates, index, router and executor around table embeddings:
 * axis 0 is the insurance-premium direction, axis 1 the out-of-domain one,
 * axis 2 claims; unknown texts land on axis 3 (admitted as deferred).
 */
export async function createPipelineHarness(options: PipelineHarnessOptions): Promise<PipelineHarness> {
  const logger = new RecordingLogger();
  const embedder = new TableEmbedder(
    {
      [DOMAIN_EXAMPLES[0].text]: axis(0),
      [DOMAIN_EXAMPLES[1].text]: axis(1),
      [PREMIUM_QUERY]: axis(0),
      [CLAIM_QUERY]: axis(2),
      "Estimate the monthly premium of a product.": axis(0),
      "how much per month": axis(0),
      "Explain the claim procedure.": axis(2),
    },
    axis(3),
  );
  const registry = new ActionRegistry({ logger });
  const index = new ActionIndex({ embedder, store: new InMemoryVectorStore(), logger });
  index.attach(registry);

  const premiumHandler = recordingHandler({ monthly_premium: 30000, currency: "KRW" });
  await registry.register(
    "catalog",
    options.definitions ?? [
      defineAction(
        {
          name: "premium_estimate",
          purpose: "Estimate the monthly premium of a product.",
          usage_phrases: ["how much per month"],
          inputs: [{ name: "product_name" }, { name: "age" }],
        },
        premiumHandler,
      ),
      defineAction({ name: "claim_guide", purpose: "Explain the claim procedure." }, recordingHandler({ steps: 3 })),
    ],
  );
  await index.whenVersion(registry.version);

  const patterns = new PatternRuleSet(logger);
  patterns.replace([{ id: "ignore_previous_instructions", pattern: "ignore (all )?previous instructions" }]);
  const gate = new DomainGate({
    embedder,
    patterns,
    examples: DOMAIN_EXAMPLES,
    thresholds: { highConfidence: 0.87, margin: 0.03 },
    minChars: 5,
    logger,
  });
  const router = new CandidateRouter({ index, registry, logger, topK: 5, minScore: 0.2 });
  const rewriter = new ContextRewriter({
    generator: options.generator ?? new ScriptedGenerator([""]),
    logger,
    maxChars: 15,
    contextMessages: 4,
  });

  const pipeline = new ConversationPipeline({
    gate,
    rewriter,
    router,
    selector: options.selector,
    executor: new RegistryActionExecutor(registry),
    outputGate: new OutputGate(testOutputPolicy(), logger),
    registry,
    logger,
    maxIterations: options.maxIterations ?? 3,
    turnDeadlineMs: options.turnDeadlineMs ?? 2_000,
    createTurnId: () => "turn-1",
  });

  return { pipeline, registry, index, embedder, logger, premiumHandler };
}

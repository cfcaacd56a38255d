import { describe, it, afterEach } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { ScriptedSelector, defineAction, recordingHandler } from "./helpers/fakes.js";
import { CLAIM_QUERY, PREMIUM_QUERY, createPipelineHarness } from "./helpers/pipelineHarness.js";

const FIRST_TURN = { history: [], conversationStarted: false } as const;

/**
 * End-to-end turns through the real gates, index and router. Embeddings come
 * from the harness table so every similarity below is exact.
 */
describe("pipeline scenarios", () => {
  afterEach(() => {
    sinon.restore();
  });

  it("routes a verbatim usage phrase to its action at the top of the list", async () => {
    const handler = recordingHandler({ monthly_premium: 28000 });
    const selector = new ScriptedSelector([
      (request) => ({
        kind: "execute",
        calls: [{ name: request.candidates[0].name, args: { product_name: "cancer plan", age: 35 } }],
      }),
      { kind: "final", text: "It comes to 28,000 won a month." },
    ]);
    const { pipeline } = await createPipelineHarness({
      selector,
      definitions: [
        defineAction(
          {
            name: "premium_estimate",
            purpose: "Premium calculator.",
            usage_phrases: ["how much per month"],
            inputs: [{ name: "product_name" }, { name: "age" }],
          },
          handler,
        ),
        defineAction({ name: "claim_guide", purpose: "Explain the claim procedure." }),
      ],
    });

    const result = await pipeline.run({ text: "how much per month", ...FIRST_TURN });

    const [top] = selector.requests[0].candidates;
    expect(top.name).to.equal("premium_estimate");
    expect(top.score).to.be.at.least(0.99);
    expect(top.matchedKind).to.equal("usage");
    expect(handler.calls).to.deep.equal([{ product_name: "cancer plan", age: 35 }]);
    expect(result.trace.executions[0].action).to.equal("premium_estimate");
    expect(result.outcome).to.deep.equal({
      kind: "answered",
      text: "It comes to 28,000 won a month.\n\n※ Amounts are examples.",
      usedActions: ["premium_estimate"],
    });
  });

  it("rejects an out-of-domain question before any retrieval", async () => {
    const selector = new ScriptedSelector([{ kind: "final", text: "unused" }]);
    const { pipeline, index, embedder } = await createPipelineHarness({ selector });
    const weather = "오늘 날씨 어때?";
    embedder.set(weather, [0.41, 0.89, 0, Math.sqrt(1 - 0.41 ** 2 - 0.89 ** 2)]);
    const search = sinon.spy(index, "search");

    const result = await pipeline.run({ text: weather, ...FIRST_TURN });

    expect(result.outcome).to.deep.equal({ kind: "rejected", text: "Out of domain.", reason: "out_of_domain" });
    expect(result.trace.gate?.maxIn).to.be.closeTo(0.41, 1e-9);
    expect(result.trace.gate?.maxOut).to.be.closeTo(0.89, 1e-9);
    expect(search.called).to.equal(false);
    expect(selector.requests).to.have.length(0);
    expect(result.trace.candidateLists).to.deep.equal([]);
  });

  it("asks for a missing age instead of guessing it", async () => {
    const selector = new ScriptedSelector([
      { kind: "execute", calls: [{ name: "premium_estimate", args: { product_name: "cancer plan" } }] },
      { kind: "execute", calls: [{ name: "premium_estimate", args: { product_name: "cancer plan", age: 40 } }] },
    ]);
    const { pipeline, premiumHandler } = await createPipelineHarness({ selector });

    const result = await pipeline.run({ text: PREMIUM_QUERY, ...FIRST_TURN });

    expect(result.outcome).to.include({ kind: "needs_input", action: "premium_estimate" });
    expect(result.outcome).to.have.deep.property("missingFields", ["age"]);
    expect(premiumHandler.calls).to.have.length(0);
    expect(result.trace.executions.map((execution) => execution.status)).to.deep.equal(["needs_more_input"]);
  });

  it("stops offering an action once its removal reaches the index", async () => {
    const selector = new ScriptedSelector([{ kind: "decline", reason: "no matching action" }]);
    const { pipeline, registry, index } = await createPipelineHarness({ selector });

    const removal = await registry.unregister("premium_estimate");
    await index.whenVersion(removal.version);

    const hits = await index.search(PREMIUM_QUERY, 5);
    expect(hits.map((hit) => hit.action)).to.deep.equal(["claim_guide"]);

    const result = await pipeline.run({ text: PREMIUM_QUERY, ...FIRST_TURN });
    expect(selector.requests[0].candidates).to.deep.equal([]);
    expect(selector.requests[0].retrievalMiss).to.equal(true);
    expect(result.outcome).to.deep.equal({ kind: "declined", text: "Declined.", reason: "no matching action" });
    expect(result.registryVersion).to.equal(2);
  });

  it("keeps other actions routable after a removal", async () => {
    const selector = new ScriptedSelector([{ kind: "final", text: "Here is the claim procedure." }]);
    const { pipeline, registry, index } = await createPipelineHarness({ selector });
    await index.whenVersion((await registry.unregister("premium_estimate")).version);

    await pipeline.run({ text: CLAIM_QUERY, ...FIRST_TURN });

    expect(selector.requests[0].candidates.map((candidate) => candidate.name)).to.deep.equal(["claim_guide"]);
  });
});

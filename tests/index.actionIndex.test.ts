import { describe, it, beforeEach } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { CollaboratorUnavailableError } from "../src/errors.js";
import { ActionIndex } from "../src/index/actionIndex.js";
import { ActionRegistry } from "../src/registry/actionRegistry.js";
import { InMemoryVectorStore } from "../src/vector/inMemoryVectorStore.js";
import { TableEmbedder, axis, defineAction } from "./helpers/fakes.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

describe("index/ActionIndex", () => {
  let logger: RecordingLogger;
  let embedder: TableEmbedder;
  let store: InMemoryVectorStore;
  let registry: ActionRegistry;
  let index: ActionIndex;

  beforeEach(() => {
    logger = new RecordingLogger();
    embedder = new TableEmbedder(
      {
        "Compare premiums.": axis(0),
        "compare plan prices": axis(1),
        "Estimate one premium.": axis(2),
        "how much per month": axis(1),
        "premium estimate": axis(3),
      },
      [0.5, 0.5, 0.5, 0.5],
    );
    store = new InMemoryVectorStore();
    registry = new ActionRegistry({ logger });
    index = new ActionIndex({ embedder, store, logger, concurrency: 2 });
  });

  async function registerPremiums(): Promise<void> {
    await registry.register("premiums", [
      defineAction({ name: "premium_compare", purpose: "Compare premiums.", usage_phrases: ["compare plan prices"] }),
      defineAction({
        name: "premium_estimate",
        purpose: "Estimate one premium.",
        usage_phrases: ["how much per month"],
        tags: ["premium", "estimate"],
      }),
    ]);
  }

  it("indexes one document per field and ranks actions by their best document", async () => {
    await registerPremiums();
    const report = await index.sync(registry.snapshot());
    expect(report).to.include({ version: 1, documentCount: 5, reused: 0 });
    expect(report.added).to.deep.equal(["premium_compare", "premium_estimate"]);
    expect(await store.count("actions")).to.equal(5);

    embedder.set("monthly cost", axis(1));
    const hits = await index.search("monthly cost", 5);
    expect(hits.map((hit) => [hit.action, hit.score, hit.kind])).to.deep.equal([
      ["premium_compare", 1, "usage"],
      ["premium_estimate", 1, "usage"],
    ]);
    expect(embedder.calls.at(-1)).to.deep.equal({ text: "monthly cost", role: "query" });
    expect(embedder.calls.filter((call) => call.role === "passage")).to.have.length(5);
  });

  it("lets the tags document decide when it is the best match", async () => {
    await registerPremiums();
    await index.sync(registry.snapshot());
    embedder.set("estimate", axis(3));
    const [top] = await index.search("estimate", 1);
    expect(top).to.include({ action: "premium_estimate", score: 1, kind: "tags" });
  });

  it("re-embeds only changed actions and deletes their stale documents", async () => {
    await registerPremiums();
    await index.sync(registry.snapshot());
    const passageCalls = embedder.calls.length;

    await registry.update(
      defineAction({ name: "premium_compare", purpose: "Compare premiums.", usage_phrases: ["side by side prices"] })
        .descriptor,
    );
    const report = await index.sync(registry.snapshot());

    expect(report.updated).to.deep.equal(["premium_compare"]);
    expect(report.reused).to.equal(1);
    expect(embedder.calls.length - passageCalls).to.equal(2);
    expect(await store.count("actions")).to.equal(5);
  });

  it("follows the registry and resolves version waiters", async () => {
    const detach = index.attach(registry);
    await registerPremiums();
    await index.whenVersion(1);
    expect(index.version).to.equal(1);
    expect(index.actionCount).to.equal(2);

    await registry.unregister("premium_compare");
    await index.whenVersion(2);
    expect(index.documentCount).to.equal(3);
    expect(await store.count("actions")).to.equal(3);
    detach();
  });

  it("ignores snapshots that are not newer than the live table", async () => {
    await registerPremiums();
    const snapshot = registry.snapshot();
    await index.sync(snapshot);
    const report = await index.sync(snapshot);
    expect(report).to.include({ version: 1, reused: 2 });
    expect(report.added).to.deep.equal([]);
  });

  it("flags actions without usage phrases as low recall", async () => {
    await registry.register("claims", [defineAction({ name: "claim_guide", purpose: "Explain claims." })]);
    const report = await index.sync(registry.snapshot());
    expect(report.lowRecall).to.deep.equal(["claim_guide"]);
    expect(logger.find("action_low_recall")).to.have.length(1);
  });

  it("keeps the previous table when embedding fails mid-sync and rejects waiters", async () => {
    await registerPremiums();
    await index.sync(registry.snapshot());

    embedder.failOn("broken phrase");
    await registry.register("claims", [
      defineAction({ name: "claim_guide", purpose: "Explain claims.", usage_phrases: ["broken phrase"] }),
    ]);
    const waiter = index.whenVersion(2).then(
      () => null,
      (error: unknown) => error,
    );
    try {
      await index.sync(registry.snapshot());
      expect.fail("sync should reject");
    } catch (error) {
      expect(error).to.be.instanceOf(CollaboratorUnavailableError);
      expect(error).to.have.nested.property("details.collaborator", "embedding");
    }
    expect(await waiter).to.be.instanceOf(CollaboratorUnavailableError);
    expect(index.version).to.equal(1);
    expect(await store.count("actions")).to.equal(5);
  });

  function updateEstimate(): Promise<unknown> {
    return registry.update(
      defineAction({
        name: "premium_estimate",
        purpose: "Estimate one premium.",
        usage_phrases: ["how much per month", "monthly fee"],
        tags: ["premium", "estimate"],
      }).descriptor,
    );
  }

  it("ranks against the table that is live once the query is embedded", async () => {
    await registerPremiums();
    await index.sync(registry.snapshot());
    embedder.set("monthly cost", axis(1));

    let release = (): void => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const embed = embedder.embed.bind(embedder);
    sinon.stub(embedder, "embed").callsFake(async (text, role, signal) => {
      if (text === "monthly cost") {
        await gate;
      }
      return embed(text, role, signal);
    });

    const pending = index.search("monthly cost", 5);
    await updateEstimate();
    await index.sync(registry.snapshot());
    release();

    const hits = await pending;
    expect(hits.map((hit) => hit.action)).to.deep.equal(["premium_compare", "premium_estimate"]);
    expect(index.version).to.equal(2);
  });

  it("keeps stale documents until searches on the previous table finish", async () => {
    await registerPremiums();
    await index.sync(registry.snapshot());
    embedder.set("monthly cost", axis(1));

    let release = (): void => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    let queried = (): void => undefined;
    const querying = new Promise<void>((resolve) => {
      queried = resolve;
    });
    const query = store.query.bind(store);
    sinon.stub(store, "query").callsFake(async (collection, vector, k, filter) => {
      queried();
      await gate;
      return query(collection, vector, k, filter);
    });

    const pending = index.search("monthly cost", 5);
    await querying;
    await updateEstimate();
    const report = await index.sync(registry.snapshot());
    expect(report.updated).to.deep.equal(["premium_estimate"]);
    // 5 documents of version 1 plus the 4 new documents of premium_estimate.
    expect(await store.count("actions")).to.equal(9);

    release();
    const hits = await pending;
    expect(hits.map((hit) => hit.action)).to.deep.equal(["premium_compare", "premium_estimate"]);

    await new Promise((resolve) => setImmediate(resolve));
    expect(await store.count("actions")).to.equal(6);
  });

  it("reports vector store failures as collaborator errors", async () => {
    await registerPremiums();
    await index.sync(registry.snapshot());
    sinon.stub(store, "query").rejects(new Error("store offline"));
    try {
      await index.search("how much per month", 3);
      expect.fail("search should reject");
    } catch (error) {
      expect(error).to.be.instanceOf(CollaboratorUnavailableError);
      expect(error).to.have.nested.property("details.collaborator", "vector_store");
    }
  });

  it("returns nothing for an empty index, a blank query or k = 0", async () => {
    expect(await index.search("anything", 3)).to.deep.equal([]);
    await registerPremiums();
    await index.sync(registry.snapshot());
    expect(await index.search("   ", 3)).to.deep.equal([]);
    expect(await index.search("how much per month", 0)).to.deep.equal([]);
    expect(embedder.callsFor("   ")).to.equal(0);
  });
});

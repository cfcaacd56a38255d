import { describe, it, beforeEach } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { StaticGroupSource } from "../src/catalog/groupSource.js";
import { RegistryInconsistencyError } from "../src/errors.js";
import type { ActionDefinition } from "../src/executor/types.js";
import { ActionRegistry, type RegistryChange } from "../src/registry/actionRegistry.js";
import { defineAction, recordingHandler } from "./helpers/fakes.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

describe("registry/ActionRegistry", () => {
  let logger: RecordingLogger;
  let registry: ActionRegistry;
  let changes: RegistryChange[];

  beforeEach(() => {
    logger = new RecordingLogger();
    registry = new ActionRegistry({ logger });
    changes = [];
    registry.onChange((change) => changes.push(change));
  });

  it("starts empty at version 0", () => {
    expect(registry.version).to.equal(0);
    expect(registry.snapshot().actions.size).to.equal(0);
  });

  it("registers a group and bumps the version once per mutation", async () => {
    const handler = recordingHandler("done");
    const result = await registry.register("claims", [
      defineAction({ name: "claim_guide", usage_phrases: ["how do I claim"] }, handler),
      defineAction({ name: "claim_forms" }),
    ]);

    expect(result).to.deep.equal({ version: 1, actionCount: 2, changed: ["claim_guide", "claim_forms"], removed: [] });
    const snapshot = registry.snapshot();
    expect(snapshot.groups.get("claims")).to.deep.equal(["claim_guide", "claim_forms"]);
    expect(snapshot.actions.get("claim_guide")?.handler).to.equal(handler);
    expect(snapshot.actions.get("claim_forms")?.handler).to.equal(null);
    expect(changes).to.deep.equal([
      { version: 1, kind: "register", group: "claims", changed: ["claim_guide", "claim_forms"], removed: [] },
    ]);
  });

  it("replaces snapshots by reference and freezes them", async () => {
    const before = registry.snapshot();
    await registry.register("claims", [defineAction({ name: "claim_guide" })]);
    expect(registry.snapshot()).to.not.equal(before);
    expect(before.actions.size).to.equal(0);
    expect(Object.isFrozen(registry.snapshot())).to.equal(true);
  });

  it("refuses a name owned by another group and keeps the version", async () => {
    await registry.register("claims", [defineAction({ name: "claim_guide" })]);
    try {
      await registry.register("premiums", [defineAction({ name: "claim_guide" })]);
      expect.fail("register should reject");
    } catch (error) {
      expect(error).to.be.instanceOf(RegistryInconsistencyError);
      expect(error).to.have.property("reason", "duplicate_name");
      expect(error).to.have.nested.property("details.owner", "claims");
    }
    expect(registry.version).to.equal(1);
    expect(changes).to.have.length(1);
  });

  it("refuses a usage phrase already claimed by another action", async () => {
    await registry.register("claims", [defineAction({ name: "claim_guide", usage_phrases: ["file a claim"] })]);
    try {
      await registry.register("premiums", [defineAction({ name: "premium_estimate", usage_phrases: ["File a  claim"] })]);
      expect.fail("register should reject");
    } catch (error) {
      expect(error).to.have.property("reason", "duplicate_usage_phrase");
    }
    expect(registry.snapshot().actions.has("premium_estimate")).to.equal(false);
    expect(registry.version).to.equal(1);
  });

  it("keeps versions strictly increasing under concurrent mutations", async () => {
    const outcomes = await Promise.allSettled([
      registry.register("a", [defineAction({ name: "alpha" })]),
      registry.register("b", [defineAction({ name: "alpha" })]),
      registry.register("b", [defineAction({ name: "beta" })]),
      registry.unregister("alpha"),
      registry.unregister("alpha"),
    ]);

    expect(outcomes.map((outcome) => outcome.status)).to.deep.equal([
      "fulfilled",
      "rejected",
      "fulfilled",
      "fulfilled",
      "rejected",
    ]);
    expect(changes.map((change) => change.version)).to.deep.equal([1, 2, 3]);
    expect(registry.version).to.equal(3);
    expect(Array.from(registry.snapshot().actions.keys())).to.deep.equal(["beta"]);
  });

  it("suggests the closest name for an unknown action", async () => {
    await registry.register("claims", [defineAction({ name: "claim_guide" })]);
    try {
      await registry.unregister("claim_guid");
      expect.fail("unregister should reject");
    } catch (error) {
      expect(error).to.have.property("reason", "unknown_action");
      expect(error).to.have.nested.property("details.suggestion", "claim_guide");
    }
  });

  it("updates a descriptor while keeping its group and handler", async () => {
    const handler = recordingHandler(null);
    await registry.register("claims", [defineAction({ name: "claim_guide", purpose: "Old." }, handler)]);
    const replacement = defineAction({ name: "claim_guide", purpose: "New." }).descriptor;
    const result = await registry.update(replacement);

    expect(result.version).to.equal(2);
    const entry = registry.snapshot().actions.get("claim_guide");
    expect(entry?.descriptor.purpose).to.equal("New.");
    expect(entry?.group).to.equal("claims");
    expect(entry?.handler).to.equal(handler);
    expect(changes[1].kind).to.equal("update");
  });

  it("reloads a group from its source, removing actions that disappeared", async () => {
    let definitions: ActionDefinition[] = [defineAction({ name: "claim_guide" }), defineAction({ name: "claim_forms" })];
    registry.addSource(new StaticGroupSource("claims", () => definitions));
    await registry.loadAllSources();

    definitions = [defineAction({ name: "claim_guide", purpose: "Edited." }), defineAction({ name: "claim_status" })];
    const result = await registry.reloadGroup("claims");

    expect(result).to.deep.equal({
      version: 2,
      actionCount: 2,
      changed: ["claim_guide", "claim_status"],
      removed: ["claim_forms"],
    });
    expect(registry.snapshot().groups.get("claims")).to.deep.equal(["claim_guide", "claim_status"]);
    expect(registry.listSources().map((source) => source.group)).to.deep.equal(["claims"]);
  });

  it("leaves the snapshot untouched when a reload fails", async () => {
    let fail = false;
    registry.addSource(
      new StaticGroupSource("claims", () => {
        if (fail) {
          throw new Error("source offline");
        }
        return [defineAction({ name: "claim_guide" })];
      }),
    );
    await registry.reloadGroup("claims");
    const before = registry.snapshot();

    fail = true;
    try {
      await registry.reloadGroup("claims");
      expect.fail("reload should reject");
    } catch (error) {
      expect(error).to.have.property("message", "source offline");
    }
    expect(registry.snapshot()).to.equal(before);

    try {
      await registry.reloadGroup("premiums");
      expect.fail("reload should reject");
    } catch (error) {
      expect(error).to.have.property("reason", "unknown_group");
      expect(error).to.have.nested.property("details.known").that.deep.equals(["claims"]);
    }
  });

  it("logs listener failures without failing the mutation", async () => {
    registry.onChange(sinon.stub().throws(new Error("listener broke")));
    const result = await registry.register("claims", [defineAction({ name: "claim_guide" })]);
    expect(result.version).to.equal(1);
    expect(logger.find("registry_listener_failed")).to.have.length(1);
  });

  it("warns about near-duplicate usage phrases across actions", async () => {
    await registry.register("claims", [
      defineAction({ name: "claim_guide", usage_phrases: ["claim procedure"] }),
      defineAction({ name: "claim_forms", usage_phrases: ["claim procedures"] }),
    ]);
    expect(logger.find("usage_phrase_near_duplicate").map((entry) => entry.payload)).to.deep.equal([
      {
        left: { action: "claim_guide", phrase: "claim procedure" },
        right: { action: "claim_forms", phrase: "claim procedures" },
      },
    ]);
  });

  it("lets unsubscribed listeners go", async () => {
    const listener = sinon.spy();
    const unsubscribe = registry.onChange(listener);
    unsubscribe();
    await registry.register("claims", [defineAction({ name: "claim_guide" })]);
    expect(listener.called).to.equal(false);
  });
});

import { describe, it } from "mocha";
import { expect } from "chai";
import fc from "fast-check";

import { cosineSimilarity } from "../../src/embedding/similarity.js";
import { ActionIndex } from "../../src/index/actionIndex.js";
import { ActionRegistry } from "../../src/registry/actionRegistry.js";
import { InMemoryVectorStore } from "../../src/vector/inMemoryVectorStore.js";
import { TableEmbedder, defineAction } from "../helpers/fakes.js";
import { RecordingLogger } from "../helpers/recordingLogger.js";

/**
 * Property-based coverage of the per-action max-aggregation: whatever vectors
 * the documents get, an action scores exactly its best document and the
 * ranking keeps the k best actions in descending order.
 */
describe("action index max-aggregation (property-based)", () => {
  const vectorArb = fc.array(fc.integer({ min: -3, max: 3 }), { minLength: 4, maxLength: 4 });

  /** Purpose vector plus one vector per usage phrase, for each generated action. */
  const actionsArb = fc.array(
    fc.record({ purpose: vectorArb, phrases: fc.array(vectorArb, { maxLength: 3 }) }),
    { minLength: 1, maxLength: 5 },
  );

  it("scores each action by its best document and keeps the k best", async () => {
    await fc.assert(
      fc.asyncProperty(actionsArb, vectorArb, fc.integer({ min: 1, max: 6 }), async (actions, query, k) => {
        const table: Record<string, number[]> = { query };
        const expected = new Map<string, number>();
        const definitions = actions.map((action, position) => {
          const name = `action_${position}`;
          const purpose = `purpose of ${name}`;
          const phrases = action.phrases.map((_, ordinal) => `phrase ${ordinal} of ${name}`);
          table[purpose] = action.purpose;
          action.phrases.forEach((vector, ordinal) => {
            table[phrases[ordinal]] = vector;
          });
          const scores = [action.purpose, ...action.phrases].map((vector) => cosineSimilarity(query, vector));
          expected.set(name, Math.max(...scores));
          return defineAction({ name, purpose, usage_phrases: phrases });
        });

        const logger = new RecordingLogger();
        const registry = new ActionRegistry({ logger });
        const index = new ActionIndex({
          embedder: new TableEmbedder(table, [0, 0, 0, 0]),
          store: new InMemoryVectorStore(),
          logger,
        });
        await registry.register("generated", definitions);
        await index.sync(registry.snapshot());

        const hits = await index.search("query", k);
        expect(hits).to.have.length(Math.min(k, actions.length));

        for (let position = 0; position < hits.length; position += 1) {
          const hit = hits[position];
          expect(hit.score).to.be.closeTo(expected.get(hit.action) ?? Number.NaN, 1e-9);
          if (position > 0) {
            expect(hit.score).to.be.at.most(hits[position - 1].score);
          }
        }

        const returned = new Set(hits.map((hit) => hit.action));
        const lowest = hits.at(-1)?.score ?? Number.POSITIVE_INFINITY;
        for (const [name, score] of expected) {
          if (!returned.has(name)) {
            expect(score).to.be.at.most(lowest + 1e-9);
          }
        }
      }),
      { numRuns: 60 },
    );
  });
});

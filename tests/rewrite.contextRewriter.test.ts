import { describe, it, beforeEach } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { CollaboratorUnavailableError } from "../src/errors.js";
import type { ChatMessage } from "../src/pipeline/types.js";
import { ContextRewriter, cleanReply } from "../src/rewrite/contextRewriter.js";
import { ScriptedGenerator } from "./helpers/fakes.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

const HISTORY: ChatMessage[] = [
  { role: "user", content: "How much is the cancer plan?" },
  { role: "assistant", content: "Could you tell me your age?" },
  { role: "user", content: "I am 40." },
  { role: "assistant", content: "It is about 30,000 won per month." },
  { role: "user", content: "Thanks." },
  { role: "assistant", content: "Anything else?" },
];

describe("rewrite/ContextRewriter", () => {
  let logger: RecordingLogger;

  beforeEach(() => {
    logger = new RecordingLogger();
  });

  function rewriter(generator: ScriptedGenerator): ContextRewriter {
    return new ContextRewriter({ generator, logger, maxChars: 15, contextMessages: 4 });
  }

  it("leaves long queries and first turns alone", async () => {
    const generator = new ScriptedGenerator(["unused"]);
    const subject = rewriter(generator);
    expect(await subject.maybeRewrite("What does the dental plan cover?", HISTORY)).to.deep.equal({
      text: "What does the dental plan cover?",
      rewritten: false,
      reason: "long_query",
    });
    expect(await subject.maybeRewrite("and dental?", [])).to.deep.equal({
      text: "and dental?",
      rewritten: false,
      reason: "no_history",
    });
    expect(generator.requests).to.have.length(0);
  });

  it("passes meaningless single characters through without a call", async () => {
    const generator = new ScriptedGenerator(["unused"]);
    expect(await rewriter(generator).maybeRewrite(" ? ", HISTORY)).to.deep.equal({
      text: "?",
      rewritten: false,
      reason: "too_short",
    });
    expect(generator.requests).to.have.length(0);
  });

  it("rewrites meaningful single characters with the latest context", async () => {
    const generator = new ScriptedGenerator(['"How much is the cancer plan for a 40 year old woman?"\nextra line']);
    const result = await rewriter(generator).maybeRewrite("F", HISTORY);

    expect(result).to.deep.equal({
      text: "How much is the cancer plan for a 40 year old woman?",
      rewritten: true,
      reason: "rewritten",
    });
    const [request] = generator.requests;
    expect(request.messages).to.have.length(5);
    expect(request.messages[0]).to.deep.equal(HISTORY[2]);
    expect(request.messages[4]).to.deep.equal({
      role: "user",
      content: "Rewrite this follow-up as a standalone question using the conversation above: 「F」",
    });
    expect(logger.find("query_rewritten")).to.have.length(1);
  });

  it("keeps the original text when the reply is empty or identical", async () => {
    const empty = await rewriter(new ScriptedGenerator(["  \n  "])).maybeRewrite("and dental?", HISTORY);
    expect(empty).to.deep.equal({ text: "and dental?", rewritten: false, reason: "unchanged" });
    const same = await rewriter(new ScriptedGenerator(["「and dental?」"])).maybeRewrite("and dental?", HISTORY);
    expect(same.reason).to.equal("unchanged");
  });

  it("reports generator failures as an unavailable collaborator", async () => {
    const generator = new ScriptedGenerator([]);
    sinon.stub(generator, "generate").rejects(new Error("model overloaded"));
    try {
      await rewriter(generator).maybeRewrite("and dental?", HISTORY);
      expect.fail("maybeRewrite should reject");
    } catch (error) {
      expect(error).to.be.instanceOf(CollaboratorUnavailableError);
      expect(error).to.have.nested.property("details.collaborator", "generator");
      expect(error).to.have.nested.property("cause.message", "model overloaded");
    }
  });

  it("cleans quotes and keeps the first non-empty line", () => {
    expect(cleanReply("\n  “What about dental?”  \nignored")).to.equal("What about dental?");
    expect(cleanReply("")).to.equal("");
  });
});

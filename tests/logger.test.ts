import { describe, it, afterEach } from "mocha";
import { expect } from "chai";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { runWithTurnContext } from "../src/infra/turnContext.js";
import { StructuredLogger, parseRedactionDirectives, type LogEntry } from "../src/logger.js";

describe("logger", () => {
  const workdirs: string[] = [];

  afterEach(async () => {
    for (const dir of workdirs.splice(0)) {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("tags entries emitted during a turn with its identifiers", async () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ stream: "none", onEntry: (entry) => entries.push(entry) });

    logger.info("outside");
    await runWithTurnContext({ turnId: "turn-7", conversationId: "c1" }, async () => {
      await Promise.resolve();
      logger.warn("inside", { stage: "GATE_IN" });
    });

    expect(entries.map((entry) => [entry.message, entry.turn_id ?? null])).to.deep.equal([
      ["outside", null],
      ["inside", "turn-7"],
    ]);
    expect(entries[1]).to.include({ level: "warn", conversation_id: "c1" });
    expect(entries[1].payload).to.deep.equal({ stage: "GATE_IN" });
  });

  it("drops entries under the minimum level", () => {
    const messages: string[] = [];
    const logger = new StructuredLogger({
      stream: "none",
      minLevel: "warn",
      onEntry: (entry) => messages.push(entry.message),
    });
    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");
    expect(messages).to.deep.equal(["w", "e"]);
  });

  it("redacts sensitive keys and configured substrings", () => {
    const payloads: unknown[] = [];
    const logger = new StructuredLogger({
      stream: "none",
      redactionEnabled: true,
      redactSecrets: ["test-secret"],
      onEntry: (entry) => payloads.push(entry.payload),
    });

    logger.info("request", { Authorization: "Bearer abc", url: "http://x.test/?key=test-secret", tries: [1, "test-secret"] });

    expect(payloads[0]).to.deep.equal({
      Authorization: "[REDACTED]",
      url: "http://x.test/?key=[REDACTED]",
      tries: [1, "[REDACTED]"],
    });
  });

  it("mirrors entries to a file and rotates it past the size limit", async () => {
    const workdir = await mkdtemp(join(tmpdir(), "toolgate-log-"));
    workdirs.push(workdir);
    const logFile = join(workdir, "logs", "toolgate.log");
    const logger = new StructuredLogger({ stream: "none", logFile, maxFileSizeBytes: 100, maxFileCount: 2 });

    logger.info("entry-1", { n: 1 });
    logger.info("entry-2", { n: 2 });
    logger.info("entry-3", { n: 3 });
    await logger.flush();

    const messageOf = (content: string): string => {
      const parsed: unknown = JSON.parse(content.trim());
      return typeof parsed === "object" && parsed !== null && "message" in parsed ? String(parsed.message) : "";
    };
    expect(messageOf(await readFile(logFile, "utf8"))).to.equal("entry-3");
    expect(messageOf(await readFile(`${logFile}.1`, "utf8"))).to.equal("entry-2");
  });
});

describe("parseRedactionDirectives", () => {
  it("reads toggles and literal substrings", () => {
    expect(parseRedactionDirectives(undefined)).to.deep.equal({ enabled: false, tokens: [] });
    expect(parseRedactionDirectives("on")).to.deep.equal({ enabled: true, tokens: [] });
    expect(parseRedactionDirectives("sk-, sk-")).to.deep.equal({ enabled: true, tokens: ["sk-"] });
    expect(parseRedactionDirectives("off,test-secret")).to.deep.equal({ enabled: false, tokens: ["test-secret"] });
  });
});

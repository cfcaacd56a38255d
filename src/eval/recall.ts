import { z } from "zod";

import { loadJsonDataFile } from "../config/dataFiles.js";
import type { CandidateRouter } from "../router/candidateRouter.js";

/** Query with the action that should rank first, or `null` when no action fits. */
export const recallCaseSchema = z
  .object({
    query: z.string().trim().min(1),
    expected: z.string().min(1).nullable(),
  })
  .strict();

export type RecallCase = z.infer<typeof recallCaseSchema>;

export const recallCaseFileSchema = z.object({ cases: z.array(recallCaseSchema) }).strict();

export interface RecallCaseResult {
  readonly query: string;
  readonly expected: string | null;
  /** 1-based rank of the expected action inside the top K, if present. */
  readonly rank: number | null;
  readonly topAction: string | null;
  readonly topScore: number | null;
  readonly correct: boolean;
}

export interface RecallReport {
  readonly k: number;
  readonly noCallThreshold: number;
  readonly toolCallCases: number;
  readonly noCallCases: number;
  /** Share of tool-call cases whose expected action ranks first. */
  readonly hitAt1: number | null;
  /** Share of tool-call cases whose expected action is in the top K. */
  readonly recallAtK: number | null;
  /** Mean reciprocal rank over tool-call cases (0 when outside the top K). */
  readonly mrr: number | null;
  /** Share of no-call cases whose best score stays under the threshold. */
  readonly noCallAccuracy: number | null;
  readonly overallAccuracy: number | null;
  readonly results: readonly RecallCaseResult[];
}

export interface RecallOptions {
  readonly k: number;
  readonly noCallThreshold: number;
}

/** Routes every case and aggregates retrieval quality metrics. */
export async function evaluateRecall(
  router: CandidateRouter,
  cases: readonly RecallCase[],
  options: RecallOptions,
): Promise<RecallReport> {
  const results: RecallCaseResult[] = [];
  for (const item of cases) {
    const route = await router.route(item.query, { topK: options.k });
    const names = route.candidates.map((candidate) => candidate.name);
    const top = route.candidates[0];
    const position = item.expected === null ? -1 : names.indexOf(item.expected);
    const rank = position >= 0 ? position + 1 : null;
    const correct =
      item.expected === null ? top === undefined || top.score < options.noCallThreshold : rank === 1;
    results.push({
      query: item.query,
      expected: item.expected,
      rank,
      topAction: top?.name ?? null,
      topScore: top?.score ?? null,
      correct,
    });
  }

  const toolCalls = results.filter((result) => result.expected !== null);
  const noCalls = results.filter((result) => result.expected === null);
  const hits = toolCalls.filter((result) => result.rank === 1).length;
  const recalled = toolCalls.filter((result) => result.rank !== null).length;
  const reciprocal = toolCalls.reduce((sum, result) => sum + (result.rank === null ? 0 : 1 / result.rank), 0);
  const noCallCorrect = noCalls.filter((result) => result.correct).length;

  return {
    k: options.k,
    noCallThreshold: options.noCallThreshold,
    toolCallCases: toolCalls.length,
    noCallCases: noCalls.length,
    hitAt1: ratio(hits, toolCalls.length),
    recallAtK: ratio(recalled, toolCalls.length),
    mrr: ratio(reciprocal, toolCalls.length),
    noCallAccuracy: ratio(noCallCorrect, noCalls.length),
    overallAccuracy: ratio(hits + noCallCorrect, results.length),
    results,
  };
}

export async function loadRecallCases(path: string): Promise<RecallCase[]> {
  const file = await loadJsonDataFile(path, recallCaseFileSchema);
  return file.cases;
}

function ratio(numerator: number, denominator: number): number | null {
  return denominator === 0 ? null : numerator / denominator;
}

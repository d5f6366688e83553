// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Result Aggregator
 *
 * Turns the three stage reports into one normalized UX report with a
 * single completion call.
 */

import type { BaseProvider } from '../providers/base.js';
import type { PromptBuilder, PromptContext } from '../prompts/builder.js';
import { SynthesisError } from '../errors.js';
import { logger } from '../logger.js';
import { AGENT_STAGES, STAGE_NAMES } from '../pipeline/stages.js';
import { isJsonObject } from '../types.js';
import type { JsonObject, ReportScores } from '../types.js';
import { parseJsonStrict, stripCodeFences } from '../utils/json-parser.js';
import { extractScores, normalizeReport } from './report-schema.js';

/** Stage number to captured stage text. */
export type StageTexts = ReadonlyMap<number, string>;

export interface AggregatedResult {
  report: JsonObject;
  scores: ReportScores;
}

/**
 * Join stage texts in stage order, each under a banner naming the stage.
 */
export function combineStageTexts(stageTexts: StageTexts): string {
  const sections: string[] = [];
  for (const stage of AGENT_STAGES) {
    const text = stageTexts.get(stage);
    if (text !== undefined) {
      sections.push(`\n\n=== STAGE ${stage}: ${STAGE_NAMES[stage]} ===\n\n${text}`);
    }
  }
  return sections.join('');
}

/**
 * Parse completion text into a report object.
 * @throws SynthesisError when the text is not a JSON object
 */
export function parseReport(completion: string): JsonObject {
  const body = stripCodeFences(completion);
  if (body === '') {
    throw new SynthesisError('Synthesis returned an empty response', completion);
  }

  const parsed = parseJsonStrict(body);
  if (!parsed.ok) {
    throw new SynthesisError(`Synthesis output is not valid JSON: ${parsed.error}`, completion);
  }
  if (!isJsonObject(parsed.value)) {
    const kind = Array.isArray(parsed.value) ? 'an array' : typeof parsed.value;
    throw new SynthesisError(`Synthesis output must be a JSON object, got ${kind}`, completion);
  }
  return parsed.value;
}

export class ResultAggregator {
  constructor(
    private provider: BaseProvider,
    private prompts: PromptBuilder
  ) {}

  /**
   * Synthesize the report for one exploration.
   *
   * Missing stages are tolerated with a warning. Provider failures
   * propagate as ProviderError, unusable output as SynthesisError.
   */
  async aggregate(stageTexts: StageTexts, context: PromptContext): Promise<AggregatedResult> {
    const missing = AGENT_STAGES.filter(stage => !stageTexts.has(stage));
    if (missing.length > 0) {
      logger.warn(`Synthesizing ${context.explorationId} without stage ${missing.join(', ')}`);
    }

    const prompt = this.prompts.buildSynthesisPrompt(context, combineStageTexts(stageTexts));
    const completion = await this.provider.complete(prompt);

    const report = normalizeReport(parseReport(completion), context.persona);
    const scores = extractScores(report);
    logger.debug(`Report for ${context.explorationId}: ux ${scores.uxScore}, complexity ${scores.complexityScore}`);

    return { report, scores };
  }
}

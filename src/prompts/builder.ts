// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Composes the goal text for each stage from the template store.
 */

import type { PromptStore } from './store.js';
import { personaSlug } from '../pipeline/stages.js';
import type { AgentStage } from '../pipeline/stages.js';

/**
 * Run parameters visible to prompt templates.
 */
export interface PromptContext {
  explorationId: string;
  appName: string;
  category: string;
  persona: string;
  customNavigation?: string;
  maxDepth: number;
}

export const TEMPLATE_NAMES = {
  basic: 'stage1_basic_exploration',
  persona: 'stage2_persona_analysis',
  stress: 'stage3_stress_exploration',
  synthesis: 'stage4_final_analysis',
} as const;

const PERSONA_NAVIGATION_DEFAULT = 'No custom navigation provided. Explore naturally as the persona would.';

const STRESS_NAVIGATION_DEFAULT = [
  'NO CUSTOM NAVIGATION - ACT AS A DUMB USER:',
  'No custom navigation provided. Simulate imperfect user behavior:',
  '- Scroll randomly, including past the end of lists',
  '- Mistap near buttons and on non-interactive elements',
  '- Navigate erratically: go back mid-flow, reopen screens, abandon forms',
].join('\n');

/**
 * Stateless goal builder for the three agent stages and the synthesis prompt.
 */
export class PromptBuilder {
  constructor(private store: PromptStore) {}

  /**
   * Build the goal handed to the agent for a stage.
   */
  buildStageGoal(stage: AgentStage, context: PromptContext): string {
    switch (stage) {
      case 1:
        return this.buildBasicGoal(context);
      case 2:
        return this.buildPersonaGoal(context);
      case 3:
        return this.buildStressGoal(context);
    }
  }

  /**
   * Stage 1: application identity only.
   */
  buildBasicGoal(context: PromptContext): string {
    return this.store.renderTemplate(TEMPLATE_NAMES.basic, {
      app_name: context.appName,
      category: context.category,
    });
  }

  /**
   * Stage 2: persona framing followed by the persona stage instructions.
   */
  buildPersonaGoal(context: PromptContext): string {
    const slug = personaSlug(context.persona);
    const personaPrompt = this.store.renderTemplate(`persona_${slug}`, {
      app_name: context.appName,
      category: context.category,
    });

    const navigation = customNavigation(context);
    const stagePrompt = this.store.renderTemplate(TEMPLATE_NAMES.persona, {
      app_name: context.appName,
      category: context.category,
      persona: context.persona,
      persona_slug: slug,
      max_depth: context.maxDepth,
      custom_navigation_instruction: navigation
        ? `Follow these custom navigation instructions: ${navigation}`
        : PERSONA_NAVIGATION_DEFAULT,
    });

    return `${personaPrompt}\n\n${stagePrompt}`;
  }

  /**
   * Stage 3: stress testing, steered by custom navigation when given.
   */
  buildStressGoal(context: PromptContext): string {
    const navigation = customNavigation(context);
    return this.store.renderTemplate(TEMPLATE_NAMES.stress, {
      app_name: context.appName,
      category: context.category,
      max_depth: context.maxDepth,
      custom_navigation_section: navigation
        ? `CUSTOM NAVIGATION:\nFollow these custom navigation instructions: ${navigation}`
        : STRESS_NAVIGATION_DEFAULT,
    });
  }

  /**
   * Synthesis prompt wrapping the combined stage data.
   */
  buildSynthesisPrompt(context: PromptContext, stageData: string): string {
    return this.store.renderTemplate(TEMPLATE_NAMES.synthesis, {
      app_name: context.appName,
      category: context.category,
      persona: context.persona,
      exploration_id: context.explorationId,
      stage_data: stageData,
    });
  }
}

function customNavigation(context: PromptContext): string | null {
  const trimmed = context.customNavigation?.trim();
  return trimmed ? trimmed : null;
}

// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import type { StageNumber } from '../types.js';

/** Display names of the four stages. */
export const STAGE_NAMES: Record<StageNumber, string> = {
  1: 'Basic Exploration',
  2: 'Persona Analysis',
  3: 'Stress Testing',
  4: 'Final Analysis',
};

export const TOTAL_STAGES = 4;

/** Agent-driven stages, in execution order. */
export const AGENT_STAGES = [1, 2, 3] as const;

export type AgentStage = (typeof AGENT_STAGES)[number];

/** Progress percentage reported when a stage starts and when it completes. */
export const STAGE_PROGRESS: Record<StageNumber, { start: number; end: number }> = {
  1: { start: 5, end: 25 },
  2: { start: 30, end: 50 },
  3: { start: 55, end: 75 },
  4: { start: 80, end: 95 },
};

export const PROGRESS_COMPLETE = 100;
/** Reported on failure and on stop. */
export const PROGRESS_ABORTED = -1;

/**
 * Known personas and the template slug each one selects.
 */
export const PERSONAS: Record<string, string> = {
  'UX Designer': 'ux_designer',
  'QA Engineer': 'qa_engineer',
  'Product Manager': 'product_manager',
};

export const DEFAULT_PERSONA = 'UX Designer';

export const CATEGORIES = [
  'Social Media',
  'E-Commerce',
  'Food Delivery',
  'Productivity',
  'Entertainment',
  'Finance',
  'Health & Fitness',
  'Education',
  'Travel',
  'Gaming',
  'News',
  'Messaging',
  'Other',
] as const;

/**
 * Template slug for a persona. Unknown personas use the UX Designer template.
 */
export function personaSlug(persona: string): string {
  return PERSONAS[persona] ?? PERSONAS[DEFAULT_PERSONA] ?? 'ux_designer';
}

/**
 * Name recorded for a stage. The persona stage carries the persona.
 */
export function stageDisplayName(stage: StageNumber, persona: string): string {
  return stage === 2 ? `${STAGE_NAMES[2]} (${persona})` : STAGE_NAMES[stage];
}

// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { PromptBuilder } from '../src/prompts/builder.js';
import type { PromptContext } from '../src/prompts/builder.js';
import { PromptStore } from '../src/prompts/store.js';
import { UxplorePaths } from '../src/paths.js';

const context: PromptContext = {
  explorationId: 'abc12345',
  appName: 'Notes',
  category: 'Productivity',
  persona: 'QA Engineer',
  maxDepth: 4,
};

describe('PromptBuilder', () => {
  let dir: string;
  let builder: PromptBuilder;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'uxplore-builder-'));
    const templates: Record<string, string> = {
      stage1_basic_exploration: 'basic {{app_name}} {{category}}',
      stage2_persona_analysis: 'persona {{persona}}/{{persona_slug}} depth {{max_depth}}: {{custom_navigation_instruction}}',
      stage3_stress_exploration: 'stress {{app_name}} depth {{max_depth}}\n{{custom_navigation_section}}',
      stage4_final_analysis: 'synth {{exploration_id}} {{app_name}} {{category}} {{persona}}\n{{stage_data}}',
      persona_ux_designer: 'I am a designer of {{app_name}}',
      persona_qa_engineer: 'I am QA for {{app_name}} ({{category}})',
    };
    for (const [name, text] of Object.entries(templates)) {
      fs.writeFileSync(path.join(dir, `${name}.txt`), text);
    }
    builder = new PromptBuilder(new PromptStore({ directories: [dir] }));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('builds the basic goal from app identity', () => {
    expect(builder.buildStageGoal(1, context)).toBe('basic Notes Productivity');
  });

  it('prefixes the persona goal with the persona template', () => {
    expect(builder.buildStageGoal(2, context)).toBe(
      'I am QA for Notes (Productivity)\n\n' +
      'persona QA Engineer/qa_engineer depth 4: No custom navigation provided. Explore naturally as the persona would.'
    );
  });

  it('passes custom navigation to the persona goal', () => {
    const goal = builder.buildPersonaGoal({ ...context, customNavigation: '  Open the share sheet  ' });
    expect(goal.endsWith(': Follow these custom navigation instructions: Open the share sheet')).toBe(true);
  });

  it('falls back to the UX Designer template for unknown personas', () => {
    const goal = builder.buildPersonaGoal({ ...context, persona: 'Astronaut' });
    expect(goal.startsWith('I am a designer of Notes\n\npersona Astronaut/ux_designer')).toBe(true);
  });

  it('uses the erratic-user section when no navigation is given', () => {
    const goal = builder.buildStageGoal(3, { ...context, customNavigation: '   ' });
    const lines = goal.split('\n');
    expect(lines[0]).toBe('stress Notes depth 4');
    expect(lines[1]).toBe('NO CUSTOM NAVIGATION - ACT AS A DUMB USER:');
  });

  it('uses the custom navigation section when navigation is given', () => {
    expect(builder.buildStressGoal({ ...context, customNavigation: 'Spam the checkout button' })).toBe(
      'stress Notes depth 4\nCUSTOM NAVIGATION:\nFollow these custom navigation instructions: Spam the checkout button'
    );
  });

  it('wraps stage data in the synthesis prompt', () => {
    expect(builder.buildSynthesisPrompt(context, 'DATA')).toBe('synth abc12345 Notes Productivity QA Engineer\nDATA');
  });

  describe('bundled templates', () => {
    const bundled = new PromptBuilder(new PromptStore({ directories: [UxplorePaths.bundledPrompts()] }));

    it.each(['UX Designer', 'QA Engineer', 'Product Manager'])('renders every stage for %s', (persona) => {
      const ctx = { ...context, persona };
      for (const stage of [1, 2, 3] as const) {
        const goal = bundled.buildStageGoal(stage, ctx);
        expect(goal).toContain('Notes');
        expect(goal).not.toMatch(/\{\{/);
      }
      expect(bundled.buildSynthesisPrompt(ctx, 'stage text')).toContain('stage text');
    });
  });
});

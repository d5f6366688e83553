// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import {
  NEUTRAL_SCORE,
  buildReportDefaults,
  extractScores,
  fillDefaults,
  normalizeReport,
  reportKeys,
} from '../src/analysis/report-schema.js';
import type { JsonObject } from '../src/types.js';

describe('report schema', () => {
  it('declares the fixed top-level blocks', () => {
    expect(reportKeys()).toEqual([
      'summary',
      'positive',
      'issues',
      'recommendations',
      'app_metadata',
      'exploration_coverage',
      'navigation_metrics',
      'interaction_feedback',
      'visual_hierarchy',
      'consistency',
      'error_handling',
      'stress_test_results',
      'ux_confidence_score',
      'complexity_score',
      'dark_patterns_detected',
      'actor_analysis',
      'persona_insights',
    ]);
  });

  it('fills the persona into fresh defaults', () => {
    const defaults = buildReportDefaults('QA Engineer');
    expect(defaults.persona_insights).toEqual({ persona: 'QA Engineer', key_observations: [], alignment_score: 5 });
    expect(buildReportDefaults('UX Designer').persona_insights).toMatchObject({ persona: 'UX Designer' });
  });

  describe('fillDefaults', () => {
    const defaults: JsonObject = { a: 1, block: { x: 0, y: 'low' }, list: [] };

    it('adds missing keys', () => {
      expect(fillDefaults({}, defaults)).toEqual({ a: 1, block: { x: 0, y: 'low' }, list: [] });
    });

    it('treats null as missing', () => {
      expect(fillDefaults({ a: null }, defaults).a).toBe(1);
    });

    it('fills nested blocks without overwriting present values', () => {
      expect(fillDefaults({ block: { x: 7 } }, defaults).block).toEqual({ x: 7, y: 'low' });
    });

    it('replaces a non-object where a block is expected', () => {
      expect(fillDefaults({ block: 'n/a' }, defaults).block).toEqual({ x: 0, y: 'low' });
    });

    it('keeps keys the defaults do not know', () => {
      expect(fillDefaults({ extra: true }, defaults).extra).toBe(true);
    });

    it('does not share default values between results', () => {
      const first = fillDefaults({}, defaults);
      const block = first.block;
      if (block && typeof block === 'object' && !Array.isArray(block)) {
        block.x = 99;
      }
      expect(defaults.block).toEqual({ x: 0, y: 'low' });
    });
  });

  describe('normalizeReport', () => {
    it('turns an empty document into the full default report', () => {
      const report = normalizeReport({}, 'UX Designer');
      expect(Object.keys(report)).toEqual(reportKeys());
      expect(report.issues).toEqual([]);
      expect(report.summary).toBe('UX analysis completed.');
      expect(report.stress_test_results).toMatchObject({ breakability_score: 5, critical_bugs: 0 });
    });

    it('keeps model values and fills the gaps', () => {
      const report = normalizeReport({
        summary: 'Clean app',
        issues: [{ title: 'Tiny buttons' }],
        ux_confidence_score: { score: 8 },
      }, 'UX Designer');

      expect(report.summary).toBe('Clean app');
      expect(report.issues).toEqual([{ title: 'Tiny buttons' }]);
      expect(report.ux_confidence_score).toEqual({
        score: 8,
        factors: {
          exploration_coverage: 5,
          interaction_consistency: 5,
          feedback_reliability: 5,
          recovery_robustness: 5,
        },
      });
    });

    it('is idempotent', () => {
      const once = normalizeReport({ summary: 'x', complexity_score: 3 }, 'QA Engineer');
      expect(normalizeReport(once, 'QA Engineer')).toEqual(once);
    });
  });

  describe('extractScores', () => {
    it('reads both scores', () => {
      expect(extractScores({ ux_confidence_score: { score: 7.5 }, complexity_score: 4 }))
        .toEqual({ uxScore: 7.5, complexityScore: 4 });
    });

    it('accepts numeric strings', () => {
      expect(extractScores({ ux_confidence_score: { score: '6' }, complexity_score: ' 3.5 ' }))
        .toEqual({ uxScore: 6, complexityScore: 3.5 });
    });

    it('falls back to the neutral score', () => {
      expect(extractScores({ ux_confidence_score: 9, complexity_score: 'high' }))
        .toEqual({ uxScore: NEUTRAL_SCORE, complexityScore: NEUTRAL_SCORE });
      expect(extractScores({})).toEqual({ uxScore: 5, complexityScore: 5 });
    });
  });
});

// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { parseJsonStrict, stripCodeFences } from '../src/utils/json-parser.js';

describe('json-parser', () => {
  describe('stripCodeFences', () => {
    it('removes a json fence', () => {
      expect(stripCodeFences('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
    });

    it('removes a bare fence', () => {
      expect(stripCodeFences('```\n{"a": 1}\n```')).toBe('{"a": 1}');
    });

    it('handles surrounding whitespace', () => {
      expect(stripCodeFences('  \n```json\n{"a": 1}\n```\n  ')).toBe('{"a": 1}');
    });

    it('trims unfenced text', () => {
      expect(stripCodeFences('  {"a": 1}  ')).toBe('{"a": 1}');
    });

    it('handles a fence without a closing marker', () => {
      expect(stripCodeFences('```json\n{"a": 1}')).toBe('{"a": 1}');
    });
  });

  describe('parseJsonStrict', () => {
    it('parses valid JSON', () => {
      expect(parseJsonStrict('{"a": [1, 2]}')).toEqual({ ok: true, value: { a: [1, 2] } });
    });

    it('reports invalid JSON without repairing it', () => {
      const result = parseJsonStrict("{'a': 1}");
      expect(result.ok).toBe(false);
    });

    it('rejects trailing commas', () => {
      expect(parseJsonStrict('{"a": 1,}').ok).toBe(false);
    });
  });
});

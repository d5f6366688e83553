// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * JSON parsing utilities for handling LLM output.
 */

import type { JsonValue } from '../types.js';

const OPENING_FENCE = /^```[A-Za-z0-9_-]*[ \t]*\r?\n?/;
const CLOSING_FENCE = /\r?\n?```\s*$/;

/**
 * Remove a leading ``` or ```json fence and a trailing ``` fence.
 * Text without fences is returned trimmed.
 */
export function stripCodeFences(text: string): string {
  let result = text.trim();
  if (result.startsWith('```')) {
    result = result.replace(OPENING_FENCE, '');
    result = result.replace(CLOSING_FENCE, '');
  }
  return result.trim();
}

/**
 * Result of a strict parse attempt.
 */
export type JsonParseResult =
  | { ok: true; value: JsonValue }
  | { ok: false; error: string };

/**
 * Parse JSON without attempting any repair.
 */
export function parseJsonStrict(text: string): JsonParseResult {
  try {
    const value: JsonValue = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Report Schema
 *
 * The fixed shape of the synthesized UX report: defaults for every
 * top-level block, recursive normalization and score extraction.
 * Defaults live in data/report-defaults.json.
 */

import * as fs from 'fs';
import * as path from 'path';
import { UxplorePaths } from '../paths.js';
import { isJsonObject } from '../types.js';
import type { JsonObject, JsonValue, ReportScores } from '../types.js';

/** Neutral value on the report's 1-10 scales. */
export const NEUTRAL_SCORE = 5;

const DEFAULTS_FILE = 'report-defaults.json';

let cachedDefaults: JsonObject | null = null;

/**
 * Load the report defaults from disk (cached after the first read).
 */
export function loadReportDefaults(dataDir: string = UxplorePaths.data()): JsonObject {
  if (cachedDefaults) {
    return cachedDefaults;
  }
  const filePath = path.join(dataDir, DEFAULTS_FILE);
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  if (!isJsonObject(parsed)) {
    throw new Error(`${filePath} must contain a JSON object`);
  }
  cachedDefaults = parsed;
  return parsed;
}

/**
 * Top-level keys every normalized report carries.
 */
export function reportKeys(): string[] {
  return Object.keys(loadReportDefaults());
}

/**
 * Deep copy of a JSON value.
 */
function cloneJson<T extends JsonValue>(value: T): T {
  return structuredClone(value);
}

/**
 * Fresh defaults with the persona filled into persona_insights.
 */
export function buildReportDefaults(persona: string): JsonObject {
  const defaults = cloneJson(loadReportDefaults());
  const insights = defaults.persona_insights;
  if (isJsonObject(insights)) {
    insights.persona = persona;
  }
  return defaults;
}

/**
 * Return a copy of target in which every key of defaults is present.
 *
 * Missing or null values take the default. Object-valued defaults are
 * filled recursively; a non-object value where an object block is
 * expected is replaced by the default block. Keys not in defaults are
 * kept as they are.
 */
export function fillDefaults(target: JsonObject, defaults: JsonObject): JsonObject {
  const result: JsonObject = { ...target };

  for (const [key, defaultValue] of Object.entries(defaults)) {
    const value = result[key];

    if (value === undefined || value === null) {
      result[key] = cloneJson(defaultValue);
      continue;
    }

    if (isJsonObject(defaultValue)) {
      result[key] = isJsonObject(value) ? fillDefaults(value, defaultValue) : cloneJson(defaultValue);
    }
  }

  return result;
}

/**
 * Normalize a parsed synthesis document against the fixed schema.
 * Idempotent: normalizing a normalized report changes nothing.
 */
export function normalizeReport(document: JsonObject, persona: string): JsonObject {
  return fillDefaults(document, buildReportDefaults(persona));
}

/**
 * Read a numeric score, accepting numeric strings.
 */
function toScore(value: JsonValue | undefined): number {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return NEUTRAL_SCORE;
}

/**
 * Extract the UX confidence score and complexity score from a report.
 */
export function extractScores(report: JsonObject): ReportScores {
  const confidence = report.ux_confidence_score;
  return {
    uxScore: toScore(isJsonObject(confidence) ? confidence.score : undefined),
    complexityScore: toScore(report.complexity_score),
  };
}

// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * SQLite store for explorations, their stages, results and comparison
 * snapshots. Handles schema creation and low-level queries.
 */

import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import * as path from 'path';
import { StoreError } from '../errors.js';
import { logger } from '../logger.js';
import { ensureDir, UxplorePaths } from '../paths.js';
import { TOTAL_STAGES } from '../pipeline/stages.js';
import { isJsonObject } from '../types.js';
import type {
  ExplorationParams,
  ExplorationRecord,
  ExplorationStatus,
  JsonObject,
  ReportScores,
  ResultRecord,
  StageRecord,
  StageStatus,
} from '../types.js';
import type {
  ComparisonFilter,
  ComparisonSnapshot,
  ExplorationFilter,
  ExplorationSummary,
  StageStore,
  StageUpdate,
} from './types.js';

const EXPLORATION_STATUSES: readonly ExplorationStatus[] = ['pending', 'running', 'completed', 'failed', 'stopped'];
const STAGE_STATUSES: readonly StageStatus[] = ['pending', 'running', 'completed', 'failed'];
const TERMINAL_EXPLORATION_STATUSES: readonly ExplorationStatus[] = ['completed', 'failed', 'stopped'];

/** Report blocks copied into a comparison snapshot. */
const KEY_METRIC_BLOCKS = [
  'exploration_coverage',
  'navigation_metrics',
  'interaction_feedback',
  'visual_hierarchy',
  'consistency',
  'error_handling',
  'stress_test_results',
];

interface ExplorationRow {
  id: string;
  app_name: string;
  category: string;
  persona: string;
  custom_navigation: string | null;
  max_depth: number;
  save_to_memory: number;
  status: string;
  current_stage: number;
  total_stages: number;
  error_message: string | null;
  created_at: string;
  started_at: string | null;
  updated_at: string;
  completed_at: string | null;
}

interface ExplorationSummaryRow extends ExplorationRow {
  ux_score: number | null;
  complexity_score: number | null;
}

interface StageRow {
  id: number;
  exploration_id: string;
  stage_number: number;
  stage_name: string;
  status: string;
  md_content: string | null;
  json_data: string | null;
  error_message: string | null;
  started_at: string | null;
  completed_at: string | null;
}

interface ResultRow {
  exploration_id: string;
  full_json: string;
  ux_score: number;
  complexity_score: number;
  created_at: string;
}

interface SnapshotRow {
  id: number;
  exploration_id: string;
  snapshot_name: string;
  app_name: string;
  category: string;
  persona: string;
  ux_score: number;
  complexity_score: number;
  key_metrics: string;
  created_at: string;
}

/**
 * Generate a short exploration id (8 hex characters).
 */
export function generateExplorationId(): string {
  return randomUUID().replace(/-/g, '').slice(0, 8);
}

function isExplorationStatus(value: string): value is ExplorationStatus {
  return EXPLORATION_STATUSES.some(status => status === value);
}

function isStageStatus(value: string): value is StageStatus {
  return STAGE_STATUSES.some(status => status === value);
}

function parseJsonColumn(text: string | null): JsonObject | null {
  if (text === null) {
    return null;
  }
  const parsed: unknown = JSON.parse(text);
  return isJsonObject(parsed) ? parsed : null;
}

function now(): string {
  return new Date().toISOString();
}

/**
 * SQLite database wrapper for exploration data.
 */
export class ExplorationDatabase implements StageStore {
  private db: Database.Database;
  readonly dbPath: string;

  /**
   * @param dbPath - Database file, or ':memory:' for a private in-memory store
   */
  constructor(dbPath: string = UxplorePaths.database()) {
    this.dbPath = dbPath;

    if (dbPath !== ':memory:') {
      ensureDir(path.dirname(dbPath));
    }

    try {
      this.db = new Database(dbPath);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('foreign_keys = ON');
    } catch (error) {
      throw new StoreError(`Could not open database at ${dbPath}: ${error instanceof Error ? error.message : error}`,
        error instanceof Error ? error : undefined);
    }

    this.createSchema();
  }

  /**
   * Create database schema
   */
  private createSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS explorations (
        id TEXT PRIMARY KEY,
        app_name TEXT NOT NULL,
        category TEXT NOT NULL,
        persona TEXT NOT NULL,
        custom_navigation TEXT,
        max_depth INTEGER NOT NULL,
        save_to_memory INTEGER NOT NULL DEFAULT 0,
        status TEXT NOT NULL DEFAULT 'pending',
        current_stage INTEGER NOT NULL DEFAULT 0,
        total_stages INTEGER NOT NULL DEFAULT ${TOTAL_STAGES},
        error_message TEXT,
        created_at TEXT NOT NULL,
        started_at TEXT,
        updated_at TEXT NOT NULL,
        completed_at TEXT
      );

      CREATE TABLE IF NOT EXISTS exploration_stages (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        exploration_id TEXT NOT NULL REFERENCES explorations(id) ON DELETE CASCADE,
        stage_number INTEGER NOT NULL,
        stage_name TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending',
        md_content TEXT,
        json_data TEXT,
        error_message TEXT,
        started_at TEXT,
        completed_at TEXT,
        UNIQUE(exploration_id, stage_number)
      );

      CREATE TABLE IF NOT EXISTS exploration_results (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        exploration_id TEXT NOT NULL UNIQUE REFERENCES explorations(id) ON DELETE CASCADE,
        summary TEXT,
        positive_findings TEXT,
        issues TEXT,
        recommendations TEXT,
        metrics TEXT,
        ux_score REAL NOT NULL,
        complexity_score REAL NOT NULL,
        full_json TEXT NOT NULL,
        created_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS comparison_snapshots (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        exploration_id TEXT NOT NULL REFERENCES explorations(id) ON DELETE CASCADE,
        snapshot_name TEXT NOT NULL,
        app_name TEXT NOT NULL,
        category TEXT NOT NULL,
        persona TEXT NOT NULL,
        ux_score REAL NOT NULL,
        complexity_score REAL NOT NULL,
        key_metrics TEXT NOT NULL,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_explorations_category ON explorations(category);
      CREATE INDEX IF NOT EXISTS idx_explorations_persona ON explorations(persona);
      CREATE INDEX IF NOT EXISTS idx_stages_exploration ON exploration_stages(exploration_id);
    `);
  }

  /**
   * Close database connection
   */
  close(): void {
    this.db.close();
  }

  /**
   * Run a database operation, converting driver errors into StoreError.
   */
  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof StoreError) {
        throw error;
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new StoreError(`Failed to ${operation}: ${cause.message}`, cause);
    }
  }

  transaction<T>(work: () => T): T {
    return this.db.transaction(work)();
  }

  // ============================================
  // Explorations
  // ============================================

  createExploration(params: ExplorationParams): string {
    const id = params.id ?? generateExplorationId();
    const timestamp = now();

    this.run('create exploration', () => {
      this.db.prepare<{
        id: string; app_name: string; category: string; persona: string; custom_navigation: string | null;
        max_depth: number; save_to_memory: number; created_at: string;
      }>(`
        INSERT INTO explorations (id, app_name, category, persona, custom_navigation, max_depth,
          save_to_memory, status, created_at, updated_at)
        VALUES (@id, @app_name, @category, @persona, @custom_navigation, @max_depth,
          @save_to_memory, 'pending', @created_at, @created_at)
      `).run({
        id,
        app_name: params.appName,
        category: params.category,
        persona: params.persona,
        custom_navigation: params.customNavigation ?? null,
        max_depth: params.maxDepth,
        save_to_memory: params.saveToMemory ? 1 : 0,
        created_at: timestamp,
      });
    });

    logger.debug(`Created exploration ${id} for ${params.appName}`);
    return id;
  }

  updateExplorationStatus(explorationId: string, status: ExplorationStatus, error?: string): void {
    const timestamp = now();
    const terminal = TERMINAL_EXPLORATION_STATUSES.includes(status);

    this.run('update exploration status', () => {
      const result = this.db.prepare<[string, string, string | null, string | null, string | null, string]>(`
        UPDATE explorations
        SET status = ?,
            updated_at = ?,
            started_at = COALESCE(started_at, ?),
            completed_at = COALESCE(?, completed_at),
            error_message = COALESCE(?, error_message)
        WHERE id = ?
      `).run(
        status,
        timestamp,
        status === 'running' ? timestamp : null,
        terminal ? timestamp : null,
        error ?? null,
        explorationId
      );
      if (result.changes === 0) {
        throw new StoreError(`Exploration not found: ${explorationId}`);
      }
    });

    logger.debug(`Exploration ${explorationId} → ${status}`);
  }

  updateExplorationStage(explorationId: string, stageNumber: number): void {
    this.run('update current stage', () => {
      this.db.prepare<[number, string, string]>(
        'UPDATE explorations SET current_stage = ?, updated_at = ? WHERE id = ?'
      ).run(stageNumber, now(), explorationId);
    });
  }

  getExploration(explorationId: string): ExplorationRecord | null {
    const row = this.run('read exploration', () =>
      this.db.prepare<[string], ExplorationRow>('SELECT * FROM explorations WHERE id = ?').get(explorationId)
    );
    return row ? this.toExploration(row) : null;
  }

  /**
   * List explorations newest first with their scores.
   */
  listExplorations(filter: ExplorationFilter = {}): ExplorationSummary[] {
    const clauses: string[] = [];
    const params: Array<string | number> = [];

    if (filter.category) {
      clauses.push('e.category = ?');
      params.push(filter.category);
    }
    if (filter.persona) {
      clauses.push('e.persona = ?');
      params.push(filter.persona);
    }
    if (filter.status) {
      clauses.push('e.status = ?');
      params.push(filter.status);
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    params.push(filter.limit ?? 50);

    const rows = this.run('list explorations', () =>
      this.db.prepare<Array<string | number>, ExplorationSummaryRow>(`
        SELECT e.*, r.ux_score, r.complexity_score
        FROM explorations e
        LEFT JOIN exploration_results r ON r.exploration_id = e.id
        ${where}
        ORDER BY e.created_at DESC, e.rowid DESC
        LIMIT ?
      `).all(...params)
    );

    return rows.map(row => ({
      ...this.toExploration(row),
      uxScore: row.ux_score,
      complexityScore: row.complexity_score,
    }));
  }

  /**
   * Delete an exploration together with its stages, result and snapshots.
   */
  deleteExploration(explorationId: string): boolean {
    const result = this.run('delete exploration', () =>
      this.db.prepare<[string]>('DELETE FROM explorations WHERE id = ?').run(explorationId)
    );
    return result.changes > 0;
  }

  private toExploration(row: ExplorationRow): ExplorationRecord {
    if (!isExplorationStatus(row.status)) {
      throw new StoreError(`Exploration ${row.id} has unknown status "${row.status}"`);
    }
    return {
      id: row.id,
      appName: row.app_name,
      category: row.category,
      persona: row.persona,
      customNavigation: row.custom_navigation,
      maxDepth: row.max_depth,
      saveToMemory: row.save_to_memory === 1,
      status: row.status,
      currentStage: row.current_stage,
      totalStages: row.total_stages,
      errorMessage: row.error_message,
      createdAt: row.created_at,
      startedAt: row.started_at,
      updatedAt: row.updated_at,
      completedAt: row.completed_at,
    };
  }

  // ============================================
  // Stages
  // ============================================

  createStage(explorationId: string, stageNumber: number, stageName: string): number {
    const result = this.run('create stage', () =>
      this.db.prepare<[string, number, string]>(`
        INSERT INTO exploration_stages (exploration_id, stage_number, stage_name, status)
        VALUES (?, ?, ?, 'pending')
      `).run(explorationId, stageNumber, stageName)
    );
    return Number(result.lastInsertRowid);
  }

  updateStage(stageId: number, update: StageUpdate): boolean {
    const timestamp = now();
    const finished = update.status === 'completed' || update.status === 'failed';

    const result = this.run('update stage', () =>
      this.db.prepare<[string, string | null, string | null, string | null, string | null, string | null, number]>(`
        UPDATE exploration_stages
        SET status = ?,
            md_content = COALESCE(?, md_content),
            json_data = COALESCE(?, json_data),
            error_message = COALESCE(?, error_message),
            started_at = COALESCE(started_at, ?),
            completed_at = COALESCE(?, completed_at)
        WHERE id = ? AND status NOT IN ('completed', 'failed')
      `).run(
        update.status,
        update.content ?? null,
        update.data ? JSON.stringify(update.data) : null,
        update.error ?? null,
        update.status === 'running' ? timestamp : null,
        finished ? timestamp : null,
        stageId
      )
    );

    if (result.changes === 0) {
      logger.debug(`Stage ${stageId} update to ${update.status} refused (missing or finished)`);
      return false;
    }
    return true;
  }

  getStages(explorationId: string): StageRecord[] {
    const rows = this.run('read stages', () =>
      this.db.prepare<[string], StageRow>(
        'SELECT * FROM exploration_stages WHERE exploration_id = ? ORDER BY stage_number'
      ).all(explorationId)
    );
    return rows.map(row => this.toStage(row));
  }

  getStageContents(explorationId: string): Map<number, string> {
    const rows = this.run('read stage contents', () =>
      this.db.prepare<[string], { stage_number: number; md_content: string }>(`
        SELECT stage_number, md_content FROM exploration_stages
        WHERE exploration_id = ? AND status = 'completed' AND md_content IS NOT NULL
        ORDER BY stage_number
      `).all(explorationId)
    );
    return new Map(rows.map(row => [row.stage_number, row.md_content]));
  }

  private toStage(row: StageRow): StageRecord {
    if (!isStageStatus(row.status)) {
      throw new StoreError(`Stage ${row.id} has unknown status "${row.status}"`);
    }
    return {
      id: row.id,
      explorationId: row.exploration_id,
      stageNumber: row.stage_number,
      stageName: row.stage_name,
      status: row.status,
      content: row.md_content,
      data: parseJsonColumn(row.json_data),
      errorMessage: row.error_message,
      startedAt: row.started_at,
      completedAt: row.completed_at,
    };
  }

  // ============================================
  // Results
  // ============================================

  saveResult(explorationId: string, report: JsonObject, scores: ReportScores): void {
    const metrics: JsonObject = {};
    for (const block of KEY_METRIC_BLOCKS) {
      const value = report[block];
      if (value !== undefined) {
        metrics[block] = value;
      }
    }

    const summary = typeof report.summary === 'string' ? report.summary : null;

    this.run('save result', () => {
      this.db.prepare<{
        exploration_id: string; summary: string | null; positive: string; issues: string;
        recommendations: string; metrics: string; ux_score: number; complexity_score: number;
        full_json: string; created_at: string;
      }>(`
        INSERT INTO exploration_results (exploration_id, summary, positive_findings, issues, recommendations,
          metrics, ux_score, complexity_score, full_json, created_at)
        VALUES (@exploration_id, @summary, @positive, @issues, @recommendations,
          @metrics, @ux_score, @complexity_score, @full_json, @created_at)
        ON CONFLICT(exploration_id) DO UPDATE SET
          summary = excluded.summary,
          positive_findings = excluded.positive_findings,
          issues = excluded.issues,
          recommendations = excluded.recommendations,
          metrics = excluded.metrics,
          ux_score = excluded.ux_score,
          complexity_score = excluded.complexity_score,
          full_json = excluded.full_json
      `).run({
        exploration_id: explorationId,
        summary,
        positive: JSON.stringify(report.positive ?? []),
        issues: JSON.stringify(report.issues ?? []),
        recommendations: JSON.stringify(report.recommendations ?? []),
        metrics: JSON.stringify(metrics),
        ux_score: scores.uxScore,
        complexity_score: scores.complexityScore,
        full_json: JSON.stringify(report),
        created_at: now(),
      });
    });

    logger.debug(`Saved result for ${explorationId} (ux ${scores.uxScore})`);
  }

  getResult(explorationId: string): ResultRecord | null {
    const row = this.run('read result', () =>
      this.db.prepare<[string], ResultRow>(
        'SELECT exploration_id, full_json, ux_score, complexity_score, created_at FROM exploration_results WHERE exploration_id = ?'
      ).get(explorationId)
    );
    return row ? this.toResult(row) : null;
  }

  /**
   * Most recently created result, across all explorations.
   */
  getLatestResult(): ResultRecord | null {
    const row = this.run('read latest result', () =>
      this.db.prepare<[], ResultRow>(
        'SELECT exploration_id, full_json, ux_score, complexity_score, created_at FROM exploration_results ORDER BY created_at DESC, id DESC LIMIT 1'
      ).get()
    );
    return row ? this.toResult(row) : null;
  }

  private toResult(row: ResultRow): ResultRecord {
    const report = parseJsonColumn(row.full_json);
    if (!report) {
      throw new StoreError(`Result for ${row.exploration_id} is not a JSON object`);
    }
    return {
      explorationId: row.exploration_id,
      report,
      uxScore: row.ux_score,
      complexityScore: row.complexity_score,
      createdAt: row.created_at,
    };
  }

  // ============================================
  // Comparison snapshots
  // ============================================

  createComparisonSnapshot(explorationId: string, name?: string): ComparisonSnapshot {
    const exploration = this.getExploration(explorationId);
    const result = this.getResult(explorationId);
    if (!exploration || !result) {
      throw new StoreError(`No completed result to snapshot for exploration ${explorationId}`);
    }

    const keyMetrics: JsonObject = {};
    for (const block of KEY_METRIC_BLOCKS) {
      const value = result.report[block];
      if (value !== undefined) {
        keyMetrics[block] = value;
      }
    }

    const createdAt = now();
    const snapshotName = name || `${exploration.appName} - ${createdAt.slice(0, 10)}`;

    const inserted = this.run('create comparison snapshot', () =>
      this.db.prepare<{
        exploration_id: string; snapshot_name: string; app_name: string; category: string; persona: string;
        ux_score: number; complexity_score: number; key_metrics: string; created_at: string;
      }>(`
        INSERT INTO comparison_snapshots (exploration_id, snapshot_name, app_name, category, persona,
          ux_score, complexity_score, key_metrics, created_at)
        VALUES (@exploration_id, @snapshot_name, @app_name, @category, @persona,
          @ux_score, @complexity_score, @key_metrics, @created_at)
      `).run({
        exploration_id: explorationId,
        snapshot_name: snapshotName,
        app_name: exploration.appName,
        category: exploration.category,
        persona: exploration.persona,
        ux_score: result.uxScore,
        complexity_score: result.complexityScore,
        key_metrics: JSON.stringify(keyMetrics),
        created_at: createdAt,
      })
    );

    return {
      id: Number(inserted.lastInsertRowid),
      explorationId,
      snapshotName,
      appName: exploration.appName,
      category: exploration.category,
      persona: exploration.persona,
      uxScore: result.uxScore,
      complexityScore: result.complexityScore,
      keyMetrics,
      createdAt,
    };
  }

  /**
   * Comparison snapshots, best UX score first.
   */
  getComparisonData(filter: ComparisonFilter = {}): ComparisonSnapshot[] {
    const clauses: string[] = [];
    const params: string[] = [];
    if (filter.category) {
      clauses.push('category = ?');
      params.push(filter.category);
    }
    if (filter.persona) {
      clauses.push('persona = ?');
      params.push(filter.persona);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';

    const rows = this.run('read comparison data', () =>
      this.db.prepare<string[], SnapshotRow>(
        `SELECT * FROM comparison_snapshots ${where} ORDER BY ux_score DESC, created_at DESC`
      ).all(...params)
    );

    return rows.map(row => ({
      id: row.id,
      explorationId: row.exploration_id,
      snapshotName: row.snapshot_name,
      appName: row.app_name,
      category: row.category,
      persona: row.persona,
      uxScore: row.ux_score,
      complexityScore: row.complexity_score,
      keyMetrics: parseJsonColumn(row.key_metrics) ?? {},
      createdAt: row.created_at,
    }));
  }
}

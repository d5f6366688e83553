// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Prompt Template Store
 *
 * Loads keyed text templates from disk and substitutes {{name}}
 * placeholders. Templates in an override directory shadow the bundled
 * ones file by file.
 */

import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../logger.js';
import { MissingPlaceholderError, TemplateNotFoundError } from '../errors.js';
import { UxplorePaths } from '../paths.js';

/** Values substituted into a template. */
export type Substitutions = Record<string, string | number>;

const PLACEHOLDER_PATTERN = /\{\{\s*([A-Za-z0-9_]+)\s*\}\}/g;
const TEMPLATE_EXTENSION = '.txt';

export interface PromptStoreOptions {
  /** Directories searched in order; the first match wins. */
  directories?: string[];
}

/**
 * Read-only template store backed by .txt files.
 */
export class PromptStore {
  private directories: string[];
  private cache = new Map<string, string>();

  constructor(options: PromptStoreOptions = {}) {
    this.directories = options.directories ?? [UxplorePaths.userPrompts(), UxplorePaths.bundledPrompts()];
  }

  /**
   * Build a store whose override directory is checked before the bundled templates.
   */
  static withOverrides(overrideDir: string | undefined): PromptStore {
    const directories = overrideDir
      ? [overrideDir, UxplorePaths.bundledPrompts()]
      : [UxplorePaths.userPrompts(), UxplorePaths.bundledPrompts()];
    return new PromptStore({ directories });
  }

  /**
   * Get the raw text of a template by name (with or without .txt).
   */
  getTemplate(name: string): string {
    const key = name.endsWith(TEMPLATE_EXTENSION) ? name.slice(0, -TEMPLATE_EXTENSION.length) : name;
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return cached;
    }

    for (const dir of this.directories) {
      const filePath = path.join(dir, key + TEMPLATE_EXTENSION);
      if (fs.existsSync(filePath)) {
        const content = fs.readFileSync(filePath, 'utf-8');
        logger.debug(`Loaded prompt template ${key} from ${filePath}`);
        this.cache.set(key, content);
        return content;
      }
    }

    throw new TemplateNotFoundError(key, this.directories);
  }

  /**
   * Substitute every {{name}} placeholder in a template.
   * @throws MissingPlaceholderError when a placeholder has no value
   */
  render(template: string, substitutions: Substitutions, templateName: string = '<inline>'): string {
    return template.replace(PLACEHOLDER_PATTERN, (_match, key: string) => {
      if (!Object.prototype.hasOwnProperty.call(substitutions, key)) {
        throw new MissingPlaceholderError(key, templateName);
      }
      return String(substitutions[key]);
    });
  }

  /**
   * Load and render a template in one step.
   */
  renderTemplate(name: string, substitutions: Substitutions): string {
    return this.render(this.getTemplate(name), substitutions, name);
  }

  /**
   * List the placeholder names a template uses, in first-use order.
   */
  placeholders(template: string): string[] {
    const names = new Set<string>();
    for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
      names.add(match[1]);
    }
    return [...names];
  }
}

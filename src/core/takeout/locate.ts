// src/core/takeout/locate.ts
import * as path from 'path';
import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import { FileNotFoundError } from '../errors.js';
import { WATCH_HISTORY_FILENAME } from '../config/constants.js';

// Extracted bundle directories are named after the archive, e.g. takeout-20181120T163352Z-001
const BUNDLE_DIR_RE = /^takeout-2\d{7}T\d{6}Z-\d{3}$/;
const HISTORY_FILE_RE = /^watch-history.*\.html$/;

export interface LocateResult {
  files: string[];
  warnings: string[];
}

/**
 * Find watch-history files in a takeout directory, oldest first by name.
 *
 * Files placed directly in the directory win; bundle directories are only
 * searched when there are none.
 */
export async function locateWatchHistoryFiles(takeoutDir: string): Promise<LocateResult> {
  if (!existsSync(takeoutDir)) {
    throw new FileNotFoundError(takeoutDir);
  }

  const stat = await fs.stat(takeoutDir);
  if (stat.isFile()) {
    return { files: [takeoutDir], warnings: [] };
  }

  const names = (await fs.readdir(takeoutDir)).sort();

  const direct = names.filter((name) => HISTORY_FILE_RE.test(name));
  if (direct.length > 0) {
    return { files: direct.map((name) => path.join(takeoutDir, name)), warnings: [] };
  }

  const files: string[] = [];
  const warnings: string[] = [];
  for (const name of names.filter((n) => BUNDLE_DIR_RE.test(n))) {
    const candidate = path.join(takeoutDir, name, 'Takeout', 'YouTube', 'history', WATCH_HISTORY_FILENAME);
    if (existsSync(candidate)) {
      files.push(candidate);
    } else {
      warnings.push(`Expected ${WATCH_HISTORY_FILENAME} in ${name}, found none`);
    }
  }

  return { files, warnings };
}

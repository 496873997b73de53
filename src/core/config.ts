import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { createLogger, Logger } from './log';
import { configPath, DATA_DIR, IGNORE_FILE } from './paths';

export interface RefGraphConfig {
  /** Directory names skipped anywhere in the tree. */
  ignoreDirs: string[];
  /** Extra glob patterns (from .refgraphignore), relative to the repo root. */
  ignorePatterns: string[];
  docMaxChars: number;
  valueMaxChars: number;
  /** Names shorter than this never enter the cross-reference map. */
  minSymbolLength: number;
  maxChunkChars: number;
  maxCandidateFiles: number;
}

export const ConfigFileSchema = z.object({
  ignoreDirs: z.array(z.string().min(1)).optional(),
  docMaxChars: z.number().int().positive().optional(),
  valueMaxChars: z.number().int().positive().optional(),
  minSymbolLength: z.number().int().min(1).optional(),
  maxChunkChars: z.number().int().positive().optional(),
  maxCandidateFiles: z.number().int().positive().optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export function defaultConfig(): RefGraphConfig {
  return {
    ignoreDirs: ['.git', '.venv', '__pycache__', 'node_modules', 'dist', 'build', DATA_DIR],
    ignorePatterns: [],
    docMaxChars: 200,
    valueMaxChars: 80,
    minSymbolLength: 2,
    maxChunkChars: 3000,
    maxCandidateFiles: 20,
  };
}

export function mergeConfig(overrides?: ConfigFile, ignorePatterns: string[] = []): RefGraphConfig {
  const defaults = defaultConfig();
  if (!overrides) return { ...defaults, ignorePatterns };
  return {
    ignoreDirs: overrides.ignoreDirs ?? defaults.ignoreDirs,
    ignorePatterns,
    docMaxChars: overrides.docMaxChars ?? defaults.docMaxChars,
    valueMaxChars: overrides.valueMaxChars ?? defaults.valueMaxChars,
    minSymbolLength: overrides.minSymbolLength ?? defaults.minSymbolLength,
    maxChunkChars: overrides.maxChunkChars ?? defaults.maxChunkChars,
    maxCandidateFiles: overrides.maxCandidateFiles ?? defaults.maxCandidateFiles,
  };
}

/** gitignore-like lines to glob patterns; negations are not supported. */
export function parseIgnorePatterns(raw: string): string[] {
  return raw
    .split('\n')
    .map(l => l.trim())
    .map((l) => {
      if (l.length === 0) return null;
      if (l.startsWith('#')) return null;
      if (l.startsWith('!')) return null;
      const withoutLeadingSlash = l.startsWith('/') ? l.slice(1) : l;
      if (withoutLeadingSlash.endsWith('/')) return `${withoutLeadingSlash}**`;
      return withoutLeadingSlash;
    })
    .filter((l): l is string => Boolean(l));
}

function readIgnoreFile(repoRoot: string, log: Logger): string[] {
  const ignorePath = path.join(repoRoot, IGNORE_FILE);
  if (!fs.existsSync(ignorePath)) return [];
  try {
    return parseIgnorePatterns(fs.readFileSync(ignorePath, 'utf-8'));
  } catch (e) {
    log.warn('ignore_file_unreadable', { file: ignorePath, err: e instanceof Error ? e.message : String(e) });
    return [];
  }
}

/**
 * Defaults merged with `.refgraph/config.json` and `.refgraphignore`. An
 * unreadable or invalid file is reported and ignored.
 */
export function loadConfig(repoRoot: string): RefGraphConfig {
  const log = createLogger({ component: 'config' });
  const ignorePatterns = readIgnoreFile(repoRoot, log);
  const file = configPath(repoRoot);
  if (!fs.existsSync(file)) return mergeConfig(undefined, ignorePatterns);

  try {
    const parsed = ConfigFileSchema.safeParse(JSON.parse(fs.readFileSync(file, 'utf-8')));
    if (!parsed.success) {
      log.warn('config_invalid', {
        file,
        issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
      });
      return mergeConfig(undefined, ignorePatterns);
    }
    return mergeConfig(parsed.data, ignorePatterns);
  } catch (e) {
    log.warn('config_unreadable', { file, err: e instanceof Error ? e.message : String(e) });
    return mergeConfig(undefined, ignorePatterns);
  }
}

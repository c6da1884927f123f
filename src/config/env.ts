import { existsSync, readFileSync, realpathSync } from 'node:fs';
import { dirname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import { parse } from 'dotenv';
import type { DirectoryRole, PathSegments } from '../layout/types.js';
import { LOCATOR_QUALIFIER_VARIABLE } from '../rules/catalog.js';
import { ConfigError } from '../utils/errors.js';

export interface LintConfig {
  pathSegments: PathSegments;
  /** Null when LOCATOR_CLASS_PATH is unset; the locator rule then fails closed. */
  locatorQualifier: string | null;
  /** Null when REPOSITORY_NAME is unset; any repository is accepted. */
  repositoryName: string | null;
}

export const PATH_VARIABLES: Readonly<Record<DirectoryRole, string>> = {
  Features: 'FEATURES_PATH',
  Interactions: 'INTERACTIONS_PATH',
  Pages: 'PAGES_PATH',
  Steps: 'STEPS_PATH',
};

export const REPOSITORY_NAME_VARIABLE = 'REPOSITORY_NAME';

type Env = Record<string, string | undefined>;

/**
 * Directories from `startDir` up to `projectRoot`, nearest first, with
 * symlinks resolved. Only `startDir` itself when it lies outside the project.
 */
export function envFileDirs(startDir: string, projectRoot: string): string[] {
  // git reports the resolved root; compare like with like
  const start = realpathSync(resolve(startDir));
  const root = realpathSync(resolve(projectRoot));
  const rel = relative(root, start);
  if (rel === '..' || rel.startsWith('..' + sep) || isAbsolute(rel)) return [start];

  const dirs = [start];
  let current = start;
  while (current !== root) {
    current = dirname(current);
    dirs.push(current);
  }
  return dirs;
}

/**
 * Load every `.env` between `startDir` and `projectRoot` into `env`.
 * Values already set win, so the nearest file and the real environment
 * take precedence. Returns the files that were read.
 */
export function loadEnvFiles(
  startDir: string,
  projectRoot: string,
  env: Env = process.env,
): string[] {
  const loaded: string[] = [];
  for (const dir of envFileDirs(startDir, projectRoot)) {
    const path = join(dir, '.env');
    if (!existsSync(path)) continue;

    for (const [key, value] of Object.entries(parse(readFileSync(path)))) {
      if (env[key] === undefined) {
        env[key] = value;
      }
    }
    loaded.push(path);
  }
  return loaded;
}

function optional(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

/**
 * Read the per-role path segments and the optional settings.
 * Every missing path variable is reported at once.
 */
export function loadConfig(env: Env = process.env): LintConfig {
  const missing: string[] = [];
  const segment = (role: DirectoryRole): string => {
    const name = PATH_VARIABLES[role];
    const value = env[name];
    if (!value) {
      missing.push(name);
      return '';
    }
    return value;
  };

  const pathSegments: PathSegments = {
    Features: segment('Features'),
    Interactions: segment('Interactions'),
    Pages: segment('Pages'),
    Steps: segment('Steps'),
  };

  if (missing.length > 0) {
    throw new ConfigError(`Missing environment variable(s): ${missing.join(', ')}`, missing);
  }

  return {
    pathSegments,
    locatorQualifier: optional(env, LOCATOR_QUALIFIER_VARIABLE),
    repositoryName: optional(env, REPOSITORY_NAME_VARIABLE),
  };
}

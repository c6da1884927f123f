import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { LayoutError } from '../utils/errors.js';
import {
  DIRECTORY_ROLES,
  type PathSegments,
  type ProjectLayout,
  type Subdirectory,
} from './types.js';

export function normalizeFeatureName(raw: string): string {
  return raw.trim().toLowerCase();
}

/**
 * Resolve the four role directories of a feature:
 * `<projectRoot>/<segment for role>/<feature>`.
 *
 * Throws a LayoutError naming the first directory that does not exist.
 */
export function resolveProjectLayout(
  projectRoot: string,
  featureName: string,
  segments: PathSegments,
): ProjectLayout {
  const feature = normalizeFeatureName(featureName);
  if (!feature) {
    throw new LayoutError('Feature name must not be empty');
  }

  const subdirectories: Subdirectory[] = [];
  for (const role of DIRECTORY_ROLES) {
    const path = join(projectRoot, segments[role], feature);
    if (!existsSync(path)) {
      throw new LayoutError(`Could not locate ${path}`, { path, role });
    }
    subdirectories.push({ path, role });
  }

  return { feature, subdirectories };
}

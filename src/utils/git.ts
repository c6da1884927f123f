import { execFileSync } from 'node:child_process';
import { basename } from 'node:path';
import { ProjectRootError, errorMessage } from './errors.js';

// execFileSync attaches the child's stderr to the thrown error.
function gitFailureText(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'stderr' in err && typeof err.stderr === 'string') {
    const stderr = err.stderr.trim();
    if (stderr) return stderr;
  }
  return errorMessage(err);
}

/**
 * Top-level directory of the git work tree containing `startDir`.
 */
export function getProjectRoot(startDir: string): string {
  let output: string;
  try {
    output = execFileSync('git', ['rev-parse', '--show-toplevel'], {
      cwd: startDir,
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'pipe'],
    });
  } catch (err) {
    throw new ProjectRootError(
      `Could not run command 'git rev-parse --show-toplevel' in ${startDir}: ${gitFailureText(err)}`,
      startDir,
      { cause: err },
    );
  }

  const root = output.trim();
  if (!root) {
    throw new ProjectRootError(`git returned no project root for ${startDir}`, startDir);
  }
  return root;
}

/**
 * Refuse to lint a checkout other than the expected repository.
 * No check when `expectedName` is null.
 */
export function assertRepository(projectRoot: string, expectedName: string | null): void {
  if (!expectedName) return;
  if (!projectRoot.endsWith(expectedName)) {
    throw new ProjectRootError(
      `Not in the correct repository: expected ${expectedName}, found ${basename(projectRoot)}`,
      projectRoot,
    );
  }
}

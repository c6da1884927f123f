import { readdirSync, readFileSync, type Dirent } from 'node:fs';
import { extname, join } from 'node:path';
import type { Subdirectory } from '../layout/types.js';
import type { Rule, RuleOutcomes } from '../rules/types.js';
import type { RuleSet } from '../rules/rule-set.js';
import { ScanError, errorMessage } from '../utils/errors.js';

export const ELIGIBLE_EXTENSIONS: ReadonlySet<string> = new Set(['feature', 'java', 'js']);

export type ScanResult =
  | {
      kind: 'no-rules';
      subdirectory: Subdirectory;
    }
  | {
      kind: 'scanned';
      subdirectory: Subdirectory;
      /** Applicable rules, in rule set order. */
      rules: Rule[];
      outcomes: RuleOutcomes;
      filesScanned: number;
    };

export function isEligibleFile(fileName: string): boolean {
  return ELIGIBLE_EXTENSIONS.has(extname(fileName).slice(1));
}

function listEntries(dirPath: string): Dirent[] {
  try {
    return readdirSync(dirPath, { withFileTypes: true });
  } catch (err) {
    throw new ScanError(`Could not read directory ${dirPath}: ${errorMessage(err)}`, dirPath, { cause: err });
  }
}

function readSource(filePath: string): string {
  try {
    return readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ScanError(`Could not read file ${filePath}: ${errorMessage(err)}`, filePath, { cause: err });
  }
}

/**
 * Check every eligible file of one directory against the rules for its role.
 * An outcome starts compliant and flips to non-compliant on the first failing
 * file; it never flips back.
 */
export function scanSubdirectory(subdirectory: Subdirectory, ruleSet: RuleSet): ScanResult {
  const rules = ruleSet.forRole(subdirectory.role);
  if (rules.length === 0) {
    return { kind: 'no-rules', subdirectory };
  }

  const outcomes: RuleOutcomes = new Map();
  for (const rule of rules) {
    outcomes.set(rule.name, true);
  }

  // Sort for deterministic ordering
  const entries = listEntries(subdirectory.path)
    .filter((entry) => !entry.isDirectory() && isEligibleFile(entry.name))
    .sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const text = readSource(join(subdirectory.path, entry.name));
    for (const rule of rules) {
      if (!rule.evaluate(text)) {
        outcomes.set(rule.name, false);
      }
    }
  }

  return { kind: 'scanned', subdirectory, rules, outcomes, filesScanned: entries.length };
}

export function hasFailures(result: ScanResult): boolean {
  if (result.kind === 'no-rules') return false;
  return [...result.outcomes.values()].some((passed) => !passed);
}

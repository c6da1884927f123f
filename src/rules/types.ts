import type { DirectoryRole } from '../layout/types.js';

// === Rule ===

export interface Rule {
  /** Human-readable name; also the key of the rule's outcome. */
  readonly name: string;
  /** Roles of the directories this rule is checked in. Never empty. */
  readonly roles: ReadonlySet<DirectoryRole>;
  /** Returns true when the file text complies with the rule. */
  evaluate(text: string): boolean;
}

/** Rule name → compliant across every eligible file of one directory. */
export type RuleOutcomes = Map<string, boolean>;

export type DiagnosticSink = (message: string) => void;

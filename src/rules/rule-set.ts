import type { DirectoryRole } from '../layout/types.js';
import type { Rule } from './types.js';

/**
 * Build a rule from a predicate. Rejects empty names and empty role lists,
 * since such a rule could never be reported.
 */
export function defineRule(
  name: string,
  roles: Iterable<DirectoryRole>,
  predicate: (text: string) => boolean,
): Rule {
  const roleSet: ReadonlySet<DirectoryRole> = new Set(roles);
  if (!name.trim()) {
    throw new Error('Rule name must not be empty');
  }
  if (roleSet.size === 0) {
    throw new Error(`Rule "${name}" must apply to at least one directory role`);
  }
  return { name, roles: roleSet, evaluate: predicate };
}

export function appliesTo(rule: Rule, role: DirectoryRole): boolean {
  return rule.roles.has(role);
}

/**
 * Ordered rule collection. Insertion order is the reporting order.
 * Names are not checked for uniqueness.
 */
export class RuleSet implements Iterable<Rule> {
  private readonly rules: Rule[] = [];

  constructor(rules: Iterable<Rule> = []) {
    for (const rule of rules) {
      this.add(rule);
    }
  }

  add(rule: Rule): this {
    this.rules.push(rule);
    return this;
  }

  get size(): number {
    return this.rules.length;
  }

  all(): readonly Rule[] {
    return [...this.rules];
  }

  forRole(role: DirectoryRole): Rule[] {
    return this.rules.filter((rule) => appliesTo(rule, role));
  }

  [Symbol.iterator](): Iterator<Rule> {
    return this.rules[Symbol.iterator]();
  }
}

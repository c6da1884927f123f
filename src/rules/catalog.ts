import type { DiagnosticSink, Rule } from './types.js';
import { RuleSet, defineRule } from './rule-set.js';
import { bodyLines, headerLines, trimmedLines, withoutComments } from './lines.js';

export const LOCATOR_QUALIFIER_VARIABLE = 'LOCATOR_CLASS_PATH';

export interface CatalogOptions {
  /** Prefix of the import that pulls in the locator class. Null when not configured. */
  locatorQualifier: string | null;
  /** Receives configuration diagnostics emitted while rules evaluate. */
  onDiagnostic?: DiagnosticSink;
}

/** Non-comment lines of the class body. */
function codeBody(text: string): string[] {
  return withoutComments(bodyLines(trimmedLines(text)));
}

export function logInsteadOfSoutRule(): Rule {
  return defineRule(
    'Log instead of sout',
    ['Interactions', 'Pages', 'Steps'],
    (text) => codeBody(text).every((line) => !line.startsWith('System.out.print')),
  );
}

export function noAssertCallsRule(): Rule {
  return defineRule(
    'No assert calls',
    ['Steps'],
    (text) => codeBody(text).every((line) => !line.includes('assert')),
  );
}

/**
 * Steps and interactions must reach elements through pages, so the locator
 * class may not be imported. Fails closed when the qualifier is not configured.
 */
export function noLocatorCallsRule(
  locatorQualifier: string | null,
  onDiagnostic: DiagnosticSink = () => {},
): Rule {
  return defineRule(
    'No locator calls',
    ['Steps', 'Interactions'],
    (text) => {
      if (!locatorQualifier) {
        onDiagnostic(`Could not find variable ${LOCATOR_QUALIFIER_VARIABLE}`);
        return false;
      }
      const header = withoutComments(headerLines(trimmedLines(text)));
      return header.every((line) => !line.startsWith(locatorQualifier));
    },
  );
}

export function platformLocatorMethodsRule(): Rule {
  return defineRule(
    'Use platform Locator methods',
    ['Pages'],
    (text) =>
      codeBody(text)
        .filter((line) => line.includes('Locator.'))
        .every((line) => line.includes('Platform') || line.includes('Children')),
  );
}

export function buildDefaultRuleSet(options: CatalogOptions): RuleSet {
  return new RuleSet([
    logInsteadOfSoutRule(),
    noAssertCallsRule(),
    noLocatorCallsRule(options.locatorQualifier, options.onDiagnostic),
    platformLocatorMethodsRule(),
  ]);
}

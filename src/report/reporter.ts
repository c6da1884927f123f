import type { ScanResult } from '../scanner/scanner.js';
import { fail, pass } from '../ui/format.js';

export type LineWriter = (line: string) => void;

export const NO_RULES_LINE = '  # No rules for this directory';

export function formatHeader(result: ScanResult): string {
  const { role, path } = result.subdirectory;
  return `${role} (${path}):`;
}

/**
 * Report block for one directory: a header, then either the no-rules marker
 * or one PASS/FAIL line per applicable rule in rule set order.
 */
export function renderReport(result: ScanResult): string[] {
  const lines = [formatHeader(result)];

  if (result.kind === 'no-rules') {
    lines.push(NO_RULES_LINE);
    return lines;
  }

  for (const rule of result.rules) {
    const passed = result.outcomes.get(rule.name) ?? false;
    lines.push(`  - ${rule.name}: ${passed ? pass('PASS') : fail('FAIL')}`);
  }
  return lines;
}

export function printReport(result: ScanResult, write: LineWriter = console.log): void {
  for (const line of renderReport(result)) {
    write(line);
  }
}

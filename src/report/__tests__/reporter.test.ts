import { describe, it, expect, vi } from 'vitest';
import { NO_RULES_LINE, printReport, renderReport } from '../reporter.js';
import { defineRule } from '../../rules/rule-set.js';
import { stripAnsi } from '../../ui/format.js';
import type { ScanResult } from '../../scanner/scanner.js';

const first = defineRule('First rule', ['Pages'], () => true);
const second = defineRule('Second rule', ['Pages'], () => true);

function plain(lines: string[]): string[] {
  return lines.map(stripAnsi);
}

describe('renderReport', () => {
  it('prints the no-rules marker and nothing else', () => {
    const result: ScanResult = {
      kind: 'no-rules',
      subdirectory: { role: 'Features', path: '/repo/features/login' },
    };

    expect(plain(renderReport(result))).toEqual([
      'Features (/repo/features/login):',
      '  # No rules for this directory',
    ]);
    expect(NO_RULES_LINE).toBe('  # No rules for this directory');
  });

  it('prints one line per rule in rule order', () => {
    const result: ScanResult = {
      kind: 'scanned',
      subdirectory: { role: 'Pages', path: '/repo/pages/login' },
      rules: [second, first],
      outcomes: new Map([
        ['First rule', true],
        ['Second rule', false],
      ]),
      filesScanned: 2,
    };

    expect(plain(renderReport(result))).toEqual([
      'Pages (/repo/pages/login):',
      '  - Second rule: FAIL',
      '  - First rule: PASS',
    ]);
  });
});

describe('printReport', () => {
  it('writes each line through the given writer', () => {
    const write = vi.fn();
    const result: ScanResult = {
      kind: 'no-rules',
      subdirectory: { role: 'Features', path: '/repo/f' },
    };

    printReport(result, write);

    expect(write).toHaveBeenCalledTimes(2);
    expect(stripAnsi(write.mock.calls[0][0])).toBe('Features (/repo/f):');
  });
});

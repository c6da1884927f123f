import type { LintConfig } from '../config/env.js';
import type { ProjectLayout } from '../layout/types.js';
import { resolveProjectLayout } from '../layout/resolver.js';
import { buildDefaultRuleSet } from '../rules/catalog.js';
import type { RuleSet } from '../rules/rule-set.js';
import { hasFailures, scanSubdirectory, type ScanResult } from '../scanner/scanner.js';
import { printReport, type LineWriter } from '../report/reporter.js';
import { errorMessage } from '../utils/errors.js';
import { printError, printWarning } from '../utils/logger.js';

export interface LintRequest {
  projectRoot: string;
  feature: string;
  config: LintConfig;
  /** Exit non-zero when any rule fails. Off by default: FAIL lines are informational. */
  strict?: boolean;
  /** Replaces the built-in catalog. */
  ruleSet?: RuleSet;
}

export interface LintIO {
  /** Report lines. */
  out: LineWriter;
  /** Fatal errors. */
  error: LineWriter;
  /** Rule diagnostics (e.g. missing locator qualifier). */
  warn: LineWriter;
}

export interface LintRunResult {
  exitCode: number;
  layout: ProjectLayout | null;
  results: ScanResult[];
}

const defaultIO: LintIO = {
  out: (line) => console.log(line),
  error: printError,
  warn: printWarning,
};

/**
 * Resolve the feature's layout, then scan and report each directory in role
 * order. Any error stops the run with exit code 1. Rule failures do not
 * affect the exit code unless `strict` is set.
 */
export function runLint(request: LintRequest, io: LintIO = defaultIO): LintRunResult {
  let layout: ProjectLayout;
  try {
    layout = resolveProjectLayout(request.projectRoot, request.feature, request.config.pathSegments);
  } catch (err) {
    io.error(`Problem initialising: ${errorMessage(err)}`);
    return { exitCode: 1, layout: null, results: [] };
  }

  const ruleSet = request.ruleSet ?? buildDefaultRuleSet({
    locatorQualifier: request.config.locatorQualifier,
    onDiagnostic: io.warn,
  });

  const results: ScanResult[] = [];
  for (const subdirectory of layout.subdirectories) {
    try {
      const result = scanSubdirectory(subdirectory, ruleSet);
      printReport(result, io.out);
      results.push(result);
    } catch (err) {
      io.error(`Application error: ${errorMessage(err)}`);
      return { exitCode: 1, layout, results };
    }
  }

  const failed = results.some(hasFailures);
  return { exitCode: request.strict && failed ? 1 : 0, layout, results };
}

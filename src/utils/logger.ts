import { buildBanner } from '../ui/banner.js';
import { error, tertiary, treeCont, warn } from '../ui/format.js';

// Everything here goes to stderr; stdout is reserved for the report.

export function printBanner(feature: string, projectRoot: string): void {
  for (const line of buildBanner(feature, projectRoot)) {
    console.error(line);
  }
  console.error();
}

export function printWarning(message: string): void {
  console.error(warn(message));
}

export function printError(message: string): void {
  console.error(error(message));
}

export function printVerbose(message: string): void {
  console.error(treeCont(tertiary(message)));
}

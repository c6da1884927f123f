import { brand, color, box } from './theme.js';
import { shortPath, stripAnsi } from './format.js';
import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);
const { version: VERSION } = require('../../package.json') as { version: string };

export { VERSION };

const MIN_WIDTH = 48;

/**
 * Boxed run header shown with --verbose:
 *
 *   ╭─ featurelint v0.1.0 ──────────────────────────╮
 *   │ Feature  login                                 │
 *   │ Root     ~/work/shop-tests                     │
 *   ╰────────────────────────────────────────────────╯
 */
export function buildBanner(feature: string, projectRoot: string): string[] {
  const rows = [
    `${color.secondary('Feature')}  ${color.bold(feature.toLowerCase())}`,
    `${color.secondary('Root   ')}  ${color.file(shortPath(projectRoot))}`,
  ];
  const title = `featurelint v${VERSION}`;

  // inner width excludes the two border columns
  const width = Math.max(MIN_WIDTH, title.length + 4, ...rows.map((r) => stripAnsi(r).length + 2));
  const frame = color.tertiary;

  const top =
    frame(`${box.tl}${box.h} `) +
    brand.green(title) +
    frame(` ${box.h.repeat(width - title.length - 3)}${box.tr}`);
  const body = rows.map((row) => {
    const pad = width - stripAnsi(row).length - 1;
    return `${frame(box.v)} ${row}${' '.repeat(pad)}${frame(box.v)}`;
  });
  const bottom = frame(`${box.bl}${box.h.repeat(width)}${box.br}`);

  return [top, ...body, bottom];
}

const TYPE_DECLARATION_MARKER = 'public class';
const COMMENT_PREFIX = '//';

/** Split on LF or CRLF and trim every line. */
export function trimmedLines(text: string): string[] {
  return text.split(/\r?\n/).map((line) => line.trim());
}

export function isCommentLine(line: string): boolean {
  return line.startsWith(COMMENT_PREFIX);
}

export function isTypeDeclaration(line: string): boolean {
  return line.startsWith(TYPE_DECLARATION_MARKER);
}

/**
 * Lines from the first type declaration onwards (the declaration included).
 * Empty when the file declares no type.
 */
export function bodyLines(lines: string[]): string[] {
  const start = lines.findIndex(isTypeDeclaration);
  return start === -1 ? [] : lines.slice(start);
}

/**
 * Lines before the first type declaration: package, imports, header comments.
 * The whole file when it declares no type.
 */
export function headerLines(lines: string[]): string[] {
  const end = lines.findIndex(isTypeDeclaration);
  return end === -1 ? lines : lines.slice(0, end);
}

export function withoutComments(lines: string[]): string[] {
  return lines.filter((line) => !isCommentLine(line));
}

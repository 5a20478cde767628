/**
 * @fileoverview Unified diff rendering
 *
 * Produces a single-hunk unified diff spanning the first to the last changed
 * line, with a few lines of context on each side.
 */

const DEFAULT_CONTEXT_LINES = 3;

function toLines(text: string): string[] {
  if (text === '') return [];
  return text.replace(/\n$/, '').split('\n');
}

function isBinary(content: Buffer): boolean {
  return content.includes(0);
}

/**
 * Render the hunk between two texts. Returns '' when they are equal.
 */
export function renderHunk(oldText: string, newText: string, contextLines = DEFAULT_CONTEXT_LINES): string {
  const oldLines = toLines(oldText);
  const newLines = toLines(newText);

  let prefix = 0;
  while (prefix < oldLines.length && prefix < newLines.length && oldLines[prefix] === newLines[prefix]) {
    prefix++;
  }

  let suffix = 0;
  while (
    suffix < oldLines.length - prefix &&
    suffix < newLines.length - prefix &&
    oldLines[oldLines.length - 1 - suffix] === newLines[newLines.length - 1 - suffix]
  ) {
    suffix++;
  }

  const oldChangedEnd = oldLines.length - suffix;
  const newChangedEnd = newLines.length - suffix;
  if (prefix === oldChangedEnd && prefix === newChangedEnd) {
    return '';
  }

  const contextStart = Math.max(0, prefix - contextLines);
  const contextAfter = Math.min(suffix, contextLines);
  const oldCount = oldChangedEnd - contextStart + contextAfter;
  const newCount = newChangedEnd - contextStart + contextAfter;
  // An empty side is addressed by the line before it
  const oldStart = oldCount === 0 ? contextStart : contextStart + 1;
  const newStart = newCount === 0 ? contextStart : contextStart + 1;

  const lines = [`@@ -${oldStart},${oldCount} +${newStart},${newCount} @@`];
  for (let i = contextStart; i < prefix; i++) {
    lines.push(` ${oldLines[i]}`);
  }
  for (let i = prefix; i < oldChangedEnd; i++) {
    lines.push(`-${oldLines[i]}`);
  }
  for (let i = prefix; i < newChangedEnd; i++) {
    lines.push(`+${newLines[i]}`);
  }
  for (let i = oldChangedEnd; i < oldChangedEnd + contextAfter; i++) {
    lines.push(` ${oldLines[i]}`);
  }
  return lines.join('\n');
}

/**
 * Unified diff of one file. `null` content means the file does not exist on
 * that side.
 */
export function unifiedDiff(path: string, before: Buffer | null, after: Buffer | null): string {
  const fromLabel = before === null ? '/dev/null' : `a/${path}`;
  const toLabel = after === null ? '/dev/null' : `b/${path}`;

  if ((before && isBinary(before)) || (after && isBinary(after))) {
    return `Binary files ${fromLabel} and ${toLabel} differ`;
  }

  const hunk = renderHunk(before?.toString('utf-8') ?? '', after?.toString('utf-8') ?? '');
  return [`--- ${fromLabel}`, `+++ ${toLabel}`, hunk].filter(line => line !== '').join('\n');
}

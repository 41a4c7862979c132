import { structuredPatch } from "diff";

export const TRUNCATION_MARKER = "... (diff truncated) ...";
const CONTEXT_LINES = 3;

// Every line of a normalized snapshot ends in a newline; an empty snapshot has no lines
function asPatchInput(text: string): string {
  return text === "" ? "" : `${text}\n`;
}

// "\ No newline at end of file" markers describe the encoding, not the page
function isContentLine(line: string): boolean {
  return !line.startsWith("\\");
}

/**
 * Keep the first floor(max/2) and last max - floor(max/2) lines of an
 * oversized diff, with a single marker between them.
 */
export function truncateLines(lines: string[], maxLines: number): string[] {
  if (lines.length <= maxLines) return lines;
  const headCount = Math.floor(maxLines / 2);
  const tailCount = maxLines - headCount;
  return [...lines.slice(0, headCount), TRUNCATION_MARKER, ...lines.slice(lines.length - tailCount)];
}

/**
 * Line-oriented unified diff of two normalized snapshots, bounded to
 * maxLines (+1 for the truncation marker). Empty when the texts are equal.
 */
export function diffTexts(previous: string, current: string, maxLines: number): string {
  if (previous === current) return "";

  const patch = structuredPatch(
    "previous",
    "current",
    asPatchInput(previous),
    asPatchInput(current),
    undefined,
    undefined,
    { context: CONTEXT_LINES },
  );

  const lines: string[] = ["--- previous", "+++ current"];
  for (const hunk of patch.hunks) {
    const oldStart = hunk.oldLines === 0 ? hunk.oldStart - 1 : hunk.oldStart;
    const newStart = hunk.newLines === 0 ? hunk.newStart - 1 : hunk.newStart;
    lines.push(`@@ -${oldStart},${hunk.oldLines} +${newStart},${hunk.newLines} @@`);
    lines.push(...hunk.lines.filter(isContentLine));
  }

  return truncateLines(lines, maxLines).join("\n");
}

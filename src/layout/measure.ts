const MAX_ESTIMATED_WIDTH = 280;
const MAX_ESTIMATED_HEIGHT = 200;
const CHAR_WIDTH = 8;
const LINE_HEIGHT = 22;
const PADDING_X = 20;
const PADDING_Y = 16;

export function labelLines(label: string): string[] {
  const text = label
    .replace(/<br\s*\/?>/giu, "\n")
    .replace(/<[^>]+>/gu, "")
    .replace(/&amp;/gu, "&")
    .replace(/&lt;/gu, "<")
    .replace(/&gt;/gu, ">");

  const lines = text
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);

  if (lines.length > 0) {
    return lines;
  }
  return [text.trim() || "X"];
}

export function estimateNodeSize(
  label: string,
  defaultWidth: number,
  defaultHeight: number,
): { width: number; height: number } {
  const lines = labelLines(label);
  const maxChars = lines.reduce((max, line) => Math.max(max, [...line].length), 0);

  return {
    width: Math.max(defaultWidth, Math.min(MAX_ESTIMATED_WIDTH, maxChars * CHAR_WIDTH + PADDING_X)),
    height: Math.max(defaultHeight, Math.min(MAX_ESTIMATED_HEIGHT, lines.length * LINE_HEIGHT + PADDING_Y)),
  };
}

import type { CodeBlock } from "../types";

export const FENCE = "```";

// "File: x", "**File**: x", "### File: `x`"
const fileAnnotationPattern = /^(?:#{1,6}\s*)?[*_]{0,2}file[*_]{0,2}\s*:\s*(.+)$/i;

const unwrapAnnotationValue = (value: string): string =>
  value
    .trim()
    .replace(/^\*{1,2}|\*{1,2}$/g, "")
    .trim()
    .replace(/^`(.*)`$/, "$1")
    .trim();

export const readFileAnnotation = (line: string): string | undefined => {
  const match = fileAnnotationPattern.exec(line.trim());
  if (!match) return undefined;
  const value = unwrapAnnotationValue(match[1]);
  return value || undefined;
};

const isFence = (line: string): boolean => line.trim().startsWith(FENCE);

// Body lines keep their bytes. In a CRLF document the "\r" ending the last
// body line belongs to the closing fence's line break, not to the body.
const blockBody = (lines: string[], open: number, close: number): string => {
  const body = lines.slice(open + 1, close).join("\n");
  return lines[open].endsWith("\r") && body.endsWith("\r") ? body.slice(0, -1) : body;
};

export const extractCodeBlocks = (markdown: string): CodeBlock[] => {
  const lines = markdown.split("\n");
  const blocks: CodeBlock[] = [];

  let index = 0;
  while (index < lines.length) {
    if (!isFence(lines[index])) {
      index += 1;
      continue;
    }

    const declaredKind = lines[index].trim().slice(FENCE.length).trim();
    const associatedFilePath = index > 0 ? readFileAnnotation(lines[index - 1]) : undefined;

    let close = index + 1;
    while (close < lines.length && !isFence(lines[close])) {
      close += 1;
    }

    const terminated = close < lines.length;
    blocks.push({
      declaredKind,
      ...(associatedFilePath ? { associatedFilePath } : {}),
      body: terminated ? blockBody(lines, index, close) : ""
    });

    index = close + 1;
  }

  return blocks;
};

export const serializeCodeBlock = (block: CodeBlock): string => {
  const fence = `${FENCE}${block.declaredKind}`;
  const annotation = block.associatedFilePath ? `File: ${block.associatedFilePath}\n` : "";
  return `${annotation}${fence}\n${block.body}\n${FENCE}`;
};

/**
 * Picks the block to persist for one target file: the block annotated with
 * that path when present, otherwise the first block.
 */
export const selectBlockForFile = (blocks: CodeBlock[], filePath: string): CodeBlock | undefined => {
  const normalized = filePath.replace(/^\.?\/+/, "");
  return blocks.find((block) => block.associatedFilePath?.replace(/^\.?\/+/, "") === normalized) ?? blocks[0];
};

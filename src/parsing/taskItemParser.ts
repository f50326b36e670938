import type { TaskItem } from "../types";
import fileKinds from "./fileKinds.json";

export const UNCHECKED_TASK_MARKER = "- [ ] T";

export const defaultFileExtensions: readonly string[] = fileKinds.extensions;

const contentKinds: Record<string, string> = fileKinds.contentKinds;

export interface TaskItemParserOptions {
  extensions?: readonly string[];
}

// checkbox, id token, optional [P], description
const taskLinePattern = /^\s*[-*]\s+\[[ xX]\]\s+(T\d+)\b\s*(\[P\])?\s*(.*)$/;
const backtickPattern = /`([^`]+)`/g;
const slashPathPattern = /(?<![\w./-])(?:\.{0,2}\/)?(?:[\w@.-]+\/)+[\w@.-]+/g;

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const bareFilePattern = (extensions: readonly string[]): RegExp | undefined => {
  const alternatives = extensions
    .map((ext) => ext.trim().replace(/^\./, ""))
    .filter(Boolean)
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp);
  if (alternatives.length === 0) return undefined;
  return new RegExp(`(?<![\\w./-])[\\w-][\\w.-]*\\.(?:${alternatives.join("|")})(?![\\w/-])`, "gi");
};

export const looksLikeFilePath = (candidate: string): boolean => {
  const value = candidate.trim();
  if (!value || value.endsWith("/")) return false;
  const finalSegment = value.split("/").pop() ?? "";
  return finalSegment.includes(".");
};

export const inferContentKind = (filePath: string): string => {
  const finalSegment = filePath.split("/").pop() ?? "";
  const dot = finalSegment.lastIndexOf(".");
  if (dot < 0) return "";
  return contentKinds[finalSegment.slice(dot + 1).toLowerCase()] ?? "";
};

const stripTrailingPunctuation = (value: string): string => value.replace(/[.,;:!?)]+$/, "");

const collectMatches = (pattern: RegExp, text: string): Array<{ index: number; value: string }> =>
  [...text.matchAll(pattern)].map((match) => ({ index: match.index ?? 0, value: match[1] ?? match[0] }));

const backtickCandidates = (line: string): string[] =>
  collectMatches(backtickPattern, line)
    .map((match) => match.value.trim())
    .filter(looksLikeFilePath);

const heuristicCandidates = (description: string, barePattern: RegExp | undefined): string[] => {
  const unquoted = description.replace(/`/g, " ");
  const matches = [
    ...collectMatches(slashPathPattern, unquoted),
    ...(barePattern ? collectMatches(barePattern, unquoted) : [])
  ].sort((a, b) => a.index - b.index);

  const seen = new Set<string>();
  const candidates: string[] = [];
  for (const match of matches) {
    const value = stripTrailingPunctuation(match.value);
    if (seen.has(value) || !looksLikeFilePath(value)) continue;
    seen.add(value);
    candidates.push(value);
  }
  return candidates;
};

/**
 * Resolves the single target file of one task line. Backtick spans win over
 * the free-text heuristics; among the candidates the last one on the line is
 * taken ("create X in `path`").
 */
export const resolveTaskFilePath = (
  line: string,
  description: string,
  options: TaskItemParserOptions = {}
): string | undefined => {
  const quoted = backtickCandidates(line);
  const candidates =
    quoted.length > 0 ? quoted : heuristicCandidates(description, bareFilePattern(options.extensions ?? defaultFileExtensions));
  return candidates[candidates.length - 1];
};

export const parseTaskItems = (text: string, options: TaskItemParserOptions = {}): TaskItem[] => {
  const items: TaskItem[] = [];
  const seenIds = new Set<string>();

  for (const line of text.split(/\r?\n/)) {
    const match = taskLinePattern.exec(line);
    if (!match) continue;

    const id = match[1];
    if (seenIds.has(id)) continue;

    const description = match[3].trim();
    const filePath = resolveTaskFilePath(line, description, options);
    if (!filePath) continue;

    seenIds.add(id);
    items.push({
      id,
      description,
      filePath,
      contentKind: inferContentKind(filePath),
      parallel: match[2] !== undefined
    });
  }

  return items;
};

export const countUncheckedTasks = (text: string): number => text.split(UNCHECKED_TASK_MARKER).length - 1;

import { readFile } from 'fs/promises';

/**
 * キーワードファイルの1行
 *
 * 子を持つエントリはカテゴリ、子を持たないエントリは検索パターン（葉）。
 */
export interface KeywordEntry {
  text: string;
  /** インデントレベル（タブ=1、スペース4つ=1） */
  level: number;
  lineNumber: number;
  children: KeywordEntry[];
}

export interface LoadedKeywords {
  entries: KeywordEntry[];
  warnings: string[];
}

/** この深さに達した枝を一度だけ警告する */
const DEEP_NESTING_WARNING_DEPTH = 7;

export function isLeaf(entry: KeywordEntry): boolean {
  return entry.children.length === 0;
}

/**
 * "a:b:c" をキーワード列に分割する（各項をトリムし、空の項は除く）
 */
export function splitKeywordSequence(text: string): string[] {
  return text
    .split(':')
    .map((term) => term.trim())
    .filter((term) => term.length > 0);
}

/**
 * エントリ配下の全ての検索キーワード列（葉はそれ自身の列）
 */
export function searchSequences(entry: KeywordEntry): string[][] {
  if (isLeaf(entry)) {
    const sequence = splitKeywordSequence(entry.text);
    return sequence.length > 0 ? [sequence] : [];
  }
  return entry.children.flatMap((child) => searchSequences(child));
}

export function displayName(entry: KeywordEntry): string {
  return entry.text.replace(/:/g, ' → ');
}

function indentationLevel(line: string): number {
  let level = 0;
  for (const char of line) {
    if (char === '\t') {
      level += 1;
    } else if (char === ' ') {
      level += 0.25;
    } else {
      break;
    }
  }
  return Math.floor(level);
}

/**
 * タブインデントのキーワードファイルを解析する
 *
 * 空行と # で始まる行は読み飛ばす。
 */
export function parseKeywordLines(lines: readonly string[]): KeywordEntry[] {
  const entries: KeywordEntry[] = [];
  const stack: KeywordEntry[] = [];

  lines.forEach((line, index) => {
    const stripped = line.trimEnd();
    if (!stripped) {
      return;
    }

    const text = stripped.replace(/^[\t ]+/, '');
    if (!text || text.startsWith('#')) {
      return;
    }

    const entry: KeywordEntry = {
      text,
      level: indentationLevel(line),
      lineNumber: index + 1,
      children: [],
    };

    while (stack.length > 0 && stack[stack.length - 1].level >= entry.level) {
      stack.pop();
    }

    const parent = stack[stack.length - 1];
    if (parent) {
      parent.children.push(entry);
    } else {
      entries.push(entry);
    }
    stack.push(entry);
  });

  return entries;
}

export async function parseKeywordFile(filePath: string): Promise<KeywordEntry[]> {
  const content = await readFile(filePath, 'utf-8');
  return parseKeywordLines(content.split(/\r?\n/));
}

/**
 * 構造上の問題を警告として返す
 * - カテゴリ（子を持つエントリ）に ':' が含まれる
 * - ネストが深すぎる
 */
export function validateKeywordStructure(entries: readonly KeywordEntry[]): string[] {
  const warnings: string[] = [];

  const visit = (entry: KeywordEntry, depth: number): void => {
    if (!isLeaf(entry) && entry.text.includes(':')) {
      warnings.push(`Non-leaf entry contains colon at line ${entry.lineNumber}: ${entry.text}`);
    }
    if (depth === DEEP_NESTING_WARNING_DEPTH) {
      warnings.push(`Very deep nesting (level ${depth}) at line ${entry.lineNumber}`);
    }
    for (const child of entry.children) {
      visit(child, depth + 1);
    }
  };

  for (const entry of entries) {
    visit(entry, 1);
  }

  return warnings;
}

/**
 * 複数のキーワードファイルを読み込む
 *
 * 存在しないファイルは警告にしてスキップする。
 */
export async function loadKeywordFiles(filePaths: readonly string[]): Promise<LoadedKeywords> {
  const entries: KeywordEntry[] = [];
  const warnings: string[] = [];

  for (const filePath of filePaths) {
    try {
      const fileEntries = await parseKeywordFile(filePath);
      entries.push(...fileEntries);
      warnings.push(...validateKeywordStructure(fileEntries).map((w) => `${filePath}: ${w}`));
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        warnings.push(`Keyword file not found: ${filePath}`);
        continue;
      }
      throw error;
    }
  }

  return { entries, warnings };
}

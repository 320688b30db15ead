/**
 * 出力フォーマットユーティリティ
 */

import * as path from 'path';
import type { SerializedKeywordIndexNode, SerializedSearchResult } from '@kb-indexer/types';

export type OutputFormat = 'text' | 'json';

export interface SearchOutput {
  /** 検索したキーワード列 */
  keywords: string[];
  results: SerializedSearchResult[];
}

export interface KeywordIndexOutput {
  entries: SerializedKeywordIndexNode[];
  warnings: string[];
}

/**
 * 結果のファイルパスをプロジェクトルートからの相対パスにする
 */
export function relativizeResults(
  results: readonly SerializedSearchResult[],
  projectRoot: string
): SerializedSearchResult[] {
  return results.map((result) => ({
    ...result,
    filePath: path.relative(projectRoot, result.filePath),
  }));
}

export function relativizeKeywordIndex(
  entries: readonly SerializedKeywordIndexNode[],
  projectRoot: string
): SerializedKeywordIndexNode[] {
  return entries.map((entry) => {
    const relativized: SerializedKeywordIndexNode = {
      ...entry,
      children: relativizeKeywordIndex(entry.children, projectRoot),
    };
    if (entry.results) {
      relativized.results = relativizeResults(entry.results, projectRoot);
    }
    return relativized;
  });
}

/**
 * 1件の結果を1行にする
 */
function formatResultLine(result: SerializedSearchResult): string {
  const location = result.lineNumber !== undefined ? `${result.filePath}:${result.lineNumber}` : result.filePath;
  return `${location}: ${result.nodeText} (Path: ${result.searchPath.join(' -> ')})`;
}

/**
 * 検索結果をJSON形式で出力
 */
export function formatSearchResultsAsJson(output: SearchOutput): string {
  return JSON.stringify({ ...output, total: output.results.length }, null, 2);
}

/**
 * 検索結果をテキスト形式で出力
 */
export function formatSearchResultsAsText(output: SearchOutput): string {
  const query = output.keywords.join(' → ');

  if (output.results.length === 0) {
    return `検索結果: 0件（${query}）`;
  }

  const lines: string[] = [];
  lines.push(`検索結果: ${output.results.length}件（${query}）\n`);

  output.results.forEach((result, index) => {
    lines.push(`${index + 1}. ${formatResultLine(result)}`);
    lines.push(`   ${result.labels.join(' > ')}`);
  });

  return lines.join('\n');
}

/**
 * キーワードインデックスをJSON形式で出力
 */
export function formatKeywordIndexAsJson(output: KeywordIndexOutput): string {
  return JSON.stringify(output, null, 2);
}

/**
 * キーワードインデックスをテキスト形式で出力（キーワードファイルの階層をインデントで表す）
 */
export function formatKeywordIndexAsText(output: KeywordIndexOutput): string {
  const lines: string[] = [];

  for (const warning of output.warnings) {
    lines.push(`警告: ${warning}`);
  }
  if (output.warnings.length > 0) {
    lines.push('');
  }

  const visit = (entry: SerializedKeywordIndexNode, depth: number): void => {
    const indent = '  '.repeat(depth);

    if (!entry.isLeaf) {
      lines.push(`${indent}${entry.displayName}`);
      for (const child of entry.children) {
        visit(child, depth + 1);
      }
      return;
    }

    if (entry.error) {
      lines.push(`${indent}${entry.displayName}`);
      lines.push(`${indent}  エラー: ${entry.error}`);
      return;
    }

    const results = entry.results ?? [];
    lines.push(`${indent}${entry.displayName} (${results.length}件)`);
    for (const result of results) {
      lines.push(`${indent}  ${formatResultLine(result)}`);
    }
  };

  for (const entry of output.entries) {
    visit(entry, 0);
  }

  if (output.entries.length === 0) {
    lines.push('キーワードがありません（config.keywords.files を確認してください）');
  }

  return lines.join('\n');
}

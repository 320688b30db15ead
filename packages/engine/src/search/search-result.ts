import type { SerializedSearchResult } from '@kb-indexer/types';
import type { HierarchicalNode } from '../tree/hierarchical-node.js';

export interface SearchResult {
  /** ファイルパス */
  filePath: string;
  /** マッチしたノード */
  node: HierarchicalNode;
  /** アダプタが返すノードの検索対象テキスト */
  matchedContent: string;
  /** マッチに至ったキーワード列 */
  searchPath: string[];
}

/** ファイルパス → 文書順の検索結果 */
export type SearchResultsByFile = Map<string, SearchResult[]>;

export function formatSearchResult(result: SearchResult): string {
  return `${result.filePath}: ${result.node.text} (Path: ${result.searchPath.join(' -> ')})`;
}

export function serializeSearchResult(result: SearchResult): SerializedSearchResult {
  const serialized: SerializedSearchResult = {
    filePath: result.filePath,
    nodeId: result.node.id,
    nodeText: result.node.text,
    kind: result.node.kind,
    matchedContent: result.matchedContent,
    searchPath: [...result.searchPath],
    labels: result.node.pathLabels(),
  };

  const { lineNumber } = result.node.metadata;
  if (typeof lineNumber === 'number') {
    serialized.lineNumber = lineNumber;
  }

  return serialized;
}

import type { SearchSortKey } from '@kb-indexer/types';
import type { SearchResult, SearchResultsByFile } from './search-result.js';

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * 検索結果の整理（レポート出力用）
 */
export class SearchResultAggregator {
  /**
   * ファイル順に1つのリストへ平坦化する
   */
  flatten(results: SearchResultsByFile): SearchResult[] {
    return [...results.values()].flat();
  }

  /**
   * 指定キーで安定ソートした新しい配列を返す
   * - filePath: (ファイル, ラベル)
   * - nodeText: (ラベル, ファイル)
   * - searchPath: (キーワード列の長さ, ファイル, ラベル)
   */
  sort(results: readonly SearchResult[], sortBy: SearchSortKey): SearchResult[] {
    const sorted = [...results];

    switch (sortBy) {
      case 'filePath':
        return sorted.sort(
          (a, b) => compareStrings(a.filePath, b.filePath) || compareStrings(a.node.text, b.node.text)
        );
      case 'nodeText':
        return sorted.sort(
          (a, b) => compareStrings(a.node.text, b.node.text) || compareStrings(a.filePath, b.filePath)
        );
      case 'searchPath':
        return sorted.sort(
          (a, b) =>
            a.searchPath.length - b.searchPath.length ||
            compareStrings(a.filePath, b.filePath) ||
            compareStrings(a.node.text, b.node.text)
        );
    }
  }

  /**
   * 拡張子で絞り込む（例: ['.md']）
   */
  filterByExtension(results: readonly SearchResult[], extensions: readonly string[]): SearchResult[] {
    return results.filter((result) => extensions.some((ext) => result.filePath.endsWith(ext)));
  }

  /**
   * 同じファイル・ノードIDの結果を先勝ちで除く
   */
  deduplicate(results: readonly SearchResult[]): SearchResult[] {
    const seen = new Set<string>();
    return results.filter((result) => {
      const key = `${result.filePath}\u0000${result.node.id}`;
      if (seen.has(key)) {
        return false;
      }
      seen.add(key);
      return true;
    });
  }
}

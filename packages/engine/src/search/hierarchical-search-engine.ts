import type { FormatAdapter } from '../adapters/format-adapter.js';
import { splitKeywordSequence } from '../keywords/keyword-parser.js';
import { compileRawPattern } from '../pattern/pattern-compiler.js';
import type { HierarchicalNode } from '../tree/hierarchical-node.js';
import type { SearchResult, SearchResultsByFile } from './search-result.js';

/**
 * 検索エンジンが使うアダプタの機能
 */
export type SearchAdapter = Pick<FormatAdapter, 'rootNodes' | 'nodeContent' | 'subtreeSearch'>;

export interface HierarchicalSearchEngineOptions {
  /** 各ステップの候補をconsole.debugに出力する */
  debug?: boolean;
}

/**
 * 絞り込み中の候補
 */
interface Candidate {
  node: HierarchicalNode;
  searchPath: string[];
}

/**
 * 階層的なコンテキスト検索
 *
 * 1語目（アンカー）はツリー全体をモードAで検索し、中間の語はモードBで
 * 各候補を高々1つの子孫に絞り込み、最後の語はモードAで候補の部分木を全て集める。
 *
 * 同じノードに収束した候補はステップごとにファイル単位で重複除去する（先勝ち）。
 */
export class HierarchicalSearchEngine {
  private debug: boolean;

  constructor(options: HierarchicalSearchEngineOptions = {}) {
    this.debug = options.debug ?? false;
  }

  setDebug(debug: boolean): void {
    this.debug = debug;
  }

  /**
   * キーワード列で検索する
   * @param files 検索対象ファイル（この順序で結果を返す）
   * @param terms キーワード列
   * @param adapters ファイル → アダプタ
   * @returns ファイル → 文書順の結果（結果のないファイルは含まない）
   * @throws PatternCompilationError キーワードが正規表現として不正な場合
   */
  async search(
    files: readonly string[],
    terms: readonly string[],
    adapters: ReadonlyMap<string, SearchAdapter>
  ): Promise<SearchResultsByFile> {
    if (terms.length === 0) {
      return new Map();
    }

    // 不正なパターンはクエリ全体のエラー（アダプタ呼び出し前に検出する）
    const patterns = terms.map((term) => compileRawPattern(term));

    this.log(`Searching sequence: ${terms.join(' -> ')}`);

    let candidates = await this.searchAnchor(files, terms[0], patterns[0], adapters);

    for (let k = 1; k < terms.length && candidates.size > 0; k++) {
      const isLast = k === terms.length - 1;
      this.log(`Processing term ${k + 1}: '${terms[k]}' (isLast: ${isLast})`);

      candidates = this.refine(candidates, terms[k], patterns[k], isLast, adapters);

      if (candidates.size === 0) {
        this.log(`No matches for '${terms[k]}', stopping search`);
      }
    }

    return this.toResults(candidates, adapters);
  }

  /**
   * "a:b:c" 形式のキーワード文字列で検索する
   */
  async searchKeywordString(
    files: readonly string[],
    keywords: string,
    adapters: ReadonlyMap<string, SearchAdapter>
  ): Promise<SearchResultsByFile> {
    return this.search(files, splitKeywordSequence(keywords), adapters);
  }

  /**
   * アンカー語: 各ファイルの全ルートをモードAで検索する
   */
  private async searchAnchor(
    files: readonly string[],
    term: string,
    pattern: RegExp,
    adapters: ReadonlyMap<string, SearchAdapter>
  ): Promise<Map<string, Candidate[]>> {
    const candidates = new Map<string, Candidate[]>();

    for (const filePath of files) {
      const adapter = adapters.get(filePath);
      if (!adapter) {
        continue;
      }

      try {
        const fileCandidates: Candidate[] = [];
        for (const root of await adapter.rootNodes(filePath)) {
          for (const match of adapter.subtreeSearch(root, pattern, true)) {
            fileCandidates.push({ node: match, searchPath: [term] });
            this.log(`  Found in ${filePath}: ${match.text}`);
          }
        }

        const unique = dedupe(fileCandidates);
        if (unique.length > 0) {
          candidates.set(filePath, unique);
        }
      } catch (error) {
        console.warn(`[SearchEngine] Skipping ${filePath}:`, error);
      }
    }

    return candidates;
  }

  /**
   * 中間語（モードB）または最後の語（モードA）で候補を置き換える
   */
  private refine(
    candidates: Map<string, Candidate[]>,
    term: string,
    pattern: RegExp,
    isLast: boolean,
    adapters: ReadonlyMap<string, SearchAdapter>
  ): Map<string, Candidate[]> {
    const refined = new Map<string, Candidate[]>();

    for (const [filePath, fileCandidates] of candidates) {
      const adapter = adapters.get(filePath);
      if (!adapter) {
        continue;
      }

      try {
        const next: Candidate[] = [];
        for (const candidate of fileCandidates) {
          for (const match of adapter.subtreeSearch(candidate.node, pattern, isLast)) {
            next.push({ node: match, searchPath: [...candidate.searchPath, term] });
            this.log(`  Refined match in ${filePath}: ${match.text}`);
          }
        }

        const unique = dedupe(next);
        if (unique.length > 0) {
          refined.set(filePath, unique);
        }
      } catch (error) {
        console.warn(`[SearchEngine] Skipping ${filePath}:`, error);
      }
    }

    return refined;
  }

  private toResults(
    candidates: Map<string, Candidate[]>,
    adapters: ReadonlyMap<string, SearchAdapter>
  ): SearchResultsByFile {
    const results: SearchResultsByFile = new Map();

    for (const [filePath, fileCandidates] of candidates) {
      const adapter = adapters.get(filePath);
      if (!adapter || fileCandidates.length === 0) {
        continue;
      }

      results.set(
        filePath,
        fileCandidates.map(
          (candidate): SearchResult => ({
            filePath,
            node: candidate.node,
            matchedContent: adapter.nodeContent(candidate.node),
            searchPath: candidate.searchPath,
          })
        )
      );
    }

    return results;
  }

  private log(message: string): void {
    if (this.debug) {
      console.debug(`[SearchEngine] ${message}`);
    }
  }
}

/**
 * 同一ノードの候補を先勝ちで1つにまとめる
 */
function dedupe(candidates: Candidate[]): Candidate[] {
  const seen = new Set<HierarchicalNode>();
  return candidates.filter((candidate) => {
    if (seen.has(candidate.node)) {
      return false;
    }
    seen.add(candidate.node);
    return true;
  });
}

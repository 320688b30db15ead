import * as path from 'path';
import type { KbIndexerConfig, SerializedKeywordIndexNode } from '@kb-indexer/types';
import { AdapterRegistry } from '../adapters/adapter-registry.js';
import type { FormatAdapter } from '../adapters/format-adapter.js';
import { FileDiscovery } from '../discovery/file-discovery.js';
import {
  displayName,
  isLeaf,
  loadKeywordFiles,
  splitKeywordSequence,
  type KeywordEntry,
} from '../keywords/keyword-parser.js';
import { PatternCompilationError } from '../pattern/pattern-compiler.js';
import { HierarchicalSearchEngine } from '../search/hierarchical-search-engine.js';
import { SearchResultAggregator } from '../search/result-aggregator.js';
import { serializeSearchResult, type SearchResultsByFile } from '../search/search-result.js';
import type { HierarchicalNode } from '../tree/hierarchical-node.js';

export interface KnowledgeIndexerOptions {
  config: KbIndexerConfig;
  /** 絶対パス。include/exclude・キーワードファイルはここからの相対パス */
  projectRoot: string;
  /** 省略時は config.formats から生成 */
  registry?: AdapterRegistry;
}

/**
 * キーワードファイルの階層に検索結果を付けたもの
 */
export interface KeywordIndexNode {
  entry: KeywordEntry;
  /** 葉のみ */
  sequence?: string[];
  /** 葉のみ */
  results?: SearchResultsByFile;
  /** パターンが不正だった葉のエラーメッセージ */
  error?: string;
  children: KeywordIndexNode[];
}

export interface KeywordIndex {
  nodes: KeywordIndexNode[];
  warnings: string[];
}

/**
 * 1回のインデックス実行
 *
 * ファイル検索 → ツリー構築 → キーワード検索 の順に進める。
 * アダプタはこのインスタンスと同じ寿命で、パース済みツリーを保持する。
 */
export class KnowledgeIndexer {
  readonly engine: HierarchicalSearchEngine;
  private readonly config: KbIndexerConfig;
  private readonly projectRoot: string;
  private readonly registry: AdapterRegistry;
  private readonly discovery: FileDiscovery;
  private adapters = new Map<string, FormatAdapter>();

  constructor(options: KnowledgeIndexerOptions) {
    this.config = options.config;
    this.projectRoot = path.resolve(options.projectRoot);
    this.registry = options.registry ?? AdapterRegistry.fromConfig(options.config.formats);
    this.discovery = new FileDiscovery({ rootDir: this.projectRoot, config: options.config.files });
    this.engine = new HierarchicalSearchEngine({ debug: options.config.search.debug });
  }

  /**
   * 対象ファイルを検索する
   * @param paths 明示的なパス（省略時は設定のglobで検索）。除外対象は落とす
   * @returns アダプタのある絶対パス（ソート済み）
   */
  async discoverFiles(paths?: readonly string[]): Promise<string[]> {
    let relativePaths: string[];

    if (paths && paths.length > 0) {
      relativePaths = [];
      for (const p of paths) {
        const relative = path.relative(this.projectRoot, path.resolve(this.projectRoot, p));
        if (!(await this.discovery.shouldIgnore(relative))) {
          relativePaths.push(relative);
        }
      }
    } else {
      relativePaths = await this.discovery.findFiles();
    }

    const absolute = relativePaths.map((p) => path.join(this.projectRoot, p));
    this.adapters = this.registry.assign(absolute);
    return absolute.filter((file) => this.adapters.has(file));
  }

  /**
   * 各ファイルのツリーを構築する（パースに失敗したファイルは警告して除く）
   */
  async buildFileIndex(files: readonly string[]): Promise<Map<string, HierarchicalNode[]>> {
    const index = new Map<string, HierarchicalNode[]>();

    for (const file of files) {
      const adapter = this.adapterFor(file);
      if (!adapter) {
        continue;
      }
      try {
        index.set(file, await adapter.rootNodes(file));
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        console.warn(`[KnowledgeIndexer] Skipping ${file}: ${reason}`);
      }
    }

    return index;
  }

  /**
   * キーワード列（"a:b:c" または配列）で検索する
   */
  async search(keywords: string | readonly string[], files: readonly string[]): Promise<SearchResultsByFile> {
    const terms = typeof keywords === 'string' ? splitKeywordSequence(keywords) : keywords;
    return this.engine.search(files, terms, this.adaptersFor(files));
  }

  /**
   * 設定のキーワードファイルを全て検索し、キーワード階層に結果を付ける
   *
   * 不正なパターンはその葉のエラーとして記録し、他の葉の検索は続ける。
   */
  async buildKeywordIndex(files: readonly string[]): Promise<KeywordIndex> {
    const keywordFiles = this.config.keywords.files.map((file) => path.resolve(this.projectRoot, file));
    const { entries, warnings } = await loadKeywordFiles(keywordFiles);
    const adapters = this.adaptersFor(files);

    const visit = async (entry: KeywordEntry): Promise<KeywordIndexNode> => {
      if (!isLeaf(entry)) {
        const children: KeywordIndexNode[] = [];
        for (const child of entry.children) {
          children.push(await visit(child));
        }
        return { entry, children };
      }

      const sequence = splitKeywordSequence(entry.text);
      try {
        const results = await this.engine.search(files, sequence, adapters);
        return { entry, sequence, results, children: [] };
      } catch (error) {
        if (error instanceof PatternCompilationError) {
          console.error(`[KnowledgeIndexer] ${error.message} (line ${entry.lineNumber})`);
          return { entry, sequence, error: error.message, children: [] };
        }
        throw error;
      }
    };

    const nodes: KeywordIndexNode[] = [];
    for (const entry of entries) {
      nodes.push(await visit(entry));
    }

    return { nodes, warnings };
  }

  private adapterFor(file: string): FormatAdapter | undefined {
    return this.adapters.get(file) ?? this.registry.adapterFor(file);
  }

  private adaptersFor(files: readonly string[]): Map<string, FormatAdapter> {
    const assigned = new Map<string, FormatAdapter>();
    for (const file of files) {
      const adapter = this.adapterFor(file);
      if (adapter) {
        assigned.set(file, adapter);
      }
    }
    return assigned;
  }
}

/**
 * キーワードインデックスを出力用に変換する
 * @param sortBy 指定時は各葉の結果を並べ替える（未指定なら文書順）
 */
export function serializeKeywordIndex(
  nodes: readonly KeywordIndexNode[],
  sortBy?: KbIndexerConfig['search']['sortBy']
): SerializedKeywordIndexNode[] {
  const aggregator = new SearchResultAggregator();

  return nodes.map((node) => {
    const serialized: SerializedKeywordIndexNode = {
      text: node.entry.text,
      displayName: displayName(node.entry),
      isLeaf: isLeaf(node.entry),
      children: serializeKeywordIndex(node.children, sortBy),
    };

    if (node.sequence) {
      serialized.sequence = [...node.sequence];
    }
    if (node.results) {
      const flat = aggregator.flatten(node.results);
      const ordered = sortBy ? aggregator.sort(flat, sortBy) : flat;
      serialized.results = ordered.map(serializeSearchResult);
    }
    if (node.error) {
      serialized.error = node.error;
    }

    return serialized;
  });
}

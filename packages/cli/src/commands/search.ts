/**
 * search コマンド実装
 */

import { ConfigLoader, type SearchSortKey } from '@kb-indexer/types';
import {
  KnowledgeIndexer,
  SearchResultAggregator,
  serializeSearchResult,
  splitKeywordSequence,
} from '@kb-indexer/engine';
import {
  formatSearchResultsAsJson,
  formatSearchResultsAsText,
  relativizeResults,
  type OutputFormat,
} from '../utils/output.js';
import { printError } from '../utils/errors.js';

export interface SearchCommandOptions {
  /** 検索対象のパス（省略時は設定のglob） */
  paths?: string[];
  format?: OutputFormat;
  sort?: SearchSortKey;
  debug?: boolean;
  config?: string;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
}

/**
 * 検索して出力文字列を返す
 */
export async function runSearch(keywords: string, options: SearchCommandOptions = {}): Promise<string> {
  const terms = splitKeywordSequence(keywords);
  if (terms.length === 0) {
    throw new Error('キーワードを指定してください（例: "function:async"）');
  }

  const { config, projectRoot } = await ConfigLoader.resolve({
    configPath: options.config,
    cwd: options.cwd,
  });
  if (options.debug) {
    config.search.debug = true;
  }

  const indexer = new KnowledgeIndexer({ config, projectRoot });
  const files = await indexer.discoverFiles(options.paths);
  const index = await indexer.buildFileIndex(files);
  const results = await indexer.search(terms, [...index.keys()]);

  const aggregator = new SearchResultAggregator();
  const flat = aggregator.flatten(results);
  const sortBy = options.sort ?? config.search.sortBy;
  const ordered = sortBy ? aggregator.sort(flat, sortBy) : flat;

  const output = {
    keywords: terms,
    results: relativizeResults(ordered.map(serializeSearchResult), projectRoot),
  };

  return options.format === 'json' ? formatSearchResultsAsJson(output) : formatSearchResultsAsText(output);
}

/**
 * search コマンドを実行
 */
export async function executeSearch(keywords: string, options: SearchCommandOptions): Promise<void> {
  try {
    console.log(await runSearch(keywords, options));
  } catch (error) {
    printError(error);
    process.exit(1);
  }
}

/**
 * index コマンド実装
 * 設定のキーワードファイルを全て検索し、キーワード階層ごとの結果を出力する
 */

import { ConfigLoader, type SearchSortKey } from '@kb-indexer/types';
import { KnowledgeIndexer, serializeKeywordIndex } from '@kb-indexer/engine';
import {
  formatKeywordIndexAsJson,
  formatKeywordIndexAsText,
  relativizeKeywordIndex,
  type OutputFormat,
} from '../../utils/output.js';
import { printError } from '../../utils/errors.js';

export interface IndexCommandOptions {
  paths?: string[];
  format?: OutputFormat;
  sort?: SearchSortKey;
  debug?: boolean;
  config?: string;
  cwd?: string;
}

export async function runIndex(options: IndexCommandOptions = {}): Promise<string> {
  const { config, projectRoot } = await ConfigLoader.resolve({
    configPath: options.config,
    cwd: options.cwd,
  });
  if (options.debug) {
    config.search.debug = true;
  }

  const indexer = new KnowledgeIndexer({ config, projectRoot });
  const files = await indexer.discoverFiles(options.paths);
  const fileIndex = await indexer.buildFileIndex(files);
  const { nodes, warnings } = await indexer.buildKeywordIndex([...fileIndex.keys()]);

  const output = {
    entries: relativizeKeywordIndex(serializeKeywordIndex(nodes, options.sort ?? config.search.sortBy), projectRoot),
    warnings,
  };

  return options.format === 'json' ? formatKeywordIndexAsJson(output) : formatKeywordIndexAsText(output);
}

/**
 * index コマンドを実行
 */
export async function executeIndex(options: IndexCommandOptions): Promise<void> {
  try {
    console.log(await runIndex(options));
  } catch (error) {
    printError(error);
    process.exit(1);
  }
}

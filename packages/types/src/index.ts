/**
 * @kb-indexer/types
 * kb-indexerの共通型定義
 */

// Node
export type { NodeKind, NodeMetadata } from './node.js';

// Config
export type {
  KbIndexerConfig,
  PartialKbIndexerConfig,
  ProjectConfig,
  FilesConfig,
  KeywordsConfig,
  FormatConfig,
  FormatsConfig,
  SearchConfig,
  SearchSortKey,
} from './config.js';
export { DEFAULT_CONFIG } from './config.js';
export {
  ConfigLoader,
  CONFIG_FILE_NAMES,
  validateConfig,
  type ResolveConfigOptions,
  type ResolvedConfig,
} from './config/index.js';

// Result
export type { SerializedSearchResult, SerializedKeywordIndexNode } from './result.js';

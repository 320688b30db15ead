/**
 * @kb-indexer/engine
 *
 * 文書ツリーの構築と階層的キーワード検索
 */

export {
  HierarchicalNode,
  TreeStructureError,
  type HierarchicalNodeInit,
} from './tree/hierarchical-node.js';
export {
  FormatAdapter,
  DocumentParseError,
  MindmapAdapter,
  MarkdownAdapter,
  AdapterRegistry,
  type FormatAdapterOptions,
} from './adapters/index.js';
export {
  compileLiteralPattern,
  compileRawPattern,
  PatternCompilationError,
} from './pattern/pattern-compiler.js';
export {
  HierarchicalSearchEngine,
  type HierarchicalSearchEngineOptions,
  type SearchAdapter,
} from './search/hierarchical-search-engine.js';
export {
  formatSearchResult,
  serializeSearchResult,
  type SearchResult,
  type SearchResultsByFile,
} from './search/search-result.js';
export { SearchResultAggregator } from './search/result-aggregator.js';
export {
  displayName,
  isLeaf,
  loadKeywordFiles,
  parseKeywordFile,
  parseKeywordLines,
  searchSequences,
  splitKeywordSequence,
  validateKeywordStructure,
  type KeywordEntry,
  type LoadedKeywords,
} from './keywords/keyword-parser.js';
export { FileDiscovery, type FileDiscoveryOptions } from './discovery/file-discovery.js';
export {
  KnowledgeIndexer,
  serializeKeywordIndex,
  type KeywordIndex,
  type KeywordIndexNode,
  type KnowledgeIndexerOptions,
} from './indexer/knowledge-indexer.js';

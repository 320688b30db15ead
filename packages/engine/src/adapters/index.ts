/**
 * Format adapter exports
 */

export { FormatAdapter, DocumentParseError, type FormatAdapterOptions } from './format-adapter.js';
export { MindmapAdapter } from './mindmap-adapter.js';
export { MarkdownAdapter } from './markdown-adapter.js';
export { AdapterRegistry } from './adapter-registry.js';

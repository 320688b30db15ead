import type { FormatsConfig } from '@kb-indexer/types';
import { DEFAULT_CONFIG } from '@kb-indexer/types';
import type { FormatAdapter } from './format-adapter.js';
import { MarkdownAdapter } from './markdown-adapter.js';
import { MindmapAdapter } from './mindmap-adapter.js';

/**
 * 形式アダプタの登録先
 *
 * インデックス実行ごとに生成して検索エンジンへ渡す（プロセス共有の状態は持たない）。
 */
export class AdapterRegistry {
  private readonly adapters: FormatAdapter[] = [];

  /**
   * 設定の formats セクションから標準アダプタを登録したレジストリを作る
   */
  static fromConfig(formats: FormatsConfig = DEFAULT_CONFIG.formats): AdapterRegistry {
    const registry = new AdapterRegistry();
    registry.register(new MindmapAdapter({ extensions: formats.mindmap.extensions }));
    registry.register(new MarkdownAdapter({ extensions: formats.markdown.extensions }));
    return registry;
  }

  register(adapter: FormatAdapter): this {
    this.adapters.push(adapter);
    return this;
  }

  /**
   * ファイルを扱える最初のアダプタ（登録順）
   */
  adapterFor(filePath: string): FormatAdapter | undefined {
    return this.adapters.find((adapter) => adapter.canHandle(filePath));
  }

  /**
   * ファイルごとのアダプタ対応表（扱えないファイルは含めない）
   */
  assign(files: readonly string[]): Map<string, FormatAdapter> {
    const assigned = new Map<string, FormatAdapter>();
    for (const file of files) {
      const adapter = this.adapterFor(file);
      if (adapter) {
        assigned.set(file, adapter);
      }
    }
    return assigned;
  }

  get size(): number {
    return this.adapters.length;
  }
}

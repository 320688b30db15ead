/**
 * 文書ツリーノードの型定義
 */

/**
 * ノードの種別
 * - generic: 形式に依存しない汎用ノード
 * - mindmap_node: マインドマップ（.mm）の node 要素
 * - heading: Markdown見出し
 * - list_item: Markdownリスト項目
 */
export type NodeKind = 'generic' | 'mindmap_node' | 'heading' | 'list_item';

export interface NodeMetadata {
  /** 見出しレベル（1-6） */
  headingLevel?: number;
  /** リストのネスト深度（0始まり） */
  listLevel?: number;
  /** 元ファイルでの行番号（1-indexed） */
  lineNumber?: number;
  /** マインドマップのリッチコンテンツ本文 */
  richContent?: string;
  /** マインドマップのノート本文 */
  note?: string;
  /** 作成日時（Freeplane形式: YYYYMMDDTHHMMSS 等） */
  created?: string;
  /** 更新日時 */
  modified?: string;
  /** 拡張可能なメタデータ */
  [key: string]: unknown;
}

/**
 * 検索結果の出力用型定義
 *
 * Note: ノード本体は親子参照を持つため、出力時はこの形に変換する
 */

import type { NodeKind } from './node.js';

export interface SerializedSearchResult {
  /** ファイルパス */
  filePath: string;
  /** ノードID */
  nodeId: string;
  /** 表示ラベル */
  nodeText: string;
  /** ノード種別 */
  kind: NodeKind;
  /** マッチしたノードの検索対象テキスト */
  matchedContent: string;
  /** マッチに至ったキーワード列 */
  searchPath: string[];
  /** ルートからノードまでのラベル列 */
  labels: string[];
  /** 行番号（Markdownのみ） */
  lineNumber?: number;
}

/**
 * キーワードインデックスの1エントリ（キーワードファイルの階層を保持）
 */
export interface SerializedKeywordIndexNode {
  /** キーワードファイル上の表記 */
  text: string;
  /** 表示名（`:` を ` → ` に置換） */
  displayName: string;
  /** 検索パターン（葉）かどうか */
  isLeaf: boolean;
  /** 葉の場合のキーワード列 */
  sequence?: string[];
  /** 葉の場合の検索結果（ファイル順） */
  results?: SerializedSearchResult[];
  /** パターンが不正だった場合のエラーメッセージ */
  error?: string;
  children: SerializedKeywordIndexNode[];
}

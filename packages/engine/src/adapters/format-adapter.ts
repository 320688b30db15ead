import * as path from 'path';
import type { HierarchicalNode } from '../tree/hierarchical-node.js';

/**
 * 文書の読み込み・パースに失敗した
 */
export class DocumentParseError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'DocumentParseError';
  }
}

export interface FormatAdapterOptions {
  /** 対象とする拡張子（ドット付き、大文字小文字は区別しない） */
  extensions: string[];
}

/**
 * 文書形式ごとのツリー生成・検索の実装
 *
 * サブクラスは parse と nodeContent を実装する。
 * subtreeSearch の既定実装は nodeContent と children だけに依存するため、
 * 内容の意味が異なる形式のみオーバーライドする。
 */
export abstract class FormatAdapter {
  /** 形式名（ログ・エラーメッセージ用） */
  abstract readonly name: string;

  protected readonly extensions: string[];

  /** 1回のインデックス実行中に限り、パース済みツリーを保持する */
  private readonly trees = new Map<string, HierarchicalNode[]>();

  constructor(options: FormatAdapterOptions) {
    this.extensions = options.extensions.map((ext) => ext.toLowerCase());
  }

  canHandle(filePath: string): boolean {
    return this.extensions.includes(path.extname(filePath).toLowerCase());
  }

  /**
   * ファイルのルートノード群を返す
   * @throws DocumentParseError 読み込み・パースに失敗した場合
   */
  async rootNodes(filePath: string): Promise<HierarchicalNode[]> {
    const cached = this.trees.get(filePath);
    if (cached) {
      return cached;
    }

    let roots: HierarchicalNode[];
    try {
      roots = await this.parse(filePath);
    } catch (error) {
      if (error instanceof DocumentParseError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new DocumentParseError(`Failed to parse ${this.name} file ${filePath}: ${reason}`, filePath, {
        cause: error,
      });
    }

    this.trees.set(filePath, roots);
    return roots;
  }

  /**
   * ノードの検索対象テキスト
   */
  abstract nodeContent(node: HierarchicalNode): string;

  /**
   * ノードを根とする部分木を検索する
   *
   * includeDescendants = true（モードA）: 部分木のマッチを先行順で全て返す。
   * includeDescendants = false（モードB）: ノード自身がマッチすれば [node] のみ。
   * マッチしなければ子を文書順に再帰し、最初に結果を返した子の結果を採用する。
   */
  subtreeSearch(node: HierarchicalNode, pattern: RegExp, includeDescendants: boolean): HierarchicalNode[] {
    const selfMatch = this.matches(node, pattern);

    if (!includeDescendants) {
      if (selfMatch) {
        return [node];
      }
      for (const child of node.children) {
        const childMatches = this.subtreeSearch(child, pattern, false);
        if (childMatches.length > 0) {
          return childMatches;
        }
      }
      return [];
    }

    const matches = selfMatch ? [node] : [];
    for (const child of node.children) {
      matches.push(...this.subtreeSearch(child, pattern, true));
    }
    return matches;
  }

  /**
   * ファイルを読み込んでツリーを構築する（子は文書順で追加すること）
   */
  protected abstract parse(filePath: string): Promise<HierarchicalNode[]>;

  protected matches(node: HierarchicalNode, pattern: RegExp): boolean {
    // g / y フラグ付きの場合に前回の lastIndex を引き継がない
    pattern.lastIndex = 0;
    return pattern.test(this.nodeContent(node));
  }
}

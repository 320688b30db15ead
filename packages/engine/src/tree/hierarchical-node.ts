import type { NodeKind, NodeMetadata } from '@kb-indexer/types';

export interface HierarchicalNodeInit {
  id: string;
  content: string;
  /** 表示ラベル（省略時は content） */
  text?: string;
  /** 元ファイルのパス */
  fileOwner?: string;
  kind?: NodeKind;
  metadata?: NodeMetadata;
}

/**
 * ツリー構造の不整合（二重の親、循環）
 */
export class TreeStructureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TreeStructureError';
  }
}

/**
 * 文書の構造単位（マインドマップのノード、Markdownの見出し・リスト項目）
 *
 * children は文書順で、構築後に並べ替えない。
 * parent は参照用で、addChild からのみ設定される。
 */
export class HierarchicalNode {
  readonly id: string;
  readonly content: string;
  readonly text: string;
  readonly fileOwner: string;
  readonly kind: NodeKind;
  readonly metadata: NodeMetadata;

  private parentNode: HierarchicalNode | null = null;
  private readonly childNodes: HierarchicalNode[] = [];

  constructor(init: HierarchicalNodeInit) {
    this.id = init.id;
    this.content = init.content;
    this.text = init.text || init.content;
    this.fileOwner = init.fileOwner ?? '';
    this.kind = init.kind ?? 'generic';
    this.metadata = init.metadata ?? {};
  }

  get parent(): HierarchicalNode | null {
    return this.parentNode;
  }

  get children(): readonly HierarchicalNode[] {
    return this.childNodes;
  }

  /**
   * 子ノードを末尾に追加し、親参照を設定する
   */
  addChild(child: HierarchicalNode): void {
    if (child.parentNode) {
      throw new TreeStructureError(
        `Node "${child.id}" already has a parent ("${child.parentNode.id}")`
      );
    }

    // 自分自身または祖先を子にすると循環する
    for (let current: HierarchicalNode | null = this; current; current = current.parentNode) {
      if (current === child) {
        throw new TreeStructureError(`Adding "${child.id}" under "${this.id}" would create a cycle`);
      }
    }

    child.parentNode = this;
    this.childNodes.push(child);
  }

  /**
   * 配下の全ノードを先行順で返す（自身は含まない）
   */
  descendants(): HierarchicalNode[] {
    const result: HierarchicalNode[] = [];
    for (const child of this.childNodes) {
      result.push(child, ...child.descendants());
    }
    return result;
  }

  childrenOfKind(kind: NodeKind): HierarchicalNode[] {
    return this.childNodes.filter((child) => child.kind === kind);
  }

  /**
   * ルートからこのノードまでのラベル列（ルートが先頭）
   */
  pathLabels(): string[] {
    const labels: string[] = [];
    for (let current: HierarchicalNode | null = this; current; current = current.parentNode) {
      labels.push(current.text || current.id);
    }
    return labels.reverse();
  }
}

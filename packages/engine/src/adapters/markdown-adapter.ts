import { readFile } from 'fs/promises';
import { marked, type Token, type Tokens } from 'marked';
import { nanoid } from 'nanoid';
import { HierarchicalNode } from '../tree/hierarchical-node.js';
import { FormatAdapter, type FormatAdapterOptions } from './format-adapter.js';

interface DraftNode {
  kind: 'heading' | 'list_item';
  text: string;
  /** 見出しレベル（1-6）またはリストのネスト深度 */
  level: number;
  lineNumber: number;
  /** 見出しのセクションに属する本文ブロック */
  prose: string[];
  children: DraftNode[];
}

const FRONT_MATTER = /^---\r?\n[\s\S]*?\r?\n---[ \t]*(?:\r?\n|$)/;

function countNewlines(text: string): number {
  return text.split('\n').length - 1;
}

function blockText(token: Token): string {
  if ('text' in token && typeof token.text === 'string') {
    return token.text;
  }
  return token.raw;
}

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Markdownのアダプタ
 *
 * 見出しとリスト項目をノードにする。見出しの検索対象は見出しテキストと、
 * 次の見出し（レベルを問わない）までの本文。
 * リスト項目は項目自身のテキストのみ。
 */
export class MarkdownAdapter extends FormatAdapter {
  readonly name = 'markdown';

  constructor(options: FormatAdapterOptions = { extensions: ['.md', '.markdown'] }) {
    super(options);
  }

  nodeContent(node: HierarchicalNode): string {
    if (node.kind === 'list_item') {
      return node.text;
    }
    return node.content;
  }

  protected async parse(filePath: string): Promise<HierarchicalNode[]> {
    const content = await readFile(filePath, 'utf-8');
    return this.parseMarkdown(content, filePath);
  }

  /**
   * Markdown文字列からツリーを構築する
   */
  parseMarkdown(content: string, filePath: string): HierarchicalNode[] {
    // フロントマターは行数を保ったまま空行に置き換える
    const body = content.replace(FRONT_MATTER, (match) => '\n'.repeat(countNewlines(match)));
    const tokens = marked.lexer(body);
    const drafts = this.extractStructure(tokens);
    return drafts.map((draft) => this.buildNode(draft, filePath));
  }

  /**
   * トークン列から見出し・リストの階層を抽出する（文書順）
   */
  private extractStructure(tokens: Token[]): DraftNode[] {
    const roots: DraftNode[] = [];
    const headingStack: DraftNode[] = [];
    let currentLine = 1;

    for (const token of tokens) {
      const tokenLine = currentLine;

      if (token.type === 'heading') {
        const headingToken = token as Tokens.Heading;
        const draft: DraftNode = {
          kind: 'heading',
          text: headingToken.text,
          level: headingToken.depth,
          lineNumber: tokenLine,
          prose: [],
          children: [],
        };

        // 同レベル以上の見出しでセクションが閉じる
        while (headingStack.length > 0 && headingStack[headingStack.length - 1].level >= draft.level) {
          headingStack.pop();
        }

        const parent = headingStack[headingStack.length - 1];
        if (parent) {
          parent.children.push(draft);
        } else {
          roots.push(draft);
        }
        headingStack.push(draft);
      } else if (token.type === 'list') {
        const items = this.extractListItems(token as Tokens.List, 0, tokenLine);
        const parent = headingStack[headingStack.length - 1];
        if (parent) {
          parent.children.push(...items);
        } else {
          roots.push(...items);
        }
      } else if (token.type !== 'space' && token.type !== 'hr') {
        const text = normalizeWhitespace(blockText(token));
        if (text) {
          // 直近の見出しにのみ属する（下位見出しの本文は含めない）
          headingStack[headingStack.length - 1]?.prose.push(text);
        }
      }

      currentLine += countNewlines(token.raw);
    }

    return roots;
  }

  private extractListItems(list: Tokens.List, level: number, startLine: number): DraftNode[] {
    const drafts: DraftNode[] = [];
    let itemLine = startLine;

    for (const item of list.items) {
      const labelParts: string[] = [];
      const children: DraftNode[] = [];
      let innerLine = itemLine;

      for (const inner of item.tokens) {
        if (inner.type === 'list') {
          children.push(...this.extractListItems(inner as Tokens.List, level + 1, innerLine));
        } else if (inner.type === 'text' || inner.type === 'paragraph') {
          labelParts.push(blockText(inner));
        }
        innerLine += countNewlines(inner.raw);
      }

      drafts.push({
        kind: 'list_item',
        text: normalizeWhitespace(labelParts.join(' ')),
        level,
        lineNumber: itemLine,
        prose: [],
        children,
      });

      itemLine += countNewlines(item.raw);
    }

    return drafts;
  }

  private buildNode(draft: DraftNode, filePath: string): HierarchicalNode {
    const node =
      draft.kind === 'heading'
        ? new HierarchicalNode({
            id: nanoid(),
            content: normalizeWhitespace([draft.text, ...draft.prose].join(' ')),
            text: draft.text,
            fileOwner: filePath,
            kind: 'heading',
            metadata: { headingLevel: draft.level, lineNumber: draft.lineNumber },
          })
        : new HierarchicalNode({
            id: nanoid(),
            content: draft.text,
            text: draft.text,
            fileOwner: filePath,
            kind: 'list_item',
            metadata: { listLevel: draft.level, lineNumber: draft.lineNumber },
          });

    for (const child of draft.children) {
      node.addChild(this.buildNode(child, filePath));
    }

    return node;
  }
}

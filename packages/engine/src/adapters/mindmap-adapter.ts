import { readFile } from 'fs/promises';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { nanoid } from 'nanoid';
import { HierarchicalNode } from '../tree/hierarchical-node.js';
import { DocumentParseError, FormatAdapter, type FormatAdapterOptions } from './format-adapter.js';

/**
 * preserveOrder モードの要素: { [タグ名]: 子要素配列, ':@': 属性 } または { '#text': 値 }
 */
type XmlEntry = Record<string, unknown>;

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

function isRecord(value: unknown): value is XmlEntry {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toEntries(value: unknown): XmlEntry[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function tagOf(entry: XmlEntry): string | undefined {
  return Object.keys(entry).find((key) => key !== ATTRIBUTES_KEY && key !== TEXT_KEY);
}

function childElements(entry: XmlEntry, tag: string): XmlEntry[] {
  const name = tagOf(entry);
  if (!name) {
    return [];
  }
  return toEntries(entry[name]).filter((child) => tagOf(child) === tag);
}

function attributeOf(entry: XmlEntry, name: string): string | undefined {
  const attributes = entry[ATTRIBUTES_KEY];
  if (!isRecord(attributes)) {
    return undefined;
  }
  const value = attributes[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * 要素配下のテキストを文書順に連結する
 */
function collectText(entries: XmlEntry[]): string {
  const parts: string[] = [];
  for (const entry of entries) {
    const text = entry[TEXT_KEY];
    if (typeof text === 'string' || typeof text === 'number') {
      const trimmed = String(text).trim();
      if (trimmed) {
        parts.push(trimmed);
      }
      continue;
    }
    const name = tagOf(entry);
    if (name) {
      const nested = collectText(toEntries(entry[name]));
      if (nested) {
        parts.push(nested);
      }
    }
  }
  return parts.join(' ');
}

/**
 * Freeplaneマインドマップ（.mm）のアダプタ
 *
 * 検索対象は TEXT 属性、リッチコンテンツ（TYPE="NODE"）、ノート（TYPE="NOTE"）。
 * リッチコンテンツ・ノートはそのノード直下の richcontent 要素のみを見る。
 */
export class MindmapAdapter extends FormatAdapter {
  readonly name = 'mindmap';

  private readonly parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '',
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
    processEntities: true,
    htmlEntities: true,
  });

  constructor(options: FormatAdapterOptions = { extensions: ['.mm'] }) {
    super(options);
  }

  nodeContent(node: HierarchicalNode): string {
    return node.content;
  }

  protected async parse(filePath: string): Promise<HierarchicalNode[]> {
    const xml = await readFile(filePath, 'utf-8');
    return this.parseXml(xml, filePath);
  }

  /**
   * XML文字列からツリーを構築する
   */
  parseXml(xml: string, filePath: string): HierarchicalNode[] {
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
      const { msg, line } = validation.err;
      throw new DocumentParseError(`Malformed mind map ${filePath} (line ${line}): ${msg}`, filePath);
    }

    const documentEntries = toEntries(this.parser.parse(xml));
    // XML宣言（?xml）を除いた最初の要素がルート要素
    const map = documentEntries.find((entry) => {
      const tag = tagOf(entry);
      return tag !== undefined && !tag.startsWith('?');
    });
    if (!map || tagOf(map) !== 'map') {
      throw new DocumentParseError(`Not a Freeplane mind map (root element is not <map>): ${filePath}`, filePath);
    }

    const rootElement = childElements(map, 'node')[0];
    if (!rootElement) {
      return [];
    }

    return [this.toNode(rootElement, filePath)];
  }

  private toNode(element: XmlEntry, filePath: string): HierarchicalNode {
    const text = attributeOf(element, 'TEXT') ?? '';
    const richContent = this.richContentText(element, 'NODE');
    const note = this.richContentText(element, 'NOTE');

    const node = new HierarchicalNode({
      id: attributeOf(element, 'ID') ?? nanoid(),
      content: [text, richContent, note].filter(Boolean).join(' '),
      text,
      fileOwner: filePath,
      kind: 'mindmap_node',
      metadata: {
        richContent,
        note,
        created: attributeOf(element, 'CREATED') ?? '',
        modified: attributeOf(element, 'MODIFIED') ?? '',
      },
    });

    for (const child of childElements(element, 'node')) {
      node.addChild(this.toNode(child, filePath));
    }

    return node;
  }

  private richContentText(element: XmlEntry, type: 'NODE' | 'NOTE'): string {
    const richContent = childElements(element, 'richcontent').find(
      (entry) => attributeOf(entry, 'TYPE') === type
    );
    if (!richContent) {
      return '';
    }

    const body = childElements(richContent, 'html').flatMap((html) => childElements(html, 'body'))[0];
    const source = body ?? richContent;
    const name = tagOf(source);
    return name ? collectText(toEntries(source[name])) : '';
  }
}

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { HierarchicalSearchEngine, type SearchAdapter } from '../hierarchical-search-engine.js';
import { PatternCompilationError } from '../../pattern/pattern-compiler.js';
import { GUIDE_TREE, InMemoryAdapter } from '../../__tests__/helpers/in-memory-adapter.js';
import type { SearchResultsByFile } from '../search-result.js';

const GUIDE = 'guide.mem';

function ids(results: SearchResultsByFile, filePath: string): string[] {
  return (results.get(filePath) ?? []).map((result) => result.node.id);
}

describe('HierarchicalSearchEngine', () => {
  let engine: HierarchicalSearchEngine;
  let adapter: InMemoryAdapter;
  let adapters: Map<string, SearchAdapter>;

  beforeEach(() => {
    engine = new HierarchicalSearchEngine();
    adapter = new InMemoryAdapter().add(GUIDE, GUIDE_TREE);
    adapters = new Map([[GUIDE, adapter]]);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('search', () => {
    it('同じノードに収束した候補を1つにまとめる', async () => {
      const results = await engine.search([GUIDE], ['function', 'async', 'definition'], adapters);

      expect(ids(results, GUIDE)).toEqual(['A1a', 'A1b']);
      for (const result of results.get(GUIDE) ?? []) {
        expect(result.searchPath).toEqual(['function', 'async', 'definition']);
        expect(result.filePath).toBe(GUIDE);
      }
      expect(results.get(GUIDE)?.[0].matchedContent).toBe('async definition one');
    });

    it('1語のクエリはツリー全体のマッチを先行順で全て返す', async () => {
      const results = await engine.search([GUIDE], ['function'], adapters);

      expect(ids(results, GUIDE)).toEqual(['A', 'A1']);
      expect(results.get(GUIDE)?.[0].searchPath).toEqual(['function']);
    });

    it('最後の語は候補の部分木のマッチを全て集める', async () => {
      const results = await engine.search([GUIDE], ['function', 'definition'], adapters);

      expect(ids(results, GUIDE)).toEqual(['A1a', 'A1b']);
    });

    it('中間の語は文書順で最初にマッチした子孫だけを残す', async () => {
      const file = 'choice.mem';
      const choice = new InMemoryAdapter().add(file, [
        'root',
        'root',
        'alpha topic',
        [
          ['C1', 'first', 'beta first', [['G1', 'g1', 'gamma one']]],
          ['C2', 'second', 'beta second', [['G2', 'g2', 'gamma two']]],
        ],
      ]);

      const results = await engine.search([file], ['alpha', 'beta', 'gamma'], new Map([[file, choice]]));

      expect(ids(results, file)).toEqual(['G1']);
    });

    it('キーワードが空なら空の結果を返し、ファイルを読まない', async () => {
      const results = await engine.search([GUIDE], [], adapters);

      expect(results.size).toBe(0);
      expect(adapter.parseCount).toBe(0);
    });

    it('どこにもない語は空の結果を返す', async () => {
      const results = await engine.search([GUIDE], ['zzz_no_such_token'], adapters);

      expect(results.size).toBe(0);
    });

    it('正規表現の選択を単語単位・大文字小文字無視で扱う', async () => {
      const file = 'misc.mem';
      const misc = new InMemoryAdapter().add(file, [
        'root',
        'misc',
        'misc',
        [
          ['n1', 'n1', 'foo here'],
          ['n2', 'n2', 'bar there'],
          ['n3', 'n3', 'foobar none'],
          ['n4', 'n4', 'BAR upper'],
        ],
      ]);

      const results = await engine.search([file], ['foo|bar'], new Map([[file, misc]]));

      expect(ids(results, file)).toEqual(['n1', 'n2', 'n4']);
    });

    it('同じクエリは同じ結果を返す', async () => {
      const first = await engine.search([GUIDE], ['function', 'async', 'definition'], adapters);
      const second = await engine.search([GUIDE], ['function', 'async', 'definition'], adapters);

      expect(ids(second, GUIDE)).toEqual(ids(first, GUIDE));
      expect(adapter.parseCount).toBe(1);
    });

    it('候補がなくなった時点で以降の語を検索しない', async () => {
      const subtreeSearch = vi.fn(adapter.subtreeSearch.bind(adapter));
      const spy: SearchAdapter = {
        rootNodes: (filePath) => adapter.rootNodes(filePath),
        nodeContent: (node) => adapter.nodeContent(node),
        subtreeSearch,
      };

      const results = await engine.search(
        [GUIDE],
        ['function', 'zzz_missing', 'async'],
        new Map([[GUIDE, spy]])
      );

      expect(results.size).toBe(0);
      // アンカー1回（ルート） + 中間語2回（A, A1）
      expect(subtreeSearch).toHaveBeenCalledTimes(3);
    });

    it('結果を入力ファイルの順序で返し、結果のないファイルは含めない', async () => {
      const other = 'other.mem';
      const empty = 'empty.mem';
      adapter.add(other, ['o', 'Other', 'function overview']);
      adapter.add(empty, ['e', 'Empty', 'nothing relevant']);
      adapters.set(other, adapter);
      adapters.set(empty, adapter);

      const results = await engine.search([other, empty, GUIDE], ['function'], adapters);

      expect([...results.keys()]).toEqual([other, GUIDE]);
      expect(ids(results, other)).toEqual(['o']);
    });

    it('読み込めないファイルはスキップして他のファイルの検索を続ける', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const broken = 'broken.mem';
      adapters.set(broken, adapter);

      const results = await engine.search([broken, GUIDE], ['function'], adapters);

      expect([...results.keys()]).toEqual([GUIDE]);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0][0]).toBe(`[SearchEngine] Skipping ${broken}:`);
    });

    it('絞り込み中にアダプタが失敗したファイルはスキップする', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const flaky = 'flaky.mem';
      const flakyAdapter = new InMemoryAdapter().add(flaky, GUIDE_TREE);
      const failing: SearchAdapter = {
        rootNodes: (filePath) => flakyAdapter.rootNodes(filePath),
        nodeContent: (node) => flakyAdapter.nodeContent(node),
        subtreeSearch: (node, pattern, includeDescendants) => {
          if (!includeDescendants) {
            throw new Error('subtree search failed');
          }
          return flakyAdapter.subtreeSearch(node, pattern, true);
        },
      };
      adapters.set(flaky, failing);

      const results = await engine.search([flaky, GUIDE], ['function', 'async', 'definition'], adapters);

      expect([...results.keys()]).toEqual([GUIDE]);
      expect(ids(results, GUIDE)).toEqual(['A1a', 'A1b']);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0][0]).toBe(`[SearchEngine] Skipping ${flaky}:`);
    });

    it('ASCII以外の文字を含む語も単語として検索する', async () => {
      const file = 'unicode.mem';
      const unicode = new InMemoryAdapter().add(file, [
        'root',
        'root',
        'words',
        [
          ['n1', 'n1', 'café au lait'],
          ['n2', 'n2', '検索 エンジン'],
          ['n3', 'n3', 'naïve approach'],
          ['n4', 'n4', 'cafés nearby'],
        ],
      ]);
      const unicodeAdapters = new Map([[file, unicode]]);

      expect(ids(await engine.search([file], ['café'], unicodeAdapters), file)).toEqual(['n1']);
      expect(ids(await engine.search([file], ['検索'], unicodeAdapters), file)).toEqual(['n2']);
      expect(ids(await engine.search([file], ['NAÏVE'], unicodeAdapters), file)).toEqual(['n3']);
    });

    it('不正なパターンはファイルを読む前にエラーにする', async () => {
      await expect(engine.search([GUIDE], ['function', '(unclosed'], adapters)).rejects.toThrow(
        PatternCompilationError
      );
      expect(adapter.parseCount).toBe(0);
    });

    it('debug有効時は各ステップをconsole.debugに出力する', async () => {
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
      engine.setDebug(true);

      await engine.search([GUIDE], ['function', 'zzz_missing'], adapters);

      expect(debug).toHaveBeenCalledWith('[SearchEngine] Searching sequence: function -> zzz_missing');
      expect(debug).toHaveBeenCalledWith("[SearchEngine] No matches for 'zzz_missing', stopping search");
    });
  });

  describe('searchKeywordString', () => {
    it('":"区切りの文字列をキーワード列として検索する', async () => {
      const results = await engine.searchKeywordString([GUIDE], ' function : async :: definition ', adapters);

      expect(ids(results, GUIDE)).toEqual(['A1a', 'A1b']);
      expect(results.get(GUIDE)?.[0].searchPath).toEqual(['function', 'async', 'definition']);
    });
  });
});

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { runSearch } from '../search.js';
import { runIndex } from '../index/run.js';

const TEST_DIR = path.join(tmpdir(), 'kb-indexer-cli-search-test');

const GUIDE_MD = `# Functions

function basics

## Async

async function advanced

- async definition one
- async definition two

# Classes

class basics
`;

const ARCH_MM = `<map version="freeplane 1.9.13">
  <node TEXT="Architecture" ID="m_root">
    <node TEXT="Storage layer" ID="m_storage">
      <node TEXT="function cache" ID="m_cache"/>
    </node>
  </node>
</map>
`;

describe('CLI commands', () => {
  beforeAll(async () => {
    await fs.mkdir(TEST_DIR, { recursive: true });
    await fs.writeFile(path.join(TEST_DIR, 'guide.md'), GUIDE_MD);
    await fs.writeFile(path.join(TEST_DIR, 'arch.mm'), ARCH_MM);
    await fs.writeFile(path.join(TEST_DIR, 'keywords.txt'), 'Code\n\tfunction:async:definition\n\tbad:(oops\n');
    await fs.writeFile(
      path.join(TEST_DIR, '.kb-indexer.json'),
      JSON.stringify({ files: { ignoreGitignore: false }, keywords: { files: ['keywords.txt'] } })
    );
  });

  afterAll(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  beforeEach(() => {
    vi.stubEnv('KB_INDEXER_CONFIG', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  describe('runSearch', () => {
    it('テキスト形式で結果を出力する', async () => {
      const output = await runSearch('function:async:definition', { cwd: TEST_DIR });

      expect(output).toBe(
        [
          '検索結果: 2件（function → async → definition）\n',
          '1. guide.md:9: async definition one (Path: function -> async -> definition)',
          '   Functions > Async > async definition one',
          '2. guide.md:10: async definition two (Path: function -> async -> definition)',
          '   Functions > Async > async definition two',
        ].join('\n')
      );
    });

    it('JSON形式で結果を出力する', async () => {
      const output = JSON.parse(await runSearch('function:async:definition', { cwd: TEST_DIR, format: 'json' }));

      expect(output.keywords).toEqual(['function', 'async', 'definition']);
      expect(output.total).toBe(2);
      expect(output.results[0]).toMatchObject({
        filePath: 'guide.md',
        nodeText: 'async definition one',
        kind: 'list_item',
        lineNumber: 9,
        labels: ['Functions', 'Async', 'async definition one'],
      });
    });

    it('--sortで並べ替える', async () => {
      const output = JSON.parse(await runSearch('function', { cwd: TEST_DIR, format: 'json', sort: 'nodeText' }));

      expect(output.results.map((r: { nodeText: string }) => r.nodeText)).toEqual([
        'Async',
        'Functions',
        'function cache',
      ]);
    });

    it('パスを指定するとそのファイルだけを検索する', async () => {
      const output = JSON.parse(await runSearch('function', { cwd: TEST_DIR, format: 'json', paths: ['arch.mm'] }));

      expect(output.results.map((r: { filePath: string }) => r.filePath)).toEqual(['arch.mm']);
    });

    it('結果がなければ0件と出力する', async () => {
      expect(await runSearch('zzz_no_such_token', { cwd: TEST_DIR })).toBe('検索結果: 0件（zzz_no_such_token）');
    });

    it('キーワードが空ならエラー', async () => {
      await expect(runSearch(' : ', { cwd: TEST_DIR })).rejects.toThrow('キーワードを指定してください');
    });

    it('不正なパターンはエラー', async () => {
      await expect(runSearch('(oops', { cwd: TEST_DIR })).rejects.toThrow('Invalid search pattern "(oops"');
    });
  });

  describe('runIndex', () => {
    it('キーワード階層ごとに結果を出力する', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});

      const lines = (await runIndex({ cwd: TEST_DIR })).split('\n');

      expect(lines.slice(0, 5)).toEqual([
        'Code',
        '  function → async → definition (2件)',
        '    guide.md:9: async definition one (Path: function -> async -> definition)',
        '    guide.md:10: async definition two (Path: function -> async -> definition)',
        '  bad → (oops',
      ]);
      expect(lines[5]).toMatch(/^ {4}エラー: Invalid search pattern "\(oops"/);
      expect(lines).toHaveLength(6);
    });
  });
});

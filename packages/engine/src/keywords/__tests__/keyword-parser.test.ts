import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import {
  displayName,
  isLeaf,
  loadKeywordFiles,
  parseKeywordLines,
  searchSequences,
  splitKeywordSequence,
  validateKeywordStructure,
} from '../keyword-parser.js';

const TEST_DIR = path.join(tmpdir(), 'kb-indexer-keywords-test');

const KEYWORDS = [
  '# 言語機能',
  'Functions',
  '\tfunction:async:definition',
  '\tfunction:closure',
  '',
  'Classes',
  '    class:constructor',
  'standalone',
].join('\n');

describe('keyword-parser', () => {
  describe('splitKeywordSequence', () => {
    it('":"で分割して各項をトリムする', () => {
      expect(splitKeywordSequence(' function : async:definition ')).toEqual(['function', 'async', 'definition']);
    });

    it('空の項は除く', () => {
      expect(splitKeywordSequence('function::async:')).toEqual(['function', 'async']);
      expect(splitKeywordSequence('')).toEqual([]);
    });
  });

  describe('parseKeywordLines', () => {
    it('インデントで階層を作り、空行とコメントを読み飛ばす', () => {
      const entries = parseKeywordLines(KEYWORDS.split('\n'));

      expect(entries.map((entry) => entry.text)).toEqual(['Functions', 'Classes', 'standalone']);
      expect(entries[0].children.map((entry) => entry.text)).toEqual([
        'function:async:definition',
        'function:closure',
      ]);
      expect(entries[1].children.map((entry) => entry.text)).toEqual(['class:constructor']);
    });

    it('行番号とレベルを記録する', () => {
      const entries = parseKeywordLines(KEYWORDS.split('\n'));

      expect(entries[0].lineNumber).toBe(2);
      expect(entries[0].children[1]).toMatchObject({ level: 1, lineNumber: 4 });
      // スペース4つ = レベル1
      expect(entries[1].children[0]).toMatchObject({ level: 1, lineNumber: 7 });
    });

    it('浅い行で上位の階層に戻る', () => {
      const entries = parseKeywordLines(['a', '\tb', '\t\tc', '\td', 'e']);

      expect(entries.map((entry) => entry.text)).toEqual(['a', 'e']);
      expect(entries[0].children.map((entry) => entry.text)).toEqual(['b', 'd']);
      expect(entries[0].children[0].children.map((entry) => entry.text)).toEqual(['c']);
    });
  });

  describe('isLeaf / searchSequences / displayName', () => {
    it('子のないエントリが検索パターン', () => {
      const [functions, , standalone] = parseKeywordLines(KEYWORDS.split('\n'));

      expect(isLeaf(functions)).toBe(false);
      expect(isLeaf(standalone)).toBe(true);
      expect(searchSequences(functions)).toEqual([
        ['function', 'async', 'definition'],
        ['function', 'closure'],
      ]);
      expect(searchSequences(standalone)).toEqual([['standalone']]);
    });

    it('表示名は":"を矢印にする', () => {
      const [functions] = parseKeywordLines(KEYWORDS.split('\n'));

      expect(displayName(functions.children[0])).toBe('function → async → definition');
    });
  });

  describe('validateKeywordStructure', () => {
    it('":"を含むカテゴリを警告する', () => {
      const entries = parseKeywordLines(['lang:ts', '\tgenerics']);

      expect(validateKeywordStructure(entries)).toEqual(['Non-leaf entry contains colon at line 1: lang:ts']);
    });

    it('深すぎるネストを警告する', () => {
      const lines = Array.from({ length: 8 }, (_, i) => `${'\t'.repeat(i)}level${i + 1}`);

      expect(validateKeywordStructure(parseKeywordLines(lines))).toEqual(['Very deep nesting (level 7) at line 7']);
    });

    it('問題がなければ空', () => {
      expect(validateKeywordStructure(parseKeywordLines(KEYWORDS.split('\n')))).toEqual([]);
    });
  });

  describe('loadKeywordFiles', () => {
    beforeAll(async () => {
      await fs.mkdir(TEST_DIR, { recursive: true });
      await fs.writeFile(path.join(TEST_DIR, 'keywords.txt'), KEYWORDS);
      await fs.writeFile(path.join(TEST_DIR, 'extra.txt'), 'a:b\r\n\tc\r\n');
    });

    afterAll(async () => {
      await fs.rm(TEST_DIR, { recursive: true, force: true });
    });

    it('複数ファイルのエントリを順に連結する', async () => {
      const keywords = path.join(TEST_DIR, 'keywords.txt');
      const extra = path.join(TEST_DIR, 'extra.txt');

      const { entries, warnings } = await loadKeywordFiles([keywords, extra]);

      expect(entries.map((entry) => entry.text)).toEqual(['Functions', 'Classes', 'standalone', 'a:b']);
      expect(entries[3].children.map((entry) => entry.text)).toEqual(['c']);
      expect(warnings).toEqual([`${extra}: Non-leaf entry contains colon at line 1: a:b`]);
    });

    it('存在しないファイルは警告にする', async () => {
      const missing = path.join(TEST_DIR, 'missing.txt');

      const { entries, warnings } = await loadKeywordFiles([missing]);

      expect(entries).toEqual([]);
      expect(warnings).toEqual([`Keyword file not found: ${missing}`]);
    });
  });
});

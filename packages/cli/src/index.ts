#!/usr/bin/env node
/**
 * kb-indexer CLI
 */

import { Command, Option } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import type { SearchSortKey } from '@kb-indexer/types';
import { executeSearch } from './commands/search.js';
import { executeIndex } from './commands/index/run.js';
import { initConfig } from './commands/config/init.js';
import { printError } from './utils/errors.js';
import type { OutputFormat } from './utils/output.js';

/**
 * 最も近いpackage.jsonからバージョンを読み込む（src/ からでも dist/ からでも動くよう親を遡る）
 */
function readVersion(startDir: string): string {
  for (let dir = startDir; ; dir = dirname(dir)) {
    const packageJsonPath = join(dir, 'package.json');
    if (existsSync(packageJsonPath)) {
      const packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8')) as { version?: string };
      return packageJson.version ?? '0.0.0';
    }
    if (dirname(dir) === dir) {
      return '0.0.0';
    }
  }
}

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

interface OutputOptions {
  format: OutputFormat;
  sort?: SearchSortKey;
  debug?: boolean;
}

/**
 * グローバル設定（preSubcommandフックで設定）
 */
let globalConfigPath: string | undefined;

const formatOption = () =>
  new Option('--format <format>', '出力形式').choices(['text', 'json']).default('text');
const sortOption = () =>
  new Option('--sort <key>', '結果の並び順（未指定なら文書順）').choices(['filePath', 'nodeText', 'searchPath']);

const program = new Command();

program
  .name('kb-indexer')
  .description('マインドマップ・Markdownの階層的キーワード検索')
  .version(readVersion(__dirname))
  .addOption(new Option('-c, --config <path>', '設定ファイルのパス').env('KB_INDEXER_CONFIG'))
  .hook('preSubcommand', (thisCommand) => {
    const opts = thisCommand.opts<{ config?: string }>();
    globalConfigPath = opts.config;
  });

// search コマンド
program
  .command('search')
  .description('キーワード列で文書を検索（例: "function:async:definition"）')
  .argument('<keywords>', '":"区切りのキーワード列')
  .argument('[paths...]', '検索するファイル（省略時は設定のパターン）')
  .addOption(formatOption())
  .addOption(sortOption())
  .option('--debug', '各ステップの候補を出力')
  .action(async (keywords: string, paths: string[], options: OutputOptions) => {
    await executeSearch(keywords, { ...options, paths, config: globalConfigPath });
  });

// index コマンド
program
  .command('index')
  .description('キーワードファイルの全キーワードで検索し、階層ごとに出力')
  .argument('[paths...]', '検索するファイル（省略時は設定のパターン）')
  .addOption(formatOption())
  .addOption(sortOption())
  .option('--debug', '各ステップの候補を出力')
  .action(async (paths: string[], options: OutputOptions) => {
    await executeIndex({ ...options, paths, config: globalConfigPath });
  });

// config コマンド
const configCmd = program.command('config').description('設定管理');

configCmd
  .command('init')
  .description('設定ファイルを初期化')
  .option('--name <name>', 'プロジェクト名')
  .option('--keywords <files...>', 'キーワードファイル')
  .option('-f, --force', '既存ファイルを上書き')
  .action(async (options: { name?: string; keywords?: string[]; force?: boolean }) => {
    try {
      await initConfig({ name: options.name, keywordFiles: options.keywords, force: options.force });
    } catch (error) {
      printError(error);
      process.exit(1);
    }
  });

// コマンドラインを解析
await program.parseAsync(process.argv);

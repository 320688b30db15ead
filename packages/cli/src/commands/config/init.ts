/**
 * config init コマンド
 * 設定ファイルを生成する
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { CONFIG_FILE_NAMES, ConfigLoader, type KbIndexerConfig } from '@kb-indexer/types';

export interface ConfigInitOptions {
  /** プロジェクト名（デフォルト: ディレクトリ名） */
  name?: string;
  /** キーワードファイル（プロジェクトルートからの相対パス） */
  keywordFiles?: string[];
  /** 既存ファイルを上書き */
  force?: boolean;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
}

function createDefaultConfig(options: { name: string; keywordFiles: string[] }): KbIndexerConfig {
  const config = ConfigLoader.getDefaultConfig();
  config.project.name = options.name;
  config.keywords.files = options.keywordFiles;
  return config;
}

/**
 * config init コマンドを実行
 * @returns 生成した設定ファイルのパス
 */
export async function initConfig(options: ConfigInitOptions = {}): Promise<string> {
  const cwd = options.cwd || process.cwd();
  const configPath = path.join(cwd, CONFIG_FILE_NAMES[0]);

  console.log('Initializing kb-indexer configuration...\n');

  // 既存ファイルチェック
  try {
    await fs.access(configPath);

    if (!options.force) {
      throw new Error(
        `Configuration file already exists: ${configPath}\n` + 'Use --force to overwrite the existing file.'
      );
    }

    console.log('⚠️  Overwriting existing configuration file...\n');
  } catch (error) {
    // ファイルが存在しない場合は正常（続行）
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      throw error;
    }
  }

  const config = createDefaultConfig({
    name: options.name || path.basename(cwd),
    keywordFiles: options.keywordFiles ?? ['keywords.txt'],
  });

  await fs.writeFile(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');

  console.log('✅ Configuration file created successfully!\n');
  console.log(`📄 File: ${configPath}`);
  console.log(`🚀 Project: ${config.project.name}`);
  console.log(`🔑 Keywords: ${config.keywords.files.join(', ')}\n`);
  console.log('Next steps:');
  console.log(`  1. Review and customize ${CONFIG_FILE_NAMES[0]}`);
  console.log('  2. Write keyword sequences (one per line, e.g. "function:async") to the keyword file');
  console.log('  3. Search documents: kb-indexer search "function:async"\n');

  return configPath;
}

import { readFile, access, realpath } from 'fs/promises';
import { constants } from 'fs';
import * as path from 'path';
import type { KbIndexerConfig, PartialKbIndexerConfig } from '../config.js';
import { DEFAULT_CONFIG } from '../config.js';
import { validateConfig } from './validator.js';

/**
 * Config解決オプション
 */
export interface ResolveConfigOptions {
  /** 明示的に指定された設定ファイルパス */
  configPath?: string;
  /** 親ディレクトリを遡って探索するか（デフォルト: true） */
  traverseUp?: boolean;
  /** カレントワーキングディレクトリ（デフォルト: process.cwd()） */
  cwd?: string;
  /** 設定ファイルが必須かどうか（デフォルト: false）。trueの場合、見つからなければエラー */
  requireConfig?: boolean;
}

export interface ResolvedConfig {
  config: KbIndexerConfig;
  configPath: string | null;
  projectRoot: string;
}

/**
 * 設定ファイル名の候補
 * 優先順位: .kb-indexer.json > kb-indexer.json
 */
export const CONFIG_FILE_NAMES = ['.kb-indexer.json', 'kb-indexer.json'] as const;

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class ConfigLoader {
  /**
   * 設定ファイルを読み込む
   * @param configPath 設定ファイルのパス
   * @returns 設定オブジェクト（ファイルがなければデフォルト設定）
   */
  static async load(configPath: string): Promise<KbIndexerConfig> {
    try {
      // ファイルの存在確認
      await access(configPath, constants.F_OK | constants.R_OK);

      const content = await readFile(configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);

      // バリデーション
      const config = validateConfig(parsed);

      // デフォルト値とマージ
      return this.mergeWithDefaults(config);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        // ファイルが存在しない場合はデフォルト設定を返す
        return this.getDefaultConfig();
      }
      throw error;
    }
  }

  /**
   * 統一されたConfig解決
   * - 設定ファイルの自動探索
   * - プロジェクトルートの決定
   * - 設定の読み込み
   */
  static async resolve(options: ResolveConfigOptions = {}): Promise<ResolvedConfig> {
    const { configPath: explicitPath, traverseUp = true, cwd = process.cwd(), requireConfig = false } = options;

    // 1. 設定ファイルパスを解決
    const configPath = await this.resolveConfigPath(explicitPath, cwd, traverseUp);

    if (!configPath && requireConfig) {
      throw new Error(
        'Configuration file not found. Please create a configuration file.\n' +
        'Run: kb-indexer config init'
      );
    }

    // 2. 設定を読み込む
    const config = configPath ? await this.load(configPath) : this.getDefaultConfig();

    // 3. プロジェクトルートを決定（project.root は設定ファイルからの相対パス）
    const baseDir = configPath ? path.dirname(configPath) : cwd;
    const projectRoot = await this.normalizeProjectRoot(path.resolve(baseDir, config.project.root));

    return { config, configPath, projectRoot };
  }

  /**
   * デフォルト設定を取得（呼び出し側の変更が共有されないようコピーを返す）
   */
  static getDefaultConfig(): KbIndexerConfig {
    return this.mergeWithDefaults({});
  }

  /**
   * 設定ファイルを探索
   * @param startDir 探索開始ディレクトリ
   * @param traverseUp 親ディレクトリを遡るかどうか
   */
  private static async findConfigFile(startDir: string, traverseUp: boolean): Promise<string | null> {
    let currentDir = path.resolve(startDir);
    const root = path.parse(currentDir).root;

    while (true) {
      for (const fileName of CONFIG_FILE_NAMES) {
        const configPath = path.join(currentDir, fileName);

        try {
          await access(configPath);
          return configPath;
        } catch {
          // ファイルが存在しない、次を試す
          continue;
        }
      }

      if (!traverseUp || currentDir === root) {
        return null;
      }

      // 親ディレクトリへ
      currentDir = path.dirname(currentDir);
    }
  }

  /**
   * 設定ファイルパスを解決
   * 1. 明示的に指定されたパス
   * 2. 環境変数 KB_INDEXER_CONFIG
   * 3. 自動探索
   */
  private static async resolveConfigPath(
    explicitPath: string | undefined,
    cwd: string,
    traverseUp: boolean
  ): Promise<string | null> {
    if (explicitPath) {
      return path.resolve(cwd, explicitPath);
    }

    const envPath = process.env.KB_INDEXER_CONFIG;
    if (envPath) {
      return path.resolve(cwd, envPath);
    }

    return await this.findConfigFile(cwd, traverseUp);
  }

  /**
   * プロジェクトルートを正規化
   * - シンボリックリンクを解決
   * - 末尾のスラッシュを削除
   */
  private static async normalizeProjectRoot(root: string): Promise<string> {
    const absolutePath = path.resolve(root);

    try {
      const realPath = await realpath(absolutePath);
      return realPath.replace(/\/$/, '');
    } catch (_error) {
      // ディレクトリが存在しない場合は絶対パスをそのまま返す
      return absolutePath.replace(/\/$/, '');
    }
  }

  /**
   * 設定とデフォルト値をマージ
   */
  private static mergeWithDefaults(config: PartialKbIndexerConfig): KbIndexerConfig {
    return {
      version: config.version ?? DEFAULT_CONFIG.version,
      project: {
        name: config.project?.name ?? DEFAULT_CONFIG.project.name,
        root: config.project?.root ?? DEFAULT_CONFIG.project.root,
      },
      files: {
        include: [...(config.files?.include ?? DEFAULT_CONFIG.files.include)],
        exclude: [...(config.files?.exclude ?? DEFAULT_CONFIG.files.exclude)],
        ignoreGitignore: config.files?.ignoreGitignore ?? DEFAULT_CONFIG.files.ignoreGitignore,
      },
      keywords: {
        files: [...(config.keywords?.files ?? DEFAULT_CONFIG.keywords.files)],
      },
      formats: {
        mindmap: {
          extensions: [
            ...(config.formats?.mindmap?.extensions ?? DEFAULT_CONFIG.formats.mindmap.extensions),
          ],
        },
        markdown: {
          extensions: [
            ...(config.formats?.markdown?.extensions ?? DEFAULT_CONFIG.formats.markdown.extensions),
          ],
        },
      },
      search: {
        debug: config.search?.debug ?? DEFAULT_CONFIG.search.debug,
        sortBy: config.search?.sortBy ?? DEFAULT_CONFIG.search.sortBy,
      },
    };
  }
}

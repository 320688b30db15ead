/**
 * 設定ファイルの型定義
 */

export interface KbIndexerConfig {
  version: string;
  project: ProjectConfig;
  files: FilesConfig;
  keywords: KeywordsConfig;
  formats: FormatsConfig;
  search: SearchConfig;
}

export interface ProjectConfig {
  /** プロジェクト名 */
  name: string;
  /** プロジェクトルート */
  root: string;
}

export interface FilesConfig {
  /** 含めるファイルパターン（glob） */
  include: string[];
  /** 除外するファイルパターン（glob） */
  exclude: string[];
  /** .gitignoreを尊重するか */
  ignoreGitignore: boolean;
}

export interface KeywordsConfig {
  /** キーワードファイルのパス（プロジェクトルートからの相対パス） */
  files: string[];
}

export interface FormatConfig {
  /** 対象とする拡張子（ドット付き） */
  extensions: string[];
}

export interface FormatsConfig {
  /** Freeplaneマインドマップ */
  mindmap: FormatConfig;
  /** Markdown */
  markdown: FormatConfig;
}

export type SearchSortKey = 'filePath' | 'nodeText' | 'searchPath';

export interface SearchConfig {
  /** 各ステップのデバッグ出力 */
  debug: boolean;
  /** 出力時の並び順（未指定なら文書順） */
  sortBy?: SearchSortKey;
}

/** デフォルト設定 */
export const DEFAULT_CONFIG: KbIndexerConfig = {
  version: '1.0',
  project: {
    name: '',
    root: '.',
  },
  files: {
    include: ['**/*.mm', '**/*.md', '**/*.markdown'],
    exclude: ['**/node_modules/**', '**/.git/**', '**/dist/**', '**/build/**'],
    ignoreGitignore: true,
  },
  keywords: {
    files: [],
  },
  formats: {
    mindmap: {
      extensions: ['.mm'],
    },
    markdown: {
      extensions: ['.md', '.markdown'],
    },
  },
  search: {
    debug: false,
  },
};

/**
 * 設定ファイルから読み込んだ値（未指定フィールドはデフォルトで補う）
 */
export interface PartialKbIndexerConfig {
  version?: string;
  project?: Partial<ProjectConfig>;
  files?: Partial<FilesConfig>;
  keywords?: Partial<KeywordsConfig>;
  formats?: {
    mindmap?: Partial<FormatConfig>;
    markdown?: Partial<FormatConfig>;
  };
  search?: Partial<SearchConfig>;
}

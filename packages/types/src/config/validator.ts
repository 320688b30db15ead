import type {
  PartialKbIndexerConfig,
  ProjectConfig,
  FilesConfig,
  KeywordsConfig,
  FormatConfig,
  SearchConfig,
} from '../config.js';

const SORT_KEYS = ['filePath', 'nodeText', 'searchPath'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * 設定オブジェクトをバリデーション
 * @returns 検証済みの部分設定（デフォルトとのマージは ConfigLoader で行う）
 */
export function validateConfig(config: unknown): PartialKbIndexerConfig {
  if (!isRecord(config)) {
    throw new Error('Config must be an object');
  }

  const result: PartialKbIndexerConfig = {};

  // バージョンのチェック
  if (config.version !== undefined) {
    if (typeof config.version !== 'string') {
      throw new Error('config.version must be a string');
    }
    result.version = config.version;
  }

  // project設定のバリデーション
  if (config.project !== undefined) {
    result.project = validateProjectConfig(config.project);
  }

  // files設定のバリデーション
  if (config.files !== undefined) {
    result.files = validateFilesConfig(config.files);
  }

  // keywords設定のバリデーション
  if (config.keywords !== undefined) {
    result.keywords = validateKeywordsConfig(config.keywords);
  }

  // formats設定のバリデーション
  if (config.formats !== undefined) {
    result.formats = validateFormatsConfig(config.formats);
  }

  // search設定のバリデーション
  if (config.search !== undefined) {
    result.search = validateSearchConfig(config.search);
  }

  return result;
}

function validateProjectConfig(project: unknown): Partial<ProjectConfig> {
  if (!isRecord(project)) {
    throw new Error('config.project must be an object');
  }

  const out: Partial<ProjectConfig> = {};

  if (project.name !== undefined) {
    if (typeof project.name !== 'string') {
      throw new Error('config.project.name must be a string');
    }
    out.name = project.name;
  }

  if (project.root !== undefined) {
    if (typeof project.root !== 'string') {
      throw new Error('config.project.root must be a string');
    }
    out.root = project.root;
  }

  return out;
}

function validateFilesConfig(files: unknown): Partial<FilesConfig> {
  if (!isRecord(files)) {
    throw new Error('config.files must be an object');
  }

  const out: Partial<FilesConfig> = {};

  if (files.include !== undefined) {
    if (!Array.isArray(files.include)) {
      throw new Error('config.files.include must be an array');
    }
    if (!isStringArray(files.include)) {
      throw new Error('config.files.include must be an array of strings');
    }
    out.include = files.include;
  }

  if (files.exclude !== undefined) {
    if (!Array.isArray(files.exclude)) {
      throw new Error('config.files.exclude must be an array');
    }
    if (!isStringArray(files.exclude)) {
      throw new Error('config.files.exclude must be an array of strings');
    }
    out.exclude = files.exclude;
  }

  if (files.ignoreGitignore !== undefined) {
    if (typeof files.ignoreGitignore !== 'boolean') {
      throw new Error('config.files.ignoreGitignore must be a boolean');
    }
    out.ignoreGitignore = files.ignoreGitignore;
  }

  return out;
}

function validateKeywordsConfig(keywords: unknown): Partial<KeywordsConfig> {
  if (!isRecord(keywords)) {
    throw new Error('config.keywords must be an object');
  }

  const out: Partial<KeywordsConfig> = {};

  if (keywords.files !== undefined) {
    if (!isStringArray(keywords.files)) {
      throw new Error('config.keywords.files must be an array of strings');
    }
    out.files = keywords.files;
  }

  return out;
}

function validateFormatsConfig(formats: unknown): PartialKbIndexerConfig['formats'] {
  if (!isRecord(formats)) {
    throw new Error('config.formats must be an object');
  }

  for (const key of Object.keys(formats)) {
    if (key !== 'mindmap' && key !== 'markdown') {
      throw new Error(`config.formats.${key} is not a supported format`);
    }
  }

  const out: PartialKbIndexerConfig['formats'] = {};

  if (formats.mindmap !== undefined) {
    out.mindmap = validateFormatConfig(formats.mindmap, 'mindmap');
  }

  if (formats.markdown !== undefined) {
    out.markdown = validateFormatConfig(formats.markdown, 'markdown');
  }

  return out;
}

function validateFormatConfig(format: unknown, name: string): Partial<FormatConfig> {
  if (!isRecord(format)) {
    throw new Error(`config.formats.${name} must be an object`);
  }

  const out: Partial<FormatConfig> = {};

  if (format.extensions !== undefined) {
    if (!isStringArray(format.extensions)) {
      throw new Error(`config.formats.${name}.extensions must be an array of strings`);
    }
    if (!format.extensions.every((ext) => ext.startsWith('.'))) {
      throw new Error(`config.formats.${name}.extensions must start with "."`);
    }
    out.extensions = format.extensions;
  }

  return out;
}

function validateSearchConfig(search: unknown): Partial<SearchConfig> {
  if (!isRecord(search)) {
    throw new Error('config.search must be an object');
  }

  const out: Partial<SearchConfig> = {};

  if (search.debug !== undefined) {
    if (typeof search.debug !== 'boolean') {
      throw new Error('config.search.debug must be a boolean');
    }
    out.debug = search.debug;
  }

  if (search.sortBy !== undefined) {
    const sortBy = SORT_KEYS.find((key) => key === search.sortBy);
    if (!sortBy) {
      throw new Error(`config.search.sortBy must be one of: ${SORT_KEYS.join(', ')}`);
    }
    out.sortBy = sortBy;
  }

  return out;
}

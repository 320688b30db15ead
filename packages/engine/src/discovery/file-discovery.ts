import fg from 'fast-glob';
import * as fs from 'fs/promises';
import * as path from 'path';
import ignoreModule, { type Ignore } from 'ignore';
import { minimatch } from 'minimatch';
import type { FilesConfig } from '@kb-indexer/types';

export interface FileDiscoveryOptions {
  /** include/exclude と .gitignore の基準ディレクトリ */
  rootDir: string;
  config: FilesConfig;
}

/**
 * `**\/x` を直下の `x` にもマッチさせる（fast-glob と同じ解釈）
 */
function matchesGlob(filePath: string, pattern: string): boolean {
  return minimatch(filePath, pattern) || (pattern.startsWith('**/') && minimatch(filePath, pattern.slice(3)));
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * インデックス対象の文書（.mm / .md など）を列挙する
 *
 * 返すパスは rootDir からの相対パス。
 */
export class FileDiscovery {
  private readonly rootDir: string;
  private readonly config: FilesConfig;
  /** 未読込は undefined、.gitignore がなければ null */
  private gitignore: Ignore | null | undefined;

  constructor(options: FileDiscoveryOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.config = options.config;
  }

  /**
   * include に合い exclude と .gitignore に当たらないファイル（ソート済み）
   */
  async findFiles(): Promise<string[]> {
    const gitignore = await this.loadGitignore();
    const files = await fg(this.config.include, {
      cwd: this.rootDir,
      ignore: this.config.exclude,
      onlyFiles: true,
      dot: false,
    });

    return files.filter((file) => !gitignore?.ignores(file)).sort();
  }

  matchesPattern(filePath: string): boolean {
    return (
      this.config.include.some((pattern) => matchesGlob(filePath, pattern)) &&
      !this.config.exclude.some((pattern) => matchesGlob(filePath, pattern))
    );
  }

  /**
   * 明示的に渡されたパスを対象外とするか
   */
  async shouldIgnore(filePath: string): Promise<boolean> {
    const gitignore = await this.loadGitignore();
    return Boolean(gitignore?.ignores(filePath)) || !this.matchesPattern(filePath);
  }

  private async loadGitignore(): Promise<Ignore | null> {
    if (!this.config.ignoreGitignore) {
      return null;
    }
    if (this.gitignore !== undefined) {
      return this.gitignore;
    }

    try {
      const content = await fs.readFile(path.join(this.rootDir, '.gitignore'), 'utf-8');
      this.gitignore = ignoreModule.default().add(content);
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
      this.gitignore = null;
    }
    return this.gitignore;
  }
}

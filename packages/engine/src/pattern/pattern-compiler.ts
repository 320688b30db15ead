/**
 * キーワード項から大文字小文字を区別しない単語境界付きの正規表現を作る
 *
 * 単語文字は Unicode の文字・数字と _
 */

export class PatternCompilationError extends Error {
  constructor(
    message: string,
    public readonly term: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'PatternCompilationError';
  }
}

const WORD_CHAR = /^[\p{L}\p{N}_]$/u;
const WORD_START = '(?<![\\p{L}\\p{N}_])';
const WORD_END = '(?![\\p{L}\\p{N}_])';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

function compile(source: string, term: string): RegExp {
  try {
    return new RegExp(source, 'iu');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PatternCompilationError(`Invalid search pattern "${term}": ${reason}`, term, { cause: error });
  }
}

/**
 * リテラルモード: 正規表現のメタ文字をエスケープする
 *
 * 先頭・末尾が単語文字なら単語境界、そうでなければ空白または端を境界とする
 */
export function compileLiteralPattern(term: string): RegExp {
  if (term.length === 0) {
    throw new PatternCompilationError('Search term must not be empty', term);
  }

  const chars = Array.from(term);
  const left = WORD_CHAR.test(chars[0] ?? '') ? WORD_START : '(?<!\\S)';
  const right = WORD_CHAR.test(chars[chars.length - 1] ?? '') ? WORD_END : '(?!\\S)';

  return compile(`${left}${escapeRegExp(term)}${right}`, term);
}

/**
 * 正規表現モード: 項をそのまま正規表現として扱い (?:term) の前後に単語境界を置く
 *
 * 検索エンジンは全ての項をこのモードでコンパイルする
 */
export function compileRawPattern(term: string): RegExp {
  return compile(`${WORD_START}(?:${term})${WORD_END}`, term);
}

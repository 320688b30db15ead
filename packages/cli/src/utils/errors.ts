/**
 * エラー出力
 */

export function printError(error: unknown): void {
  if (error instanceof Error) {
    console.error(`エラー: ${error.message}`);
  } else {
    console.error('エラー: 不明なエラーが発生しました。');
  }
}

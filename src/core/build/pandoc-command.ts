/**
 * pandoc のコマンドライン組み立て
 */

import * as path from 'node:path';

export const isPdfOutput = (output: string): boolean => output.endsWith('.pdf');

export const isHtmlOutput = (output: string): boolean => output.endsWith('.html');

export interface PandocCommandInput {
  /** 連結済みの Markdown */
  mergedPath: string;
  output: string;
  /** 元ファイルのディレクトリ（画像などの探索先） */
  sourceFiles: readonly string[];
  /** PDF 出力時に --include-in-header で渡すファイル */
  headerPath: string | null;
  toc: boolean;
  /** 利用者指定の追加引数（最後に付ける） */
  pandocArgs: readonly string[];
}

/**
 * 元ファイルのディレクトリを重複なくソートして連結した --resource-path の値
 */
export function buildResourcePath(sourceFiles: readonly string[]): string {
  const dirs = new Set(sourceFiles.map((file) => path.dirname(file)));
  return [...dirs].sort().join(path.delimiter);
}

export function buildPandocArgs(input: PandocCommandInput): string[] {
  const args = [
    '-s',
    input.mergedPath,
    '-o',
    input.output,
    '--pdf-engine=xelatex',
    `--resource-path=${buildResourcePath(input.sourceFiles)}`,
  ];

  if (input.headerPath !== null && isPdfOutput(input.output)) {
    args.push(`--include-in-header=${input.headerPath}`);
  }
  if (input.toc) {
    args.push('--toc');
  }

  args.push(...input.pandocArgs);
  return args;
}

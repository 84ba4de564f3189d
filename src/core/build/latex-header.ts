import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * PDF 出力時に必ず入れるプリアンブル（余白・図の固定配置・セクション見出し）
 */
export const LATEX_PREAMBLE = [
  '\\usepackage[margin=1in]{geometry}',
  '\\usepackage{float}',
  '\\floatplacement{figure}{H}',
  '\\usepackage{sectsty}',
  '\\sectionfont{\\centering\\fontsize{16}{18}\\selectfont}',
  '',
].join('\n');

export function renderLatexHeader(userHeader: string | null): string {
  if (userHeader === null) {
    return LATEX_PREAMBLE;
  }
  return [
    LATEX_PREAMBLE,
    '\n% --- begin user header.tex ---\n',
    userHeader,
    '\n% --- end user header.tex ---\n',
  ].join('');
}

/**
 * ヘッダーファイルを outDir に書き出す
 *
 * @param userHeaderPath - 利用者の header.tex（null なら組み込みプリアンブルのみ）
 * @returns 書き出した .tex のパス
 */
export async function buildLatexHeader(userHeaderPath: string | null, outDir: string): Promise<string> {
  const userHeader = userHeaderPath === null ? null : await fs.readFile(userHeaderPath, 'utf-8');
  const headerPath = path.join(outDir, 'header.tex');
  await fs.writeFile(headerPath, renderLatexHeader(userHeader), 'utf-8');
  return headerPath;
}

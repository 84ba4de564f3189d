/**
 * Markdown Merger
 *
 * 複数の Markdown ファイルを1つにまとめる。
 * 画像リンクは元ファイルのディレクトリ基準の絶対パスに書き換える。
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createErr, createOk, type Result } from 'option-t/plain_result';
import { buildIOError, type BuildIOError } from '../../types/errors.ts';

const IMAGE_PATTERN = /!\[([^\]]*)\]\(([^)]+)\)/g;

function formatLocalDate(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * タイトルページ用の YAML メタデータブロック
 */
export function createMetadata(title: string, author: string, date: Date = new Date()): string {
  return `---\ntitle: "${title}"\nauthor: "${author}"\ndate: "${formatLocalDate(date)}"\n---\n\n`;
}

const isRemoteLink = (link: string): boolean =>
  link.startsWith('http://') || link.startsWith('https://');

/**
 * 画像リンクを書き換える
 *
 * - alt テキストが removeAltTexts のいずれかと完全一致すれば空にする
 * - http(s) 以外のリンクは sourceDir 基準の絶対パスにする
 */
export function rewriteMarkdownImages(
  text: string,
  sourceDir: string,
  removeAltTexts: readonly string[],
): string {
  return text.replace(IMAGE_PATTERN, (_match, alt: string, link: string) => {
    const altText = removeAltTexts.includes(alt) ? '' : alt;
    const target = isRemoteLink(link) ? link : path.resolve(sourceDir, link);
    return `![${altText}](${target})`;
  });
}

/**
 * Markdown ファイルを連結して target に書き出す
 *
 * 各ファイルの後ろには空行を挟む。metadata が空でなければ先頭に置く。
 */
export async function mergeMarkdown(
  files: readonly string[],
  target: string,
  metadata: string,
  removeAltTexts: readonly string[],
): Promise<Result<void, BuildIOError>> {
  const parts: string[] = metadata ? [metadata] : [];

  try {
    for (const file of files) {
      const text = await fs.readFile(file, 'utf-8');
      parts.push(rewriteMarkdownImages(text, path.dirname(file), removeAltTexts), '\n\n');
    }
    await fs.writeFile(target, parts.join(''), 'utf-8');
  } catch (error) {
    return createErr(buildIOError(`merging Markdown into ${target}`, error));
  }

  return createOk(undefined);
}

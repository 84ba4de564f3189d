/**
 * HTML Post-processing
 *
 * pandoc が出力した reveal.js の HTML に設定スクリプトを差し込み、
 * 参照しているスタイルシート・スクリプト・画像を1ファイルに埋め込む。
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import * as cheerio from 'cheerio';
import { createErr, createOk, type Result } from 'option-t/plain_result';
import { bundleError, type BundleError } from '../../types/errors.ts';

export interface RevealConfig {
  footerText: string | null;
  animateAllLines: boolean;
}

/**
 * `</script>` で途切れないように JSON を埋め込む
 */
const toInlineJson = (value: unknown): string => JSON.stringify(value).replace(/</g, '\\u003c');

export function renderRevealConfigScript(config: RevealConfig): string {
  const footerText = toInlineJson(config.footerText ?? '');
  return `<script>window.config = { footerText: ${footerText}, animateAllLines: ${String(config.animateAllLines)} };</script>`;
}

/**
 * `window.config` を定義するスクリプトを `</head>` の直前に差し込む
 *
 * head の閉じタグがない断片の場合は先頭に置く。
 */
export function injectRevealConfig(html: string, config: RevealConfig): string {
  const script = renderRevealConfigScript(config);
  if (!/<\/head>/i.test(html)) {
    return `${script}\n${html}`;
  }
  const $ = cheerio.load(html);
  $('head').append(script, '\n');
  return $.html();
}

export type ResourceFetcher = (url: string) => Promise<Buffer>;

const fetchRemote: ResourceFetcher = async (url) => {
  const response = await fetch(url);
  if (!response.ok) {
    throw new Error(`HTTP ${response.status} ${response.statusText}`);
  }
  return Buffer.from(await response.arrayBuffer());
};

const IMAGE_MIME_TYPES: Readonly<Record<string, string>> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.svg': 'image/svg+xml',
  '.webp': 'image/webp',
  '.bmp': 'image/bmp',
  '.ico': 'image/x-icon',
};

export function imageMimeType(resource: string): string {
  const pathname = resource.split(/[?#]/)[0] ?? resource;
  return IMAGE_MIME_TYPES[path.extname(pathname).toLowerCase()] ?? 'application/octet-stream';
}

const isRemote = (resource: string): boolean => /^(https?:)?\/\//i.test(resource);

export interface BundleOptions {
  /** リモートのリソース取得（デフォルト: fetch） */
  fetchResource?: ResourceFetcher;
}

class ResourceLoader {
  constructor(
    private readonly baseDir: string,
    private readonly fetchResource: ResourceFetcher,
  ) {}

  async load(resource: string): Promise<Buffer> {
    if (isRemote(resource)) {
      return this.fetchResource(resource.startsWith('//') ? `https:${resource}` : resource);
    }
    if (resource.startsWith('file:')) {
      return fs.readFile(fileURLToPath(resource));
    }
    const pathname = decodeURIComponent(resource.split(/[?#]/)[0] ?? resource);
    return fs.readFile(path.resolve(this.baseDir, pathname));
  }
}

/**
 * HTML が参照するリソースを埋め込んだ1ファイルの HTML を作る
 *
 * - `<link rel="stylesheet">` は `<style>` に置き換える
 * - `<script src>` は中身を埋め込む
 * - `<img src>` は data URI に置き換える
 *
 * 相対パスは HTML ファイルのディレクトリ基準で解決する。
 */
export async function bundleHtml(
  htmlPath: string,
  outputPath: string,
  options: BundleOptions = {},
): Promise<Result<void, BundleError>> {
  const loader = new ResourceLoader(path.dirname(htmlPath), options.fetchResource ?? fetchRemote);

  let html: string;
  try {
    html = await fs.readFile(htmlPath, 'utf-8');
  } catch (error) {
    return createErr(bundleError(htmlPath, error));
  }
  const $ = cheerio.load(html);

  for (const element of $('link[rel~="stylesheet"][href]').toArray()) {
    const href = $(element).attr('href');
    if (href === undefined || href.startsWith('data:')) {
      continue;
    }
    try {
      const css = (await loader.load(href)).toString('utf-8');
      const style = $('<style></style>').text(css);
      const media = $(element).attr('media');
      if (media !== undefined) {
        style.attr('media', media);
      }
      $(element).replaceWith(style);
    } catch (error) {
      return createErr(bundleError(href, error));
    }
  }

  for (const element of $('script[src]').toArray()) {
    const src = $(element).attr('src');
    if (src === undefined || src.startsWith('data:')) {
      continue;
    }
    try {
      const code = (await loader.load(src)).toString('utf-8').replace(/<\/script/gi, '<\\/script');
      $(element).removeAttr('src').text(code);
    } catch (error) {
      return createErr(bundleError(src, error));
    }
  }

  for (const element of $('img[src]').toArray()) {
    const src = $(element).attr('src');
    if (src === undefined || src.startsWith('data:')) {
      continue;
    }
    try {
      const data = await loader.load(src);
      $(element).attr('src', `data:${imageMimeType(src)};base64,${data.toString('base64')}`);
    } catch (error) {
      return createErr(bundleError(src, error));
    }
  }

  try {
    await fs.writeFile(outputPath, $.html(), 'utf-8');
  } catch (error) {
    return createErr(bundleError(outputPath, error));
  }
  return createOk(undefined);
}

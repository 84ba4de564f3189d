/**
 * reveal.js の HTML を Chromium で PDF に書き出す
 */

import * as fs from 'node:fs/promises';
import { pathToFileURL } from 'node:url';
import { chromium, type Page } from 'playwright-core';
import { createErr, createOk, type Result } from 'option-t/plain_result';
import { renderError, type RenderError } from '../../types/errors.ts';
import { isNotFoundError } from '../config/config-file.ts';

export interface HtmlToPdfOptions {
  /** Chromium の実行ファイル（存在する場合のみ使う） */
  chromiumPath?: string | null;
  /** 出力先（省略時は拡張子を .pdf に置き換えたパス） */
  outputPath?: string;
  /** 各待機のタイムアウト（ms） */
  timeout?: number;
}

export const toPdfPath = (htmlPath: string): string => htmlPath.replace(/\.[^./\\]*$/, '') + '.pdf';

async function isExistingFile(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isFile();
  } catch (error) {
    // 存在しなければ同梱のブラウザ探索に任せる
    if (isNotFoundError(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * 描画が落ち着くまで待つ（読み込み・フォント・2フレーム分の描画）
 */
async function waitForRenderStable(page: Page, timeout: number): Promise<void> {
  await page.waitForLoadState('domcontentloaded', { timeout });
  await page.waitForLoadState('load', { timeout });
  await page.waitForFunction("!document.fonts || document.fonts.status === 'loaded'", undefined, {
    timeout,
  });
  await page.evaluate('document.fonts ? document.fonts.ready.then(() => true) : true');
  await page.evaluate(
    'new Promise((resolve) => requestAnimationFrame(() => requestAnimationFrame(() => resolve(true))))',
  );
}

/**
 * @returns 書き出した PDF のパス
 */
export async function htmlToPdf(
  htmlPath: string,
  options: HtmlToPdfOptions = {},
): Promise<Result<string, RenderError>> {
  const outputPath = options.outputPath ?? toPdfPath(htmlPath);
  const timeout = options.timeout ?? 30_000;

  try {
    const executablePath =
      options.chromiumPath && (await isExistingFile(options.chromiumPath)) ? options.chromiumPath : undefined;
    const browser = await chromium.launch({ executablePath });
    try {
      const page = await browser.newPage();
      await page.goto(`${pathToFileURL(htmlPath).href}?print-pdf`, { waitUntil: 'networkidle', timeout });
      await page.locator('.reveal.ready').waitFor({ timeout });
      await waitForRenderStable(page, timeout);
      await page.pdf({ path: outputPath, preferCSSPageSize: true });
    } finally {
      await browser.close();
    }
  } catch (error) {
    return createErr(renderError(htmlPath, error));
  }

  return createOk(outputPath);
}

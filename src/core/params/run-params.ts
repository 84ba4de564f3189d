/**
 * Run Parameters
 *
 * mdbind の実行パラメータのスキーマと、CLI値・設定ファイルからの解決処理。
 */

import { fileURLToPath } from 'node:url';
import * as path from 'node:path';
import { createErr, createOk, type Result } from 'option-t/plain_result';
import type { FilePath } from '../../types/branded.ts';
import type { ParamsOf } from '../../types/params-schema.ts';
import {
  presentationOutputError,
  type ConfigError,
  type PresentationOutputError,
} from '../../types/errors.ts';
import {
  booleanField,
  defineGroup,
  groupField,
  listField,
  pathField,
  stringField,
} from '../config/schema.ts';
import { mergeCliWithConfig } from '../config/merge.ts';

export const REVEAL_JS_URL = 'https://cdn.jsdelivr.net/npm/reveal.js@4';

/**
 * reveal.js 用の同梱アセット（header.html, footer.html, public/）
 */
export const REVEAL_ASSETS_DIR = fileURLToPath(new URL('../../../assets/reveal/', import.meta.url));

export const PresentationParamsSchema = defineGroup({
  typeName: 'PresentationParams',
  section: 'presentation',
  fields: {
    presentation: booleanField({
      description: 'Build a reveal.js presentation instead of a PDF document',
      default: false,
    }),
    footerText: stringField({
      description: 'Footer text shown on every slide',
      nullable: true,
      default: '',
    }),
    animateAllLines: booleanField({
      description: 'Reveal every line of a slide as a separate fragment',
      default: false,
    }),
    chromiumPath: pathField({
      description: 'Chromium executable used to export the presentation to PDF',
      nullable: false,
      default: '/usr/bin/chromium',
    }),
  },
});

export const RunParamsSchema = defineGroup({
  typeName: 'RunParams',
  section: 'mdbind',
  fields: {
    rootDir: pathField({
      description: 'Directory to search for Markdown files (defaults to the config file directory or cwd)',
      nullable: true,
      default: null,
    }),
    output: stringField({
      description: 'Output file (defaults to <root_dir>/<name>.pdf)',
      nullable: true,
      default: null,
      short: '-o',
    }),
    titlePage: booleanField({
      description: 'Add a title page built from title, author and date',
      default: false,
    }),
    title: stringField({
      description: 'Document title (defaults to the root directory name)',
      nullable: true,
      default: null,
    }),
    author: stringField({
      description: 'Document author (defaults to the current user)',
      nullable: true,
      default: null,
    }),
    pandocArgs: listField({
      description: 'Extra arguments passed to pandoc (whitespace separated)',
      separator: 'whitespace',
      default: [],
    }),
    configPath: pathField({
      description: 'Path to the TOML config file',
      nullable: true,
      default: null,
      short: '-c',
    }),
    headerTex: pathField({
      description: 'LaTeX header included in the PDF preamble (defaults to ./header.tex)',
      nullable: true,
      default: null,
    }),
    mergedMd: pathField({
      description: 'Directory to keep the merged Markdown in (a temp directory otherwise)',
      nullable: true,
      default: null,
    }),
    removeAltTexts: listField({
      description: 'Image alt texts to remove (comma separated)',
      separator: 'comma',
      default: ['alt text'],
    }),
    toc: booleanField({
      description: 'Add a table of contents',
      default: false,
    }),
    verbose: booleanField({
      description: 'Verbose output (also passed to pandoc)',
      default: false,
    }),
    presentation: groupField(PresentationParamsSchema),
  },
});

export type RunParams = ParamsOf<typeof RunParamsSchema>;
export type PresentationParams = ParamsOf<typeof PresentationParamsSchema>;

/**
 * reveal.js 出力用に pandoc へ追加する引数
 */
export function revealPandocArgs(assetsDir: string = REVEAL_ASSETS_DIR): string[] {
  return [
    '-t',
    'revealjs',
    '-V',
    `revealjs-url=${REVEAL_JS_URL}`,
    '-H',
    path.join(assetsDir, 'header.html'),
    '-A',
    path.join(assetsDir, 'footer.html'),
  ];
}

/**
 * CLI値と設定ファイルから実行パラメータを解決する
 *
 * 1. extra（認識されなかった引数）を CLI の pandocArgs の後ろに追加し、configPath を設定
 * 2. 設定ファイルとマージ
 * 3. verbose なら pandocArgs に `--verbose` を1つだけ追加
 * 4. プレゼンテーションモードでは出力が HTML であることを検証し、reveal.js 用の引数を追加
 *
 * 入力の cli は変更しない。
 */
export async function resolveRunParams(
  cli: RunParams,
  extra: readonly string[],
  configPath: FilePath | null,
): Promise<Result<RunParams, ConfigError | PresentationOutputError>> {
  const prepared: RunParams = {
    ...cli,
    pandocArgs: [...cli.pandocArgs, ...extra],
    configPath,
  };

  const merged = await mergeCliWithConfig(prepared, configPath, RunParamsSchema);
  if (!merged.ok) {
    return merged;
  }
  const params = merged.val;

  if (params.verbose && !params.pandocArgs.includes('--verbose')) {
    params.pandocArgs.push('--verbose');
  }

  if (params.presentation.presentation) {
    if (params.output && !params.output.toLowerCase().endsWith('.html')) {
      return createErr(presentationOutputError(params.output));
    }
    params.pandocArgs.push(...revealPandocArgs());
  }

  return createOk(params);
}

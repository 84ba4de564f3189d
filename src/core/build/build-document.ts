/**
 * Build Document
 *
 * 解決済みの実行パラメータから文書を生成する一連の処理。
 *
 * 1. 外部コマンドの確認
 * 2. Markdown の探索と連結（タイトルページ用メタデータ付き）
 * 3. pandoc の実行
 * 4. HTML 出力なら設定スクリプトの差し込みとリソースの埋め込み
 * 5. プレゼンテーションなら PDF への書き出し
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { createErr, createOk, isErr, type Result } from 'option-t/plain_result';
import {
  buildIOError,
  noMarkdownFiles,
  type BuildError,
  type BuildIOError,
  type RenderError,
} from '../../types/errors.ts';
import type { OutputStream, ProcessRunner } from '../runner/process-runner.ts';
import { isNotFoundError } from '../config/config-file.ts';
import { REVEAL_ASSETS_DIR, type RunParams } from '../params/run-params.ts';
import { findMarkdownFiles } from './markdown-files.ts';
import { createMetadata, mergeMarkdown } from './markdown-merger.ts';
import { buildLatexHeader } from './latex-header.ts';
import { buildPandocArgs, isHtmlOutput, isPdfOutput } from './pandoc-command.ts';
import { checkRequirements, type CommandLookup } from './requirements.ts';
import { runPandoc } from './pandoc-runner.ts';
import { bundleHtml, injectRevealConfig, type ResourceFetcher } from './html-postprocess.ts';
import { htmlToPdf, type HtmlToPdfOptions } from './html-to-pdf.ts';

/**
 * 進捗の通知先（CLI ではコンソールとスピナー）
 */
export interface BuildReporter {
  info(message: string): void;
  pandocStarted(args: readonly string[]): void;
  pandocLine(line: string, stream: OutputStream): void;
  pandocFinished(): void;
}

export interface BuildDependencies {
  reporter?: BuildReporter;
  runner?: ProcessRunner;
  /** 実行ファイルの探索（デフォルト: which） */
  lookupCommand?: CommandLookup;
  fetchResource?: ResourceFetcher;
  renderPdf?: (htmlPath: string, options: HtmlToPdfOptions) => Promise<Result<string, RenderError>>;
  /** 既定の rootDir と header.tex の探索先 */
  cwd?: string;
  /** author 未指定時の著者名 */
  username?: () => string;
  now?: () => Date;
}

export interface BuildSummary {
  /** pandoc の出力（HTML の場合は埋め込み済み） */
  output: string;
  /** プレゼンテーションから書き出した PDF */
  pdfOutput?: string;
  /** 連結した Markdown（mergedMd 指定時のみ残る） */
  mergedPath: string;
}

const silentReporter: BuildReporter = {
  info: () => undefined,
  pandocStarted: () => undefined,
  pandocLine: () => undefined,
  pandocFinished: () => undefined,
};

async function attempt<T>(operation: string, task: () => Promise<T>): Promise<Result<T, BuildIOError>> {
  try {
    return createOk(await task());
  } catch (error) {
    return createErr(buildIOError(operation, error));
  }
}

/**
 * 存在しないパスは false。それ以外の stat の失敗（権限など）は投げる
 */
async function isFile(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isFile();
  } catch (error) {
    if (isNotFoundError(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * rootDir 未指定時は設定ファイルのディレクトリ、それもなければ cwd
 */
export function resolveRootDir(params: RunParams, cwd: string): string {
  if (params.rootDir !== null) {
    return params.rootDir;
  }
  return params.configPath !== null ? path.dirname(params.configPath) : cwd;
}

/**
 * 出力ファイル未指定時の既定値（<rootDir>/<rootDir名>.pdf、プレゼンテーションは .html）
 */
export function defaultOutputPath(rootDir: string, presentation: boolean): string {
  const name = path.basename(path.resolve(rootDir));
  return path.join(rootDir, `${name}.${presentation ? 'html' : 'pdf'}`);
}

async function copyPublicAssets(targetDir: string): Promise<void> {
  const publicDir = path.join(REVEAL_ASSETS_DIR, 'public');
  const entries = await fs.readdir(publicDir, { withFileTypes: true });
  for (const entry of entries) {
    if (entry.isFile()) {
      await fs.copyFile(path.join(publicDir, entry.name), path.join(targetDir, entry.name));
    }
  }
}

export async function buildDocument(
  params: RunParams,
  deps: BuildDependencies = {},
): Promise<Result<BuildSummary, BuildError>> {
  const reporter = deps.reporter ?? silentReporter;
  const cwd = deps.cwd ?? process.cwd();

  const requirements = await checkRequirements(deps.lookupCommand);
  if (isErr(requirements)) {
    return requirements;
  }

  if (params.rootDir === null) {
    reporter.info(
      params.configPath !== null
        ? `Using directory of config file as root_dir: ${path.dirname(params.configPath)}`
        : `Using current directory as root_dir: ${cwd}`,
    );
  }
  const rootDir = resolveRootDir(params, cwd);

  const found = await findMarkdownFiles(rootDir);
  if (!found.ok) {
    return found;
  }
  const files = found.val;
  if (files.length === 0) {
    return createErr(noMarkdownFiles(rootDir));
  }

  const title = params.title || path.basename(path.resolve(rootDir));
  const author = params.author || (deps.username ?? (() => os.userInfo().username))();
  const metadata =
    params.titlePage || params.title || params.author
      ? createMetadata(title, author, deps.now?.())
      : '';

  const scratch = await attempt('creating a temp directory', () =>
    fs.mkdtemp(path.join(os.tmpdir(), 'mdbind-')),
  );
  if (!scratch.ok) {
    return scratch;
  }
  const workDir = scratch.val;

  try {
    return await buildInWorkDir(params, {
      workDir,
      rootDir,
      files,
      metadata,
      cwd,
      reporter,
      deps,
    });
  } finally {
    await fs.rm(workDir, { recursive: true, force: true });
  }
}

interface BuildContext {
  workDir: string;
  rootDir: string;
  files: readonly string[];
  metadata: string;
  cwd: string;
  reporter: BuildReporter;
  deps: BuildDependencies;
}

async function buildInWorkDir(
  params: RunParams,
  context: BuildContext,
): Promise<Result<BuildSummary, BuildError>> {
  const { workDir, rootDir, files, metadata, cwd, reporter, deps } = context;

  const mergedDir = params.mergedMd ?? workDir;
  const mergedPath = path.join(mergedDir, 'merged.md');
  const prepared = await attempt(`creating ${mergedDir}`, () => fs.mkdir(mergedDir, { recursive: true }));
  if (!prepared.ok) {
    return prepared;
  }

  const merged = await mergeMarkdown(files, mergedPath, metadata, params.removeAltTexts);
  if (!merged.ok) {
    return merged;
  }

  const output = params.output ?? defaultOutputPath(rootDir, params.presentation.presentation);

  let headerPath: string | null = null;
  if (isPdfOutput(output)) {
    const candidate = params.headerTex ?? path.join(cwd, 'header.tex');
    const found = await attempt(`checking ${candidate}`, () => isFile(candidate));
    if (!found.ok) {
      return found;
    }
    const userHeader = found.val ? candidate : null;
    const header = await attempt('writing the LaTeX header', () => buildLatexHeader(userHeader, workDir));
    if (!header.ok) {
      return header;
    }
    headerPath = header.val;
  }

  const args = buildPandocArgs({
    mergedPath,
    output,
    sourceFiles: files,
    headerPath,
    toc: params.toc,
    pandocArgs: params.pandocArgs,
  });

  reporter.pandocStarted(args);
  const pandoc = await runPandoc(args, {
    runner: deps.runner,
    onLine: (line, stream) => reporter.pandocLine(line, stream),
  });
  reporter.pandocFinished();
  if (!pandoc.ok) {
    return pandoc;
  }
  reporter.info(`Merged PDF written to ${output}`);

  if (isHtmlOutput(output)) {
    const injected = await attempt(`injecting the presentation config into ${output}`, async () => {
      const html = await fs.readFile(output, 'utf-8');
      await fs.writeFile(output, injectRevealConfig(html, params.presentation), 'utf-8');
      const staged = path.join(workDir, path.basename(output));
      await fs.copyFile(output, staged);
      await copyPublicAssets(workDir);
      return staged;
    });
    if (!injected.ok) {
      return injected;
    }

    const bundled = await bundleHtml(injected.val, output, { fetchResource: deps.fetchResource });
    if (!bundled.ok) {
      return bundled;
    }
    reporter.info(`Bundled HTML written to ${output}`);
  }

  if (!params.presentation.presentation) {
    return createOk({ output, mergedPath });
  }

  const renderPdf = deps.renderPdf ?? htmlToPdf;
  const pdf = await renderPdf(output, { chromiumPath: params.presentation.chromiumPath });
  if (!pdf.ok) {
    return pdf;
  }
  reporter.info(`Converted HTML presentation to PDF: ${pdf.val}`);
  return createOk({ output, pdfOutput: pdf.val, mergedPath });
}

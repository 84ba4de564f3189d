import type { Command } from 'commander';
import { isErr } from 'option-t/plain_result';
import { createParamsCommand, readCliParams } from '../params-parser.ts';
import { RunParamsSchema, resolveRunParams } from '../../core/params/run-params.ts';
import { discoverConfigPath } from '../../core/config/config-path.ts';
import { buildDocument, type BuildReporter } from '../../core/build/build-document.ts';
import { createSpinner, type Spinner } from '../progress/spinner.ts';
import { STATUS_ICONS } from '../progress/ansi-utils.ts';
import { toDisplayPath } from '../utils/display-path.ts';

/**
 * コンソールへの進捗表示
 *
 * pandoc の実行中はスピナーを出し、pandoc の出力行はスピナーを消してから流す。
 */
export function createConsoleReporter(verbose: boolean): BuildReporter {
  let spinner: Spinner | null = null;

  return {
    info(message) {
      console.log(message);
    },
    pandocStarted(args) {
      if (verbose) {
        console.log(`${STATUS_ICONS.INFO} pandoc ${args.join(' ')}`);
      }
      spinner = createSpinner('Pandoc running...');
      spinner.start();
    },
    pandocLine(line) {
      if (spinner) {
        spinner.writeLine(line);
      } else {
        console.log(line);
      }
    },
    pandocFinished() {
      spinner?.stop();
      spinner = null;
    },
  };
}

/**
 * `mdbind [options] [pandoc args...]` の実行処理
 *
 * @param command - parse 済みのルートコマンド
 * @param argv - 設定ファイルのパスを探すユーザー引数
 */
async function executeBuild(command: Command, argv: readonly string[]): Promise<void> {
  const { params: cliParams, extra } = readCliParams(RunParamsSchema, command);
  const configPath = await discoverConfigPath(argv);

  const resolved = await resolveRunParams(cliParams, extra, configPath);
  if (isErr(resolved)) {
    console.error(`${STATUS_ICONS.FAILURE} Error: ${resolved.err.message}`);
    process.exit(1);
  }
  const params = resolved.val;

  if (configPath !== null && params.verbose) {
    console.log(`${STATUS_ICONS.INFO} Using config file: ${toDisplayPath(configPath)}`);
  }

  const result = await buildDocument(params, { reporter: createConsoleReporter(params.verbose) });
  if (isErr(result)) {
    console.error(`${STATUS_ICONS.FAILURE} ${result.err.message}`);
    process.exit(1);
  }

  console.log(`${STATUS_ICONS.SUCCESS} Done: ${toDisplayPath(result.val.pdfOutput ?? result.val.output)}`);
}

/**
 * ルートコマンド（文書のビルド）を作成
 *
 * オプションは RunParamsSchema から生成し、認識できない引数は pandoc に渡す。
 */
export function createBuildCommand(argv: readonly string[] = process.argv.slice(2)): Command {
  return createParamsCommand(RunParamsSchema, 'mdbind')
    .description(
      'Merge all Markdown files under a directory into one PDF (or reveal.js presentation) with pandoc',
    )
    .action(async (_extra: string[], _options: unknown, command: Command) => {
      try {
        await executeBuild(command, argv);
      } catch (error) {
        console.error(`${STATUS_ICONS.FAILURE} Build failed:`, error);
        process.exit(1);
      }
    });
}

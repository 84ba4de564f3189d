import type { Command } from 'commander';
import { createBuildCommand } from './commands/build.ts';
import { createConfigCommand } from './commands/config.ts';
import { getVersion } from './utils/get-version.ts';

/**
 * ルートコマンドに config サブコマンドを加えたプログラムを作成
 *
 * ルートとサブコマンドが同じ `-c, --config-path` を持つため、
 * ルートのオプションはサブコマンド名より前にあるものだけを解析する。
 */
export function createProgram(argv: readonly string[] = process.argv.slice(2)): Command {
  // WHY: -V は pandoc の変数指定と衝突するため --version のみ
  return createBuildCommand(argv)
    .version(getVersion(), '--version')
    .enablePositionalOptions()
    .addCommand(createConfigCommand());
}

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { filePath, type FilePath } from '../../types/branded.ts';
import { isNotFoundError } from './config-file.ts';

export const DEFAULT_CONFIG_FILENAME = 'mdbind.toml';
export const CONFIG_PATH_FLAGS = ['-c', '--config-path'] as const;

export interface DiscoverConfigPathOptions {
  /** パスを値として受け取るフラグ名 */
  flagNames?: readonly string[];
  /** cwd 直下で探す既定のファイル名 */
  defaultFilename?: string;
  /** 既定ファイルを探すディレクトリ（省略時は process.cwd()） */
  cwd?: string;
}

/**
 * 設定ファイルのパスを探す
 *
 * 1. 引数列から `-c <path>` / `--config-path <path>`（`--config-path=<path>` も可）を探す
 * 2. 見つからなければ cwd 直下の既定ファイルが存在すればそれを使う
 *
 * @param argv - 走査する引数列
 * @returns 設定ファイルのパス（見つからなければnull）
 */
export async function discoverConfigPath(
  argv: readonly string[] | undefined,
  options: DiscoverConfigPathOptions = {},
): Promise<FilePath | null> {
  const flagNames = options.flagNames ?? CONFIG_PATH_FLAGS;
  const args = argv ?? [];

  for (const [index, arg] of args.entries()) {
    const next = args[index + 1];
    if (flagNames.includes(arg) && next !== undefined) {
      return filePath(next);
    }
    const inline = flagNames.find((flag) => flag.startsWith('--') && arg.startsWith(`${flag}=`));
    if (inline !== undefined) {
      return filePath(arg.slice(inline.length + 1));
    }
  }

  const base = options.cwd ?? process.cwd();
  const defaultPath = path.join(base, options.defaultFilename ?? DEFAULT_CONFIG_FILENAME);

  try {
    const stat = await fs.stat(defaultPath);
    return stat.isFile() ? filePath(defaultPath) : null;
  } catch (error) {
    if (isNotFoundError(error)) {
      return null;
    }
    throw error;
  }
}

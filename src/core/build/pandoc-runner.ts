/**
 * pandoc の実行
 */

import { createErr, createOk, type Result } from 'option-t/plain_result';
import { pandocError, type PandocError } from '../../types/errors.ts';
import { ProcessRunner, type OutputStream, type ProcessResult } from '../runner/process-runner.ts';

export interface RunPandocOptions {
  runner?: ProcessRunner;
  /** 実行ファイル名（デフォルト: pandoc） */
  command?: string;
  cwd?: string;
  /** pandoc の出力行 */
  onLine?: (line: string, stream: OutputStream) => void;
}

const UNRECOGNIZED_OPTION_PATTERNS = [/unrecognized option `([^']+)'/, /Unknown option (--\S+)/];

/**
 * pandoc の stderr から認識されなかったオプションを取り出す
 */
export function findUnrecognizedOption(stderr: string): string | undefined {
  for (const pattern of UNRECOGNIZED_OPTION_PATTERNS) {
    const match = pattern.exec(stderr);
    if (match?.[1] !== undefined) {
      return match[1];
    }
  }
  return undefined;
}

export async function runPandoc(
  args: readonly string[],
  options: RunPandocOptions = {},
): Promise<Result<ProcessResult, PandocError>> {
  const runner = options.runner ?? new ProcessRunner();

  let result: ProcessResult;
  try {
    result = await runner.run(options.command ?? 'pandoc', args, {
      cwd: options.cwd,
      onLine: options.onLine,
    });
  } catch (error) {
    return createErr(pandocError(null, error instanceof Error ? error.message : String(error)));
  }

  if (result.exitCode !== 0) {
    return createErr(pandocError(result.exitCode, result.stderr, findUnrecognizedOption(result.stderr)));
  }
  return createOk(result);
}

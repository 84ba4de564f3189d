/**
 * 外部コマンドの確認
 *
 * pandoc と xetex（PDF エンジン）が PATH 上にあるかを確認する。
 */

import { exec } from 'node:child_process';
import { promisify } from 'node:util';
import { createErr, createOk, type Result } from 'option-t/plain_result';
import { requirementError, type RequirementError } from '../../types/errors.ts';

const execAsync = promisify(exec);

export const REQUIRED_COMMANDS = ['pandoc', 'xetex'] as const;

export type CommandLookup = (name: string) => Promise<boolean>;

/**
 * `which` でコマンドが見つかるか
 */
export const isCommandOnPath: CommandLookup = async (name) => {
  try {
    await execAsync(`which ${name}`);
    return true;
  } catch {
    // whichが失敗 = 見つからない
    return false;
  }
};

export async function checkRequirements(
  lookup: CommandLookup = isCommandOnPath,
  commands: readonly string[] = REQUIRED_COMMANDS,
): Promise<Result<void, RequirementError>> {
  const missing: string[] = [];
  for (const name of commands) {
    if (!(await lookup(name))) {
      missing.push(name);
    }
  }
  return missing.length > 0 ? createErr(requirementError(missing)) : createOk(undefined);
}

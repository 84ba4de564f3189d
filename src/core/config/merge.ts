/**
 * Merge Engine
 *
 * CLIで解析したパラメータと設定ファイルの値を、フィールド単位で再帰的にマージする。
 *
 * 優先順位:
 * 1. 既定値と異なるCLI指定値
 * 2. 設定ファイルの値
 * 3. スキーマ既定値
 */

import { isDeepStrictEqual } from 'node:util';
import { createOk, type Result } from 'option-t/plain_result';
import type {
  GroupSpec,
  ParamsOf,
  ParamsRecord,
  UnsetParamsOf,
} from '../../types/params-schema.ts';
import type { ConfigError } from '../../types/errors.ts';
import { createDefaultRecord, isGroupField, isParamsOf, isParamsRecord } from './schema.ts';
import { loadConfigDefaults } from './config-file.ts';

type FieldSlot = ParamsRecord[string];

function toRecord(value: unknown, label: string): ParamsRecord {
  if (!isParamsRecord(value)) {
    throw new Error(`Expected a parameter group for ${label}`);
  }
  return value;
}

/**
 * CLI値が「指定されていない」とみなせるか
 *
 * NOTE: 既定値と同じ値が明示的に渡された場合も未指定と区別できない
 */
function isUnspecified(current: FieldSlot, defaultValue: FieldSlot): boolean {
  return (
    current === undefined ||
    current === null ||
    current === '' ||
    (Array.isArray(current) && current.length === 0) ||
    isDeepStrictEqual(current, defaultValue)
  );
}

/**
 * リストの和集合（設定ファイルの要素が先、CLIにしかない要素を後ろに追加）
 */
export function unionLists(fromFile: readonly string[], fromCli: readonly string[]): string[] {
  return [...fromFile, ...fromCli.filter((item) => !fromFile.includes(item))];
}

function cloneSlot(value: FieldSlot): FieldSlot {
  if (Array.isArray(value)) {
    return [...value];
  }
  if (isParamsRecord(value)) {
    return cloneRecord(value);
  }
  return value;
}

function cloneRecord(record: ParamsRecord): ParamsRecord {
  const cloned: ParamsRecord = {};
  for (const [name, value] of Object.entries(record)) {
    cloned[name] = cloneSlot(value);
  }
  return cloned;
}

function mergeGroup(
  group: GroupSpec,
  cli: ParamsRecord,
  fromFile: ParamsRecord,
  defaults: ParamsRecord,
): ParamsRecord {
  const merged: ParamsRecord = {};

  for (const [name, field] of Object.entries(group.fields)) {
    const current = cli[name];
    const fileValue = fromFile[name];
    const defaultValue = defaults[name];

    if (isGroupField(field)) {
      merged[name] = mergeGroup(
        field.group,
        toRecord(current, name),
        toRecord(fileValue, name),
        toRecord(defaultValue, name),
      );
      continue;
    }

    if (Array.isArray(fileValue)) {
      merged[name] =
        isUnspecified(current, defaultValue) || !Array.isArray(current)
          ? [...fileValue]
          : unionLists(fileValue, current);
      continue;
    }

    if (fileValue !== undefined && fileValue !== null && isUnspecified(current, defaultValue)) {
      merged[name] = cloneSlot(fileValue);
    } else {
      merged[name] = cloneSlot(current);
    }
  }

  return merged;
}

/**
 * CLIパラメータと設定ファイルの値をマージする
 *
 * 入力はどちらも変更せず、新しいインスタンスを返す。
 *
 * @param root - ルートのスキーマグループ
 * @param cli - CLIから解析したパラメータ（未指定のフィールドはスキーマ既定値）
 * @param fromFile - 設定ファイルから読み込んだ未設定インスタンス
 */
export function mergeParams<G extends GroupSpec>(
  root: G,
  cli: ParamsOf<G>,
  fromFile: UnsetParamsOf<G>,
): ParamsOf<G> {
  const merged = mergeGroup(
    root,
    toRecord(cli, root.typeName),
    toRecord(fromFile, root.typeName),
    createDefaultRecord(root),
  );

  if (!isParamsOf(root, merged)) {
    throw new Error(`Merged parameters do not match schema ${root.typeName}`);
  }
  return merged;
}

/**
 * 設定ファイルを読み込み、CLIパラメータとマージする
 *
 * 設定ファイルのエラー（未知のセクション・キーなど）はそのまま返す。
 *
 * @param cli - CLIから解析したパラメータ
 * @param configPath - 設定ファイルのパス（未指定・存在しない場合は既定値のみ）
 * @param root - ルートのスキーマグループ
 */
export async function mergeCliWithConfig<G extends GroupSpec>(
  cli: ParamsOf<G>,
  configPath: string | null | undefined,
  root: G,
): Promise<Result<ParamsOf<G>, ConfigError>> {
  const loaded = await loadConfigDefaults(configPath, root);
  if (!loaded.ok) {
    return loaded;
  }
  return createOk(mergeParams(root, cli, loaded.val));
}

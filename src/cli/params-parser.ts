/**
 * CLI Parameter Parser
 *
 * スキーマテーブルから commander のオプションを生成し、解析結果をパラメータインスタンスに変換する。
 *
 * - boolean: 値を取らないフラグ（既定値が true のものは `--no-<name>`）
 * - string / path: `<value>` を1つ取る
 * - number: zod で数値として検証
 * - list: 繰り返し指定でき、各値はフィールドの区切り方で分割される
 *
 * 認識できないオプションと余った引数は extra として呼び出し側に渡す。
 */

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { z } from 'zod';
import { createErr, createOk, type Result } from 'option-t/plain_result';
import { filePath } from '../types/branded.ts';
import { cliParseError, type CliParseError } from '../types/errors.ts';
import type {
  GroupSpec,
  LeafFieldSpec,
  ParamsOf,
  ParamsRecord,
} from '../types/params-schema.ts';
import {
  createUnsetRecord,
  defaultLeafValue,
  getSectionRecord,
  isGroupField,
  isParamsOf,
  splitListValue,
} from '../core/config/schema.ts';

export interface CliParseResult<G extends GroupSpec> {
  params: ParamsOf<G>;
  /** 認識できなかったオプションと余った引数（出現順は operands → unknown） */
  extra: string[];
}

interface LeafOption {
  /** ルートからのグループのパス */
  readonly path: readonly string[];
  readonly name: string;
  readonly field: LeafFieldSpec;
}

const numberArgSchema = z
  .string()
  .trim()
  .regex(/^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/)
  .transform(Number);

/**
 * camelCase のフィールド名を kebab-case のフラグ名に変換
 */
export function toFlagName(fieldName: string): string {
  return fieldName.replace(/[A-Z]/g, (char) => `-${char.toLowerCase()}`);
}

/**
 * スキーマ全体の葉フィールドを宣言順で列挙する
 */
function collectLeafOptions(group: GroupSpec, path: readonly string[] = []): LeafOption[] {
  const leaves: LeafOption[] = [];
  for (const [name, field] of Object.entries(group.fields)) {
    if (isGroupField(field)) {
      leaves.push(...collectLeafOptions(field.group, [...path, name]));
    } else {
      leaves.push({ path, name, field });
    }
  }
  return leaves;
}

function createOption(name: string, field: LeafFieldSpec): Option {
  const long = toFlagName(name);
  const short = field.kind === 'list' ? undefined : field.short;
  const prefix = short ? `${short}, ` : '';

  switch (field.kind) {
    case 'scalar': {
      if (field.type === 'boolean') {
        const negate = field.default === true;
        return new Option(`${prefix}--${negate ? 'no-' : ''}${long}`, field.description);
      }
      const option = new Option(`${prefix}--${long} <value>`, field.description);
      if (field.type === 'number') {
        option.argParser((value: string): number => {
          const parsed = numberArgSchema.safeParse(value);
          if (!parsed.success) {
            throw new InvalidArgumentError('Not a number.');
          }
          return parsed.data;
        });
      }
      return option;
    }
    case 'path':
      return new Option(`${prefix}--${long} <path>`, field.description);
    case 'list':
      return new Option(`--${long} <value>`, field.description).argParser(
        (value: string, previous: string[] | undefined): string[] => [
          ...(previous ?? []),
          ...splitListValue(field.separator, value),
        ],
      );
  }
}

/**
 * スキーマからオプションを生成した commander のコマンドを作成する
 *
 * 入れ子グループのフィールドもフラットなフラグとして並べる。
 * フラグ名の衝突はスキーマ定義の誤りとして例外を投げる。
 *
 * @param group - ルートのスキーマグループ
 * @param name - コマンド名
 */
export function createParamsCommand(group: GroupSpec, name?: string): Command {
  const command = new Command(name);
  const seenFlags = new Map<string, string>();

  for (const leaf of collectLeafOptions(group)) {
    const option = createOption(leaf.name, leaf.field);
    const owner = [...leaf.path, leaf.name].join('.');
    for (const flag of [option.long, option.short]) {
      if (flag === undefined) {
        continue;
      }
      const existing = seenFlags.get(flag);
      if (existing !== undefined) {
        throw new Error(`CLI flag ${flag} of ${owner} collides with ${existing}`);
      }
      seenFlags.set(flag, owner);
    }
    command.addOption(option);
  }

  return command
    .argument('[extra...]', 'Extra arguments passed through')
    .allowUnknownOption()
    .allowExcessArguments();
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function toLeafValue(field: LeafFieldSpec, value: unknown): ParamsRecord[string] {
  if (value === undefined) {
    return defaultLeafValue(field);
  }
  if (field.kind === 'path' && typeof value === 'string') {
    return filePath(value);
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (isStringArray(value)) {
    return [...value];
  }
  throw new Error(`Unexpected CLI value for ${field.description}`);
}

/**
 * 解析済みのコマンドからパラメータインスタンスを組み立てる
 *
 * 指定されたフラグの値を使い、それ以外のフィールドはスキーマ既定値になる。
 *
 * @param group - コマンドの生成に使ったスキーマグループ
 * @param command - parse 済みのコマンド
 */
export function readCliParams<G extends GroupSpec>(group: G, command: Command): CliParseResult<G> {
  const record = createUnsetRecord(group);
  const values = command.opts();

  for (const leaf of collectLeafOptions(group)) {
    const attribute = createOption(leaf.name, leaf.field).attributeName();
    const value: unknown = values[attribute];
    getSectionRecord(record, leaf.path)[leaf.name] = toLeafValue(leaf.field, value);
  }

  if (!isParamsOf(group, record)) {
    throw new Error(`CLI parameters do not match schema ${group.typeName}`);
  }
  return { params: record, extra: [...command.args] };
}

/**
 * 引数列を解析してパラメータインスタンスを得る
 *
 * commander のエラー（値の欠落・不正な数値など）は CliParseError として返す。
 *
 * @param group - ルートのスキーマグループ
 * @param argv - ユーザー引数（プログラム名を含まない）
 */
export function parseCliParams<G extends GroupSpec>(
  group: G,
  argv: readonly string[],
): Result<CliParseResult<G>, CliParseError> {
  const command = createParamsCommand(group)
    .exitOverride()
    .configureOutput({ writeErr: () => undefined });

  try {
    command.parse([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return createErr(cliParseError(error.code, error.message));
    }
    throw error;
  }

  return createOk(readCliParams(group, command));
}

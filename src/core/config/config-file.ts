/**
 * Config File Loader
 *
 * TOML設定ファイルを「未設定インスタンス」に読み込む。
 * 未知のセクション・キーは厳格に拒否する。
 */

import * as fs from 'node:fs/promises';
import { parse as parseToml } from 'smol-toml';
import { z } from 'zod';
import { createErr, createOk, type Result } from 'option-t/plain_result';
import { filePath } from '../../types/branded.ts';
import type {
  GroupSpec,
  LeafFieldSpec,
  ParamLeaf,
  UnsetParamsOf,
} from '../../types/params-schema.ts';
import type { ConfigError } from '../../types/errors.ts';
import {
  configParseError,
  configValueError,
  duplicateConfigSection,
  unknownConfigKey,
  unknownConfigSection,
} from '../../types/errors.ts';
import {
  createUnsetRecord,
  describeFieldKind,
  getSectionRecord,
  isParamsRecord,
  isUnsetParamsOf,
  sectionFieldMap,
  splitListValue,
} from './schema.ts';
import { discoverSections, findDuplicateSections } from './sections.ts';

export const scalarValueSchemas = {
  string: z.string(),
  number: z.number(),
  boolean: z.boolean(),
} as const;

export const pathValueSchema = z.string();

/**
 * リスト値は配列、または区切り文字で連結した文字列1つで書ける
 */
export const listValueSchema = z.union([z.array(z.string()), z.string()]);

/**
 * ファイルシステム上に存在しないことを示すエラーか
 */
export function isNotFoundError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

async function isRegularFile(targetPath: string): Promise<Result<boolean, ConfigError>> {
  try {
    const stat = await fs.stat(targetPath);
    return createOk(stat.isFile());
  } catch (error) {
    if (isNotFoundError(error)) {
      return createOk(false);
    }
    return createErr(configParseError(targetPath, error));
  }
}

/**
 * 設定ファイル中の生の値をフィールドの種類に合わせて検証・変換する
 *
 * - path: FilePath に変換
 * - list: 文字列1つで書かれた場合は区切り文字で分割
 *
 * @returns 変換後の値、または期待する型の説明
 */
export function parseFieldValue(field: LeafFieldSpec, raw: unknown): Result<ParamLeaf, string> {
  const expected = `expected ${describeFieldKind(field)}`;

  switch (field.kind) {
    case 'scalar': {
      const parsed = scalarValueSchemas[field.type].safeParse(raw);
      return parsed.success ? createOk(parsed.data) : createErr(expected);
    }
    case 'path': {
      const parsed = pathValueSchema.safeParse(raw);
      return parsed.success ? createOk(filePath(parsed.data)) : createErr(expected);
    }
    case 'list': {
      const parsed = listValueSchema.safeParse(raw);
      if (!parsed.success) {
        return createErr(expected);
      }
      const value = parsed.data;
      return createOk(typeof value === 'string' ? splitListValue(field.separator, value) : value);
    }
  }
}

/**
 * 設定ファイルを未設定インスタンスへ読み込む
 *
 * 動作:
 * - configPath未指定、またはファイルが存在しない: すべて未設定のインスタンスを返す
 * - 未知のセクション: UnknownConfigSectionError（全セクションをまとめて報告）
 * - 未知のキー: 全セクションを走査した後に UnknownConfigKeyError としてまとめて報告。
 *   未知のキーを含むセクションの値は1つも適用しない
 * - 型の合わない値: ConfigValueError（未知のキーがない場合のみ）
 *
 * @param configPath - TOMLファイルのパス
 * @param root - ルートのスキーマグループ
 */
export async function loadConfigDefaults<G extends GroupSpec>(
  configPath: string | null | undefined,
  root: G,
): Promise<Result<UnsetParamsOf<G>, ConfigError>> {
  const params = createUnsetRecord(root);
  const sections = discoverSections(root);

  const duplicates = findDuplicateSections(sections);
  if (duplicates.length > 0) {
    return createErr(duplicateConfigSection(duplicates));
  }

  if (configPath) {
    const exists = await isRegularFile(configPath);
    if (!exists.ok) {
      return exists;
    }

    if (exists.val) {
      let data: Record<string, unknown>;
      try {
        data = parseToml(await fs.readFile(configPath, 'utf-8'));
      } catch (error) {
        return createErr(configParseError(configPath, error));
      }

      const allowedSections = new Set(sections.map((section) => section.name));
      const unknownSections = Object.keys(data).filter((name) => !allowedSections.has(name));
      if (unknownSections.length > 0) {
        return createErr(unknownConfigSection(unknownSections));
      }

      const unknownKeys: string[] = [];
      const invalidValues: string[] = [];

      for (const section of sections) {
        const sectionData = data[section.name];
        if (sectionData === undefined) {
          continue;
        }
        if (!isParamsRecord(sectionData)) {
          invalidValues.push(`[${section.name}]: expected table`);
          continue;
        }

        const keys = Object.keys(sectionData);
        if (keys.length === 0) {
          continue;
        }

        const fieldMap = sectionFieldMap(section.group);
        const extra = keys.filter((key) => !fieldMap.has(key)).sort();
        if (extra.length > 0) {
          unknownKeys.push(`[${section.name}]: ${extra.join(', ')}`);
          continue;
        }

        const target = getSectionRecord(params, section.path);
        for (const key of keys) {
          const field = fieldMap.get(key);
          if (!field) {
            continue;
          }
          const parsed = parseFieldValue(field, sectionData[key]);
          if (parsed.ok) {
            target[key] = parsed.val;
          } else {
            invalidValues.push(`[${section.name}] ${key}: ${parsed.err}`);
          }
        }
      }

      if (unknownKeys.length > 0) {
        return createErr(unknownConfigKey(unknownKeys));
      }
      if (invalidValues.length > 0) {
        return createErr(configValueError(invalidValues));
      }
    }
  }

  if (!isUnsetParamsOf(root, params)) {
    throw new Error(`Loaded configuration does not match schema ${root.typeName}`);
  }
  return createOk(params);
}

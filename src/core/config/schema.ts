/**
 * Parameter Schema Utilities
 *
 * スキーマテーブルの定義ヘルパーと、テーブルを走査してインスタンスを生成・検査する関数群
 */

import { filePath } from '../../types/branded.ts';
import type {
  FieldMap,
  FieldSpec,
  GroupFieldSpec,
  GroupSpec,
  LeafFieldSpec,
  ListFieldSpec,
  ListSeparator,
  NullableIf,
  ParamsOf,
  ParamsRecord,
  PathFieldSpec,
  ScalarFieldSpec,
  UnsetParamsOf,
} from '../../types/params-schema.ts';

// ===== 定義ヘルパー =====

export const defineGroup = <F extends FieldMap>(spec: {
  typeName: string;
  section?: string;
  fields: F;
}): GroupSpec<F> => spec;

export const groupField = <G extends GroupSpec>(group: G): GroupFieldSpec<G> => ({
  kind: 'group',
  group,
});

export const stringField = <N extends boolean>(options: {
  description: string;
  nullable: N;
  default: NullableIf<string, N>;
  short?: string;
}): ScalarFieldSpec<'string', N> => ({ kind: 'scalar', type: 'string', ...options });

export const numberField = <N extends boolean>(options: {
  description: string;
  nullable: N;
  default: NullableIf<number, N>;
  short?: string;
}): ScalarFieldSpec<'number', N> => ({ kind: 'scalar', type: 'number', ...options });

export const booleanField = (options: {
  description: string;
  default: boolean;
  short?: string;
}): ScalarFieldSpec<'boolean', false> => ({
  kind: 'scalar',
  type: 'boolean',
  nullable: false,
  ...options,
});

export const pathField = <N extends boolean>(options: {
  description: string;
  nullable: N;
  default: NullableIf<string, N>;
  short?: string;
}): PathFieldSpec<N> => ({ kind: 'path', ...options });

export const listField = (options: {
  description: string;
  separator: ListSeparator;
  default: readonly string[];
}): ListFieldSpec => ({ kind: 'list', ...options });

// ===== スキーマ走査 =====

export function isGroupField(field: FieldSpec): field is GroupFieldSpec {
  return field.kind === 'group';
}

/**
 * ルートグループのセクション名を求める
 */
export function rootSectionName(group: GroupSpec): string {
  return group.section ?? group.typeName.toLowerCase();
}

/**
 * グループ自身の（入れ子グループを除く）フィールドのマップ
 */
export function sectionFieldMap(group: GroupSpec): Map<string, LeafFieldSpec> {
  const map = new Map<string, LeafFieldSpec>();
  for (const [name, field] of Object.entries(group.fields)) {
    if (!isGroupField(field)) {
      map.set(name, field);
    }
  }
  return map;
}

/**
 * フィールドが受け付ける値の説明（エラーメッセージ・一覧表示用）
 */
export function describeFieldKind(field: LeafFieldSpec): string {
  switch (field.kind) {
    case 'scalar':
      return field.type;
    case 'path':
      return 'path string';
    case 'list':
      return 'list of strings';
  }
}

/**
 * 文字列1つで渡されたリスト値をフィールドの区切り方で分割する
 */
export function splitListValue(separator: ListSeparator, value: string): string[] {
  if (separator === 'comma') {
    return value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }
  return value.split(/\s+/).filter((item) => item.length > 0);
}

export function isParamsRecord(value: unknown): value is ParamsRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function buildRecord(group: GroupSpec, leaf: (field: LeafFieldSpec) => ParamsRecord[string]): ParamsRecord {
  const record: ParamsRecord = {};
  for (const [name, field] of Object.entries(group.fields)) {
    record[name] = isGroupField(field) ? buildRecord(field.group, leaf) : leaf(field);
  }
  return record;
}

/**
 * 葉フィールドのスキーマ既定値（リストは複製、パスは FilePath に変換）
 */
export function defaultLeafValue(field: LeafFieldSpec): ParamsRecord[string] {
  switch (field.kind) {
    case 'list':
      return [...field.default];
    case 'path':
      return field.default === null ? null : filePath(field.default);
    case 'scalar':
      return field.default;
  }
}

/**
 * スキーマ既定値で埋めた動的表現
 */
export function createDefaultRecord(group: GroupSpec): ParamsRecord {
  return buildRecord(group, defaultLeafValue);
}

/**
 * すべての葉が未設定（undefined）の動的表現
 */
export function createUnsetRecord(group: GroupSpec): ParamsRecord {
  return buildRecord(group, () => undefined);
}

/**
 * スキーマ既定値で埋めたインスタンスを生成する
 */
export function createDefaultParams<G extends GroupSpec>(group: G): ParamsOf<G> {
  const record = createDefaultRecord(group);
  if (!isParamsOf(group, record)) {
    throw new Error(`Schema defaults of ${group.typeName} do not match their field kinds`);
  }
  return record;
}

/**
 * すべての葉が未設定のインスタンスを生成する
 *
 * 設定ファイルに書かれた値と型の既定値を区別するために使う。
 */
export function createUnsetParams<G extends GroupSpec>(group: G): UnsetParamsOf<G> {
  const record = createUnsetRecord(group);
  if (!isUnsetParamsOf(group, record)) {
    throw new Error(`Unset instance of ${group.typeName} does not match its schema`);
  }
  return record;
}

/**
 * ルートインスタンスから path を辿って入れ子のグループを取得する
 */
export function getSectionRecord(root: ParamsRecord, path: readonly string[]): ParamsRecord {
  let current = root;
  for (const name of path) {
    const next = current[name];
    if (!isParamsRecord(next)) {
      throw new Error(`Parameter group not found at ${path.join('.')}`);
    }
    current = next;
  }
  return current;
}

// ===== ガード関数 =====

function conformsToLeaf(field: LeafFieldSpec, value: unknown): boolean {
  switch (field.kind) {
    case 'scalar':
      return (value === null && field.nullable) || typeof value === field.type;
    case 'path':
      return (value === null && field.nullable) || typeof value === 'string';
    case 'list':
      return Array.isArray(value) && value.every((item) => typeof item === 'string');
  }
}

function conformsToGroup(group: GroupSpec, value: unknown, allowAbsent: boolean): boolean {
  if (!isParamsRecord(value)) {
    return false;
  }
  return Object.entries(group.fields).every(([name, field]) => {
    const fieldValue = value[name];
    if (isGroupField(field)) {
      return conformsToGroup(field.group, fieldValue, allowAbsent);
    }
    if (fieldValue === undefined) {
      return allowAbsent;
    }
    return conformsToLeaf(field, fieldValue);
  });
}

/**
 * 値がスキーマの解決済みインスタンスであるかを検査する
 */
export function isParamsOf<G extends GroupSpec>(group: G, value: unknown): value is ParamsOf<G> {
  return conformsToGroup(group, value, false);
}

/**
 * 値がスキーマの（未設定を含み得る）インスタンスであるかを検査する
 */
export function isUnsetParamsOf<G extends GroupSpec>(group: G, value: unknown): value is UnsetParamsOf<G> {
  return conformsToGroup(group, value, true);
}

/**
 * Parameter Schema Types
 *
 * 入れ子のオプショングループを静的なテーブルとして記述するための型定義。
 * 実行時の型情報に頼らず、セクション探索・フィールドマップ生成・CLIオプション生成は
 * すべてこのテーブルの走査で行う。
 */

import type { FilePath } from './branded.ts';

/**
 * スカラー値の種類
 */
export type ScalarType = 'string' | 'number' | 'boolean';

interface ScalarTypeMap {
  string: string;
  number: number;
  boolean: boolean;
}

export type ScalarOf<T extends ScalarType> = ScalarTypeMap[T];

/**
 * nullを許容するかどうかで値の型を切り替える
 */
export type NullableIf<V, N extends boolean> = N extends true ? V | null : V;

/**
 * リスト値の区切り方
 *
 * 文字列1つで渡されたリスト値を分割する際に使用する。
 * - 'whitespace': 空白区切り（例: pandoc引数）
 * - 'comma': カンマ区切り
 */
export type ListSeparator = 'whitespace' | 'comma';

export interface ScalarFieldSpec<T extends ScalarType = ScalarType, N extends boolean = boolean> {
  readonly kind: 'scalar';
  readonly type: T;
  readonly nullable: N;
  readonly default: NullableIf<ScalarOf<T>, N>;
  /** ヘルプ・ドキュメント用の説明 */
  readonly description: string;
  /** 短縮フラグ（例: '-o'） */
  readonly short?: string;
}

export interface PathFieldSpec<N extends boolean = boolean> {
  readonly kind: 'path';
  readonly nullable: N;
  /** 既定値（インスタンス生成時に FilePath へ変換される） */
  readonly default: NullableIf<string, N>;
  readonly description: string;
  readonly short?: string;
}

export interface ListFieldSpec {
  readonly kind: 'list';
  readonly separator: ListSeparator;
  readonly default: readonly string[];
  readonly description: string;
}

export interface GroupFieldSpec<G extends GroupSpec = GroupSpec> {
  readonly kind: 'group';
  readonly group: G;
}

export type LeafFieldSpec = ScalarFieldSpec | PathFieldSpec | ListFieldSpec;

export type FieldSpec = LeafFieldSpec | GroupFieldSpec;

export interface FieldMap {
  readonly [name: string]: FieldSpec;
}

/**
 * スキーマグループ
 *
 * 1つの設定セクションに対応する。
 * section未指定時のセクション名は、ルートなら typeName の小文字、
 * 入れ子ならそのグループを保持するフィールド名になる。
 */
export interface GroupSpec<F extends FieldMap = FieldMap> {
  readonly typeName: string;
  readonly section?: string;
  readonly fields: F;
}

/**
 * フィールド定義から解決済みの値の型を求める
 */
export type FieldValue<F extends FieldSpec> =
  F extends ScalarFieldSpec<infer T, infer N>
    ? NullableIf<ScalarOf<T>, N>
    : F extends PathFieldSpec<infer N>
      ? NullableIf<FilePath, N>
      : F extends ListFieldSpec
        ? string[]
        : F extends GroupFieldSpec<infer G>
          ? ParamsOf<G>
          : never;

/**
 * 完全に解決されたパラメータインスタンスの型
 */
export type ParamsOf<G extends GroupSpec> = {
  [K in keyof G['fields']]: FieldValue<G['fields'][K]>;
};

/**
 * 未設定（absent）を表現できるパラメータインスタンスの型
 *
 * すべての葉フィールドが undefined（= 設定ファイルに記述なし）を取り得る。
 * 入れ子グループは常にオブジェクトとして存在する。
 */
export type UnsetFieldValue<F extends FieldSpec> =
  F extends GroupFieldSpec<infer G> ? UnsetParamsOf<G> : FieldValue<F> | undefined;

export type UnsetParamsOf<G extends GroupSpec> = {
  [K in keyof G['fields']]: UnsetFieldValue<G['fields'][K]>;
};

/**
 * スキーマに依存しない動的な表現
 *
 * 汎用のスキーマ走査（読み込み・マージ）はこの表現の上で行い、
 * 公開APIの境界でガード関数により ParamsOf / UnsetParamsOf へ絞り込む。
 */
export type ParamLeaf = string | number | boolean | null | string[];

export interface ParamsRecord {
  [name: string]: ParamLeaf | undefined | ParamsRecord;
}

/**
 * セクション記述子
 *
 * ルートからそのグループまでのフィールド名の並びを path に持つ。
 */
export interface SectionDescriptor {
  /** 設定ファイル上のセクション名 */
  readonly name: string;
  /** 対応するスキーマグループ */
  readonly group: GroupSpec;
  /** ルートからのフィールド名の並び（ルート自身は空） */
  readonly path: readonly string[];
}

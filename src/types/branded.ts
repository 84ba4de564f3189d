/**
 * Branded Types
 *
 * パラメータ値のうち「パス」として扱う文字列を、通常の文字列と区別するための型定義。
 */

declare const brand: unique symbol;
type Brand<K, T> = T & { readonly [brand]: K };

// ファイルシステム上のパス（設定ファイル・CLIから受け取った値）
export type FilePath = Brand<'FilePath', string>;

// コンストラクタ関数
// 素のstring型からBranded Typeへ変換する
export const filePath = (raw: string): FilePath => raw as FilePath;

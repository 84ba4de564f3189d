import { readFileSync } from 'node:fs';
import { z } from 'zod';

const PackageJsonSchema = z.object({ version: z.string() });

/**
 * package.json のバージョンを取得する
 *
 * WHY: tsx で TypeScript を直接実行するため、ビルド時の埋め込みではなく実行時に読む
 */
export function getVersion(): string {
  try {
    const packageJsonUrl = new URL('../../../package.json', import.meta.url);
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonUrl, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0-dev';
  } catch {
    // package.jsonの読み取りに失敗した場合のフォールバック
    return '0.0.0-dev';
  }
}

/**
 * Markdown ファイルの探索
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createErr, createOk, type Result } from 'option-t/plain_result';
import { buildIOError, type BuildIOError } from '../../types/errors.ts';

type NaturalToken = number | string;

/**
 * 自然順ソート用のキー（数字列は数値、それ以外は小文字化した文字列）
 */
export function naturalKey(value: string): NaturalToken[] {
  return value
    .split(/(\d+)/)
    .map((token, index) => (index % 2 === 1 ? Number(token) : token.toLowerCase()));
}

export function naturalCompare(a: string, b: string): number {
  const keyA = naturalKey(a);
  const keyB = naturalKey(b);
  const length = Math.min(keyA.length, keyB.length);

  for (let i = 0; i < length; i++) {
    const left = keyA[i];
    const right = keyB[i];
    if (left === right || left === undefined || right === undefined) {
      continue;
    }
    if (typeof left === 'number' && typeof right === 'number') {
      return left - right;
    }
    return String(left) < String(right) ? -1 : 1;
  }
  return keyA.length - keyB.length;
}

async function walk(dir: string, found: string[]): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(entryPath, found);
    } else if (entry.isFile() && entry.name.endsWith('.md')) {
      found.push(entryPath);
    }
  }
}

/**
 * rootDir 以下の *.md を再帰的に探し、rootDir からの相対パスの自然順で返す
 *
 * シンボリックリンクは辿らない。
 */
export async function findMarkdownFiles(rootDir: string): Promise<Result<string[], BuildIOError>> {
  const found: string[] = [];
  try {
    await walk(rootDir, found);
  } catch (error) {
    return createErr(buildIOError(`scanning ${rootDir}`, error));
  }

  const relative = (file: string): string => path.relative(rootDir, file);
  return createOk(found.sort((a, b) => naturalCompare(relative(a), relative(b))));
}

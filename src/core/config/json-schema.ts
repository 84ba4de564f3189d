/**
 * 設定ファイル用の JSON スキーマを生成
 *
 * WHY: エディタ（Taplo 等）で mdbind.toml の補完と検証を効かせるため
 */

import { z } from 'zod';
import type { GroupSpec, LeafFieldSpec } from '../../types/params-schema.ts';
import { listValueSchema, pathValueSchema, scalarValueSchemas } from './config-file.ts';
import { sectionFieldMap } from './schema.ts';
import { discoverSections } from './sections.ts';

function fieldSchema(field: LeafFieldSpec): z.ZodType {
  switch (field.kind) {
    case 'scalar':
      return scalarValueSchemas[field.type].describe(field.description);
    case 'path':
      return pathValueSchema.describe(field.description);
    case 'list':
      return listValueSchema.describe(field.description);
  }
}

/**
 * スキーマテーブルから設定ファイルの形を表す zod スキーマを組み立てる
 *
 * 未知のセクション・キーは許可しない。
 */
export function buildConfigFileSchema(root: GroupSpec): z.ZodType {
  const sectionShapes: Record<string, z.ZodType> = {};

  for (const section of discoverSections(root)) {
    const fields: Record<string, z.ZodType> = {};
    for (const [name, field] of sectionFieldMap(section.group)) {
      fields[name] = fieldSchema(field).optional();
    }
    sectionShapes[section.name] = z.strictObject(fields).optional();
  }

  return z.strictObject(sectionShapes);
}

export function buildConfigJsonSchema(root: GroupSpec, title: string): Record<string, unknown> {
  return { title, ...z.toJSONSchema(buildConfigFileSchema(root)) };
}

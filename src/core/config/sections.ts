/**
 * Section Discovery
 *
 * スキーマテーブルを一度走査し、設定ファイルのセクションとスキーマグループの対応を列挙する。
 */

import type { GroupSpec, SectionDescriptor } from '../../types/params-schema.ts';
import { isGroupField, rootSectionName } from './schema.ts';

/**
 * セクション記述子を行きがけ順で列挙する
 *
 * ルート（path は空）を先頭に、宣言順で入れ子グループを辿る。
 * 入れ子グループのセクション名は、グループ側の section 指定がなければフィールド名を使う。
 *
 * @param root - ルートのスキーマグループ
 * @returns 走査順のセクション記述子
 */
export function discoverSections(root: GroupSpec): SectionDescriptor[] {
  const sections: SectionDescriptor[] = [{ name: rootSectionName(root), group: root, path: [] }];

  const walk = (group: GroupSpec, path: readonly string[]): void => {
    for (const [name, field] of Object.entries(group.fields)) {
      if (!isGroupField(field)) {
        continue;
      }
      const nestedPath = [...path, name];
      sections.push({ name: field.group.section ?? name, group: field.group, path: nestedPath });
      walk(field.group, nestedPath);
    }
  };

  walk(root, []);
  return sections;
}

/**
 * 重複しているセクション名を返す（ソート済み）
 *
 * セクション名の衝突はスキーマ定義側の誤り。
 */
export function findDuplicateSections(sections: readonly SectionDescriptor[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const section of sections) {
    if (seen.has(section.name)) {
      duplicates.add(section.name);
    }
    seen.add(section.name);
  }
  return [...duplicates].sort();
}

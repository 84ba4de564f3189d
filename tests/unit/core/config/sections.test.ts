import { describe, it } from 'node:test';
import assert from 'node:assert';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  booleanField,
  defineGroup,
  groupField,
  stringField,
} from '../../../../src/core/config/schema.ts';
import { discoverSections, findDuplicateSections } from '../../../../src/core/config/sections.ts';
import { loadConfigDefaults } from '../../../../src/core/config/config-file.ts';
import { OptsSchema } from '../../../helpers/test-schema.ts';
import { RunParamsSchema } from '../../../../src/core/params/run-params.ts';

const summarize = (root: Parameters<typeof discoverSections>[0]) =>
  discoverSections(root).map((section) => ({ name: section.name, path: section.path }));

describe('Section Discovery', () => {
  it('ルートを先頭に入れ子グループを列挙する', () => {
    assert.deepStrictEqual(summarize(OptsSchema), [
      { name: 'opts', path: [] },
      { name: 'nested', path: ['nested'] },
    ]);
  });

  it('行きがけ順で、グループ側の section 指定を優先する', () => {
    const inner = defineGroup({
      typeName: 'Inner',
      section: 'deep',
      fields: { flag: booleanField({ description: 'Flag', default: false }) },
    });
    const middle = defineGroup({
      typeName: 'Middle',
      fields: { inner: groupField(inner), note: stringField({ description: 'Note', nullable: true, default: null }) },
    });
    const sibling = defineGroup({
      typeName: 'Sibling',
      fields: { on: booleanField({ description: 'On', default: false }) },
    });
    const root = defineGroup({
      typeName: 'Root',
      fields: { middle: groupField(middle), sibling: groupField(sibling) },
    });

    assert.deepStrictEqual(summarize(root), [
      { name: 'root', path: [] },
      { name: 'middle', path: ['middle'] },
      { name: 'deep', path: ['middle', 'inner'] },
      { name: 'sibling', path: ['sibling'] },
    ]);
  });

  it('同じスキーマに対して常に同じ結果を返す', () => {
    assert.deepStrictEqual(summarize(OptsSchema), summarize(OptsSchema));
  });

  it('実行パラメータのセクションは mdbind と presentation', () => {
    assert.deepStrictEqual(
      discoverSections(RunParamsSchema).map((section) => section.name),
      ['mdbind', 'presentation'],
    );
  });

  describe('セクション名の重複', () => {
    const first = defineGroup({
      typeName: 'First',
      section: 'shared',
      fields: { a: booleanField({ description: 'A', default: false }) },
    });
    const second = defineGroup({
      typeName: 'Second',
      section: 'shared',
      fields: { b: booleanField({ description: 'B', default: false }) },
    });
    const root = defineGroup({
      typeName: 'Root',
      fields: { first: groupField(first), second: groupField(second) },
    });

    it('findDuplicateSections - 重複した名前を返す', () => {
      assert.deepStrictEqual(findDuplicateSections(discoverSections(root)), ['shared']);
      assert.deepStrictEqual(findDuplicateSections(discoverSections(OptsSchema)), []);
    });

    it('重複があるスキーマでは設定ファイルを読み込まない', async () => {
      const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mdbind-sections-test-'));
      try {
        const result = await loadConfigDefaults(path.join(tempDir, 'missing.toml'), root);

        assert.ok(!result.ok);
        if (result.ok) return;
        assert.strictEqual(result.err.type, 'DuplicateConfigSectionError');
        assert.strictEqual(result.err.message, 'Duplicate config section(s) in schema: shared');
      } finally {
        await fs.rm(tempDir, { recursive: true, force: true });
      }
    });
  });
});

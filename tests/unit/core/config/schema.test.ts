import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  booleanField,
  createDefaultParams,
  createUnsetParams,
  defineGroup,
  describeFieldKind,
  getSectionRecord,
  isParamsOf,
  isUnsetParamsOf,
  pathField,
  rootSectionName,
  sectionFieldMap,
  splitListValue,
} from '../../../../src/core/config/schema.ts';
import { OptsSchema } from '../../../helpers/test-schema.ts';

describe('Parameter Schema', () => {
  describe('createDefaultParams', () => {
    it('スキーマ既定値で入れ子グループまで埋める', () => {
      assert.deepStrictEqual(createDefaultParams(OptsSchema), {
        name: '',
        outDir: null,
        items: [],
        enabled: false,
        nested: { label: null, count: 1, tags: [] },
      });
    });

    it('リストの既定値はインスタンスごとに複製される', () => {
      const first = createDefaultParams(OptsSchema);
      const second = createDefaultParams(OptsSchema);
      first.items.push('x');

      assert.deepStrictEqual(second.items, []);
    });

    it('パスの既定値は文字列として保持される', () => {
      const schema = defineGroup({
        typeName: 'Browser',
        fields: {
          executable: pathField({ description: 'Executable', nullable: false, default: '/usr/bin/chromium' }),
        },
      });

      assert.strictEqual(createDefaultParams(schema).executable, '/usr/bin/chromium');
    });
  });

  describe('createUnsetParams', () => {
    it('すべての葉が未設定（undefined）になる', () => {
      assert.deepStrictEqual(createUnsetParams(OptsSchema), {
        name: undefined,
        outDir: undefined,
        items: undefined,
        enabled: undefined,
        nested: { label: undefined, count: undefined, tags: undefined },
      });
    });
  });

  describe('rootSectionName', () => {
    it('section 未指定なら typeName の小文字', () => {
      assert.strictEqual(rootSectionName(OptsSchema), 'opts');
    });

    it('section 指定があればそれを使う', () => {
      const schema = defineGroup({
        typeName: 'RunParams',
        section: 'tool',
        fields: { verbose: booleanField({ description: 'Verbose', default: false }) },
      });

      assert.strictEqual(rootSectionName(schema), 'tool');
    });
  });

  it('sectionFieldMap - 入れ子グループを除いた自身のフィールドのみ', () => {
    assert.deepStrictEqual([...sectionFieldMap(OptsSchema).keys()], ['name', 'outDir', 'items', 'enabled']);
  });

  it('describeFieldKind - 種類ごとの説明', () => {
    const fields = sectionFieldMap(OptsSchema);
    const kindOf = (name: string): string | undefined => {
      const field = fields.get(name);
      return field && describeFieldKind(field);
    };

    assert.strictEqual(kindOf('name'), 'string');
    assert.strictEqual(kindOf('outDir'), 'path string');
    assert.strictEqual(kindOf('items'), 'list of strings');
    assert.strictEqual(kindOf('enabled'), 'boolean');
  });

  describe('splitListValue', () => {
    it('カンマ区切りは前後の空白を除き空要素を捨てる', () => {
      assert.deepStrictEqual(splitListValue('comma', ' a, b ,,c '), ['a', 'b', 'c']);
    });

    it('空白区切りは連続した空白を1つとみなす', () => {
      assert.deepStrictEqual(splitListValue('whitespace', '  --toc   -s '), ['--toc', '-s']);
    });
  });

  describe('ガード関数', () => {
    it('isParamsOf - 型の合わない値を拒否する', () => {
      const params = { ...createDefaultParams(OptsSchema), enabled: 'yes' };

      assert.strictEqual(isParamsOf(OptsSchema, createDefaultParams(OptsSchema)), true);
      assert.strictEqual(isParamsOf(OptsSchema, params), false);
    });

    it('isParamsOf - 未設定を含むインスタンスは解決済みとみなさない', () => {
      assert.strictEqual(isParamsOf(OptsSchema, createUnsetParams(OptsSchema)), false);
      assert.strictEqual(isUnsetParamsOf(OptsSchema, createUnsetParams(OptsSchema)), true);
    });

    it('isParamsOf - nullable でないフィールドの null を拒否する', () => {
      const params = { ...createDefaultParams(OptsSchema), name: null };

      assert.strictEqual(isParamsOf(OptsSchema, params), false);
    });
  });

  describe('getSectionRecord', () => {
    it('パスを辿って入れ子グループを返す', () => {
      const root = { nested: { label: 'x' } };

      assert.deepStrictEqual(getSectionRecord(root, ['nested']), { label: 'x' });
      assert.strictEqual(getSectionRecord(root, []), root);
    });

    it('グループが存在しなければ例外', () => {
      assert.throws(() => getSectionRecord({ nested: 'flat' }, ['nested']), /Parameter group not found at nested/);
    });
  });
});

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { mergeCliWithConfig, mergeParams, unionLists } from '../../../../src/core/config/merge.ts';
import { createDefaultParams, createUnsetParams } from '../../../../src/core/config/schema.ts';
import { filePath } from '../../../../src/types/branded.ts';
import { OptsSchema } from '../../../helpers/test-schema.ts';

describe('Merge Engine', () => {
  describe('unionLists', () => {
    it('設定ファイルの要素が先、CLIにしかない要素を後ろに追加', () => {
      assert.deepStrictEqual(unionLists(['a'], ['b']), ['a', 'b']);
      assert.deepStrictEqual(unionLists(['a', 'b'], ['c', 'b', 'd']), ['a', 'b', 'c', 'd']);
    });
  });

  describe('mergeParams', () => {
    it('設定ファイルが空ならCLIの値をそのまま返す', () => {
      const cli = createDefaultParams(OptsSchema);
      cli.name = 'custom';
      cli.outDir = filePath('out');
      cli.enabled = true;
      cli.nested.count = 4;

      const merged = mergeParams(OptsSchema, cli, createUnsetParams(OptsSchema));

      assert.deepStrictEqual(merged, cli);
      assert.notStrictEqual(merged, cli);
    });

    it('入力のインスタンスを変更しない', () => {
      const cli = createDefaultParams(OptsSchema);
      cli.items = ['b'];
      const fromFile = createUnsetParams(OptsSchema);
      fromFile.items = ['a'];
      fromFile.name = 'docs';

      const merged = mergeParams(OptsSchema, cli, fromFile);
      merged.items.push('z');

      assert.deepStrictEqual(cli.items, ['b']);
      assert.strictEqual(cli.name, '');
      assert.deepStrictEqual(fromFile.items, ['a']);
    });

    describe('スカラー値', () => {
      it('CLIが既定値なら設定ファイルの値を使う', () => {
        const fromFile = createUnsetParams(OptsSchema);
        fromFile.name = 'docs';

        const merged = mergeParams(OptsSchema, createDefaultParams(OptsSchema), fromFile);

        assert.strictEqual(merged.name, 'docs');
      });

      it('既定値と異なるCLI値は設定ファイルより優先', () => {
        const cli = createDefaultParams(OptsSchema);
        cli.name = 'custom';
        const fromFile = createUnsetParams(OptsSchema);
        fromFile.name = 'docs';

        const merged = mergeParams(OptsSchema, cli, fromFile);

        assert.strictEqual(merged.name, 'custom');
      });

      it('既定値と同じCLI値は未指定とみなされ、設定ファイルの値に置き換わる', () => {
        const cli = createDefaultParams(OptsSchema);
        cli.nested.count = 1;
        const fromFile = createUnsetParams(OptsSchema);
        fromFile.nested.count = 5;

        const merged = mergeParams(OptsSchema, cli, fromFile);

        assert.strictEqual(merged.nested.count, 5);
      });

      it('設定ファイルの null は値を埋めない', () => {
        const fromFile = createUnsetParams(OptsSchema);
        fromFile.outDir = null;

        const merged = mergeParams(OptsSchema, createDefaultParams(OptsSchema), fromFile);

        assert.strictEqual(merged.outDir, null);
      });

      it('nullable なパスは CLI 未指定時に設定ファイルの値を使う', () => {
        const fromFile = createUnsetParams(OptsSchema);
        fromFile.outDir = filePath('build');

        const merged = mergeParams(OptsSchema, createDefaultParams(OptsSchema), fromFile);

        assert.strictEqual(merged.outDir, 'build');
      });
    });

    describe('リスト値', () => {
      it('CLIが空なら設定ファイルのリストで置き換える', () => {
        const fromFile = createUnsetParams(OptsSchema);
        fromFile.items = ['a'];

        const merged = mergeParams(OptsSchema, createDefaultParams(OptsSchema), fromFile);

        assert.deepStrictEqual(merged.items, ['a']);
      });

      it('両方にあれば和集合（設定ファイルが先）', () => {
        const cli = createDefaultParams(OptsSchema);
        cli.items = ['b'];
        const fromFile = createUnsetParams(OptsSchema);
        fromFile.items = ['a'];

        const merged = mergeParams(OptsSchema, cli, fromFile);

        assert.deepStrictEqual(merged.items, ['a', 'b']);
      });

      it('設定ファイルにリストがなければCLIのリストのまま', () => {
        const cli = createDefaultParams(OptsSchema);
        cli.items = ['b', 'c'];

        const merged = mergeParams(OptsSchema, cli, createUnsetParams(OptsSchema));

        assert.deepStrictEqual(merged.items, ['b', 'c']);
      });
    });

    it('入れ子グループにも同じ規則を適用する', () => {
      const cli = createDefaultParams(OptsSchema);
      cli.nested.tags = ['cli', 'shared'];
      const fromFile = createUnsetParams(OptsSchema);
      fromFile.nested.label = 'from file';
      fromFile.nested.tags = ['shared', 'file'];

      const merged = mergeParams(OptsSchema, cli, fromFile);

      assert.deepStrictEqual(merged.nested, {
        label: 'from file',
        count: 1,
        tags: ['shared', 'file', 'cli'],
      });
    });
  });

  describe('mergeCliWithConfig', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mdbind-merge-test-'));
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('設定ファイルを読み込んでマージする', async () => {
      const configPath = path.join(tempDir, 'mdbind.toml');
      await fs.writeFile(configPath, '[opts]\nname = "docs"\nitems = "x y"\n\n[nested]\ncount = 2\n');
      const cli = createDefaultParams(OptsSchema);
      cli.items = ['z'];

      const result = await mergeCliWithConfig(cli, configPath, OptsSchema);

      assert.ok(result.ok);
      if (!result.ok) return;
      assert.deepStrictEqual(result.val, {
        name: 'docs',
        outDir: null,
        items: ['x', 'y', 'z'],
        enabled: false,
        nested: { label: null, count: 2, tags: [] },
      });
    });

    it('設定ファイルのエラーをそのまま返す', async () => {
      const configPath = path.join(tempDir, 'mdbind.toml');
      await fs.writeFile(configPath, '[unknown]\n');

      const result = await mergeCliWithConfig(createDefaultParams(OptsSchema), configPath, OptsSchema);

      assert.ok(!result.ok);
      if (result.ok) return;
      assert.strictEqual(result.err.message, 'Unknown config section(s): unknown');
    });

    it('設定ファイルがなければCLIの値を返す', async () => {
      const cli = createDefaultParams(OptsSchema);
      cli.name = 'only-cli';

      const result = await mergeCliWithConfig(cli, null, OptsSchema);

      assert.ok(result.ok);
      if (!result.ok) return;
      assert.deepStrictEqual(result.val, cli);
    });
  });
});

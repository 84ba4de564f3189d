import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { htmlToPdf, toPdfPath } from '../../../../src/core/build/html-to-pdf.ts';

describe('html to pdf', () => {
  describe('toPdfPath', () => {
    it('拡張子を .pdf に置き換える', () => {
      assert.strictEqual(toPdfPath('/decks/weekly.html'), '/decks/weekly.pdf');
      assert.strictEqual(toPdfPath('/decks.v2/weekly'), '/decks.v2/weekly.pdf');
    });
  });

  describe('htmlToPdf', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mdbind-pdf-test-'));
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('chromiumPath を確認できなければ起動せずに RenderError', async () => {
      const chromiumPath = path.join(tempDir, 'chromium');
      // 自分自身を指すリンクは stat が ELOOP で失敗する
      await fs.symlink(chromiumPath, chromiumPath);
      const htmlPath = path.join(tempDir, 'deck.html');

      const result = await htmlToPdf(htmlPath, { chromiumPath });

      assert.ok(!result.ok);
      if (result.ok) return;
      assert.strictEqual(result.err.type, 'RenderError');
      assert.strictEqual(result.err.inputPath, htmlPath);
      assert.match(result.err.message, /ELOOP/);
    });
  });
});

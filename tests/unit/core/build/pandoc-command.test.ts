import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  buildPandocArgs,
  buildResourcePath,
  isHtmlOutput,
  isPdfOutput,
} from '../../../../src/core/build/pandoc-command.ts';

describe('pandoc command', () => {
  it('buildResourcePath - ディレクトリを重複なくソートして連結', () => {
    assert.strictEqual(buildResourcePath(['/r/b/x.md', '/r/a/y.md', '/r/b/z.md']), '/r/a:/r/b');
  });

  it('PDF 出力ではヘッダーを含め、利用者の引数を最後に付ける', () => {
    const args = buildPandocArgs({
      mergedPath: '/work/merged.md',
      output: '/r/book.pdf',
      sourceFiles: ['/r/b/x.md', '/r/a/y.md'],
      headerPath: '/work/header.tex',
      toc: true,
      pandocArgs: ['--number-sections'],
    });

    assert.deepStrictEqual(args, [
      '-s',
      '/work/merged.md',
      '-o',
      '/r/book.pdf',
      '--pdf-engine=xelatex',
      '--resource-path=/r/a:/r/b',
      '--include-in-header=/work/header.tex',
      '--toc',
      '--number-sections',
    ]);
  });

  it('HTML 出力ではヘッダーを含めない', () => {
    const args = buildPandocArgs({
      mergedPath: '/work/merged.md',
      output: '/r/deck.html',
      sourceFiles: ['/r/deck.md'],
      headerPath: '/work/header.tex',
      toc: false,
      pandocArgs: [],
    });

    assert.deepStrictEqual(args, [
      '-s',
      '/work/merged.md',
      '-o',
      '/r/deck.html',
      '--pdf-engine=xelatex',
      '--resource-path=/r',
    ]);
  });

  it('出力形式の判定', () => {
    assert.strictEqual(isPdfOutput('a.pdf'), true);
    assert.strictEqual(isPdfOutput('a.docx'), false);
    assert.strictEqual(isHtmlOutput('a.html'), true);
    assert.strictEqual(isHtmlOutput('a.pdf'), false);
  });
});

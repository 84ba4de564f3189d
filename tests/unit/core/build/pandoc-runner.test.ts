import { describe, it } from 'node:test';
import assert from 'node:assert';
import { findUnrecognizedOption, runPandoc } from '../../../../src/core/build/pandoc-runner.ts';
import {
  ProcessRunner,
  type ProcessResult,
  type ProcessRunnerOptions,
} from '../../../../src/core/runner/process-runner.ts';

class StubRunner extends ProcessRunner {
  readonly calls: Array<{ command: string; args: readonly string[] }> = [];

  constructor(private readonly result: Partial<ProcessResult>) {
    super();
  }

  override async run(
    command: string,
    args: readonly string[] = [],
    _options: ProcessRunnerOptions = {},
  ): Promise<ProcessResult> {
    this.calls.push({ command, args });
    return {
      exitCode: 0,
      signal: null,
      stdout: '',
      stderr: '',
      duration: 1,
      timedOut: false,
      ...this.result,
    };
  }
}

describe('pandoc runner', () => {
  describe('findUnrecognizedOption', () => {
    it('pandoc の "unrecognized option" から取り出す', () => {
      assert.strictEqual(findUnrecognizedOption("pandoc: unrecognized option `--bogus'\nTry pandoc --help"), '--bogus');
    });

    it('"Unknown option" 形式にも対応する', () => {
      assert.strictEqual(findUnrecognizedOption('Unknown option --frobnicate\n'), '--frobnicate');
    });

    it('見つからなければ undefined', () => {
      assert.strictEqual(findUnrecognizedOption('Could not find image'), undefined);
    });
  });

  it('成功時は実行結果を返す', async () => {
    const runner = new StubRunner({ stdout: 'ok' });

    const result = await runPandoc(['-s', 'merged.md'], { runner });

    assert.ok(result.ok);
    if (!result.ok) return;
    assert.strictEqual(result.val.stdout, 'ok');
    assert.deepStrictEqual(runner.calls, [{ command: 'pandoc', args: ['-s', 'merged.md'] }]);
  });

  it('認識されないオプションで失敗した場合はそのオプションを示す', async () => {
    const runner = new StubRunner({ exitCode: 2, stderr: "pandoc: unrecognized option `--bogus'\n" });

    const result = await runPandoc(['--bogus'], { runner });

    assert.ok(!result.ok);
    if (result.ok) return;
    assert.strictEqual(result.err.unrecognizedOption, '--bogus');
    assert.strictEqual(result.err.message, "Error: argument '--bogus' not recognized.\n Try: pandoc --help");
  });

  it('その他の失敗は stderr をそのままメッセージにする', async () => {
    const runner = new StubRunner({ exitCode: 43, stderr: '  Error producing PDF.\n' });

    const result = await runPandoc([], { runner });

    assert.ok(!result.ok);
    if (result.ok) return;
    assert.strictEqual(result.err.exitCode, 43);
    assert.strictEqual(result.err.message, 'Error producing PDF.');
  });

  it('stderr が空なら終了コードを示す', async () => {
    const runner = new StubRunner({ exitCode: 1 });

    const result = await runPandoc([], { runner });

    assert.ok(!result.ok);
    if (result.ok) return;
    assert.strictEqual(result.err.message, 'pandoc exited with code 1');
  });

  it('実行ファイルが見つからなければ PandocError', async () => {
    const result = await runPandoc(['--version'], { command: 'mdbind-missing-command-12345' });

    assert.ok(!result.ok);
    if (result.ok) return;
    assert.strictEqual(result.err.exitCode, null);
    assert.match(result.err.message, /ENOENT/);
  });
});

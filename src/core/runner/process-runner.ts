import { spawn, type SpawnOptions } from 'node:child_process';

/**
 * プロセス実行結果
 */
export interface ProcessResult {
  /** 終了コード */
  exitCode: number | null;
  /** シグナル（強制終了時） */
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  /** 実行時間（ミリ秒） */
  duration: number;
  /** タイムアウトで終了したか */
  timedOut: boolean;
}

export type OutputStream = 'stdout' | 'stderr';

/**
 * プロセス実行オプション
 */
export interface ProcessRunnerOptions {
  cwd?: string;
  /** 追加の環境変数 */
  env?: Record<string, string>;
  /** タイムアウト（ミリ秒）。0でタイムアウトなし */
  timeout?: number;
  /**
   * 出力を1行ずつ受け取るコールバック
   *
   * 改行で終わらない最後の断片はプロセス終了時に渡される。
   */
  onLine?: (line: string, stream: OutputStream) => void;
}

/**
 * チャンク単位の出力を行単位に切り出す
 */
class LineSplitter {
  private buffer = '';

  constructor(private readonly emit: (line: string) => void) {}

  push(text: string): void {
    this.buffer += text;
    const lines = this.buffer.split(/\r?\n/);
    this.buffer = lines.pop() ?? '';
    for (const line of lines) {
      this.emit(line);
    }
  }

  flush(): void {
    if (this.buffer.length > 0) {
      this.emit(this.buffer);
      this.buffer = '';
    }
  }
}

/**
 * 外部コマンド（pandoc など）の実行ラッパー
 *
 * stdout/stderr をキャプチャしつつ行単位で通知し、タイムアウト制御を行う。
 * 実行ファイルが見つからない場合などの spawn エラーは reject する。
 */
export class ProcessRunner {
  async run(
    command: string,
    args: readonly string[] = [],
    options: ProcessRunnerOptions = {},
  ): Promise<ProcessResult> {
    const startTime = Date.now();
    const { cwd, env, timeout = 0, onLine } = options;

    const spawnOptions: SpawnOptions = {
      cwd,
      env: env ? { ...process.env, ...env } : process.env,
      shell: false,
    };

    const abortController = new AbortController();
    let timeoutId: NodeJS.Timeout | undefined;

    if (timeout > 0) {
      timeoutId = setTimeout(() => {
        abortController.abort();
      }, timeout);
    }

    return new Promise<ProcessResult>((resolve, reject) => {
      const childProcess = spawn(command, [...args], {
        ...spawnOptions,
        signal: abortController.signal,
      });

      let stdout = '';
      let stderr = '';
      const stdoutLines = new LineSplitter((line) => onLine?.(line, 'stdout'));
      const stderrLines = new LineSplitter((line) => onLine?.(line, 'stderr'));

      childProcess.stdout?.on('data', (chunk: Buffer) => {
        const text = chunk.toString('utf-8');
        stdout += text;
        stdoutLines.push(text);
      });

      childProcess.stderr?.on('data', (chunk: Buffer) => {
        const text = chunk.toString('utf-8');
        stderr += text;
        stderrLines.push(text);
      });

      childProcess.on('error', (error: Error) => {
        if (timeoutId) clearTimeout(timeoutId);

        // AbortErrorの場合はタイムアウトとして処理
        if (error.name === 'AbortError') {
          resolve({
            exitCode: null,
            signal: 'SIGTERM',
            stdout,
            stderr,
            duration: Date.now() - startTime,
            timedOut: true,
          });
        } else {
          reject(error);
        }
      });

      childProcess.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        if (timeoutId) clearTimeout(timeoutId);

        stdoutLines.flush();
        stderrLines.flush();

        resolve({
          exitCode: code,
          signal,
          stdout,
          stderr,
          duration: Date.now() - startTime,
          timedOut: false,
        });
      });
    });
  }
}

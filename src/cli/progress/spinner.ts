/**
 * Spinner
 *
 * 外部コマンドの実行中に1行のスピナーを表示する。
 * - TTYモード: スピナーを同じ行で更新し、出力行はスピナーを消してから書き込む
 * - 非TTYモード: 開始メッセージを1度だけ出し、出力行はそのまま流す
 */

import {
  ANSI,
  colorize,
  dim,
  formatElapsed,
  getSpinnerFrame,
  isAnsiEnabled,
} from './ansi-utils.ts';

/**
 * 書き込み先（process.stderr など）
 */
export interface OutputSink {
  readonly isTTY?: boolean;
  write(text: string): unknown;
}

export interface SpinnerOptions {
  /** 出力先（デフォルト: process.stderr） */
  stream?: OutputSink;
  /** 更新間隔（ms）（デフォルト: 80） */
  interval?: number;
  /** ANSIを使うか（省略時は出力先と環境変数から判定） */
  useAnsi?: boolean;
}

export interface Spinner {
  start(): void;
  /** スピナーを消して、行を書き込む */
  writeLine(text: string): void;
  /** スピナーを止めて行を消す */
  stop(): void;
}

export function createSpinner(message: string, options: SpinnerOptions = {}): Spinner {
  const stream = options.stream ?? process.stderr;
  const intervalMs = options.interval ?? 80;
  const useAnsi = options.useAnsi ?? isAnsiEnabled(stream);

  let frame = 0;
  let timer: ReturnType<typeof setInterval> | null = null;
  let startedAt = new Date();

  const clear = (): void => {
    if (useAnsi) {
      stream.write(ANSI.CLEAR_LINE + ANSI.CURSOR_TO_START);
    }
  };

  const render = (): void => {
    if (!useAnsi) {
      return;
    }
    const spinner = colorize(getSpinnerFrame(frame), ANSI.CYAN, true);
    clear();
    stream.write(`${spinner} ${message} ${dim(formatElapsed(startedAt), true)}`);
  };

  return {
    start(): void {
      if (timer) {
        return;
      }
      startedAt = new Date();
      if (!useAnsi) {
        stream.write(`${message}\n`);
        return;
      }
      stream.write(ANSI.HIDE_CURSOR);
      render();
      timer = setInterval(() => {
        frame++;
        render();
      }, intervalMs);
    },

    writeLine(text: string): void {
      clear();
      stream.write(`${text}\n`);
      if (timer) {
        render();
      }
    },

    stop(): void {
      if (!timer) {
        return;
      }
      clearInterval(timer);
      timer = null;
      clear();
      stream.write(ANSI.SHOW_CURSOR);
    },
  };
}

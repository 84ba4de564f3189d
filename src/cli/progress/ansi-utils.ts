/**
 * ANSI Escape Sequence Utilities
 *
 * ターミナル制御用のANSIエスケープシーケンスと、色付け・スピナー用のヘルパー。
 */

/**
 * ANSIエスケープシーケンス定数
 */
export const ANSI = {
  // カーソル制御
  HIDE_CURSOR: '\x1b[?25l',
  SHOW_CURSOR: '\x1b[?25h',
  CURSOR_TO_START: '\x1b[0G',
  CLEAR_LINE: '\x1b[2K',

  // 色（フォアグラウンド）
  RESET: '\x1b[0m',
  BOLD: '\x1b[1m',
  DIM: '\x1b[2m',
  RED: '\x1b[31m',
  GREEN: '\x1b[32m',
  YELLOW: '\x1b[33m',
  BLUE: '\x1b[34m',
  CYAN: '\x1b[36m',
  GRAY: '\x1b[90m',
} as const;

/**
 * スピナーフレーム（ブレイル点字パターン）
 */
export const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

/**
 * ステータスアイコン
 */
export const STATUS_ICONS = {
  SUCCESS: '✅',
  FAILURE: '❌',
  WARNING: '⚠️',
  INFO: 'ℹ️',
  RUNNING: '🔄',
  DOCUMENT: '📄',
} as const;

/**
 * ANSIが有効かどうかを判定
 *
 * - NO_COLOR が設定されていれば無効
 * - FORCE_COLOR が設定されていれば非TTYでも有効
 * - それ以外はTTYの場合のみ有効
 */
export function isAnsiEnabled(
  stream: { readonly isTTY?: boolean },
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  if (env['NO_COLOR'] !== undefined) {
    return false;
  }
  if (env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  return stream.isTTY === true;
}

export function colorize(text: string, color: string, useAnsi: boolean): string {
  return useAnsi ? `${color}${text}${ANSI.RESET}` : text;
}

export function dim(text: string, useAnsi: boolean): string {
  return colorize(text, ANSI.DIM, useAnsi);
}

/**
 * フレーム番号に対応するスピナー文字
 */
export function getSpinnerFrame(frameIndex: number): string {
  const frame = SPINNER_FRAMES[frameIndex % SPINNER_FRAMES.length];
  return frame ?? SPINNER_FRAMES[0] ?? '⠋';
}

/**
 * 経過時間をフォーマット
 *
 * @param startTime 開始時刻
 * @param endTime 終了時刻（省略時は現在）
 * @returns 経過時間文字列（例: "1m 23s"）
 */
export function formatElapsed(startTime: Date, endTime: Date = new Date()): string {
  const elapsedMs = endTime.getTime() - startTime.getTime();
  const seconds = Math.floor(elapsedMs / 1000);
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (minutes > 0) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  return `${seconds}s`;
}

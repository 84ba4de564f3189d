/**
 * Domain Error Types
 *
 * ドメインエラーの型定義。option-tのResult型と組み合わせて使用する。
 * タグ付きユニオン型により、エラーの種類を型安全に区別できる。
 */

// ===== Config Errors =====

export type ConfigError =
  | ConfigParseError
  | UnknownConfigSectionError
  | UnknownConfigKeyError
  | ConfigValueError
  | DuplicateConfigSectionError;

export interface ConfigParseError {
  readonly type: 'ConfigParseError';
  readonly filePath: string;
  readonly cause?: unknown;
  readonly message: string;
}

export interface UnknownConfigSectionError {
  readonly type: 'UnknownConfigSectionError';
  /** 未知のセクション名（ソート済み） */
  readonly sections: readonly string[];
  readonly message: string;
}

export interface UnknownConfigKeyError {
  readonly type: 'UnknownConfigKeyError';
  /** "[section]: key1, key2" 形式のエントリ */
  readonly entries: readonly string[];
  readonly message: string;
}

export interface ConfigValueError {
  readonly type: 'ConfigValueError';
  /** "[section] key: expected ..." 形式のエントリ */
  readonly entries: readonly string[];
  readonly message: string;
}

export interface DuplicateConfigSectionError {
  readonly type: 'DuplicateConfigSectionError';
  readonly sections: readonly string[];
  readonly message: string;
}

// ConfigError コンストラクタ
export const configParseError = (filePath: string, cause?: unknown): ConfigParseError => ({
  type: 'ConfigParseError',
  filePath,
  cause,
  message: `Failed to parse configuration file: ${filePath}${cause instanceof Error ? `\n${cause.message}` : ''}`,
});

export const unknownConfigSection = (sections: readonly string[]): UnknownConfigSectionError => {
  const sorted = [...sections].sort();
  return {
    type: 'UnknownConfigSectionError',
    sections: sorted,
    message: `Unknown config section(s): ${sorted.join(', ')}`,
  };
};

export const unknownConfigKey = (entries: readonly string[]): UnknownConfigKeyError => ({
  type: 'UnknownConfigKeyError',
  entries,
  message: `Unknown config key(s): ${entries.join('; ')}`,
});

export const configValueError = (entries: readonly string[]): ConfigValueError => ({
  type: 'ConfigValueError',
  entries,
  message: `Invalid config value(s): ${entries.join('; ')}`,
});

export const duplicateConfigSection = (sections: readonly string[]): DuplicateConfigSectionError => ({
  type: 'DuplicateConfigSectionError',
  sections,
  message: `Duplicate config section(s) in schema: ${sections.join(', ')}`,
});

// ===== CLI Errors =====

export interface CliParseError {
  readonly type: 'CliParseError';
  /** commanderのエラーコード（例: 'commander.optionMissingArgument'） */
  readonly code: string;
  readonly message: string;
}

export const cliParseError = (code: string, message: string): CliParseError => ({
  type: 'CliParseError',
  code,
  message,
});

// ===== Build Errors =====

export type BuildError =
  | ConfigError
  | PresentationOutputError
  | RequirementError
  | NoMarkdownFilesError
  | PandocError
  | BundleError
  | RenderError
  | BuildIOError;

export interface PresentationOutputError {
  readonly type: 'PresentationOutputError';
  readonly output: string;
  readonly message: string;
}

export interface RequirementError {
  readonly type: 'RequirementError';
  /** 見つからなかった実行ファイル */
  readonly missing: readonly string[];
  readonly message: string;
}

export interface NoMarkdownFilesError {
  readonly type: 'NoMarkdownFilesError';
  readonly rootDir: string;
  readonly message: string;
}

export interface PandocError {
  readonly type: 'PandocError';
  readonly exitCode: number | null;
  readonly stderr: string;
  /** pandocが認識しなかったオプション（stderrから抽出できた場合） */
  readonly unrecognizedOption?: string;
  readonly message: string;
}

export interface BundleError {
  readonly type: 'BundleError';
  readonly resource: string;
  readonly cause?: unknown;
  readonly message: string;
}

export interface RenderError {
  readonly type: 'RenderError';
  readonly inputPath: string;
  readonly cause?: unknown;
  readonly message: string;
}

export interface BuildIOError {
  readonly type: 'BuildIOError';
  readonly operation: string;
  readonly cause?: unknown;
  readonly message: string;
}

// BuildError コンストラクタ
export const presentationOutputError = (output: string): PresentationOutputError => ({
  type: 'PresentationOutputError',
  output,
  message: `Output file for presentations must be HTML, got: ${output}`,
});

export const requirementError = (missing: readonly string[]): RequirementError => ({
  type: 'RequirementError',
  missing,
  message: missing.map((name) => `${name} not found`).join('\n'),
});

export const noMarkdownFiles = (rootDir: string): NoMarkdownFilesError => ({
  type: 'NoMarkdownFilesError',
  rootDir,
  message: `No Markdown files found in ${rootDir}`,
});

export const pandocError = (
  exitCode: number | null,
  stderr: string,
  unrecognizedOption?: string,
): PandocError => ({
  type: 'PandocError',
  exitCode,
  stderr,
  unrecognizedOption,
  message:
    unrecognizedOption !== undefined
      ? `Error: argument '${unrecognizedOption}' not recognized.\n Try: pandoc --help`
      : stderr.trim() || `pandoc exited with code ${exitCode ?? 'null'}`,
});

export const bundleError = (resource: string, cause?: unknown): BundleError => ({
  type: 'BundleError',
  resource,
  cause,
  message: `Failed to bundle ${resource}: ${cause instanceof Error ? cause.message : String(cause)}`,
});

export const renderError = (inputPath: string, cause?: unknown): RenderError => ({
  type: 'RenderError',
  inputPath,
  cause,
  message: `Failed to render ${inputPath} to PDF: ${cause instanceof Error ? cause.message : String(cause)}`,
});

export const buildIOError = (operation: string, cause?: unknown): BuildIOError => ({
  type: 'BuildIOError',
  operation,
  cause,
  message: `IO error during ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`,
});

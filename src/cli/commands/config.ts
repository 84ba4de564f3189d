/**
 * Config command
 *
 * 設定ファイルの確認コマンド（show, validate, sections, schema）
 */

import { Command } from 'commander';
import { isErr } from 'option-t/plain_result';
import { filePath, type FilePath } from '../../types/branded.ts';
import type { GroupSpec } from '../../types/params-schema.ts';
import { RunParamsSchema } from '../../core/params/run-params.ts';
import { discoverConfigPath } from '../../core/config/config-path.ts';
import { loadConfigDefaults } from '../../core/config/config-file.ts';
import { mergeCliWithConfig } from '../../core/config/merge.ts';
import { createDefaultParams, describeFieldKind, sectionFieldMap } from '../../core/config/schema.ts';
import { discoverSections } from '../../core/config/sections.ts';
import { buildConfigJsonSchema } from '../../core/config/json-schema.ts';
import { toDisplayPath } from '../utils/display-path.ts';

/**
 * 設定値を人間が読みやすい形式で表示
 */
export function formatConfigValue(value: unknown, indent = 0): string {
  const indentStr = '  '.repeat(indent);

  if (value === null || value === undefined) {
    return 'null';
  }

  if (typeof value === 'boolean' || typeof value === 'number') {
    return String(value);
  }

  if (typeof value === 'string') {
    return `"${value}"`;
  }

  if (Array.isArray(value)) {
    if (value.length === 0) {
      return '[]';
    }

    const items = value.map((item) => `${indentStr}  - ${formatConfigValue(item, indent + 1)}`).join('\n');
    return `\n${items}`;
  }

  if (typeof value === 'object') {
    const entries = Object.entries(value);
    if (entries.length === 0) {
      return '{}';
    }

    const items = entries
      .map(([k, v]) => {
        const formattedValue = formatConfigValue(v, indent + 1);
        if (formattedValue.startsWith('\n')) {
          return `${indentStr}  ${k}:${formattedValue}`;
        }
        return `${indentStr}  ${k}: ${formattedValue}`;
      })
      .join('\n');
    return `\n${items}`;
  }

  return String(value);
}

/**
 * セクションとキーの一覧（`mdbind config sections`）
 */
export function formatSections(root: GroupSpec): string {
  const blocks = discoverSections(root).map((section) => {
    const lines = [`[${section.name}]`];
    for (const [key, field] of sectionFieldMap(section.group)) {
      const defaultValue = Array.isArray(field.default)
        ? JSON.stringify(field.default)
        : formatConfigValue(field.default);
      lines.push(`  ${key}: ${describeFieldKind(field)} = ${defaultValue}`);
      lines.push(`      ${field.description}`);
    }
    return lines.join('\n');
  });
  return blocks.join('\n\n');
}

async function resolveConfigPath(configPath: string | undefined): Promise<FilePath | null> {
  return configPath !== undefined ? filePath(configPath) : discoverConfigPath([]);
}

/**
 * mdbind config show
 *
 * 既定値と設定ファイルから解決したパラメータを表示
 */
async function showCommand(options: { configPath?: string; json?: boolean }): Promise<void> {
  const configPath = await resolveConfigPath(options.configPath);
  const result = await mergeCliWithConfig(createDefaultParams(RunParamsSchema), configPath, RunParamsSchema);

  if (isErr(result)) {
    console.error(`Error: ${result.err.message}`);
    process.exit(1);
  }

  if (options.json) {
    console.log(JSON.stringify(result.val, null, 2));
    return;
  }

  console.log(`Config file: ${configPath !== null ? toDisplayPath(configPath) : '(none)'}`);
  console.log('Resolved parameters:');
  console.log(formatConfigValue(result.val));
}

/**
 * mdbind config validate
 *
 * 設定ファイルを検証
 */
async function validateCommand(options: { configPath?: string }): Promise<void> {
  const configPath = await resolveConfigPath(options.configPath);
  if (configPath === null) {
    console.log('No configuration file found; defaults apply');
    return;
  }

  const result = await loadConfigDefaults(configPath, RunParamsSchema);
  if (isErr(result)) {
    console.error(`✗ Validation failed: ${result.err.message}`);
    process.exit(1);
  }

  console.log(`✓ Configuration is valid: ${toDisplayPath(configPath)}`);
}

/**
 * config コマンドを作成
 */
export function createConfigCommand(): Command {
  const config = new Command('config').description('Inspect the configuration file');

  // mdbind config show
  config
    .command('show')
    .description('Show parameters resolved from defaults and the config file')
    .option('-c, --config-path <path>', 'Path to the TOML config file')
    .option('--json', 'Output as JSON')
    .action(showCommand);

  // mdbind config validate
  config
    .command('validate')
    .description('Validate the config file')
    .option('-c, --config-path <path>', 'Path to the TOML config file')
    .action(validateCommand);

  // mdbind config sections
  config
    .command('sections')
    .description('List config sections and their keys')
    .action(() => {
      console.log(formatSections(RunParamsSchema));
    });

  // mdbind config schema
  config
    .command('schema')
    .description('Print the JSON schema of the config file')
    .action(() => {
      console.log(JSON.stringify(buildConfigJsonSchema(RunParamsSchema, 'mdbind configuration'), null, 2));
    });

  return config;
}

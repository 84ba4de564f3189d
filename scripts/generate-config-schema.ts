#!/usr/bin/env node

/**
 * mdbind.toml 用の JSON スキーマを生成
 *
 * WHY: Taplo などのエディタ拡張で補完と検証を効かせるため
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { buildConfigJsonSchema } from '../src/core/config/json-schema.ts';
import { RunParamsSchema } from '../src/core/params/run-params.ts';

async function main() {
  const jsonSchema = {
    ...buildConfigJsonSchema(RunParamsSchema, 'mdbind configuration'),
    description: 'Configuration file for mdbind (mdbind.toml)',
  };

  const distPath = path.join(process.cwd(), 'dist');
  await fs.mkdir(distPath, { recursive: true });

  const schemaPath = path.join(distPath, 'mdbind.schema.json');
  await fs.writeFile(schemaPath, JSON.stringify(jsonSchema, null, 2) + '\n', 'utf-8');

  console.log(`✅ JSON schema generated: ${schemaPath}`);
}

main().catch((error) => {
  console.error('❌ Failed to generate schema:', error);
  process.exit(1);
});

/**
 * Write the OpenAPI document to a JSON file.
 *
 * Run with: npm run docs:export-api [-- <output path>]
 */
import { writeFileSync, mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import { generateOpenAPISpec } from '../apps/server/src/services/core/openapi-registry.js';

const outputPath = resolve(process.argv[2] ?? 'docs/api/openapi.json');
const spec = generateOpenAPISpec();

mkdirSync(dirname(outputPath), { recursive: true });
writeFileSync(outputPath, `${JSON.stringify(spec, null, 2)}\n`);

const pathCount = Object.keys(spec.paths ?? {}).length;
console.log(`OpenAPI spec (${pathCount} paths) exported to ${outputPath}`);

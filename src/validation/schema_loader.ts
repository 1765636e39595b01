/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';

export type Schema = {
  $schema: string;
  $id: string;
  type: string;
  required?: string[];
  properties?: Record<string, unknown>;
};

export type SchemaName = 'settings.v1' | 'positions.v1' | 'draft_ticket.v1';

const schemaCache = new Map<string, Schema>();

export function loadSchema(schemaName: SchemaName, projectRoot: string = process.cwd()): Schema {
  const cacheKey = `${projectRoot}:${schemaName}`;
  const cached = schemaCache.get(cacheKey);
  if (cached) {
    return cached;
  }

  const schemaPath = join(projectRoot, 'schemas', `${schemaName}.schema.json`);
  const schema: Schema = JSON.parse(readFileSync(schemaPath, 'utf-8'));

  schemaCache.set(cacheKey, schema);
  return schema;
}

import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { DATA_FILE_KEYS, DATA_FILE_SCHEMAS } from './collections.js';
import { ManifestSchema, ModDescriptorSchema } from './schemas.js';

export type SchemaArtifactMap = ReadonlyMap<string, Record<string, unknown>>;

const withId = (id: string, schema: Record<string, unknown>): Record<string, unknown> => ({
  ...schema,
  $id: id,
});

// Input side: authors may omit fields that have defaults and may write plain-string names.
const toDraft7 = (schema: z.ZodType): Record<string, unknown> => z.toJSONSchema(schema, { target: 'draft-7', io: 'input' });

export const schemaArtifactFileName = (stem: string): string => `${stem}.schema.json`;

/** JSON Schemas for every content file an author can write, keyed by artifact file name. */
export function buildSchemaArtifactMap(): SchemaArtifactMap {
  const artifacts = new Map<string, Record<string, unknown>>();
  for (const key of DATA_FILE_KEYS) {
    const fileName = schemaArtifactFileName(key);
    artifacts.set(fileName, withId(fileName, toDraft7(z.object({ [key]: DATA_FILE_SCHEMAS[key] }).strict())));
  }
  artifacts.set(schemaArtifactFileName('manifest'), withId(schemaArtifactFileName('manifest'), toDraft7(ManifestSchema)));
  artifacts.set(schemaArtifactFileName('mod'), withId(schemaArtifactFileName('mod'), toDraft7(ModDescriptorSchema)));
  return artifacts;
}

export function writeSchemaArtifacts(outDir: string): readonly string[] {
  mkdirSync(outDir, { recursive: true });
  const written: string[] = [];
  for (const [fileName, schema] of buildSchemaArtifactMap()) {
    const filePath = join(outDir, fileName);
    writeFileSync(filePath, `${JSON.stringify(schema, null, 2)}\n`, 'utf8');
    written.push(filePath);
  }
  return written;
}

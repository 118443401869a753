import { extname } from 'node:path';
import { parseDocument } from 'yaml';
import type { YAMLError } from 'yaml';
import type { z } from 'zod';
import { CONTENT_DIAGNOSTIC_CODES } from '../kernel/diagnostic-codes.js';
import type { Diagnostic } from '../kernel/diagnostics.js';
import { formatError } from '../kernel/content-error.js';
import { DATA_FILE_SCHEMAS } from './collections.js';
import type { DataFileKey, DataFileValueMap } from './collections.js';

export type DataFileFormat = 'json' | 'yaml';

export interface DecodeInput<K extends DataFileKey> {
  readonly key: K;
  readonly text: string;
  readonly format: DataFileFormat;
  readonly filePath: string;
  readonly sourceId?: string;
}

/**
 * `value` is null when the file failed to decode (see `diagnostics`) or when
 * the document is empty and contributes nothing.
 */
export interface DecodeResult<K extends DataFileKey> {
  readonly key: K;
  readonly value: DataFileValueMap[K] | null;
  readonly diagnostics: readonly Diagnostic[];
}

export function detectDataFileFormat(fileName: string): DataFileFormat | null {
  const extension = extname(fileName).toLowerCase();
  if (extension === '.json') {
    return 'json';
  }
  if (extension === '.yaml' || extension === '.yml') {
    return 'yaml';
  }
  return null;
}

export function decodeDataFile<K extends DataFileKey>(input: DecodeInput<K>): DecodeResult<K> {
  const context: FileContext = {
    path: input.key,
    filePath: input.filePath,
    collection: input.key,
    ...(input.sourceId === undefined ? {} : { sourceId: input.sourceId }),
  };
  const parsed = parseText(input.text, input.format, context);
  if (!parsed.ok) {
    return { key: input.key, value: null, diagnostics: parsed.diagnostics };
  }

  if (parsed.value === null || parsed.value === undefined) {
    return { key: input.key, value: null, diagnostics: [] };
  }

  const root = parsed.value;
  if (!isPlainObject(root)) {
    return failure(input.key, [
      schemaDiagnostic(context, input.key, `Expected an object with a single "${input.key}" key at the document root.`),
    ]);
  }

  const diagnostics: Diagnostic[] = [];
  for (const rootKey of Object.keys(root).sort()) {
    if (rootKey !== input.key) {
      diagnostics.push(
        schemaDiagnostic(context, rootKey, `Unexpected root key "${rootKey}"; a ${input.key} file holds only "${input.key}".`),
      );
    }
  }
  if (!(input.key in root)) {
    diagnostics.push(schemaDiagnostic(context, input.key, `Missing root key "${input.key}".`));
  }
  if (diagnostics.length > 0) {
    return failure(input.key, diagnostics);
  }

  const payload = root[input.key];
  const result = DATA_FILE_SCHEMAS[input.key].safeParse(payload);
  if (!result.success) {
    return failure(
      input.key,
      result.error.issues.map((issue) => {
        const entityId = readRecordId(payload, issue.path[0]);
        return {
          ...schemaDiagnostic(context, formatIssuePath(input.key, issue.path), issue.message),
          ...(entityId === undefined ? {} : { entityId }),
        };
      }),
    );
  }

  return { key: input.key, value: result.data, diagnostics: [] };
}

/** Renders a zod issue path as `weapons[2].damage`. */
export function formatIssuePath(root: string, segments: readonly PropertyKey[]): string {
  let path = root;
  for (const segment of segments) {
    path += typeof segment === 'number' ? `[${segment}]` : `.${String(segment)}`;
  }
  return path;
}

export interface DocumentInput {
  readonly text: string;
  readonly format: DataFileFormat;
  readonly filePath: string;
  /** Diagnostic path used for file-level problems, e.g. `manifest`. */
  readonly path: string;
  readonly sourceId?: string;
}

export interface DocumentResult<T> {
  readonly value: T | null;
  readonly diagnostics: readonly Diagnostic[];
}

/** Decodes a whole document against `schema`; used for the manifest and mod descriptors. */
export function decodeDocument<T>(input: DocumentInput, schema: z.ZodType<T>): DocumentResult<T> {
  const context: FileContext = {
    path: input.path,
    filePath: input.filePath,
    ...(input.sourceId === undefined ? {} : { sourceId: input.sourceId }),
  };
  const parsed = parseText(input.text, input.format, context);
  if (!parsed.ok) {
    return { value: null, diagnostics: parsed.diagnostics };
  }

  const result = schema.safeParse(parsed.value ?? {});
  if (!result.success) {
    return {
      value: null,
      diagnostics: result.error.issues.map((issue) =>
        schemaDiagnostic(context, formatIssuePath(input.path, issue.path), issue.message),
      ),
    };
  }
  return { value: result.data, diagnostics: [] };
}

interface FileContext {
  readonly path: string;
  readonly filePath: string;
  readonly collection?: string;
  readonly sourceId?: string;
}

type ParsedText =
  | { readonly ok: true; readonly value: unknown }
  | { readonly ok: false; readonly diagnostics: readonly Diagnostic[] };

function parseText(text: string, format: DataFileFormat, context: FileContext): ParsedText {
  if (format === 'json') {
    if (text.trim() === '') {
      return { ok: true, value: null };
    }
    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (error) {
      return { ok: false, diagnostics: [parseDiagnostic(context, `Invalid JSON: ${formatError(error)}`)] };
    }
    // JSON.parse keeps the last of repeated keys; the YAML reader rejects them as YAML does.
    const keyErrors = parseDocument(text, { schema: 'json', uniqueKeys: true }).errors;
    if (keyErrors.length > 0) {
      return { ok: false, diagnostics: keyErrors.map((error) => yamlErrorDiagnostic(context, 'JSON', error)) };
    }
    return { ok: true, value };
  }

  const doc = parseDocument(text, {
    schema: 'core',
    strict: true,
    uniqueKeys: true,
  });
  if (doc.errors.length > 0) {
    return { ok: false, diagnostics: doc.errors.map((error) => yamlErrorDiagnostic(context, 'YAML', error)) };
  }

  const value: unknown = doc.toJSON();
  return { ok: true, value };
}

function yamlErrorDiagnostic(context: FileContext, label: 'JSON' | 'YAML', error: YAMLError): Diagnostic {
  const line = error.linePos?.[0]?.line;
  const col = error.linePos?.[0]?.col;
  return parseDiagnostic(
    context,
    line !== undefined
      ? `${label} parse error at line ${line}${col !== undefined ? `, col ${col}` : ''}: ${error.message}`
      : error.message,
  );
}

function failure<K extends DataFileKey>(key: K, diagnostics: readonly Diagnostic[]): DecodeResult<K> {
  return { key, value: null, diagnostics };
}

function parseDiagnostic(context: FileContext, message: string): Diagnostic {
  return {
    code: CONTENT_DIAGNOSTIC_CODES.CONTENT_PARSE_ERROR,
    path: context.path,
    severity: 'error',
    message,
    suggestion: 'Fix the file syntax and save again.',
    ...withContext(context),
  };
}

function schemaDiagnostic(context: FileContext, path: string, message: string): Diagnostic {
  return {
    code: CONTENT_DIAGNOSTIC_CODES.CONTENT_SCHEMA_INVALID,
    path,
    severity: 'error',
    message,
    ...withContext(context),
  };
}

function withContext(context: FileContext): Pick<Diagnostic, 'collection' | 'filePath' | 'sourceId'> {
  return {
    filePath: context.filePath,
    ...(context.collection === undefined ? {} : { collection: context.collection }),
    ...(context.sourceId === undefined ? {} : { sourceId: context.sourceId }),
  };
}

function readRecordId(payload: unknown, index: PropertyKey | undefined): string | undefined {
  if (!Array.isArray(payload) || typeof index !== 'number') {
    return undefined;
  }
  const record: unknown = payload[index];
  if (!isPlainObject(record)) {
    return undefined;
  }
  const id = record.id;
  return typeof id === 'string' && id.trim() !== '' ? id : undefined;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

import { join } from 'node:path';
import { ContentError } from '../kernel/content-error.js';
import { CONTENT_DIAGNOSTIC_CODES, downgradeToWarning } from '../kernel/diagnostic-codes.js';
import type { Diagnostic } from '../kernel/diagnostics.js';
import { compareText } from '../kernel/diagnostic-order.js';
import { isDataFileKey } from './collections.js';
import type { PipelineConfig } from './config.js';
import { decodeDocument } from './decode-file.js';
import { listPackFiles, listSubdirectories, readPackFile, throwIfAborted } from './pack-files.js';
import type { PackFile, PackListing } from './pack-files.js';
import { ManifestSchema, ModDescriptorSchema } from './schemas.js';

export const BASE_SOURCE_ID = 'base';
export const MANIFEST_STEM = 'manifest';
export const MOD_DESCRIPTOR_STEM = 'mod';

export interface ResolvedManifest {
  readonly schemaVersion: number;
  readonly locales: readonly string[];
}

export interface ContentSource {
  /** `base` or `mod:<folder>`. */
  readonly id: string;
  readonly kind: 'base' | 'mod';
  readonly dir: string;
  /** Directory name under the mods root; the base pack uses `base`. */
  readonly folder: string;
  readonly name: string;
  readonly priority: number;
  readonly schemaVersion: number;
  /** Recognized data files keyed by data file key. */
  readonly files: PackListing;
}

export interface SourceResolution {
  readonly manifest: ResolvedManifest;
  /** Load order: the base pack first, then mods by ascending priority and folder name. */
  readonly sources: readonly ContentSource[];
  readonly diagnostics: readonly Diagnostic[];
}

export interface ResolveSourcesOptions {
  readonly signal?: AbortSignal;
}

type ResolverConfig = Pick<PipelineConfig, 'baseDir' | 'modsDir' | 'supportedSchemaVersion'>;

export async function resolveSources(
  config: ResolverConfig,
  options: ResolveSourcesOptions = {},
): Promise<SourceResolution> {
  const diagnostics: Diagnostic[] = [];
  const baseListing = await listPackFiles(config.baseDir);
  if (baseListing === null) {
    throw new ContentError('CONTENT_BASE_MISSING', 'Base content pack directory does not exist.', {
      baseDir: config.baseDir,
    });
  }

  const manifest = await readManifest(config, baseListing, diagnostics, options.signal);
  const base: ContentSource = {
    id: BASE_SOURCE_ID,
    kind: 'base',
    dir: config.baseDir,
    folder: BASE_SOURCE_ID,
    name: BASE_SOURCE_ID,
    priority: 0,
    schemaVersion: manifest.schemaVersion,
    files: dataFilesOf(baseListing),
  };

  const mods: ContentSource[] = [];
  for (const folder of (await listSubdirectories(config.modsDir)) ?? []) {
    throwIfAborted(options.signal, folder);
    const mod = await resolveMod(config.modsDir, folder, manifest, options.signal);
    diagnostics.push(...mod.diagnostics);
    if (mod.source !== null) {
      mods.push(mod.source);
    }
  }

  mods.sort(compareModLoadOrder);
  return { manifest, sources: [base, ...mods], diagnostics };
}

export function compareModLoadOrder(left: ContentSource, right: ContentSource): number {
  const priorityDelta = left.priority - right.priority;
  return priorityDelta !== 0 ? priorityDelta : compareText(left.folder, right.folder);
}

export function modSourceId(folder: string): string {
  return `mod:${folder}`;
}

async function readManifest(
  config: ResolverConfig,
  listing: PackListing,
  diagnostics: Diagnostic[],
  signal: AbortSignal | undefined,
): Promise<ResolvedManifest> {
  const fallback: ResolvedManifest = { schemaVersion: config.supportedSchemaVersion, locales: ['en'] };
  const file = pickSingleFile(listing, MANIFEST_STEM, MANIFEST_STEM, BASE_SOURCE_ID, diagnostics);
  if (file === undefined) {
    return fallback;
  }

  const decoded = decodeDocument(
    {
      text: await readPackFile(file, signal),
      format: file.format,
      filePath: file.filePath,
      path: MANIFEST_STEM,
      sourceId: BASE_SOURCE_ID,
    },
    ManifestSchema,
  );
  diagnostics.push(...decoded.diagnostics);
  if (decoded.value === null) {
    return fallback;
  }

  if (decoded.value.schemaVersion > config.supportedSchemaVersion) {
    diagnostics.push({
      code: CONTENT_DIAGNOSTIC_CODES.CONTENT_SCHEMA_VERSION_REJECTED,
      path: `${MANIFEST_STEM}.schemaVersion`,
      severity: 'error',
      message: `Base pack declares schema version ${decoded.value.schemaVersion}; this runtime supports up to ${config.supportedSchemaVersion}.`,
      suggestion: 'Upgrade the runtime or lower the manifest schemaVersion.',
      sourceId: BASE_SOURCE_ID,
      filePath: file.filePath,
    });
  }

  return {
    schemaVersion: decoded.value.schemaVersion,
    locales: decoded.value.locales ?? ['en'],
  };
}

interface ModResolution {
  readonly source: ContentSource | null;
  readonly diagnostics: readonly Diagnostic[];
}

async function resolveMod(
  modsDir: string,
  folder: string,
  manifest: ResolvedManifest,
  signal: AbortSignal | undefined,
): Promise<ModResolution> {
  const dir = join(modsDir, folder);
  const id = modSourceId(folder);
  const path = `mods.${folder}`;
  const listing = (await listPackFiles(dir)) ?? new Map<string, readonly PackFile[]>();
  const files = dataFilesOf(listing);
  const diagnostics: Diagnostic[] = [];

  const descriptorFile = pickSingleFile(listing, MOD_DESCRIPTOR_STEM, `${path}.${MOD_DESCRIPTOR_STEM}`, id, diagnostics);
  if (descriptorFile === undefined && files.size === 0) {
    return {
      source: null,
      diagnostics: [
        {
          code: CONTENT_DIAGNOSTIC_CODES.CONTENT_MOD_UNRECOGNIZED,
          path,
          severity: 'info',
          message: `Directory "${folder}" holds no content files or mod descriptor; ignored.`,
          sourceId: id,
        },
      ],
    };
  }

  let priority = 0;
  let schemaVersion = manifest.schemaVersion;
  let name = folder;
  if (descriptorFile !== undefined) {
    const decoded = decodeDocument(
      {
        text: await readPackFile(descriptorFile, signal),
        format: descriptorFile.format,
        filePath: descriptorFile.filePath,
        path: `${path}.${MOD_DESCRIPTOR_STEM}`,
        sourceId: id,
      },
      ModDescriptorSchema,
    );
    if (decoded.value === null) {
      return {
        source: null,
        diagnostics: [
          ...diagnostics,
          ...decoded.diagnostics.map(downgradeToWarning),
          skippedModDiagnostic(folder, 'its mod descriptor is invalid'),
        ],
      };
    }
    priority = decoded.value.priority;
    schemaVersion = decoded.value.schemaVersion ?? manifest.schemaVersion;
    name = decoded.value.name ?? folder;
  }

  if (schemaVersion > manifest.schemaVersion) {
    return {
      source: null,
      diagnostics: [
        ...diagnostics,
        {
          code: CONTENT_DIAGNOSTIC_CODES.CONTENT_SCHEMA_VERSION_REJECTED,
          path: `${path}.schemaVersion`,
          severity: 'warning',
          message: `Mod "${folder}" declares schema version ${schemaVersion}, newer than the manifest's ${manifest.schemaVersion}; mod skipped.`,
          suggestion: 'Update the mod for this schema version or upgrade the base pack.',
          sourceId: id,
        },
      ],
    };
  }

  return {
    source: { id, kind: 'mod', dir, folder, name, priority, schemaVersion, files },
    diagnostics,
  };
}

export function skippedModDiagnostic(folder: string, reason: string): Diagnostic {
  return {
    code: CONTENT_DIAGNOSTIC_CODES.CONTENT_MOD_SKIPPED,
    path: `mods.${folder}`,
    severity: 'warning',
    message: `Mod "${folder}" was excluded from this load because ${reason}.`,
    sourceId: modSourceId(folder),
  };
}

function dataFilesOf(listing: PackListing): PackListing {
  return new Map([...listing].filter(([stem]) => isDataFileKey(stem)));
}

function pickSingleFile(
  listing: PackListing,
  stem: string,
  path: string,
  sourceId: string,
  diagnostics: Diagnostic[],
): PackFile | undefined {
  const files = listing.get(stem) ?? [];
  const [first] = files;
  if (files.length > 1 && first !== undefined) {
    diagnostics.push({
      code: CONTENT_DIAGNOSTIC_CODES.CONTENT_FORMAT_AMBIGUOUS,
      path,
      severity: 'warning',
      message: `Found ${files.map((file) => file.fileName).join(', ')}; only ${first.fileName} is read.`,
      sourceId,
    });
  }
  return first;
}

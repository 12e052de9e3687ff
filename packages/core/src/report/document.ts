// packages/core/src/report/document.ts — Structured report document and the removal list read back from it

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, extname } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import { formatPercentage } from '../analysis/cruft.js';
import { idSchema } from '../catalog/snapshot.js';
import { OBJECT_TYPES } from '../types/catalog.js';
import type { CatalogAccessor, Identity, ObjectType } from '../types/catalog.js';
import type { MetadataEntry, ReportKind } from '../types/report.js';
import { RemovalFileError } from '../utils/errors.js';
import type { Report } from './report.js';

export interface ReportDocumentMeta {
  runId: string;
  server: string | null;
  generated: Date;
  version: string;
}

export interface DocumentResult {
  heading: string;
  description: string;
  removable: boolean;
  objects: Identity[];
}

export type DocumentMetadataEntry =
  | {
      label: string;
      percentage: string;
      ratio: number;
      rank: string;
      range: string;
      count: number;
      population: number;
    }
  | { label: string; count: number };

export interface DocumentReport {
  kind: ReportKind;
  type: ObjectType;
  heading: string;
  results: DocumentResult[];
  metadata: Array<{ section: string; entries: DocumentMetadataEntry[] }>;
}

export interface RemovalEntry {
  type: ObjectType;
  id: number;
  name: string;
}

export interface ReportDocument {
  report: {
    generated: string;
    server: string | null;
    version: string;
    runId: string;
    reports: DocumentReport[];
  };
  /** Pre-filled from removable results; edit and feed back to `loadRemovals`. */
  removals: RemovalEntry[];
}

function toDocumentEntry(label: string, entry: MetadataEntry): DocumentMetadataEntry {
  if (entry.kind === 'count') return { label, count: entry.count };
  return {
    label,
    percentage: formatPercentage(entry.score.ratio),
    ratio: entry.score.ratio,
    rank: entry.score.rank.label,
    range: entry.score.rank.range,
    count: entry.count,
    population: entry.population,
  };
}

function toDocumentReport(report: Report): DocumentReport {
  return {
    kind: report.kind,
    type: report.type,
    heading: report.heading,
    results: report.results.map(result => ({
      heading: result.heading,
      description: result.description,
      removable: result.removable,
      objects: result.objects.map(o => ({ id: o.id, name: o.name })),
    })),
    metadata: [...report.metadata].map(([section, entries]) => ({
      section,
      entries: [...entries].map(([label, entry]) => toDocumentEntry(label, entry)),
    })),
  };
}

function removalKey(type: ObjectType, id: number): string {
  return `${type}:${id}`;
}

export function buildReportDocument(reports: readonly Report[], meta: ReportDocumentMeta): ReportDocument {
  const removals = new Map<string, RemovalEntry>();
  for (const report of reports) {
    for (const result of report.results) {
      if (!result.removable) continue;
      for (const object of result.objects) {
        const key = removalKey(report.type, object.id);
        if (!removals.has(key)) {
          removals.set(key, { type: report.type, id: object.id, name: object.name });
        }
      }
    }
  }

  return {
    report: {
      generated: meta.generated.toISOString(),
      server: meta.server,
      version: meta.version,
      runId: meta.runId,
      reports: reports.map(toDocumentReport),
    },
    removals: [...removals.values()],
  };
}

function isJsonPath(path: string): boolean {
  return extname(path).toLowerCase() === '.json';
}

/** JSON for a `.json` path, YAML for anything else. */
export function writeReportDocument(path: string, document: ReportDocument): void {
  mkdirSync(dirname(path), { recursive: true });
  const content = isJsonPath(path)
    ? `${JSON.stringify(document, null, 2)}\n`
    : stringifyYaml(document, { lineWidth: 100 });
  writeFileSync(path, content, 'utf-8');
}

const removalEntrySchema = z.object({
  type: z.enum(OBJECT_TYPES),
  id: idSchema,
  name: z.string().nullish(),
});

const removalFileSchema = z.object({
  removals: z.array(removalEntrySchema).nullish().transform(v => v ?? []),
});

export interface RemovalRequest {
  type: ObjectType;
  id: number;
  /** Informational only; removal is keyed by (type, id) */
  name?: string;
}

export function loadRemovals(path: string): RemovalRequest[] {
  if (!existsSync(path)) {
    throw new RemovalFileError(`Removal file not found: ${path}`, path);
  }

  let data: unknown;
  try {
    const content = readFileSync(path, 'utf-8');
    data = isJsonPath(path) ? JSON.parse(content) : parseYaml(content);
  } catch (err) {
    throw new RemovalFileError(
      `Failed to parse ${path}: ${err instanceof Error ? err.message : String(err)}`,
      path,
    );
  }

  const result = removalFileSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new RemovalFileError(`Invalid removal file: ${issues}`, path);
  }

  const requests = new Map<string, RemovalRequest>();
  for (const entry of result.data.removals) {
    const key = removalKey(entry.type, entry.id);
    if (requests.has(key)) continue;
    const request: RemovalRequest = { type: entry.type, id: entry.id };
    if (entry.name) request.name = entry.name;
    requests.set(key, request);
  }
  return [...requests.values()];
}

export interface RemovalPlanEntry {
  type: ObjectType;
  id: number;
  requestedName: string | undefined;
  /** Name the catalog holds for this id; undefined when the object is gone */
  catalogName: string | undefined;
  status: 'found' | 'missing';
  nameMismatch: boolean;
}

export interface RemovalPlan {
  entries: RemovalPlanEntry[];
  found: number;
  missing: number;
}

/** Resolve each request against the catalog by (type, id). Nothing is deleted. */
export function planRemovals(requests: readonly RemovalRequest[], catalog: CatalogAccessor): RemovalPlan {
  const byType = new Map<ObjectType, Map<number, Identity>>();
  const lookup = (type: ObjectType): Map<number, Identity> => {
    let index = byType.get(type);
    if (!index) {
      index = new Map(catalog.list(type).map(identity => [identity.id, identity]));
      byType.set(type, index);
    }
    return index;
  };

  const entries = requests.map((request): RemovalPlanEntry => {
    const current = lookup(request.type).get(request.id);
    return {
      type: request.type,
      id: request.id,
      requestedName: request.name,
      catalogName: current?.name,
      status: current ? 'found' : 'missing',
      nameMismatch: current !== undefined && request.name !== undefined && request.name !== current.name,
    };
  });

  const found = entries.filter(e => e.status === 'found').length;
  return { entries, found, missing: entries.length - found };
}

// packages/core/src/catalog/snapshot.ts — Catalog accessor backed by an exported snapshot file

import { existsSync, readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { OBJECT_TYPES } from '../types/catalog.js';
import type { CatalogAccessor, FieldValue, Identity, ManagedObject, ObjectType } from '../types/catalog.js';
import { CatalogError } from '../utils/errors.js';

const fieldValueSchema: z.ZodType<FieldValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(fieldValueSchema),
    z.record(z.string(), fieldValueSchema),
  ]),
);

export const idSchema = z.union([
  z.number().int(),
  z.string().regex(/^\d+$/, 'id must be an integer').transform(v => Number.parseInt(v, 10)),
]);

const snapshotRecordSchema = z.object({
  id: idSchema,
  name: z.string().nullish().transform(v => v ?? ''),
  fields: z.record(z.string(), fieldValueSchema).default({}),
});

export const catalogSnapshotSchema = z.object({
  server: z.string().optional(),
  fetchedAt: z.string().optional(),
  objects: z.record(z.enum(OBJECT_TYPES), z.array(snapshotRecordSchema)).default({}),
});

export type CatalogSnapshotInput = z.input<typeof catalogSnapshotSchema>;

export class SnapshotCatalog implements CatalogAccessor {
  private readonly collections = new Map<ObjectType, ManagedObject[]>();

  constructor(
    collections: Partial<Record<ObjectType, ManagedObject[]>>,
    readonly server: string | undefined = undefined,
    readonly fetchedAt: string | undefined = undefined,
  ) {
    for (const type of OBJECT_TYPES) {
      this.collections.set(type, collections[type] ?? []);
    }
  }

  /** Validate raw snapshot data (already parsed from JSON or YAML). */
  static fromData(data: unknown, source = 'snapshot'): SnapshotCatalog {
    const result = catalogSnapshotSchema.safeParse(data);
    if (!result.success) {
      const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new CatalogError(`Invalid catalog snapshot: ${issues}`, source);
    }
    const collections: Partial<Record<ObjectType, ManagedObject[]>> = {};
    for (const type of OBJECT_TYPES) {
      const entries = result.data.objects[type];
      if (!entries) continue;
      collections[type] = entries.map(entry => ({ type, ...entry }));
    }
    return new SnapshotCatalog(collections, result.data.server, result.data.fetchedAt);
  }

  list(type: ObjectType): Identity[] {
    return this.records(type).map(r => ({ id: r.id, name: r.name }));
  }

  records(type: ObjectType): ManagedObject[] {
    return this.collections.get(type) ?? [];
  }
}

/**
 * Read a snapshot from `.json`, `.yml` or `.yaml`.
 */
export function loadCatalogSnapshot(path: string): SnapshotCatalog {
  if (!existsSync(path)) {
    throw new CatalogError(`Catalog snapshot not found: ${path}`, path);
  }
  const ext = extname(path).toLowerCase();
  let data: unknown;
  try {
    const content = readFileSync(path, 'utf-8');
    data = ext === '.yml' || ext === '.yaml' ? parseYaml(content) : JSON.parse(content);
  } catch (err) {
    throw new CatalogError(
      `Failed to parse ${path}: ${err instanceof Error ? err.message : String(err)}`,
      path,
    );
  }
  return SnapshotCatalog.fromData(data, path);
}

// packages/core/src/report/report.ts — Ordered results plus metadata for one object type

import type { Identity, ObjectType } from '../types/catalog.js';
import type { MetadataEntry, MetadataSection, ReportKind, Result } from '../types/report.js';
import { ContractError } from '../utils/errors.js';

export const CRUFTINESS_SECTION = 'Cruftiness';
export const VERSION_SECTION = 'Version Spread';
export const MODEL_SECTION = 'Hardware Model Spread';

export class Report {
  private readonly resultList: Result[] = [];
  private readonly sections = new Map<string, MetadataSection>();

  constructor(
    readonly kind: ReportKind,
    readonly type: ObjectType,
    readonly heading: string,
  ) {}

  /** Results in the order they were added. */
  get results(): readonly Result[] {
    return this.resultList;
  }

  /** Metadata sections in the order they were first written. */
  get metadata(): ReadonlyMap<string, MetadataSection> {
    return this.sections;
  }

  get isEmpty(): boolean {
    return this.resultList.length === 0 && this.sections.size === 0;
  }

  addResult(result: Result): this {
    if (this.getResultByHeading(result.heading)) {
      throw new ContractError(`${this.heading} already has a result headed "${result.heading}"`);
    }
    this.resultList.push(result);
    return this;
  }

  getResultByHeading(heading: string): Result | undefined {
    return this.resultList.find(r => r.heading === heading);
  }

  /** Swap a result for its recomputed version, keeping its position. */
  replaceResult(heading: string, result: Result): this {
    const position = this.resultList.findIndex(r => r.heading === heading);
    if (position === -1) {
      throw new ContractError(`${this.heading} has no result headed "${heading}" to replace`);
    }
    this.resultList[position] = result;
    return this;
  }

  /** Writing an existing label overwrites it in place. */
  setMetadata(section: string, label: string, entry: MetadataEntry): this {
    const entries = this.sections.get(section) ?? new Map<string, MetadataEntry>();
    entries.set(label, entry);
    this.sections.set(section, entries);
    return this;
  }

  getMetadata(section: string, label: string): MetadataEntry | undefined {
    return this.sections.get(section)?.get(label);
  }
}

export function createResult(
  heading: string,
  objects: Iterable<Identity>,
  options: { description: string; includeInNonVerbose: boolean; removable: boolean },
): Result {
  return {
    heading,
    description: options.description,
    includeInNonVerbose: options.includeInNonVerbose,
    removable: options.removable,
    objects: [...objects].sort((a, b) => a.id - b.id),
  };
}

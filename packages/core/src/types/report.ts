// packages/core/src/types/report.ts — Report model shared by engine, renderer and document writer

import type { Identity, ObjectType } from './catalog.js';

export const REPORT_KINDS = [
  'computers',
  'mobile-devices',
  'computer-groups',
  'mobile-device-groups',
  'packages',
  'scripts',
  'printers',
  'computer-profiles',
  'mobile-device-profiles',
  'policies',
  'mac-apps',
  'mobile-apps',
] as const;

export type ReportKind = (typeof REPORT_KINDS)[number];

export interface Result {
  heading: string;
  description: string;
  /** Shown when output is not verbose */
  includeInNonVerbose: boolean;
  /** Objects of this result are pre-filled into the removal list of a report document */
  removable: boolean;
  objects: Identity[];
}

export interface CruftRank {
  /** 0-9 for deciles, 10 for a ratio of exactly 1 */
  index: number;
  /** e.g. "60-69%", or "100%" for the terminal rank */
  range: string;
  label: string;
}

export interface CruftScore {
  ratio: number;
  rank: CruftRank;
}

export type MetadataEntry =
  | { kind: 'cruft'; score: CruftScore; count: number; population: number }
  | { kind: 'count'; count: number };

export type MetadataSection = Map<string, MetadataEntry>;

export interface ReportFailure {
  kind: ReportKind;
  type: ObjectType;
  error: Error;
}

export interface RunOptions {
  checkInDays: number;
  now: Date;
  defaultGroups: { computer: string[]; mobileDevice: string[] };
  onCycle: 'warn' | 'fail';
}

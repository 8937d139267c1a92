import type { ArchivePath } from './ids.js';

export enum DateWindow {
  ALL = 'all',
  WEEK = 'week',
  MONTH = 'month',
  QUARTER = 'quarter',
  YEAR = 'year'
}

export interface BuildPlan {
  full: boolean;
  since: number | null;
  now: number;
  dirs: Set<ArchivePath>;
  windows: Set<DateWindow>;
  /** Manifest, feed and directory map; always true, kept explicit for reporting. */
  always: true;
}

// src/report/types.ts

import type { NormalizedAsset, NormalizedComment } from '../core/normalizer/types';

export type ReportView = 'grouped' | 'recent';

export type CommentReport = NormalizedComment;

export interface AssetReport extends NormalizedAsset {
  latestCommentAt?: string; // ISO 8601 of the newest comment
}

export interface FolderGroup {
  folderPath: string;
  assets: AssetReport[];
}

export interface ReportTotals {
  assets: number;
  comments: number;
}

export interface GroupedReport {
  view: 'grouped';
  groups: FolderGroup[];
  totals: ReportTotals;
}

export interface RecentReport {
  view: 'recent';
  assets: AssetReport[];
  totals: ReportTotals;
}

export type HarvestReport = GroupedReport | RecentReport;

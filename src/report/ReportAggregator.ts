// src/report/ReportAggregator.ts

import type { NormalizedAsset } from '../core/normalizer/types';
import type {
  AssetReport,
  FolderGroup,
  GroupedReport,
  HarvestReport,
  RecentReport,
  ReportTotals,
  ReportView,
} from './types';

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function byNameThenId(a: AssetReport, b: AssetReport): number {
  return compareText(a.name, b.name) || compareText(a.id, b.id);
}

/**
 * Orders processed assets for the renderer. Output depends only on the input set,
 * never on the order assets were processed in, so a resumed run and an
 * uninterrupted one produce the same report.
 */
export class ReportAggregator {
  aggregate(assets: NormalizedAsset[], view: ReportView = 'grouped'): HarvestReport {
    return view === 'recent' ? this.recent(assets) : this.grouped(assets);
  }

  /**
   * Buckets by folder path (groups sorted by path), assets by name within a group
   */
  grouped(assets: NormalizedAsset[]): GroupedReport {
    const buckets = new Map<string, AssetReport[]>();

    for (const asset of this.toReports(assets)) {
      const bucket = buckets.get(asset.folderPath);
      if (bucket) {
        bucket.push(asset);
      } else {
        buckets.set(asset.folderPath, [asset]);
      }
    }

    const groups: FolderGroup[] = Array.from(buckets.entries())
      .sort(([a], [b]) => compareText(a, b))
      .map(([folderPath, members]) => ({
        folderPath,
        assets: members.sort(byNameThenId),
      }));

    return { view: 'grouped', groups, totals: this.totals(assets) };
  }

  /**
   * Flat list, most recent comment first
   */
  recent(assets: NormalizedAsset[]): RecentReport {
    const ordered = this.toReports(assets).sort(
      (a, b) =>
        compareText(b.latestCommentAt ?? '', a.latestCommentAt ?? '') || byNameThenId(a, b)
    );

    return { view: 'recent', assets: ordered, totals: this.totals(assets) };
  }

  private toReports(assets: NormalizedAsset[]): AssetReport[] {
    return assets.map((asset) => {
      let latest: string | undefined;
      for (const comment of asset.comments) {
        if (latest === undefined || comment.rawTimestamp > latest) {
          latest = comment.rawTimestamp;
        }
      }
      return { ...asset, latestCommentAt: latest };
    });
  }

  private totals(assets: NormalizedAsset[]): ReportTotals {
    return {
      assets: assets.length,
      comments: assets.reduce((sum, asset) => sum + asset.comments.length, 0),
    };
  }
}

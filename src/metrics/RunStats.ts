/**
 * Compteurs d'un run d'import
 * Le chrono démarre à la création du tracker (début du pipeline)
 */

export interface RunStats {
  startTime: Date;
  itemsTotal: number;
  itemsAdded: number;
  itemsUpdated: number;
  itemsMarkedSold: number;
  photosReplaced: number;
  skippedRows: number;
  elapsedMs: number;
}

export class RunStatsTracker {
  private readonly startMs: number;
  private itemsTotal: number = 0;
  private itemsAdded: number = 0;
  private itemsUpdated: number = 0;
  private itemsMarkedSold: number = 0;
  private photosReplaced: number = 0;
  private skippedRows: number = 0;

  constructor(private readonly now: () => number = Date.now) {
    this.startMs = now();
  }

  /**
   * Ligne d'inscription avec un identifiant non vide
   */
  incrementTotal(): void {
    this.itemsTotal++;
  }

  recordUpsert(created: boolean): void {
    if (created) this.itemsAdded++;
    else this.itemsUpdated++;
  }

  incrementPhotosReplaced(): void {
    this.photosReplaced++;
  }

  /**
   * Ligne d'inscription sans identifiant, ignorée
   */
  incrementSkippedRows(): void {
    this.skippedRows++;
  }

  setMarkedSold(count: number): void {
    this.itemsMarkedSold = count;
  }

  elapsedSeconds(): number {
    return Math.max(0, this.now() - this.startMs) / 1000;
  }

  getStats(): RunStats {
    return {
      startTime: new Date(this.startMs),
      itemsTotal: this.itemsTotal,
      itemsAdded: this.itemsAdded,
      itemsUpdated: this.itemsUpdated,
      itemsMarkedSold: this.itemsMarkedSold,
      photosReplaced: this.photosReplaced,
      skippedRows: this.skippedRows,
      elapsedMs: Math.max(0, this.now() - this.startMs)
    };
  }

  /**
   * Statistiques formatées pour le log de fin de run
   */
  getFormattedStats(): Record<string, number | string> {
    const stats = this.getStats();
    return {
      items_total: stats.itemsTotal,
      items_added: stats.itemsAdded,
      items_updated: stats.itemsUpdated,
      items_marked_sold: stats.itemsMarkedSold,
      photos_replaced: stats.photosReplaced,
      skipped_rows: stats.skippedRows,
      duration: `${(stats.elapsedMs / 1000).toFixed(1)}s`,
      start_time: stats.startTime.toISOString()
    };
  }
}

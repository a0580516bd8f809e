/**
 * Price stores: Mongo-backed for the server, in-memory for tests
 * and for running without MONGO_URI.
 */

import type { PricePoint } from '../../portfolio-engine/contracts/portfolio.contract.js';
import type { PriceStore } from '../market_data.contract.js';
import { DailyCloseModel } from './daily_close.model.js';

export class MongoPriceStore implements PriceStore {

  async saveCloses(asset: string, points: readonly PricePoint[], source: string): Promise<number> {
    if (points.length === 0) return 0;

    // Batch upsert
    const bulkOps = points.map(p => ({
      updateOne: {
        filter: { asset, date: p.date },
        update: { $set: { asset, date: p.date, close: p.close, source } },
        upsert: true,
      },
    }));

    const result = await DailyCloseModel.bulkWrite(bulkOps, { ordered: false });
    return result.upsertedCount + result.modifiedCount;
  }

  async loadCloses(asset: string, from: string, to: string): Promise<PricePoint[]> {
    const docs = await DailyCloseModel
      .find({ asset, date: { $gte: from, $lte: to } })
      .sort({ date: 1 })
      .select({ _id: 0, date: 1, close: 1 })
      .lean();

    return docs.map(d => ({ date: d.date, close: d.close }));
  }
}

export class InMemoryPriceStore implements PriceStore {
  private readonly closes = new Map<string, Map<string, number>>();

  async saveCloses(asset: string, points: readonly PricePoint[]): Promise<number> {
    const byDate = this.closes.get(asset) ?? new Map<string, number>();
    for (const p of points) byDate.set(p.date, p.close);
    this.closes.set(asset, byDate);
    return points.length;
  }

  async loadCloses(asset: string, from: string, to: string): Promise<PricePoint[]> {
    const byDate = this.closes.get(asset);
    if (!byDate) return [];

    return Array.from(byDate.entries())
      .filter(([date]) => date >= from && date <= to)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([date, close]) => ({ date, close }));
  }
}

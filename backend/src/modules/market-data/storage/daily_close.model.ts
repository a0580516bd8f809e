/**
 * Daily Close Model
 *
 * MongoDB model for crypto_daily_closes collection.
 * One document per (asset, date); written on every live fetch.
 */

import mongoose, { Schema, Document } from 'mongoose';

export interface IDailyCloseDoc extends Document {
  asset: string;
  date: string;     // YYYY-MM-DD
  close: number;
  source: string;
  updatedAt: Date;
}

const DailyCloseSchema = new Schema<IDailyCloseDoc>({
  asset: { type: String, required: true },
  date: { type: String, required: true },
  close: { type: Number, required: true, min: 0 },
  source: { type: String, required: true },
}, {
  timestamps: true,
});

DailyCloseSchema.index({ asset: 1, date: 1 }, { unique: true });

export const DailyCloseModel = mongoose.model<IDailyCloseDoc>(
  'DailyClose',
  DailyCloseSchema,
  'crypto_daily_closes'
);

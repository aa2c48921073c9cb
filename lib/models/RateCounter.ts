/**
 * Rate Counter Model
 *
 * One document per (actionKind, UTC day), plus a spacing marker per kind
 * stored under the epoch day. Admission is a conditional update of the marker
 * followed by a conditional $inc on the day, so concurrent runs cannot both
 * take the last unit of a daily cap or both pass the spacing check.
 */

import mongoose, { Schema, Model } from 'mongoose';
import { ACTION_KINDS, type ActionKind } from '../types';

export interface IRateCounter {
  actionKind: ActionKind;
  day: Date;                // UTC midnight
  count: number;
  lastAdmittedAt?: Date;
}

const RateCounterSchema = new Schema<IRateCounter>(
  {
    actionKind: { type: String, enum: [...ACTION_KINDS], required: true },
    day: { type: Date, required: true },
    count: { type: Number, default: 0 },
    lastAdmittedAt: { type: Date },
  },
  { collection: 'rate_counters', timestamps: true }
);

RateCounterSchema.index({ actionKind: 1, day: 1 }, { unique: true });

const RateCounter: Model<IRateCounter> =
  mongoose.models.RateCounter || mongoose.model<IRateCounter>('RateCounter', RateCounterSchema);

export default RateCounter;

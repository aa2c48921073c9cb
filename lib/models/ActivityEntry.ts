/**
 * Activity Ledger Model
 *
 * Append-only log of automation attempts and their outcomes. Dedup for every
 * action kind reads from this collection, so nothing here is ever updated
 * or deleted by the application.
 */

import mongoose, { Schema, Model } from 'mongoose';
import { ACTION_KINDS, type ActionKind, type LedgerOutcome, type LedgerPhase } from '../types';

export interface IActivityEntry {
  entryId: string;
  attemptId: string;
  actionKind: ActionKind;
  targetKey: string;
  phase: LedgerPhase;
  outcome?: LedgerOutcome;
  errorKind?: string;
  externalId?: string;
  message?: string;
  metadata?: Record<string, unknown>;
  timestamp: Date;
}

const ActivityEntrySchema = new Schema<IActivityEntry>(
  {
    entryId: { type: String, required: true, unique: true },
    attemptId: { type: String, required: true, index: true },
    actionKind: { type: String, enum: [...ACTION_KINDS], required: true },
    targetKey: { type: String, required: true },
    phase: { type: String, enum: ['attempt', 'outcome'], required: true },
    outcome: { type: String, enum: ['succeeded', 'failed', 'skipped'] },
    errorKind: { type: String },
    externalId: { type: String },
    message: { type: String },
    metadata: { type: Schema.Types.Mixed },
    timestamp: { type: Date, required: true },
  },
  { collection: 'activity_ledger', versionKey: false }
);

// hasSucceeded
ActivityEntrySchema.index({ actionKind: 1, targetKey: 1, outcome: 1, timestamp: -1 });
// lastAttemptAt, list
ActivityEntrySchema.index({ actionKind: 1, phase: 1, timestamp: -1 });
ActivityEntrySchema.index({ timestamp: -1 });

ActivityEntrySchema.pre(
  ['updateOne', 'updateMany', 'findOneAndUpdate', 'replaceOne', 'findOneAndReplace', 'deleteMany', 'findOneAndDelete'],
  function (next) {
    next(new Error('activity_ledger is append-only'));
  }
);

const ActivityEntry: Model<IActivityEntry> =
  mongoose.models.ActivityEntry || mongoose.model<IActivityEntry>('ActivityEntry', ActivityEntrySchema);

export default ActivityEntry;

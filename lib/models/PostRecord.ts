/**
 * Post Record Model
 *
 * The generated content for one schedule occurrence and what became of it.
 * Status moves out of 'pending' once, through a conditional update.
 */

import mongoose, { Schema, Model } from 'mongoose';
import type { PostStatus } from '../types';

export interface IContentItem {
  id: string;
  topic: string;
  title: string;
  body: string;
  url?: string;
  imageDescription?: string;
  generatedAt: Date;
}

export interface IPostRecord {
  recordId: string;
  occurrenceKey: string;
  contentItem: IContentItem;
  status: PostStatus;
  submittedAt: Date;
  externalPostId?: string;
  errorKind?: string;
  error?: string;
  resolvedAt?: Date;
}

const ContentItemSchema = new Schema<IContentItem>(
  {
    id: { type: String, required: true },
    topic: { type: String, required: true },
    title: { type: String, required: true },
    body: { type: String, required: true },
    url: { type: String },
    imageDescription: { type: String },
    generatedAt: { type: Date, required: true },
  },
  { _id: false }
);

const PostRecordSchema = new Schema<IPostRecord>(
  {
    recordId: { type: String, required: true, unique: true },
    occurrenceKey: { type: String, required: true, index: true },
    contentItem: { type: ContentItemSchema, required: true },
    status: {
      type: String,
      enum: ['pending', 'succeeded', 'failed'],
      default: 'pending',
      index: true,
    },
    submittedAt: { type: Date, required: true },
    externalPostId: { type: String },
    errorKind: { type: String },
    error: { type: String },
    resolvedAt: { type: Date },
  },
  { collection: 'post_records', timestamps: true }
);

const PostRecordModel: Model<IPostRecord> =
  mongoose.models.PostRecord || mongoose.model<IPostRecord>('PostRecord', PostRecordSchema);

export default PostRecordModel;

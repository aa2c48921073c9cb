import { v4 as uuidv4 } from 'uuid';
import PostRecordModel, { type IPostRecord } from '../models/PostRecord';
import type { ContentItem, PostRecord } from '../types';

export type PostResolution =
  | { status: 'succeeded'; externalPostId: string; at: Date }
  | { status: 'failed'; errorKind: string; error: string; at: Date };

export interface PostRecordStore {
  createPending(input: { occurrenceKey: string; contentItem: ContentItem; at: Date }): Promise<PostRecord>;
  /** Moves a pending record to its final status. Throws if it is not pending. */
  resolve(id: string, resolution: PostResolution): Promise<PostRecord>;
}

export class PostRecordTransitionError extends Error {
  constructor(id: string) {
    super(`Post record ${id} is not pending`);
    this.name = 'PostRecordTransitionError';
  }
}

export function resolutionFields(resolution: PostResolution): Partial<PostRecord> {
  if (resolution.status === 'succeeded') {
    if (!resolution.externalPostId) {
      throw new Error('A succeeded post record needs an external post id');
    }
    return { status: 'succeeded', externalPostId: resolution.externalPostId, resolvedAt: resolution.at };
  }
  return {
    status: 'failed',
    errorKind: resolution.errorKind,
    error: resolution.error,
    resolvedAt: resolution.at,
  };
}

function toRecord(doc: IPostRecord): PostRecord {
  return {
    id: doc.recordId,
    occurrenceKey: doc.occurrenceKey,
    contentItem: Object.freeze({ ...doc.contentItem }),
    status: doc.status,
    submittedAt: doc.submittedAt,
    ...(doc.externalPostId ? { externalPostId: doc.externalPostId } : {}),
    ...(doc.errorKind ? { errorKind: doc.errorKind } : {}),
    ...(doc.error ? { error: doc.error } : {}),
    ...(doc.resolvedAt ? { resolvedAt: doc.resolvedAt } : {}),
  };
}

export class MongoPostRecordStore implements PostRecordStore {
  async createPending({ occurrenceKey, contentItem, at }: { occurrenceKey: string; contentItem: ContentItem; at: Date }): Promise<PostRecord> {
    const doc: IPostRecord = {
      recordId: uuidv4(),
      occurrenceKey,
      contentItem: { ...contentItem },
      status: 'pending',
      submittedAt: at,
    };
    await PostRecordModel.create(doc);
    return toRecord(doc);
  }

  async resolve(id: string, resolution: PostResolution): Promise<PostRecord> {
    const updated = await PostRecordModel.findOneAndUpdate(
      { recordId: id, status: 'pending' },
      { $set: resolutionFields(resolution) },
      { new: true }
    ).lean<IPostRecord | null>();

    if (!updated) {
      throw new PostRecordTransitionError(id);
    }
    return toRecord(updated);
  }
}

import mongoose from 'mongoose';
import { logger } from './logger';

const log = logger.child('mongodb');

let connection: Promise<typeof mongoose> | null = null;

/**
 * Connect once per process. A failed attempt is not cached, so the next
 * call tries again.
 */
export default async function connectToDatabase(uri: string): Promise<typeof mongoose> {
  if (!connection) {
    connection = mongoose
      .connect(uri, { bufferCommands: false, serverSelectionTimeoutMS: 10_000 })
      .then(instance => {
        log.info('Connected');
        return instance;
      })
      .catch((error: unknown) => {
        connection = null;
        throw error;
      });
  }
  return connection;
}

export async function disconnectFromDatabase(): Promise<void> {
  if (!connection) return;
  connection = null;
  await mongoose.disconnect();
}

/**
 * MongoDB Connection
 *
 * Redemption idempotency rests on the unique indexes of the ledger
 * collections, so a connection is only reported ready once those indexes
 * have been built.
 */

import mongoose from 'mongoose';

import { Ledger, LedgerTransaction, Subsidy } from '../models';
import { logger } from '../observability';

import { config } from './index';

export interface DatabaseStatus {
  connected: boolean;
  readyState: number;
  indexesReady: boolean;
}

let isConnected = false;
let indexesReady = false;

/**
 * Wait for every model's indexes; `init()` resolves once mongoose has built
 * them and rejects if a unique index cannot be created
 */
export const ensureLedgerIndexes = async (): Promise<void> => {
  const started = Date.now();
  await Promise.all([Ledger.init(), LedgerTransaction.init(), Subsidy.init()]);
  indexesReady = true;
  logger.info({ durationMs: Date.now() - started }, 'Ledger indexes ready');
};

export const connectDatabase = async (): Promise<void> => {
  if (isConnected) {
    logger.debug('Database already connected');
    return;
  }

  try {
    const conn = await mongoose.connect(config.mongodb.uri, {
      maxPoolSize: config.mongodb.maxPoolSize,
      minPoolSize: config.mongodb.minPoolSize,
      serverSelectionTimeoutMS: config.mongodb.serverSelectionTimeoutMS,
    });
    logger.info({ host: conn.connection.host, db: conn.connection.name }, 'MongoDB connected');

    await ensureLedgerIndexes();
    isConnected = true;
  } catch (error) {
    logger.error({ err: error }, 'MongoDB connection error');
    throw error;
  }
};

export const disconnectDatabase = async (): Promise<void> => {
  if (!isConnected) {
    return;
  }

  await mongoose.disconnect();
  isConnected = false;
  logger.info('MongoDB disconnected');
};

export const getDatabaseStatus = (): DatabaseStatus => ({
  connected: isConnected,
  readyState: mongoose.connection.readyState,
  indexesReady,
});

mongoose.connection.on('error', (err) => {
  logger.error({ err }, 'MongoDB connection error');
  isConnected = false;
});

mongoose.connection.on('disconnected', () => {
  logger.warn('MongoDB disconnected unexpectedly');
  isConnected = false;
});

mongoose.connection.on('reconnected', () => {
  logger.info('MongoDB reconnected');
  isConnected = true;
});

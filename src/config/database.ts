import mongoose from 'mongoose';

import { createServiceLogger } from '../observability/logger';

import { config } from './index';

const log = createServiceLogger('database');

let isConnected = false;

export const connectDatabase = async (): Promise<void> => {
  if (isConnected) {
    log.debug('Database already connected');
    return;
  }

  try {
    const conn = await mongoose.connect(config.mongodb.uri, {
      maxPoolSize: config.mongodb.maxPoolSize,
      minPoolSize: config.mongodb.minPoolSize,
      maxIdleTimeMS: config.mongodb.maxIdleTimeMS,
      serverSelectionTimeoutMS: config.mongodb.serverSelectionTimeoutMS,
    });
    isConnected = true;
    log.info({ host: conn.connection.host }, 'MongoDB connected');
  } catch (error) {
    log.error({ err: error }, 'MongoDB connection error');
    throw error;
  }
};

export const disconnectDatabase = async (): Promise<void> => {
  if (!isConnected) {
    return;
  }

  try {
    await mongoose.disconnect();
    isConnected = false;
    log.info('MongoDB disconnected');
  } catch (error) {
    log.error({ err: error }, 'MongoDB disconnection error');
    throw error;
  }
};

export const getDatabaseStatus = (): { connected: boolean; readyState: number } => {
  return {
    connected: isConnected,
    readyState: mongoose.connection.readyState,
  };
};

mongoose.connection.on('error', (err) => {
  log.error({ err }, 'MongoDB connection error');
  isConnected = false;
});

mongoose.connection.on('disconnected', () => {
  log.warn('MongoDB disconnected');
  isConnected = false;
});

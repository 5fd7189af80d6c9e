import mongoose from 'mongoose';
import dotenv from 'dotenv';
import { logger } from '../utils/logger';

dotenv.config();

export class Database {
  private static instance: Database | null = null;
  private isConnected: boolean = false;

  static getInstance(): Database {
    if (!Database.instance) {
      Database.instance = new Database();
    }
    return Database.instance;
  }

  async connect(mongoUri: string | undefined = process.env.MONGODB_URI): Promise<void> {
    if (this.isConnected) {
      return;
    }

    if (!mongoUri) {
      throw new Error('MONGODB_URI is not defined in environment variables');
    }

    logger.info('Connecting to MongoDB...');

    await mongoose.connect(mongoUri);
    this.isConnected = true;

    logger.info(`MongoDB connected successfully (database: ${mongoose.connection.name})`);

    // Connection events
    mongoose.connection.on('error', err => {
      logger.error('MongoDB connection error:', err);
    });

    mongoose.connection.on('disconnected', () => {
      logger.warn('MongoDB disconnected');
    });

    mongoose.connection.on('reconnected', () => {
      logger.info('MongoDB reconnected');
    });
  }

  async disconnect(): Promise<void> {
    if (!this.isConnected) {
      return;
    }
    await mongoose.disconnect();
    this.isConnected = false;
    logger.info('MongoDB disconnected');
  }
}

import mongoose from 'mongoose';
import Config from '@/config';
import Device from '@/models/Device';
import Measurement from '@/models/Measurement';
import { logger } from '@/utils/logger';

interface DatabaseConfig {
  uri: string;
  options?: mongoose.ConnectOptions;
}

const defaultConfig: DatabaseConfig = {
  uri: Config.MONGODB_URI,
  options: { autoIndex: false },
};

export const connectDB = async (config: DatabaseConfig = defaultConfig): Promise<typeof mongoose> => {
  await mongoose.connect(config.uri, config.options);
  return mongoose;
};

/**
 * Build the unique (device_id, timestamp) index before any poller writes.
 */
export const ensureIndexes = async (): Promise<void> => {
  await Device.createIndexes();
  await Measurement.createIndexes();
  logger.info('Database indexes ensured');
};

export const disconnectDB = async (): Promise<void> => {
  await mongoose.disconnect();
};

mongoose.connection.on('connected', () => {
  logger.info('MongoDB connected');
});

mongoose.connection.on('error', (err) => {
  logger.error('MongoDB connection error:', err);
});

mongoose.connection.on('disconnected', () => {
  logger.info('MongoDB disconnected');
});

export default mongoose;

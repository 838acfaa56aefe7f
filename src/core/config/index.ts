import dotenv from 'dotenv';

dotenv.config();

const Config = {
  ALERT_WEBHOOK_URL: process.env.ALERT_WEBHOOK_URL,
  ENABLE_ALERT_WEBHOOK: process.env.ENABLE_ALERT_WEBHOOK === 'true',
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
  SILENT: process.env.NODE_ENV === 'test',
};

export default Config;

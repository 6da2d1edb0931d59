import dotenv from 'dotenv'

dotenv.config()

export const config = {
  // Business
  business: {
    currency: process.env.BUSINESS_CURRENCY || 'USD',
  },

  // Database
  database: {
    path: process.env.DB_PATH || './data/sales_orders.db',
    // How long a placement waits for the write lock before giving up
    busyTimeoutMs: parseInt(process.env.DB_BUSY_TIMEOUT_MS || '5000'),
  },

  env: {
    nodeEnv: process.env.NODE_ENV || 'development',
  },

  log: {
    level: process.env.LOG_LEVEL || 'info',
    dir: process.env.LOG_DIR || './logs',
  },
}

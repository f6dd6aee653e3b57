import dotenv from 'dotenv';

dotenv.config();

const hourList = (value: string): number[] =>
  value
    .split(',')
    .map(part => parseFloat(part.trim()))
    .filter(hours => Number.isFinite(hours) && hours > 0);

const flag = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value === '') {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
};

export const config = {
  // Server
  nodeEnv: process.env.NODE_ENV || 'development',
  port: parseInt(process.env.PORT || '5000', 10),
  apiUrl: process.env.API_URL || 'http://localhost:5000',

  // Database
  mongodbUri: process.env.MONGODB_URI || 'mongodb://localhost:27017/vpn-storefront',

  // Redis (order locks; optional)
  redis: {
    host: process.env.REDIS_HOST || 'localhost',
    port: parseInt(process.env.REDIS_PORT || '6379', 10),
    password: process.env.REDIS_PASSWORD || undefined,
  },

  // JWT (operator tokens for the admin API)
  jwt: {
    secret: (() => {
      const secret = process.env.JWT_SECRET;
      if (!secret) {
        if (process.env.NODE_ENV === 'production') {
          throw new Error('JWT_SECRET is required in production environment');
        }
        console.warn('⚠️  WARNING: JWT_SECRET not set. Using default for development only.');
        return 'dev-secret-change-in-production-do-not-use-in-production';
      }
      return secret;
    })(),
    // Seconds
    expiresIn: parseInt(process.env.JWT_EXPIRES_IN || '43200', 10),
  },

  // Shared secret of the chat-bot collaborator
  serviceToken: process.env.SERVICE_TOKEN || '',

  // CORS
  corsOrigin: process.env.CORS_ORIGIN || 'http://localhost:3000',

  hostsConfigPath: process.env.HOSTS_CONFIG_PATH || 'config/hosts.json',

  orders: {
    paymentTimeoutMinutes: parseInt(process.env.ORDER_PAYMENT_TIMEOUT_MINUTES || '30', 10),
    amountTolerance: parseFloat(process.env.PAYMENT_AMOUNT_TOLERANCE || '0.01'),
    lockTtlMs: parseInt(process.env.ORDER_LOCK_TTL_MS || '60000', 10),
    lockWaitMs: parseInt(process.env.ORDER_LOCK_WAIT_MS || '10000', 10),
  },

  provisioning: {
    maxAttempts: parseInt(process.env.PROVISIONING_MAX_ATTEMPTS || '5', 10),
    backoffBaseMs: parseInt(process.env.PROVISIONING_BACKOFF_BASE_MS || '30000', 10),
    backoffMaxMs: parseInt(process.env.PROVISIONING_BACKOFF_MAX_MS || '900000', 10),
    attemptLeaseMs: parseInt(process.env.PROVISIONING_ATTEMPT_LEASE_MS || '120000', 10),
  },

  notifications: {
    maxAttempts: parseInt(process.env.NOTIFICATION_MAX_ATTEMPTS || '6', 10),
    backoffBaseMs: parseInt(process.env.NOTIFICATION_BACKOFF_BASE_MS || '60000', 10),
    backoffMaxMs: parseInt(process.env.NOTIFICATION_BACKOFF_MAX_MS || '3600000', 10),
  },

  sweeps: {
    intervalMs: parseInt(process.env.SWEEP_INTERVAL_MS || '30000', 10),
    batchSize: parseInt(process.env.SWEEP_BATCH_SIZE || '25', 10),
    redriveGraceMs: parseInt(process.env.SWEEP_REDRIVE_GRACE_MS || '60000', 10),
  },

  // Expiry reminders, in hours before a key runs out; empty disables them
  reminders: {
    markHours: hourList(process.env.EXPIRY_REMINDER_HOURS ?? '72,48,24,1'),
  },

  // Payment providers
  payments: {
    yookassa: {
      shopId: process.env.YOOKASSA_SHOP_ID || '',
      webhookSecret: process.env.YOOKASSA_WEBHOOK_SECRET || '',
    },
    cryptobot: {
      apiToken: process.env.CRYPTOBOT_API_TOKEN || '',
    },
    heleket: {
      merchantId: process.env.HELEKET_MERCHANT_ID || '',
      apiKey: process.env.HELEKET_API_KEY || '',
    },
    ton: {
      webhookToken: process.env.TONAPI_WEBHOOK_TOKEN || '',
      walletAddress: process.env.TON_WALLET_ADDRESS || '',
    },
  },

  referral: {
    enabled: flag(process.env.REFERRAL_ENABLED, true),
    currency: (process.env.REFERRAL_CURRENCY || 'RUB').toUpperCase(),
    percentage: parseFloat(process.env.REFERRAL_PERCENTAGE || '10'),
    fixedPurchaseAmount: parseFloat(process.env.REFERRAL_FIXED_PURCHASE_AMOUNT || '0'),
    signupBonusAmount: parseFloat(process.env.REFERRAL_SIGNUP_BONUS_AMOUNT || '0'),
    // Optional hooks; 0 disables them
    referredDiscountPercent: parseFloat(process.env.REFERRAL_DISCOUNT_PERCENT || '0'),
    minimumWithdrawal: parseFloat(process.env.REFERRAL_MINIMUM_WITHDRAWAL || '0'),
  },

  telegram: {
    botToken: process.env.TELEGRAM_BOT_TOKEN || '',
    apiBaseUrl: process.env.TELEGRAM_API_URL || 'https://api.telegram.org',
  },
  supportContact: process.env.SUPPORT_CONTACT || '@support',

  // Logging
  logLevel: process.env.LOG_LEVEL || 'info',
};

// Validate required environment variables
const requiredEnvVars: Record<string, string[]> = {
  development: ['JWT_SECRET'],
  production: ['JWT_SECRET', 'MONGODB_URI', 'SERVICE_TOKEN', 'TELEGRAM_BOT_TOKEN'],
  test: ['JWT_SECRET'],
};

const env = config.nodeEnv || 'development';
const required = requiredEnvVars[env] || requiredEnvVars.development;

const missing = required.filter(envVar => !process.env[envVar]);

if (missing.length > 0) {
  const errorMsg = `Missing required environment variables for ${env}: ${missing.join(', ')}`;
  if (env === 'production') {
    throw new Error(errorMsg);
  }
  console.warn(`⚠️  WARNING: ${errorMsg}`);
}

import { onRequest } from 'firebase-functions/v2/https';
import * as admin from 'firebase-admin';
import * as functions from 'firebase-functions';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { treatmentLogsRouter } from './routes/treatmentLogs';
import { apiLimiter } from './middlewares/rateLimit';
import { requireHttps } from './middlewares/httpsOnly';
import { errorHandler } from './middlewares/errorHandler';
import { corsConfig } from './config';
import { initSentry, setupSentryErrorHandler } from './utils/sentry';
export { offlineQueueDrain } from './triggers/offlineQueueDrain';
export { summaryCacheCleanup } from './triggers/summaryCacheCleanup';

// Initialize Sentry BEFORE other initializations
initSentry();

admin.initializeApp();

const app = express();

// Required for rate limiting behind the Cloud Functions load balancer
app.set('trust proxy', true);

const allowedOrigins = corsConfig.allowedOrigins
  ? corsConfig.allowedOrigins.split(',').map(origin => origin.trim()).filter(Boolean)
  : [];

const devOrigins = corsConfig.isDevelopment
  ? ['http://localhost:3000', 'http://localhost:19006', 'http://localhost:8081']
  : [];

const allAllowedOrigins = [...allowedOrigins, ...devOrigins];

if (allAllowedOrigins.length === 0) {
  functions.logger.warn(
    '[cors] No ALLOWED_ORIGINS configured. API will reject all CORS requests from browsers.'
  );
}

app.use(requireHttps);

app.use(cors({
  origin: (origin, callback) => {
    // Native clients and server-to-server calls send no origin
    if (!origin || allAllowedOrigins.includes(origin)) {
      callback(null, true);
      return;
    }

    functions.logger.warn(`[cors] Rejected request from unauthorized origin: ${origin}`);
    callback(new Error(`Origin ${origin} not allowed by CORS policy`));
  },
  credentials: true,
  methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization'],
}));

app.use(helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
  hsts: {
    maxAge: 31536000,
    includeSubDomains: true,
  },
  frameguard: {
    action: 'deny',
  },
  referrerPolicy: {
    policy: 'no-referrer',
  },
}));

// Quick-log bodies carry the day's schedules; nothing larger is expected
app.use(express.json({ limit: '1mb' }));
app.use(apiLimiter);

app.use('/v1/treatment-logs', treatmentLogsRouter);

app.get('/health', (req, res) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

// Sentry error handler - must come before custom error handler
setupSentryErrorHandler(app);

app.use(errorHandler);

export const api = onRequest(
  {
    timeoutSeconds: 60,
    memory: '512MiB',
    maxInstances: 100,
  },
  app
);

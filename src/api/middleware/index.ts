import compression from 'compression';
import rateLimit from 'express-rate-limit';
import cors from 'cors';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import dotenv from 'dotenv';

dotenv.config();

export const ADMIN_KEY_HEADER = 'x-admin-key';

// CORS middleware
const getAllowedOrigins = () => {
  if (process.env.NODE_ENV === 'production') {
    return process.env.ALLOWED_ORIGINS?.split(',') || [];
  }
  return '*';
};

export const corsMiddleware = cors({
  origin: getAllowedOrigins(),
  methods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: [
    'Content-Type',
    'Authorization',
    'Accept',
    'Origin',
    ADMIN_KEY_HEADER
  ],
  exposedHeaders: ['Content-Range', 'X-Content-Range'],
  credentials: true,
  preflightContinue: false,
  optionsSuccessStatus: 204
});

// Compression middleware
export const compressionMiddleware = compression();

// Rate limiting middleware
export const rateLimiter = rateLimit({
  windowMs: 5 * 60 * 1000, // 5 minutes
  limit: 200,
  standardHeaders: true,
  legacyHeaders: false
});

/**
 * Rejects requests whose admin key header does not match. With no key
 * configured every request is rejected.
 */
export const requireAdminKey = (adminKey: string | undefined): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    const provided = req.header(ADMIN_KEY_HEADER);
    if (!adminKey || provided !== adminKey) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }
    next();
  };

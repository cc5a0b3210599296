// Authentication middleware
import type { NextFunction, Request, Response } from 'express';
import jwt from 'jsonwebtoken';

import { config } from '../config/index.js';

export interface AuthRequest extends Request {
  operator?: {
    subject: string;
  };
}

/**
 * Authenticate via API key or JWT Bearer token
 */
export function authenticate(req: AuthRequest, res: Response, next: NextFunction) {
  const apiKey = req.header('x-api-key');
  if (apiKey === config.apiKey) {
    return next();
  }

  const authHeader = req.header('Authorization');
  if (authHeader && authHeader.startsWith('Bearer ')) {
    const token = authHeader.substring(7);
    try {
      const decoded = jwt.verify(token, config.jwtSecret);
      const subject = typeof decoded === 'string' ? decoded : decoded.sub;
      if (!subject) {
        return res.status(401).json({ error: 'Token has no subject' });
      }
      req.operator = { subject };
      return next();
    } catch {
      return res.status(401).json({ error: 'Invalid token' });
    }
  }

  return res.status(401).json({ error: 'Authentication required' });
}

import express = require('express');
import * as crypto from 'crypto';

// Passed from the main server setup; empty disables the check
let API_TOKEN: Buffer | null = null;

export const initAuthMiddleware = (token: string | null) => {
  API_TOKEN = token ? Buffer.from(token, 'utf8') : null;
};

export const bearerTokenOf = (req: express.Request): string | null => {
  const header = req.get('authorization');
  if (!header) return null;
  const match = header.match(/^Bearer\s+(.+)$/i);
  return match ? match[1].trim() : null;
};

const tokenMatches = (candidate: string, expected: Buffer): boolean => {
  const given = Buffer.from(candidate, 'utf8');
  if (given.length !== expected.length) return false;
  return crypto.timingSafeEqual(given, expected);
};

// Commands require the configured API token; reads stay open
export const requireApiToken: express.RequestHandler = (req, res, next) => {
  if (!API_TOKEN) return next();
  if (req.method === 'OPTIONS') return next();
  const token = bearerTokenOf(req);
  if (!token || !tokenMatches(token, API_TOKEN)) {
    return res.status(401).json({ error: 'unauthorized', code: 'unauthorized' });
  }
  return next();
};

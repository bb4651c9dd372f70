import cors = require('cors');

let ALLOWED_ORIGINS: string[] = [];

export const initCorsMiddleware = (origins: string[]) => {
  ALLOWED_ORIGINS = origins;
};

export const isOriginAllowed = (origin: string): boolean => {
  if (!origin) return false;
  return ALLOWED_ORIGINS.some(allowed => {
    if (allowed === '*') return true;
    if (allowed.endsWith('*')) {
      return origin.startsWith(allowed.slice(0, -1));
    }
    return origin === allowed;
  });
};

export const corsMiddleware = cors({
  origin: (origin, callback) => {
    // Requests without an Origin header (curl, other servers) are not CORS
    if (!origin) return callback(null, true);
    callback(null, isOriginAllowed(origin));
  },
  methods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization'],
  maxAge: 86400,
});
